import { format } from 'date-fns';
import type { MaintenanceTransaction } from './maintenance_store.js';

export type MonthlyNumberPrefix = 'MNT' | 'CERT' | 'WO';

/**
 * Next `PREFIX-YYYY-MM-NNNN` number. Counters restart every month and are
 * kept separately per owner (a hostel id, or "global").
 */
export async function nextMonthlyNumber(
  tx: MaintenanceTransaction,
  prefix: MonthlyNumberPrefix,
  owner: string,
  at: Date
): Promise<string> {
  const period = format(at, 'yyyy-MM');
  const sequence = await tx.sequences.next(`${prefix}:${owner}:${period}`);
  return `${prefix}-${period}-${String(sequence).padStart(4, '0')}`;
}

export async function nextScheduleCode(tx: MaintenanceTransaction, hostelId: string): Promise<string> {
  const sequence = await tx.sequences.next(`SCH:${hostelId}`);
  return `SCH-${String(sequence).padStart(4, '0')}`;
}
