/**
 * Recurrence Scheduler
 *
 * Preventive-maintenance schedules: due-date arithmetic, execution tracking
 * and periodic generation of preventive requests.
 */

import {
  addDays,
  addMonths,
  differenceInCalendarDays,
  getDaysInMonth,
  isAfter,
  setDate,
  subDays,
} from 'date-fns';
import type { MaintenanceSettings } from '../../config/maintenance_config.js';
import type { Clock } from '../../utils/clock.js';
import { MaintenanceNotFoundError } from './maintenance_errors.js';
import { publishAll, type MaintenanceEvent, type MaintenanceEventPublisher } from './maintenance_events.js';
import { nextScheduleCode } from './maintenance_numbering.js';
import {
  CreateScheduleInputSchema,
  parseInput,
  RecordExecutionInputSchema,
  type CreateScheduleInput,
  type PreventiveRequestInput,
  type RecordExecutionInput,
} from './maintenance_schemas.js';
import type { MaintenanceStore, MaintenanceTransaction } from './maintenance_store.js';
import type {
  MaintenanceRequest,
  RecurrenceConfig,
  RecurrenceRule,
  Schedule,
  ScheduleExecution,
} from './maintenance_types.js';

const MONTH_STEPS: Partial<Record<RecurrenceRule, number>> = {
  monthly: 1,
  quarterly: 3,
  semi_annual: 6,
  annual: 12,
};

/** Days ahead of the due date at which a run is announced */
export const REMINDER_LEAD_DAYS: Record<RecurrenceRule, number> = {
  daily: 1,
  weekly: 2,
  monthly: 7,
  quarterly: 14,
  semi_annual: 21,
  annual: 30,
  custom: 7,
};

export function reminderDateFor(dueDate: Date, rule: RecurrenceRule): Date {
  return subDays(dueDate, REMINDER_LEAD_DAYS[rule]);
}

/**
 * Next occurrence after `current`. Month-based rules clamp to the end of
 * shorter months; with an anchor day the original day comes back once the
 * month is long enough.
 */
export function nextDueDate(
  current: Date,
  rule: RecurrenceRule,
  config: RecurrenceConfig = {},
  customDefaultDays = 30
): Date {
  const months = MONTH_STEPS[rule];
  if (months !== undefined) {
    const next = addMonths(current, months);
    if (config.anchorDayOfMonth === undefined) {
      return next;
    }
    return setDate(next, Math.min(config.anchorDayOfMonth, getDaysInMonth(next)));
  }

  switch (rule) {
    case 'daily':
      return addDays(current, 1);
    case 'weekly':
      return addDays(current, 7);
    default:
      return addDays(current, Math.max(1, config.intervalDays ?? customDefaultDays));
  }
}

export function isMonthBasedRule(rule: RecurrenceRule): boolean {
  return MONTH_STEPS[rule] !== undefined;
}

/**
 * Creates the request spawned for a due schedule inside the caller's
 * transaction. Implemented by the workflow engine.
 */
export interface PreventiveRequestSink {
  createPreventiveInTransaction(
    tx: MaintenanceTransaction,
    input: PreventiveRequestInput,
    now: Date,
    events: MaintenanceEvent[]
  ): Promise<MaintenanceRequest>;
}

export interface GenerationFailure {
  scheduleId: string;
  error: Error;
}

export interface GenerationResult {
  created: MaintenanceRequest[];
  skipped: number;
  failed: GenerationFailure[];
}

type SchedulerSettings = Pick<MaintenanceSettings, 'customRecurrenceDefaultDays'>;

export class RecurrenceScheduler {
  constructor(
    private store: MaintenanceStore,
    private publisher: MaintenanceEventPublisher,
    private clock: Clock,
    private settings: SchedulerSettings,
    private sink: PreventiveRequestSink
  ) {}

  nextDueDate(current: Date, rule: RecurrenceRule, config: RecurrenceConfig = {}): Date {
    return nextDueDate(current, rule, config, this.settings.customRecurrenceDefaultDays);
  }

  async createSchedule(input: CreateScheduleInput): Promise<Schedule> {
    const data = parseInput(CreateScheduleInputSchema, input, 'schedule');
    const now = this.clock.now();

    const recurrenceConfig: RecurrenceConfig = { ...data.recurrenceConfig };
    if (isMonthBasedRule(data.recurrence) && recurrenceConfig.anchorDayOfMonth === undefined) {
      recurrenceConfig.anchorDayOfMonth = data.startDate.getDate();
    }

    return this.store.transaction(async (tx) => {
      const scheduleCode = await nextScheduleCode(tx, data.hostelId);
      const schedule = await tx.schedules.insert({
        hostelId: data.hostelId,
        scheduleCode,
        title: data.title,
        description: data.description ?? null,
        category: data.category,
        recurrence: data.recurrence,
        recurrenceConfig,
        startDate: data.startDate,
        endDate: data.endDate ?? null,
        nextDueDate: data.startDate,
        reminderDate: reminderDateFor(data.startDate, data.recurrence),
        assignedTo: data.assignedTo ?? null,
        estimatedCost: data.estimatedCost ?? null,
        autoCreateRequests: data.autoCreateRequests,
        isActive: true,
        totalExecutions: 0,
        successfulExecutions: 0,
        lastCompletedDate: null,
        lastGeneratedDueDate: null,
        createdBy: data.createdBy,
        createdAt: now,
        updatedAt: now,
      });

      await tx.audit.record({
        actorId: data.createdBy,
        hostelId: data.hostelId,
        action: 'CREATE_MAINTENANCE_SCHEDULE',
        entityType: 'maintenance_schedule',
        entityId: schedule.id,
        afterState: schedule,
      });

      console.log(`[Scheduler] Created schedule ${scheduleCode} (${data.recurrence}) for hostel ${data.hostelId}`);
      return schedule;
    });
  }

  async getSchedule(scheduleId: string): Promise<Schedule> {
    return this.store.transaction(async (tx) => {
      const schedule = await tx.schedules.findById(scheduleId);
      if (!schedule) {
        throw new MaintenanceNotFoundError('Schedule', scheduleId);
      }
      return schedule;
    });
  }

  async listExecutions(scheduleId: string): Promise<ScheduleExecution[]> {
    return this.store.transaction((tx) => tx.schedules.listExecutions(scheduleId));
  }

  async activate(scheduleId: string, actor: string): Promise<Schedule> {
    return this.setActive(scheduleId, true, actor);
  }

  async deactivate(scheduleId: string, actor: string): Promise<Schedule> {
    return this.setActive(scheduleId, false, actor);
  }

  /**
   * Record one run of a schedule and advance it. `scheduledDate` defaults to
   * the current due date. Completed runs anchor the next due date on the
   * execution date, missed runs on the scheduled date; either way the
   * schedule only moves forward.
   */
  async recordExecution(
    scheduleId: string,
    input: RecordExecutionInput
  ): Promise<{ execution: ScheduleExecution; schedule: Schedule }> {
    const data = parseInput(RecordExecutionInputSchema, input, 'schedule execution');
    const now = this.clock.now();

    return this.store.transaction(async (tx) => {
      const schedule = await this.load(tx, scheduleId);
      const scheduledDate = data.scheduledDate ?? schedule.nextDueDate;
      const daysLate = differenceInCalendarDays(data.executionDate, scheduledDate);

      const execution = await tx.schedules.insertExecution({
        scheduleId,
        requestId: data.requestId ?? null,
        scheduledDate,
        executionDate: data.executionDate,
        executedBy: data.executedBy,
        completed: data.completed,
        notes: data.notes ?? null,
        actualCost: data.actualCost ?? null,
        qualityRating: data.qualityRating ?? null,
        wasOnTime: !isAfter(data.executionDate, scheduledDate),
        daysDelayed: Math.max(0, daysLate),
        createdAt: now,
      });

      const anchor = data.completed ? data.executionDate : scheduledDate;
      let next = this.nextDueDate(anchor, schedule.recurrence, schedule.recurrenceConfig);
      while (!isAfter(next, schedule.nextDueDate)) {
        next = this.nextDueDate(next, schedule.recurrence, schedule.recurrenceConfig);
      }

      const expired = schedule.endDate !== null && isAfter(next, schedule.endDate);

      const updated = await tx.schedules.update(scheduleId, {
        nextDueDate: next,
        reminderDate: reminderDateFor(next, schedule.recurrence),
        totalExecutions: schedule.totalExecutions + 1,
        successfulExecutions: schedule.successfulExecutions + (data.completed ? 1 : 0),
        lastCompletedDate: data.completed ? data.executionDate : schedule.lastCompletedDate,
        isActive: expired ? false : schedule.isActive,
        updatedAt: now,
      });

      if (expired) {
        console.log(`[Scheduler] Schedule ${schedule.scheduleCode} reached its end date and was deactivated`);
      }

      return { execution, schedule: updated };
    });
  }

  /**
   * Active schedules whose due date has passed without a recorded run
   */
  async findOverdueSchedules(asOf: Date = this.clock.now(), hostelId?: string): Promise<Schedule[]> {
    const overdue = await this.store.transaction((tx) => tx.schedules.findOverdue(asOf, hostelId));
    if (overdue.length > 0) {
      console.warn(`[Scheduler] Found ${overdue.length} overdue schedules${hostelId ? ` for hostel ${hostelId}` : ''}`);
    }
    return overdue;
  }

  /**
   * Spawn one preventive request per active, auto-creating schedule due on
   * or before `asOf`. A due date that already produced a request is skipped.
   */
  async generateDueRequests(asOf: Date = this.clock.now()): Promise<GenerationResult> {
    const due = await this.store.transaction((tx) => tx.schedules.findDue(asOf));
    const result: GenerationResult = { created: [], skipped: 0, failed: [] };

    for (const candidate of due) {
      const events: MaintenanceEvent[] = [];
      try {
        const request = await this.store.transaction(async (tx) => {
          const schedule = await this.load(tx, candidate.id);
          if (
            !schedule.isActive ||
            !schedule.autoCreateRequests ||
            isAfter(schedule.nextDueDate, asOf) ||
            (schedule.lastGeneratedDueDate !== null &&
              schedule.lastGeneratedDueDate.getTime() === schedule.nextDueDate.getTime())
          ) {
            return null;
          }

          const now = this.clock.now();
          const created = await this.sink.createPreventiveInTransaction(
            tx,
            {
              hostelId: schedule.hostelId,
              title: schedule.title,
              description: schedule.description
                ? `Scheduled ${schedule.recurrence} maintenance (${schedule.scheduleCode}): ${schedule.description}`
                : `Scheduled ${schedule.recurrence} maintenance (${schedule.scheduleCode})`,
              category: schedule.category,
              estimatedCost: schedule.estimatedCost,
              requestedBy: schedule.createdBy,
              deadline: schedule.nextDueDate,
              scheduleId: schedule.id,
            },
            now,
            events
          );

          await tx.schedules.update(schedule.id, {
            lastGeneratedDueDate: schedule.nextDueDate,
            updatedAt: now,
          });

          events.push({
            type: 'schedule.execution_due',
            occurredAt: now.toISOString(),
            hostelId: schedule.hostelId,
            scheduleId: schedule.id,
            requestId: created.id,
            dueDate: schedule.nextDueDate.toISOString(),
          });

          return created;
        });

        if (request) {
          result.created.push(request);
          await publishAll(this.publisher, events);
        } else {
          result.skipped++;
        }
      } catch (error) {
        const failure = error instanceof Error ? error : new Error(String(error));
        console.error(`[Scheduler] Failed to generate request for schedule ${candidate.id}:`, failure.message);
        result.failed.push({ scheduleId: candidate.id, error: failure });
      }
    }

    console.log(
      `[Scheduler] Generated ${result.created.length} preventive requests (${result.skipped} skipped, ${result.failed.length} failed)`
    );
    return result;
  }

  private async setActive(scheduleId: string, isActive: boolean, actor: string): Promise<Schedule> {
    return this.store.transaction(async (tx) => {
      const schedule = await this.load(tx, scheduleId);
      if (schedule.isActive === isActive) {
        return schedule;
      }
      const updated = await tx.schedules.update(scheduleId, { isActive, updatedAt: this.clock.now() });
      await tx.audit.record({
        actorId: actor,
        hostelId: schedule.hostelId,
        action: isActive ? 'ACTIVATE_MAINTENANCE_SCHEDULE' : 'DEACTIVATE_MAINTENANCE_SCHEDULE',
        entityType: 'maintenance_schedule',
        entityId: scheduleId,
        beforeState: { isActive: schedule.isActive },
        afterState: { isActive },
      });
      return updated;
    });
  }

  private async load(tx: MaintenanceTransaction, scheduleId: string): Promise<Schedule> {
    const schedule = await tx.schedules.findById(scheduleId, { lock: true });
    if (!schedule) {
      throw new MaintenanceNotFoundError('Schedule', scheduleId);
    }
    return schedule;
  }
}
