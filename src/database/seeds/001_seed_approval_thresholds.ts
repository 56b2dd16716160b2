import type { Knex } from 'knex';
import { MAINTENANCE_CONFIG } from '../../config/maintenance_config.js';

const DEFAULT_HOSTEL_ID = '00000000-0000-0000-0000-000000000001';

export async function seed(knex: Knex): Promise<void> {
  const existing = await knex('approval_thresholds').where({ hostel_id: DEFAULT_HOSTEL_ID }).first();

  if (existing) {
    console.log('✅ Default approval thresholds already exist, skipping seed');
    return;
  }

  const defaults = MAINTENANCE_CONFIG.DEFAULT_THRESHOLDS;
  await knex('approval_thresholds').insert({
    hostel_id: DEFAULT_HOSTEL_ID,
    auto_approve_below: defaults.autoApproveBelow,
    supervisor_limit: defaults.supervisorLimit,
    admin_required_above: defaults.adminRequiredAbove,
    auto_approve_enabled: defaults.autoApproveEnabled,
    created_at: knex.fn.now(),
    updated_at: knex.fn.now(),
  });

  console.log('✅ Default approval thresholds seeded');
}
