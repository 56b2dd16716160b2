/**
 * Maintenance RabbitMQ Topology
 *
 * Exchange: maintenance.events (topic, durable)
 * Queues:
 *   - maintenance.notifications (durable) - every domain event, for notifiers
 *   - maintenance.escalations (durable) - approval escalations and budget overruns
 * DLQs:
 *   - maintenance.notifications.dlq
 *   - maintenance.escalations.dlq
 */

import type { Channel } from 'amqplib';
import type { MaintenanceEventType } from '../maintenance_events.js';

export const MAINTENANCE_EXCHANGE_NAME = 'maintenance.events';
export const MAINTENANCE_EXCHANGE_TYPE = 'topic' as const;
export const MAINTENANCE_DLX_NAME = `${MAINTENANCE_EXCHANGE_NAME}.dlx`;

export const MAINTENANCE_QUEUE_NAMES = {
  NOTIFICATIONS: 'maintenance.notifications',
  ESCALATIONS: 'maintenance.escalations',
  NOTIFICATIONS_DLQ: 'maintenance.notifications.dlq',
  ESCALATIONS_DLQ: 'maintenance.escalations.dlq',
} as const;

export const MAINTENANCE_ROUTING_PATTERNS = {
  ALL: 'maintenance.#',
  APPROVAL_ESCALATED: 'maintenance.approval.escalated',
  BUDGET_EXCEEDED: 'maintenance.cost.budget_exceeded',
  CATEGORY_BUDGET_EXCEEDED: 'maintenance.cost.category_budget_exceeded',
} as const;

const DLQ_TTL_MS = 7 * 24 * 60 * 60 * 1000;
const MESSAGE_TTL_MS = 24 * 60 * 60 * 1000;

/**
 * `request.status_changed` is published as `maintenance.request.status_changed`
 */
export function routingKeyFor(type: MaintenanceEventType): string {
  return `maintenance.${type}`;
}

async function assertQueueWithDlq(channel: Channel, queue: string, dlq: string): Promise<void> {
  await channel.assertQueue(dlq, {
    durable: true,
    arguments: { 'x-message-ttl': DLQ_TTL_MS },
  });
  await channel.bindQueue(dlq, MAINTENANCE_DLX_NAME, queue);

  await channel.assertQueue(queue, {
    durable: true,
    arguments: {
      'x-dead-letter-exchange': MAINTENANCE_DLX_NAME,
      'x-dead-letter-routing-key': queue,
      'x-message-ttl': MESSAGE_TTL_MS,
    },
  });
}

/**
 * Declare exchanges, queues and bindings. Safe to re-run on reconnect.
 */
export async function setupMaintenanceTopology(channel: Channel): Promise<void> {
  await channel.assertExchange(MAINTENANCE_DLX_NAME, 'topic', { durable: true });
  await channel.assertExchange(MAINTENANCE_EXCHANGE_NAME, MAINTENANCE_EXCHANGE_TYPE, { durable: true });

  await assertQueueWithDlq(
    channel,
    MAINTENANCE_QUEUE_NAMES.NOTIFICATIONS,
    MAINTENANCE_QUEUE_NAMES.NOTIFICATIONS_DLQ
  );
  await assertQueueWithDlq(
    channel,
    MAINTENANCE_QUEUE_NAMES.ESCALATIONS,
    MAINTENANCE_QUEUE_NAMES.ESCALATIONS_DLQ
  );

  await channel.bindQueue(
    MAINTENANCE_QUEUE_NAMES.NOTIFICATIONS,
    MAINTENANCE_EXCHANGE_NAME,
    MAINTENANCE_ROUTING_PATTERNS.ALL
  );
  await channel.bindQueue(
    MAINTENANCE_QUEUE_NAMES.ESCALATIONS,
    MAINTENANCE_EXCHANGE_NAME,
    MAINTENANCE_ROUTING_PATTERNS.APPROVAL_ESCALATED
  );
  await channel.bindQueue(
    MAINTENANCE_QUEUE_NAMES.ESCALATIONS,
    MAINTENANCE_EXCHANGE_NAME,
    MAINTENANCE_ROUTING_PATTERNS.BUDGET_EXCEEDED
  );
  await channel.bindQueue(
    MAINTENANCE_QUEUE_NAMES.ESCALATIONS,
    MAINTENANCE_EXCHANGE_NAME,
    MAINTENANCE_ROUTING_PATTERNS.CATEGORY_BUDGET_EXCEEDED
  );

  console.log(`[Maintenance RabbitMQ] Topology ready on ${MAINTENANCE_EXCHANGE_NAME}`);
}
