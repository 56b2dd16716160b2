/**
 * Maintenance RabbitMQ Publisher
 *
 * Sends committed domain events to the maintenance exchange.
 */

import crypto from 'crypto';
import type { ChannelWrapper } from 'amqp-connection-manager';
import { createChannelWrapper } from '../../../config/rabbitmq.js';
import type { MaintenanceEvent, MaintenanceEventPublisher } from '../maintenance_events.js';
import {
  MAINTENANCE_EXCHANGE_NAME,
  routingKeyFor,
  setupMaintenanceTopology,
} from './maintenance_topology.js';

const URGENT_EVENTS: ReadonlySet<MaintenanceEvent['type']> = new Set([
  'approval.escalated',
  'cost.budget_exceeded',
  'cost.category_budget_exceeded',
]);

export class RabbitMQMaintenancePublisher implements MaintenanceEventPublisher {
  private channelWrapper: ChannelWrapper | null = null;

  private ensureChannel(): ChannelWrapper {
    if (!this.channelWrapper) {
      this.channelWrapper = createChannelWrapper(setupMaintenanceTopology);
    }
    return this.channelWrapper;
  }

  async publish(event: MaintenanceEvent): Promise<void> {
    const channel = this.ensureChannel();
    const messageId = crypto.randomUUID();
    const routingKey = routingKeyFor(event.type);

    await channel.publish(MAINTENANCE_EXCHANGE_NAME, routingKey, event, {
      persistent: true,
      priority: URGENT_EVENTS.has(event.type) ? 8 : 5,
      messageId,
      contentType: 'application/json',
      timestamp: Date.parse(event.occurredAt),
      headers: { 'x-hostel-id': event.hostelId },
    });

    console.log(`[Maintenance Publisher] Published ${event.type} (${messageId}) to ${routingKey}`);
  }

  async close(): Promise<void> {
    if (this.channelWrapper) {
      await this.channelWrapper.close();
      this.channelWrapper = null;
    }
  }
}
