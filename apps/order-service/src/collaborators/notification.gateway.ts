import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { KafkaPublisherService } from '@marketplace/kafka';
import { NotificationEvent } from '@marketplace/shared';

export const NOTIFICATION_GATEWAY = Symbol('NOTIFICATION_GATEWAY');

export interface NotificationGateway {
  notify(userId: string, event: NotificationEvent, payload: Record<string, unknown>): Promise<void>;
}

/**
 * Hands notifications to the push pipeline over Kafka. Retries and parking live in
 * the publisher, and nothing here throws back into the engine.
 */
@Injectable()
export class KafkaNotificationGateway implements NotificationGateway {
  private readonly logger = new Logger(KafkaNotificationGateway.name);
  private readonly topic: string;

  constructor(
    private readonly publisher: KafkaPublisherService,
    private readonly configService: ConfigService,
  ) {
    this.topic = this.configService.get<string>('NOTIFICATION_TOPIC', 'marketplace.notifications');
  }

  async notify(userId: string, event: NotificationEvent, payload: Record<string, unknown>): Promise<void> {
    const report = await this.publisher.publish({
      topic: this.topic,
      key: userId,
      value: JSON.stringify({ userId, event, payload, sentAt: new Date().toISOString() }),
      headers: { 'event-type': event },
    });

    if (!report.delivered) {
      this.logger.warn(`Notification ${event} for ${userId} was not delivered`, {
        userId,
        event,
        reason: report.reason,
        attempts: report.attempts,
        parked: report.parked,
      });
    }
  }
}
