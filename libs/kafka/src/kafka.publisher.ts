import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { IHeaders, Producer } from 'kafkajs';
import { setTimeout as delay } from 'node:timers/promises';
import { describeError } from '@marketplace/shared';
import { KafkaClientService } from './kafka.client';

const MAX_BACKOFF_MS = 30000;

export interface OutboundRecord {
  topic: string;
  key: string;
  value: string;
  headers?: Record<string, string>;
}

export type DeliveryReport =
  | { delivered: true; attempts: number; partition: number | null }
  | { delivered: false; attempts: number; reason: string; parked: boolean };

/** Body written to the parking topic for a record that exhausted its attempts. */
export interface ParkedRecord {
  topic: string;
  key: string;
  value: string;
  reason: string;
  attempts: number;
  parkedAt: string;
}

/**
 * Publishes single records with a bounded number of attempts. A record that never
 * goes through is parked on the dead-letter topic; callers get a report, never a throw.
 */
@Injectable()
export class KafkaPublisherService {
  private readonly logger = new Logger(KafkaPublisherService.name);
  private readonly producer: Producer;
  private readonly attempts: number;
  private readonly backoffMs: number;
  private readonly parkingTopic: string;

  constructor(
    private readonly kafkaClient: KafkaClientService,
    private readonly configService: ConfigService,
  ) {
    this.producer = this.kafkaClient.getProducer();
    this.attempts = Number(this.configService.get('KAFKA_MAX_RETRIES', 3)) + 1;
    this.backoffMs = Number(this.configService.get('KAFKA_RETRY_BASE_MS', 1000));
    this.parkingTopic = this.configService.get<string>('KAFKA_DEAD_LETTER_TOPIC', 'dead-letter-queue');
  }

  async publish(record: OutboundRecord): Promise<DeliveryReport> {
    let reason = '';
    for (let attempt = 1; attempt <= this.attempts; attempt++) {
      try {
        const [metadata] = await this.producer.send({
          topic: record.topic,
          messages: [{ key: record.key, value: record.value, headers: this.headersFor(record, attempt) }],
        });
        return { delivered: true, attempts: attempt, partition: metadata?.partition ?? null };
      } catch (error) {
        reason = describeError(error);
        this.logger.warn(`Publish to ${record.topic} failed (attempt ${attempt}/${this.attempts})`, {
          key: record.key,
          error: reason,
        });
      }
      if (attempt < this.attempts) {
        await delay(this.backoffFor(attempt));
      }
    }

    const parked = await this.park(record, reason);
    return { delivered: false, attempts: this.attempts, reason, parked };
  }

  private async park(record: OutboundRecord, reason: string): Promise<boolean> {
    const body: ParkedRecord = {
      topic: record.topic,
      key: record.key,
      value: record.value,
      reason,
      attempts: this.attempts,
      parkedAt: new Date().toISOString(),
    };
    try {
      await this.producer.send({
        topic: this.parkingTopic,
        messages: [{ key: record.key, value: JSON.stringify(body), headers: { 'original-topic': record.topic } }],
      });
      this.logger.warn(`Parked record from ${record.topic} on ${this.parkingTopic}`, { key: record.key });
      return true;
    } catch (error) {
      this.logger.error(`Could not park record from ${record.topic}`, {
        key: record.key,
        reason,
        error: describeError(error),
      });
      return false;
    }
  }

  private headersFor(record: OutboundRecord, attempt: number): IHeaders {
    return { ...record.headers, attempt: String(attempt) };
  }

  private backoffFor(attempt: number): number {
    return Math.min(this.backoffMs * 2 ** (attempt - 1), MAX_BACKOFF_MS);
  }
}
