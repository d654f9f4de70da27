import { Injectable } from '@nestjs/common';
import { HealthCheckError, HealthIndicator, HealthIndicatorResult } from '@nestjs/terminus';
import { KafkaClientService } from '@marketplace/kafka';

/** Reports whether the notification producer is connected to the brokers. */
@Injectable()
export class KafkaHealthIndicator extends HealthIndicator {
  constructor(private readonly kafkaClient: KafkaClientService) {
    super();
  }

  isHealthy(key: string): HealthIndicatorResult {
    const connected = this.kafkaClient.isConnected();
    const result = this.getStatus(key, connected);
    if (!connected) {
      throw new HealthCheckError('Kafka producer is not connected', result);
    }
    return result;
  }
}
