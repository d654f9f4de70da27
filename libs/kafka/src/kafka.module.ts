import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { KafkaClientService } from './kafka.client';
import { KafkaPublisherService } from './kafka.publisher';

@Module({
  imports: [ConfigModule],
  providers: [KafkaClientService, KafkaPublisherService],
  exports: [KafkaClientService, KafkaPublisherService],
})
export class KafkaModule {}
