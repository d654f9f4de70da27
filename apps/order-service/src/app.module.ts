import { Module } from '@nestjs/common';
import { APP_FILTER } from '@nestjs/core';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { TypeOrmModule } from '@nestjs/typeorm';
import { EventEmitterModule } from '@nestjs/event-emitter';
import { ScheduleModule } from '@nestjs/schedule';
import { BullModule } from '@nestjs/bull';

// Feature Modules
import { OrderModule } from './order/order.module';
import { CourierModule } from './courier/courier.module';
import { CouponModule } from './coupon/coupon.module';
import { HealthModule } from './health/health.module';

import { ENTITIES } from './entities';
import { EngineExceptionFilter } from './filters/engine-exception.filter';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      envFilePath: ['.env.local', '.env'],
    }),

    TypeOrmModule.forRootAsync({
      imports: [ConfigModule],
      useFactory: (configService: ConfigService) => ({
        type: 'postgres',
        host: configService.get<string>('DB_HOST', 'localhost'),
        port: Number(configService.get('DB_PORT', 5432)),
        username: configService.get<string>('DB_USERNAME', 'postgres'),
        password: configService.get<string>('DB_PASSWORD', 'postgres'),
        database: configService.get<string>('DB_DATABASE', 'marketplace'),
        entities: ENTITIES,
        synchronize: configService.get('NODE_ENV') !== 'production',
        logging: configService.get('NODE_ENV') === 'development',
        ssl: configService.get('NODE_ENV') === 'production' ? { rejectUnauthorized: false } : false,
        extra: {
          max: 20,
          connectionTimeoutMillis: 60000,
        },
      }),
      inject: [ConfigService],
    }),

    // Listeners run after the engine has committed and released its locks.
    EventEmitterModule.forRoot({
      wildcard: false,
      delimiter: '.',
      maxListeners: 20,
      verboseMemoryLeak: true,
    }),

    ScheduleModule.forRoot(),

    BullModule.forRootAsync({
      imports: [ConfigModule],
      useFactory: (configService: ConfigService) => ({
        redis: {
          host: configService.get<string>('REDIS_HOST', 'localhost'),
          port: Number(configService.get('REDIS_PORT', 6379)),
          password: configService.get<string>('REDIS_PASSWORD'),
          db: Number(configService.get('REDIS_DB', 0)),
        },
      }),
      inject: [ConfigService],
    }),

    OrderModule,
    CourierModule,
    CouponModule,
    HealthModule,
  ],
  providers: [{ provide: APP_FILTER, useClass: EngineExceptionFilter }],
})
export class AppModule {}
