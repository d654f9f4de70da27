import { Module } from '@nestjs/common';
import { HttpModule } from '@nestjs/axios';
import { KafkaModule } from '@marketplace/kafka';
import { CircuitBreakerService } from '../common/services/circuit-breaker.service';
import { CATALOG_CLIENT, HttpCatalogClient } from './catalog.client';
import { HttpIdentityClient, IDENTITY_CLIENT } from './identity.client';
import { KafkaNotificationGateway, NOTIFICATION_GATEWAY } from './notification.gateway';
import { NotificationListener } from './notification.listener';

@Module({
  imports: [
    HttpModule.register({
      maxRedirects: 5,
      headers: { 'User-Agent': 'Marketplace-Order-Engine' },
    }),
    KafkaModule,
  ],
  providers: [
    CircuitBreakerService,
    { provide: CATALOG_CLIENT, useClass: HttpCatalogClient },
    { provide: IDENTITY_CLIENT, useClass: HttpIdentityClient },
    { provide: NOTIFICATION_GATEWAY, useClass: KafkaNotificationGateway },
    NotificationListener,
  ],
  exports: [CATALOG_CLIENT, IDENTITY_CLIENT, NOTIFICATION_GATEWAY],
})
export class CollaboratorsModule {}
