import { Module } from '@nestjs/common';
import { PersistenceModule } from '../persistence/persistence.module';
import { CollaboratorsModule } from '../collaborators/collaborators.module';
import { PricingModule } from '../pricing/pricing.module';
import { CourierModule } from '../courier/courier.module';
import { DispatchModule } from '../dispatch/dispatch.module';
import { OrderStateMachine } from './order-state-machine';
import { OrderEngineService } from './order-engine.service';
import { OrderController } from './order.controller';
import { DispatchProcessor } from './dispatch.processor';
import { StuckDispatchMonitor } from './stuck-dispatch.monitor';

@Module({
  imports: [PersistenceModule, CollaboratorsModule, PricingModule, CourierModule, DispatchModule],
  controllers: [OrderController],
  providers: [OrderStateMachine, OrderEngineService, DispatchProcessor, StuckDispatchMonitor],
  exports: [OrderEngineService],
})
export class OrderModule {}
