import { Module } from '@nestjs/common';
import { BullModule } from '@nestjs/bull';
import { CourierModule } from '../courier/courier.module';
import { DispatchAssignerService } from './dispatch-assigner.service';
import { DISPATCH_QUEUE, DispatchQueueService } from './dispatch-queue.service';

@Module({
  imports: [CourierModule, BullModule.registerQueue({ name: DISPATCH_QUEUE })],
  providers: [DispatchAssignerService, DispatchQueueService],
  exports: [DispatchAssignerService, DispatchQueueService, BullModule],
})
export class DispatchModule {}
