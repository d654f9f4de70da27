import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Cron, CronExpression } from '@nestjs/schedule';
import { describeError } from '@marketplace/shared';
import { DispatchQueueService } from '../dispatch/dispatch-queue.service';
import { OrderEngineService } from './order-engine.service';

/**
 * Surfaces READY_FOR_PICKUP orders that have waited too long for a courier and puts
 * them back on the dispatch queue. Orders are never cancelled from here.
 */
@Injectable()
export class StuckDispatchMonitor {
  private readonly logger = new Logger(StuckDispatchMonitor.name);
  private readonly thresholdMinutes: number;

  constructor(
    private readonly engine: OrderEngineService,
    private readonly dispatchQueue: DispatchQueueService,
    private readonly configService: ConfigService,
  ) {
    this.thresholdMinutes = Number(this.configService.get('STUCK_DISPATCH_THRESHOLD_MINUTES', 15));
  }

  @Cron(CronExpression.EVERY_MINUTE)
  async sweep(): Promise<number> {
    const stuck = await this.engine.findStuckDispatches(this.thresholdMinutes);
    if (stuck.length === 0) {
      return 0;
    }

    this.logger.warn(`${stuck.length} orders waiting for a courier over ${this.thresholdMinutes} minutes`, {
      orderIds: stuck.map((order) => order.id),
    });

    let requeued = 0;
    for (const order of stuck) {
      try {
        await this.dispatchQueue.scheduleRetry(order.id, 'STUCK');
        requeued++;
      } catch (error) {
        this.logger.error(`Could not requeue order ${order.id}`, { orderId: order.id, error: describeError(error) });
      }
    }
    return requeued;
  }
}
