import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { InjectQueue } from '@nestjs/bull';
import { Queue } from 'bull';

export const DISPATCH_QUEUE = 'dispatch';
export const DISPATCH_JOB = 'dispatch-order';

export interface DispatchJobData {
  orderId: string;
  reason: string;
}

/**
 * Retry policy for orders that reached READY_FOR_PICKUP without a courier. Attempts
 * are bounded with exponential backoff; the state machine itself never waits.
 */
@Injectable()
export class DispatchQueueService {
  private readonly logger = new Logger(DispatchQueueService.name);
  private readonly maxAttempts: number;
  private readonly backoffMs: number;

  constructor(
    @InjectQueue(DISPATCH_QUEUE) private readonly dispatchQueue: Queue<DispatchJobData>,
    private readonly configService: ConfigService,
  ) {
    this.maxAttempts = Number(this.configService.get('DISPATCH_MAX_ATTEMPTS', 5));
    this.backoffMs = Number(this.configService.get('DISPATCH_BACKOFF_MS', 2000));
  }

  async scheduleRetry(orderId: string, reason: string): Promise<void> {
    const jobId = `dispatch:${orderId}`;
    await this.clearFinishedJob(jobId);

    // One pending job per order: a second request while one waits is a no-op.
    await this.dispatchQueue.add(
      DISPATCH_JOB,
      { orderId, reason },
      {
        jobId,
        attempts: this.maxAttempts,
        backoff: { type: 'exponential', delay: this.backoffMs },
        removeOnComplete: true,
        removeOnFail: 100,
      },
    );
    this.logger.log(`Scheduled dispatch retry for order ${orderId}`, {
      orderId,
      reason,
      maxAttempts: this.maxAttempts,
    });
  }

  /**
   * Bull keeps a failed job under its id, and adding that id again is silently ignored.
   * A finished job is dropped first so an order can be queued again after exhaustion.
   */
  private async clearFinishedJob(jobId: string): Promise<void> {
    const previous = await this.dispatchQueue.getJob(jobId);
    if (!previous) {
      return;
    }
    if ((await previous.isFailed()) || (await previous.isCompleted())) {
      await previous.remove();
      this.logger.debug(`Removed finished dispatch job ${jobId}`);
    }
  }
}
