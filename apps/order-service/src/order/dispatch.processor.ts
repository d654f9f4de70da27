import { Logger } from '@nestjs/common';
import { OnQueueFailed, Process, Processor } from '@nestjs/bull';
import { Job } from 'bull';
import { describeError } from '@marketplace/shared';
import { DISPATCH_JOB, DISPATCH_QUEUE, DispatchJobData } from '../dispatch/dispatch-queue.service';
import { isEngineError } from '../common/errors/engine.exception';
import { OrderEngineService } from './order-engine.service';

export type DispatchJobOutcome = 'ASSIGNED' | 'SKIPPED';

export type DispatchJob = Pick<Job<DispatchJobData>, 'id' | 'data' | 'attemptsMade' | 'opts'>;

/**
 * Works the dispatch retry queue. Throwing hands the job back to Bull for another
 * attempt after the configured backoff.
 */
@Processor(DISPATCH_QUEUE)
export class DispatchProcessor {
  private readonly logger = new Logger(DispatchProcessor.name);

  constructor(private readonly engine: OrderEngineService) {}

  @Process(DISPATCH_JOB)
  async handleDispatch(job: DispatchJob): Promise<DispatchJobOutcome> {
    const { orderId } = job.data;
    this.logger.debug(`Dispatch attempt ${job.attemptsMade + 1} for order ${orderId}`, { orderId, jobId: job.id });

    try {
      const order = await this.engine.dispatch(orderId);
      this.logger.log(`Order ${orderId} dispatched to courier ${order.assignedCourierId}`, {
        orderId,
        courierId: order.assignedCourierId,
        attempts: job.attemptsMade + 1,
      });
      return 'ASSIGNED';
    } catch (error) {
      // Retry while the failure may clear up; a rejection about the order itself never will.
      if (isEngineError(error) && !error.retryable) {
        this.logger.log(`Dropping dispatch of order ${orderId}: ${error.code}`, { orderId });
        return 'SKIPPED';
      }
      throw error;
    }
  }

  @OnQueueFailed()
  onFailed(job: DispatchJob, error: Error): void {
    const attempts = job.opts.attempts ?? 1;
    if (job.attemptsMade >= attempts) {
      this.logger.error(`Gave up dispatching order ${job.data.orderId} after ${job.attemptsMade} attempts`, {
        orderId: job.data.orderId,
        error: describeError(error),
      });
    }
  }
}
