import { Test, TestingModule } from '@nestjs/testing';
import { ConfigService } from '@nestjs/config';
import { getQueueToken } from '@nestjs/bull';
import { DISPATCH_JOB, DISPATCH_QUEUE, DispatchQueueService } from './dispatch-queue.service';

describe('DispatchQueueService', () => {
  let service: DispatchQueueService;

  const mockQueue = { add: jest.fn(), getJob: jest.fn() };

  const existingJob = (state: { failed: boolean; completed?: boolean }) => ({
    isFailed: jest.fn().mockResolvedValue(state.failed),
    isCompleted: jest.fn().mockResolvedValue(state.completed ?? false),
    remove: jest.fn().mockResolvedValue(undefined),
  });
  const mockConfigService = {
    get: jest.fn((key: string, defaultValue?: unknown) => {
      switch (key) {
        case 'DISPATCH_MAX_ATTEMPTS':
          return '4';
        case 'DISPATCH_BACKOFF_MS':
          return '500';
        default:
          return defaultValue;
      }
    }),
  };

  beforeEach(async () => {
    mockQueue.getJob.mockResolvedValue(null);
    const module: TestingModule = await Test.createTestingModule({
      providers: [
        DispatchQueueService,
        { provide: getQueueToken(DISPATCH_QUEUE), useValue: mockQueue },
        { provide: ConfigService, useValue: mockConfigService },
      ],
    }).compile();

    service = module.get<DispatchQueueService>(DispatchQueueService);
  });

  afterEach(() => {
    jest.clearAllMocks();
  });

  it('should enqueue one job per order with bounded exponential backoff', async () => {
    mockQueue.add.mockResolvedValue({ id: 'dispatch:order-1' });

    await service.scheduleRetry('order-1', 'NO_COURIER_AVAILABLE');

    expect(mockQueue.add).toHaveBeenCalledWith(
      DISPATCH_JOB,
      { orderId: 'order-1', reason: 'NO_COURIER_AVAILABLE' },
      {
        jobId: 'dispatch:order-1',
        attempts: 4,
        backoff: { type: 'exponential', delay: 500 },
        removeOnComplete: true,
        removeOnFail: 100,
      },
    );
  });

  it('should queue an order again after its earlier job exhausted its attempts', async () => {
    const failed = existingJob({ failed: true });
    mockQueue.getJob.mockResolvedValue(failed);
    mockQueue.add.mockResolvedValue({ id: 'dispatch:order-1' });

    await service.scheduleRetry('order-1', 'NO_COURIER_AVAILABLE');

    expect(mockQueue.getJob).toHaveBeenCalledWith('dispatch:order-1');
    expect(failed.remove).toHaveBeenCalledTimes(1);
    expect(failed.remove.mock.invocationCallOrder[0]).toBeLessThan(mockQueue.add.mock.invocationCallOrder[0]);
    expect(mockQueue.add).toHaveBeenCalledWith(
      DISPATCH_JOB,
      { orderId: 'order-1', reason: 'NO_COURIER_AVAILABLE' },
      expect.objectContaining({ jobId: 'dispatch:order-1' }),
    );
  });

  it('should leave a job that is still waiting in place', async () => {
    const waiting = existingJob({ failed: false });
    mockQueue.getJob.mockResolvedValue(waiting);
    mockQueue.add.mockResolvedValue({ id: 'dispatch:order-1' });

    await service.scheduleRetry('order-1', 'NO_COURIER_AVAILABLE');

    expect(waiting.remove).not.toHaveBeenCalled();
    expect(mockQueue.add).toHaveBeenCalledTimes(1);
  });

  it('should pass queue failures to the caller', async () => {
    mockQueue.add.mockRejectedValue(new Error('redis down'));

    await expect(service.scheduleRetry('order-1', 'STUCK')).rejects.toThrow('redis down');
  });
});
