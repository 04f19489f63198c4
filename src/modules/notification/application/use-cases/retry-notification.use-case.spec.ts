import { describe, it, expect, vi, beforeEach } from 'vitest';
import { Test } from '@nestjs/testing';
import type { TestingModule } from '@nestjs/testing';
import { RetryNotificationUseCase } from './retry-notification.use-case';
import { DispatchEngineService } from '../dispatch-engine.service';
import { buildJob, buildJobData } from '../../../../shared/testing/notification-job.factory';
import { StoreUnavailableError } from '../../../../shared/domain/errors';

describe('RetryNotificationUseCase', () => {
  let useCase: RetryNotificationUseCase;
  const retry = vi.fn();

  beforeEach(async () => {
    vi.clearAllMocks();

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        RetryNotificationUseCase,
        { provide: DispatchEngineService, useValue: { retry } },
      ],
    }).compile();

    useCase = module.get<RetryNotificationUseCase>(RetryNotificationUseCase);
  });

  it('should return the reopened job', async () => {
    retry.mockResolvedValue({
      kind: 'REQUEUED',
      job: buildJob({ id: 'job-1', maxAttempts: 6, attemptCount: 1 }),
    });

    const result = await useCase.execute('job-1');

    expect(retry).toHaveBeenCalledWith('job-1');
    expect(result).toEqual({
      success: true,
      job: buildJobData({ id: 'job-1', maxAttempts: 6, attemptCount: 1 }),
    });
  });

  it.each([
    [
      { kind: 'NOT_FOUND', jobId: 'job-1' },
      { code: 'NOT_FOUND', message: 'Notification with id job-1 not found' },
    ],
    [
      { kind: 'NOT_RETRYABLE', jobId: 'job-1', reason: 'not failed' },
      { code: 'NOT_RETRYABLE', message: 'not failed' },
    ],
    [
      { kind: 'DUPLICATE', jobId: 'job-2', disposition: 'ALREADY_DELIVERED' },
      {
        code: 'ALREADY_DELIVERED',
        message: 'Notification job-2 already delivered this message',
        jobId: 'job-2',
      },
    ],
    [
      { kind: 'DUPLICATE', jobId: 'job-2', disposition: 'IN_FLIGHT' },
      {
        code: 'IN_FLIGHT',
        message: 'Notification job-2 is already sending this message',
        jobId: 'job-2',
      },
    ],
    [
      { kind: 'CHANGED', jobId: 'job-1' },
      {
        code: 'CONFLICT',
        message: 'Notification job-1 changed while being retried, try again',
      },
    ],
  ])('should map %o to an error', async (outcome, error) => {
    retry.mockResolvedValue(outcome);

    expect(await useCase.execute('job-1')).toEqual({ success: false, error });
  });

  it('should return STORE_UNAVAILABLE when the store is down', async () => {
    retry.mockRejectedValue(
      new StoreUnavailableError('jobs.findById', new Error('ECONNREFUSED')),
    );

    const result = await useCase.execute('job-1');

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.code).toBe('STORE_UNAVAILABLE');
    }
  });

  it('should rethrow unexpected errors', async () => {
    retry.mockRejectedValue(new Error('boom'));

    await expect(useCase.execute('job-1')).rejects.toThrow('boom');
  });
});
