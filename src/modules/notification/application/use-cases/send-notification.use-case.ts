import { Injectable } from '@nestjs/common';
import { DispatchEngineService } from '../dispatch-engine.service';
import type { SubmitResult } from '../dispatch-engine.service';
import { deriveManualEventId } from '../../domain/notification.rules';
import type { Channel } from '../../../../shared/ports/channel-provider.port';
import {
  InvalidEventError,
  StoreUnavailableError,
  UnknownEventTypeError,
} from '../../../../shared/domain/errors';

export interface SendNotificationInput {
  eventType: string;
  recipient: string;
  channel: Channel;
  payload: Record<string, string>;
  eventId?: string;
  locale?: string;
}

/**
 * Result type using discriminated union for explicit error handling
 */
export type SendNotificationResult =
  | { success: true; notification: SubmitResult }
  | { success: false; error: SendNotificationError };

export type SendNotificationError =
  | { code: 'VALIDATION_ERROR'; message: string; violations: string[] }
  | { code: 'UNKNOWN_EVENT_TYPE'; message: string; jobId: string | null }
  | { code: 'ALREADY_DELIVERED'; message: string; jobId: string }
  | { code: 'STORE_UNAVAILABLE'; message: string };

/**
 * SendNotification Use Case
 *
 * Manual send from the management interface. Goes through the same
 * idempotency guard as broker events; a request without an event id gets
 * one derived from its content, so an identical resend is a duplicate.
 */
@Injectable()
export class SendNotificationUseCase {
  constructor(private readonly engine: DispatchEngineService) {}

  async execute(input: SendNotificationInput): Promise<SendNotificationResult> {
    const eventId =
      input.eventId ??
      deriveManualEventId(
        this.engine.canonicalEventType(input.eventType),
        input.channel,
        input.recipient,
        input.payload,
      );

    let notification: SubmitResult;
    try {
      notification = await this.engine.submit({
        eventId,
        eventType: input.eventType,
        channel: input.channel,
        recipient: input.recipient,
        payload: input.payload,
        locale: input.locale,
      });
    } catch (error) {
      return this.mapDomainError(error);
    }

    if (notification.disposition === 'ALREADY_DELIVERED') {
      return {
        success: false,
        error: {
          code: 'ALREADY_DELIVERED',
          message: `Notification ${notification.jobId} was already delivered`,
          jobId: notification.jobId,
        },
      };
    }

    return { success: true, notification };
  }

  private mapDomainError(error: unknown): {
    success: false;
    error: SendNotificationError;
  } {
    if (error instanceof InvalidEventError) {
      return {
        success: false,
        error: {
          code: 'VALIDATION_ERROR',
          message: error.message,
          violations: error.violations,
        },
      };
    }

    if (error instanceof UnknownEventTypeError) {
      return {
        success: false,
        error: {
          code: 'UNKNOWN_EVENT_TYPE',
          message: error.message,
          jobId: error.jobId,
        },
      };
    }

    if (error instanceof StoreUnavailableError) {
      return {
        success: false,
        error: { code: 'STORE_UNAVAILABLE', message: error.message },
      };
    }

    // Unknown error - rethrow
    throw error;
  }
}
