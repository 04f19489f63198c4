import {
  Body,
  ConflictException,
  Controller,
  Get,
  HttpCode,
  HttpException,
  HttpStatus,
  BadRequestException,
  NotFoundException,
  Param,
  ParseUUIDPipe,
  Post,
  Query,
  ServiceUnavailableException,
} from '@nestjs/common';
import {
  ApiOperation,
  ApiParam,
  ApiResponse,
  ApiTags,
} from '@nestjs/swagger';
import {
  GetNotificationStatsUseCase,
  GetNotificationUseCase,
  ListNotificationsUseCase,
  RetryNotificationUseCase,
  SendNotificationUseCase,
} from '../application/use-cases';
import type {
  GetNotificationError,
  GetNotificationStatsError,
  ListNotificationsError,
  RetryNotificationError,
  SendNotificationError,
} from '../application/use-cases';
import {
  SendNotificationDto,
  SendNotificationResponseDto,
} from '../application/dto/send-notification.dto';
import { ListNotificationsQueryDto } from '../application/dto/list-notifications-query.dto';
import type {
  DeliveryAttempt,
  NotificationJobData,
} from '../domain/notification-job.entity';

@ApiTags('notifications')
@Controller('notifications')
export class NotificationController {
  constructor(
    private readonly sendNotificationUseCase: SendNotificationUseCase,
    private readonly getNotificationUseCase: GetNotificationUseCase,
    private readonly listNotificationsUseCase: ListNotificationsUseCase,
    private readonly getNotificationStatsUseCase: GetNotificationStatsUseCase,
    private readonly retryNotificationUseCase: RetryNotificationUseCase,
  ) {}

  @Post()
  @HttpCode(HttpStatus.ACCEPTED)
  @ApiOperation({
    summary: 'Queue a notification for delivery',
    description:
      'Idempotent per (event_id, channel, recipient). A resend of a delivered notification returns 409.',
  })
  @ApiResponse({ status: 202, type: SendNotificationResponseDto })
  @ApiResponse({
    status: 400,
    description: 'Invalid request or unknown event type',
  })
  @ApiResponse({ status: 409, description: 'Already delivered' })
  @ApiResponse({ status: 503, description: 'State store unavailable' })
  async send(
    @Body() dto: SendNotificationDto,
  ): Promise<SendNotificationResponseDto> {
    const result = await this.sendNotificationUseCase.execute({
      eventType: dto.event_type,
      recipient: dto.recipient,
      channel: dto.channel,
      payload: dto.payload,
      eventId: dto.event_id,
      locale: dto.locale,
    });

    if (!result.success) {
      throw this.mapSendErrorToHttpException(result.error);
    }

    return {
      job_id: result.notification.jobId,
      state: result.notification.state,
      disposition: result.notification.disposition,
    };
  }

  @Get()
  @ApiOperation({ summary: 'List notification jobs, newest first' })
  @ApiResponse({ status: 400, description: 'Invalid filter or page' })
  @ApiResponse({ status: 503, description: 'State store unavailable' })
  async findAll(@Query() query: ListNotificationsQueryDto) {
    const result = await this.listNotificationsUseCase.execute({
      channel: query.type,
      eventType: query.event,
      state: query.status,
      orderId: query.order_id,
      page: query.page,
      pageSize: query.page_size,
    });

    if (!result.success) {
      throw this.mapStoreErrorToHttpException(result.error);
    }

    return {
      count: result.total,
      page: result.page,
      page_size: result.pageSize,
      results: result.items.map((job) => toJobView(job)),
    };
  }

  // Declared before ':id' so "stats" is not parsed as an id
  @Get('stats')
  @ApiOperation({ summary: 'Job totals by state, channel and event type' })
  @ApiResponse({ status: 503, description: 'State store unavailable' })
  async stats() {
    const result = await this.getNotificationStatsUseCase.execute();

    if (!result.success) {
      throw this.mapStoreErrorToHttpException(result.error);
    }

    return {
      total: result.counts.total,
      by_state: result.counts.byState,
      by_channel: result.counts.byChannel,
      by_event_type: result.counts.byEventType,
      queue: result.queue,
    };
  }

  @Get(':id')
  @ApiOperation({ summary: 'Get a notification job and its delivery attempts' })
  @ApiParam({ name: 'id', description: 'Job UUID' })
  @ApiResponse({ status: 404, description: 'Notification not found' })
  async findOne(@Param('id', ParseUUIDPipe) id: string) {
    const result = await this.getNotificationUseCase.execute(id);

    if (!result.success) {
      throw this.mapGetErrorToHttpException(result.error);
    }

    return toNotificationView(result.job, result.attempts);
  }

  @Post(':id/retry')
  @HttpCode(HttpStatus.ACCEPTED)
  @ApiOperation({
    summary: 'Requeue a FAILED notification',
    description:
      'Grants a fresh attempt budget. Refused while another job owns the same notification.',
  })
  @ApiParam({ name: 'id', description: 'Job UUID' })
  @ApiResponse({ status: 202, type: SendNotificationResponseDto })
  @ApiResponse({ status: 400, description: 'Job is not FAILED' })
  @ApiResponse({ status: 404, description: 'Notification not found' })
  @ApiResponse({ status: 409, description: 'Delivered or sending elsewhere' })
  async retry(@Param('id', ParseUUIDPipe) id: string) {
    const result = await this.retryNotificationUseCase.execute(id);

    if (!result.success) {
      throw this.mapRetryErrorToHttpException(result.error);
    }

    return { job_id: result.job.id, state: result.job.state };
  }

  private mapSendErrorToHttpException(
    error: SendNotificationError,
  ): HttpException {
    switch (error.code) {
      case 'VALIDATION_ERROR':
        return new BadRequestException({
          error_kind: error.code,
          message: error.message,
          violations: error.violations,
        });
      case 'UNKNOWN_EVENT_TYPE':
        return new BadRequestException({
          error_kind: error.code,
          message: error.message,
          job_id: error.jobId,
        });
      case 'ALREADY_DELIVERED':
        return new ConflictException({
          job_id: error.jobId,
          state: 'DELIVERED',
          error_kind: error.code,
        });
      case 'STORE_UNAVAILABLE':
        return new ServiceUnavailableException({
          error_kind: error.code,
          message: 'Notification store is unavailable, retry later',
        });
      default:
        return new HttpException(
          'Internal server error',
          HttpStatus.INTERNAL_SERVER_ERROR,
        );
    }
  }

  private mapGetErrorToHttpException(
    error: GetNotificationError,
  ): HttpException {
    switch (error.code) {
      case 'NOT_FOUND':
        return new NotFoundException(error.message);
      case 'STORE_UNAVAILABLE':
        return new ServiceUnavailableException({
          error_kind: error.code,
          message: 'Notification store is unavailable, retry later',
        });
      default:
        return new HttpException(
          'Internal server error',
          HttpStatus.INTERNAL_SERVER_ERROR,
        );
    }
  }

  private mapRetryErrorToHttpException(
    error: RetryNotificationError,
  ): HttpException {
    switch (error.code) {
      case 'NOT_FOUND':
        return new NotFoundException(error.message);
      case 'NOT_RETRYABLE':
        return new BadRequestException({
          error_kind: error.code,
          message: error.message,
        });
      case 'ALREADY_DELIVERED':
      case 'IN_FLIGHT':
        return new ConflictException({
          job_id: error.jobId,
          error_kind: error.code,
          message: error.message,
        });
      case 'CONFLICT':
        return new ConflictException({
          error_kind: error.code,
          message: error.message,
        });
      case 'STORE_UNAVAILABLE':
        return new ServiceUnavailableException({
          error_kind: error.code,
          message: 'Notification store is unavailable, retry later',
        });
      default:
        return new HttpException(
          'Internal server error',
          HttpStatus.INTERNAL_SERVER_ERROR,
        );
    }
  }

  private mapStoreErrorToHttpException(
    error: ListNotificationsError | GetNotificationStatsError,
  ): HttpException {
    switch (error.code) {
      case 'STORE_UNAVAILABLE':
        return new ServiceUnavailableException({
          error_kind: error.code,
          message: 'Notification store is unavailable, retry later',
        });
      default:
        return new HttpException(
          'Internal server error',
          HttpStatus.INTERNAL_SERVER_ERROR,
        );
    }
  }
}

function toJobView(job: NotificationJobData) {
  return {
    job_id: job.id,
    event_id: job.sourceEventId,
    event_type: job.eventType,
    channel: job.channel,
    recipient: job.recipient,
    locale: job.locale,
    state: job.state,
    template_id: job.templateId,
    attempt_count: job.attemptCount,
    max_attempts: job.maxAttempts,
    last_error_kind: job.lastErrorKind,
    last_error: job.lastError,
    created_at: job.createdAt,
    updated_at: job.updatedAt,
    last_attempt_at: job.lastAttemptAt,
    next_retry_at: job.nextRetryAt,
    delivered_at: job.deliveredAt,
    failed_at: job.failedAt,
  };
}

function toNotificationView(
  job: NotificationJobData,
  attempts: DeliveryAttempt[],
) {
  return {
    ...toJobView(job),
    attempts: attempts.map((attempt) => ({
      attempt_no: attempt.attemptNo,
      succeeded: attempt.succeeded,
      provider_response_code: attempt.providerResponseCode,
      error_kind: attempt.errorKind,
      error_message: attempt.errorMessage,
      attempted_at: attempt.attemptedAt,
    })),
  };
}
