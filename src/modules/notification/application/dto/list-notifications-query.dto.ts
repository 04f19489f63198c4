import { Transform, Type } from 'class-transformer';
import {
  IsIn,
  IsInt,
  IsNotEmpty,
  IsOptional,
  IsString,
  Max,
  Min,
} from 'class-validator';
import { ApiPropertyOptional } from '@nestjs/swagger';
import { CHANNELS } from '../../../../shared/ports/channel-provider.port';
import type { Channel } from '../../../../shared/ports/channel-provider.port';
import { NOTIFICATION_JOB_STATES } from '../../domain/notification-job.entity';
import type { NotificationJobState } from '../../domain/notification-job.entity';

export const MAX_PAGE_SIZE = 100;

const toUpperCase = ({ value }: { value: unknown }) =>
  typeof value === 'string' ? value.trim().toUpperCase() : value;

export class ListNotificationsQueryDto {
  @ApiPropertyOptional({ enum: CHANNELS, description: 'Channel filter' })
  @IsOptional()
  @Transform(toUpperCase)
  @IsIn(CHANNELS)
  type?: Channel;

  @ApiPropertyOptional({
    example: 'order_shipped',
    description: 'Event type or one of its aliases',
  })
  @IsOptional()
  @IsString()
  @IsNotEmpty()
  event?: string;

  @ApiPropertyOptional({ enum: NOTIFICATION_JOB_STATES })
  @IsOptional()
  @Transform(toUpperCase)
  @IsIn(NOTIFICATION_JOB_STATES)
  status?: NotificationJobState;

  @ApiPropertyOptional({ example: 'ORD-1042' })
  @IsOptional()
  @IsString()
  @IsNotEmpty()
  order_id?: string;

  @ApiPropertyOptional({ default: 1, minimum: 1 })
  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(1)
  page: number = 1;

  @ApiPropertyOptional({ default: 20, minimum: 1, maximum: MAX_PAGE_SIZE })
  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(1)
  @Max(MAX_PAGE_SIZE)
  page_size: number = 20;
}
