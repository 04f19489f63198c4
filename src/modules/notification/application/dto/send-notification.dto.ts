import { Transform } from 'class-transformer';
import {
  IsIn,
  IsNotEmpty,
  IsObject,
  IsOptional,
  IsString,
  Matches,
} from 'class-validator';
import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { CHANNELS } from '../../../../shared/ports/channel-provider.port';
import type { Channel } from '../../../../shared/ports/channel-provider.port';
import { toStringPayload } from '../../../../shared/validation/string-payload';

export const LOCALE_PATTERN = /^[A-Za-z]{2,3}([-_][A-Za-z0-9]{2,8})?$/;

export class SendNotificationDto {
  @ApiProperty({ example: 'shipment.shipped' })
  @IsString()
  @IsNotEmpty()
  event_type!: string;

  @ApiProperty({
    example: 'maria@example.com',
    description: 'Email address or phone number, depending on channel',
  })
  @IsString()
  @IsNotEmpty()
  recipient!: string;

  @ApiProperty({ enum: CHANNELS, example: 'EMAIL' })
  @Transform(({ value }: { value: unknown }) =>
    typeof value === 'string' ? value.trim().toUpperCase() : value,
  )
  @IsIn(CHANNELS)
  channel!: Channel;

  @ApiProperty({
    type: 'object',
    additionalProperties: { type: 'string' },
    example: { order_id: 'ORD-1042', carrier: 'BlueDart', tracking_no: 'TRK-77' },
  })
  @Transform(({ value }: { value: unknown }) => toStringPayload(value))
  @IsObject()
  payload!: Record<string, string>;

  @ApiPropertyOptional({
    example: 'evt-9f2c',
    description: 'Derived from the request content when omitted',
  })
  @IsOptional()
  @IsString()
  @IsNotEmpty()
  event_id?: string;

  @ApiPropertyOptional({ example: 'en' })
  @IsOptional()
  @Matches(LOCALE_PATTERN, { message: 'locale must look like "en" or "pt-BR"' })
  locale?: string;
}

export class SendNotificationResponseDto {
  @ApiProperty({ format: 'uuid' })
  job_id!: string;

  @ApiProperty({ example: 'PENDING' })
  state!: string;

  @ApiProperty({ enum: ['ACCEPTED', 'IN_FLIGHT'] })
  disposition!: string;
}
