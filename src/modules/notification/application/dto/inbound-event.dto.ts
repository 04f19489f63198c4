import { Transform } from 'class-transformer';
import {
  IsISO8601,
  IsNotEmpty,
  IsObject,
  IsOptional,
  IsString,
  Matches,
} from 'class-validator';
import { toStringPayload } from '../../../../shared/validation/string-payload';
import { LOCALE_PATTERN } from './send-notification.dto';

/**
 * Broker message body. `data` is the field older producers send in place
 * of `payload`; extra top-level fields are ignored.
 */
export class InboundEventDto {
  @IsString()
  @IsNotEmpty()
  event_type!: string;

  @IsOptional()
  @IsString()
  @IsNotEmpty()
  event_id?: string;

  @IsOptional()
  @Transform(({ value }: { value: unknown }) => toStringPayload(value))
  @IsObject()
  payload?: Record<string, string>;

  @IsOptional()
  @Transform(({ value }: { value: unknown }) => toStringPayload(value))
  @IsObject()
  data?: Record<string, string>;

  @IsOptional()
  @IsISO8601()
  occurred_at?: string;

  @IsOptional()
  @Matches(LOCALE_PATTERN)
  locale?: string;
}
