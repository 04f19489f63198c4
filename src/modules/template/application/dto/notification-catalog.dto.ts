import { Type } from 'class-transformer';
import {
  ArrayNotEmpty,
  IsArray,
  IsIn,
  IsNotEmpty,
  IsOptional,
  IsString,
  ValidateNested,
} from 'class-validator';
import { CHANNELS } from '../../../../shared/ports/channel-provider.port';
import type { Channel } from '../../../../shared/ports/channel-provider.port';

export class CatalogTemplateDto {
  @IsString()
  @IsNotEmpty()
  id!: string;

  @IsString()
  @IsNotEmpty()
  locale!: string;

  @IsOptional()
  @IsIn(CHANNELS)
  channel?: Channel;

  @IsString()
  subject!: string;

  @IsString()
  @IsNotEmpty()
  body!: string;
}

export class CatalogRecipientsDto {
  @IsOptional()
  @IsString()
  @IsNotEmpty()
  EMAIL?: string;

  @IsOptional()
  @IsString()
  @IsNotEmpty()
  SMS?: string;
}

export class CatalogEventDto {
  @IsString()
  @IsNotEmpty()
  eventType!: string;

  @IsOptional()
  @IsArray()
  @IsString({ each: true })
  aliases?: string[];

  @ValidateNested()
  @Type(() => CatalogRecipientsDto)
  recipients!: CatalogRecipientsDto;

  @IsArray()
  @ArrayNotEmpty()
  @ValidateNested({ each: true })
  @Type(() => CatalogTemplateDto)
  templates!: CatalogTemplateDto[];
}

export class NotificationCatalogFileDto {
  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => CatalogEventDto)
  events!: CatalogEventDto[];
}
