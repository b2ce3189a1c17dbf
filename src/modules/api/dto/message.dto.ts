import {
  ArrayMinSize,
  IsArray,
  IsBoolean,
  IsEmail,
  IsIn,
  IsInt,
  IsISO8601,
  IsNotEmpty,
  IsObject,
  IsOptional,
  IsString,
  Max,
  Min,
  ValidateNested,
} from 'class-validator';
import { Type } from 'class-transformer';
import { HasMessageContent } from '../validators/message-content.validator.js';

export const SANDBOX_RESULTS = ['deliver', 'bounce', 'defer', 'fail', 'suppress'] as const;

export type SandboxResult = (typeof SANDBOX_RESULTS)[number];

export class SenderAddressDto {
  @IsEmail()
  public email!: string;

  @IsOptional()
  @IsString()
  public name?: string;
}

export class RecipientDto {
  @IsEmail()
  public email!: string;

  @IsOptional()
  @IsString()
  public name?: string;

  /**
   * Per-recipient template values, merged over the message-level ones
   */
  @IsOptional()
  @IsObject()
  public substitutions?: Record<string, unknown>;
}

export class AttachmentDto {
  /**
   * `data` is base64-encoded when true
   */
  @IsOptional()
  @IsBoolean()
  public base64?: boolean;

  @IsString()
  public data!: string;

  @IsString()
  @IsNotEmpty()
  public content_type!: string;

  /**
   * Set for inline attachments referenced as `cid:` in the HTML body
   */
  @IsOptional()
  @IsString()
  public content_id?: string;

  @IsString()
  @IsNotEmpty()
  public file_name!: string;
}

export class TrackingDto {
  @IsOptional()
  @IsBoolean()
  public open?: boolean;

  @IsOptional()
  @IsBoolean()
  public click?: boolean;
}

/**
 * Retention in days
 */
export class RetentionDto {
  @IsOptional()
  @IsInt()
  @Min(1)
  @Max(30)
  public metadata?: number;

  @IsOptional()
  @IsInt()
  @Min(0)
  @Max(30)
  public data?: number;
}

export class MessageScheduleDto {
  @IsOptional()
  @IsISO8601()
  public first_attempt?: string;

  @IsOptional()
  @IsISO8601()
  public expires?: string;
}

/**
 * Body of `POST /v2/accounts/{account_id}/messages`
 */
export class CreateMessageDto {
  @ValidateNested()
  @Type(() => SenderAddressDto)
  public from!: SenderAddressDto;

  @IsArray()
  @ArrayMinSize(1)
  @ValidateNested({ each: true })
  @Type(() => RecipientDto)
  public recipients!: RecipientDto[];

  @IsString()
  @IsNotEmpty()
  public subject!: string;

  @IsOptional()
  @ValidateNested()
  @Type(() => SenderAddressDto)
  public reply_to?: SenderAddressDto;

  @HasMessageContent()
  public text_content?: string;

  @IsOptional()
  @IsString()
  public html_content?: string;

  @IsOptional()
  @IsString()
  public amp_content?: string;

  @IsOptional()
  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => AttachmentDto)
  public attachments?: AttachmentDto[];

  @IsOptional()
  @IsObject()
  public headers?: Record<string, string>;

  @IsOptional()
  @IsObject()
  public substitutions?: Record<string, unknown>;

  @IsOptional()
  @IsArray()
  @IsString({ each: true })
  public tags?: string[];

  @IsOptional()
  @IsBoolean()
  public sandbox?: boolean;

  @IsOptional()
  @IsIn(SANDBOX_RESULTS)
  public sandbox_result?: SandboxResult;

  @IsOptional()
  @ValidateNested()
  @Type(() => TrackingDto)
  public tracking?: TrackingDto;

  @IsOptional()
  @ValidateNested()
  @Type(() => RetentionDto)
  public retention?: RetentionDto;

  @IsOptional()
  @ValidateNested()
  @Type(() => MessageScheduleDto)
  public schedule?: MessageScheduleDto;
}
