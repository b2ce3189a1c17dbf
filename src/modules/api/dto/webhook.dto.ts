import { IsArray, IsBoolean, IsNotEmpty, IsOptional, IsString, IsUrl } from 'class-validator';

/**
 * Event switches shared by create and update
 */
export class WebhookEventsDto {
  @IsOptional()
  @IsBoolean()
  public on_reception?: boolean;

  @IsOptional()
  @IsBoolean()
  public on_delivered?: boolean;

  @IsOptional()
  @IsBoolean()
  public on_transient_error?: boolean;

  @IsOptional()
  @IsBoolean()
  public on_failed?: boolean;

  @IsOptional()
  @IsBoolean()
  public on_bounced?: boolean;

  @IsOptional()
  @IsBoolean()
  public on_suppressed?: boolean;

  @IsOptional()
  @IsBoolean()
  public on_opened?: boolean;

  @IsOptional()
  @IsBoolean()
  public on_clicked?: boolean;

  @IsOptional()
  @IsBoolean()
  public on_suppression_created?: boolean;

  @IsOptional()
  @IsBoolean()
  public on_dns_error?: boolean;

  @IsOptional()
  @IsString()
  public scope?: string;

  /**
   * Restrict deliveries to these sending domains
   */
  @IsOptional()
  @IsArray()
  @IsString({ each: true })
  public domains?: string[];
}

export class CreateWebhookDto extends WebhookEventsDto {
  @IsString()
  @IsNotEmpty()
  public name!: string;

  @IsUrl({ protocols: ['http', 'https'], require_protocol: true })
  public url!: string;

  @IsBoolean()
  public enabled!: boolean;
}

export class UpdateWebhookDto extends WebhookEventsDto {
  @IsOptional()
  @IsString()
  @IsNotEmpty()
  public name?: string;

  @IsOptional()
  @IsUrl({ protocols: ['http', 'https'], require_protocol: true })
  public url?: string;

  @IsOptional()
  @IsBoolean()
  public enabled?: boolean;
}
