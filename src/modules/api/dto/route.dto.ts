import { IsBoolean, IsNotEmpty, IsOptional, IsString, IsUrl } from 'class-validator';

export class CreateRouteDto {
  @IsString()
  @IsNotEmpty()
  public name!: string;

  @IsUrl({ protocols: ['http', 'https'], require_protocol: true })
  public url!: string;

  /**
   * Address or wildcard pattern matched against inbound recipients
   */
  @IsString()
  @IsNotEmpty()
  public recipient!: string;

  @IsBoolean()
  public attachments!: boolean;

  @IsBoolean()
  public headers!: boolean;

  @IsBoolean()
  public group_by_message_id!: boolean;

  @IsBoolean()
  public strip_replies!: boolean;

  @IsBoolean()
  public enabled!: boolean;
}

export class UpdateRouteDto {
  @IsOptional()
  @IsString()
  @IsNotEmpty()
  public name?: string;

  @IsOptional()
  @IsUrl({ protocols: ['http', 'https'], require_protocol: true })
  public url?: string;

  @IsOptional()
  @IsString()
  @IsNotEmpty()
  public recipient?: string;

  @IsOptional()
  @IsBoolean()
  public attachments?: boolean;

  @IsOptional()
  @IsBoolean()
  public headers?: boolean;

  @IsOptional()
  @IsBoolean()
  public group_by_message_id?: boolean;

  @IsOptional()
  @IsBoolean()
  public strip_replies?: boolean;

  @IsOptional()
  @IsBoolean()
  public enabled?: boolean;
}
