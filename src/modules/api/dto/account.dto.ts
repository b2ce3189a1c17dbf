import { IsBoolean, IsEmail, IsInt, IsNotEmpty, IsOptional, IsString, IsUrl, Min } from 'class-validator';

export class AddMemberDto {
  @IsEmail()
  public email!: string;

  /**
   * Account role, e.g. `member`
   */
  @IsString()
  @IsNotEmpty()
  public role!: string;

  @IsOptional()
  @IsString()
  public name?: string;
}

/**
 * Partial update; fields left out keep their current values
 */
export class UpdateAccountDto {
  @IsOptional()
  @IsString()
  @IsNotEmpty()
  public name?: string;

  @IsOptional()
  @IsUrl()
  public website?: string;

  @IsOptional()
  @IsString()
  public about?: string;

  @IsOptional()
  @IsBoolean()
  public track_opens?: boolean;

  @IsOptional()
  @IsBoolean()
  public track_clicks?: boolean;

  @IsOptional()
  @IsBoolean()
  public reject_bad_recipients?: boolean;

  @IsOptional()
  @IsBoolean()
  public reject_mistyped_recipients?: boolean;

  @IsOptional()
  @IsInt()
  @Min(0)
  public message_metadata_retention?: number;

  @IsOptional()
  @IsInt()
  @Min(0)
  public message_data_retention?: number;
}
