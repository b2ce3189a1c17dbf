import { IsEmail, IsISO8601, IsOptional, IsString } from 'class-validator';

export class CreateSuppressionDto {
  @IsEmail()
  public email!: string;

  /**
   * RFC 3339 timestamp after which the suppression lapses
   */
  @IsISO8601()
  public expires_at!: string;

  /**
   * Limit the suppression to one sending domain
   */
  @IsOptional()
  @IsString()
  public domain?: string;

  @IsOptional()
  @IsString()
  public reason?: string;
}
