import { ArrayNotEmpty, IsArray, IsNotEmpty, IsOptional, IsString } from 'class-validator';

export class CreateApiKeyDto {
  @IsString()
  @IsNotEmpty()
  public label!: string;

  /**
   * Permission scopes such as `messages:send`
   */
  @IsArray()
  @ArrayNotEmpty()
  @IsString({ each: true })
  public scopes!: string[];
}

export class UpdateApiKeyDto {
  @IsOptional()
  @IsString()
  @IsNotEmpty()
  public label?: string;

  /**
   * Replaces the key's scopes as a whole
   */
  @IsOptional()
  @IsArray()
  @IsString({ each: true })
  public scopes?: string[];
}
