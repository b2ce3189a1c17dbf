import { IsArray, IsBoolean, IsNotEmpty, IsOptional, IsString } from 'class-validator';

export class CreateSmtpCredentialDto {
  @IsString()
  @IsNotEmpty()
  public name!: string;

  @IsString()
  @IsNotEmpty()
  public username!: string;

  @IsString()
  @IsNotEmpty()
  public password!: string;

  /**
   * `global`, or `scoped` together with `domains`
   */
  @IsString()
  @IsNotEmpty()
  public scope!: string;

  @IsBoolean()
  public sandbox!: boolean;

  @IsOptional()
  @IsArray()
  @IsString({ each: true })
  public domains?: string[];
}
