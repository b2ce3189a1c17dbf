import { IsFQDN, IsOptional, IsString } from 'class-validator';

export class CreateDomainDto {
  @IsFQDN()
  public domain!: string;

  /**
   * PEM-encoded key; generated by the API when omitted
   */
  @IsOptional()
  @IsString()
  public dkim_private_key?: string;
}
