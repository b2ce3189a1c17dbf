import { Injectable } from '@nestjs/common';
import { BaseApi } from './base.api.js';
import { ApiTransportService } from '../transport/api-transport.service.js';
import type { RequestOptions } from '../transport/interfaces/transport.interface.js';
import type { PaginatedResponse } from '../../common/pagination/pagination.interface.js';
import { DEFAULT_PAGE_LIMIT } from '../../common/constants/app.constants.js';
import { CreateSmtpCredentialDto } from './dto/smtp-credential.dto.js';
import type { SuccessResponse } from './interfaces/common.interface.js';
import type {
  GetSmtpCredentialsParams,
  SmtpCredential,
} from './interfaces/smtp-credential.interface.js';

const SMTP_CREDENTIALS_PATH = '/v2/accounts/{account_id}/smtp-credentials';

/**
 * SMTP credentials cannot be edited; replace them by delete and create
 */
@Injectable()
export class SmtpCredentialsApi extends BaseApi {
  constructor(transport: ApiTransportService) {
    super(transport);
  }

  public async createSmtpCredential(
    accountId: string,
    credential: CreateSmtpCredentialDto,
    options?: RequestOptions,
  ): Promise<SmtpCredential> {
    this.validateBody(CreateSmtpCredentialDto, credential);

    return this.request<SmtpCredential>({
      method: 'POST',
      path: SMTP_CREDENTIALS_PATH,
      pathParams: { account_id: accountId },
      body: credential,
      options,
    });
  }

  public async getSmtpCredentials(
    accountId: string,
    params: GetSmtpCredentialsParams = {},
    options?: RequestOptions,
  ): Promise<PaginatedResponse<SmtpCredential>> {
    return this.request<PaginatedResponse<SmtpCredential>>({
      method: 'GET',
      path: SMTP_CREDENTIALS_PATH,
      pathParams: { account_id: accountId },
      query: {
        limit: params.limit ?? DEFAULT_PAGE_LIMIT,
        after: params.after,
        before: params.before,
        cursor: params.cursor,
      },
      options,
    });
  }

  public iterateSmtpCredentials(
    accountId: string,
    params: Omit<GetSmtpCredentialsParams, 'cursor' | 'after' | 'before'> = {},
    options?: RequestOptions,
  ): AsyncGenerator<SmtpCredential, void, undefined> {
    return this.iterate(cursor =>
      this.getSmtpCredentials(accountId, { ...params, cursor }, options),
    );
  }

  public async getSmtpCredential(
    accountId: string,
    credentialId: string,
    options?: RequestOptions,
  ): Promise<SmtpCredential> {
    return this.request<SmtpCredential>({
      method: 'GET',
      path: `${SMTP_CREDENTIALS_PATH}/{smtp_credential_id}`,
      pathParams: { account_id: accountId, smtp_credential_id: credentialId },
      options,
    });
  }

  public async deleteSmtpCredential(
    accountId: string,
    credentialId: string,
    options?: RequestOptions,
  ): Promise<SuccessResponse> {
    return this.request<SuccessResponse>({
      method: 'DELETE',
      path: `${SMTP_CREDENTIALS_PATH}/{smtp_credential_id}`,
      pathParams: { account_id: accountId, smtp_credential_id: credentialId },
      options,
    });
  }
}
