import { Injectable } from '@nestjs/common';
import { BaseApi } from './base.api.js';
import { ApiTransportService } from '../transport/api-transport.service.js';
import type { RequestOptions } from '../transport/interfaces/transport.interface.js';
import type { PaginatedResponse } from '../../common/pagination/pagination.interface.js';
import { DEFAULT_PAGE_LIMIT } from '../../common/constants/app.constants.js';
import { CreateApiKeyDto, UpdateApiKeyDto } from './dto/api-key.dto.js';
import type { SuccessResponse } from './interfaces/common.interface.js';
import type { ApiKey, GetApiKeysParams } from './interfaces/api-key.interface.js';

const API_KEYS_PATH = '/v2/accounts/{account_id}/api-keys';

@Injectable()
export class ApiKeysApi extends BaseApi {
  constructor(transport: ApiTransportService) {
    super(transport);
  }

  /**
   * The secret key is only returned here; store it on receipt
   */
  public async createApiKey(
    accountId: string,
    apiKey: CreateApiKeyDto,
    options?: RequestOptions,
  ): Promise<ApiKey> {
    this.validateBody(CreateApiKeyDto, apiKey);

    return this.request<ApiKey>({
      method: 'POST',
      path: API_KEYS_PATH,
      pathParams: { account_id: accountId },
      body: apiKey,
      options,
    });
  }

  public async getApiKeys(
    accountId: string,
    params: GetApiKeysParams = {},
    options?: RequestOptions,
  ): Promise<PaginatedResponse<ApiKey>> {
    return this.request<PaginatedResponse<ApiKey>>({
      method: 'GET',
      path: API_KEYS_PATH,
      pathParams: { account_id: accountId },
      query: {
        limit: params.limit ?? DEFAULT_PAGE_LIMIT,
        cursor: params.cursor,
      },
      options,
    });
  }

  public iterateApiKeys(
    accountId: string,
    params: Omit<GetApiKeysParams, 'cursor'> = {},
    options?: RequestOptions,
  ): AsyncGenerator<ApiKey, void, undefined> {
    return this.iterate(cursor => this.getApiKeys(accountId, { ...params, cursor }, options));
  }

  public async getApiKey(accountId: string, keyId: string, options?: RequestOptions): Promise<ApiKey> {
    return this.request<ApiKey>({
      method: 'GET',
      path: `${API_KEYS_PATH}/{key_id}`,
      pathParams: { account_id: accountId, key_id: keyId },
      options,
    });
  }

  public async updateApiKey(
    accountId: string,
    keyId: string,
    changes: UpdateApiKeyDto,
    options?: RequestOptions,
  ): Promise<ApiKey> {
    this.validateBody(UpdateApiKeyDto, changes);

    return this.request<ApiKey>({
      method: 'PUT',
      path: `${API_KEYS_PATH}/{key_id}`,
      pathParams: { account_id: accountId, key_id: keyId },
      body: changes,
      options,
    });
  }

  public async deleteApiKey(
    accountId: string,
    keyId: string,
    options?: RequestOptions,
  ): Promise<SuccessResponse> {
    return this.request<SuccessResponse>({
      method: 'DELETE',
      path: `${API_KEYS_PATH}/{key_id}`,
      pathParams: { account_id: accountId, key_id: keyId },
      options,
    });
  }
}
