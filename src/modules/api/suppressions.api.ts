import { Injectable } from '@nestjs/common';
import { BaseApi } from './base.api.js';
import { ApiTransportService } from '../transport/api-transport.service.js';
import type { RequestOptions } from '../transport/interfaces/transport.interface.js';
import type { PaginatedResponse } from '../../common/pagination/pagination.interface.js';
import { DEFAULT_PAGE_LIMIT } from '../../common/constants/app.constants.js';
import { CreateSuppressionDto } from './dto/suppression.dto.js';
import type { SuccessResponse } from './interfaces/common.interface.js';
import type {
  CreateSuppressionResponse,
  GetSuppressionsParams,
  Suppression,
} from './interfaces/suppression.interface.js';

const SUPPRESSIONS_PATH = '/v2/accounts/{account_id}/suppressions';

@Injectable()
export class SuppressionsApi extends BaseApi {
  constructor(transport: ApiTransportService) {
    super(transport);
  }

  public async createSuppression(
    accountId: string,
    suppression: CreateSuppressionDto,
    options?: RequestOptions,
  ): Promise<CreateSuppressionResponse> {
    this.validateBody(CreateSuppressionDto, suppression);

    return this.request<CreateSuppressionResponse>({
      method: 'POST',
      path: SUPPRESSIONS_PATH,
      pathParams: { account_id: accountId },
      body: suppression,
      options,
    });
  }

  public async getSuppressions(
    accountId: string,
    params: GetSuppressionsParams = {},
    options?: RequestOptions,
  ): Promise<PaginatedResponse<Suppression>> {
    return this.request<PaginatedResponse<Suppression>>({
      method: 'GET',
      path: SUPPRESSIONS_PATH,
      pathParams: { account_id: accountId },
      query: {
        email: params.email,
        domain: params.domain,
        from_date: params.fromDate,
        to_date: params.toDate,
        limit: params.limit ?? DEFAULT_PAGE_LIMIT,
        after: params.after,
        before: params.before,
        cursor: params.cursor,
      },
      options,
    });
  }

  public iterateSuppressions(
    accountId: string,
    params: Omit<GetSuppressionsParams, 'cursor' | 'after' | 'before'> = {},
    options?: RequestOptions,
  ): AsyncGenerator<Suppression, void, undefined> {
    return this.iterate(cursor => this.getSuppressions(accountId, { ...params, cursor }, options));
  }

  /**
   * Remove the suppression of one address, optionally only for one sending domain
   */
  public async deleteSuppression(
    accountId: string,
    email: string,
    domain?: string,
    options?: RequestOptions,
  ): Promise<SuccessResponse> {
    return this.request<SuccessResponse>({
      method: 'DELETE',
      path: SUPPRESSIONS_PATH,
      pathParams: { account_id: accountId },
      query: { email, domain },
      options,
    });
  }

  public async deleteAllSuppressions(
    accountId: string,
    domain?: string,
    options?: RequestOptions,
  ): Promise<SuccessResponse> {
    return this.request<SuccessResponse>({
      method: 'DELETE',
      path: `${SUPPRESSIONS_PATH}/all`,
      pathParams: { account_id: accountId },
      query: { domain },
      options,
    });
  }
}
