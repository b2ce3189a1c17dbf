import { Injectable } from '@nestjs/common';
import { BaseApi } from './base.api.js';
import { ApiTransportService } from '../transport/api-transport.service.js';
import type { RequestOptions } from '../transport/interfaces/transport.interface.js';
import type { PaginatedResponse } from '../../common/pagination/pagination.interface.js';
import { DEFAULT_PAGE_LIMIT } from '../../common/constants/app.constants.js';
import { CreateDomainDto } from './dto/domain.dto.js';
import type { SuccessResponse } from './interfaces/common.interface.js';
import type { Domain, GetDomainsParams } from './interfaces/domain.interface.js';

const DOMAINS_PATH = '/v2/accounts/{account_id}/domains';

@Injectable()
export class DomainsApi extends BaseApi {
  constructor(transport: ApiTransportService) {
    super(transport);
  }

  /**
   * Register a sending domain. The response lists the DNS records to publish.
   */
  public async createDomain(
    accountId: string,
    domain: CreateDomainDto,
    options?: RequestOptions,
  ): Promise<Domain> {
    this.validateBody(CreateDomainDto, domain);

    return this.request<Domain>({
      method: 'POST',
      path: DOMAINS_PATH,
      pathParams: { account_id: accountId },
      body: domain,
      options,
    });
  }

  public async getDomains(
    accountId: string,
    params: GetDomainsParams = {},
    options?: RequestOptions,
  ): Promise<PaginatedResponse<Domain>> {
    return this.request<PaginatedResponse<Domain>>({
      method: 'GET',
      path: DOMAINS_PATH,
      pathParams: { account_id: accountId },
      query: {
        dns_valid: params.dnsValid,
        limit: params.limit ?? DEFAULT_PAGE_LIMIT,
        after: params.after,
        before: params.before,
        cursor: params.cursor,
      },
      options,
    });
  }

  public iterateDomains(
    accountId: string,
    params: Omit<GetDomainsParams, 'cursor' | 'after' | 'before'> = {},
    options?: RequestOptions,
  ): AsyncGenerator<Domain, void, undefined> {
    return this.iterate(cursor => this.getDomains(accountId, { ...params, cursor }, options));
  }

  public async getDomain(accountId: string, domain: string, options?: RequestOptions): Promise<Domain> {
    return this.request<Domain>({
      method: 'GET',
      path: `${DOMAINS_PATH}/{domain}`,
      pathParams: { account_id: accountId, domain },
      options,
    });
  }

  public async deleteDomain(
    accountId: string,
    domain: string,
    options?: RequestOptions,
  ): Promise<SuccessResponse> {
    return this.request<SuccessResponse>({
      method: 'DELETE',
      path: `${DOMAINS_PATH}/{domain}`,
      pathParams: { account_id: accountId, domain },
      options,
    });
  }
}
