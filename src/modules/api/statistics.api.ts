import { Injectable } from '@nestjs/common';
import { BaseApi } from './base.api.js';
import { ApiTransportService } from '../transport/api-transport.service.js';
import type { QueryParams, RequestOptions } from '../transport/interfaces/transport.interface.js';
import type { StatisticsParams } from './interfaces/common.interface.js';
import type {
  BounceStatistics,
  DeliverabilityStatistics,
  DeliveryTimeStatistics,
  StatisticsResponse,
} from './interfaces/statistics.interface.js';

const STATISTICS_PATH = '/v2/accounts/{account_id}/statistics/transactional';

/**
 * Transactional statistics. These endpoints share the `statistics` rate limit bucket.
 */
@Injectable()
export class StatisticsApi extends BaseApi {
  constructor(transport: ApiTransportService) {
    super(transport);
  }

  public async getDeliverabilityStatistics(
    accountId: string,
    params: StatisticsParams = {},
    options?: RequestOptions,
  ): Promise<StatisticsResponse<DeliverabilityStatistics>> {
    return this.getStatistics('deliverability', accountId, params, options);
  }

  public async getBounceStatistics(
    accountId: string,
    params: StatisticsParams = {},
    options?: RequestOptions,
  ): Promise<StatisticsResponse<BounceStatistics>> {
    return this.getStatistics('bounce', accountId, params, options);
  }

  public async getDeliveryTimeStatistics(
    accountId: string,
    params: StatisticsParams = {},
    options?: RequestOptions,
  ): Promise<StatisticsResponse<DeliveryTimeStatistics>> {
    return this.getStatistics('delivery-time', accountId, params, options);
  }

  private async getStatistics<T>(
    report: 'deliverability' | 'bounce' | 'delivery-time',
    accountId: string,
    params: StatisticsParams,
    options: RequestOptions | undefined,
  ): Promise<StatisticsResponse<T>> {
    return this.request<StatisticsResponse<T>>({
      method: 'GET',
      path: `${STATISTICS_PATH}/${report}`,
      pathParams: { account_id: accountId },
      query: toStatisticsQuery(params),
      options,
    });
  }
}

function toStatisticsQuery(params: StatisticsParams): QueryParams {
  return {
    from_time: params.fromTime,
    to_time: params.toTime,
    sender_domain: params.senderDomain,
    recipient_domains: params.recipientDomains,
    tags: params.tags,
    group_by: params.groupBy ?? 'day',
  };
}
