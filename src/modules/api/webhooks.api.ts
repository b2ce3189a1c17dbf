import { Injectable } from '@nestjs/common';
import { BaseApi } from './base.api.js';
import { ApiTransportService } from '../transport/api-transport.service.js';
import type { RequestOptions } from '../transport/interfaces/transport.interface.js';
import type { PaginatedResponse } from '../../common/pagination/pagination.interface.js';
import { DEFAULT_PAGE_LIMIT } from '../../common/constants/app.constants.js';
import { CreateWebhookDto, UpdateWebhookDto } from './dto/webhook.dto.js';
import type { SuccessResponse } from './interfaces/common.interface.js';
import type { GetWebhooksParams, Webhook } from './interfaces/webhook.interface.js';

const WEBHOOKS_PATH = '/v2/accounts/{account_id}/webhooks';

@Injectable()
export class WebhooksApi extends BaseApi {
  constructor(transport: ApiTransportService) {
    super(transport);
  }

  public async createWebhook(
    accountId: string,
    webhook: CreateWebhookDto,
    options?: RequestOptions,
  ): Promise<Webhook> {
    this.validateBody(CreateWebhookDto, webhook);

    return this.request<Webhook>({
      method: 'POST',
      path: WEBHOOKS_PATH,
      pathParams: { account_id: accountId },
      body: webhook,
      options,
    });
  }

  public async getWebhooks(
    accountId: string,
    params: GetWebhooksParams = {},
    options?: RequestOptions,
  ): Promise<PaginatedResponse<Webhook>> {
    return this.request<PaginatedResponse<Webhook>>({
      method: 'GET',
      path: WEBHOOKS_PATH,
      pathParams: { account_id: accountId },
      query: {
        enabled: params.enabled,
        on_reception: params.onReception,
        on_delivered: params.onDelivered,
        on_transient_error: params.onTransientError,
        on_failed: params.onFailed,
        on_bounced: params.onBounced,
        on_suppressed: params.onSuppressed,
        on_opened: params.onOpened,
        on_clicked: params.onClicked,
        on_suppression_created: params.onSuppressionCreated,
        on_dns_error: params.onDnsError,
        limit: params.limit ?? DEFAULT_PAGE_LIMIT,
        after: params.after,
        before: params.before,
        cursor: params.cursor,
      },
      options,
    });
  }

  public iterateWebhooks(
    accountId: string,
    params: Omit<GetWebhooksParams, 'cursor' | 'after' | 'before'> = {},
    options?: RequestOptions,
  ): AsyncGenerator<Webhook, void, undefined> {
    return this.iterate(cursor => this.getWebhooks(accountId, { ...params, cursor }, options));
  }

  public async getWebhook(
    accountId: string,
    webhookId: string,
    options?: RequestOptions,
  ): Promise<Webhook> {
    return this.request<Webhook>({
      method: 'GET',
      path: `${WEBHOOKS_PATH}/{webhook_id}`,
      pathParams: { account_id: accountId, webhook_id: webhookId },
      options,
    });
  }

  /**
   * Partial update; fields left out keep their current values
   */
  public async updateWebhook(
    accountId: string,
    webhookId: string,
    changes: UpdateWebhookDto,
    options?: RequestOptions,
  ): Promise<Webhook> {
    this.validateBody(UpdateWebhookDto, changes);

    return this.request<Webhook>({
      method: 'PUT',
      path: `${WEBHOOKS_PATH}/{webhook_id}`,
      pathParams: { account_id: accountId, webhook_id: webhookId },
      body: changes,
      options,
    });
  }

  public async deleteWebhook(
    accountId: string,
    webhookId: string,
    options?: RequestOptions,
  ): Promise<SuccessResponse> {
    return this.request<SuccessResponse>({
      method: 'DELETE',
      path: `${WEBHOOKS_PATH}/{webhook_id}`,
      pathParams: { account_id: accountId, webhook_id: webhookId },
      options,
    });
  }
}
