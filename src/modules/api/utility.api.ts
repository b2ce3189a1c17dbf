import { Injectable } from '@nestjs/common';
import { BaseApi } from './base.api.js';
import { ApiTransportService } from '../transport/api-transport.service.js';
import type { RequestOptions } from '../transport/interfaces/transport.interface.js';
import type { SuccessResponse } from './interfaces/common.interface.js';

@Injectable()
export class UtilityApi extends BaseApi {
  constructor(transport: ApiTransportService) {
    super(transport);
  }

  /**
   * Health check; also verifies the API key
   */
  public async ping(options?: RequestOptions): Promise<SuccessResponse> {
    return this.request<SuccessResponse>({ method: 'GET', path: '/v2/ping', options });
  }
}
