import { ApiTransportService } from '../transport/api-transport.service.js';
import type { ApiRequest } from '../transport/interfaces/transport.interface.js';
import type { PaginatedResponse } from '../../common/pagination/pagination.interface.js';
import { paginate } from '../../common/pagination/paginate.js';
import { validateDto } from '../../common/utils/dto-validation.util.js';

/**
 * Abstract base class for resource APIs
 */
export abstract class BaseApi {
  constructor(protected readonly transport: ApiTransportService) {}

  /**
   * Execute a request and return the decoded body
   */
  protected async request<T>(request: ApiRequest): Promise<T> {
    const response = await this.transport.execute<T>(request);
    return response.data;
  }

  /**
   * Reject an invalid body before it reaches the rate limiter or the network
   */
  protected validateBody<T extends object>(dtoClass: new () => T, payload: T): void {
    validateDto({ dtoClass, payload });
  }

  protected iterate<T>(
    fetchPage: (cursor: string | undefined) => Promise<PaginatedResponse<T>>,
  ): AsyncGenerator<T, void, undefined> {
    return paginate(fetchPage);
  }
}
