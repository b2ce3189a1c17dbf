import { Injectable } from '@nestjs/common';
import { BaseApi } from './base.api.js';
import { ApiTransportService } from '../transport/api-transport.service.js';
import type { RequestOptions } from '../transport/interfaces/transport.interface.js';
import type { PaginatedResponse } from '../../common/pagination/pagination.interface.js';
import { DEFAULT_PAGE_LIMIT } from '../../common/constants/app.constants.js';
import { CreateRouteDto, UpdateRouteDto } from './dto/route.dto.js';
import type { SuccessResponse } from './interfaces/common.interface.js';
import type { GetRoutesParams, Route } from './interfaces/route.interface.js';

const ROUTES_PATH = '/v2/accounts/{account_id}/routes';

@Injectable()
export class RoutesApi extends BaseApi {
  constructor(transport: ApiTransportService) {
    super(transport);
  }

  public async createRoute(
    accountId: string,
    route: CreateRouteDto,
    options?: RequestOptions,
  ): Promise<Route> {
    this.validateBody(CreateRouteDto, route);

    return this.request<Route>({
      method: 'POST',
      path: ROUTES_PATH,
      pathParams: { account_id: accountId },
      body: route,
      options,
    });
  }

  public async getRoutes(
    accountId: string,
    params: GetRoutesParams = {},
    options?: RequestOptions,
  ): Promise<PaginatedResponse<Route>> {
    return this.request<PaginatedResponse<Route>>({
      method: 'GET',
      path: ROUTES_PATH,
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

  public iterateRoutes(
    accountId: string,
    params: Omit<GetRoutesParams, 'cursor' | 'after' | 'before'> = {},
    options?: RequestOptions,
  ): AsyncGenerator<Route, void, undefined> {
    return this.iterate(cursor => this.getRoutes(accountId, { ...params, cursor }, options));
  }

  public async getRoute(accountId: string, routeId: string, options?: RequestOptions): Promise<Route> {
    return this.request<Route>({
      method: 'GET',
      path: `${ROUTES_PATH}/{route_id}`,
      pathParams: { account_id: accountId, route_id: routeId },
      options,
    });
  }

  public async updateRoute(
    accountId: string,
    routeId: string,
    changes: UpdateRouteDto,
    options?: RequestOptions,
  ): Promise<Route> {
    this.validateBody(UpdateRouteDto, changes);

    return this.request<Route>({
      method: 'PUT',
      path: `${ROUTES_PATH}/{route_id}`,
      pathParams: { account_id: accountId, route_id: routeId },
      body: changes,
      options,
    });
  }

  public async deleteRoute(
    accountId: string,
    routeId: string,
    options?: RequestOptions,
  ): Promise<SuccessResponse> {
    return this.request<SuccessResponse>({
      method: 'DELETE',
      path: `${ROUTES_PATH}/{route_id}`,
      pathParams: { account_id: accountId, route_id: routeId },
      options,
    });
  }
}
