import { Injectable } from '@nestjs/common';
import { BaseApi } from './base.api.js';
import { ApiTransportService } from '../transport/api-transport.service.js';
import type { RequestOptions } from '../transport/interfaces/transport.interface.js';
import { AddMemberDto, UpdateAccountDto } from './dto/account.dto.js';
import type { SuccessResponse } from './interfaces/common.interface.js';
import type {
  Account,
  AccountMembersResponse,
  UserAccount,
} from './interfaces/account.interface.js';

const ACCOUNT_PATH = '/v2/accounts/{account_id}';
const MEMBERS_PATH = `${ACCOUNT_PATH}/members`;

@Injectable()
export class AccountsApi extends BaseApi {
  constructor(transport: ApiTransportService) {
    super(transport);
  }

  public async getAccount(accountId: string, options?: RequestOptions): Promise<Account> {
    return this.request<Account>({
      method: 'GET',
      path: ACCOUNT_PATH,
      pathParams: { account_id: accountId },
      options,
    });
  }

  public async updateAccount(
    accountId: string,
    changes: UpdateAccountDto,
    options?: RequestOptions,
  ): Promise<Account> {
    this.validateBody(UpdateAccountDto, changes);

    return this.request<Account>({
      method: 'PUT',
      path: ACCOUNT_PATH,
      pathParams: { account_id: accountId },
      body: changes,
      options,
    });
  }

  public async getAccountMembers(
    accountId: string,
    options?: RequestOptions,
  ): Promise<AccountMembersResponse> {
    return this.request<AccountMembersResponse>({
      method: 'GET',
      path: MEMBERS_PATH,
      pathParams: { account_id: accountId },
      options,
    });
  }

  public async addAccountMember(
    accountId: string,
    member: AddMemberDto,
    options?: RequestOptions,
  ): Promise<UserAccount> {
    this.validateBody(AddMemberDto, member);

    return this.request<UserAccount>({
      method: 'POST',
      path: MEMBERS_PATH,
      pathParams: { account_id: accountId },
      body: member,
      options,
    });
  }

  public async removeAccountMember(
    accountId: string,
    userId: string,
    options?: RequestOptions,
  ): Promise<SuccessResponse> {
    return this.request<SuccessResponse>({
      method: 'DELETE',
      path: `${MEMBERS_PATH}/{user_id}`,
      pathParams: { account_id: accountId, user_id: userId },
      options,
    });
  }
}
