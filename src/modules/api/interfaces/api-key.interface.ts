import type { PaginationParams } from '../../../common/pagination/pagination.interface.js';

export interface ApiKeyScope {
  id: string;
  created_at: string;
  updated_at: string;
  api_key_id: string;
  scope: string;
  domain_id?: string;
}

export interface ApiKey {
  object: 'api_key';
  id: string;
  created_at: string;
  updated_at: string;
  account_id: string;
  label: string;
  public_key: string;
  scopes: ApiKeyScope[];
  last_used_at?: string | null;
  /**
   * Only present in the response to creation
   */
  secret_key?: string;
}

export type GetApiKeysParams = Pick<PaginationParams, 'limit' | 'cursor'>;
