import type { PaginationParams } from '../../../common/pagination/pagination.interface.js';

export interface Suppression {
  object: 'suppression';
  id: number;
  account_id: string;
  created_at: string;
  updated_at: string;
  email: string;
  expires_at: string;
  domain?: string;
  reason?: string;
}

export interface CreateSuppressionResponse {
  object: 'list';
  data: Suppression[];
}

export interface GetSuppressionsParams extends PaginationParams {
  email?: string;
  domain?: string;
  fromDate?: Date;
  toDate?: Date;
}
