import type { PaginationParams } from '../../../common/pagination/pagination.interface.js';

export interface SmtpCredential {
  object: 'smtp_credential';
  id: number;
  account_id: string;
  created_at: string;
  updated_at: string;
  name: string;
  username: string;
  password: string;
  sandbox: boolean;
  scope: string;
  scoped_domains?: string[];
}

export type GetSmtpCredentialsParams = PaginationParams;
