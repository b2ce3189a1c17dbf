import type { PaginationParams } from '../../../common/pagination/pagination.interface.js';

export interface DnsRecord {
  type: string;
  host: string;
  content: string;
  required: boolean;
  propagated: boolean;
}

export interface Domain {
  object: 'domain';
  id: string;
  created_at: string;
  updated_at: string;
  domain: string;
  account_id: string;
  dns_records: DnsRecord[];
  last_dns_check_at?: string;
  dns_valid: boolean;
}

export interface GetDomainsParams extends PaginationParams {
  dnsValid?: boolean;
}
