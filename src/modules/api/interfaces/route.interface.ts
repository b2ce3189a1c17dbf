import type { PaginationParams } from '../../../common/pagination/pagination.interface.js';

/**
 * Inbound route forwarding received mail to a URL
 */
export interface Route {
  object: 'route';
  id: string;
  account_id: string;
  created_at: string;
  updated_at: string;
  name: string;
  url: string;
  recipient?: string;
  attachments: boolean;
  headers: boolean;
  group_by_message_id: boolean;
  strip_replies: boolean;
  /**
   * Signing secret for route deliveries
   */
  secret?: string;
  enabled: boolean;
}

export type GetRoutesParams = PaginationParams;
