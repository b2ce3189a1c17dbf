import type { PaginationParams } from '../../../common/pagination/pagination.interface.js';

export interface Webhook {
  object: 'webhook';
  id: string;
  account_id: string;
  created_at: string;
  updated_at: string;
  name: string;
  url: string;
  enabled: boolean;
  /**
   * Signing secret, returned on creation
   */
  secret?: string;
  on_reception: boolean;
  on_delivered: boolean;
  on_transient_error: boolean;
  on_failed: boolean;
  on_bounced: boolean;
  on_suppressed: boolean;
  on_opened: boolean;
  on_clicked: boolean;
  on_suppression_created: boolean;
  on_dns_error: boolean;
  scope?: string;
  domains?: string[];
  error_count: number;
  success_count: number;
  errors_since_last_success: number;
  last_request_at: string | null;
}

export interface GetWebhooksParams extends PaginationParams {
  enabled?: boolean;
  onReception?: boolean;
  onDelivered?: boolean;
  onTransientError?: boolean;
  onFailed?: boolean;
  onBounced?: boolean;
  onSuppressed?: boolean;
  onOpened?: boolean;
  onClicked?: boolean;
  onSuppressionCreated?: boolean;
  onDnsError?: boolean;
}
