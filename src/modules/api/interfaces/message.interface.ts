import type { PaginationParams } from '../../../common/pagination/pagination.interface.js';
import type { RecipientDto } from '../dto/message.dto.js';

export interface DeliveryEvent {
  time: string;
  log: string;
  status: string;
}

export interface Message {
  object: 'message';
  id: string;
  message_id: string;
  created_at: string;
  updated_at: string;
  sent_at?: string;
  delivered_at?: string;
  retain_until: string;
  subject: string;
  tags: string[];
  sender: string;
  recipient: string;
  direction: string;
  status: string;
  num_attempts: number;
  delivery_attempts: DeliveryEvent[];
  is_bounce_notification: boolean;
  bounce_classification?: string;
  click_count: number;
  open_count: number;
  reference_message_id?: number;
  domain_id: string;
  account_id: string;
}

export interface CreateSingleMessageResponse {
  object: 'message';
  /**
   * Absent when the recipient was rejected
   */
  id?: string;
  recipient: RecipientDto;
  status: string;
  error?: string;
  schedule?: {
    first_attempt?: string;
    expires?: string;
  };
}

export interface CreateMessageResponse {
  object: 'list';
  data: CreateSingleMessageResponse[];
}

export interface GetMessagesParams extends Pick<PaginationParams, 'limit' | 'cursor'> {
  /**
   * Comma-separated list of statuses
   */
  status?: string;
  sender?: string;
  recipient?: string;
  subject?: string;
  messageIdHeader?: string;
  fromTime?: Date;
  toTime?: Date;
}
