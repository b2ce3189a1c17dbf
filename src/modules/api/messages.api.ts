import { Injectable } from '@nestjs/common';
import { BaseApi } from './base.api.js';
import { ApiTransportService } from '../transport/api-transport.service.js';
import type { RequestOptions } from '../transport/interfaces/transport.interface.js';
import type { PaginatedResponse } from '../../common/pagination/pagination.interface.js';
import { ApiError } from '../../common/errors/api.errors.js';
import { DEFAULT_PAGE_LIMIT } from '../../common/constants/app.constants.js';
import { CreateMessageDto } from './dto/message.dto.js';
import type { SuccessResponse } from './interfaces/common.interface.js';
import type {
  CreateMessageResponse,
  GetMessagesParams,
  Message,
} from './interfaces/message.interface.js';

const MESSAGES_PATH = '/v2/accounts/{account_id}/messages';

@Injectable()
export class MessagesApi extends BaseApi {
  constructor(transport: ApiTransportService) {
    super(transport);
  }

  /**
   * Send a message to one or more recipients.
   *
   * The body is validated locally first; an invalid message fails with an
   * `ApiError` of type `validation` without consuming a rate limit token.
   */
  public async createMessage(
    accountId: string,
    message: CreateMessageDto,
    options?: RequestOptions,
  ): Promise<CreateMessageResponse> {
    this.validateBody(CreateMessageDto, message);
    this.assertNoReplyToHeader(message);

    return this.request<CreateMessageResponse>({
      method: 'POST',
      path: MESSAGES_PATH,
      pathParams: { account_id: accountId },
      body: message,
      options,
    });
  }

  public async getMessages(
    accountId: string,
    params: GetMessagesParams = {},
    options?: RequestOptions,
  ): Promise<PaginatedResponse<Message>> {
    return this.request<PaginatedResponse<Message>>({
      method: 'GET',
      path: MESSAGES_PATH,
      pathParams: { account_id: accountId },
      query: {
        status: params.status,
        sender: params.sender,
        recipient: params.recipient,
        subject: params.subject,
        message_id_header: params.messageIdHeader,
        from_time: params.fromTime,
        to_time: params.toTime,
        limit: params.limit ?? DEFAULT_PAGE_LIMIT,
        cursor: params.cursor,
      },
      options,
    });
  }

  /**
   * Every message matching `params`, fetched page by page
   */
  public iterateMessages(
    accountId: string,
    params: Omit<GetMessagesParams, 'cursor'> = {},
    options?: RequestOptions,
  ): AsyncGenerator<Message, void, undefined> {
    return this.iterate(cursor => this.getMessages(accountId, { ...params, cursor }, options));
  }

  public async getMessage(
    accountId: string,
    messageId: string,
    options?: RequestOptions,
  ): Promise<Message> {
    return this.request<Message>({
      method: 'GET',
      path: `${MESSAGES_PATH}/{message_id}`,
      pathParams: { account_id: accountId, message_id: messageId },
      options,
    });
  }

  /**
   * Cancel a scheduled message that has not been sent yet
   */
  public async cancelMessage(
    accountId: string,
    messageId: string,
    options?: RequestOptions,
  ): Promise<SuccessResponse> {
    return this.request<SuccessResponse>({
      method: 'DELETE',
      path: `${MESSAGES_PATH}/{message_id}/cancel`,
      pathParams: { account_id: accountId, message_id: messageId },
      options,
    });
  }

  private assertNoReplyToHeader(message: CreateMessageDto): void {
    if (!message.reply_to || !message.headers) {
      return;
    }
    if (Object.keys(message.headers).some(name => name.toLowerCase() === 'reply-to')) {
      throw new ApiError({
        type: 'validation',
        message: 'headers: reply-to must not be set together with reply_to',
        field: 'headers',
      });
    }
  }
}
