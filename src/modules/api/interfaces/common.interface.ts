/**
 * Body of endpoints that only acknowledge the call
 */
export interface SuccessResponse {
  message: string;
}

/**
 * Query parameters shared by the transactional statistics endpoints
 */
export interface StatisticsParams {
  fromTime?: Date;
  toTime?: Date;
  senderDomain?: string;
  /**
   * Comma-separated list
   */
  recipientDomains?: string;
  /**
   * Comma-separated list
   */
  tags?: string;
  /**
   * Defaults to `day`
   */
  groupBy?: 'hour' | 'day' | 'week' | 'month';
}
