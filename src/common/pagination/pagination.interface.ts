/**
 * Cursor metadata returned with every list response
 */
export interface PaginationInfo {
  has_more: boolean;
  next_cursor?: string | null;
  previous_cursor?: string | null;
}

export interface PaginatedResponse<T> {
  object: string;
  data: T[];
  pagination: PaginationInfo;
}

/**
 * Query parameters shared by list endpoints
 */
export interface PaginationParams {
  limit?: number;
  /**
   * Legacy single-direction cursor
   */
  cursor?: string;
  after?: string;
  before?: string;
}
