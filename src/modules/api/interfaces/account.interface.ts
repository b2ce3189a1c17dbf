export interface Account {
  object: 'account';
  id: string;
  created_at: string;
  updated_at: string;
  name: string;
  website?: string;
  about?: string;
  track_opens?: boolean;
  track_clicks?: boolean;
  reject_bad_recipients?: boolean;
  reject_mistyped_recipients?: boolean;
  /**
   * Days
   */
  message_metadata_retention?: number;
  /**
   * Days
   */
  message_data_retention?: number;
}

/**
 * Membership of a user in an account
 */
export interface UserAccount {
  id: string;
  created_at: string;
  updated_at: string;
  user_id: string;
  account_id: string;
  role: string;
}

/**
 * Members come back as one unpaginated list
 */
export interface AccountMembersResponse {
  object: 'list';
  data: UserAccount[];
}
