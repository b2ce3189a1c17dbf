export interface IdempotencyConfig {
  /**
   * Generate a key for POST requests that do not carry one
   */
  autoGenerate: boolean;

  /**
   * Prepended to generated keys as `<prefix>-<uuid>`
   */
  keyPrefix: string;
}
