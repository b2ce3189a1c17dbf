import type { FactoryProvider } from '@nestjs/common';
import { loadClientConfig } from './client.config.js';
import type { ClientConfig, ClientConfigOverrides } from './client-config.interface.js';

/**
 * Token for client configuration injection
 */
export const CLIENT_CONFIG = 'AHASEND_CLIENT_CONFIG';

/**
 * Provider factory for client configuration
 */
export function createClientConfigProvider(
  overrides?: ClientConfigOverrides,
): FactoryProvider<ClientConfig> {
  return {
    provide: CLIENT_CONFIG,
    useFactory: (): ClientConfig => loadClientConfig(overrides),
  };
}
