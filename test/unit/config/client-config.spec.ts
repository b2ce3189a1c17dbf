import { describe, it, expect, beforeAll, afterAll } from '@jest/globals';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { createDefaultClientConfig, loadClientConfig } from '../../../src/config/client.config.js';
import { ConfigValidationError } from '../../../src/config/validators/config-validator.js';

describe('loadClientConfig', () => {
  let configDir: string;

  const writeConfig = (name: string, content: string): string => {
    const path = join(configDir, name);
    writeFileSync(path, content, 'utf-8');
    return path;
  };

  beforeAll(() => {
    configDir = mkdtempSync(join(tmpdir(), 'ahasend-config-'));
  });

  afterAll(() => {
    rmSync(configDir, { recursive: true, force: true });
  });

  it('should return the defaults for an empty environment', () => {
    expect(loadClientConfig({}, {})).toEqual(createDefaultClientConfig());
  });

  describe('environment variables', () => {
    it('should map AHASEND_* variables onto the configuration', () => {
      const config = loadClientConfig(
        {},
        {
          AHASEND_API_KEY: 'test-secret',
          AHASEND_DEBUG: 'yes',
          AHASEND_TIMEOUT: '15',
          AHASEND_MAX_RETRIES: '5',
          AHASEND_ENABLE_RATE_LIMIT: 'off',
          AHASEND_USER_AGENT: 'billing-service/2.0',
          AHASEND_IDEMPOTENCY_AUTO_GENERATE: 'disabled',
          AHASEND_IDEMPOTENCY_PREFIX: 'svc-',
        },
      );

      expect(config.apiKey).toBe('test-secret');
      expect(config.debug).toBe(true);
      expect(config.timeoutSecs).toBe(15);
      expect(config.retry.maxRetries).toBe(5);
      expect(config.rateLimiting.enabled).toBe(false);
      expect(config.rateLimiting.general).toEqual({
        requestsPerSecond: 100,
        burstCapacity: 200,
        enabled: true,
      });
      expect(config.userAgent).toBe('billing-service/2.0');
      expect(config.idempotency).toEqual({ autoGenerate: false, keyPrefix: 'svc-' });
    });

    it('should fall back to AHASEND_TOKEN for the key', () => {
      expect(loadClientConfig({}, { AHASEND_TOKEN: 'test-secret' }).apiKey).toBe('test-secret');
    });

    it('should ignore values it cannot parse', () => {
      const config = loadClientConfig(
        {},
        {
          AHASEND_TIMEOUT: 'soon',
          AHASEND_DEBUG: 'maybe',
          AHASEND_MAX_RETRIES: '-2',
          AHASEND_API_KEY: '   ',
        },
      );

      expect(config).toEqual(createDefaultClientConfig());
    });

    const baseUrlCases: Array<[env: Record<string, string>, expected: string]> = [
      [{ AHASEND_BASE_URL: 'http://localhost:8080/' }, 'http://localhost:8080'],
      [{ AHASEND_HOST: 'api.eu.example.com' }, 'https://api.eu.example.com'],
      [{ AHASEND_BASE_URL: 'api.example.test', AHASEND_SCHEME: 'http' }, 'http://api.example.test'],
      [
        { AHASEND_BASE_URL: 'https://api.example.test', AHASEND_HOST: 'localhost:9000' },
        'https://localhost:9000',
      ],
    ];

    it.each(baseUrlCases)('should resolve the base URL from %j', (env, expected) => {
      expect(loadClientConfig({}, env).baseUrl).toBe(expected);
    });
  });

  describe('overrides', () => {
    it('should take precedence over the environment', () => {
      const config = loadClientConfig(
        { apiKey: 'override-key' },
        { AHASEND_API_KEY: 'env-key' },
      );

      expect(config.apiKey).toBe('override-key');
    });

    it('should merge nested sections field by field', () => {
      const config = loadClientConfig({ rateLimiting: { statistics: { requestsPerSecond: 5 } } }, {});

      expect(config.rateLimiting.statistics).toEqual({
        requestsPerSecond: 5,
        burstCapacity: 1,
        enabled: true,
      });
      expect(config.rateLimiting.enabled).toBe(true);
    });

    it('should reject a max delay below the base delay', () => {
      try {
        loadClientConfig({ retry: { maxDelayMs: 10 } }, {});
        throw new Error('expected validation to fail');
      } catch (error) {
        expect(error).toBeInstanceOf(ConfigValidationError);
        expect(error).toMatchObject({
          path: 'ClientConfig.retry.maxDelayMs',
          message:
            'ClientConfig.retry.maxDelayMs (10) must be >= ClientConfig.retry.baseDelayMs (1000)',
        });
      }
    });

    it('should reject a base URL that is not http or https', () => {
      expect(() => loadClientConfig({ baseUrl: 'ftp://files.example.com' }, {})).toThrow(
        'ClientConfig.baseUrl must use http or https, got "ftp:"',
      );
    });

    it('should reject a negative timeout', () => {
      expect(() => loadClientConfig({ timeoutSecs: -1 }, {})).toThrow(
        'ClientConfig.timeoutSecs must be >= 0, got -1',
      );
    });
  });

  describe('YAML file', () => {
    it('should layer the file between defaults and the environment', () => {
      const path = writeConfig(
        'layered.yaml',
        [
          '# ${NOT_SET} in a comment is left alone',
          'apiKey: ${AHASEND_TEST_KEY}',
          'timeoutSecs: 10',
          'rateLimiting:',
          '  sendMessage:',
          '    requestsPerSecond: 10',
          '    burstCapacity: 20',
          'retry:',
          '  backoffStrategy: linear',
        ].join('\n'),
      );

      const config = loadClientConfig(
        {},
        { AHASEND_CONFIG_PATH: path, AHASEND_TEST_KEY: 'test-secret', AHASEND_TIMEOUT: '20' },
      );

      expect(config.apiKey).toBe('test-secret');
      expect(config.timeoutSecs).toBe(20);
      expect(config.rateLimiting.sendMessage).toEqual({
        requestsPerSecond: 10,
        burstCapacity: 20,
        enabled: true,
      });
      expect(config.retry.backoffStrategy).toBe('linear');
      expect(config.retry.maxRetries).toBe(3);
    });

    it('should fail on an undefined variable', () => {
      const path = writeConfig('missing-var.yaml', 'apiKey: ${MISSING_VAR}\n');

      expect(() => loadClientConfig({}, { AHASEND_CONFIG_PATH: path })).toThrow(
        'Environment variable MISSING_VAR is not defined',
      );
    });

    it('should treat an empty file as no settings', () => {
      const path = writeConfig('empty.yaml', '');

      expect(loadClientConfig({}, { AHASEND_CONFIG_PATH: path })).toEqual(
        createDefaultClientConfig(),
      );
    });

    it('should reject a document that is not a mapping', () => {
      const path = writeConfig('list.yaml', '- one\n- two\n');

      expect(() => loadClientConfig({}, { AHASEND_CONFIG_PATH: path })).toThrow(
        'must be a YAML mapping',
      );
    });

    it('should reject invalid values from the file', () => {
      const path = writeConfig('invalid.yaml', 'retry:\n  backoffStrategy: random\n');

      expect(() => loadClientConfig({}, { AHASEND_CONFIG_PATH: path })).toThrow(
        'ClientConfig.retry.backoffStrategy must be one of: exponential, linear, constant, got "random"',
      );
    });

    it('should report a missing file', () => {
      expect(() =>
        loadClientConfig({}, { AHASEND_CONFIG_PATH: join(configDir, 'absent.yaml') }),
      ).toThrow('Failed to read client config file');
    });
  });
});
