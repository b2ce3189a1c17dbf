import { jest, describe, it, expect, beforeEach } from '@jest/globals';
import { Test, type TestingModule } from '@nestjs/testing';
import { IdempotencyService } from '../../../../src/modules/idempotency/idempotency.service.js';
import { IdempotencyKeyBuilder } from '../../../../src/modules/idempotency/idempotency-key.builder.js';
import { CLIENT_CONFIG } from '../../../../src/config/client-config.provider.js';
import { createDefaultClientConfig } from '../../../../src/config/client.config.js';

const UUID_PATTERN = /^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/;

describe('IdempotencyService', () => {
  let service: IdempotencyService;

  beforeEach(async () => {
    const module: TestingModule = await Test.createTestingModule({
      providers: [
        IdempotencyService,
        { provide: CLIENT_CONFIG, useValue: createDefaultClientConfig() },
      ],
    }).compile();

    service = module.get<IdempotencyService>(IdempotencyService);
  });

  describe('generateKey', () => {
    it('should generate distinct v4 UUIDs', () => {
      const first = service.generateKey();
      const second = service.generateKey();

      expect(first).toMatch(UUID_PATTERN);
      expect(second).toMatch(UUID_PATTERN);
      expect(first).not.toBe(second);
    });

    it('should prepend the configured prefix', () => {
      service.setConfig({ keyPrefix: 'billing' });

      const key = service.generateKey();

      expect(key.startsWith('billing-')).toBe(true);
      expect(key.slice('billing-'.length)).toMatch(UUID_PATTERN);
    });
  });

  describe('ensureKey', () => {
    it('should keep a key the caller supplied', () => {
      expect(service.ensureKey('order-42')).toBe('order-42');
    });

    it('should generate a key when none is given', () => {
      expect(service.ensureKey()).toMatch(UUID_PATTERN);
      expect(service.ensureKey('')).toMatch(UUID_PATTERN);
    });

    it('should return undefined when auto-generation is off', () => {
      service.setConfig({ autoGenerate: false });

      expect(service.ensureKey()).toBeUndefined();
      expect(service.ensureKey('order-42')).toBe('order-42');
    });
  });

  describe('config', () => {
    it('should merge partial updates and hand out copies', () => {
      service.setConfig({ keyPrefix: 'app' });
      const config = service.getConfig();
      config.autoGenerate = false;

      expect(service.getConfig()).toEqual({ autoGenerate: true, keyPrefix: 'app' });
    });
  });

  describe('executeIdempotent', () => {
    it('should pass the given key to the operation', async () => {
      const operation = jest.fn(async (key: string) => `sent with ${key}`);

      await expect(service.executeIdempotent(operation, 'order-42')).resolves.toBe(
        'sent with order-42',
      );
    });

    it('should generate a key when none is given', async () => {
      const operation = jest.fn(async (key: string) => key);

      await expect(service.executeIdempotent(operation)).resolves.toMatch(UUID_PATTERN);
    });
  });

  describe('newKeyBuilder', () => {
    it('should use a generated base key when none is given', () => {
      expect(service.newKeyBuilder().getBaseKey()).toMatch(UUID_PATTERN);
    });
  });
});

describe('IdempotencyKeyBuilder', () => {
  it('should return the base key first, then suffixed variants', () => {
    const builder = new IdempotencyKeyBuilder('batch-7');

    expect(builder.next()).toBe('batch-7');
    const second = builder.next();
    const third = builder.next();

    expect(second).toMatch(/^batch-7-[0-9a-f]{8}$/);
    expect(third).toMatch(/^batch-7-[0-9a-f]{8}$/);
    expect(second).not.toBe(third);
  });

  it('should build keys with an explicit suffix', () => {
    const builder = new IdempotencyKeyBuilder('batch-7');

    expect(builder.withSuffix('recipient-3')).toBe('batch-7-recipient-3');
  });
});
