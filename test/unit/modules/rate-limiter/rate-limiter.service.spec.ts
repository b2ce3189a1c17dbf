import { describe, it, expect, beforeEach } from '@jest/globals';
import { Test, type TestingModule } from '@nestjs/testing';
import {
  RateLimiterService,
  RATE_LIMITER_CLOCK,
} from '../../../../src/modules/rate-limiter/rate-limiter.service.js';
import { EndpointType } from '../../../../src/modules/rate-limiter/interfaces/rate-limiter.interface.js';
import { CLIENT_CONFIG } from '../../../../src/config/client-config.provider.js';
import { createDefaultClientConfig } from '../../../../src/config/client.config.js';
import type { ClientConfig } from '../../../../src/config/client-config.interface.js';
import { ConfigValidationError } from '../../../../src/config/validators/config-validator.js';
import {
  DeadlineExceededError,
  RequestCancelledError,
} from '../../../../src/common/errors/cancellation.errors.js';

const SEND_PATH = '/v2/accounts/acc-1/messages';
const STATS_PATH = '/v2/accounts/acc-1/statistics/transactional/bounce';
const DOMAINS_PATH = '/v2/accounts/acc-1/domains';

describe('RateLimiterService', () => {
  let service: RateLimiterService;
  let now: number;

  const createService = async (config: ClientConfig): Promise<RateLimiterService> => {
    const module: TestingModule = await Test.createTestingModule({
      providers: [
        RateLimiterService,
        { provide: CLIENT_CONFIG, useValue: config },
        { provide: RATE_LIMITER_CLOCK, useValue: () => now },
      ],
    }).compile();

    return module.get<RateLimiterService>(RateLimiterService);
  };

  beforeEach(async () => {
    now = 0;
    service = await createService(createDefaultClientConfig());
  });

  it('should create one bucket per category from the configuration', () => {
    expect(service.getAllStatuses()).toEqual([
      {
        endpointType: 'general',
        enabled: true,
        requestsPerSecond: 100,
        burstCapacity: 200,
        tokensAvailable: 200,
        nextRefillAt: null,
      },
      {
        endpointType: 'statistics',
        enabled: true,
        requestsPerSecond: 1,
        burstCapacity: 1,
        tokensAvailable: 1,
        nextRefillAt: null,
      },
      {
        endpointType: 'send_message',
        enabled: true,
        requestsPerSecond: 100,
        burstCapacity: 200,
        tokensAvailable: 200,
        nextRefillAt: null,
      },
    ]);
  });

  describe('waitForToken', () => {
    it('should charge message sends to the send_message bucket', async () => {
      await service.waitForToken('POST', SEND_PATH);

      expect(service.getStatus(EndpointType.SendMessage).tokensAvailable).toBe(199);
      expect(service.getStatus(EndpointType.General).tokensAvailable).toBe(200);
    });

    it('should charge everything else to the general bucket', async () => {
      await service.waitForToken('GET', SEND_PATH);
      await service.waitForToken('POST', DOMAINS_PATH);

      expect(service.getStatus(EndpointType.General).tokensAvailable).toBe(198);
      expect(service.getStatus(EndpointType.SendMessage).tokensAvailable).toBe(200);
    });

    it('should reject a cancelled caller once the statistics bucket is empty', async () => {
      await service.waitForToken('GET', STATS_PATH);
      const controller = new AbortController();
      controller.abort();

      await expect(service.waitForToken('GET', STATS_PATH, controller.signal)).rejects.toBeInstanceOf(
        RequestCancelledError,
      );
    });

    it('should reject with DeadlineExceededError when the deadline passes while waiting', async () => {
      await service.waitForToken('GET', STATS_PATH);

      await expect(
        service.waitForToken('GET', STATS_PATH, AbortSignal.timeout(50)),
      ).rejects.toBeInstanceOf(DeadlineExceededError);
    });

    it('should admit without consuming while globally disabled', async () => {
      service.setGlobalEnabled(false);

      for (let i = 0; i < 5; i++) {
        await service.waitForToken('GET', STATS_PATH);
      }

      expect(service.isEnabled()).toBe(false);
      expect(service.getStatus(EndpointType.Statistics)).toMatchObject({
        enabled: true,
        tokensAvailable: 1,
      });
    });

    it('should release requests already waiting when disabled globally', async () => {
      await service.waitForToken('GET', STATS_PATH);
      const waiting = service.waitForToken('GET', STATS_PATH, AbortSignal.timeout(500));
      await Promise.resolve();

      service.setGlobalEnabled(false);

      await expect(waiting).resolves.toBeUndefined();
      expect(service.getStatus(EndpointType.Statistics).tokensAvailable).toBe(0);
    });

    it('should keep requests waiting when re-enabled globally', async () => {
      await service.waitForToken('GET', STATS_PATH);
      const waiting = service.waitForToken('GET', STATS_PATH, AbortSignal.timeout(100));

      service.setGlobalEnabled(true);

      await expect(waiting).rejects.toBeInstanceOf(DeadlineExceededError);
    });

    it('should honour limits on a globally disabled service once re-enabled', async () => {
      service.setGlobalEnabled(false);
      service.setGlobalEnabled(true);

      expect(service.tryAcquire('GET', STATS_PATH)).toBe(true);
      expect(service.tryAcquire('GET', STATS_PATH)).toBe(false);
    });

    it('should start globally disabled when the configuration says so', async () => {
      const config = createDefaultClientConfig();
      config.rateLimiting.enabled = false;
      service = await createService(config);

      expect(service.isEnabled()).toBe(false);
      expect(service.tryAcquire('GET', STATS_PATH)).toBe(true);
      expect(service.tryAcquire('GET', STATS_PATH)).toBe(true);
    });
  });

  describe('setRateLimit', () => {
    it('should update limits in place and enable the bucket', () => {
      service.enableRateLimit(EndpointType.General, false);

      service.setRateLimit(EndpointType.General, 5, 10);

      expect(service.getStatus(EndpointType.General)).toMatchObject({
        enabled: true,
        requestsPerSecond: 5,
        burstCapacity: 10,
        tokensAvailable: 10,
      });
    });

    it('should reject a negative rate, naming the field', () => {
      expect(() => service.setRateLimit(EndpointType.General, -1, 10)).toThrow(
        new ConfigValidationError('general.requestsPerSecond must be >= 0, got -1'),
      );
    });

    it('should reject a fractional burst capacity', () => {
      expect(() => service.setRateLimit(EndpointType.Statistics, 1, 1.5)).toThrow(
        'statistics.burstCapacity must be an integer, got 1.5',
      );
    });

    it('should leave the bucket unchanged when rejected', () => {
      expect(() => service.setRateLimit(EndpointType.SendMessage, 1, -3)).toThrow(
        ConfigValidationError,
      );

      expect(service.getStatus(EndpointType.SendMessage).burstCapacity).toBe(200);
    });

    it('should accept a zero rate', () => {
      service.setRateLimit(EndpointType.Statistics, 0, 1);

      expect(service.getStatus(EndpointType.Statistics).requestsPerSecond).toBe(0);
    });
  });

  describe('enableRateLimit', () => {
    it('should bypass a disabled category only', () => {
      service.enableRateLimit(EndpointType.Statistics, false);

      expect(service.tryAcquire('GET', STATS_PATH)).toBe(true);
      expect(service.tryAcquire('GET', STATS_PATH)).toBe(true);
      expect(service.getStatus(EndpointType.Statistics).enabled).toBe(false);
      expect(service.getStatus(EndpointType.General).enabled).toBe(true);
    });
  });

  describe('configure', () => {
    it('should apply only the categories provided', () => {
      service.configure({
        statistics: { requestsPerSecond: 2, burstCapacity: 3, enabled: true },
      });

      expect(service.getStatus(EndpointType.Statistics)).toMatchObject({
        requestsPerSecond: 2,
        burstCapacity: 3,
        tokensAvailable: 1,
      });
      expect(service.getStatus(EndpointType.General)).toMatchObject({
        requestsPerSecond: 100,
        burstCapacity: 200,
      });
    });

    it('should validate every category before applying any', () => {
      expect(() =>
        service.configure({
          general: { requestsPerSecond: 1, burstCapacity: 1, enabled: true },
          sendMessage: { requestsPerSecond: -1, burstCapacity: 1, enabled: true },
        }),
      ).toThrow('customer.sendMessage.requestsPerSecond must be >= 0, got -1');

      expect(service.getStatus(EndpointType.General).requestsPerSecond).toBe(100);
    });
  });

  describe('getStatus', () => {
    it('should report when a drained bucket is full again', () => {
      now = 1_000;
      service.tryAcquire('GET', STATS_PATH);

      expect(service.getStatus(EndpointType.Statistics)).toMatchObject({
        tokensAvailable: 0,
        nextRefillAt: new Date(2_000),
      });

      now = 2_000;
      expect(service.getStatus(EndpointType.Statistics)).toMatchObject({
        tokensAvailable: 1,
        nextRefillAt: null,
      });
    });
  });

  it('should classify requests by method and path', () => {
    expect(service.classify('post', `${SEND_PATH}?dry_run=true`)).toBe('send_message');
    expect(service.classify('GET', STATS_PATH)).toBe('statistics');
    expect(service.classify('DELETE', `${SEND_PATH}/msg-1/cancel`)).toBe('general');
  });
});
