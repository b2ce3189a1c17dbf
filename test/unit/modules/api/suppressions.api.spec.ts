import { describe, it, expect, beforeEach } from '@jest/globals';
import type { AhaSendClient } from '../../../../src/ahasend.client.js';
import type { MockHttpAdapter } from '../../../helpers/mock-http-adapter.js';
import { TEST_ACCOUNT_ID, createTestClient } from '../../../helpers/test-client.js';

const SUPPRESSIONS_PATH = `/v2/accounts/${TEST_ACCOUNT_ID}/suppressions`;

describe('SuppressionsApi', () => {
  let client: AhaSendClient;
  let server: MockHttpAdapter;

  beforeEach(() => {
    ({ client, server } = createTestClient());
  });

  it('should create a suppression', async () => {
    server.setResponse({
      method: 'POST',
      path: SUPPRESSIONS_PATH,
      response: { status: 201, data: { object: 'list', data: [{ object: 'suppression', id: 1 }] } },
    });

    await client.suppressions.createSuppression(TEST_ACCOUNT_ID, {
      email: 'user@example.org',
      expires_at: '2030-01-01T00:00:00Z',
      reason: 'manual',
    });

    expect(server.lastRequest()?.body).toEqual({
      email: 'user@example.org',
      expires_at: '2030-01-01T00:00:00Z',
      reason: 'manual',
    });
  });

  it('should require an RFC 3339 expiry', async () => {
    await expect(
      client.suppressions.createSuppression(TEST_ACCOUNT_ID, {
        email: 'user@example.org',
        expires_at: 'next week',
      }),
    ).rejects.toMatchObject({ type: 'validation', field: 'expires_at' });
  });

  it('should delete one address through query parameters', async () => {
    server.setResponse({
      method: 'DELETE',
      path: SUPPRESSIONS_PATH,
      response: { status: 200, data: { message: 'Suppression deleted' } },
    });

    await client.suppressions.deleteSuppression(TEST_ACCOUNT_ID, 'user+tag@example.org', 'example.com');

    const query = server.lastRequest()?.query;
    expect(query?.get('email')).toBe('user+tag@example.org');
    expect(query?.get('domain')).toBe('example.com');
  });

  it('should delete every suppression without a domain filter', async () => {
    server.setResponse({
      method: 'DELETE',
      path: `${SUPPRESSIONS_PATH}/all`,
      response: { status: 200, data: { message: 'Suppressions deleted' } },
    });

    await client.suppressions.deleteAllSuppressions(TEST_ACCOUNT_ID);

    expect(server.lastRequest()?.query.toString()).toBe('');
  });

  it('should list suppressions by date range', async () => {
    server.setResponse({
      method: 'GET',
      path: SUPPRESSIONS_PATH,
      response: { status: 200, data: { object: 'list', data: [], pagination: { has_more: false } } },
    });

    await client.suppressions.getSuppressions(TEST_ACCOUNT_ID, {
      fromDate: new Date('2024-01-01T00:00:00Z'),
      after: 'cur-1',
    });

    const query = server.lastRequest()?.query;
    expect(query?.get('from_date')).toBe('2024-01-01T00:00:00Z');
    expect(query?.get('after')).toBe('cur-1');
    expect(query?.get('limit')).toBe('100');
  });
});
