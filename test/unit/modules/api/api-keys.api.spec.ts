import { describe, it, expect, beforeEach } from '@jest/globals';
import type { AhaSendClient } from '../../../../src/ahasend.client.js';
import { collectAll } from '../../../../src/common/pagination/paginate.js';
import type { MockHttpAdapter } from '../../../helpers/mock-http-adapter.js';
import { TEST_ACCOUNT_ID, createTestClient } from '../../../helpers/test-client.js';

const API_KEYS_PATH = `/v2/accounts/${TEST_ACCOUNT_ID}/api-keys`;

describe('ApiKeysApi', () => {
  let client: AhaSendClient;
  let server: MockHttpAdapter;

  beforeEach(() => {
    ({ client, server } = createTestClient());
  });

  it('should create a key and return its secret', async () => {
    server.setResponse({
      method: 'POST',
      path: API_KEYS_PATH,
      response: {
        status: 201,
        data: { object: 'api_key', id: 'key-1', label: 'CI', secret_key: 'test-secret-key', scopes: [] },
      },
    });

    const apiKey = await client.apiKeys.createApiKey(TEST_ACCOUNT_ID, {
      label: 'CI',
      scopes: ['messages:send'],
    });

    expect(apiKey.secret_key).toBe('test-secret-key');
    const request = server.lastRequest();
    expect(request?.body).toEqual({ label: 'CI', scopes: ['messages:send'] });
    expect(request?.headers['idempotency-key']).toBeDefined();
  });

  it('should reject a key without scopes', async () => {
    await expect(
      client.apiKeys.createApiKey(TEST_ACCOUNT_ID, { label: 'CI', scopes: [] }),
    ).rejects.toMatchObject({ type: 'validation', field: 'scopes' });
    expect(server.requests).toHaveLength(0);
  });

  it('should send only limit and cursor when listing', async () => {
    server.setResponse({
      method: 'GET',
      path: API_KEYS_PATH,
      response: { status: 200, data: { object: 'list', data: [], pagination: { has_more: false } } },
    });

    await client.apiKeys.getApiKeys(TEST_ACCOUNT_ID, { cursor: 'c1' });

    const query = server.lastRequest()?.query;
    expect(query?.get('limit')).toBe('100');
    expect(query?.get('cursor')).toBe('c1');
    expect(query?.has('after')).toBe(false);
  });

  it('should iterate keys across pages', async () => {
    server.setResponses({
      method: 'GET',
      path: API_KEYS_PATH,
      responses: [
        {
          status: 200,
          data: { object: 'list', data: [{ id: 'key-1' }], pagination: { has_more: true, next_cursor: 'c2' } },
        },
        { status: 200, data: { object: 'list', data: [{ id: 'key-2' }], pagination: { has_more: false } } },
      ],
    });

    const keys = await collectAll(client.apiKeys.iterateApiKeys(TEST_ACCOUNT_ID));

    expect(keys.map(key => key.id)).toEqual(['key-1', 'key-2']);
    expect(server.requests.map(request => request.query.get('cursor'))).toEqual([null, 'c2']);
  });

  it('should update a key with PUT', async () => {
    server.setResponse({
      method: 'PUT',
      path: `${API_KEYS_PATH}/key-1`,
      response: { status: 200, data: { object: 'api_key', id: 'key-1', label: 'Deploys' } },
    });

    const apiKey = await client.apiKeys.updateApiKey(TEST_ACCOUNT_ID, 'key-1', { label: 'Deploys' });

    expect(apiKey.label).toBe('Deploys');
    expect(server.lastRequest()?.body).toEqual({ label: 'Deploys' });
  });

  it('should fetch and delete a key by id', async () => {
    server.setResponse({
      method: 'GET',
      path: `${API_KEYS_PATH}/key-1`,
      response: { status: 200, data: { object: 'api_key', id: 'key-1' } },
    });
    server.setResponse({
      method: 'DELETE',
      path: `${API_KEYS_PATH}/key-1`,
      response: { status: 200, data: { message: 'API key deleted' } },
    });

    await expect(client.apiKeys.getApiKey(TEST_ACCOUNT_ID, 'key-1')).resolves.toMatchObject({ id: 'key-1' });
    await expect(client.apiKeys.deleteApiKey(TEST_ACCOUNT_ID, 'key-1')).resolves.toEqual({
      message: 'API key deleted',
    });
  });

  it('should refuse a key id that escapes the path', async () => {
    await expect(client.apiKeys.getApiKey(TEST_ACCOUNT_ID, '../webhooks')).rejects.toMatchObject({
      type: 'validation',
      field: 'key_id',
    });
    expect(server.requests).toHaveLength(0);
  });
});
