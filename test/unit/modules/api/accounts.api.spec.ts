import { describe, it, expect, beforeEach } from '@jest/globals';
import type { AhaSendClient } from '../../../../src/ahasend.client.js';
import type { MockHttpAdapter } from '../../../helpers/mock-http-adapter.js';
import { TEST_ACCOUNT_ID, createTestClient } from '../../../helpers/test-client.js';

const ACCOUNT_PATH = `/v2/accounts/${TEST_ACCOUNT_ID}`;
const MEMBERS_PATH = `${ACCOUNT_PATH}/members`;

describe('AccountsApi', () => {
  let client: AhaSendClient;
  let server: MockHttpAdapter;

  beforeEach(() => {
    ({ client, server } = createTestClient());
  });

  it('should fetch the account', async () => {
    server.setResponse({
      method: 'GET',
      path: ACCOUNT_PATH,
      response: { status: 200, data: { object: 'account', id: TEST_ACCOUNT_ID, name: 'Acme' } },
    });

    const account = await client.accounts.getAccount(TEST_ACCOUNT_ID);

    expect(account.name).toBe('Acme');
    expect(server.lastRequest()?.headers['authorization']).toBe('Bearer test-secret');
  });

  it('should update account settings with PUT', async () => {
    server.setResponse({
      method: 'PUT',
      path: ACCOUNT_PATH,
      response: { status: 200, data: { object: 'account', id: TEST_ACCOUNT_ID, track_opens: true } },
    });

    const account = await client.accounts.updateAccount(TEST_ACCOUNT_ID, {
      track_opens: true,
      message_data_retention: 30,
    });

    expect(account.track_opens).toBe(true);
    const request = server.lastRequest();
    expect(request?.body).toEqual({ track_opens: true, message_data_retention: 30 });
    expect(request?.headers['idempotency-key']).toBeUndefined();
  });

  it('should reject a negative retention without sending', async () => {
    await expect(
      client.accounts.updateAccount(TEST_ACCOUNT_ID, { message_metadata_retention: -1 }),
    ).rejects.toMatchObject({ type: 'validation', field: 'message_metadata_retention' });
    expect(server.requests).toHaveLength(0);
  });

  it('should list members', async () => {
    server.setResponse({
      method: 'GET',
      path: MEMBERS_PATH,
      response: {
        status: 200,
        data: { object: 'list', data: [{ user_id: 'u-1', role: 'admin' }, { user_id: 'u-2', role: 'member' }] },
      },
    });

    const members = await client.accounts.getAccountMembers(TEST_ACCOUNT_ID);

    expect(members.data.map(member => member.user_id)).toEqual(['u-1', 'u-2']);
  });

  it('should add a member with an idempotency key', async () => {
    server.setResponse({
      method: 'POST',
      path: MEMBERS_PATH,
      response: { status: 201, data: { user_id: 'u-3', role: 'member' } },
    });

    await client.accounts.addAccountMember(TEST_ACCOUNT_ID, {
      email: 'new.member@example.com',
      role: 'member',
    });

    const request = server.lastRequest();
    expect(request?.body).toEqual({ email: 'new.member@example.com', role: 'member' });
    expect(request?.headers['idempotency-key']).toBeDefined();
  });

  it('should reject a member without a valid email', async () => {
    await expect(
      client.accounts.addAccountMember(TEST_ACCOUNT_ID, { email: 'not-an-email', role: 'member' }),
    ).rejects.toMatchObject({ type: 'validation', field: 'email' });
    expect(server.requests).toHaveLength(0);
  });

  it('should remove a member', async () => {
    server.setResponse({
      method: 'DELETE',
      path: `${MEMBERS_PATH}/u-2`,
      response: { status: 200, data: { message: 'Member removed' } },
    });

    await expect(client.accounts.removeAccountMember(TEST_ACCOUNT_ID, 'u-2')).resolves.toEqual({
      message: 'Member removed',
    });
  });
});
