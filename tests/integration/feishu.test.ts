/**
 * Feishu Client Integration Tests
 */

import { describe, it, expect, beforeAll, afterAll, beforeEach } from 'vitest';
import { FeishuClient } from '../../src/feishu/client.js';
import { CredentialExpiredError, RequestError } from '../../src/feishu/errors.js';
import { Logger } from '../../src/utils/logger.js';
import { createMockFeishuServer, MOCK_GROUPS, type MockFeishuServer } from '../helpers/mock-feishu.js';

describe('FeishuClient Integration', () => {
  let mockServer: MockFeishuServer;
  let client: FeishuClient;

  const createClient = (appSecret = 'test-secret'): FeishuClient =>
    new FeishuClient({
      appId: 'cli_test',
      appSecret,
      baseUrl: mockServer.baseUrl,
      timeoutMs: 5000,
      retry: { delayMs: 10 },
      logger: new Logger({ level: 'error' }),
    });

  beforeAll(async () => {
    mockServer = createMockFeishuServer();
    await mockServer.start();
  });

  afterAll(async () => {
    await mockServer.stop();
  });

  beforeEach(() => {
    mockServer.clear();
    client = createClient();
  });

  describe('groups', () => {
    it('should list the groups with a bearer token', async () => {
      const groups = await client.getGroups();

      expect(groups).toEqual(MOCK_GROUPS);
      expect(mockServer.tokenRequests).toBe(1);
      expect(mockServer.authHeaders).toEqual(['Bearer t-1']);
    });
  });

  describe('sendText', () => {
    it('should send to every group', async () => {
      const results = await client.sendText('Hello, world!');

      expect(results.map((r) => [r.chatId, r.ok])).toEqual([
        ['oc_alpha', true],
        ['oc_beta', true],
      ]);
      // the two sends race over separate connections
      const received = [...mockServer.messages].sort((a, b) => a.chat_id.localeCompare(b.chat_id));
      expect(received).toEqual([
        { chat_id: 'oc_alpha', msg_type: 'text', content: { text: 'Hello, world!' } },
        { chat_id: 'oc_beta', msg_type: 'text', content: { text: 'Hello, world!' } },
      ]);
      expect(mockServer.tokenRequests).toBe(1);
    });

    it('should report a failing group alongside the others', async () => {
      mockServer.setFailingChats(['oc_beta']);

      const results = await client.sendText('Hello');

      expect(results.map((r) => r.ok)).toEqual([true, false]);
      const failed = results[1];
      expect(failed && !failed.ok && failed.error instanceof RequestError ? failed.error.code : null).toBe(
        230002
      );
      expect(mockServer.messages).toHaveLength(1);
    });

    it('should recover from a revoked token', async () => {
      await client.getGroups();
      mockServer.revokeToken(1);

      const results = await client.sendText('After revocation', 'oc_alpha');

      expect(results[0]?.ok).toBe(true);
      expect(mockServer.tokenRequests).toBe(2);
      expect(mockServer.authHeaders.slice(-2)).toEqual(['Bearer t-1', 'Bearer t-2']);
    });

    it('should fail after three rejected attempts', async () => {
      mockServer.revokeToken(3);

      await expect(client.getGroups()).rejects.toBeInstanceOf(CredentialExpiredError);
      expect(mockServer.tokenRequests).toBe(3);
    });
  });

  describe('authentication', () => {
    it('should surface a bad app secret as a RequestError', async () => {
      const badClient = createClient('wrong-secret');

      await expect(badClient.getGroups()).rejects.toMatchObject({
        name: 'RequestError',
        code: 10014,
      });
      expect(mockServer.tokenRequests).toBe(1);
    });
  });

  describe('images', () => {
    it('should download, upload and send an image', async () => {
      const imageUrl = mockServer.baseUrl.replace('/open-apis', '/static/chart.png');

      const results = await client.sendImage(imageUrl, ['oc_alpha']);

      expect(results[0]?.ok).toBe(true);
      expect(mockServer.uploads).toEqual(['message']);
      expect(mockServer.messages).toEqual([
        { chat_id: 'oc_alpha', msg_type: 'image', content: { image_key: 'img_v2_mock' } },
      ]);
    });
  });
});
