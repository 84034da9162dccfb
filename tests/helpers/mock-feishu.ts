/**
 * Mock Feishu API Server
 *
 * A minimal in-process server for exercising the client over real HTTP.
 */

import http from 'http';
import { URL } from 'url';

export interface ReceivedMessage {
  chat_id: string;
  msg_type: string;
  content?: unknown;
  card?: unknown;
  update_multi?: boolean;
}

export interface MockFeishuServer {
  port: number;
  baseUrl: string;
  messages: ReceivedMessage[];
  tokenRequests: number;
  authHeaders: string[];
  uploads: string[];
  start: () => Promise<void>;
  stop: () => Promise<void>;
  clear: () => void;
  /** Reject the next `count` authenticated requests as if the token had been revoked */
  revokeToken: (count?: number) => void;
  setFailingChats: (chatIds: string[]) => void;
}

export const MOCK_GROUPS = [
  { chat_id: 'oc_alpha', name: 'Alpha' },
  { chat_id: 'oc_beta', name: 'Beta' },
];

export const MOCK_IMAGE = Buffer.from('not-really-a-png');

export function createMockFeishuServer(): MockFeishuServer {
  let server: http.Server | null = null;
  const messages: ReceivedMessage[] = [];
  const authHeaders: string[] = [];
  const uploads: string[] = [];
  let tokenRequests = 0;
  let revocations = 0;
  let failingChats = new Set<string>();
  let port = 0;

  const send = (res: http.ServerResponse, status: number, body: unknown): void => {
    res.writeHead(status, { 'Content-Type': 'application/json' });
    res.end(JSON.stringify(body));
  };

  const handler = (req: http.IncomingMessage, res: http.ServerResponse): void => {
    const chunks: Buffer[] = [];
    req.on('data', (chunk: Buffer) => {
      chunks.push(chunk);
    });
    req.on('end', () => {
      const raw = Buffer.concat(chunks);
      const url = new URL(req.url ?? '/', 'http://localhost');
      const path = url.pathname.replace(/^\/open-apis/, '');

      if (req.method === 'GET' && path === '/static/chart.png') {
        res.writeHead(200, { 'Content-Type': 'image/png' });
        res.end(MOCK_IMAGE);
        return;
      }

      if (req.method === 'POST' && path === '/auth/v3/app_access_token/internal/') {
        tokenRequests++;
        const body = JSON.parse(raw.toString('utf8')) as Record<string, unknown>;
        if (body['app_secret'] !== 'test-secret') {
          send(res, 200, { code: 10014, msg: 'app secret invalid' });
          return;
        }
        send(res, 200, {
          code: 0,
          msg: 'ok',
          tenant_access_token: `t-${tokenRequests}`,
          expire: 7200,
        });
        return;
      }

      const auth = req.headers.authorization ?? '';
      authHeaders.push(auth);
      if (!auth.startsWith('Bearer t-')) {
        send(res, 200, { code: 99991663, msg: 'tenant access token invalid' });
        return;
      }
      if (revocations > 0) {
        revocations--;
        send(res, 200, { code: 99991663, msg: 'tenant access token invalid' });
        return;
      }

      if (req.method === 'GET' && path === '/chat/v4/list') {
        send(res, 200, { code: 0, msg: 'ok', data: { groups: MOCK_GROUPS } });
        return;
      }

      if (req.method === 'POST' && path === '/message/v4/send/') {
        const body = JSON.parse(raw.toString('utf8')) as ReceivedMessage;
        if (failingChats.has(body.chat_id)) {
          send(res, 200, { code: 230002, msg: 'bot not in chat' });
          return;
        }
        messages.push(body);
        send(res, 200, { code: 0, msg: 'ok', data: { message_id: `om_${messages.length}` } });
        return;
      }

      if (req.method === 'POST' && path === '/image/v4/put/') {
        const contentType = req.headers['content-type'] ?? '';
        const text = raw.toString('utf8');
        if (!contentType.startsWith('multipart/form-data') || !text.includes(MOCK_IMAGE.toString('utf8'))) {
          send(res, 200, { code: 9499, msg: 'bad multipart body' });
          return;
        }
        uploads.push(text.includes('name="image_type"') ? 'message' : 'unknown');
        send(res, 200, { code: 0, msg: 'ok', data: { image_key: 'img_v2_mock' } });
        return;
      }

      send(res, 404, { code: 404, msg: 'Not found' });
    });
  };

  return {
    get port() {
      return port;
    },
    get baseUrl() {
      return `http://127.0.0.1:${port}/open-apis`;
    },
    get messages() {
      return messages;
    },
    get tokenRequests() {
      return tokenRequests;
    },
    get authHeaders() {
      return authHeaders;
    },
    get uploads() {
      return uploads;
    },
    async start() {
      return new Promise((resolve) => {
        server = http.createServer(handler);
        server.listen(0, '127.0.0.1', () => {
          const address = server?.address();
          if (address !== null && typeof address === 'object') {
            port = address.port;
          }
          resolve();
        });
      });
    },
    async stop() {
      return new Promise((resolve, reject) => {
        if (server === null) {
          resolve();
          return;
        }
        server.closeAllConnections();
        server.close((err) => {
          if (err !== undefined) {
            reject(err);
          } else {
            resolve();
          }
        });
      });
    },
    clear() {
      messages.length = 0;
      authHeaders.length = 0;
      uploads.length = 0;
      tokenRequests = 0;
      revocations = 0;
      failingChats = new Set();
    },
    revokeToken(count = 1) {
      revocations = count;
    },
    setFailingChats(chatIds: string[]) {
      failingChats = new Set(chatIds);
    },
  };
}
