/**
 * Feishu Open API Client Module
 *
 * Provides the bot's view of the platform:
 * - Authenticated requests with a cached tenant access token
 * - Token refresh and retry when the platform rejects the token
 * - Cached user and group lookups
 * - Text, image, post and card messages fanned out to groups
 */

import { z } from 'zod';
import { CredentialCache } from '../cache/credential-cache.js';
import { ReadThroughCache } from '../cache/ttl-cache.js';
import { DEFAULT_BASE_URL, getConfig, type Config } from '../config/index.js';
import { Logger, logger as rootLogger } from '../utils/logger.js';
import { withRetry } from '../utils/retry.js';
import { resolveDestinations, type DestinationTarget } from './destinations.js';
import {
  CREDENTIAL_INVALID_CODE,
  CredentialExpiredError,
  ProtocolError,
  RequestError,
  isCredentialExpired,
} from './errors.js';
import {
  assertCardDocument,
  buildPayload,
  imageContent,
  postContent,
  textContent,
  type OutgoingMessage,
} from './messages.js';
import {
  FetchTransport,
  type HttpMethod,
  type Transport,
  type TransportBody,
  type TransportResponse,
} from './transport.js';
import {
  envelopeSchema,
  groupListDataSchema,
  imageUploadDataSchema,
  tokenResponseSchema,
  userBatchDataSchema,
  type Destination,
  type DispatchResult,
  type MessageType,
  type PostElement,
  type ResponseEnvelope,
  type UserInfo,
} from './types.js';

export const ENDPOINTS = {
  token: '/auth/v3/app_access_token/internal/',
  groupList: '/chat/v4/list',
  groupUpdate: '/chat/v4/update/',
  userBatch: '/contact/v1/user/batch_get',
  sendMessage: '/message/v4/send/',
  imageUpload: '/image/v4/put/',
} as const;

const GROUPS_KEY = 'groups';

export interface RetryPolicy {
  attempts: number;
  delayMs: number;
}

export interface FeishuClientOptions {
  appId: string;
  appSecret: string;
  baseUrl?: string;
  tokenTtlMs?: number;
  userTtlMs?: number;
  groupTtlMs?: number;
  userCacheSize?: number;
  retry?: Partial<RetryPolicy>;
  /** Used when no transport is given */
  timeoutMs?: number;
  transport?: Transport;
  logger?: Logger;
  /** Clock for cache expiry, epoch milliseconds */
  now?: () => number;
}

export interface RequestOptions {
  query?: Record<string, string>;
  body?: TransportBody;
  /** Send without the Authorization header */
  noAuth?: boolean;
}

const DEFAULTS = {
  tokenTtlMs: 60 * 60 * 1000,
  userTtlMs: 24 * 60 * 60 * 1000,
  groupTtlMs: 5 * 60 * 1000,
  userCacheSize: 32,
  retry: { attempts: 3, delayMs: 1000 },
};

/**
 * Decode a raw response into an envelope
 */
export function decodeEnvelope(response: TransportResponse): ResponseEnvelope {
  let json: unknown;
  try {
    json = JSON.parse(response.text);
  } catch {
    throw new ProtocolError('Response body is not valid JSON', {
      status: response.status,
      body: response.text,
    });
  }

  const parsed = envelopeSchema.safeParse(json);
  if (!parsed.success) {
    throw new ProtocolError('Response body is not a {code, msg} envelope', {
      status: response.status,
      body: response.text,
    });
  }
  return parsed.data;
}

function readField<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, value: unknown, what: string): T {
  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    throw new ProtocolError(`Unexpected ${what} in response`);
  }
  return parsed.data;
}

function filenameFromUrl(url: string): string {
  try {
    const name = new URL(url).pathname.split('/').pop();
    return name ? decodeURIComponent(name) : 'image';
  } catch (error) {
    if (error instanceof TypeError || error instanceof URIError) return 'image';
    throw error;
  }
}

export class FeishuClient {
  private readonly appId: string;
  private readonly appSecret: string;
  private readonly baseUrl: string;
  private readonly tokenTtlMs: number;
  private readonly retry: RetryPolicy;
  private readonly transport: Transport;
  private readonly log: Logger;
  private readonly now: () => number;
  private readonly credentials: CredentialCache;
  private readonly users: ReadThroughCache<string, UserInfo>;
  private readonly groups: ReadThroughCache<typeof GROUPS_KEY, Destination[]>;

  constructor(options: FeishuClientOptions) {
    if (!options.appId) {
      throw new Error('FEISHU_APP_ID is required');
    }
    if (!options.appSecret) {
      throw new Error('FEISHU_APP_SECRET is required');
    }

    this.appId = options.appId;
    this.appSecret = options.appSecret;
    this.baseUrl = (options.baseUrl ?? DEFAULT_BASE_URL).replace(/\/+$/, '');
    this.tokenTtlMs = options.tokenTtlMs ?? DEFAULTS.tokenTtlMs;
    this.retry = { ...DEFAULTS.retry, ...options.retry };
    this.transport =
      options.transport ??
      new FetchTransport(options.timeoutMs !== undefined ? { timeoutMs: options.timeoutMs } : {});
    this.log = options.logger ?? rootLogger.child('feishu');
    this.now = options.now ?? Date.now;

    this.credentials = new CredentialCache(this.now);
    this.users = new ReadThroughCache<string, UserInfo>((openId: string) => this.fetchUserDetail(openId), {
      ttlMs: options.userTtlMs ?? DEFAULTS.userTtlMs,
      maxSize: options.userCacheSize ?? DEFAULTS.userCacheSize,
      now: this.now,
    });
    this.groups = new ReadThroughCache<typeof GROUPS_KEY, Destination[]>(() => this.fetchGroups(), {
      ttlMs: options.groupTtlMs ?? DEFAULTS.groupTtlMs,
      maxSize: 1,
      now: this.now,
    });
  }

  /**
   * Make an API request, retrying with a fresh token while the platform reports it invalid
   *
   * @throws CredentialExpiredError once every attempt was rejected for the token
   * @throws RequestError for any other non-zero code, without retrying
   */
  async request(method: HttpMethod, path: string, options: RequestOptions = {}): Promise<ResponseEnvelope> {
    return withRetry(() => this.requestOnce(method, path, options), {
      attempts: this.retry.attempts,
      delayMs: this.retry.delayMs,
      backoffMultiplier: 1,
      retryOn: isCredentialExpired,
      onRetry: (attempt, _error, delayMs) => {
        this.log.warn(`Tenant access token rejected, retry ${attempt}/${this.retry.attempts - 1}`, {
          path,
          delayMs,
        });
      },
    });
  }

  private async requestOnce(
    method: HttpMethod,
    path: string,
    options: RequestOptions
  ): Promise<ResponseEnvelope> {
    const url = `${this.baseUrl}${path}`;
    const headers: Record<string, string> = {};

    if (!options.noAuth) {
      const token = await this.getAccessToken();
      headers['Authorization'] = `Bearer ${token}`;
      if (options.body?.kind === 'json') {
        this.log.debug('Request payload', { method, path, payload: options.body.value });
      }
    }

    const response = await this.transport.send({
      method,
      url,
      headers,
      query: options.query,
      body: options.body,
    });
    const envelope = decodeEnvelope(response);

    // documentation: https://open.feishu.cn/document/ukTMukTMukTM/ugjM14COyUjL4ITN
    if (envelope.code !== 0) {
      if (envelope.code === CREDENTIAL_INVALID_CODE) {
        this.credentials.invalidate();
        throw new CredentialExpiredError(envelope.code, envelope.msg);
      }
      throw new RequestError(envelope.code, envelope.msg);
    }

    if (!options.noAuth) {
      this.log.debug('Request completed', { method, path, response: envelope });
    }
    return envelope;
  }

  async get(path: string, query?: Record<string, string>): Promise<ResponseEnvelope> {
    return this.request('GET', path, { query });
  }

  async post(path: string, body?: unknown): Promise<ResponseEnvelope> {
    return this.request('POST', path, {
      body: body === undefined ? undefined : { kind: 'json', value: body },
    });
  }

  async postForm(
    path: string,
    form: Omit<Extract<TransportBody, { kind: 'form' }>, 'kind'>
  ): Promise<ResponseEnvelope> {
    return this.request('POST', path, { body: { kind: 'form', ...form } });
  }

  /**
   * Cached tenant access token, fetched again once it expires or is invalidated
   */
  async getAccessToken(): Promise<string> {
    const cached = this.credentials.get();
    if (cached) {
      return cached.token;
    }

    this.log.info('Fetching tenant access token');
    const envelope = await this.request('POST', ENDPOINTS.token, {
      noAuth: true,
      body: { kind: 'json', value: { app_id: this.appId, app_secret: this.appSecret } },
    });
    const { tenant_access_token: token } = readField(tokenResponseSchema, envelope, 'token');

    this.credentials.set({ token, acquiredAt: this.now(), ttlMs: this.tokenTtlMs });
    return token;
  }

  invalidateToken(): void {
    this.credentials.invalidate();
  }

  async getUserDetail(openId: string): Promise<UserInfo> {
    // callers get a copy; the cached entry stays as fetched
    return structuredClone(await this.users.lookup(openId));
  }

  private async fetchUserDetail(openId: string): Promise<UserInfo> {
    const envelope = await this.get(ENDPOINTS.userBatch, { open_ids: openId });
    const { user_infos: users } = readField(userBatchDataSchema, envelope.data, 'user list');
    const [user] = users;
    if (!user) {
      throw new ProtocolError(`No user info returned for ${openId}`);
    }
    return user;
  }

  /**
   * Groups the bot belongs to
   */
  async getGroups(): Promise<Destination[]> {
    return structuredClone(await this.groups.lookup(GROUPS_KEY));
  }

  private async fetchGroups(): Promise<Destination[]> {
    const envelope = await this.get(ENDPOINTS.groupList);
    return readField(groupListDataSchema, envelope.data, 'group list').groups;
  }

  async resolveDestinations(target?: DestinationTarget): Promise<string[]> {
    return resolveDestinations(target, () => this.getGroups());
  }

  async updateGroupName(chatId: string, name: string): Promise<ResponseEnvelope> {
    const envelope = await this.post(ENDPOINTS.groupUpdate, { chat_id: chatId, name });
    this.groups.invalidate();
    return envelope;
  }

  /**
   * Send one message to every destination concurrently.
   * A failed destination shows up in its own result and does not affect the others.
   */
  async sendToGroups(
    msgType: MessageType,
    message: OutgoingMessage,
    destinations?: DestinationTarget
  ): Promise<DispatchResult[]> {
    const chatIds = await this.resolveDestinations(destinations);

    const results = await Promise.all(
      chatIds.map(async (chatId): Promise<DispatchResult> => {
        try {
          const response = await this.post(ENDPOINTS.sendMessage, buildPayload(chatId, msgType, message));
          return { chatId, ok: true, response };
        } catch (error) {
          this.log.warn('Message delivery failed', {
            chatId,
            msgType,
            error: error instanceof Error ? error.message : String(error),
          });
          return { chatId, ok: false, error };
        }
      })
    );

    this.log.debug(`Sent ${msgType} message`, {
      delivered: results.filter((r) => r.ok).map((r) => r.chatId),
      failed: results.filter((r) => !r.ok).map((r) => r.chatId),
    });
    return results;
  }

  /**
   * Send plain text
   */
  async sendText(text: string, destinations?: DestinationTarget): Promise<DispatchResult[]> {
    return this.sendToGroups('text', { content: textContent(text) }, destinations);
  }

  /**
   * Upload the image behind `imageUrl`, then send it
   */
  async sendImage(imageUrl: string, destinations?: DestinationTarget): Promise<DispatchResult[]> {
    const imageKey = await this.uploadImage(imageUrl);
    return this.sendToGroups('image', { content: imageContent(imageKey) }, destinations);
  }

  /**
   * Send a rich-text post
   * documentation: https://open.feishu.cn/document/ukTMukTMukTM/uMDMxEjLzATMx4yMwETM
   */
  async sendPost(
    title: string,
    content: PostElement[][],
    destinations?: DestinationTarget,
    options: { locale?: string } = {}
  ): Promise<DispatchResult[]> {
    return this.sendToGroups('post', { content: postContent(title, content, options.locale) }, destinations);
  }

  /**
   * Send an interactive card
   * documentation: https://open.feishu.cn/document/ukTMukTMukTM/ugTNwUjL4UDM14CO1ATN
   */
  async sendCard(
    card: unknown,
    destinations?: DestinationTarget,
    options: { isShared?: boolean } = {}
  ): Promise<DispatchResult[]> {
    assertCardDocument(card);
    return this.sendToGroups('interactive', { card, isShared: options.isShared ?? false }, destinations);
  }

  /**
   * Upload the image at the given url and return its image_key
   */
  async uploadImage(url: string): Promise<string> {
    const bytes = await this.transport.download(url);
    const imageKey = await this.uploadImageBytes(bytes, filenameFromUrl(url));
    this.log.debug('Uploaded image', { url, imageKey });
    return imageKey;
  }

  async uploadImageBytes(bytes: Uint8Array, filename = 'image'): Promise<string> {
    const envelope = await this.postForm(ENDPOINTS.imageUpload, {
      fields: { image_type: 'message' },
      files: { image: { data: bytes, filename } },
    });
    return readField(imageUploadDataSchema, envelope.data, 'image upload').image_key;
  }
}

/**
 * Build a client from loaded configuration
 */
export function createFeishuClientFromConfig(
  config: Config,
  overrides: Partial<FeishuClientOptions> = {}
): FeishuClient {
  return new FeishuClient({
    appId: config.feishu.appId,
    appSecret: config.feishu.appSecret,
    baseUrl: config.feishu.baseUrl,
    tokenTtlMs: config.cache.tokenTtlMs,
    userTtlMs: config.cache.userTtlMs,
    groupTtlMs: config.cache.groupTtlMs,
    userCacheSize: config.cache.userCacheSize,
    timeoutMs: config.http.timeoutMs,
    retry: { attempts: config.http.retryAttempts, delayMs: config.http.retryDelayMs },
    logger: new Logger({ level: config.log.level, scope: 'feishu' }),
    ...overrides,
  });
}

// Singleton instance
let clientInstance: FeishuClient | null = null;

/**
 * Get the process-wide client, built from environment configuration
 */
export function getFeishuClient(): FeishuClient {
  if (!clientInstance) {
    clientInstance = createFeishuClientFromConfig(getConfig());
  }
  return clientInstance;
}

/**
 * Reset client (for testing)
 */
export function resetFeishuClient(): void {
  clientInstance = null;
}
