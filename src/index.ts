/**
 * feishu-bot - Feishu (Lark) Open API client for chat bots
 *
 * Authenticates with app credentials, caches the tenant access token,
 * discovers the groups the bot is in and sends messages to them.
 */

export {
  FeishuClient,
  createFeishuClientFromConfig,
  getFeishuClient,
  resetFeishuClient,
  decodeEnvelope,
  ENDPOINTS,
  type FeishuClientOptions,
  type RequestOptions,
  type RetryPolicy,
} from './feishu/client.js';

export {
  RequestError,
  CredentialExpiredError,
  ProtocolError,
  TransportError,
  isCredentialExpired,
  CREDENTIAL_INVALID_CODE,
} from './feishu/errors.js';

export {
  FetchTransport,
  type FetchTransportOptions,
  type FormFile,
  type HttpMethod,
  type Transport,
  type TransportBody,
  type TransportRequest,
  type TransportResponse,
} from './feishu/transport.js';

export { resolveDestinations, type DestinationTarget } from './feishu/destinations.js';

export {
  buildPayload,
  textContent,
  imageContent,
  postContent,
  type OutgoingMessage,
} from './feishu/messages.js';

export type {
  CardDocument,
  Destination,
  DispatchResult,
  MessagePayload,
  MessageType,
  PostElement,
  ResponseEnvelope,
  UserInfo,
} from './feishu/types.js';

export { CredentialCache, type Credential } from './cache/credential-cache.js';
export { TtlCache, ReadThroughCache, type TtlCacheOptions, type Loader } from './cache/ttl-cache.js';

export { loadConfig, validateConfig, getConfig, resetConfig, type Config } from './config/index.js';
export { Logger, logger, type LogLevel, type LogSink, type LoggerOptions } from './utils/logger.js';
export { withRetry, sleep, type RetryOptions } from './utils/retry.js';
