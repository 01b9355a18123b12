export {
  ChatCompletionsClient,
  CHAT_COMPLETIONS_ENDPOINT,
  DEFAULT_BASE_URL,
  DEFAULT_MODEL,
  DEFAULT_TIMEOUT_SECONDS,
  SingleValuePublisher,
} from './client/index.js';
export type {
  ChatCompletionPublisher,
  ChatCompletionsClientOptions,
  PublisherObserver,
  SendMessageOptions,
  Unsubscribe,
} from './client/index.js';

export {
  ApiError,
  ChatClientError,
  DecodingError,
  InvalidEndpointError,
  TimeoutError,
  UNKNOWN_API_ERROR_MESSAGE,
  UnknownError,
  isChatClientError,
} from './errors.js';
export type { ChatClientErrorKind, ChatClientFailure } from './errors.js';

export {
  ChatRequestSchema,
  MessageSchema,
  RoleSchema,
  decodeChatResponse,
  encodeChatRequest,
  validateChatRequest,
} from './schemas/chat.js';
export type {
  ChatRequest,
  ChatRequestWire,
  ChatResponse,
  Choice,
  Message,
  ResponseMessage,
  Role,
  Usage,
} from './schemas/chat.js';

export { FetchTransport, TransportTimeoutError } from './transport/index.js';
export type { FetchTransportOptions, HttpRequest, HttpResponse, Transport } from './transport/index.js';

export { createClientFromEnv, loadClientConfig } from './config.js';
export type { ClientConfig } from './config.js';
export { createLogger, logger } from './logger.js';
export { getMetrics, getMetricsContentType, register as metricsRegistry } from './metrics.js';
export type { MetricsRecorder } from './metrics.js';
