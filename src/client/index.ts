export {
  ChatCompletionsClient,
  CHAT_COMPLETIONS_ENDPOINT,
  DEFAULT_BASE_URL,
  DEFAULT_MODEL,
  DEFAULT_TIMEOUT_SECONDS,
} from './chat-completions-client.js';
export type {
  ChatCompletionPublisher,
  ChatCompletionsClientOptions,
  SendMessageOptions,
} from './chat-completions-client.js';
export { SingleValuePublisher } from './publisher.js';
export type { PublisherObserver, Unsubscribe } from './publisher.js';
