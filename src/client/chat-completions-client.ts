import { logger as defaultLogger, type Logger } from '../logger.js';
import { defaultMetrics, type MetricsRecorder } from '../metrics.js';
import {
  decodeChatResponse,
  decodeErrorResponse,
  encodeChatRequest,
  type ChatRequest,
  type ChatResponse,
  type ErrorResponse,
  type Message,
} from '../schemas/chat.js';
import {
  ApiError,
  DecodingError,
  InvalidEndpointError,
  TimeoutError,
  UNKNOWN_API_ERROR_MESSAGE,
  UnknownError,
  isChatClientError,
} from '../errors.js';
import { FetchTransport } from '../transport/fetch-transport.js';
import { TransportTimeoutError, type HttpRequest, type HttpResponse, type Transport } from '../transport/types.js';
import { SingleValuePublisher } from './publisher.js';

export const DEFAULT_BASE_URL = 'https://api.openai.com/v1';
export const DEFAULT_TIMEOUT_SECONDS = 60;
export const DEFAULT_MODEL = 'gpt-4';
export const CHAT_COMPLETIONS_ENDPOINT = 'chat/completions';

export interface ChatCompletionsClientOptions {
  apiKey: string;
  /** Per-request timeout in seconds, enforced by the transport. */
  timeout?: number;
  baseURL?: string;
  transport?: Transport;
  logger?: Logger;
  metrics?: MetricsRecorder;
}

export interface SendMessageOptions {
  model?: string;
  systemPrompt?: string;
}

export type ChatCompletionPublisher = SingleValuePublisher<ChatResponse>;

function parseErrorBody(body: string): ErrorResponse | undefined {
  try {
    return decodeErrorResponse(JSON.parse(body));
  } catch {
    // Non-JSON error bodies fall back to the generic message
    return undefined;
  }
}

export class ChatCompletionsClient {
  readonly baseURL: string;
  readonly timeout: number;
  private readonly apiKey: string;
  private readonly transport: Transport;
  private readonly logger: Logger;
  private readonly metrics: MetricsRecorder;

  constructor(options: ChatCompletionsClientOptions) {
    this.apiKey = options.apiKey;
    this.timeout = options.timeout ?? DEFAULT_TIMEOUT_SECONDS;
    this.baseURL = options.baseURL ?? DEFAULT_BASE_URL;
    this.transport = options.transport ?? new FetchTransport({ timeoutMs: this.timeout * 1000 });
    this.logger = options.logger ?? defaultLogger;
    this.metrics = options.metrics ?? defaultMetrics;
  }

  /**
   * Compose an authenticated JSON request for `endpoint`, relative to the
   * base URL. Performs no I/O.
   *
   * @throws InvalidEndpointError when the composed URL does not parse as an
   * http(s) URL.
   */
  buildRequest(endpoint: string, body: unknown, method: string = 'POST'): HttpRequest {
    const url = `${this.baseURL}/${endpoint}`;

    let parsed: URL;
    try {
      parsed = new URL(url);
    } catch (error) {
      throw new InvalidEndpointError(url, error);
    }

    if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') {
      throw new InvalidEndpointError(url);
    }

    return {
      url: parsed.href,
      method,
      headers: {
        Authorization: `Bearer ${this.apiKey}`,
        'Content-Type': 'application/json',
      },
      body: JSON.stringify(body),
    };
  }

  /**
   * Send `request` and decode a successful body with `decode`.
   * Any status outside 200-299 becomes an ApiError carrying that status.
   */
  async execute<T>(request: HttpRequest, decode: (json: unknown) => T): Promise<T> {
    const response = await this.send(request);

    if (response.status < 200 || response.status > 299) {
      const envelope = parseErrorBody(response.body);
      throw new ApiError(response.status, envelope?.error.message ?? UNKNOWN_API_ERROR_MESSAGE);
    }

    try {
      return decode(JSON.parse(response.body));
    } catch (error) {
      throw new DecodingError(error);
    }
  }

  async createChatCompletion(request: ChatRequest): Promise<ChatResponse> {
    const startTime = Date.now();

    let response: ChatResponse;
    try {
      const httpRequest = this.buildRequest(CHAT_COMPLETIONS_ENDPOINT, encodeChatRequest(request));

      this.logger.debug({
        model: request.model,
        messageCount: request.messages.length,
      }, 'Chat completion request');

      response = await this.execute(httpRequest, decodeChatResponse);
    } catch (error) {
      const outcome = isChatClientError(error) ? error.kind : 'unknown';
      this.recordMetrics(() => {
        this.metrics.trackChatRequest(request.model, outcome, (Date.now() - startTime) / 1000);
      });
      throw error;
    }

    this.recordMetrics(() => {
      this.metrics.trackChatRequest(request.model, 'success', (Date.now() - startTime) / 1000);
      this.metrics.trackTokens(
        request.model,
        response.usage.promptTokens,
        response.usage.completionTokens
      );
    });

    return response;
  }

  /**
   * Start a chat completion and expose it as a single-value publisher.
   * Unsubscribing suppresses delivery; it does not abort the request.
   */
  createChatCompletionPublisher(request: ChatRequest): ChatCompletionPublisher {
    return new SingleValuePublisher(this.createChatCompletion(request), this.logger);
  }

  /**
   * Send one user message, optionally preceded by a system prompt, and
   * return the first choice's text. A response without choices yields an
   * empty string.
   */
  async sendMessage(content: string, options: SendMessageOptions = {}): Promise<string> {
    const messages: Message[] = [];
    if (options.systemPrompt !== undefined) {
      messages.push({ role: 'system', content: options.systemPrompt });
    }
    messages.push({ role: 'user', content });

    const response = await this.createChatCompletion({
      model: options.model ?? DEFAULT_MODEL,
      messages,
    });

    return response.choices[0]?.message.content ?? '';
  }

  // A recorder failure is reported but never changes the call's outcome
  private recordMetrics(record: () => void): void {
    try {
      record();
    } catch (err) {
      this.logger.warn({ err }, 'Metrics recording failed');
    }
  }

  private async send(request: HttpRequest): Promise<HttpResponse> {
    const startTime = Date.now();
    this.logger.debug({ method: request.method, url: request.url }, 'Sending request');

    let response: HttpResponse;
    try {
      response = await this.transport.send(request);
    } catch (error) {
      if (error instanceof TransportTimeoutError) {
        throw new TimeoutError(error);
      }
      if (isChatClientError(error)) {
        throw error;
      }
      throw new UnknownError(error);
    }

    this.logger.debug({
      url: request.url,
      status: response.status,
      durationMs: Date.now() - startTime,
    }, 'Received response');

    return response;
  }
}
