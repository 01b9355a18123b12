import type { ChatRequest, Message } from '../../src/schemas/chat.js';

export const TEST_API_KEY = 'test-key';

export function mockChatRequest(overrides: Partial<ChatRequest> = {}): ChatRequest {
  const messages: Message[] = [{ role: 'user', content: 'Hello!' }];
  return { model: 'gpt-4', messages, ...overrides };
}

export function mockSuccessBody(options: {
  id?: string;
  model?: string;
  content?: string;
  created?: number;
} = {}) {
  return {
    id: options.id ?? 'chatcmpl-123',
    object: 'chat.completion',
    created: options.created ?? 1700000000,
    model: options.model ?? 'gpt-4',
    usage: {
      prompt_tokens: 10,
      completion_tokens: 20,
      total_tokens: 30,
    },
    choices: [
      {
        message: {
          role: 'assistant',
          content: options.content ?? 'Hello! How can I help you today?',
        },
        finish_reason: 'stop',
        index: 0,
      },
    ],
  };
}

export function mockErrorBody(
  message: string = 'Invalid API key provided',
  type: string = 'invalid_request_error',
  code: string = 'invalid_api_key'
) {
  return {
    error: {
      message,
      type,
      param: null,
      code,
    },
  };
}
