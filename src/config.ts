import { z } from 'zod';
import { ChatCompletionsClient, type ChatCompletionsClientOptions } from './client/chat-completions-client.js';

const EnvSchema = z.object({
  OPENAI_API_KEY: z.string().min(1),
  OPENAI_BASE_URL: z.string().url().optional(),
  OPENAI_TIMEOUT_SECONDS: z.coerce.number().positive().optional(),
});

export interface ClientConfig {
  apiKey: string;
  baseURL?: string;
  timeout?: number;
}

/**
 * Read client settings from environment variables. The client constructor
 * never looks at the environment; this is for applications that want to.
 *
 * @throws ZodError when the key is missing or a value does not validate.
 */
export function loadClientConfig(env: NodeJS.ProcessEnv = process.env): ClientConfig {
  const parsed = EnvSchema.parse(env);

  return {
    apiKey: parsed.OPENAI_API_KEY,
    baseURL: parsed.OPENAI_BASE_URL,
    timeout: parsed.OPENAI_TIMEOUT_SECONDS,
  };
}

export function createClientFromEnv(
  env: NodeJS.ProcessEnv = process.env,
  overrides: Omit<ChatCompletionsClientOptions, 'apiKey' | 'baseURL' | 'timeout'> = {}
): ChatCompletionsClient {
  return new ChatCompletionsClient({ ...loadClientConfig(env), ...overrides });
}
