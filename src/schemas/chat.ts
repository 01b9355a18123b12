import { z } from 'zod';

export const RoleSchema = z.enum(['system', 'user', 'assistant']);

export type Role = z.infer<typeof RoleSchema>;

export const MessageSchema = z.object({
  role: RoleSchema,
  content: z.string(),
  name: z.string().optional(),
});

export type Message = Readonly<z.infer<typeof MessageSchema>>;

/**
 * Caller-side validation of a chat request, with the ranges the API documents.
 * The client does not run this on the send path; the server stays the
 * authority on rejecting out-of-range values.
 */
export const ChatRequestSchema = z.object({
  model: z.string(),
  messages: z.array(MessageSchema).min(1),
  temperature: z.number().min(0).max(2).optional(),
  topP: z.number().min(0).max(1).optional(),
  n: z.number().int().min(1).optional(),
  stream: z.boolean().optional(),
  stop: z.array(z.string()).max(4).optional(),
  maxTokens: z.number().int().positive().optional(),
  presencePenalty: z.number().min(-2).max(2).optional(),
  frequencyPenalty: z.number().min(-2).max(2).optional(),
  user: z.string().optional(),
});

export interface ChatRequest {
  readonly model: string;
  readonly messages: readonly Message[];
  readonly temperature?: number;
  readonly topP?: number;
  readonly n?: number;
  readonly stream?: boolean;
  readonly stop?: readonly string[];
  readonly maxTokens?: number;
  readonly presencePenalty?: number;
  readonly frequencyPenalty?: number;
  readonly user?: string;
}

export function validateChatRequest(value: unknown): ChatRequest {
  return ChatRequestSchema.parse(value);
}

export interface WireMessage {
  role: Role;
  content: string;
  name?: string;
}

export interface ChatRequestWire {
  model: string;
  messages: WireMessage[];
  temperature?: number;
  top_p?: number;
  n?: number;
  stream?: boolean;
  stop?: string[];
  max_tokens?: number;
  presence_penalty?: number;
  frequency_penalty?: number;
  user?: string;
}

function encodeMessage(message: Message): WireMessage {
  const wire: WireMessage = { role: message.role, content: message.content };
  if (message.name !== undefined) wire.name = message.name;
  return wire;
}

/**
 * Map a request onto its wire shape. Unset optional fields are left out of
 * the object entirely so they never reach the body as `null`.
 */
export function encodeChatRequest(request: ChatRequest): ChatRequestWire {
  const wire: ChatRequestWire = {
    model: request.model,
    messages: request.messages.map(encodeMessage),
  };

  if (request.temperature !== undefined) wire.temperature = request.temperature;
  if (request.topP !== undefined) wire.top_p = request.topP;
  if (request.n !== undefined) wire.n = request.n;
  if (request.stream !== undefined) wire.stream = request.stream;
  if (request.stop !== undefined) wire.stop = [...request.stop];
  if (request.maxTokens !== undefined) wire.max_tokens = request.maxTokens;
  if (request.presencePenalty !== undefined) wire.presence_penalty = request.presencePenalty;
  if (request.frequencyPenalty !== undefined) wire.frequency_penalty = request.frequencyPenalty;
  if (request.user !== undefined) wire.user = request.user;

  return wire;
}

const UsageWireSchema = z.object({
  prompt_tokens: z.number().int(),
  completion_tokens: z.number().int(),
  total_tokens: z.number().int(),
});

// Roles the server sends back are an open set, unlike the ones a request may carry
const ResponseMessageWireSchema = z.object({
  role: z.string(),
  content: z.string(),
  name: z.string().optional(),
});

const ChoiceWireSchema = z.object({
  index: z.number().int(),
  message: ResponseMessageWireSchema,
  finish_reason: z.string().nullish(),
});

export const ChatResponseWireSchema = z.object({
  id: z.string(),
  object: z.string(),
  created: z.number().int(),
  model: z.string(),
  choices: z.array(ChoiceWireSchema),
  usage: UsageWireSchema,
});

export interface Usage {
  readonly promptTokens: number;
  readonly completionTokens: number;
  readonly totalTokens: number;
}

export interface ResponseMessage {
  readonly role: string;
  readonly content: string;
  readonly name?: string;
}

export interface Choice {
  readonly index: number;
  readonly message: ResponseMessage;
  readonly finishReason?: string;
}

export interface ChatResponse {
  readonly id: string;
  readonly object: string;
  readonly created: number;
  readonly model: string;
  readonly choices: readonly Choice[];
  readonly usage: Usage;
}

/**
 * Decode a parsed success body. Throws a ZodError when a required field is
 * missing or has the wrong shape; extra keys are ignored.
 */
export function decodeChatResponse(json: unknown): ChatResponse {
  const wire = ChatResponseWireSchema.parse(json);

  return {
    id: wire.id,
    object: wire.object,
    created: wire.created,
    model: wire.model,
    choices: wire.choices.map((choice) => {
      const message: ResponseMessage = choice.message.name === undefined
        ? { role: choice.message.role, content: choice.message.content }
        : { role: choice.message.role, content: choice.message.content, name: choice.message.name };

      return choice.finish_reason == null
        ? { index: choice.index, message }
        : { index: choice.index, message, finishReason: choice.finish_reason };
    }),
    usage: {
      promptTokens: wire.usage.prompt_tokens,
      completionTokens: wire.usage.completion_tokens,
      totalTokens: wire.usage.total_tokens,
    },
  };
}

export const ErrorResponseSchema = z.object({
  error: z.object({
    message: z.string(),
    type: z.string().nullish(),
    param: z.string().nullish(),
    code: z.string().nullish(),
  }),
});

export type ErrorResponse = z.infer<typeof ErrorResponseSchema>;

export function decodeErrorResponse(json: unknown): ErrorResponse | undefined {
  const result = ErrorResponseSchema.safeParse(json);
  return result.success ? result.data : undefined;
}
