/**
 * OpenAI-compatible type definitions for /v1/chat/completions
 */

export type ChatRole = 'system' | 'user' | 'assistant' | 'tool';

export const CHAT_ROLES: readonly ChatRole[] = ['system', 'user', 'assistant', 'tool'];

/**
 * Text part of a multi-part message
 */
export interface TextContentPart {
  type: 'text';
  text: string;
}

/**
 * Image part of a multi-part message
 */
export interface ImageUrlContentPart {
  type: 'image_url';
  image_url: string | { url: string; detail?: 'auto' | 'low' | 'high' };
}

/**
 * Any other part kind a client may send. Passed through untouched.
 */
export interface OpaqueContentPart {
  type: string;
  [key: string]: unknown;
}

export type ContentPart = TextContentPart | ImageUrlContentPart | OpaqueContentPart;

/**
 * Message in a chat conversation
 */
export interface ChatMessage {
  role: ChatRole;
  /** Either a bare string or an ordered list of parts (bare strings allowed inside) */
  content: string | Array<ContentPart | string>;
  name?: string;
}

/**
 * OpenAI ChatCompletion request format
 */
export interface ChatCompletionRequest {
  /** Model identifier, optionally carrying a reasoning suffix (e.g. gpt-5.2-high) */
  model: string;
  /** Array of messages in the conversation */
  messages: ChatMessage[];
  /** Whether to stream the response */
  stream?: boolean;
  /** Tool definitions (passed through to the backend) */
  tools?: unknown[];
  /** Tool choice (passed through to the backend) */
  tool_choice?: unknown;
  /** Sampling temperature (logged, ignored) */
  temperature?: number;
  /** Maximum tokens to generate (logged, ignored) */
  max_tokens?: number;
  /** Number of completions to generate (logged, ignored) */
  n?: number;
  /** Stop sequences (logged, ignored) */
  stop?: string | string[];
  /** Presence penalty (logged, ignored) */
  presence_penalty?: number;
  /** Frequency penalty (logged, ignored) */
  frequency_penalty?: number;
  /** User identifier (logged, ignored) */
  user?: string;
}

export type FinishReason = 'stop' | 'length';

/**
 * Single choice in a ChatCompletion response
 */
export interface ChatCompletionChoice {
  index: number;
  message: {
    role: 'assistant';
    content: string;
  };
  finish_reason: FinishReason | null;
}

/**
 * Token usage statistics
 */
export interface ChatCompletionUsage {
  prompt_tokens: number;
  completion_tokens: number;
  total_tokens: number;
}

/**
 * OpenAI ChatCompletion response format
 */
export interface ChatCompletionResponse {
  /** Unique identifier for this completion */
  id: string;
  /** Object type */
  object: 'chat.completion';
  /** Unix timestamp of creation */
  created: number;
  /** Model used */
  model: string;
  /** Array of completion choices */
  choices: ChatCompletionChoice[];
  /** Token usage, present only when the backend reported it */
  usage?: ChatCompletionUsage;
}

/**
 * Incremental update in a streamed response
 */
export interface ChatCompletionChunkDelta {
  role?: 'assistant';
  content?: string;
}

export interface ChatCompletionChunk {
  id: string;
  object: 'chat.completion.chunk';
  created: number;
  model: string;
  choices: Array<{
    index: number;
    delta: ChatCompletionChunkDelta;
    finish_reason: FinishReason | null;
  }>;
}

/**
 * Model information for /v1/models endpoint
 */
export interface ModelInfo {
  id: string;
  object: 'model';
  created: number;
  owned_by: string;
}

/**
 * Response from /v1/models endpoint
 */
export interface ModelsResponse {
  object: 'list';
  data: ModelInfo[];
}

/**
 * OpenAI-style error response
 */
export interface OpenAIErrorResponse {
  error: {
    message: string;
    type: string;
    param: string | null;
    code: string | null;
  };
}
