import type { ChatCompletionRequest, ChatMessage } from '../types/openai.js';
import { CHAT_ROLES } from '../types/openai.js';
import type { BackendContentPart, BackendInputItem, BackendRequest } from '../types/backend.js';
import type { MessageContent, ModelSpec } from '../types/index.js';
import { DEFAULT_INSTRUCTIONS, type Logger } from '../config.js';

export interface ConvertOptions {
  /** Instructions used when the conversation has no leading system message */
  defaultInstructions?: string;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Resolve string-or-array message content into an explicit variant
 */
export function resolveContent(content: ChatMessage['content']): MessageContent {
  if (typeof content === 'string') {
    return { kind: 'plain_text', text: content };
  }
  return { kind: 'part_list', parts: content };
}

/**
 * Map one client content part to the backend part shape.
 * Text and image parts are renamed; any other kind is forwarded untouched.
 */
function toBackendPart(part: unknown): BackendContentPart | null {
  if (typeof part === 'string') {
    return { type: 'input_text', text: part };
  }
  if (!isRecord(part) || typeof part.type !== 'string') {
    return null;
  }

  if (part.type === 'text' && typeof part.text === 'string') {
    return { type: 'input_text', text: part.text };
  }

  if (part.type === 'image_url') {
    const image = part.image_url;
    if (typeof image === 'string') {
      return { type: 'input_image', image_url: image };
    }
    if (isRecord(image) && typeof image.url === 'string') {
      const detail = image.detail;
      return {
        type: 'input_image',
        image_url: image.url,
        ...((detail === 'auto' || detail === 'low' || detail === 'high') && { detail }),
      };
    }
  }

  return { ...part, type: part.type };
}

/**
 * Normalize message content to the backend's array-of-parts shape
 */
export function toPartList(content: MessageContent): BackendContentPart[] {
  if (content.kind === 'plain_text') {
    return [{ type: 'input_text', text: content.text }];
  }

  const parts: BackendContentPart[] = [];
  for (const part of content.parts) {
    const converted = toBackendPart(part);
    if (converted) parts.push(converted);
  }
  return parts;
}

/**
 * Plain text of a message, used for the instructions field
 */
function contentText(content: MessageContent): string {
  if (content.kind === 'plain_text') {
    return content.text;
  }

  return toPartList(content)
    .flatMap((part) => (part.type === 'input_text' && typeof part.text === 'string' ? [part.text] : []))
    .join(' ');
}

/**
 * Convert a Chat Completions request into a Responses API request
 */
export function toBackendRequest(
  request: ChatCompletionRequest,
  spec: ModelSpec,
  options: ConvertOptions = {}
): BackendRequest {
  const [first, ...rest] = request.messages;
  const hasLeadingSystem = first !== undefined && first.role === 'system';

  const instructions = hasLeadingSystem
    ? contentText(resolveContent(first.content))
    : options.defaultInstructions ?? DEFAULT_INSTRUCTIONS;

  const remaining = hasLeadingSystem ? rest : request.messages;
  const input: BackendInputItem[] = remaining.map((message) => ({
    type: 'message',
    role: message.role,
    content: toPartList(resolveContent(message.content)),
  }));

  const tools = request.tools ?? [];

  const backendRequest: BackendRequest = {
    model: spec.baseModel,
    instructions,
    input,
    tools,
    store: false,
    stream: request.stream === true,
  };

  if (request.tool_choice !== undefined) {
    backendRequest.tool_choice = request.tool_choice;
  } else if (tools.length > 0) {
    backendRequest.tool_choice = 'auto';
  }

  // Omission, not null, tells the backend there is no override
  if (spec.effort !== 'none') {
    backendRequest.reasoning = { effort: spec.effort };
  }

  return backendRequest;
}

/**
 * Log unsupported parameters that were provided in the request
 */
export function logUnsupportedParams(request: ChatCompletionRequest, logger: Logger): void {
  const unsupported: string[] = [];

  if (request.temperature !== undefined) unsupported.push(`temperature=${request.temperature}`);
  if (request.max_tokens !== undefined) unsupported.push(`max_tokens=${request.max_tokens}`);
  if (request.n !== undefined) unsupported.push(`n=${request.n}`);
  if (request.stop !== undefined) unsupported.push('stop');
  if (request.presence_penalty !== undefined) unsupported.push(`presence_penalty=${request.presence_penalty}`);
  if (request.frequency_penalty !== undefined) unsupported.push(`frequency_penalty=${request.frequency_penalty}`);
  if (request.user !== undefined) unsupported.push(`user=${request.user}`);

  if (unsupported.length > 0) {
    logger.debug('Ignoring unsupported OpenAI parameters', {
      params: unsupported,
    });
  }
}

/**
 * Validate a ChatCompletionRequest body
 * Returns an error message if invalid, null if valid
 */
export function validateChatCompletionRequest(body: unknown): string | null {
  if (!isRecord(body)) {
    return 'request body must be a JSON object';
  }

  if (typeof body.model !== 'string' || body.model.length === 0) {
    return 'model is required and must be a string';
  }

  if (!Array.isArray(body.messages)) {
    return 'messages is required and must be an array';
  }

  if (body.messages.length === 0) {
    return 'messages array cannot be empty';
  }

  for (let i = 0; i < body.messages.length; i++) {
    const message: unknown = body.messages[i];

    if (!isRecord(message)) {
      return `messages[${i}] must be an object`;
    }

    if (typeof message.role !== 'string' || !(CHAT_ROLES as readonly string[]).includes(message.role)) {
      return `messages[${i}].role must be one of: ${CHAT_ROLES.join(', ')}`;
    }

    if (typeof message.content !== 'string' && !Array.isArray(message.content)) {
      return `messages[${i}].content must be a string or an array of content parts`;
    }
  }

  if (body.stream !== undefined && typeof body.stream !== 'boolean') {
    return 'stream must be a boolean';
  }

  if (body.tools !== undefined && !Array.isArray(body.tools)) {
    return 'tools must be an array';
  }

  return null;
}
