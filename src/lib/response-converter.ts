import { v4 as uuidv4 } from 'uuid';
import type {
  BackendResponse,
  BackendStreamEvent,
  BackendUsage,
} from '../types/backend.js';
import type { ChatCompletionResponse, ChatCompletionUsage, FinishReason } from '../types/openai.js';
import { SseParser, type SseRecord } from './sse-parser.js';
import { Errors } from './errors.js';

/** Backend event names the bridge interprets */
export const BackendEvents = {
  TEXT_DELTA: 'response.output_text.delta',
  ITEM_DONE: 'response.output_item.done',
  COMPLETED: 'response.completed',
  INCOMPLETE: 'response.incomplete',
  FAILED: 'response.failed',
  ERROR: 'error',
} as const;

/** Payload some backends send after the last event */
export const STREAM_DONE_SENTINEL = '[DONE]';

const EXCERPT_LENGTH = 500;

/** Raised when a successful backend answer carries no assistant text */
export const NO_CONTENT_MESSAGE = 'Backend returned success but no assistant content could be extracted';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isOutputItem(value: unknown): boolean {
  return (
    isRecord(value) &&
    (value.content === undefined || (Array.isArray(value.content) && value.content.every(isRecord)))
  );
}

function isBackendResponse(value: unknown): value is BackendResponse {
  return (
    isRecord(value) &&
    (value.output === undefined || (Array.isArray(value.output) && value.output.every(isOutputItem)))
  );
}

function isBackendStreamEvent(value: unknown): value is BackendStreamEvent {
  return isRecord(value) && typeof value.type === 'string';
}

/**
 * Decode one event payload, or null when it is not a JSON event object
 */
export function decodeBackendEvent(data: string): BackendStreamEvent | null {
  try {
    const parsed: unknown = JSON.parse(data);
    return isBackendStreamEvent(parsed) ? parsed : null;
  } catch {
    return null;
  }
}

/**
 * Text carried by a single output item (message items only)
 */
export function outputItemText(item: unknown): string {
  if (!isRecord(item) || item.type !== 'message' || !Array.isArray(item.content)) {
    return '';
  }

  let text = '';
  for (const part of item.content) {
    if (isRecord(part) && part.type === 'output_text' && typeof part.text === 'string') {
      text += part.text;
    }
  }
  return text;
}

/**
 * Concatenate the text of every output item, in order, without separators
 */
export function extractOutputText(output: unknown): string {
  return Array.isArray(output) ? output.map(outputItemText).join('') : '';
}

/**
 * Backend status to client finish reason. Unknown statuses fail open to "stop".
 */
export function mapFinishReason(status: string | undefined): FinishReason {
  return status === 'incomplete' ? 'length' : 'stop';
}

export function mapUsage(usage: BackendUsage | null | undefined): ChatCompletionUsage | undefined {
  if (!usage || typeof usage.input_tokens !== 'number' || typeof usage.output_tokens !== 'number') {
    return undefined;
  }

  return {
    prompt_tokens: usage.input_tokens,
    completion_tokens: usage.output_tokens,
    total_tokens: typeof usage.total_tokens === 'number' ? usage.total_tokens : usage.input_tokens + usage.output_tokens,
  };
}

/**
 * Human readable message of an error / response.failed event
 */
export function eventErrorMessage(event: BackendStreamEvent): string {
  return (
    event.error?.message ??
    event.response?.error?.message ??
    event.message ??
    `Backend reported ${event.type}`
  );
}

/**
 * Convert a single-shot backend response to an OpenAI ChatCompletion response
 *
 * @throws ApiError upstream_error when the response holds no assistant text
 */
export function fromBackend(response: BackendResponse, fallbackModel = 'unknown'): ChatCompletionResponse {
  const usage = mapUsage(response.usage);
  const content = extractOutputText(response.output);
  if (content === '') {
    throw Errors.upstreamError(NO_CONTENT_MESSAGE, { status: response.status });
  }

  return {
    id: `chatcmpl-${uuidv4()}`,
    object: 'chat.completion',
    created: Math.floor(Date.now() / 1000),
    model: response.model ?? fallbackModel,
    choices: [
      {
        index: 0,
        message: {
          role: 'assistant',
          content,
        },
        finish_reason: mapFinishReason(response.status),
      },
    ],
    ...(usage && { usage }),
  };
}

/**
 * Fold a complete backend event stream into one backend response.
 *
 * Text comes from the streamed deltas; when there were none, from the
 * finished output items, and last from the terminal response itself.
 */
export function collectEventStream(records: Iterable<SseRecord>): BackendResponse {
  let deltaText = '';
  let itemText = '';
  let terminal: BackendResponse | undefined;

  for (const record of records) {
    if (record.kind === 'invalid') {
      throw Errors.malformedUpstream('Backend returned a payload that is not an event stream', {
        line: record.line.substring(0, EXCERPT_LENGTH),
      });
    }

    if (record.data.trim() === STREAM_DONE_SENTINEL) break;

    const event = decodeBackendEvent(record.data);
    if (!event) {
      throw Errors.malformedUpstream('Backend sent an event that is not valid JSON', {
        data: record.data.substring(0, EXCERPT_LENGTH),
      });
    }

    if (event.type === BackendEvents.TEXT_DELTA) {
      if (typeof event.delta === 'string') deltaText += event.delta;
    } else if (event.type === BackendEvents.ITEM_DONE) {
      itemText += outputItemText(event.item);
    } else if (event.type === BackendEvents.COMPLETED || event.type === BackendEvents.INCOMPLETE) {
      const status = event.type === BackendEvents.INCOMPLETE ? 'incomplete' : 'completed';
      terminal = { status, ...event.response };
      break;
    } else if (event.type === BackendEvents.ERROR || event.type === BackendEvents.FAILED) {
      throw Errors.upstreamError(eventErrorMessage(event), { event: event.type });
    }
  }

  if (!terminal) {
    throw Errors.upstreamError('Backend stream ended before completion');
  }

  const text = deltaText || itemText || extractOutputText(terminal.output);
  if (text === '') {
    throw Errors.upstreamError(NO_CONTENT_MESSAGE, { status: terminal.status });
  }

  return {
    ...terminal,
    output: [{ type: 'message', role: 'assistant', content: [{ type: 'output_text', text }] }],
  };
}

/**
 * Parse a buffered backend body according to its content type
 */
export function parseBackendBody(contentType: string | null, body: string): BackendResponse {
  const type = (contentType ?? '').toLowerCase();

  if (type.includes('text/event-stream')) {
    const parser = new SseParser();
    return collectEventStream([...parser.push(body), ...parser.flush()]);
  }

  if (type.includes('json')) {
    let parsed: unknown;
    try {
      parsed = JSON.parse(body);
    } catch (err) {
      throw Errors.malformedUpstream('Backend returned invalid JSON', {
        parseError: err instanceof Error ? err.message : String(err),
        bodyExcerpt: body.substring(0, EXCERPT_LENGTH),
      });
    }

    if (!isBackendResponse(parsed)) {
      throw Errors.malformedUpstream('Backend JSON does not look like a response object', {
        bodyExcerpt: body.substring(0, EXCERPT_LENGTH),
      });
    }
    return parsed;
  }

  throw Errors.malformedUpstream(`Backend returned unexpected content type: ${contentType ?? 'none'}`, {
    bodyExcerpt: body.substring(0, EXCERPT_LENGTH),
  });
}
