import { v4 as uuidv4 } from 'uuid';
import type { ChatCompletionChunk, ChatCompletionChunkDelta, FinishReason } from '../types/openai.js';
import type { BackendResponse } from '../types/backend.js';
import type { StreamState } from '../types/index.js';
import type { SseRecord } from './sse-parser.js';
import { ErrorCodes } from './errors.js';
import {
  BackendEvents,
  STREAM_DONE_SENTINEL,
  decodeBackendEvent,
  eventErrorMessage,
  NO_CONTENT_MESSAGE,
  extractOutputText,
  mapFinishReason,
  outputItemText,
} from './response-converter.js';

/**
 * Error payload sent in place of further chunks when a stream fails
 */
export interface StreamErrorPayload {
  error: {
    message: string;
    type: 'upstream_error';
    code: string;
  };
}

/**
 * One unit of client output
 */
export type StreamFrame =
  | { kind: 'chunk'; chunk: ChatCompletionChunk }
  | { kind: 'error'; payload: StreamErrorPayload }
  | { kind: 'done' };

/**
 * Encode a frame as an SSE "data:" record
 */
export function encodeFrame(frame: StreamFrame): string {
  switch (frame.kind) {
    case 'chunk':
      return `data: ${JSON.stringify(frame.chunk)}\n\n`;
    case 'error':
      return `data: ${JSON.stringify(frame.payload)}\n\n`;
    case 'done':
      return `data: ${STREAM_DONE_SENTINEL}\n\n`;
  }
}

/**
 * Streaming state machine: backend event records in, chat completion frames out.
 *
 *   started --first event--> streaming --completed/incomplete--> completed
 *      \                        \
 *       `------error / unparseable / premature end------------> failed
 *
 * Records must be handled in arrival order. Once terminal, all input is ignored.
 */
export class StreamTranslator {
  private readonly state: StreamState;
  private readonly model: string;
  private readonly created = Math.floor(Date.now() / 1000);
  /** Text of finished output items, used when no deltas were streamed */
  private fallbackText = '';

  constructor(model: string, responseId = `chatcmpl-${uuidv4()}`) {
    this.model = model;
    this.state = {
      responseId,
      accumulatedText: '',
      terminated: false,
      finishReason: 'unset',
      phase: 'started',
    };
  }

  /**
   * Copy of the current state
   */
  snapshot(): StreamState {
    return { ...this.state };
  }

  get terminated(): boolean {
    return this.state.terminated;
  }

  /**
   * Apply one backend record
   */
  handle(record: SseRecord): StreamFrame[] {
    if (this.state.terminated) return [];

    if (record.kind === 'invalid') {
      return this.fail('Backend returned a payload that is not an event stream', ErrorCodes.MALFORMED_UPSTREAM);
    }

    if (record.data.trim() === STREAM_DONE_SENTINEL) {
      return this.end();
    }

    const event = decodeBackendEvent(record.data);
    if (!event) {
      return this.fail('Backend sent an event that is not valid JSON', ErrorCodes.MALFORMED_UPSTREAM);
    }

    if (event.type === BackendEvents.ERROR || event.type === BackendEvents.FAILED) {
      return this.fail(eventErrorMessage(event), ErrorCodes.UPSTREAM_ERROR);
    }

    const frames: StreamFrame[] = [];

    // Announce the assistant role before any text
    if (this.state.phase === 'started') {
      this.state.phase = 'streaming';
      frames.push(this.chunk({ role: 'assistant', content: '' }, null));
    }

    switch (event.type) {
      case BackendEvents.TEXT_DELTA:
        if (typeof event.delta === 'string' && event.delta.length > 0) {
          this.state.accumulatedText += event.delta;
          frames.push(this.chunk({ content: event.delta }, null));
        }
        break;

      case BackendEvents.ITEM_DONE:
        this.fallbackText += outputItemText(event.item);
        break;

      case BackendEvents.COMPLETED:
        frames.push(...this.complete('completed', event.response));
        break;

      case BackendEvents.INCOMPLETE:
        frames.push(...this.complete('incomplete', event.response));
        break;

      default:
        // Event types without a mapping are inert
        break;
    }

    return frames;
  }

  /**
   * End of backend input. A stream that never completed counts as failed.
   */
  end(): StreamFrame[] {
    if (this.state.terminated) return [];
    return this.fail('Backend stream ended before completion', ErrorCodes.UPSTREAM_ERROR);
  }

  /**
   * Force the failed state, emitting a single error frame and no [DONE]
   */
  fail(message: string, code: string = ErrorCodes.UPSTREAM_ERROR): StreamFrame[] {
    if (this.state.terminated) return [];

    this.state.phase = 'failed';
    this.state.terminated = true;
    this.state.finishReason = 'error';

    return [{ kind: 'error', payload: { error: { message, type: 'upstream_error', code } } }];
  }

  private complete(defaultStatus: string, response: BackendResponse | undefined): StreamFrame[] {
    const frames: StreamFrame[] = [];

    if (this.state.accumulatedText === '') {
      const text = this.fallbackText || extractOutputText(response?.output);
      if (!text) {
        return this.fail(NO_CONTENT_MESSAGE, ErrorCodes.UPSTREAM_ERROR);
      }
      this.state.accumulatedText = text;
      frames.push(this.chunk({ content: text }, null));
    }

    const finishReason = mapFinishReason(response?.status ?? defaultStatus);
    this.state.phase = 'completed';
    this.state.terminated = true;
    this.state.finishReason = finishReason;

    frames.push(this.chunk({}, finishReason));
    frames.push({ kind: 'done' });
    return frames;
  }

  private chunk(delta: ChatCompletionChunkDelta, finishReason: FinishReason | null): StreamFrame {
    return {
      kind: 'chunk',
      chunk: {
        id: this.state.responseId,
        object: 'chat.completion.chunk',
        created: this.created,
        model: this.model,
        choices: [{ index: 0, delta, finish_reason: finishReason }],
      },
    };
  }
}
