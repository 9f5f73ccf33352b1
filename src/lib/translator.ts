import type { ChatCompletionRequest, ChatCompletionResponse } from '../types/openai.js';
import type { BackendRequest, BackendResponse } from '../types/backend.js';
import type { ModelSpec, StreamState } from '../types/index.js';
import type { Config, Logger } from '../config.js';
import type { BackendDispatcher } from './backend-client.js';
import type { DispatchPool } from './dispatch-pool.js';
import { resolveModel } from './model-router.js';
import { toBackendRequest } from './request-converter.js';
import { BackendEvents, fromBackend, parseBackendBody } from './response-converter.js';
import { SseParser } from './sse-parser.js';
import { StreamTranslator, encodeFrame, type StreamFrame } from './stream-translator.js';
import { Errors } from './errors.js';

export type TranslatorOptions = Pick<
  Config,
  'allowedModels' | 'defaultInstructions' | 'requestTimeoutMs' | 'forceUpstreamStream'
>;

/**
 * A request after routing and conversion, before dispatch
 */
export interface PreparedRequest {
  spec: ModelSpec;
  backendRequest: BackendRequest;
}

/**
 * Where streamed frames go. `write` resolves once the frame may be followed by another.
 */
export interface ChunkSink {
  open(): void;
  write(data: string): Promise<void>;
  end(): void;
}

const EXCERPT_LENGTH = 500;

/**
 * Abort signal that fires on the parent signal or after `timeoutMs`
 */
function withTimeout(parent: AbortSignal | undefined, timeoutMs: number) {
  const controller = new AbortController();
  let timedOut = false;

  const timer = setTimeout(() => {
    timedOut = true;
    controller.abort();
  }, timeoutMs);

  const onAbort = () => controller.abort();
  if (parent?.aborted) {
    controller.abort();
  } else {
    parent?.addEventListener('abort', onAbort, { once: true });
  }

  return {
    signal: controller.signal,
    didTimeOut: () => timedOut,
    dispose: () => {
      clearTimeout(timer);
      parent?.removeEventListener('abort', onAbort);
    },
  };
}

/**
 * Composition root: routes the model, converts the request, dispatches it
 * through the pool and converts the answer back.
 */
export class Translator {
  private readonly options: TranslatorOptions;
  private readonly dispatcher: BackendDispatcher;
  private readonly pool: DispatchPool;
  private readonly logger: Logger;

  constructor(options: TranslatorOptions, dispatcher: BackendDispatcher, pool: DispatchPool, logger: Logger) {
    this.options = options;
    this.dispatcher = dispatcher;
    this.pool = pool;
    this.logger = logger;
  }

  /**
   * Resolve the model and build the backend request
   *
   * @throws ApiError model_not_allowed
   */
  prepare(request: ChatCompletionRequest): PreparedRequest {
    const spec = resolveModel(request.model, this.options.allowedModels);
    const backendRequest = toBackendRequest(request, spec, {
      defaultInstructions: this.options.defaultInstructions,
    });
    return { spec, backendRequest };
  }

  /**
   * Non-streaming completion
   */
  async complete(request: ChatCompletionRequest, requestId: string, signal?: AbortSignal): Promise<ChatCompletionResponse> {
    const { spec, backendRequest } = this.prepare(request);
    const upstreamRequest: BackendRequest = this.options.forceUpstreamStream
      ? { ...backendRequest, stream: true }
      : backendRequest;

    this.logger.debug('Resolved model', {
      requestId,
      requested: request.model,
      baseModel: spec.baseModel,
      effort: spec.effort,
    });

    const backendResponse = await this.pool.submit(() => this.fetchBuffered(upstreamRequest, signal), {
      requestId,
      retry: true,
      abortSignal: signal,
    });

    return fromBackend(backendResponse, spec.baseModel);
  }

  /**
   * Streaming completion. Failures before the sink opens are thrown so the
   * caller can still answer with a plain error status; afterwards every
   * failure becomes a terminal error frame.
   */
  async stream(
    request: ChatCompletionRequest,
    sink: ChunkSink,
    requestId: string,
    signal?: AbortSignal
  ): Promise<StreamState> {
    const { spec, backendRequest } = this.prepare(request);
    const upstreamRequest: BackendRequest = { ...backendRequest, stream: true };

    this.logger.debug('Resolved model', {
      requestId,
      requested: request.model,
      baseModel: spec.baseModel,
      effort: spec.effort,
    });

    return this.pool.submit(
      async () => {
        const response = await this.dispatchStream(upstreamRequest, signal);
        const translator = new StreamTranslator(spec.baseModel);
        const contentType = (response.headers.get('content-type') ?? '').toLowerCase();

        if (contentType.includes('text/event-stream') && response.body) {
          sink.open();
          await this.pump(response.body, translator, sink, requestId, signal);
          if (signal?.aborted) throw Errors.clientClosed();
          return translator.snapshot();
        }

        // A backend that answered with one JSON document is replayed as a stream
        const body = await response.text();
        if (contentType.includes('json')) {
          const backendResponse = parseBackendBody(contentType, body);
          sink.open();
          await this.emit(this.replay(translator, backendResponse), sink);
          sink.end();
          return translator.snapshot();
        }

        throw Errors.malformedUpstream(`Backend returned unexpected content type: ${contentType || 'none'}`, {
          bodyExcerpt: body.substring(0, EXCERPT_LENGTH),
        });
      },
      { requestId, abortSignal: signal }
    );
  }

  /**
   * Dispatch a streaming request. `requestTimeoutMs` bounds the wait for the
   * response headers only; once the body flows, the stream may run longer.
   */
  private async dispatchStream(request: BackendRequest, signal?: AbortSignal): Promise<Response> {
    const timeout = withTimeout(signal, this.options.requestTimeoutMs);

    try {
      return await this.dispatcher.dispatch(request, timeout.signal);
    } catch (err) {
      if (timeout.didTimeOut()) throw Errors.timeout(this.options.requestTimeoutMs);
      if (signal?.aborted) throw Errors.clientClosed();
      throw err;
    } finally {
      timeout.dispose();
    }
  }

  private async fetchBuffered(request: BackendRequest, signal?: AbortSignal): Promise<BackendResponse> {
    const timeout = withTimeout(signal, this.options.requestTimeoutMs);

    try {
      const response = await this.dispatcher.dispatch(request, timeout.signal);
      const body = await response.text();
      return parseBackendBody(response.headers.get('content-type'), body);
    } catch (err) {
      if (timeout.didTimeOut()) throw Errors.timeout(this.options.requestTimeoutMs);
      if (signal?.aborted) throw Errors.clientClosed();
      throw err;
    } finally {
      timeout.dispose();
    }
  }

  private replay(translator: StreamTranslator, response: BackendResponse): StreamFrame[] {
    const type = response.status === 'incomplete' ? BackendEvents.INCOMPLETE : BackendEvents.COMPLETED;
    return translator.handle({ kind: 'event', data: JSON.stringify({ type, response }) });
  }

  private async emit(frames: StreamFrame[], sink: ChunkSink): Promise<void> {
    for (const frame of frames) {
      await sink.write(encodeFrame(frame));
    }
  }

  /**
   * Read the backend body, translating records as they complete.
   * Stops reading (and cancels the backend body) once the stream is terminal
   * or the client has gone away.
   */
  private async pump(
    body: NonNullable<Response['body']>,
    translator: StreamTranslator,
    sink: ChunkSink,
    requestId: string,
    signal?: AbortSignal
  ): Promise<void> {
    const reader = body.getReader();
    const decoder = new TextDecoder();
    const parser = new SseParser();
    let exhausted = false;

    const cancelReader = () => {
      reader.cancel().catch((err: unknown) => {
        this.logger.debug('Cancelling backend body failed', {
          requestId,
          error: err instanceof Error ? err.message : String(err),
        });
      });
    };
    signal?.addEventListener('abort', cancelReader, { once: true });

    try {
      while (!translator.terminated && !signal?.aborted) {
        const { done, value } = await reader.read();
        if (done) {
          exhausted = true;
          break;
        }

        for (const record of parser.push(decoder.decode(value, { stream: true }))) {
          await this.emit(translator.handle(record), sink);
          if (translator.terminated) break;
        }
      }

      if (exhausted && !translator.terminated) {
        for (const record of [...parser.push(decoder.decode()), ...parser.flush()]) {
          await this.emit(translator.handle(record), sink);
        }
        await this.emit(translator.end(), sink);
      }
    } catch (err) {
      if (signal?.aborted) {
        this.logger.info('Client disconnected, backend stream aborted', { requestId });
      } else {
        const message = err instanceof Error ? err.message : String(err);
        this.logger.warn('Backend stream interrupted', { requestId, error: message });
        await this.emit(translator.fail(`Backend stream interrupted: ${message}`), sink);
      }
    } finally {
      signal?.removeEventListener('abort', cancelReader);
      if (!exhausted) cancelReader();
      sink.end();
    }

    const state = translator.snapshot();
    if (state.phase === 'failed') {
      this.logger.warn('Stream ended in failed state', { requestId, textLength: state.accumulatedText.length });
    }
  }
}
