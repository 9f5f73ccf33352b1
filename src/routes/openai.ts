import { Router, Request, Response, NextFunction, RequestHandler } from 'express';
import { v4 as uuidv4 } from 'uuid';
import type { ChatCompletionRequest, OpenAIErrorResponse } from '../types/openai.js';
import {
  logUnsupportedParams,
  validateChatCompletionRequest,
} from '../lib/request-converter.js';
import { createModelsResponse } from '../lib/model-router.js';
import { ApiError, Errors } from '../lib/errors.js';
import type { ChunkSink, Translator } from '../lib/translator.js';
import type { Logger } from '../config.js';

/**
 * Convert ApiError to OpenAI-style error response
 */
export function toOpenAIError(error: ApiError): OpenAIErrorResponse {
  const type = error.statusCode < 500 && error.statusCode !== 429 ? 'invalid_request_error' : 'api_error';

  return {
    error: {
      message: error.message,
      type: error.code === 'upstream_auth_error' ? 'authentication_error' : type,
      param: error.param,
      code: error.code,
    },
  };
}

/**
 * SSE sink over an Express response, honoring socket backpressure
 */
function createSseSink(res: Response): ChunkSink {
  return {
    open: () => {
      res.status(200);
      res.setHeader('Content-Type', 'text/event-stream');
      res.setHeader('Cache-Control', 'no-cache');
      res.setHeader('Connection', 'keep-alive');
      res.flushHeaders();
    },
    write: (data: string) =>
      new Promise<void>((resolve) => {
        if (res.destroyed || res.writableEnded) {
          resolve();
          return;
        }
        if (res.write(data)) {
          resolve();
          return;
        }
        // Slow client: wait for the socket to drain (or go away)
        const settle = () => {
          res.off('drain', settle);
          res.off('close', settle);
          resolve();
        };
        res.on('drain', settle);
        res.on('close', settle);
      }),
    end: () => {
      if (!res.writableEnded) res.end();
    },
  };
}

/**
 * Create OpenAI-compatible routes. `auth` guards each route, not the mount path,
 * so unknown paths still reach the 404 handler.
 */
export function createOpenAIRouter(
  translator: Translator,
  allowedModels: readonly string[],
  auth: RequestHandler,
  logger: Logger
): Router {
  const router = Router();

  /**
   * GET /models
   * List every advertised model identifier
   */
  router.get('/models', auth, (_req: Request, res: Response) => {
    res.json(createModelsResponse(allowedModels));
  });

  /**
   * POST /chat/completions
   * Create a chat completion (OpenAI-compatible)
   */
  router.post('/chat/completions', auth, async (req: Request, res: Response, next: NextFunction) => {
    const requestId = uuidv4();
    const startTime = Date.now();

    logger.info('Received OpenAI chat completion request', { requestId });

    const validationError = validateChatCompletionRequest(req.body);
    if (validationError) {
      const error = Errors.invalidRequest(validationError);
      res.status(error.statusCode).json(toOpenAIError(error));
      return;
    }

    const body: ChatCompletionRequest = req.body;

    logUnsupportedParams(body, logger);

    logger.debug('Converting chat completion request', {
      requestId,
      model: body.model,
      messageCount: body.messages.length,
      stream: body.stream === true,
    });

    // Create abort controller for client disconnect handling
    const abortController = new AbortController();

    // Abort if client disconnects prematurely (before response is sent)
    const onClose = () => {
      if (!res.writableFinished) {
        logger.info('Client disconnected, aborting request', { requestId });
        abortController.abort();
      }
    };
    res.on('close', onClose);

    try {
      if (body.stream === true) {
        const state = await translator.stream(body, createSseSink(res), requestId, abortController.signal);

        logger.info('OpenAI streaming request finished', {
          requestId,
          durationMs: Date.now() - startTime,
          phase: state.phase,
          finishReason: state.finishReason,
          textLength: state.accumulatedText.length,
        });
        return;
      }

      const response = await translator.complete(body, requestId, abortController.signal);

      logger.info('OpenAI chat completion request completed', {
        requestId,
        durationMs: Date.now() - startTime,
        resultLength: response.choices[0]?.message.content.length ?? 0,
        finishReason: response.choices[0]?.finish_reason ?? null,
      });

      res.json(response);
    } catch (err) {
      if (abortController.signal.aborted) {
        logger.debug('Dropping error for disconnected client', {
          requestId,
          error: err instanceof Error ? err.message : String(err),
        });
        return;
      }

      // Headers already sent: the stream was opened, so end it with an error record
      if (res.headersSent) {
        const message = err instanceof Error ? err.message : String(err);
        logger.error('Streaming request failed after headers were sent', { requestId, error: message });
        if (!res.writableEnded) {
          const code = err instanceof ApiError ? err.code : 'internal_error';
          res.end(`data: ${JSON.stringify({ error: { message, type: 'upstream_error', code } })}\n\n`);
        }
        return;
      }

      // Convert errors to OpenAI format
      if (err instanceof ApiError) {
        logger.warn('OpenAI chat completion request failed', {
          requestId,
          code: err.code,
          statusCode: err.statusCode,
          message: err.message,
          details: err.details,
        });
        res.status(err.statusCode).json(toOpenAIError(err));
        return;
      }
      next(err);
    } finally {
      res.off('close', onClose);
    }
  });

  return router;
}
