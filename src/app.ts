import express, { Express, Request, Response, NextFunction, ErrorRequestHandler } from 'express';
import helmet from 'helmet';
import cors from 'cors';
import { v4 as uuidv4 } from 'uuid';
import type { Config, Logger } from './config.js';
import { createAuthMiddleware } from './lib/auth.js';
import { ApiError, Errors } from './lib/errors.js';
import type { DispatchPool } from './lib/dispatch-pool.js';
import type { Translator } from './lib/translator.js';
import { createHealthRouter } from './routes/health.js';
import { createOpenAIRouter, toOpenAIError } from './routes/openai.js';

export interface AppDependencies {
  config: Pick<Config, 'proxyApiKey' | 'allowedModels' | 'logLevel'>;
  translator: Translator;
  dispatchPool: DispatchPool;
  logger: Logger;
}

/**
 * express.json() reports unparseable bodies as a SyntaxError carrying the raw body
 */
function isBodyParseError(err: unknown): err is SyntaxError & { status: number } {
  return err instanceof SyntaxError && 'body' in err && 'status' in err && err.status === 400;
}

/**
 * Build the Express application
 */
export function createApp({ config, translator, dispatchPool, logger }: AppDependencies): Express {
  const app = express();

  // Security middleware
  app.use(helmet());
  app.use(cors());

  // Body parsing (conversations with inline images get large)
  app.use(express.json({ limit: '20mb' }));

  // Request ID middleware
  app.use((req: Request, res: Response, next: NextFunction) => {
    const header = req.headers['x-request-id'];
    const requestId = typeof header === 'string' && header.length > 0 ? header : uuidv4();
    res.setHeader('X-Request-ID', requestId);
    next();
  });

  // Health check (no auth required)
  app.use(createHealthRouter(dispatchPool));

  // OpenAI routes, with and without the /v1 prefix
  const authMiddleware = createAuthMiddleware(config.proxyApiKey);
  const openaiRouter = createOpenAIRouter(translator, config.allowedModels, authMiddleware, logger);
  app.use('/v1', openaiRouter);
  app.use('/', openaiRouter);

  // 404 handler
  app.use((req: Request, _res: Response, next: NextFunction) => {
    next(Errors.notFound(req.method, req.path));
  });

  // Global error handler
  const errorHandler: ErrorRequestHandler = (err: unknown, _req: Request, res: Response, _next: NextFunction): void => {
    if (isBodyParseError(err)) {
      const error = Errors.invalidJson(err.message);
      res.status(error.statusCode).json(toOpenAIError(error));
      return;
    }

    if (err instanceof ApiError) {
      if (err.statusCode >= 500) {
        logger.error('Request error', { code: err.code, error: err.message });
      }
      res.status(err.statusCode).json(toOpenAIError(err));
      return;
    }

    logger.error('Request error', {
      error: err instanceof Error ? err.message : String(err),
      stack: config.logLevel === 'debug' && err instanceof Error ? err.stack : undefined,
    });

    // Handle unexpected errors
    const internalError = Errors.internalError();
    res.status(internalError.statusCode).json(toOpenAIError(internalError));
  };

  app.use(errorHandler);

  return app;
}
