import { parseAllowedModels } from './lib/model-router.js';

/**
 * Application configuration loaded from environment variables
 */
export interface Config {
  /** Server port */
  port: number;
  /** Path to the auth JSON file holding backend credentials */
  authPath: string;
  /** Ordered, deduplicated base models the bridge accepts and advertises */
  allowedModels: readonly string[];
  /**
   * Responses API endpoint of the backend. The default Codex endpoint only
   * answers streamed requests, so it needs `forceUpstreamStream` for
   * non-streaming clients (see `configWarnings`).
   */
  backendUrl: string;
  /** Optional API key for authenticating bridge requests */
  proxyApiKey?: string;
  /** Request timeout in milliseconds (non-streaming requests) */
  requestTimeoutMs: number;
  /** Log level */
  logLevel: 'debug' | 'info' | 'warn' | 'error';
  /** Number of concurrent upstream requests */
  upstreamConcurrency: number;
  /** Maximum requests in queue before rejecting */
  maxQueueSize: number;
  /** Maximum time a request can wait in queue in ms */
  queueTimeoutMs: number;
  /** Instructions sent when the conversation has no leading system message */
  defaultInstructions: string;
  /** Always request an event stream from the backend, even for non-streaming clients */
  forceUpstreamStream: boolean;
}

export const DEFAULT_BACKEND_URL = 'https://chatgpt.com/backend-api/codex/responses';

export const DEFAULT_INSTRUCTIONS =
  'You are a helpful AI assistant. Provide clear, accurate, and concise responses to user questions and requests.';

const LOG_LEVELS: ReadonlyArray<Config['logLevel']> = ['debug', 'info', 'warn', 'error'];

function isLogLevel(value: string): value is Config['logLevel'] {
  return (LOG_LEVELS as readonly string[]).includes(value);
}

/**
 * Load and validate configuration from environment variables
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const port = parseInt(env.PORT || '8080', 10);
  const authPath = env.AUTH_PATH || '~/.codex/auth.json';
  const allowedModels = parseAllowedModels(env.ALLOWED_MODELS);
  const backendUrl = env.BACKEND_URL || DEFAULT_BACKEND_URL;
  const proxyApiKey = env.PROXY_API_KEY || undefined;
  const requestTimeoutMs = parseInt(env.REQUEST_TIMEOUT_MS || '300000', 10);
  const logLevel = env.LOG_LEVEL || 'info';
  const upstreamConcurrency = parseInt(env.UPSTREAM_CONCURRENCY || '8', 10);
  const maxQueueSize = parseInt(env.MAX_QUEUE_SIZE || '100', 10);
  const queueTimeoutMs = parseInt(env.QUEUE_TIMEOUT_MS || '60000', 10);
  const defaultInstructions = env.DEFAULT_INSTRUCTIONS || DEFAULT_INSTRUCTIONS;
  const forceUpstreamStream = ['1', 'true', 'yes'].includes((env.FORCE_UPSTREAM_STREAM || '').toLowerCase());

  // Validation
  if (isNaN(port) || port < 1 || port > 65535) {
    throw new Error('PORT must be a valid port number (1-65535)');
  }

  try {
    new URL(backendUrl);
  } catch {
    throw new Error(`BACKEND_URL must be an absolute URL, got: ${backendUrl}`);
  }

  if (isNaN(requestTimeoutMs) || requestTimeoutMs < 1000) {
    throw new Error('REQUEST_TIMEOUT_MS must be at least 1000ms');
  }

  if (!isLogLevel(logLevel)) {
    throw new Error('LOG_LEVEL must be one of: debug, info, warn, error');
  }

  if (isNaN(upstreamConcurrency) || upstreamConcurrency < 1) {
    throw new Error('UPSTREAM_CONCURRENCY must be at least 1');
  }

  if (isNaN(maxQueueSize) || maxQueueSize < 1) {
    throw new Error('MAX_QUEUE_SIZE must be at least 1');
  }

  if (isNaN(queueTimeoutMs) || queueTimeoutMs < 1000) {
    throw new Error('QUEUE_TIMEOUT_MS must be at least 1000ms');
  }

  return Object.freeze({
    port,
    authPath,
    allowedModels,
    backendUrl,
    proxyApiKey,
    requestTimeoutMs,
    logLevel,
    upstreamConcurrency,
    maxQueueSize,
    queueTimeoutMs,
    defaultInstructions,
    forceUpstreamStream,
  });
}

/**
 * Settings that load fine but are known not to work together
 */
export function configWarnings(config: Pick<Config, 'backendUrl' | 'forceUpstreamStream'>): string[] {
  const warnings: string[] = [];

  if (config.backendUrl === DEFAULT_BACKEND_URL && !config.forceUpstreamStream) {
    warnings.push(
      'The default backend only answers streamed requests; set FORCE_UPSTREAM_STREAM=true or non-streaming clients will get 502 errors'
    );
  }

  return warnings;
}

/**
 * Simple logger that respects log level
 */
export function createLogger(level: Config['logLevel']) {
  const levels = { debug: 0, info: 1, warn: 2, error: 3 };
  const currentLevel = levels[level];

  const log = (msgLevel: Config['logLevel'], message: string, data?: Record<string, unknown>) => {
    if (levels[msgLevel] >= currentLevel) {
      const timestamp = new Date().toISOString();
      const logData = data ? ` ${JSON.stringify(data)}` : '';
      console.log(`[${timestamp}] [${msgLevel.toUpperCase()}] ${message}${logData}`);
    }
  };

  return {
    debug: (message: string, data?: Record<string, unknown>) => log('debug', message, data),
    info: (message: string, data?: Record<string, unknown>) => log('info', message, data),
    warn: (message: string, data?: Record<string, unknown>) => log('warn', message, data),
    error: (message: string, data?: Record<string, unknown>) => log('error', message, data),
  };
}

export type Logger = ReturnType<typeof createLogger>;
