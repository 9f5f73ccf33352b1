import { createServer, Server } from 'node:http';
import type { Socket } from 'node:net';
import { loadConfig, createLogger, configWarnings } from './config.js';
import { createApp } from './app.js';
import { loadCredentials } from './lib/credentials.js';
import { HttpBackendDispatcher } from './lib/backend-client.js';
import { DispatchPool } from './lib/dispatch-pool.js';
import { Translator } from './lib/translator.js';

// Load configuration
const config = loadConfig();
const logger = createLogger(config.logLevel);

for (const warning of configWarnings(config)) {
  logger.warn(warning, { backendUrl: config.backendUrl });
}

const credentials = await loadCredentials(config.authPath).catch((err: unknown) => {
  logger.error('Unable to load backend credentials', {
    authPath: config.authPath,
    error: err instanceof Error ? err.message : String(err),
  });
  return process.exit(1);
});

logger.info('Loaded backend credentials', { authPath: config.authPath, kind: credentials.kind });

const dispatchPool = new DispatchPool(config, logger);
const dispatcher = new HttpBackendDispatcher({ backendUrl: config.backendUrl, credentials, logger });
const translator = new Translator(config, dispatcher, dispatchPool, logger);

const app = createApp({ config, translator, dispatchPool, logger });

// Create HTTP server
const server: Server = createServer(app);

// Track active connections for graceful shutdown
const connections = new Set<Socket>();

server.on('connection', (conn) => {
  connections.add(conn);
  conn.on('close', () => connections.delete(conn));
});

// Graceful shutdown handler
let isShuttingDown = false;

async function shutdown(signal: string): Promise<void> {
  if (isShuttingDown) return;
  isShuttingDown = true;

  logger.info(`Received ${signal}, starting graceful shutdown...`);

  // Stop accepting new connections
  server.close(() => {
    logger.info('HTTP server closed');
  });

  // Close idle keep-alive connections; in-flight streams finish below
  server.closeIdleConnections();

  // Give existing connections time to drain
  const drainTimeout = 30000; // 30 seconds
  const forceTimeout = 35000; // 35 seconds

  // Force exit timeout
  const forceTimer = setTimeout(() => {
    logger.error('Forced shutdown due to timeout');
    process.exit(1);
  }, forceTimeout);

  // Drain timeout
  const drainTimer = setTimeout(() => {
    if (connections.size > 0) {
      logger.warn(`Force closing ${connections.size} remaining connections`);
      connections.forEach((conn) => conn.destroy());
    }
  }, drainTimeout);

  // Wait for in-flight backend requests
  await dispatchPool.shutdown();

  // Wait for connections to drain
  const drainInterval = setInterval(() => {
    if (connections.size === 0) {
      clearInterval(drainInterval);
      clearTimeout(drainTimer);
      clearTimeout(forceTimer);
      logger.info('Graceful shutdown complete');
      process.exit(0);
    }
  }, 100);
}

function requestShutdown(signal: string): void {
  shutdown(signal).catch((err: unknown) => {
    logger.error('Shutdown failed', { error: err instanceof Error ? err.message : String(err) });
    process.exit(1);
  });
}

// Register signal handlers
process.on('SIGTERM', () => requestShutdown('SIGTERM'));
process.on('SIGINT', () => requestShutdown('SIGINT'));

// Handle uncaught errors
process.on('uncaughtException', (err) => {
  logger.error('Uncaught exception', { error: err.message, stack: err.stack });
  requestShutdown('uncaughtException');
});

process.on('unhandledRejection', (reason) => {
  logger.error('Unhandled rejection', { reason: String(reason) });
  // Don't shutdown on unhandled rejection, just log
});

// Start server
server.listen(config.port, () => {
  logger.info(`Responses bridge listening on port ${config.port}`, {
    nodeVersion: process.version,
    logLevel: config.logLevel,
    backendUrl: config.backendUrl,
    allowedModels: config.allowedModels,
    upstreamConcurrency: config.upstreamConcurrency,
    maxQueueSize: config.maxQueueSize,
  });
});
