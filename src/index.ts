#!/usr/bin/env node
import process from 'node:process';

import { parseCliArgs, renderCliUsage } from './cli.js';
import { serverVersion } from './config/index.js';
import { createPipeline } from './http/pipeline.js';
import { routeHandler } from './http/router.js';
import { startHttpServer } from './http/server.js';
import { cors } from './middleware/cors.js';
import { requestLogger } from './middleware/request-logger.js';
import { createDemoRoutes } from './routes.js';
import { logError, logInfo } from './services/logger.js';

const FORCED_SHUTDOWN_MS = 10_000;

const parsed = parseCliArgs(process.argv.slice(2));

if (!parsed.ok) {
  process.stderr.write(`${parsed.message}\n\n${renderCliUsage()}`);
  process.exit(1);
}

const { values } = parsed;

if (values.help) {
  process.stdout.write(renderCliUsage());
  process.exit(0);
}

if (values.version) {
  process.stdout.write(`${serverVersion}\n`);
  process.exit(0);
}

process.on('uncaughtException', (error) => {
  logError('Uncaught exception', error);
  process.exit(1);
});

process.on('unhandledRejection', (reason) => {
  const error = reason instanceof Error ? reason : new Error(String(reason));
  logError('Unhandled rejection', error);
});

const pipeline = createPipeline({
  middleware: [requestLogger(), cors()],
  handler: routeHandler(createDemoRoutes()),
});

let isShuttingDown = false;

try {
  const server = await startHttpServer({
    pipeline,
    host: values.host,
    port: values.port,
  });

  process.stdout.write(
    `HTTP server running at http://${server.host}:${server.port}\n`
  );

  const shutdown = async (signal: string): Promise<void> => {
    if (isShuttingDown) return;
    isShuttingDown = true;

    logInfo(`${signal} received, shutting down gracefully...`);
    setTimeout(() => {
      logError('Forced shutdown after timeout');
      process.exit(1);
    }, FORCED_SHUTDOWN_MS).unref();

    await server.shutdown(signal);
    process.exit(0);
  };

  process.on('SIGINT', () => {
    void shutdown('SIGINT');
  });
  process.on('SIGTERM', () => {
    void shutdown('SIGTERM');
  });
} catch (error) {
  logError('Failed to start server', error instanceof Error ? error : undefined);
  process.exit(1);
}
