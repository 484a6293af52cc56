/**
 * Entry point: starts the registration lifecycle simulator.
 *
 * Usage: node dist/server/server.js [port]
 */

import { config, parsePortArgument } from '../shared/config';
import { createLogger } from '../shared/logger';
import { toErrorMessage } from '../shared/error-utils';
import { LifecycleStreamingServer } from '../mock-server';
import { serviceRegistry, setupGracefulShutdown } from './service-registry';

const logger = createLogger('Main');

function resolvePort(argument: string | undefined): number {
  if (argument === undefined) {
    return config.streaming.port;
  }
  const port = parsePortArgument(argument);
  if (port === null) {
    logger.warn(`Invalid port argument '${argument}', using ${config.streaming.port}`);
    return config.streaming.port;
  }
  return port;
}

async function startServer(): Promise<void> {
  const streamingServer = new LifecycleStreamingServer({ port: resolvePort(process.argv[2]) });

  serviceRegistry.register(streamingServer, {
    // Leave room for the abort flush after the grace period
    shutdownTimeoutMs: config.streaming.shutdownGraceMs + 2000,
  });

  try {
    await serviceRegistry.initialize();
    setupGracefulShutdown(serviceRegistry);
    logger.info(`Registration lifecycle mock listening on ${config.streaming.host}:${streamingServer.getPort()}`);
  } catch (error: unknown) {
    logger.error(`Failed to start server: ${toErrorMessage(error)}`);
    process.exit(1);
  }
}

process.on('unhandledRejection', (reason: unknown) => {
  logger.error(`Unhandled promise rejection: ${toErrorMessage(reason)}`);
});

void startServer();
