/**
 * Centralized configuration for the registration lifecycle mock.
 *
 * Reads environment variables with defaults.
 */

export type LogLevelName = 'debug' | 'info' | 'warn' | 'error';

const LOG_LEVEL_NAMES: readonly LogLevelName[] = ['debug', 'info', 'warn', 'error'];

function readLogLevel(value: string | undefined): LogLevelName {
  const normalized = value?.toLowerCase();
  return LOG_LEVEL_NAMES.find(level => level === normalized) ?? 'info';
}

/**
 * Non-negative millisecond count; 0 is a valid value.
 */
export function readDurationMs(value: string | undefined, fallback: number): number {
  if (value === undefined || value.trim() === '') {
    return fallback;
  }
  const ms = Number(value);
  return Number.isFinite(ms) && ms >= 0 ? ms : fallback;
}

export const config = {
  /**
   * Streaming lifecycle simulator (gRPC)
   */
  streaming: {
    host: process.env.STREAMING_HOST || '0.0.0.0',
    port: parsePortArgument(process.env.STREAMING_PORT) ?? 50052,

    // In-flight calls get this long to finish before they are aborted
    shutdownGraceMs: readDurationMs(process.env.STREAMING_SHUTDOWN_GRACE_MS, 5000),
  },

  /**
   * Logging
   */
  logging: {
    level: readLogLevel(process.env.LOG_LEVEL),
    colorize: process.env.NODE_ENV !== 'production',
  },
};

/**
 * Type-safe access to config
 */
export type Config = typeof config;

/**
 * Port from a command-line argument, or null when the argument is not a
 * usable TCP port (0 is accepted and binds an ephemeral port).
 */
export function parsePortArgument(value: string | undefined): number | null {
  if (value === undefined || !/^\d+$/.test(value)) {
    return null;
  }
  const port = Number(value);
  return port <= 65535 ? port : null;
}
