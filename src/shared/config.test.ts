import { describe, it, expect, afterEach, jest } from '@jest/globals';
import { config, parsePortArgument, readDurationMs } from './config';

describe('config', () => {
  it('should default the streaming listener', () => {
    expect(config.streaming.host).toBe('0.0.0.0');
    expect(config.streaming.port).toBe(50052);
    expect(config.streaming.shutdownGraceMs).toBe(5000);
  });

  it('should take the log level from the test setup', () => {
    expect(config.logging.level).toBe('error');
  });
});

describe('parsePortArgument', () => {
  it('should accept valid ports', () => {
    expect(parsePortArgument('8080')).toBe(8080);
    expect(parsePortArgument('65535')).toBe(65535);
    expect(parsePortArgument('0')).toBe(0);
  });

  it('should reject anything else', () => {
    expect(parsePortArgument(undefined)).toBeNull();
    expect(parsePortArgument('')).toBeNull();
    expect(parsePortArgument('abc')).toBeNull();
    expect(parsePortArgument('-1')).toBeNull();
    expect(parsePortArgument('80.5')).toBeNull();
    expect(parsePortArgument('65536')).toBeNull();
  });
});

describe('readDurationMs', () => {
  it('should accept zero and positive values', () => {
    expect(readDurationMs('0', 5000)).toBe(0);
    expect(readDurationMs('250', 5000)).toBe(250);
  });

  it('should fall back when unset or unusable', () => {
    expect(readDurationMs(undefined, 5000)).toBe(5000);
    expect(readDurationMs('', 5000)).toBe(5000);
    expect(readDurationMs('soon', 5000)).toBe(5000);
    expect(readDurationMs('-10', 5000)).toBe(5000);
  });
});

describe('config from the environment', () => {
  const saved = {
    port: process.env.STREAMING_PORT,
    grace: process.env.STREAMING_SHUTDOWN_GRACE_MS,
  };

  afterEach(() => {
    restore('STREAMING_PORT', saved.port);
    restore('STREAMING_SHUTDOWN_GRACE_MS', saved.grace);
  });

  function restore(name: string, value: string | undefined): void {
    if (value === undefined) {
      delete process.env[name];
    } else {
      process.env[name] = value;
    }
  }

  it('should honour an ephemeral port and a zero grace period', async () => {
    process.env.STREAMING_PORT = '0';
    process.env.STREAMING_SHUTDOWN_GRACE_MS = '0';

    await jest.isolateModulesAsync(async () => {
      const { config: fresh } = await import('./config');
      expect(fresh.streaming.port).toBe(0);
      expect(fresh.streaming.shutdownGraceMs).toBe(0);
    });
  });

  it('should ignore an out-of-range port', async () => {
    process.env.STREAMING_PORT = '70000';

    await jest.isolateModulesAsync(async () => {
      const { config: fresh } = await import('./config');
      expect(fresh.streaming.port).toBe(50052);
    });
  });
});
