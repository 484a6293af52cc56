/**
 * LifecycleStreamingServer: the gRPC listener for the lifecycle simulator.
 *
 * Each streaming call gets its own StreamSession. The script registry and
 * listing snapshot are the only data shared between calls, and both are frozen.
 *
 * @example
 * ```typescript
 * const server = new LifecycleStreamingServer({ port: 0 });
 * const port = await server.start();
 * // ... exercise clients against localhost:port
 * await server.stop();
 * ```
 */

import { EventEmitter } from 'events';
import * as grpc from '@grpc/grpc-js';
import { config } from '../shared/config';
import { createLogger } from '../shared/logger';
import { toErrorMessage } from '../shared/error-utils';
import type { Scheduler, SessionOutcome, SessionSummary } from './types/stream-types';
import { PhaseScriptRegistry } from './scripts/script-registry';
import { createListingSnapshot } from './listing-snapshot';
import type { ListingSnapshot } from './listing-snapshot';
import { createRegistrationHandlers } from './registration-service';
import { DEFAULT_PROTO_PATH, loadRegistrationService } from './proto-loader';

const logger = createLogger('LifecycleStreamingServer');

/** Bound on waiting for aborted sessions to flush their status */
const ABORT_FLUSH_MS = 1000;

export interface StreamingServerOptions {
  host?: string;
  /** 0 binds an ephemeral port */
  port?: number;
  shutdownGraceMs?: number;
  registry?: PhaseScriptRegistry;
  snapshot?: ListingSnapshot;
  scheduler?: Scheduler;
  protoPath?: string;
}

export interface StreamingServerStats {
  port: number | null;
  activeSessions: number;
  outcomes: Record<SessionOutcome, number>;
}

function settlesWithin(promise: Promise<void>, ms: number): Promise<boolean> {
  return new Promise<boolean>((resolve) => {
    const timer = setTimeout(() => resolve(false), ms);
    void promise.then(() => {
      clearTimeout(timer);
      resolve(true);
    });
  });
}

export class LifecycleStreamingServer extends EventEmitter {
  readonly name = 'lifecycle-streaming';

  private readonly host: string;
  private readonly port: number;
  private readonly shutdownGraceMs: number;
  private readonly registry: PhaseScriptRegistry;
  private readonly snapshot: ListingSnapshot;
  private readonly scheduler?: Scheduler;
  private readonly protoPath: string;

  private server: grpc.Server | null = null;
  private starting: Promise<number> | null = null;
  private boundPort: number | null = null;
  private shutdownController = new AbortController();
  private readonly activeSessions = new Set<string>();
  private outcomes: Record<SessionOutcome, number> = {
    completed: 0,
    cancelled: 0,
    interrupted: 0,
    failed: 0,
  };

  constructor(options: StreamingServerOptions = {}) {
    super();
    this.host = options.host ?? config.streaming.host;
    this.port = options.port ?? config.streaming.port;
    this.shutdownGraceMs = options.shutdownGraceMs ?? config.streaming.shutdownGraceMs;
    this.registry = options.registry ?? new PhaseScriptRegistry();
    this.snapshot = options.snapshot ?? createListingSnapshot();
    this.scheduler = options.scheduler;
    this.protoPath = options.protoPath ?? DEFAULT_PROTO_PATH;
  }

  /**
   * Bind and start serving. Resolves with the bound port.
   */
  async start(): Promise<number> {
    if (this.server || this.starting) {
      throw new Error('LifecycleStreamingServer is already running');
    }

    this.starting = this.listen();
    try {
      return await this.starting;
    } finally {
      this.starting = null;
    }
  }

  private async listen(): Promise<number> {
    const service = loadRegistrationService(this.protoPath);
    const server = new grpc.Server();
    this.shutdownController = new AbortController();

    server.addService(
      service.service,
      createRegistrationHandlers({
        registry: this.registry,
        snapshot: this.snapshot,
        shutdownSignal: this.shutdownController.signal,
        scheduler: this.scheduler,
        onSessionStart: (session) => {
          this.activeSessions.add(session.id);
        },
        onSessionEnd: (summary) => this.recordSessionEnd(summary),
      })
    );

    const port = await new Promise<number>((resolve, reject) => {
      server.bindAsync(
        `${this.host}:${this.port}`,
        grpc.ServerCredentials.createInsecure(),
        (error, boundPort) => {
          if (error) {
            reject(error);
            return;
          }
          resolve(boundPort);
        }
      );
    });

    this.server = server;
    this.boundPort = port;
    logger.info(`gRPC server started on ${this.host}:${port}`, {
      kinds: this.registry.kinds(),
    });
    return port;
  }

  /**
   * Graceful stop: refuse new calls and let in-flight ones finish within the
   * grace period. Sessions still running after that are aborted (their
   * callers receive INTERNAL) and the server is forced down.
   */
  async stop(): Promise<void> {
    // A stop issued mid-bind takes effect once the bind settles
    if (this.starting) {
      try {
        await this.starting;
      } catch (err: unknown) {
        logger.warn(`Stop requested after a failed start: ${toErrorMessage(err)}`);
        return;
      }
    }

    const server = this.server;
    if (!server) return;
    this.server = null;

    logger.info('Stopping gRPC server...', { activeSessions: this.activeSessions.size });

    const drained = new Promise<void>((resolve) => {
      server.tryShutdown(() => resolve());
    });

    if (await settlesWithin(drained, this.shutdownGraceMs)) {
      logger.info('gRPC server stopped');
      this.boundPort = null;
      return;
    }

    logger.warn(
      `gRPC server did not drain within ${this.shutdownGraceMs}ms; aborting ${this.activeSessions.size} session(s)`
    );
    this.shutdownController.abort();

    if (!(await settlesWithin(drained, ABORT_FLUSH_MS))) {
      server.forceShutdown();
    }
    this.boundPort = null;
    logger.info('gRPC server stopped (forced)');
  }

  getPort(): number | null {
    return this.boundPort;
  }

  // Service lifecycle hooks for the process ServiceRegistry

  async initialize(): Promise<void> {
    await this.start();
  }

  async shutdown(): Promise<void> {
    await this.stop();
  }

  isHealthy(): boolean {
    return this.server !== null;
  }

  getStats(): StreamingServerStats {
    return {
      port: this.boundPort,
      activeSessions: this.activeSessions.size,
      outcomes: { ...this.outcomes },
    };
  }

  private recordSessionEnd(summary: SessionSummary): void {
    this.activeSessions.delete(summary.sessionId);
    this.outcomes[summary.outcome]++;
    this.emit('session-end', summary);
  }
}
