/**
 * StreamSession: per-call emission engine.
 *
 * Walks a phase script with an explicit cursor, writing one event per phase
 * and sleeping between phases through a cancellable scheduler. Owned by a
 * single call and discarded when it ends.
 *
 * Exit paths:
 * - script exhausted: `sink.end()`, outcome `completed`
 * - caller cancelled: nothing written, outcome `cancelled`
 * - server shutting down: `sink.fail(INTERNAL)`, outcome `interrupted`
 * - anything else thrown: `sink.fail(INTERNAL)`, outcome `failed`
 */

import { randomUUID } from 'crypto';
import { status } from '@grpc/grpc-js';
import type {
  EventSink,
  OperationKind,
  PhaseScript,
  Scheduler,
  SessionOutcome,
  SessionSummary,
} from './types/stream-types';
import { EmissionInterruptedError, SessionAlreadyStartedError } from './errors';
import { timerScheduler } from './scheduler';
import { createLogger } from '../shared/logger';
import { toErrorMessage, toRpcError } from '../shared/error-utils';
import type { RpcError } from '../shared/error-utils';

const logger = createLogger('StreamSession');

export interface StreamSessionOptions {
  kind: OperationKind;
  /** Name of the entity being registered, for logs and summaries */
  subject: string;
  script: PhaseScript;
  sink: EventSink;
  /** Aborted by the server when it stops; running sessions then fail */
  shutdownSignal?: AbortSignal;
  scheduler?: Scheduler;
  sessionId?: string;
}

type AbortCause = 'client' | 'shutdown';

export class StreamSession {
  readonly id: string;
  readonly kind: OperationKind;
  readonly subject: string;

  private readonly script: PhaseScript;
  private readonly sink: EventSink;
  private readonly scheduler: Scheduler;
  private readonly shutdownSignal?: AbortSignal;
  private readonly controller = new AbortController();

  private cursor = 0;
  private started = false;
  private startedAtMs = 0;
  private durationMs = 0;
  private abortCause: AbortCause | null = null;
  private outcome: SessionOutcome | null = null;

  constructor(options: StreamSessionOptions) {
    this.id = options.sessionId ?? randomUUID();
    this.kind = options.kind;
    this.subject = options.subject;
    this.script = options.script;
    this.sink = options.sink;
    this.scheduler = options.scheduler ?? timerScheduler;
    this.shutdownSignal = options.shutdownSignal;
  }

  /**
   * Client-initiated cancel. Stops emission at the next suspension point
   * without reporting anything to the sink.
   */
  cancel(): void {
    this.abort('client');
  }

  /**
   * Drive the script to the end or until aborted. Resolves with the outcome;
   * never rejects for emission errors, which are reported through the sink.
   */
  async run(): Promise<SessionOutcome> {
    if (this.started) {
      throw new SessionAlreadyStartedError(this.id);
    }
    this.started = true;
    this.startedAtMs = this.scheduler.now().getTime();

    const onShutdown = (): void => this.abort('shutdown');
    if (this.shutdownSignal?.aborted) {
      onShutdown();
    } else {
      this.shutdownSignal?.addEventListener('abort', onShutdown, { once: true });
    }

    logger.info(`${this.kind} started for '${this.subject}'`, {
      sessionId: this.id,
      phases: this.script.length,
    });

    try {
      await this.emitAll();
      this.sink.end();
      return this.finish('completed');
    } catch (err: unknown) {
      return this.handleAbort(err);
    } finally {
      this.shutdownSignal?.removeEventListener('abort', onShutdown);
    }
  }

  getEventsEmitted(): number {
    return this.cursor;
  }

  getOutcome(): SessionOutcome | null {
    return this.outcome;
  }

  /**
   * Summary of a finished session, or null while it is still running.
   */
  getSummary(): SessionSummary | null {
    if (!this.outcome) return null;
    return {
      sessionId: this.id,
      kind: this.kind,
      subject: this.subject,
      outcome: this.outcome,
      eventsEmitted: this.cursor,
      durationMs: this.durationMs,
    };
  }

  private async emitAll(): Promise<void> {
    const signal = this.controller.signal;

    while (this.cursor < this.script.length) {
      this.throwIfAborted();

      const descriptor = this.script[this.cursor];
      this.sink.write({
        phase: descriptor.phase,
        message: descriptor.message,
        emittedAt: this.scheduler.now(),
      });
      this.cursor++;

      logger.debug(`Emitted ${descriptor.phase} (${this.cursor}/${this.script.length})`, {
        sessionId: this.id,
      });

      if (this.cursor < this.script.length) {
        await this.scheduler.sleep(descriptor.delayMs, signal);
      }
    }
  }

  private throwIfAborted(): void {
    if (this.abortCause === 'shutdown') {
      throw new EmissionInterruptedError('server shutting down');
    }
    if (this.abortCause === 'client') {
      throw new Error('Cancelled by caller');
    }
  }

  private abort(cause: AbortCause): void {
    if (this.abortCause || this.outcome) return;
    this.abortCause = cause;
    this.controller.abort();
  }

  private handleAbort(err: unknown): SessionOutcome {
    if (this.abortCause === 'client') {
      logger.info(`${this.kind} cancelled by caller after ${this.cursor} event(s)`, {
        sessionId: this.id,
      });
      return this.finish('cancelled');
    }

    if (this.abortCause === 'shutdown') {
      const interrupted = new EmissionInterruptedError('server shutting down');
      logger.warn(`${this.kind} interrupted after ${this.cursor} event(s)`, {
        sessionId: this.id,
      });
      this.failSink(toRpcError(interrupted.code, interrupted.message));
      return this.finish('interrupted');
    }

    logger.error(`${this.kind} failed: ${toErrorMessage(err)}`, { sessionId: this.id });
    this.failSink(toRpcError(status.INTERNAL, `Registration stream failed: ${toErrorMessage(err)}`));
    return this.finish('failed');
  }

  private failSink(error: RpcError): void {
    try {
      this.sink.fail(error);
    } catch (err: unknown) {
      logger.warn(`Could not report failure to caller: ${toErrorMessage(err)}`, {
        sessionId: this.id,
      });
    }
  }

  private finish(outcome: SessionOutcome): SessionOutcome {
    this.outcome = outcome;
    this.durationMs = this.scheduler.now().getTime() - this.startedAtMs;
    if (outcome === 'completed') {
      logger.info(`${this.kind} completed for '${this.subject}'`, {
        sessionId: this.id,
        events: this.cursor,
        durationMs: this.durationMs,
      });
    }
    return outcome;
  }
}
