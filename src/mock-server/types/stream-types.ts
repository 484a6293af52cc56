/**
 * Core type definitions for the streaming lifecycle simulator.
 * Shared by the script registry, the emission engine and the gRPC handlers.
 */

import type { EventType } from '../../shared/types/registration-types';
import type { RpcError } from '../../shared/error-utils';

/**
 * Which lifecycle a streaming call simulates.
 */
export enum OperationKind {
  SERVICE_REGISTRATION = 'SERVICE_REGISTRATION',
  MODULE_REGISTRATION = 'MODULE_REGISTRATION',
}

/** Phase tags exclude the protobuf zero value */
export type LifecyclePhase = Exclude<EventType, EventType.EVENT_TYPE_UNSPECIFIED>;

/** One phase of a script. `delayMs` is the pause before the next phase. */
export interface PhaseDescriptor {
  readonly phase: LifecyclePhase;
  readonly message: string;
  readonly delayMs: number;
}

export type PhaseScript = readonly PhaseDescriptor[];

/** The unit emitted to the caller for one phase */
export interface LifecycleEvent {
  phase: LifecyclePhase;
  message: string;
  emittedAt: Date;
}

/**
 * Destination of a session's events. The gRPC handler adapts a
 * ServerWritableStream to this; tests record into arrays.
 */
export interface EventSink {
  write(event: LifecycleEvent): void;
  /** Normal completion */
  end(): void;
  /** Terminate with an explicit status */
  fail(error: RpcError): void;
}

/**
 * Timer source for the emission loop. `sleep` rejects as soon as the signal
 * aborts and must leave no timer behind.
 */
export interface Scheduler {
  now(): Date;
  sleep(ms: number, signal: AbortSignal): Promise<void>;
}

export type SessionOutcome = 'completed' | 'cancelled' | 'interrupted' | 'failed';

/** Published once per session when it ends */
export interface SessionSummary {
  sessionId: string;
  kind: OperationKind;
  /** Name of the entity being registered */
  subject: string;
  outcome: SessionOutcome;
  eventsEmitted: number;
  durationMs: number;
}
