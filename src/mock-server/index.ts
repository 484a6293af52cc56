/**
 * Mock Server barrel export.
 * Public API of the streaming lifecycle simulator.
 */

// Server and handlers
export { LifecycleStreamingServer } from './streaming-server';
export type { StreamingServerOptions, StreamingServerStats } from './streaming-server';
export { createRegistrationHandlers, createCallSink, toRegistrationEvent } from './registration-service';
export type { RegistrationServiceOptions } from './registration-service';
export {
  DEFAULT_PROTO_PATH,
  REGISTRATION_SERVICE_NAME,
  loadRegistrationService,
  lookupService,
} from './proto-loader';

// Emission engine
export { StreamSession } from './stream-session';
export type { StreamSessionOptions } from './stream-session';
export { timerScheduler, cancellableSleep, SleepAbortedError } from './scheduler';

// Scripts
export {
  PhaseScriptRegistry,
  createReferenceScripts,
  isOperationKind,
  operationKindForServiceType,
  type ScriptTable,
} from './scripts/script-registry';
export { createServiceRegistrationScript, SERVICE_REGISTRATION_DELAY_MS } from './scripts/service-registration-script';
export { createModuleRegistrationScript, MODULE_REGISTRATION_DELAY_MS } from './scripts/module-registration-script';
export { buildScript, scriptDurationMs, type ScriptOptions } from './scripts/script-builder';

// Listing snapshot
export {
  createListingSnapshot,
  toListServicesResponse,
  toListModulesResponse,
  type ListingSnapshot,
} from './listing-snapshot';

// Errors
export {
  StatusError,
  UnsupportedOperationKindError,
  EmissionInterruptedError,
  SessionAlreadyStartedError,
} from './errors';

// Test helpers
export {
  createRegistrationClient,
  collectEvents,
  nextSessionEnd,
  startTestEnvironment,
  RecordingSink,
  TrackingScheduler,
} from './test-helpers';
export type { RegistrationClient, StreamResult, CollectOptions, TestEnvironment } from './test-helpers';

// Types
export {
  OperationKind,
  type LifecyclePhase,
  type PhaseDescriptor,
  type PhaseScript,
  type LifecycleEvent,
  type EventSink,
  type Scheduler,
  type SessionOutcome,
  type SessionSummary,
} from './types/stream-types';
