/**
 * gRPC handlers for platform.registration.v1.PlatformRegistration.
 *
 * The three Register* calls run a StreamSession each; the two listing calls
 * answer immediately from the static snapshot.
 */

import * as grpc from '@grpc/grpc-js';
import type {
  ListModulesRequest,
  ListModulesResponse,
  ListServicesRequest,
  ListServicesResponse,
  ModuleRegistrationRequest,
  RegisterRequest,
  RegistrationEvent,
  ServiceRegistrationRequest,
} from '../shared/types/registration-types';
import { OperationKind } from './types/stream-types';
import type { EventSink, LifecycleEvent, Scheduler, SessionSummary } from './types/stream-types';
import { operationKindForServiceType } from './scripts/script-registry';
import type { PhaseScriptRegistry } from './scripts/script-registry';
import type { ListingSnapshot } from './listing-snapshot';
import { toListModulesResponse, toListServicesResponse } from './listing-snapshot';
import { StreamSession } from './stream-session';
import { StatusError } from './errors';
import { toProtoTimestamp } from '../shared/timestamp-utils';
import { createLogger } from '../shared/logger';
import { toErrorMessage, toRpcError } from '../shared/error-utils';
import type { RpcError } from '../shared/error-utils';

const logger = createLogger('RegistrationService');

type RegistrationCall<Req> = grpc.ServerWritableStream<Req, RegistrationEvent>;

export interface RegistrationServiceOptions {
  registry: PhaseScriptRegistry;
  snapshot: ListingSnapshot;
  shutdownSignal: AbortSignal;
  scheduler?: Scheduler;
  onSessionStart?: (session: StreamSession) => void;
  onSessionEnd?: (summary: SessionSummary) => void;
}

export function toRegistrationEvent(event: LifecycleEvent): RegistrationEvent {
  return {
    eventType: event.phase,
    message: event.message,
    timestamp: toProtoTimestamp(event.emittedAt),
  };
}

/**
 * Adapt a server-streaming call to the session's sink.
 */
export function createCallSink<Req>(call: RegistrationCall<Req>): EventSink {
  return {
    write: (event) => {
      call.write(toRegistrationEvent(event));
    },
    end: () => {
      call.end();
    },
    fail: (error) => {
      call.emit('error', error);
    },
  };
}

function toStatusRpcError(err: unknown): RpcError {
  if (err instanceof StatusError) {
    return toRpcError(err.code, err.message);
  }
  return toRpcError(grpc.status.INTERNAL, toErrorMessage(err));
}

export function createRegistrationHandlers(
  options: RegistrationServiceOptions
): grpc.UntypedServiceImplementation {
  const { registry, snapshot, shutdownSignal, scheduler } = options;

  async function runSession<Req>(call: RegistrationCall<Req>, session: StreamSession): Promise<void> {
    const onCancelled = (): void => session.cancel();
    call.on('cancelled', onCancelled);
    if (call.cancelled) {
      session.cancel();
    }

    options.onSessionStart?.(session);
    try {
      await session.run();
    } finally {
      call.removeListener('cancelled', onCancelled);
    }

    const summary = session.getSummary();
    if (summary) {
      options.onSessionEnd?.(summary);
    }
  }

  function streamLifecycle<Req>(call: RegistrationCall<Req>, kind: OperationKind, subject: string): void {
    logger.info(`${kind} requested for '${subject}'`);

    let session: StreamSession;
    try {
      session = new StreamSession({
        kind,
        subject,
        script: registry.scriptFor(kind),
        sink: createCallSink(call),
        shutdownSignal,
        scheduler,
      });
    } catch (err: unknown) {
      logger.warn(`Rejected ${kind} for '${subject}': ${toErrorMessage(err)}`);
      call.emit('error', toStatusRpcError(err));
      return;
    }

    runSession(call, session).catch((err: unknown) => {
      logger.error(`Session ${session.id} crashed: ${toErrorMessage(err)}`);
      call.emit('error', toRpcError(grpc.status.INTERNAL, toErrorMessage(err)));
    });
  }

  return {
    registerService: (call: RegistrationCall<ServiceRegistrationRequest>) => {
      streamLifecycle(call, OperationKind.SERVICE_REGISTRATION, call.request.serviceName);
    },

    registerModule: (call: RegistrationCall<ModuleRegistrationRequest>) => {
      streamLifecycle(call, OperationKind.MODULE_REGISTRATION, call.request.moduleName);
    },

    register: (call: RegistrationCall<RegisterRequest>) => {
      let kind: OperationKind;
      try {
        kind = operationKindForServiceType(call.request.type);
      } catch (err: unknown) {
        logger.warn(`Rejected Register for '${call.request.name}': ${toErrorMessage(err)}`);
        call.emit('error', toStatusRpcError(err));
        return;
      }
      streamLifecycle(call, kind, call.request.name);
    },

    listServices: (
      _call: grpc.ServerUnaryCall<ListServicesRequest, ListServicesResponse>,
      callback: grpc.sendUnaryData<ListServicesResponse>
    ) => {
      logger.debug('ListServices called');
      callback(null, toListServicesResponse(snapshot));
    },

    listModules: (
      _call: grpc.ServerUnaryCall<ListModulesRequest, ListModulesResponse>,
      callback: grpc.sendUnaryData<ListModulesResponse>
    ) => {
      logger.debug('ListModules called');
      callback(null, toListModulesResponse(snapshot));
    },
  };
}
