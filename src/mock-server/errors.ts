/**
 * Domain errors of the lifecycle simulator, each bound to the gRPC status it
 * surfaces as.
 */

import { status } from '@grpc/grpc-js';

export class StatusError extends Error {
  constructor(readonly code: status, message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** The call asked for a lifecycle no script exists for */
export class UnsupportedOperationKindError extends StatusError {
  constructor(readonly kind: string) {
    super(status.INVALID_ARGUMENT, `Unsupported operation kind: ${kind}`);
  }
}

/** The emission loop was stopped by the server, not by the caller */
export class EmissionInterruptedError extends StatusError {
  constructor(reason: string) {
    super(status.INTERNAL, `Registration stream interrupted: ${reason}`);
  }
}

export class SessionAlreadyStartedError extends Error {
  constructor(sessionId: string) {
    super(`Stream session ${sessionId} has already been started`);
    this.name = 'SessionAlreadyStartedError';
  }
}
