import { describe, it, expect } from '@jest/globals';
import { status } from '@grpc/grpc-js';
import {
  EmissionInterruptedError,
  SessionAlreadyStartedError,
  StatusError,
  UnsupportedOperationKindError,
} from './errors';
import { toErrorMessage, toRpcError } from '../shared/error-utils';

describe('domain errors', () => {
  it('should bind unsupported kinds to INVALID_ARGUMENT', () => {
    const err = new UnsupportedOperationKindError('DEREGISTRATION');

    expect(err).toBeInstanceOf(StatusError);
    expect(err.code).toBe(status.INVALID_ARGUMENT);
    expect(err.kind).toBe('DEREGISTRATION');
    expect(err.name).toBe('UnsupportedOperationKindError');
    expect(err.message).toBe('Unsupported operation kind: DEREGISTRATION');
  });

  it('should bind interruptions to INTERNAL', () => {
    const err = new EmissionInterruptedError('server shutting down');

    expect(err.code).toBe(status.INTERNAL);
    expect(err.message).toBe('Registration stream interrupted: server shutting down');
  });

  it('should name the session that was started twice', () => {
    expect(new SessionAlreadyStartedError('s-1').message)
      .toBe('Stream session s-1 has already been started');
  });
});

describe('error-utils', () => {
  it('should build a status error', () => {
    const err = toRpcError(status.INTERNAL, 'stream failed');

    expect(err).toBeInstanceOf(Error);
    expect(err.code).toBe(status.INTERNAL);
    expect(err.details).toBe('stream failed');
    expect(err.message).toBe('stream failed');
  });

  it('should extract messages from unknown values', () => {
    expect(toErrorMessage(new Error('boom'))).toBe('boom');
    expect(toErrorMessage('plain')).toBe('plain');
    expect(toErrorMessage(42)).toBe('42');
  });
});
