/**
 * Error helpers shared by the gRPC handlers and the emission engine.
 */

import { status } from '@grpc/grpc-js';

/**
 * Error carrying a gRPC status. Accepted by `call.emit('error', ...)` on
 * streaming calls and by the unary callback.
 */
export type RpcError = Error & { code: status; details: string };

/**
 * Extract a human-readable message from an unknown error value.
 * Use in catch blocks: `catch (err: unknown) { log(toErrorMessage(err)); }`
 */
export function toErrorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  if (typeof err === 'string') return err;
  return String(err);
}

export function toRpcError(code: status, details: string): RpcError {
  return Object.assign(new Error(details), { code, details });
}

