import type { ProtoTimestamp } from './types/registration-types';

export function toProtoTimestamp(date: Date): ProtoTimestamp {
  const millis = date.getTime();
  const seconds = Math.floor(millis / 1000);
  return {
    seconds,
    nanos: (millis - seconds * 1000) * 1_000_000,
  };
}

/**
 * Longs arrive as strings from the loader; both forms are accepted.
 */
export function fromProtoTimestamp(timestamp: ProtoTimestamp): Date {
  const seconds = Number(timestamp.seconds);
  return new Date(seconds * 1000 + Math.floor(timestamp.nanos / 1_000_000));
}
