import type { LifecyclePhase, PhaseDescriptor, PhaseScript } from '../types/stream-types';

export interface ScriptOptions {
  /** Uniform pause between phases */
  delayMs?: number;
}

/**
 * Freeze a list of `[phase, message]` pairs into a script with a uniform
 * inter-phase delay.
 */
export function buildScript(
  phases: ReadonlyArray<readonly [LifecyclePhase, string]>,
  delayMs: number
): PhaseScript {
  const descriptors: PhaseDescriptor[] = phases.map(([phase, message]) =>
    Object.freeze({ phase, message, delayMs })
  );
  return Object.freeze(descriptors);
}

/**
 * Sum of the pauses a caller waits through: every delay except the last
 * phase's, which is never slept.
 */
export function scriptDurationMs(script: PhaseScript): number {
  return script
    .slice(0, -1)
    .reduce((total, descriptor) => total + descriptor.delayMs, 0);
}
