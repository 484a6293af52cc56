/**
 * Phase Script Registry: maps an operation kind to its ordered phase script.
 *
 * Built once and frozen. Concurrent calls read it without coordination; there
 * is no update path at runtime.
 */

import { OperationKind } from '../types/stream-types';
import type { PhaseScript } from '../types/stream-types';
import { ServiceType } from '../../shared/types/registration-types';
import { UnsupportedOperationKindError } from '../errors';
import { createServiceRegistrationScript } from './service-registration-script';
import { createModuleRegistrationScript } from './module-registration-script';

export type ScriptTable = Partial<Record<OperationKind, PhaseScript>>;

/** Reference scripts served when no table is supplied */
export function createReferenceScripts(): ScriptTable {
  return {
    [OperationKind.SERVICE_REGISTRATION]: createServiceRegistrationScript(),
    [OperationKind.MODULE_REGISTRATION]: createModuleRegistrationScript(),
  };
}

const OPERATION_KINDS: readonly OperationKind[] = Object.values(OperationKind);

export function isOperationKind(value: string): value is OperationKind {
  return OPERATION_KINDS.some(kind => kind === value);
}

export class PhaseScriptRegistry {
  private readonly scripts: ReadonlyMap<OperationKind, PhaseScript>;

  constructor(table: ScriptTable = createReferenceScripts()) {
    const scripts = new Map<OperationKind, PhaseScript>();

    for (const kind of OPERATION_KINDS) {
      const script = table[kind];
      if (!script) continue;

      validateScript(kind, script);
      scripts.set(kind, Object.freeze(script.map(descriptor => Object.freeze({ ...descriptor }))));
    }

    if (scripts.size === 0) {
      throw new Error('PhaseScriptRegistry requires at least one script');
    }

    this.scripts = scripts;
  }

  /**
   * Script for a kind. Unsupported kinds are a caller error, never an empty
   * script.
   */
  scriptFor(kind: OperationKind | string): PhaseScript {
    const script = isOperationKind(kind) ? this.scripts.get(kind) : undefined;
    if (!script) {
      throw new UnsupportedOperationKindError(kind);
    }
    return script;
  }

  has(kind: OperationKind | string): kind is OperationKind {
    return isOperationKind(kind) && this.scripts.has(kind);
  }

  kinds(): OperationKind[] {
    return Array.from(this.scripts.keys());
  }
}

/**
 * Operation kind selected by the unified Register call.
 */
export function operationKindForServiceType(type: ServiceType | number): OperationKind {
  switch (type) {
    case ServiceType.SERVICE_TYPE_SERVICE:
      return OperationKind.SERVICE_REGISTRATION;
    case ServiceType.SERVICE_TYPE_MODULE:
      return OperationKind.MODULE_REGISTRATION;
    default:
      throw new UnsupportedOperationKindError(String(type));
  }
}

function validateScript(kind: OperationKind, script: PhaseScript): void {
  if (script.length === 0) {
    throw new Error(`Phase script for ${kind} is empty`);
  }

  script.forEach((descriptor, index) => {
    if (!Number.isFinite(descriptor.delayMs) || descriptor.delayMs < 0) {
      throw new Error(
        `Phase script for ${kind} has an invalid delay at phase ${index} (${descriptor.phase}): ${descriptor.delayMs}`
      );
    }
  });
}
