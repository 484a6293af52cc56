/**
 * Module registration: the service phases plus metadata retrieval, schema
 * validation, persistence and schema-registry publication.
 */

import { EventType } from '../../shared/types/registration-types';
import type { PhaseScript } from '../types/stream-types';
import { buildScript } from './script-builder';
import type { ScriptOptions } from './script-builder';

export const MODULE_REGISTRATION_DELAY_MS = 20;

export function createModuleRegistrationScript(options: ScriptOptions = {}): PhaseScript {
  return buildScript(
    [
      [EventType.STARTED, 'Starting module registration'],
      [EventType.VALIDATED, 'Module registration request validated'],
      [EventType.CONSUL_REGISTERED, 'Module registered with Consul'],
      [EventType.HEALTH_CHECK_CONFIGURED, 'Health check configured'],
      [EventType.CONSUL_HEALTHY, 'Module reported healthy by Consul'],
      [EventType.METADATA_RETRIEVED, 'Module metadata retrieved'],
      [EventType.SCHEMA_VALIDATED, 'Schema validated or synthesized'],
      [EventType.DATABASE_SAVED, 'Module registration saved to database'],
      [EventType.APICURIO_REGISTERED, 'Schema registered in Apicurio'],
      [EventType.COMPLETED, 'Module registration completed successfully'],
    ],
    options.delayMs ?? MODULE_REGISTRATION_DELAY_MS
  );
}
