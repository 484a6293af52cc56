/**
 * Service registration: six phases from request intake to a healthy Consul
 * entry, 50 ms apart.
 */

import { EventType } from '../../shared/types/registration-types';
import type { PhaseScript } from '../types/stream-types';
import { buildScript } from './script-builder';
import type { ScriptOptions } from './script-builder';

export const SERVICE_REGISTRATION_DELAY_MS = 50;

export function createServiceRegistrationScript(options: ScriptOptions = {}): PhaseScript {
  return buildScript(
    [
      [EventType.STARTED, 'Starting service registration'],
      [EventType.VALIDATED, 'Service registration request validated'],
      [EventType.CONSUL_REGISTERED, 'Service registered with Consul'],
      [EventType.HEALTH_CHECK_CONFIGURED, 'Health check configured'],
      [EventType.CONSUL_HEALTHY, 'Service reported healthy by Consul'],
      [EventType.COMPLETED, 'Service registration completed successfully'],
    ],
    options.delayMs ?? SERVICE_REGISTRATION_DELAY_MS
  );
}
