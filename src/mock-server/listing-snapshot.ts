/**
 * Static discovery snapshot served by ListServices and ListModules.
 * Created once at server construction; never mutated.
 */

import type {
  ListModulesResponse,
  ListServicesResponse,
  ModuleDetails,
  ServiceDetails,
} from '../shared/types/registration-types';
import { toProtoTimestamp } from '../shared/timestamp-utils';

export interface ListingSnapshot {
  readonly services: readonly ServiceDetails[];
  readonly modules: readonly ModuleDetails[];
  readonly asOf: Date;
}

const SNAPSHOT_SERVICES: readonly ServiceDetails[] = [
  {
    serviceName: 'repository-service',
    serviceId: 'repo-1',
    host: 'localhost',
    port: 8080,
    version: '1.0.0',
    isHealthy: true,
  },
  {
    serviceName: 'account-manager',
    serviceId: 'account-1',
    host: 'localhost',
    port: 38105,
    version: '1.0.0',
    isHealthy: true,
  },
];

const SNAPSHOT_MODULES: readonly ModuleDetails[] = [
  {
    moduleName: 'parser',
    serviceId: 'parser-1',
    host: 'localhost',
    port: 8081,
    version: '1.0.0',
    inputFormat: 'text/plain',
    outputFormat: 'application/json',
    documentTypes: ['text'],
    isHealthy: true,
  },
  {
    moduleName: 'chunker',
    serviceId: 'chunker-1',
    host: 'localhost',
    port: 8082,
    version: '1.0.0',
    inputFormat: 'application/json',
    outputFormat: 'application/json',
    documentTypes: ['text'],
    isHealthy: true,
  },
];

export function createListingSnapshot(asOf: Date = new Date()): ListingSnapshot {
  return Object.freeze({
    services: Object.freeze(SNAPSHOT_SERVICES.map(service => Object.freeze({ ...service }))),
    modules: Object.freeze(
      SNAPSHOT_MODULES.map(module =>
        Object.freeze({ ...module, documentTypes: [...module.documentTypes] })
      )
    ),
    asOf: new Date(asOf.getTime()),
  });
}

// Responses are copied out of the frozen snapshot per call
export function toListServicesResponse(snapshot: ListingSnapshot): ListServicesResponse {
  return {
    services: snapshot.services.map(service => ({ ...service })),
    asOf: toProtoTimestamp(snapshot.asOf),
    totalCount: snapshot.services.length,
  };
}

export function toListModulesResponse(snapshot: ListingSnapshot): ListModulesResponse {
  return {
    modules: snapshot.modules.map(module => ({
      ...module,
      documentTypes: [...module.documentTypes],
    })),
    asOf: toProtoTimestamp(snapshot.asOf),
    totalCount: snapshot.modules.length,
  };
}
