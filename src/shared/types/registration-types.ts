/**
 * Wire message shapes for platform.registration.v1, as produced by
 * @grpc/proto-loader with camelCase fields, string enums and string longs.
 */

/** google.protobuf.Timestamp */
export interface ProtoTimestamp {
  seconds: number | string;
  nanos: number;
}

/** Enum names of platform.registration.v1.EventType */
export enum EventType {
  EVENT_TYPE_UNSPECIFIED = 'EVENT_TYPE_UNSPECIFIED',
  STARTED = 'STARTED',
  VALIDATED = 'VALIDATED',
  CONSUL_REGISTERED = 'CONSUL_REGISTERED',
  HEALTH_CHECK_CONFIGURED = 'HEALTH_CHECK_CONFIGURED',
  CONSUL_HEALTHY = 'CONSUL_HEALTHY',
  METADATA_RETRIEVED = 'METADATA_RETRIEVED',
  SCHEMA_VALIDATED = 'SCHEMA_VALIDATED',
  DATABASE_SAVED = 'DATABASE_SAVED',
  APICURIO_REGISTERED = 'APICURIO_REGISTERED',
  COMPLETED = 'COMPLETED',
  FAILED = 'FAILED',
}

/** Enum names of platform.registration.v1.ServiceType */
export enum ServiceType {
  SERVICE_TYPE_UNSPECIFIED = 'SERVICE_TYPE_UNSPECIFIED',
  SERVICE_TYPE_SERVICE = 'SERVICE_TYPE_SERVICE',
  SERVICE_TYPE_MODULE = 'SERVICE_TYPE_MODULE',
}

export interface Connectivity {
  advertisedHost: string;
  advertisedPort: number;
  tlsEnabled: boolean;
}

export interface ServiceRegistrationRequest {
  serviceName: string;
  connectivity?: Connectivity | null;
  version: string;
}

export interface ModuleRegistrationRequest {
  moduleName: string;
  connectivity?: Connectivity | null;
  version: string;
}

export interface RegisterRequest {
  name: string;
  // Unknown enum values arrive as their number
  type: ServiceType | number;
  connectivity?: Connectivity | null;
  version: string;
}

export interface RegistrationEvent {
  eventType: EventType;
  message: string;
  timestamp: ProtoTimestamp | null;
}

export type ListServicesRequest = Record<string, never>;
export type ListModulesRequest = Record<string, never>;

export interface ServiceDetails {
  serviceName: string;
  serviceId: string;
  host: string;
  port: number;
  version: string;
  isHealthy: boolean;
}

export interface ListServicesResponse {
  services: ServiceDetails[];
  asOf: ProtoTimestamp | null;
  totalCount: number;
}

export interface ModuleDetails {
  moduleName: string;
  serviceId: string;
  host: string;
  port: number;
  version: string;
  inputFormat: string;
  outputFormat: string;
  documentTypes: string[];
  isHealthy: boolean;
}

export interface ListModulesResponse {
  modules: ModuleDetails[];
  asOf: ProtoTimestamp | null;
  totalCount: number;
}
