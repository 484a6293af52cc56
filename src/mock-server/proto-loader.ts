/**
 * Loads proto/registration.proto at run time and resolves the
 * PlatformRegistration service constructor.
 */

import path from 'path';
import * as grpc from '@grpc/grpc-js';
import * as protoLoader from '@grpc/proto-loader';

export const DEFAULT_PROTO_PATH = path.resolve(__dirname, '../../proto/registration.proto');

export const REGISTRATION_SERVICE_NAME = 'platform.registration.v1.PlatformRegistration';

/**
 * camelCase fields, enum names as strings, int64 as strings, zero values
 * filled in.
 */
export const LOADER_OPTIONS: protoLoader.Options = {
  keepCase: false,
  longs: String,
  enums: String,
  defaults: true,
  oneofs: true,
};

type GrpcNode = grpc.GrpcObject[string];

function isNamespace(node: GrpcNode): node is grpc.GrpcObject {
  return typeof node === 'object' && !('format' in node);
}

function isServiceConstructor(node: GrpcNode): node is grpc.ServiceClientConstructor {
  return typeof node === 'function';
}

/**
 * Walk a dotted name through a loaded package definition.
 */
export function lookupService(
  root: grpc.GrpcObject,
  fullName: string
): grpc.ServiceClientConstructor {
  const segments = fullName.split('.');
  const serviceName = segments.pop();
  let namespace = root;

  for (const segment of segments) {
    const next = namespace[segment];
    if (next === undefined || !isNamespace(next)) {
      throw new Error(`Package '${segment}' not found while resolving ${fullName}`);
    }
    namespace = next;
  }

  const node = serviceName === undefined ? undefined : namespace[serviceName];
  if (node === undefined || !isServiceConstructor(node)) {
    throw new Error(`Service ${fullName} not found in proto definition`);
  }
  return node;
}

const cache = new Map<string, grpc.ServiceClientConstructor>();

/**
 * Load the registration service. Loading is synchronous and cached per path,
 * so servers and test clients share one definition.
 */
export function loadRegistrationService(
  protoPath: string = DEFAULT_PROTO_PATH
): grpc.ServiceClientConstructor {
  const cached = cache.get(protoPath);
  if (cached) return cached;

  const packageDefinition = protoLoader.loadSync(protoPath, LOADER_OPTIONS);
  const root = grpc.loadPackageDefinition(packageDefinition);
  const service = lookupService(root, REGISTRATION_SERVICE_NAME);

  cache.set(protoPath, service);
  return service;
}
