/**
 * Test helpers for the lifecycle simulator: a typed gRPC client, stream
 * collection, and in-memory stand-ins for the sink and scheduler.
 */

import * as grpc from '@grpc/grpc-js';
import type {
  ListModulesResponse,
  ListServicesResponse,
  ModuleRegistrationRequest,
  RegisterRequest,
  RegistrationEvent,
  ServiceRegistrationRequest,
} from '../shared/types/registration-types';
import type { RpcError } from '../shared/error-utils';
import type {
  EventSink,
  LifecycleEvent,
  Scheduler,
  SessionSummary,
} from './types/stream-types';
import { cancellableSleep } from './scheduler';
import { loadRegistrationService } from './proto-loader';
import { LifecycleStreamingServer } from './streaming-server';
import type { StreamingServerOptions } from './streaming-server';

export interface RegistrationClient {
  registerService(request: ServiceRegistrationRequest): grpc.ClientReadableStream<RegistrationEvent>;
  registerModule(request: ModuleRegistrationRequest): grpc.ClientReadableStream<RegistrationEvent>;
  register(request: RegisterRequest): grpc.ClientReadableStream<RegistrationEvent>;
  listServices(): Promise<ListServicesResponse>;
  listModules(): Promise<ListModulesResponse>;
  close(): void;
}

/**
 * Plaintext client for PlatformRegistration, typed against the wire shapes.
 */
export function createRegistrationClient(address: string, protoPath?: string): RegistrationClient {
  const methods = loadRegistrationService(protoPath).service;
  const client = new grpc.Client(address, grpc.credentials.createInsecure());

  const methodFor = (name: string): grpc.ServiceDefinition[string] => {
    const method = methods[name];
    if (!method) {
      throw new Error(`Unknown PlatformRegistration method: ${name}`);
    }
    return method;
  };

  const serverStream = <Req extends object>(name: string, request: Req) => {
    const method = methodFor(name);
    return client.makeServerStreamRequest<Req, RegistrationEvent>(
      method.path,
      method.requestSerialize,
      method.responseDeserialize,
      request
    );
  };

  const unary = <Res>(name: string): Promise<Res> => {
    const method = methodFor(name);
    return new Promise<Res>((resolve, reject) => {
      client.makeUnaryRequest<object, Res>(
        method.path,
        method.requestSerialize,
        method.responseDeserialize,
        {},
        (error, response) => {
          if (error) {
            reject(error);
            return;
          }
          if (!response) {
            reject(new Error(`${name} returned no response`));
            return;
          }
          resolve(response);
        }
      );
    });
  };

  return {
    registerService: (request) => serverStream('RegisterService', request),
    registerModule: (request) => serverStream('RegisterModule', request),
    register: (request) => serverStream('Register', request),
    listServices: () => unary<ListServicesResponse>('ListServices'),
    listModules: () => unary<ListModulesResponse>('ListModules'),
    close: () => client.close(),
  };
}

export interface StreamResult {
  events: RegistrationEvent[];
  status: grpc.StatusObject;
  error: grpc.ServiceError | null;
}

export interface CollectOptions {
  /** Cancel the call once this many events have arrived */
  cancelAfter?: number;
}

/**
 * Gather every event of a server stream until its final status.
 */
export function collectEvents(
  stream: grpc.ClientReadableStream<RegistrationEvent>,
  options: CollectOptions = {}
): Promise<StreamResult> {
  return new Promise<StreamResult>((resolve) => {
    const events: RegistrationEvent[] = [];
    let error: grpc.ServiceError | null = null;
    let status: grpc.StatusObject | null = null;
    let ended = false;

    const settle = (): void => {
      if (!status) return;
      if (status.code === grpc.status.OK && !ended) return;
      resolve({ events, status, error });
    };

    stream.on('data', (event: RegistrationEvent) => {
      events.push(event);
      if (options.cancelAfter !== undefined && events.length === options.cancelAfter) {
        stream.cancel();
      }
    });
    stream.on('error', (err: grpc.ServiceError) => {
      error = err;
    });
    stream.on('end', () => {
      ended = true;
      settle();
    });
    stream.on('status', (received: grpc.StatusObject) => {
      status = received;
      settle();
    });
  });
}

export function nextSessionEnd(server: LifecycleStreamingServer): Promise<SessionSummary> {
  return new Promise<SessionSummary>((resolve) => {
    server.once('session-end', (summary: SessionSummary) => resolve(summary));
  });
}

export interface TestEnvironment {
  server: LifecycleStreamingServer;
  client: RegistrationClient;
  address: string;
  cleanup: () => Promise<void>;
}

/**
 * Start a server on an ephemeral loopback port with a connected client.
 */
export async function startTestEnvironment(
  options: StreamingServerOptions = {}
): Promise<TestEnvironment> {
  const server = new LifecycleStreamingServer({ host: '127.0.0.1', port: 0, ...options });
  const port = await server.start();
  const address = `127.0.0.1:${port}`;
  const client = createRegistrationClient(address, options.protoPath);

  return {
    server,
    client,
    address,
    cleanup: async () => {
      client.close();
      await server.stop();
    },
  };
}

/**
 * Sink that records what a session writes.
 */
export class RecordingSink implements EventSink {
  readonly events: LifecycleEvent[] = [];
  ended = false;
  failure: RpcError | null = null;

  constructor(private readonly onWrite?: (event: LifecycleEvent, count: number) => void) {}

  write(event: LifecycleEvent): void {
    this.events.push(event);
    this.onWrite?.(event, this.events.length);
  }

  end(): void {
    this.ended = true;
  }

  fail(error: RpcError): void {
    this.failure = error;
  }
}

/**
 * Real timers, with a count of sleeps still pending.
 */
export class TrackingScheduler implements Scheduler {
  pending = 0;
  started = 0;

  now(): Date {
    return new Date();
  }

  async sleep(ms: number, signal: AbortSignal): Promise<void> {
    this.pending++;
    this.started++;
    try {
      await cancellableSleep(ms, signal);
    } finally {
      this.pending--;
    }
  }
}
