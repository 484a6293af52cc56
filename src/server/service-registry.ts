/**
 * ServiceRegistry - lifecycle management for the mock process
 *
 * Provides:
 * - Ordered initialization with dependency management
 * - Health checks
 * - Graceful shutdown handling
 */

import { EventEmitter } from 'events';
import { createLogger } from '../shared/logger';
import { toErrorMessage } from '../shared/error-utils';

const logger = createLogger('ServiceRegistry');

const DEFAULT_SHUTDOWN_TIMEOUT_MS = 5000;

/**
 * Service lifecycle interface
 * Services can optionally implement these methods for managed lifecycle
 */
export interface Service {
  readonly name: string;

  /** Called during startup, after the services it depends on */
  initialize?(): Promise<void>;

  shutdown?(): Promise<void>;

  isHealthy?(): boolean;

  getStats?(): unknown;
}

export interface ServiceRegistration {
  service: Service;

  /** Services that must be initialized before this one */
  dependsOn?: string[];

  /** Higher shuts down first */
  shutdownPriority?: number;

  /** Upper bound on this service's shutdown() */
  shutdownTimeoutMs?: number;
}

export interface HealthCheckResult {
  healthy: boolean;
  services: Record<string, {
    healthy: boolean;
    stats?: unknown;
  }>;
  uptime: number;
}

function withTimeout(promise: Promise<void>, ms: number, label: string): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    const timer = setTimeout(() => reject(new Error(`${label} timed out after ${ms}ms`)), ms);
    promise.then(
      () => {
        clearTimeout(timer);
        resolve();
      },
      (err: unknown) => {
        clearTimeout(timer);
        reject(err);
      }
    );
  });
}

export class ServiceRegistry extends EventEmitter {
  private services: Map<string, ServiceRegistration> = new Map();
  private initialized = false;
  private shuttingDown = false;
  private startTime = 0;

  register(service: Service, options: Omit<ServiceRegistration, 'service'> = {}): void {
    if (this.initialized) {
      throw new Error(`Cannot register service '${service.name}' after initialization`);
    }
    if (this.services.has(service.name)) {
      throw new Error(`Service '${service.name}' is already registered`);
    }

    this.services.set(service.name, {
      service,
      dependsOn: options.dependsOn ?? [],
      shutdownPriority: options.shutdownPriority ?? 0,
      shutdownTimeoutMs: options.shutdownTimeoutMs ?? DEFAULT_SHUTDOWN_TIMEOUT_MS,
    });
  }

  has(name: string): boolean {
    return this.services.has(name);
  }

  get(name: string): Service {
    const registration = this.services.get(name);
    if (!registration) {
      throw new Error(`Service '${name}' is not registered`);
    }
    return registration.service;
  }

  /**
   * Initialize all registered services in dependency order
   */
  async initialize(): Promise<void> {
    if (this.initialized) {
      throw new Error('ServiceRegistry is already initialized');
    }

    logger.info('Starting initialization...');
    this.startTime = Date.now();

    for (const name of this.resolveInitializationOrder()) {
      const registration = this.services.get(name);
      const service = registration?.service;
      if (!service?.initialize) continue;

      const start = Date.now();
      try {
        await service.initialize();
        logger.info(`${name} initialized (${Date.now() - start}ms)`);
      } catch (error: unknown) {
        logger.error(`Failed to initialize ${name}: ${toErrorMessage(error)}`);
        throw error;
      }
    }

    this.initialized = true;
    logger.info(`All services initialized (${Date.now() - this.startTime}ms)`);
    this.emit('initialized');
  }

  /**
   * Shut services down by priority. A failing or slow service is logged and
   * does not block the others.
   */
  async shutdown(): Promise<void> {
    if (this.shuttingDown) {
      logger.info('Shutdown already in progress');
      return;
    }

    this.shuttingDown = true;
    logger.info('Starting graceful shutdown...');
    this.emit('shutting-down');

    const ordered = Array.from(this.services.entries())
      .sort((a, b) => (b[1].shutdownPriority ?? 0) - (a[1].shutdownPriority ?? 0));

    for (const [name, registration] of ordered) {
      const service = registration.service;
      if (!service.shutdown) continue;

      logger.info(`Shutting down ${name}...`);
      try {
        await withTimeout(
          service.shutdown(),
          registration.shutdownTimeoutMs ?? DEFAULT_SHUTDOWN_TIMEOUT_MS,
          `${name} shutdown`
        );
        logger.info(`${name} shut down`);
      } catch (error: unknown) {
        logger.error(`Error shutting down ${name}: ${toErrorMessage(error)}`);
      }
    }

    logger.info('Graceful shutdown complete');
    this.emit('shutdown');
  }

  healthCheck(): HealthCheckResult {
    const result: HealthCheckResult = {
      healthy: true,
      services: {},
      uptime: this.initialized ? Date.now() - this.startTime : 0,
    };

    for (const [name, { service }] of this.services) {
      const healthy = service.isHealthy ? service.isHealthy() : true;
      result.services[name] = { healthy, stats: service.getStats?.() };
      if (!healthy) {
        result.healthy = false;
      }
    }

    return result;
  }

  getServiceNames(): string[] {
    return Array.from(this.services.keys());
  }

  isInitialized(): boolean {
    return this.initialized;
  }

  isShuttingDown(): boolean {
    return this.shuttingDown;
  }

  /**
   * Shut everything down and forget all registrations. For tests.
   */
  async reset(): Promise<void> {
    if (this.initialized && !this.shuttingDown) {
      await this.shutdown();
    }
    this.services.clear();
    this.initialized = false;
    this.shuttingDown = false;
    this.startTime = 0;
  }

  /**
   * Topological sort over dependsOn
   */
  private resolveInitializationOrder(): string[] {
    const visited = new Set<string>();
    const visiting = new Set<string>();
    const order: string[] = [];

    const visit = (name: string): void => {
      if (visited.has(name)) return;
      if (visiting.has(name)) {
        throw new Error(`Circular dependency detected: ${name}`);
      }

      const registration = this.services.get(name);
      if (!registration) {
        throw new Error(`Unknown service dependency: ${name}`);
      }

      visiting.add(name);
      for (const dep of registration.dependsOn ?? []) {
        visit(dep);
      }
      visiting.delete(name);

      visited.add(name);
      order.push(name);
    };

    for (const name of this.services.keys()) {
      visit(name);
    }

    return order;
  }
}

/** Process-wide registry used by the entry point */
export const serviceRegistry = new ServiceRegistry();

/**
 * Install SIGINT/SIGTERM handlers.
 *
 * - First signal: graceful shutdown through the registry, then exit 0
 * - Second signal: immediate exit 1
 */
export function setupGracefulShutdown(
  registry: ServiceRegistry,
  exit: (code: number) => void = (code) => process.exit(code)
): (signal: string) => Promise<void> {
  const shutdownLogger = createLogger('Shutdown');
  let signalCount = 0;

  const shutdown = async (signal: string): Promise<void> => {
    signalCount++;

    if (signalCount > 1) {
      shutdownLogger.warn(`Received ${signal} again, forcing exit`);
      exit(1);
      return;
    }

    shutdownLogger.info(`Received ${signal}, starting graceful shutdown (repeat to force)`);
    try {
      await registry.shutdown();
      exit(0);
    } catch (error: unknown) {
      shutdownLogger.error(`Error during shutdown: ${toErrorMessage(error)}`);
      exit(1);
    }
  };

  const onSignal = (signal: string) => {
    void shutdown(signal);
  };
  process.on('SIGTERM', onSignal);
  process.on('SIGINT', onSignal);

  return shutdown;
}
