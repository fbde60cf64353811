import { EventEmitter } from 'node:events';
import logger from './logger';
import { setupShutdownHandlers } from './shutdown';
import { sendJson, startHealthCheckServer } from './healthcheck';
import type { HealthCheckService, RouteHandler } from './healthcheck';

/**
 * Health status reported by the daemon.
 */
export interface HealthState {
  healthy: boolean;
  timestamp: number;
  dependencies?: Record<string, boolean>;
  [key: string]: unknown; // Extra details from onPing
}

/**
 * Configuration for defineLifecycle.
 *
 * onInit: Called during initialization. Bring services up, start watchers.
 * onPing: Called for health checks. Return extra details to include in the response.
 * isHealthy: Optional custom health determination. If not provided, uses dependency status.
 * onFailure: Called when an error occurs during startup.
 * onShutdown: Called during graceful shutdown.
 * dependencies: Names tracked in the health report.
 * healthPort: Port for the health server.
 * routes: Extra GET routes served next to /health.
 */
export interface LifecycleConfig {
  onInit?: () => Promise<void>;
  onPing?: () => Promise<Partial<HealthState>>;
  isHealthy?: () => boolean | Promise<boolean>;
  onFailure?: (error: Error) => Promise<void>;
  onShutdown?: () => Promise<void>;
  dependencies?: string[];
  healthPort?: number;
  routes?: Record<string, RouteHandler>;
}

/**
 * Lifecycle instance returned by defineLifecycle.
 */
export interface LifecycleInstance {
  init(): Promise<void>;
  shutdown(): Promise<void>;
  getHealthState(): Promise<HealthState>;
  /** Record the health of a tracked dependency. Unknown names are added. */
  setDependencyHealth(name: string, healthy: boolean): void;
  on(event: string, listener: (...args: unknown[]) => void): LifecycleInstance;
  emit(event: string, ...args: unknown[]): boolean;
}

const toError = (error: unknown): Error => (error instanceof Error ? error : new Error(String(error)));

/**
 * Define the daemon lifecycle: health server, signal handling and
 * dependency tracking around the onInit and onShutdown hooks.
 *
 * Emits 'init', 'ready', 'failure' and 'done'.
 *
 * Dependencies start unhealthy. Once onInit resolves, every dependency that
 * has not reported through setDependencyHealth is marked healthy; reported
 * values are kept.
 *
 * @example
 * const lifecycle = defineLifecycle({
 *   dependencies: ['db', 'web'],
 *   onInit: async () => {
 *     await orchestrator.up({ watch: true });
 *   },
 *   onShutdown: async () => {
 *     orchestrator.unwatch();
 *     await orchestrator.stop();
 *   },
 * });
 *
 * orchestrator.on('service:state', (name, state) => {
 *   lifecycle.setDependencyHealth(name, state === 'healthy' || state === 'running');
 * });
 *
 * await lifecycle.init();
 */
export const defineLifecycle = (config: LifecycleConfig): LifecycleInstance => {
  const emitter = new EventEmitter();
  const dependencyHealth = new Map<string, boolean>();
  const reported = new Set<string>();

  for (const dep of config.dependencies ?? []) {
    dependencyHealth.set(dep, false);
  }

  let healthCheckService: HealthCheckService | null = null;
  let disposeSignals: (() => void) | null = null;
  let shuttingDown: Promise<void> | null = null;

  const getHealthState = async (): Promise<HealthState> => {
    const customState = config.onPing ? await config.onPing() : {};
    const deps = Object.fromEntries(dependencyHealth.entries());

    const healthy = config.isHealthy
      ? await config.isHealthy()
      : Array.from(dependencyHealth.values()).every(v => v);

    return {
      healthy,
      timestamp: Date.now(),
      dependencies: Object.keys(deps).length > 0 ? deps : undefined,
      ...customState,
    };
  };

  const setDependencyHealth = (name: string, healthy: boolean): void => {
    reported.add(name);
    if (dependencyHealth.get(name) !== healthy) {
      logger.debug({ dependency: name, healthy }, 'Dependency health changed');
    }
    dependencyHealth.set(name, healthy);
  };

  const healthRoute: RouteHandler = (_, res) => {
    getHealthState()
      .then((state) => {
        sendJson(res, state.healthy ? 200 : 503, state);
      })
      .catch((err) => {
        logger.error({ err }, 'Error getting health state');
        sendJson(res, 503, { healthy: false, error: 'Failed to get health state' });
      });
  };

  /**
   * Close the health server and run onShutdown. Repeated calls share one run.
   * Exiting the process is left to the signal handler.
   */
  const shutdown = (): Promise<void> => {
    shuttingDown ??= (async () => {
      logger.info('Initiating graceful shutdown...');

      disposeSignals?.();
      if (healthCheckService) {
        await healthCheckService.close();
      }

      if (config.onShutdown) {
        await config.onShutdown();
      }

      emitter.emit('done');
    })();
    return shuttingDown;
  };

  const init = async (): Promise<void> => {
    try {
      emitter.emit('init');

      if (config.onInit) {
        await config.onInit();
      }

      for (const dep of dependencyHealth.keys()) {
        if (!reported.has(dep)) dependencyHealth.set(dep, true);
      }

      healthCheckService = startHealthCheckServer({ ...config.routes, '/health': healthRoute }, config.healthPort);
      disposeSignals = setupShutdownHandlers(shutdown);

      emitter.emit('ready');
    } catch (error) {
      emitter.emit('failure', error);
      if (config.onFailure) {
        await config.onFailure(toError(error));
      }
      throw error;
    }
  };

  const instance: LifecycleInstance = {
    init,
    shutdown,
    getHealthState,
    setDependencyHealth,
    on: (event: string, listener: (...args: unknown[]) => void) => {
      emitter.on(event, listener);
      return instance;
    },
    emit: (event: string, ...args: unknown[]) => {
      return emitter.emit(event, ...args);
    },
  };

  return instance;
};
