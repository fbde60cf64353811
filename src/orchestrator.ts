import { EventEmitter } from 'node:events';
import type { NetworkSpec, Stack, VolumeSpec } from './config/types';
import { ServiceNotFoundError } from './errors';
import logger from './logger';
import { NetworkManager, VolumeManager } from './networks';
import { resolveLayers, shutdownOrder } from './resolver';
import { LABELS } from './runtime/types';
import type { ContainerRuntime } from './runtime/types';
import type { Settings } from './settings';
import { createSupervisor } from './supervisor';
import type { ServiceState, ServiceStatus, Supervisor } from './supervisor';

export type OrchestratorSettings = Pick<
  Settings,
  'pollIntervalMs' | 'restartBackoffMs' | 'restartBackoffMaxMs' | 'stopTimeoutSeconds' | 'dependencyTimeoutMs'
>;

export interface OrchestratorOptions {
  stack: Stack;
  runtime: ContainerRuntime;
  settings: OrchestratorSettings;
}

export interface UpOptions {
  /** Start only these services and what they depend on. */
  services?: string[];
  /** Rebuild images of services with a `build` section. */
  build?: boolean;
  /** Keep supervising after startup. */
  watch?: boolean;
}

export interface DownOptions {
  /** Also remove the project's named volumes. */
  volumes?: boolean;
}

export interface Orchestrator {
  readonly stack: Stack;
  up(options?: UpOptions): Promise<ServiceStatus[]>;
  down(options?: DownOptions): Promise<void>;
  stop(services?: string[]): Promise<void>;
  restart(service: string): Promise<void>;
  ps(): Promise<ServiceStatus[]>;
  logs(service: string, tail?: number): Promise<string>;
  health(): Record<string, boolean>;
  watch(services?: string[]): void;
  unwatch(): void;
  on(event: 'service:state', listener: (service: string, state: ServiceState, previous: ServiceState) => void): Orchestrator;
  on(event: 'service:restart', listener: (service: string, attempt: number, delayMs: number, exitCode: number) => void): Orchestrator;
}

/**
 * Run one stack: networks first, then services layer by layer in dependency
 * order, each supervised according to its restart policy.
 *
 * @example
 * const orchestrator = createOrchestrator({
 *   stack: loadStack('homestack.yaml'),
 *   runtime: DockerRuntime.connect('/var/run/docker.sock'),
 *   settings: loadSettings(),
 * });
 *
 * await orchestrator.up({ watch: true });
 */
export const createOrchestrator = (options: OrchestratorOptions): Orchestrator => {
  const { stack, runtime, settings } = options;
  const emitter = new EventEmitter();
  const networkManager = new NetworkManager(runtime);
  const volumeManager = new VolumeManager(runtime);
  const supervisors = new Map<string, Supervisor>();
  let forceBuild = false;

  const supervisorFor = (name: string): Supervisor => {
    const existing = supervisors.get(name);
    if (existing) return existing;
    if (!stack.services[name]) throw new ServiceNotFoundError(name);

    const supervisor = createSupervisor({
      stack,
      service: name,
      runtime,
      settings,
      get forceBuild() {
        return forceBuild;
      },
    });
    supervisor
      .on('state', (state, previous) => emitter.emit('service:state', name, state, previous))
      .on('restart', (attempt, delayMs, exitCode) => emitter.emit('service:restart', name, attempt, delayMs, exitCode));
    supervisors.set(name, supervisor);
    return supervisor;
  };

  const allServices = (): string[] => Object.keys(stack.services).sort();

  const networksFor = (names: string[]): NetworkSpec[] => {
    const used = new Set(names.flatMap(name => stack.services[name]?.networks ?? []));
    return [ ...used ].sort().flatMap(name => stack.networks[name] ?? []);
  };

  const volumesFor = (names: string[]): VolumeSpec[] => {
    const used = new Set(
      names.flatMap(name => (stack.services[name]?.volumes ?? []).filter(m => m.type === 'volume').map(m => m.source))
    );
    return [ ...used ].sort().flatMap(name => stack.volumes[name] ?? []);
  };

  const startService = async (name: string): Promise<void> => {
    const service = stack.services[name];
    if (!service) throw new ServiceNotFoundError(name);

    for (const [ dependency, condition ] of Object.entries(service.dependsOn)) {
      logger.debug({ service: name, dependency, condition }, 'Waiting for dependency');
      await supervisorFor(dependency).waitFor(condition, settings.dependencyTimeoutMs);
    }

    await supervisorFor(name).start();
  };

  const up = async (upOptions: UpOptions = {}): Promise<ServiceStatus[]> => {
    const layers = resolveLayers(stack, upOptions.services);
    const selected = layers.flat();
    forceBuild = upOptions.build ?? false;

    logger.info({ project: stack.project, services: selected }, 'Bringing stack up');

    await networkManager.ensureNetworks(stack.project, networksFor(selected));
    await volumeManager.ensureVolumes(stack.project, volumesFor(selected));

    for (const layer of layers) {
      await Promise.all(layer.map(startService));
    }

    if (upOptions.watch) watch(selected);

    return selected.map(name => supervisorFor(name).status());
  };

  const stop = async (services?: string[]): Promise<void> => {
    const wanted = new Set(services ?? allServices());
    for (const name of wanted) supervisorFor(name);

    for (const name of shutdownOrder(stack).filter(name => wanted.has(name))) {
      const supervisor = supervisorFor(name);
      if (await supervisor.attach()) {
        await supervisor.stop();
      }
    }
  };

  const restart = async (name: string): Promise<void> => {
    const supervisor = supervisorFor(name);
    await supervisor.attach();
    await supervisor.restart();
  };

  const down = async (downOptions: DownOptions = {}): Promise<void> => {
    unwatch();
    logger.info({ project: stack.project }, 'Taking stack down');

    for (const name of shutdownOrder(stack)) {
      const supervisor = supervisorFor(name);
      if (await supervisor.attach()) {
        await supervisor.stop();
        await supervisor.remove();
      }
    }

    // Containers of services no longer in the stack file
    const leftovers = await runtime.listContainers({ [LABELS.project]: stack.project });
    for (const container of leftovers) {
      logger.info({ container: container.name }, 'Removing orphan container');
      await runtime.stopContainer(container.id, settings.stopTimeoutSeconds);
      await runtime.removeContainer(container.id);
    }

    await networkManager.removeNetworks(stack.project);

    if (downOptions.volumes) {
      await volumeManager.removeVolumes(stack.project);
    }
  };

  const ps = async (): Promise<ServiceStatus[]> => {
    const rows: ServiceStatus[] = [];
    for (const name of allServices()) {
      const supervisor = supervisorFor(name);
      if (await supervisor.attach()) {
        rows.push(supervisor.status());
      }
    }
    return rows;
  };

  const logs = async (name: string, tail = 100): Promise<string> => supervisorFor(name).logs(tail);

  const health = (): Record<string, boolean> =>
    Object.fromEntries([ ...supervisors.values() ].map(supervisor => [ supervisor.name, supervisor.isHealthy() ]));

  const watch = (services?: string[]): void => {
    for (const name of services ?? allServices()) supervisorFor(name).watch();
  };

  const unwatch = (): void => {
    for (const supervisor of supervisors.values()) supervisor.unwatch();
  };

  const orchestrator: Orchestrator = {
    stack,
    up,
    down,
    stop,
    restart,
    ps,
    logs,
    health,
    watch,
    unwatch,
    on: (
      event: string,
      listener:
        | ((service: string, state: ServiceState, previous: ServiceState) => void)
        | ((service: string, attempt: number, delayMs: number, exitCode: number) => void)
    ) => {
      emitter.on(event, listener);
      return orchestrator;
    },
  };

  return orchestrator;
};
