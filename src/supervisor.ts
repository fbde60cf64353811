import { createHash } from 'node:crypto';
import { EventEmitter } from 'node:events';
import { setTimeout as sleep } from 'node:timers/promises';
import { formatPort } from './config/parse';
import { SECRETS_DIR } from './config/types';
import type { DependencyCondition, ServiceSpec, Stack } from './config/types';
import {
  DependencyFailedError,
  DependencyTimeoutError,
  NetworkNotFoundError,
  RuntimeError,
  ServiceNotFoundError,
  VolumeNotFoundError,
} from './errors';
import { serviceLogger } from './logger';
import { scopedName } from './networks';
import { LABELS } from './runtime/types';
import type { ContainerCreateSpec, ContainerRuntime, ContainerState, HealthStatus } from './runtime/types';
import type { Settings } from './settings';

export type ServiceState =
  | 'created'
  | 'starting'
  | 'running'
  | 'healthy'
  | 'unhealthy'
  | 'restarting'
  | 'exited'
  | 'stopped'
  | 'failed';

export interface ServiceStatus {
  service: string;
  container: string;
  state: ServiceState;
  health: HealthStatus;
  exitCode?: number;
  restarts: number;
  ports: string[];
}

export type SupervisorSettings = Pick<
  Settings,
  'pollIntervalMs' | 'restartBackoffMs' | 'restartBackoffMaxMs' | 'stopTimeoutSeconds'
>;

export interface SupervisorOptions {
  stack: Stack;
  service: string;
  runtime: ContainerRuntime;
  settings: SupervisorSettings;
  /** Rebuild the image even when it exists. */
  forceBuild?: boolean;
}

export interface Supervisor {
  readonly name: string;
  readonly containerName: string;
  attach(): Promise<boolean>;
  start(): Promise<void>;
  stop(): Promise<void>;
  restart(): Promise<void>;
  remove(): Promise<void>;
  poll(): Promise<ServiceState>;
  watch(): void;
  unwatch(): void;
  waitFor(condition: DependencyCondition, timeoutMs: number): Promise<void>;
  isHealthy(): boolean;
  status(): ServiceStatus;
  logs(tail: number): Promise<string>;
  on(event: 'state', listener: (state: ServiceState, previous: ServiceState) => void): Supervisor;
  on(event: 'restart', listener: (attempt: number, delayMs: number, exitCode: number) => void): Supervisor;
}

export const containerNameFor = (project: string, service: string): string => `${project}-${service}-1`;

export const imageNameFor = (project: string, service: ServiceSpec): string =>
  service.image ?? `${project}-${service.name.toLowerCase()}:latest`;

/**
 * Container definition for a service, including the config-hash label used
 * to decide whether an existing container can be reused.
 */
export const containerSpecFor = (stack: Stack, service: ServiceSpec, stopTimeoutSeconds: number): ContainerCreateSpec => {
  const binds = service.volumes.map(mount => {
    let source = mount.source;
    if (mount.type === 'volume') {
      const volume = stack.volumes[mount.source];
      if (!volume) throw new VolumeNotFoundError(mount.source);
      source = scopedName(stack.project, volume);
    }
    return `${source}:${mount.target}${mount.readOnly ? ':ro' : ''}`;
  });

  for (const name of service.secrets) {
    const secret = stack.secrets[name];
    if (secret) binds.push(`${secret.file}:${SECRETS_DIR}/${name}:ro`);
  }

  const networks = service.networks.map(name => {
    const network = stack.networks[name];
    if (!network) throw new NetworkNotFoundError(name);
    return { name: scopedName(stack.project, network), aliases: [ service.name ] };
  });

  const spec: ContainerCreateSpec = {
    name: containerNameFor(stack.project, service.name),
    image: imageNameFor(stack.project, service),
    command: service.command,
    env: service.environment,
    labels: {
      ...service.labels,
      [LABELS.project]: stack.project,
      [LABELS.service]: service.name,
    },
    ports: service.ports,
    binds,
    networks,
    healthcheck: service.healthcheck,
    stopTimeoutSeconds: service.stopGracePeriodMs === undefined
      ? stopTimeoutSeconds
      : Math.ceil(service.stopGracePeriodMs / 1000),
  };

  const hash = createHash('sha256').update(JSON.stringify({ spec, build: service.build })).digest('hex');
  spec.labels[LABELS.configHash] = hash;

  return spec;
};

/**
 * Backoff before the given consecutive restart (0-based): base * 2^n, capped.
 */
export const restartDelay = (attempt: number, baseMs: number, maxMs: number): number =>
  Math.min(baseMs * 2 ** attempt, maxMs);

/**
 * Supervise one service: reconcile its container, follow its state, apply
 * the restart policy when it exits on its own.
 */
export const createSupervisor = (options: SupervisorOptions): Supervisor => {
  const { stack, runtime, settings } = options;
  const service = stack.services[options.service];
  if (!service) throw new ServiceNotFoundError(options.service);

  const log = serviceLogger(service.name);
  const emitter = new EventEmitter();
  const containerName = containerNameFor(stack.project, service.name);

  let containerId: string | undefined;
  let state: ServiceState = 'created';
  let health: HealthStatus = 'none';
  let exitCode: number | undefined;
  let restarts = 0;
  // Drives the backoff; reset once the service runs again
  let consecutiveRestarts = 0;
  // Counts against an on-failure retry limit; reset only by start()
  let failureRetries = 0;
  let userStopped = false;
  let restarting = false;
  let watching = false;
  let timer: NodeJS.Timeout | undefined;
  let backoff: AbortController | undefined;
  let inflight: Promise<ServiceState> | undefined;

  const setState = (next: ServiceState): void => {
    if (next === state) return;
    const previous = state;
    state = next;
    log.info({ state: next, previous }, 'Service state changed');
    emitter.emit('state', next, previous);
  };

  const ensureImage = async (image: string): Promise<void> => {
    const present = await runtime.hasImage(image);
    if (service.build && (options.forceBuild || !present)) {
      await runtime.buildImage({ tag: image, ...service.build });
      return;
    }
    if (!present) {
      await runtime.pullImage(image);
    }
  };

  /**
   * Reuse the existing container when its config hash matches,
   * otherwise replace it. A forced build always replaces it.
   */
  const reconcile = async (): Promise<string> => {
    const spec = containerSpecFor(stack, service, settings.stopTimeoutSeconds);
    const existing = await runtime.findContainer(containerName);
    const rebuild = Boolean(options.forceBuild && service.build);

    if (existing) {
      if (!rebuild && existing.labels[LABELS.configHash] === spec.labels[LABELS.configHash]) {
        log.debug({ container: containerName }, 'Container is up to date');
        return existing.id;
      }
      log.info({ container: containerName, rebuild }, 'Recreating container');
      await runtime.stopContainer(existing.id, spec.stopTimeoutSeconds);
      await runtime.removeContainer(existing.id);
    }

    await ensureImage(spec.image);
    const id = await runtime.createContainer(spec);
    log.info({ container: containerName, id }, 'Created container');
    return id;
  };

  const start = async (): Promise<void> => {
    userStopped = false;
    consecutiveRestarts = 0;
    failureRetries = 0;
    exitCode = undefined;
    setState('starting');

    try {
      containerId = await reconcile();
      await runtime.startContainer(containerId);
    } catch (err) {
      setState('failed');
      throw err;
    }

    await poll();
  };

  const shouldRestart = (code: number): boolean => {
    const policy = service.restart;
    switch (policy.name) {
      case 'no':
        return false;
      case 'always':
      case 'unless-stopped':
        return true;
      case 'on-failure':
        return code !== 0 && (policy.maxRetries === undefined || failureRetries < policy.maxRetries);
    }
  };

  const restartAfterExit = async (code: number): Promise<void> => {
    const delayMs = restartDelay(consecutiveRestarts, settings.restartBackoffMs, settings.restartBackoffMaxMs);
    consecutiveRestarts++;
    failureRetries++;
    restarts++;
    setState('restarting');
    log.warn({ exitCode: code, attempt: consecutiveRestarts, delayMs }, 'Service exited, restarting');
    emitter.emit('restart', consecutiveRestarts, delayMs, code);

    restarting = true;
    const controller = new AbortController();
    backoff = controller;
    try {
      try {
        await sleep(delayMs, undefined, { signal: controller.signal });
      } catch (err) {
        if (controller.signal.aborted) {
          log.debug({ container: containerName }, 'Pending restart cancelled');
          return;
        }
        throw err;
      }
      if (userStopped) return;

      if (containerId) {
        await runtime.startContainer(containerId);
      } else {
        containerId = await reconcile();
        await runtime.startContainer(containerId);
      }
      // The next poll sees whether it stayed up
      setState('starting');
    } finally {
      restarting = false;
      if (backoff === controller) backoff = undefined;
    }
  };

  const handleExit = async (code: number): Promise<void> => {
    exitCode = code;

    if (userStopped) {
      setState('stopped');
      return;
    }

    if (shouldRestart(code)) {
      await restartAfterExit(code);
      return;
    }

    setState(service.restart.name === 'on-failure' && code !== 0 ? 'failed' : 'exited');
  };

  const inspectAndApply = async (): Promise<ServiceState> => {
    if (restarting || !containerId) return state;

    let inspected: ContainerState;
    try {
      inspected = await runtime.inspectContainer(containerId);
    } catch (err) {
      if (err instanceof RuntimeError && err.statusCode === 404) {
        log.warn({ container: containerName }, 'Container disappeared');
        containerId = undefined;
        health = 'none';
        if (userStopped) {
          setState('stopped');
        } else if (shouldRestart(-1)) {
          await restartAfterExit(-1);
        } else {
          setState('exited');
        }
        return state;
      }
      throw err;
    }

    health = inspected.health;

    switch (inspected.status) {
      case 'running':
      case 'paused':
        if (health === 'healthy') setState('healthy');
        else if (health === 'unhealthy') setState('unhealthy');
        else setState('running');
        if (state === 'running' || state === 'healthy') consecutiveRestarts = 0;
        break;
      case 'restarting':
        setState('restarting');
        break;
      case 'created':
        // Created but never started
        if (state !== 'starting') setState('created');
        break;
      case 'removing':
        setState('stopped');
        break;
      case 'exited':
      case 'dead':
        // An exit already handled keeps its state until the container runs again
        if (state !== 'exited' && state !== 'failed' && state !== 'stopped') {
          await handleExit(inspected.exitCode);
        }
        break;
    }

    return state;
  };

  /**
   * Adopt an existing container without applying the restart policy to the
   * state it is found in. Returns false when there is no container.
   */
  const attach = async (): Promise<boolean> => {
    if (containerId) return true;

    const existing = await runtime.findContainer(containerName);
    if (!existing) return false;
    containerId = existing.id;

    const inspected = await runtime.inspectContainer(existing.id);
    if (inspected.status === 'exited' || inspected.status === 'dead') {
      health = inspected.health;
      exitCode = inspected.exitCode;
      setState('exited');
    } else {
      await poll();
    }
    return true;
  };

  /** Concurrent callers share one inspection. */
  const poll = (): Promise<ServiceState> => {
    if (!inflight) {
      inflight = inspectAndApply().finally(() => {
        inflight = undefined;
      });
    }
    return inflight;
  };

  const cancelPendingRestart = (): void => {
    backoff?.abort();
    backoff = undefined;
  };

  const stop = async (): Promise<void> => {
    userStopped = true;
    cancelPendingRestart();
    if (containerId) {
      const timeout = service.stopGracePeriodMs === undefined
        ? settings.stopTimeoutSeconds
        : Math.ceil(service.stopGracePeriodMs / 1000);
      await runtime.stopContainer(containerId, timeout);
      log.info({ container: containerName }, 'Stopped service');
    }
    setState('stopped');
  };

  const remove = async (): Promise<void> => {
    unwatch();
    userStopped = true;
    const existing = containerId ? { id: containerId } : await runtime.findContainer(containerName);
    if (existing) {
      await runtime.removeContainer(existing.id);
      log.info({ container: containerName }, 'Removed container');
    }
    containerId = undefined;
    setState('stopped');
  };

  const restart = async (): Promise<void> => {
    if (containerId) {
      await stop();
    }
    await start();
  };

  const schedule = (): void => {
    if (!watching) return;
    timer = setTimeout(() => {
      poll().then(schedule, (err: unknown) => {
        log.error({ err }, 'Failed to poll service');
        schedule();
      });
    }, settings.pollIntervalMs);
  };

  const watch = (): void => {
    if (watching) return;
    watching = true;
    schedule();
  };

  const unwatch = (): void => {
    watching = false;
    cancelPendingRestart();
    if (timer) clearTimeout(timer);
    timer = undefined;
  };

  type Verdict = 'met' | 'pending' | { failed: string };

  const evaluate = (condition: DependencyCondition): Verdict => {
    if (state === 'stopped') return { failed: 'was stopped' };
    if (state === 'failed') return { failed: `failed${exitCode === undefined ? '' : ` with exit code ${exitCode}`}` };

    switch (condition) {
      case 'service_started':
        if (state === 'running' || state === 'healthy' || state === 'unhealthy') return 'met';
        if (state === 'exited') return { failed: `exited with code ${exitCode ?? -1}` };
        return 'pending';
      case 'service_healthy':
        if (state === 'healthy') return 'met';
        if (state === 'unhealthy') return { failed: 'is unhealthy' };
        if (state === 'exited') return { failed: `exited with code ${exitCode ?? -1}` };
        return 'pending';
      case 'service_completed_successfully':
        if (state === 'exited') return exitCode === 0 ? 'met' : { failed: `exited with code ${exitCode ?? -1}` };
        return 'pending';
    }
  };

  const waitFor = async (condition: DependencyCondition, timeoutMs: number): Promise<void> => {
    const deadline = Date.now() + timeoutMs;

    for (;;) {
      await poll();
      const verdict = evaluate(condition);
      if (verdict === 'met') return;
      if (verdict !== 'pending') throw new DependencyFailedError(service.name, verdict.failed);

      const remaining = deadline - Date.now();
      if (remaining <= 0) throw new DependencyTimeoutError(service.name, condition, timeoutMs);
      await sleep(Math.min(settings.pollIntervalMs, remaining));
    }
  };

  const isHealthy = (): boolean => {
    if (state === 'healthy') return true;
    if (state === 'running') return !service.healthcheck;
    // One-shot jobs that finished cleanly
    return state === 'exited' && exitCode === 0 && service.restart.name === 'no';
  };

  const status = (): ServiceStatus => ({
    service: service.name,
    container: containerName,
    state,
    health,
    exitCode,
    restarts,
    ports: service.ports.map(formatPort),
  });

  const logs = async (tail: number): Promise<string> => {
    const id = containerId ?? (await runtime.findContainer(containerName))?.id;
    if (!id) return '';
    return runtime.containerLogs(id, tail);
  };

  const supervisor: Supervisor = {
    name: service.name,
    containerName,
    attach,
    start,
    stop,
    restart,
    remove,
    poll,
    watch,
    unwatch,
    waitFor,
    isHealthy,
    status,
    logs,
    on: (
      event: string,
      listener:
        | ((state: ServiceState, previous: ServiceState) => void)
        | ((attempt: number, delayMs: number, exitCode: number) => void)
    ) => {
      emitter.on(event, listener);
      return supervisor;
    },
  };

  return supervisor;
};
