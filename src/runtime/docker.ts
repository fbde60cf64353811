import { Readable } from 'node:stream';
import Docker from 'dockerode';
import * as tar from 'tar';
import { RuntimeError } from '../errors';
import logger from '../logger';
import type {
  BuildImageSpec,
  ContainerCreateSpec,
  ContainerRuntime,
  ContainerState,
  ContainerStatus,
  ContainerSummary,
  HealthStatus,
  NetworkCreateSpec,
  NetworkInfo,
  VolumeCreateSpec,
  VolumeInfo,
} from './types';

const CONTAINER_STATUSES: readonly ContainerStatus[] = [
  'created',
  'running',
  'paused',
  'restarting',
  'removing',
  'exited',
  'dead',
];

const toContainerStatus = (value: string): ContainerStatus =>
  CONTAINER_STATUSES.find(status => status === value) ?? 'dead';

const toHealthStatus = (value: string | undefined): HealthStatus => {
  switch (value) {
    case 'starting':
    case 'healthy':
    case 'unhealthy':
      return value;
    default:
      return 'none';
  }
};

const statusCodeOf = (err: unknown): number | undefined =>
  typeof err === 'object' && err !== null && 'statusCode' in err && typeof err.statusCode === 'number'
    ? err.statusCode
    : undefined;

const labelFilters = (labels: Record<string, string>): string[] =>
  Object.entries(labels).map(([ key, value ]) => `${key}=${value}`);

const NANOS_PER_MS = 1_000_000;

/**
 * Split the multiplexed stdout/stderr framing the engine uses for logs of
 * containers without a TTY. Each frame is an 8 byte header (stream type,
 * padding, big-endian length) followed by the payload.
 */
export const demuxLogs = (buffer: Buffer): string => {
  const looksFramed = buffer.length >= 8 && buffer[0] <= 2 && buffer[1] === 0 && buffer[2] === 0 && buffer[3] === 0;
  if (!looksFramed) return buffer.toString('utf-8');

  const chunks: Buffer[] = [];
  let offset = 0;
  while (offset + 8 <= buffer.length) {
    const size = buffer.readUInt32BE(offset + 4);
    chunks.push(buffer.subarray(offset + 8, offset + 8 + size));
    offset += 8 + size;
  }
  return Buffer.concat(chunks).toString('utf-8');
};

/**
 * ContainerRuntime backed by the Docker Engine API.
 */
export class DockerRuntime implements ContainerRuntime {
  private readonly docker: Docker;

  constructor(docker: Docker) {
    this.docker = docker;
  }

  static connect(socketPath: string): DockerRuntime {
    return new DockerRuntime(new Docker({ socketPath }));
  }

  async hasImage(ref: string): Promise<boolean> {
    try {
      await this.docker.getImage(ref).inspect();
      return true;
    } catch (err) {
      if (statusCodeOf(err) === 404) return false;
      throw this.wrap(`inspect image ${ref}`, err);
    }
  }

  async pullImage(ref: string): Promise<void> {
    logger.info({ image: ref }, 'Pulling image');
    await this.call(`pull image ${ref}`, async () => {
      const stream = await this.docker.pull(ref, {});
      await this.followProgress(stream);
    });
  }

  async buildImage(spec: BuildImageSpec): Promise<void> {
    logger.info({ image: spec.tag, context: spec.context }, 'Building image');
    await this.call(`build image ${spec.tag}`, async () => {
      const context = Readable.from(tar.c({ cwd: spec.context, portable: true }, [ '.' ]));
      const stream = await this.docker.buildImage(context, {
        t: spec.tag,
        dockerfile: spec.dockerfile,
        buildargs: spec.args,
      });
      await this.followProgress(stream);
    });
  }

  async findNetwork(name: string): Promise<NetworkInfo | null> {
    return this.call(`find network ${name}`, async () => {
      const networks = await this.docker.listNetworks({ filters: { name: [ name ] } });
      // The name filter matches substrings
      const match = networks.find(network => network.Name === name);
      return match ? this.inspectNetwork(match.Id) : null;
    });
  }

  async listNetworks(labels: Record<string, string>): Promise<NetworkInfo[]> {
    return this.call('list networks', async () => {
      const networks = await this.docker.listNetworks({ filters: { label: labelFilters(labels) } });
      return Promise.all(networks.map(network => this.inspectNetwork(network.Id)));
    });
  }

  async createNetwork(spec: NetworkCreateSpec): Promise<NetworkInfo> {
    return this.call(`create network ${spec.name}`, async () => {
      const network = await this.docker.createNetwork({
        Name: spec.name,
        Driver: spec.driver,
        Internal: spec.internal,
        CheckDuplicate: true,
        Labels: spec.labels,
      });
      return this.inspectNetwork(network.id);
    });
  }

  async removeNetwork(name: string): Promise<void> {
    await this.call(`remove network ${name}`, () => this.docker.getNetwork(name).remove());
  }

  async findVolume(name: string): Promise<VolumeInfo | null> {
    try {
      const info = await this.docker.getVolume(name).inspect();
      return { name: info.Name, driver: info.Driver, labels: info.Labels ?? {} };
    } catch (err) {
      if (statusCodeOf(err) === 404) return null;
      throw this.wrap(`inspect volume ${name}`, err);
    }
  }

  async listVolumes(labels: Record<string, string>): Promise<VolumeInfo[]> {
    return this.call('list volumes', async () => {
      const result = await this.docker.listVolumes({ filters: { label: labelFilters(labels) } });
      return (result.Volumes ?? []).map(volume => ({
        name: volume.Name,
        driver: volume.Driver,
        labels: volume.Labels ?? {},
      }));
    });
  }

  async createVolume(spec: VolumeCreateSpec): Promise<VolumeInfo> {
    await this.call(`create volume ${spec.name}`, () =>
      this.docker.createVolume({ Name: spec.name, Driver: spec.driver, Labels: spec.labels })
    );
    return { name: spec.name, driver: spec.driver, labels: spec.labels };
  }

  async removeVolume(name: string): Promise<void> {
    await this.call(`remove volume ${name}`, () => this.docker.getVolume(name).remove());
  }

  async findContainer(name: string): Promise<ContainerSummary | null> {
    return this.call(`find container ${name}`, async () => {
      const containers = await this.docker.listContainers({ all: true, filters: { name: [ name ] } });
      const match = containers.find(container => container.Names.includes(`/${name}`));
      return match ? this.toSummary(match) : null;
    });
  }

  async listContainers(labels: Record<string, string>): Promise<ContainerSummary[]> {
    return this.call('list containers', async () => {
      const containers = await this.docker.listContainers({ all: true, filters: { label: labelFilters(labels) } });
      return containers.map(container => this.toSummary(container));
    });
  }

  async createContainer(spec: ContainerCreateSpec): Promise<string> {
    const exposedPorts: Record<string, object> = {};
    const portBindings: Docker.PortMap = {};
    for (const port of spec.ports) {
      const key = `${port.containerPort}/${port.protocol}`;
      exposedPorts[key] = {};
      if (port.hostPort !== undefined || port.hostIp !== undefined) {
        portBindings[key] = [
          ...(portBindings[key] ?? []),
          { HostIp: port.hostIp ?? '', HostPort: port.hostPort === undefined ? '' : String(port.hostPort) },
        ];
      }
    }

    const [ primary, ...secondary ] = spec.networks;
    const healthcheck = spec.healthcheck;

    return this.call(`create container ${spec.name}`, async () => {
      const container = await this.docker.createContainer({
        name: spec.name,
        Image: spec.image,
        Cmd: spec.command,
        Env: Object.entries(spec.env).map(([ key, value ]) => `${key}=${value}`),
        Labels: spec.labels,
        ExposedPorts: exposedPorts,
        StopTimeout: spec.stopTimeoutSeconds,
        Healthcheck: healthcheck && {
          // An empty test keeps the image's own HEALTHCHECK
          Test: healthcheck.test.length > 0 ? healthcheck.test : undefined,
          Interval: healthcheck.intervalMs * NANOS_PER_MS,
          Timeout: healthcheck.timeoutMs * NANOS_PER_MS,
          StartPeriod: healthcheck.startPeriodMs * NANOS_PER_MS,
          Retries: healthcheck.retries,
        },
        HostConfig: {
          Binds: spec.binds,
          PortBindings: portBindings,
          NetworkMode: primary?.name,
          // Restarts are decided by the supervisor, not the engine
          RestartPolicy: { Name: 'no' },
        },
        NetworkingConfig: primary
          ? { EndpointsConfig: { [primary.name]: { Aliases: primary.aliases } } }
          : undefined,
      });

      try {
        for (const attachment of secondary) {
          await this.docker.getNetwork(attachment.name).connect({
            Container: container.id,
            EndpointConfig: { Aliases: attachment.aliases },
          });
        }
      } catch (err) {
        // No container may keep a config hash while missing networks
        await container.remove({ force: true }).catch((removeErr: unknown) => {
          logger.warn({ err: removeErr, container: spec.name }, 'Failed to remove partially created container');
        });
        throw err;
      }

      return container.id;
    });
  }

  async startContainer(id: string): Promise<void> {
    try {
      await this.docker.getContainer(id).start();
    } catch (err) {
      // 304: already running
      if (statusCodeOf(err) !== 304) throw this.wrap(`start container ${id}`, err);
    }
  }

  async stopContainer(id: string, timeoutSeconds?: number): Promise<void> {
    try {
      await this.docker.getContainer(id).stop(timeoutSeconds === undefined ? {} : { t: timeoutSeconds });
    } catch (err) {
      // 304: already stopped
      if (statusCodeOf(err) !== 304) throw this.wrap(`stop container ${id}`, err);
    }
  }

  async removeContainer(id: string): Promise<void> {
    await this.call(`remove container ${id}`, () => this.docker.getContainer(id).remove({ force: true }));
  }

  async inspectContainer(id: string): Promise<ContainerState> {
    return this.call(`inspect container ${id}`, async () => {
      const info = await this.docker.getContainer(id).inspect();
      return {
        id: info.Id,
        name: info.Name.replace(/^\//, ''),
        status: toContainerStatus(info.State.Status),
        labels: info.Config.Labels ?? {},
        running: info.State.Running,
        exitCode: info.State.ExitCode,
        health: toHealthStatus(info.State.Health?.Status),
        startedAt: info.State.StartedAt,
        finishedAt: info.State.FinishedAt,
      };
    });
  }

  async containerLogs(id: string, tail: number): Promise<string> {
    return this.call(`read logs of ${id}`, async () => {
      const buffer = await this.docker.getContainer(id).logs({
        stdout: true,
        stderr: true,
        tail,
        follow: false,
      });
      return demuxLogs(buffer);
    });
  }

  // --- Private helpers ---

  private toSummary(container: Docker.ContainerInfo): ContainerSummary {
    return {
      id: container.Id,
      name: (container.Names[0] ?? '').replace(/^\//, ''),
      status: toContainerStatus(container.State),
      labels: container.Labels ?? {},
    };
  }

  private async inspectNetwork(id: string): Promise<NetworkInfo> {
    const info: Docker.NetworkInspectInfo = await this.docker.getNetwork(id).inspect();
    return {
      id: info.Id,
      name: info.Name,
      driver: info.Driver,
      internal: info.Internal,
      labels: info.Labels ?? {},
      containerCount: Object.keys(info.Containers ?? {}).length,
    };
  }

  private followProgress(stream: NodeJS.ReadableStream): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      this.docker.modem.followProgress(stream, (err: Error | null, output: Array<{ error?: string }>) => {
        const failed = output?.find(event => event.error);
        if (err) reject(err);
        else if (failed?.error) reject(new Error(failed.error));
        else resolve();
      });
    });
  }

  private wrap(action: string, err: unknown): RuntimeError {
    if (err instanceof RuntimeError) return err;
    const message = err instanceof Error ? err.message : String(err);
    return new RuntimeError(`Failed to ${action}: ${message}`, statusCodeOf(err), { cause: err });
  }

  private async call<T>(action: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (err) {
      throw this.wrap(action, err);
    }
  }
}
