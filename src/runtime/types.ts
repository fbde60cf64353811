import type { HealthcheckSpec, PortMapping } from '../config/types';

/** Labels homestack puts on everything it creates. */
export const LABELS = {
  project: 'homestack.project',
  service: 'homestack.service',
  network: 'homestack.network',
  volume: 'homestack.volume',
  configHash: 'homestack.config-hash',
} as const;

export type ContainerStatus = 'created' | 'running' | 'paused' | 'restarting' | 'removing' | 'exited' | 'dead';

export type HealthStatus = 'none' | 'starting' | 'healthy' | 'unhealthy';

export interface ContainerSummary {
  id: string;
  name: string;
  status: ContainerStatus;
  labels: Record<string, string>;
}

export interface ContainerState extends ContainerSummary {
  running: boolean;
  exitCode: number;
  health: HealthStatus;
  startedAt?: string;
  finishedAt?: string;
}

export interface NetworkInfo {
  id: string;
  name: string;
  driver: string;
  internal: boolean;
  labels: Record<string, string>;
  containerCount: number;
}

export interface VolumeInfo {
  name: string;
  driver: string;
  labels: Record<string, string>;
}

export interface NetworkCreateSpec {
  name: string;
  driver: string;
  internal: boolean;
  labels: Record<string, string>;
}

export interface VolumeCreateSpec {
  name: string;
  driver: string;
  labels: Record<string, string>;
}

export interface NetworkAttachment {
  name: string;
  aliases: string[];
}

export interface ContainerCreateSpec {
  name: string;
  image: string;
  command?: string[];
  env: Record<string, string>;
  labels: Record<string, string>;
  ports: PortMapping[];
  /** `source:target[:ro]` */
  binds: string[];
  networks: NetworkAttachment[];
  healthcheck?: HealthcheckSpec;
  stopTimeoutSeconds?: number;
}

export interface BuildImageSpec {
  tag: string;
  context: string;
  dockerfile: string;
  args: Record<string, string>;
}

/**
 * What homestack needs from a container engine. Failures surface as
 * RuntimeError carrying the engine's status code where it has one.
 */
export interface ContainerRuntime {
  hasImage(ref: string): Promise<boolean>;
  pullImage(ref: string): Promise<void>;
  buildImage(spec: BuildImageSpec): Promise<void>;

  findNetwork(name: string): Promise<NetworkInfo | null>;
  listNetworks(labels: Record<string, string>): Promise<NetworkInfo[]>;
  createNetwork(spec: NetworkCreateSpec): Promise<NetworkInfo>;
  removeNetwork(name: string): Promise<void>;

  findVolume(name: string): Promise<VolumeInfo | null>;
  listVolumes(labels: Record<string, string>): Promise<VolumeInfo[]>;
  createVolume(spec: VolumeCreateSpec): Promise<VolumeInfo>;
  removeVolume(name: string): Promise<void>;

  findContainer(name: string): Promise<ContainerSummary | null>;
  listContainers(labels: Record<string, string>): Promise<ContainerSummary[]>;
  createContainer(spec: ContainerCreateSpec): Promise<string>;
  startContainer(id: string): Promise<void>;
  stopContainer(id: string, timeoutSeconds?: number): Promise<void>;
  removeContainer(id: string): Promise<void>;
  inspectContainer(id: string): Promise<ContainerState>;
  containerLogs(id: string, tail: number): Promise<string>;
}
