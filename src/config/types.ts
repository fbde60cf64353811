/**
 * Normalized stack model. Everything the loader hands out has defaults
 * applied, paths made absolute and short syntax expanded.
 */

export type DependencyCondition = 'service_started' | 'service_healthy' | 'service_completed_successfully';

export type RestartPolicy =
  | { name: 'no' }
  | { name: 'always' }
  | { name: 'unless-stopped' }
  | { name: 'on-failure'; maxRetries?: number };

export type Protocol = 'tcp' | 'udp';

export interface PortMapping {
  containerPort: number;
  protocol: Protocol;
  /** Unset means the runtime picks a free host port. */
  hostPort?: number;
  hostIp?: string;
}

export interface VolumeMount {
  type: 'bind' | 'volume';
  /** Absolute host path for binds, the declared volume name otherwise. */
  source: string;
  target: string;
  readOnly: boolean;
}

export interface HealthcheckSpec {
  test: string[];
  intervalMs: number;
  timeoutMs: number;
  retries: number;
  startPeriodMs: number;
}

export interface BuildSpec {
  context: string;
  dockerfile: string;
  args: Record<string, string>;
}

export interface ServiceSpec {
  name: string;
  image?: string;
  build?: BuildSpec;
  command?: string[];
  environment: Record<string, string>;
  ports: PortMapping[];
  volumes: VolumeMount[];
  networks: string[];
  dependsOn: Record<string, DependencyCondition>;
  healthcheck?: HealthcheckSpec;
  restart: RestartPolicy;
  secrets: string[];
  labels: Record<string, string>;
  stopGracePeriodMs?: number;
}

export interface NetworkSpec {
  name: string;
  driver: string;
  internal: boolean;
  external: boolean;
}

export interface VolumeSpec {
  name: string;
  driver: string;
  external: boolean;
}

export interface SecretSpec {
  name: string;
  /** Absolute path of the file holding the secret. */
  file: string;
}

export interface ProxyRoute {
  path: string;
  service: string;
  port: number;
  websocket: boolean;
}

export interface ProxySpec {
  listen: number;
  serverName: string;
  root?: string;
  routes: ProxyRoute[];
}

export interface BackupSpec {
  paths: string[];
  destination: string;
  keep?: number;
}

export interface Stack {
  project: string;
  file: string;
  directory: string;
  services: Record<string, ServiceSpec>;
  networks: Record<string, NetworkSpec>;
  volumes: Record<string, VolumeSpec>;
  secrets: Record<string, SecretSpec>;
  proxy?: ProxySpec;
  backup?: BackupSpec;
  /** Non-fatal findings, e.g. unset variables. */
  warnings: string[];
}

/** Mount point of secrets inside a container. */
export const SECRETS_DIR = '/run/secrets';

/** Network a service joins when it names none. */
export const DEFAULT_NETWORK = 'default';
