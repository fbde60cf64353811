import { stringify as stringifyYaml } from 'yaml';
import { formatDuration, formatPort, formatRestartPolicy } from './parse';
import type { ServiceSpec, Stack } from './types';

/**
 * Values are already interpolated; double every `$` so loading the output
 * yields the same strings.
 */
const escapeDollars = (value: unknown): unknown => {
  if (typeof value === 'string') return value.replaceAll('$', '$$$$');
  if (Array.isArray(value)) return value.map(escapeDollars);
  if (typeof value === 'object' && value !== null) {
    return Object.fromEntries(Object.entries(value).map(([ key, item ]) => [ key, escapeDollars(item) ]));
  }
  return value;
};

const renderService = (service: ServiceSpec): Record<string, unknown> => ({
  image: service.image,
  build: service.build && {
    context: service.build.context,
    dockerfile: service.build.dockerfile,
    args: Object.keys(service.build.args).length > 0 ? service.build.args : undefined,
  },
  command: service.command,
  environment: Object.keys(service.environment).length > 0 ? service.environment : undefined,
  ports: service.ports.length > 0 ? service.ports.map(formatPort) : undefined,
  volumes: service.volumes.length > 0
    ? service.volumes.map(mount => `${mount.source}:${mount.target}${mount.readOnly ? ':ro' : ''}`)
    : undefined,
  networks: service.networks,
  depends_on: Object.keys(service.dependsOn).length > 0
    ? Object.fromEntries(Object.entries(service.dependsOn).map(([ name, condition ]) => [ name, { condition } ]))
    : undefined,
  healthcheck: service.healthcheck && {
    test: service.healthcheck.test.length > 0 ? service.healthcheck.test : undefined,
    interval: formatDuration(service.healthcheck.intervalMs),
    timeout: formatDuration(service.healthcheck.timeoutMs),
    retries: service.healthcheck.retries,
    start_period: formatDuration(service.healthcheck.startPeriodMs),
  },
  restart: formatRestartPolicy(service.restart),
  secrets: service.secrets.length > 0 ? service.secrets : undefined,
  labels: Object.keys(service.labels).length > 0 ? service.labels : undefined,
  stop_grace_period: service.stopGracePeriodMs === undefined ? undefined : formatDuration(service.stopGracePeriodMs),
});

/**
 * Render the normalized stack as deterministic YAML (sorted keys).
 */
export const renderStack = (stack: Stack): string => {
  const document = {
    name: stack.project,
    services: Object.fromEntries(Object.values(stack.services).map(service => [ service.name, renderService(service) ])),
    networks: Object.fromEntries(
      Object.values(stack.networks).map(network => [
        network.name,
        { driver: network.driver, internal: network.internal || undefined, external: network.external || undefined },
      ])
    ),
    volumes: Object.keys(stack.volumes).length > 0
      ? Object.fromEntries(
          Object.values(stack.volumes).map(volume => [
            volume.name,
            { driver: volume.driver, external: volume.external || undefined },
          ])
        )
      : undefined,
    secrets: Object.keys(stack.secrets).length > 0
      ? Object.fromEntries(Object.values(stack.secrets).map(secret => [ secret.name, { file: secret.file } ]))
      : undefined,
    proxy: stack.proxy && {
      listen: stack.proxy.listen,
      server_name: stack.proxy.serverName,
      root: stack.proxy.root,
      routes: stack.proxy.routes,
    },
    backup: stack.backup,
  };

  return stringifyYaml(escapeDollars(document), {
    sortMapEntries: true,
    lineWidth: 0,
  });
};
