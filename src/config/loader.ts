import { existsSync, readFileSync } from 'node:fs';
import path from 'node:path';
import { parse as parseDotenv } from 'dotenv';
import { parseDocument } from 'yaml';
import type { ZodIssue } from 'zod';
import { DependencyCycleError, HomestackError, StackConfigError } from '../errors';
import type { ConfigIssue } from '../errors';
import { resolveLayers } from '../resolver';
import { interpolate, InterpolationError } from './interpolate';
import type { Environment } from './interpolate';
import {
  ParseError,
  parseDuration,
  parsePort,
  parseRestartPolicy,
  parseVolume,
  splitCommand,
} from './parse';
import { rawStackSchema } from './schema';
import type { KeyValues, RawService, RawStack } from './schema';
import { DEFAULT_NETWORK } from './types';
import type {
  DependencyCondition,
  HealthcheckSpec,
  NetworkSpec,
  PortMapping,
  ServiceSpec,
  Stack,
  VolumeMount,
} from './types';

export interface LoadOptions {
  /** Variables used for interpolation. Defaults to process.env. */
  env?: Environment;
  /** Overrides the `name:` key and the directory name. */
  project?: string;
}

export interface ParseOptions extends LoadOptions {
  /** Used in messages and to resolve relative paths. */
  file: string;
}

const SERVICE_NAME = /^[a-zA-Z0-9][a-zA-Z0-9_.-]*$/;
const RESERVED_LABEL_PREFIX = 'homestack.';

const HEALTHCHECK_DEFAULTS = {
  intervalMs: 30_000,
  timeoutMs: 30_000,
  retries: 3,
  startPeriodMs: 0,
};

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const joinPath = (base: string, key: string): string => (base ? `${base}.${key}` : key);

const formatZodPath = (segments: (string | number)[]): string =>
  segments.reduce<string>(
    (acc, segment) => (typeof segment === 'number' ? `${acc}[${segment}]` : joinPath(acc, segment)),
    ''
  );

const fromZodIssue = (issue: ZodIssue): ConfigIssue => ({
  path: formatZodPath(issue.path),
  message: issue.message,
});

/**
 * Turn a project name into one that is safe as a runtime name prefix.
 */
export const sanitizeProjectName = (name: string): string =>
  name.toLowerCase().replace(/[^a-z0-9_-]/g, '');

/**
 * Collects issues while walking the raw stack so that every problem is
 * reported at once.
 */
class Normalizer {
  readonly issues: ConfigIssue[] = [];

  constructor(
    private readonly directory: string,
    private readonly env: Environment
  ) {}

  issue(issuePath: string, message: string): void {
    this.issues.push({ path: issuePath, message });
  }

  /** Run a short-syntax parser, recording a ParseError as an issue. */
  attempt<T>(issuePath: string, parse: () => T): T | undefined {
    try {
      return parse();
    } catch (err) {
      if (err instanceof ParseError) {
        this.issue(issuePath, err.message);
        return undefined;
      }
      throw err;
    }
  }

  keyValues(values: KeyValues | undefined): Record<string, string> {
    const out: Record<string, string> = {};
    if (values === undefined) return out;

    if (Array.isArray(values)) {
      for (const entry of values) {
        const eq = entry.indexOf('=');
        if (eq === -1) {
          const inherited = this.env[entry];
          if (inherited !== undefined) out[entry] = inherited;
        } else {
          out[entry.slice(0, eq)] = entry.slice(eq + 1);
        }
      }
      return out;
    }

    for (const [ key, value ] of Object.entries(values)) {
      if (value === null) {
        const inherited = this.env[key];
        if (inherited !== undefined) out[key] = inherited;
      } else {
        out[key] = String(value);
      }
    }
    return out;
  }

  envFiles(files: string | string[] | undefined, issuePath: string): Record<string, string> {
    const list = files === undefined ? [] : Array.isArray(files) ? files : [ files ];
    const out: Record<string, string> = {};

    list.forEach((file, index) => {
      const resolved = path.resolve(this.directory, file);
      if (!existsSync(resolved)) {
        this.issue(Array.isArray(files) ? `${issuePath}[${index}]` : issuePath, `env file ${resolved} not found`);
        return;
      }
      Object.assign(out, parseDotenv(readFileSync(resolved, 'utf-8')));
    });

    return out;
  }

  healthcheck(raw: RawService['healthcheck'], issuePath: string): HealthcheckSpec | undefined {
    if (!raw || raw.disable) return undefined;

    let test: string[] = [];
    if (typeof raw.test === 'string') {
      test = [ 'CMD-SHELL', raw.test ];
    } else if (raw.test) {
      const [ kind ] = raw.test;
      if (kind === 'NONE') return undefined;
      if (kind !== 'CMD' && kind !== 'CMD-SHELL') {
        this.issue(joinPath(issuePath, 'test'), 'must start with "CMD", "CMD-SHELL" or "NONE"');
      }
      test = raw.test;
    }

    const duration = (key: string, value: string | number | undefined, fallback: number): number => {
      if (value === undefined) return fallback;
      return this.attempt(joinPath(issuePath, key), () => parseDuration(value)) ?? fallback;
    };

    return {
      test,
      intervalMs: duration('interval', raw.interval, HEALTHCHECK_DEFAULTS.intervalMs),
      timeoutMs: duration('timeout', raw.timeout, HEALTHCHECK_DEFAULTS.timeoutMs),
      retries: raw.retries ?? HEALTHCHECK_DEFAULTS.retries,
      startPeriodMs: duration('start_period', raw.start_period, HEALTHCHECK_DEFAULTS.startPeriodMs),
    };
  }

  service(name: string, raw: RawService): ServiceSpec {
    const base = `services.${name}`;

    if (!SERVICE_NAME.test(name)) {
      this.issue(base, 'service names must match [a-zA-Z0-9][a-zA-Z0-9_.-]*');
    }
    if (!raw.image && !raw.build) {
      this.issue(base, 'must define "image" or "build"');
    }

    const build = raw.build === undefined
      ? undefined
      : typeof raw.build === 'string'
        ? { context: path.resolve(this.directory, raw.build), dockerfile: 'Dockerfile', args: {} }
        : {
            context: path.resolve(this.directory, raw.build.context),
            dockerfile: raw.build.dockerfile ?? 'Dockerfile',
            args: this.keyValues(raw.build.args),
          };

    const rawCommand = raw.command;
    const command = typeof rawCommand === 'string'
      ? this.attempt(joinPath(base, 'command'), () => splitCommand(rawCommand))
      : rawCommand;

    const ports = (raw.ports ?? [])
      .map((spec, index) => this.attempt(`${base}.ports[${index}]`, () => parsePort(spec)))
      .filter((port): port is PortMapping => port !== undefined);

    const volumes = (raw.volumes ?? [])
      .map((spec, index) => this.attempt(`${base}.volumes[${index}]`, () => parseVolume(spec, this.directory)))
      .filter((mount): mount is VolumeMount => mount !== undefined);

    const dependsOn: Record<string, DependencyCondition> = {};
    if (Array.isArray(raw.depends_on)) {
      for (const dependency of raw.depends_on) dependsOn[dependency] = 'service_started';
    } else if (raw.depends_on) {
      for (const [ dependency, entry ] of Object.entries(raw.depends_on)) dependsOn[dependency] = entry.condition;
    }

    const labels = this.keyValues(raw.labels);
    for (const key of Object.keys(labels)) {
      if (key.startsWith(RESERVED_LABEL_PREFIX)) {
        this.issue(joinPath(base, 'labels'), `label "${key}" uses the reserved prefix "${RESERVED_LABEL_PREFIX}"`);
      }
    }

    const restart = this.attempt(joinPath(base, 'restart'), () => parseRestartPolicy(raw.restart ?? 'no'));
    const stopGrace = raw.stop_grace_period;

    return {
      name,
      image: raw.image,
      build,
      command,
      environment: {
        ...this.envFiles(raw.env_file, joinPath(base, 'env_file')),
        ...this.keyValues(raw.environment),
      },
      ports,
      volumes,
      networks: [ ...new Set(raw.networks ?? [ DEFAULT_NETWORK ]) ],
      dependsOn,
      healthcheck: this.healthcheck(raw.healthcheck, joinPath(base, 'healthcheck')),
      restart: restart ?? { name: 'no' },
      secrets: [ ...new Set(raw.secrets ?? []) ],
      labels,
      stopGracePeriodMs: stopGrace === undefined
        ? undefined
        : this.attempt(joinPath(base, 'stop_grace_period'), () => parseDuration(stopGrace)),
    };
  }

  /**
   * References between sections: networks, volumes, secrets, dependencies
   * and proxy routes must point at something declared.
   */
  crossCheck(raw: RawStack, services: Record<string, ServiceSpec>): void {
    const declaredNetworks = raw.networks ?? {};
    const declaredVolumes = raw.volumes ?? {};
    const declaredSecrets = raw.secrets ?? {};

    for (const service of Object.values(services)) {
      const base = `services.${service.name}`;

      for (const network of service.networks) {
        if (network !== DEFAULT_NETWORK && !(network in declaredNetworks)) {
          this.issue(joinPath(base, 'networks'), `undefined network "${network}"`);
        }
      }

      service.volumes.forEach((mount, index) => {
        if (mount.type === 'volume' && !(mount.source in declaredVolumes)) {
          this.issue(`${base}.volumes[${index}]`, `undefined volume "${mount.source}"`);
        }
      });

      for (const secret of service.secrets) {
        if (!(secret in declaredSecrets)) {
          this.issue(joinPath(base, 'secrets'), `undefined secret "${secret}"`);
        }
      }

      for (const [ dependency, condition ] of Object.entries(service.dependsOn)) {
        const target = services[dependency];
        if (!target) {
          this.issue(joinPath(base, 'depends_on'), `depends on undefined service "${dependency}"`);
        } else if (condition === 'service_healthy' && !target.healthcheck) {
          this.issue(
            joinPath(base, 'depends_on'),
            `waits for "${dependency}" to be healthy but "${dependency}" has no healthcheck`
          );
        }
      }
    }

    raw.proxy?.routes.forEach((route, index) => {
      if (!services[route.service]) {
        this.issue(`proxy.routes[${index}].service`, `undefined service "${route.service}"`);
      }
    });
  }
}

const interpolateTree = (
  value: unknown,
  env: Environment,
  at: string,
  issues: ConfigIssue[],
  unset: Set<string>
): unknown => {
  if (typeof value === 'string') {
    try {
      const result = interpolate(value, env);
      result.unset.forEach(name => unset.add(name));
      return result.value;
    } catch (err) {
      if (err instanceof InterpolationError) {
        issues.push({ path: at, message: err.message });
        return value;
      }
      throw err;
    }
  }

  if (Array.isArray(value)) {
    return value.map((item, index) => interpolateTree(item, env, `${at}[${index}]`, issues, unset));
  }

  if (isRecord(value)) {
    return Object.fromEntries(
      Object.entries(value).map(([ key, item ]) => [ key, interpolateTree(item, env, joinPath(at, key), issues, unset) ])
    );
  }

  return value;
};

/**
 * Parse stack file text into a normalized Stack.
 * Throws StackConfigError listing every problem found.
 */
export const parseStack = (text: string, options: ParseOptions): Stack => {
  const file = path.resolve(options.file);
  const directory = path.dirname(file);
  const env = options.env ?? process.env;

  const doc = parseDocument(text, { merge: true });
  if (doc.errors.length > 0) {
    throw new StackConfigError(file, doc.errors.map(err => ({ path: '', message: err.message })));
  }

  const data: unknown = doc.toJS();
  if (!isRecord(data)) {
    throw new StackConfigError(file, [ { path: '', message: 'top level must be a mapping' } ]);
  }

  // `x-` keys hold YAML anchors for reuse and are not part of the model.
  const withoutExtensions = Object.fromEntries(Object.entries(data).filter(([ key ]) => !key.startsWith('x-')));

  const issues: ConfigIssue[] = [];
  const unset = new Set<string>();
  const interpolated = interpolateTree(withoutExtensions, env, '', issues, unset);
  if (issues.length > 0) {
    throw new StackConfigError(file, issues);
  }

  const parsed = rawStackSchema.safeParse(interpolated);
  if (!parsed.success) {
    throw new StackConfigError(file, parsed.error.issues.map(fromZodIssue));
  }
  const raw = parsed.data;

  const normalizer = new Normalizer(directory, env);

  const project = sanitizeProjectName(options.project ?? raw.name ?? path.basename(directory));
  if (!project) {
    normalizer.issue('name', 'project name is empty once reduced to [a-z0-9_-]');
  }

  const services: Record<string, ServiceSpec> = {};
  for (const [ name, service ] of Object.entries(raw.services)) {
    services[name] = normalizer.service(name, service);
  }
  if (Object.keys(services).length === 0) {
    normalizer.issue('services', 'at least one service is required');
  }

  normalizer.crossCheck(raw, services);

  const networks: Record<string, NetworkSpec> = {};
  for (const [ name, network ] of Object.entries(raw.networks ?? {})) {
    networks[name] = {
      name,
      driver: network?.driver ?? 'bridge',
      internal: network?.internal ?? false,
      external: network?.external ?? false,
    };
  }
  const usesDefault = Object.values(services).some(service => service.networks.includes(DEFAULT_NETWORK));
  if (usesDefault && !networks[DEFAULT_NETWORK]) {
    networks[DEFAULT_NETWORK] = { name: DEFAULT_NETWORK, driver: 'bridge', internal: false, external: false };
  }

  const stack: Stack = {
    project,
    file,
    directory,
    services,
    networks,
    volumes: Object.fromEntries(
      Object.entries(raw.volumes ?? {}).map(([ name, volume ]) => [
        name,
        { name, driver: volume?.driver ?? 'local', external: volume?.external ?? false },
      ])
    ),
    secrets: Object.fromEntries(
      Object.entries(raw.secrets ?? {}).map(([ name, secret ]) => [
        name,
        { name, file: path.resolve(directory, secret.file) },
      ])
    ),
    proxy: raw.proxy && {
      listen: raw.proxy.listen ?? 80,
      serverName: raw.proxy.server_name,
      root: raw.proxy.root,
      routes: raw.proxy.routes.map(route => ({ ...route, websocket: route.websocket ?? false })),
    },
    backup: raw.backup && {
      paths: raw.backup.paths,
      destination: path.resolve(directory, raw.backup.destination),
      keep: raw.backup.keep,
    },
    warnings: [ ...unset ].sort().map(name => `The "${name}" variable is not set. Defaulting to a blank string.`),
  };

  // Cycles only make sense once every dependency resolves to a service.
  if (normalizer.issues.length === 0) {
    try {
      resolveLayers(stack);
    } catch (err) {
      if (err instanceof DependencyCycleError) {
        normalizer.issue('services', err.message);
      } else {
        throw err;
      }
    }
  }

  if (normalizer.issues.length > 0) {
    throw new StackConfigError(file, normalizer.issues);
  }

  return stack;
};

/**
 * Read `.env` beside the stack file. Values from the process environment win.
 */
const readDotenv = (directory: string): Environment => {
  const envFile = path.join(directory, '.env');
  return existsSync(envFile) ? parseDotenv(readFileSync(envFile, 'utf-8')) : {};
};

/**
 * Load and validate a stack file.
 */
export const loadStack = (file: string, options: LoadOptions = {}): Stack => {
  const resolved = path.resolve(file);
  if (!existsSync(resolved)) {
    throw new HomestackError(`Stack file not found: ${resolved}`);
  }

  const env = { ...readDotenv(path.dirname(resolved)), ...(options.env ?? process.env) };
  return parseStack(readFileSync(resolved, 'utf-8'), { ...options, env, file: resolved });
};
