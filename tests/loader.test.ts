import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { loadStack, parseStack, sanitizeProjectName } from '../src/config/loader';
import { StackConfigError } from '../src/errors';
import { STACK_FILE, stackFrom } from './helpers/stack';

const issuesOf = (fn: () => unknown): unknown[] => {
  try {
    fn();
  } catch (err) {
    if (err instanceof StackConfigError) return err.issues;
    throw err;
  }
  throw new Error('expected a StackConfigError');
};

describe('parseStack', () => {
  it('fills in defaults for a minimal service', () => {
    const stack = stackFrom([
      'services:',
      '  web:',
      '    image: nginx:1.27',
      '    ports:',
      '      - "8080:80"',
    ]);

    expect(stack.project).toBe('media');
    expect(stack.file).toBe(STACK_FILE);
    expect(stack.directory).toBe('/srv/media');
    expect(stack.services.web).toEqual({
      name: 'web',
      image: 'nginx:1.27',
      build: undefined,
      command: undefined,
      environment: {},
      ports: [ { hostPort: 8080, containerPort: 80, protocol: 'tcp' } ],
      volumes: [],
      networks: [ 'default' ],
      dependsOn: {},
      healthcheck: undefined,
      restart: { name: 'no' },
      secrets: [],
      labels: {},
      stopGracePeriodMs: undefined,
    });
    expect(stack.networks).toEqual({
      default: { name: 'default', driver: 'bridge', internal: false, external: false },
    });
    expect(stack.warnings).toEqual([]);
  });

  it('takes the project from name, then from the option', () => {
    const lines = [ 'name: My Media!', 'services:', '  web:', '    image: nginx' ];

    expect(stackFrom(lines).project).toBe('mymedia');
    expect(parseStack(lines.join('\n'), { file: STACK_FILE, env: {}, project: 'Other' }).project).toBe('other');
  });

  it('interpolates values and warns about unset variables', () => {
    const stack = stackFrom([
      'services:',
      '  web:',
      '    image: "nginx:${TAG:-latest}"',
      '    environment:',
      '      DB_HOST: $DB_HOST',
      '      PASSWORD: ${PASSWORD}',
    ]);

    expect(stack.services.web?.image).toBe('nginx:latest');
    expect(stack.services.web?.environment).toEqual({ DB_HOST: '', PASSWORD: '' });
    expect(stack.warnings).toEqual([
      'The "DB_HOST" variable is not set. Defaulting to a blank string.',
      'The "PASSWORD" variable is not set. Defaulting to a blank string.',
    ]);
  });

  it('reports a missing required variable at its path', () => {
    const issues = issuesOf(() => stackFrom([
      'services:',
      '  web:',
      '    image: ${IMAGE:?IMAGE is required}',
    ]));

    expect(issues).toEqual([ { path: 'services.web.image', message: 'IMAGE is required' } ]);
  });

  it('normalizes environment lists and inherits bare names', () => {
    const stack = parseStack([
      'services:',
      '  web:',
      '    image: nginx',
      '    environment:',
      '      - MODE=prod',
      '      - TZ',
      '      - UNSET_ONE',
      '    labels:',
      '      traefik.enable: true',
    ].join('\n'), { file: STACK_FILE, env: { TZ: 'Europe/Paris' } });

    expect(stack.services.web?.environment).toEqual({ MODE: 'prod', TZ: 'Europe/Paris' });
    expect(stack.services.web?.labels).toEqual({ 'traefik.enable': 'true' });
  });

  it('expands both depends_on forms', () => {
    const stack = stackFrom([
      'services:',
      '  db:',
      '    image: postgres:16',
      '    healthcheck:',
      '      test: pg_isready',
      '  cache:',
      '    image: redis:7',
      '  api:',
      '    image: example/api',
      '    depends_on:',
      '      db:',
      '        condition: service_healthy',
      '      cache: {}',
      '  web:',
      '    image: nginx',
      '    depends_on: [api]',
    ]);

    expect(stack.services.api?.dependsOn).toEqual({ db: 'service_healthy', cache: 'service_started' });
    expect(stack.services.web?.dependsOn).toEqual({ api: 'service_started' });
  });

  it('normalizes healthchecks', () => {
    const stack = stackFrom([
      'services:',
      '  web:',
      '    image: nginx',
      '    healthcheck:',
      '      test: curl -f http://localhost',
      '      interval: 10s',
      '      retries: 5',
      '  worker:',
      '    image: example/worker',
      '    healthcheck:',
      '      test: ["NONE"]',
    ]);

    expect(stack.services.web?.healthcheck).toEqual({
      test: [ 'CMD-SHELL', 'curl -f http://localhost' ],
      intervalMs: 10_000,
      timeoutMs: 30_000,
      retries: 5,
      startPeriodMs: 0,
    });
    expect(stack.services.worker?.healthcheck).toBeUndefined();
  });

  it('splits string commands and parses the remaining short syntax', () => {
    const stack = stackFrom([
      'services:',
      '  web:',
      '    image: nginx',
      '    command: nginx -g "daemon off;"',
      '    restart: on-failure:3',
      '    stop_grace_period: 1m30s',
      '    volumes:',
      '      - ./config:/etc/nginx/conf.d:ro',
      '      - cache:/var/cache/nginx',
      'volumes:',
      '  cache:',
    ]);
    const web = stack.services.web;

    expect(web?.command).toEqual([ 'nginx', '-g', 'daemon off;' ]);
    expect(web?.restart).toEqual({ name: 'on-failure', maxRetries: 3 });
    expect(web?.stopGracePeriodMs).toBe(90_000);
    expect(web?.volumes).toEqual([
      { type: 'bind', source: '/srv/media/config', target: '/etc/nginx/conf.d', readOnly: true },
      { type: 'volume', source: 'cache', target: '/var/cache/nginx', readOnly: false },
    ]);
    expect(stack.volumes).toEqual({ cache: { name: 'cache', driver: 'local', external: false } });
  });

  it('drops x- keys and applies YAML merge keys', () => {
    const stack = stackFrom([
      'x-common: &common',
      '  restart: unless-stopped',
      '  environment:',
      '    TZ: Europe/Paris',
      'services:',
      '  web:',
      '    <<: *common',
      '    image: nginx',
    ]);

    expect(stack.services.web?.restart).toEqual({ name: 'unless-stopped' });
    expect(stack.services.web?.environment).toEqual({ TZ: 'Europe/Paris' });
  });

  it('resolves build contexts and secret files', () => {
    const stack = stackFrom([
      'services:',
      '  api:',
      '    build:',
      '      context: ./api',
      '      args:',
      '        VERSION: 2',
      '    secrets: [api_key]',
      'secrets:',
      '  api_key:',
      '    file: ./secrets/api_key.txt',
    ]);

    expect(stack.services.api?.build).toEqual({
      context: '/srv/media/api',
      dockerfile: 'Dockerfile',
      args: { VERSION: '2' },
    });
    expect(stack.secrets).toEqual({ api_key: { name: 'api_key', file: '/srv/media/secrets/api_key.txt' } });
  });

  it('collects every reference problem at once', () => {
    const issues = issuesOf(() => stackFrom([
      'services:',
      '  web:',
      '    networks: [front]',
      '    volumes:',
      '      - media:/media',
      '    depends_on: [db]',
    ]));

    expect(issues).toEqual([
      { path: 'services.web', message: 'must define "image" or "build"' },
      { path: 'services.web.networks', message: 'undefined network "front"' },
      { path: 'services.web.volumes[0]', message: 'undefined volume "media"' },
      { path: 'services.web.depends_on', message: 'depends on undefined service "db"' },
    ]);
  });

  it('requires a healthcheck on services waited on for health', () => {
    const issues = issuesOf(() => stackFrom([
      'services:',
      '  db:',
      '    image: postgres:16',
      '  api:',
      '    image: example/api',
      '    depends_on:',
      '      db:',
      '        condition: service_healthy',
    ]));

    expect(issues).toEqual([
      {
        path: 'services.api.depends_on',
        message: 'waits for "db" to be healthy but "db" has no healthcheck',
      },
    ]);
  });

  it('reports dependency cycles', () => {
    const issues = issuesOf(() => stackFrom([
      'services:',
      '  a:',
      '    image: busybox',
      '    depends_on: [b]',
      '  b:',
      '    image: busybox',
      '    depends_on: [a]',
    ]));

    expect(issues).toEqual([ { path: 'services', message: 'Dependency cycle detected: a -> b -> a' } ]);
  });

  it('rejects reserved labels and bad short syntax', () => {
    const issues = issuesOf(() => stackFrom([
      'services:',
      '  web:',
      '    image: nginx',
      '    labels:',
      '      homestack.project: other',
      '    ports:',
      '      - "8000-8001:80"',
    ]));

    expect(issues).toEqual([
      { path: 'services.web.ports[0]', message: 'port ranges are not supported ("8000-8001:80")' },
      { path: 'services.web.labels', message: 'label "homestack.project" uses the reserved prefix "homestack."' },
    ]);
  });

  it('reports schema errors with their path', () => {
    const issues = issuesOf(() => stackFrom([
      'services:',
      '  web:',
      '    image: nginx',
      '    ports:',
      '      - host: 80',
    ]));

    expect(issues).toHaveLength(1);
    expect(issues[0]).toMatchObject({ path: 'services.web.ports[0]' });
  });

  it('rejects proxy routes to undefined services', () => {
    const issues = issuesOf(() => stackFrom([
      'services:',
      '  web:',
      '    image: nginx',
      'proxy:',
      '  server_name: home.example.test',
      '  routes:',
      '    - path: /photos',
      '      service: photos',
      '      port: 2283',
    ]));

    expect(issues).toEqual([ { path: 'proxy.routes[0].service', message: 'undefined service "photos"' } ]);
  });

  it('rejects a document that is not a mapping', () => {
    expect(issuesOf(() => stackFrom([ '- web' ]))).toEqual([ { path: '', message: 'top level must be a mapping' } ]);
  });

  it('requires at least one service', () => {
    expect(issuesOf(() => stackFrom([ 'services: {}' ]))).toEqual([
      { path: 'services', message: 'at least one service is required' },
    ]);
  });

  it('reports YAML syntax errors', () => {
    const issues = issuesOf(() => stackFrom([ 'services:', '  web: [nginx' ]));

    expect(issues.length).toBeGreaterThan(0);
    expect(issues[0]).toMatchObject({ path: '' });
  });
});

describe('sanitizeProjectName', () => {
  it('keeps lowercase letters, digits, dashes and underscores', () => {
    expect(sanitizeProjectName('Home Server_2!')).toBe('homeserver_2');
  });
});

describe('loadStack', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(tmpdir(), 'homestack-loader-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('reads .env beside the stack file, with explicit variables winning', async () => {
    const file = path.join(dir, 'homestack.yaml');
    await writeFile(file, [ 'name: media', 'services:', '  app:', '    image: "app:${TAG}"' ].join('\n'));
    await writeFile(path.join(dir, '.env'), 'TAG=1.2\n');

    expect(loadStack(file, { env: {} }).services.app?.image).toBe('app:1.2');
    expect(loadStack(file, { env: { TAG: '2.0' } }).services.app?.image).toBe('app:2.0');
  });

  it('merges env_file entries under the environment section', async () => {
    const file = path.join(dir, 'homestack.yaml');
    await writeFile(file, [
      'name: media',
      'services:',
      '  app:',
      '    image: app',
      '    env_file: app.env',
      '    environment:',
      '      MODE: dev',
    ].join('\n'));
    await writeFile(path.join(dir, 'app.env'), 'MODE=prod\nEXTRA=1\n');

    expect(loadStack(file, { env: {} }).services.app?.environment).toEqual({ MODE: 'dev', EXTRA: '1' });
  });

  it('reports a missing env file', async () => {
    const file = path.join(dir, 'homestack.yaml');
    await writeFile(file, [ 'name: media', 'services:', '  app:', '    image: app', '    env_file: missing.env' ].join('\n'));

    expect(issuesOf(() => loadStack(file, { env: {} }))).toEqual([
      { path: 'services.app.env_file', message: `env file ${path.join(dir, 'missing.env')} not found` },
    ]);
  });

  it('fails when the file does not exist', () => {
    const file = path.join(dir, 'nope.yaml');

    expect(() => loadStack(file)).toThrow(`Stack file not found: ${file}`);
  });
});
