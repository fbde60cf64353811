import { describe, it, expect } from 'vitest';
import { loadSettings } from '../src/settings';

describe('loadSettings', () => {
  it('uses defaults for an empty environment', () => {
    expect(loadSettings({})).toEqual({
      stackFile: 'homestack.yaml',
      dockerSocket: '/var/run/docker.sock',
      healthPort: 3000,
      pollIntervalMs: 2000,
      dependencyTimeoutMs: 120_000,
      restartBackoffMs: 1000,
      restartBackoffMaxMs: 30_000,
      stopTimeoutSeconds: 10,
    });
  });

  it('reads and coerces variables', () => {
    const settings = loadSettings({
      HOMESTACK_FILE: 'stacks/media.yaml',
      HOMESTACK_PROJECT: 'media',
      DOCKER_SOCKET: '/run/user/1000/docker.sock',
      HEALTH_PORT: '8081',
      HOMESTACK_POLL_INTERVAL_MS: '500',
      HOMESTACK_STOP_TIMEOUT_S: '30',
    });

    expect(settings).toMatchObject({
      stackFile: 'stacks/media.yaml',
      project: 'media',
      dockerSocket: '/run/user/1000/docker.sock',
      healthPort: 8081,
      pollIntervalMs: 500,
      stopTimeoutSeconds: 30,
    });
  });

  it('treats empty strings as unset', () => {
    expect(loadSettings({ HEALTH_PORT: '', HOMESTACK_PROJECT: '' })).toMatchObject({ healthPort: 3000, project: undefined });
  });

  it('rejects invalid numbers', () => {
    expect(() => loadSettings({ HEALTH_PORT: 'abc' })).toThrow();
    expect(() => loadSettings({ HEALTH_PORT: '70000' })).toThrow();
  });
});
