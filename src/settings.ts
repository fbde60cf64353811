import { z } from 'zod';

const settingsSchema = z.object({
  stackFile: z.string().min(1).default('homestack.yaml'),
  project: z.string().min(1).optional(),
  dockerSocket: z.string().min(1).default('/var/run/docker.sock'),
  healthPort: z.coerce.number().int().min(1).max(65535).default(3000),
  pollIntervalMs: z.coerce.number().int().min(0).default(2000),
  dependencyTimeoutMs: z.coerce.number().int().min(0).default(120_000),
  restartBackoffMs: z.coerce.number().int().min(0).default(1000),
  restartBackoffMaxMs: z.coerce.number().int().min(0).default(30_000),
  stopTimeoutSeconds: z.coerce.number().int().min(0).default(10),
});

export type Settings = z.infer<typeof settingsSchema>;

/**
 * Read process settings from the environment.
 * Empty strings count as unset so `FOO=` falls back to the default.
 */
export const loadSettings = (env: NodeJS.ProcessEnv = process.env): Settings => {
  const read = (key: string): string | undefined => {
    const value = env[key];
    return value === '' ? undefined : value;
  };

  return settingsSchema.parse({
    stackFile: read('HOMESTACK_FILE'),
    project: read('HOMESTACK_PROJECT'),
    dockerSocket: read('DOCKER_SOCKET'),
    healthPort: read('HEALTH_PORT'),
    pollIntervalMs: read('HOMESTACK_POLL_INTERVAL_MS'),
    dependencyTimeoutMs: read('HOMESTACK_DEPENDENCY_TIMEOUT_MS'),
    restartBackoffMs: read('HOMESTACK_RESTART_BACKOFF_MS'),
    restartBackoffMaxMs: read('HOMESTACK_RESTART_BACKOFF_MAX_MS'),
    stopTimeoutSeconds: read('HOMESTACK_STOP_TIMEOUT_S'),
  });
};
