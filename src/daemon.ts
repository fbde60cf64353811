import { sendJson } from './healthcheck';
import { defineLifecycle } from './lifecycle';
import type { LifecycleInstance } from './lifecycle';
import logger from './logger';
import type { Orchestrator } from './orchestrator';

export interface DaemonOptions {
  orchestrator: Orchestrator;
  healthPort: number;
}

/**
 * Bring the whole stack up and keep supervising it until SIGTERM/SIGINT.
 *
 * `/health` reports one dependency per service; `/services` lists their status.
 */
export const runDaemon = async (options: DaemonOptions): Promise<LifecycleInstance> => {
  const { orchestrator, healthPort } = options;
  const services = Object.keys(orchestrator.stack.services).sort();

  const lifecycle = defineLifecycle({
    dependencies: services,
    healthPort,
    routes: {
      '/services': (_, res) => {
        orchestrator.ps().then(
          rows => sendJson(res, 200, rows),
          (err: unknown) => {
            logger.error({ err }, 'Failed to list services');
            sendJson(res, 500, { error: 'Failed to list services' });
          }
        );
      },
    },
    onInit: async () => {
      await orchestrator.up({ watch: true });
    },
    onPing: async () => ({ project: orchestrator.stack.project }),
    onFailure: async (error) => {
      logger.error({ err: error, project: orchestrator.stack.project }, 'Daemon failed to start');
    },
    onShutdown: async () => {
      orchestrator.unwatch();
      await orchestrator.stop();
    },
  });

  orchestrator
    .on('service:state', (service) => {
      lifecycle.setDependencyHealth(service, orchestrator.health()[service] ?? false);
    })
    .on('service:restart', (service, attempt, delayMs, exitCode) => {
      logger.warn({ service, attempt, delayMs, exitCode }, 'Service restart scheduled');
    });

  await lifecycle.init();
  logger.info({ project: orchestrator.stack.project, port: healthPort }, 'Daemon ready');

  return lifecycle;
};
