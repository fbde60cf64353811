import { readFile, writeFile } from 'node:fs/promises';
import path from 'node:path';
import yargs from 'yargs';
import type { ArgumentsCamelCase } from 'yargs';
import { createBackup } from './backup';
import type { Environment } from './config/interpolate';
import { loadStack } from './config/loader';
import { renderStack } from './config/render';
import type { Stack } from './config/types';
import { runDaemon } from './daemon';
import { lintMarkdown } from './docs-lint';
import { formatStatusTable } from './format';
import logger from './logger';
import { createOrchestrator } from './orchestrator';
import type { Orchestrator } from './orchestrator';
import { renderProxyConfig } from './proxy';
import type { ContainerRuntime } from './runtime/types';
import type { Settings } from './settings';
import { setupShutdownHandlers } from './shutdown';

export interface CliContext {
  settings: Settings;
  /** Opens the container runtime; only called by commands that need it. */
  connect: (socketPath: string) => ContainerRuntime;
  /** Standard output. */
  write: (text: string) => void;
  /** Interpolation variables. Defaults to process.env. */
  env?: Environment;
}

export interface Cli {
  /** Run one command line (without the node and script arguments). Resolves to the exit code. */
  run(argv: string[]): Promise<number>;
}

interface GlobalArgs {
  file?: string;
  project?: string;
}

export const createCli = (context: CliContext): Cli => {
  const { settings, write } = context;

  const openStack = (args: GlobalArgs): Stack => {
    const stack = loadStack(args.file ?? settings.stackFile, {
      env: context.env,
      project: args.project ?? settings.project,
    });
    for (const warning of stack.warnings) {
      logger.warn({ file: stack.file }, warning);
    }
    return stack;
  };

  const openOrchestrator = (args: GlobalArgs): Orchestrator =>
    createOrchestrator({
      stack: openStack(args),
      runtime: context.connect(settings.dockerSocket),
      settings,
    });

  const run = async (argv: string[]): Promise<number> => {
    let exitCode = 0;

    await yargs(argv)
      .scriptName('homestack')
      .usage('Usage:\n  homestack [-f file] [-p project] <command> [options]')
      .option('file', { alias: 'f', type: 'string', describe: 'Stack file', requiresArg: true })
      .option('project', { alias: 'p', type: 'string', describe: 'Project name', requiresArg: true })
      .command('config', 'Print the resolved stack', {}, (args: ArgumentsCamelCase<GlobalArgs>) => {
        write(renderStack(openStack(args)));
      })
      .command('validate', 'Check the stack file', {}, (args: ArgumentsCamelCase<GlobalArgs>) => {
        const stack = openStack(args);
        const count = Object.keys(stack.services).length;
        write(`${stack.file} is valid (${count} service${count === 1 ? '' : 's'})\n`);
      })
      .command(
        'up [services..]',
        'Create and start services',
        y => y
          .positional('services', { type: 'string', array: true, describe: 'Services to start, with their dependencies' })
          .option('build', { type: 'boolean', default: false, describe: 'Rebuild images that have a build section' })
          .option('watch', { type: 'boolean', default: false, describe: 'Keep supervising after startup' }),
        async (args) => {
          const orchestrator = openOrchestrator(args);
          const services = args.services && args.services.length > 0 ? args.services : undefined;
          const rows = await orchestrator.up({ services, build: args.build, watch: args.watch });
          write(formatStatusTable(rows));

          if (args.watch) {
            setupShutdownHandlers(async () => {
              orchestrator.unwatch();
              await orchestrator.stop(services);
            });
          }
        }
      )
      .command(
        'down',
        'Stop and remove containers and networks',
        y => y.option('volumes', { alias: 'v', type: 'boolean', default: false, describe: 'Also remove named volumes' }),
        async (args) => {
          await openOrchestrator(args).down({ volumes: args.volumes });
        }
      )
      .command(
        'stop [services..]',
        'Stop services',
        y => y.positional('services', { type: 'string', array: true }),
        async (args) => {
          const services = args.services && args.services.length > 0 ? args.services : undefined;
          await openOrchestrator(args).stop(services);
        }
      )
      .command(
        'restart <service>',
        'Restart one service',
        y => y.positional('service', { type: 'string', demandOption: true }),
        async (args) => {
          await openOrchestrator(args).restart(args.service);
        }
      )
      .command('ps', 'List service containers', {}, async (args: ArgumentsCamelCase<GlobalArgs>) => {
        write(formatStatusTable(await openOrchestrator(args).ps()));
      })
      .command(
        'logs <service>',
        'Print container output',
        y => y
          .positional('service', { type: 'string', demandOption: true })
          .option('tail', { type: 'number', default: 100, describe: 'Number of lines from the end' }),
        async (args) => {
          write(await openOrchestrator(args).logs(args.service, args.tail));
        }
      )
      .command(
        'proxy',
        'Render the reverse proxy configuration',
        y => y.option('out', { alias: 'o', type: 'string', describe: 'Write to this file instead of stdout' }),
        async (args) => {
          const config = renderProxyConfig(openStack(args));
          if (args.out) {
            await writeFile(args.out, config);
            logger.info({ file: path.resolve(args.out) }, 'Proxy configuration written');
          } else {
            write(config);
          }
        }
      )
      .command('backup', 'Archive the backup paths', {}, async (args: ArgumentsCamelCase<GlobalArgs>) => {
        const result = await createBackup(openStack(args));
        write(`${result.archive}\n`);
        for (const pruned of result.pruned) write(`pruned ${pruned}\n`);
      })
      .command(
        'lint-docs <files..>',
        'Check YAML and JSON code blocks in Markdown files',
        y => y.positional('files', { type: 'string', array: true, demandOption: true }),
        async (args) => {
          for (const file of args.files) {
            for (const issue of lintMarkdown(await readFile(file, 'utf-8'))) {
              write(`${file}:${issue.line}: [${issue.language}] ${issue.message}\n`);
              exitCode = 1;
            }
          }
        }
      )
      .command('daemon', 'Run the stack under supervision with a health endpoint', {}, async (args: ArgumentsCamelCase<GlobalArgs>) => {
        await runDaemon({ orchestrator: openOrchestrator(args), healthPort: settings.healthPort });
      })
      .demandCommand(1, 'Select a command')
      .strict()
      .fail(false)
      .exitProcess(false)
      .help()
      .alias('h', 'help')
      .parseAsync();

    return exitCode;
  };

  return { run };
};
