import { hideBin } from 'yargs/helpers';
import { createCli } from './cli';
import logger from './logger';
import { DockerRuntime } from './runtime/docker';
import { loadSettings } from './settings';

const main = async (): Promise<number> => {
  const cli = createCli({
    settings: loadSettings(),
    connect: socketPath => DockerRuntime.connect(socketPath),
    write: text => {
      process.stdout.write(text);
    },
  });
  return cli.run(hideBin(process.argv));
};

main().then(
  (code) => {
    process.exitCode = code;
  },
  (err: unknown) => {
    logger.error({ err }, err instanceof Error ? err.message : 'Command failed');
    process.exitCode = 1;
  }
);
