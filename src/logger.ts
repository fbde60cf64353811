import pino from 'pino';
import type { Logger } from 'pino';

// pino drops the whole merging object when JSON.stringify meets a BigInt;
// serialize BigInt as a string so container stats and sizes still log.
(BigInt.prototype as unknown as Record<string, unknown>).toJSON = function (this: bigint) {
  return this.toString();
};

const isDev = ['local', 'dev', 'development'].includes(process.env.NODE_ENV || '');

const transport = isDev
  ? pino.transport({
      target: 'pino-pretty',
      options: {
        colorize: true,
        ignore: 'pid,hostname',
        singleLine: true,
      },
    })
  : undefined;

const logger = pino(
  {
    name: 'homestack',
    level: process.env.LOG_LEVEL || 'info',
  },
  transport
);

/**
 * Logger bound to one managed service.
 */
export const serviceLogger = (service: string): Logger => logger.child({ service });

export type { Logger };
export default logger;
