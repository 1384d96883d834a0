/**
 * Pino logger shared by every module
 */

import pino from 'pino';
import type { DestinationStream, Logger, LoggerOptions, StreamEntry } from 'pino';
import { config } from '../config/index.js';

const options: LoggerOptions = {
  name: config.app.name,
  level: config.logging.level,
  base: { env: config.app.env },
  timestamp: pino.stdTimeFunctions.isoTime,
  serializers: {
    error: pino.stdSerializers.err,
    err: pino.stdSerializers.err,
  },
};

function createDestination(): DestinationStream | undefined {
  if (config.app.env === 'development' && !config.logging.file) {
    return pino.transport({
      target: 'pino-pretty',
      options: { colorize: true, translateTime: 'SYS:HH:MM:ss', ignore: 'pid,hostname,env' },
    });
  }

  if (config.logging.file) {
    const streams: StreamEntry[] = [
      { stream: process.stdout },
      { stream: pino.destination({ dest: config.logging.file, mkdir: true, sync: false }) },
    ];
    return pino.multistream(streams);
  }

  return undefined;
}

const destination = createDestination();

export const logger: Logger = destination ? pino(options, destination) : pino(options);

export type { Logger };
