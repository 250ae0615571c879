
import path from 'path';

import pino, { Logger, LoggerOptions } from 'pino';

import { config } from '../config';

const APP_LOG_FILE_NAME = 'app.log';
const APP_LOG_FILE_PATH = [
  config.LOG_DIR,
  APP_LOG_FILE_NAME,
].join(path.sep);

const APP_ERROR_LOG_FILE_NAME = 'app.error.log';
const APP_ERROR_LOG_FILE_PATH = [
  config.LOG_DIR,
  APP_ERROR_LOG_FILE_NAME,
].join(path.sep);

const level = (config.ENVIRONMENT === 'development')
  ? 'debug'
  : 'info'
;

export const logger = initLogger();

/*
  see: https://github.com/fastify/fastify/blob/ac462b2b4d859e88d029019869a9cb4b8626e6fd/lib/logger.js
*/
function initLogger() {
  let opts: LoggerOptions;
  let streams = [
    {
      stream: pino.destination({
        dest: APP_LOG_FILE_PATH,
        mkdir: true,
      }),
    },
    {
      stream: pino.destination({
        dest: APP_ERROR_LOG_FILE_PATH,
        mkdir: true,
      }),
      level: 'error' as const,
    },
  ];
  let stream = pino.multistream(streams);
  opts = {
    level,
  };
  let appLogger: Logger = pino(opts, stream);
  return appLogger;
}
