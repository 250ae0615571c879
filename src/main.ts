#!/usr/bin/env node
import sourceMapSupport from 'source-map-support';
sourceMapSupport.install();

import { dupescanMain } from './lib/dupescan';
import { logger } from './lib/logger';
import { stopRunningFindDupes } from './lib/cmd/find-dupes/find-dupes-cmd';

(async () => {
  try {
    await main();
  } catch(e) {
    console.error(e);
    logger.error(e);
    process.exitCode = 1;
  }
})();

async function main() {
  setProcName();

  process.on('SIGINT', () => {
    shutdown('SIGINT');
  });
  process.on('SIGTERM', () => {
    shutdown('SIGTERM');
  });
  process.on('unhandledRejection', (reason) => {
    console.error('unhandledRejection');
    console.error(reason);
    logger.error('unhandledRejection:');
    logger.error(reason);
  });

  process.on('uncaughtException', (err, origin) => {
    console.error('uncaughtException');
    console.error(err);
    console.error(origin);
    logger.error(err);
  });

  await dupescanMain(process.argv, {
    logFn: console.log,
    errFn: console.error,
    color: process.stdout.isTTY === true,
  });
}

function shutdown(sig: string) {
  let shutdownMsg: string;
  shutdownMsg = `${sig} received`;
  logger.info(shutdownMsg);
  stopRunningFindDupes();
  console.error(`${shutdownMsg} - stopping scan`);
  process.exitCode = 130;
}

function setProcName() {
  process.title = 'dupescan';
}
