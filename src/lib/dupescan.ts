import { findDupesCmdMain } from './cmd/find-dupes/find-dupes-cmd';
import { helpCmdMain } from './cmd/help/help-cmd';
import { ParsedArgv, parseArgv } from './cmd/parse-argv';
import { DUPESCAN_CMD_ENUM, getCmdKind } from './cmd/parse-dupescan-args';
import { logger } from './logger';
import { ConfigError } from './models/config-error';

export type DupescanMainOpts = {
  logFn: (line: string) => void;
  errFn: (line: string) => void;
  color: boolean;
};

export async function dupescanMain(argv: string[], opts: DupescanMainOpts) {
  let parsedArgv: ParsedArgv;
  let cmdKind: DUPESCAN_CMD_ENUM;
  if(argv.length < 3) {
    helpCmdMain(opts.logFn);
    return;
  }
  try {
    parsedArgv = parseArgv(argv);
    cmdKind = getCmdKind(parsedArgv.cmd);
    switch(cmdKind) {
      case DUPESCAN_CMD_ENUM.FIND:
        await findDupesCmdMain(parsedArgv, opts);
        return;
      case DUPESCAN_CMD_ENUM.HELP:
        helpCmdMain(opts.logFn);
        return;
    }
  } catch(e) {
    if(!(e instanceof ConfigError)) {
      throw e;
    }
    logger.warn(e.message);
    opts.errFn(`dupescan: ${e.message}`);
    opts.errFn('');
    helpCmdMain(opts.errFn);
    process.exitCode = 1;
  }
}
