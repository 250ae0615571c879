import { logger } from '../../logger';
import { DuplicateGroup } from '../../models/dupe-types';
import { getPathRelativeToCwd } from '../../util/files';
import { Timer } from '../../util/timer';
import { ParsedArgv } from '../parse-argv';
import { FindDupesFlags, getFindDupesArgv, getFindDupesFlags } from '../parse-dupescan-args';
import { FindDupesResult, findDupes } from './find-dupes';
import { getFindDupesColors } from './find-dupes-colors';
import { formatDiagnostic, formatDupeGroup, formatRunStats } from './render-dupes';
import { DEFAULT_SORT_KEYS, SortDupesOpts, parseSortKeys, sortDupeGroup } from './sort-dupes';

export type FindDupesCmdOpts = {
  /* duplicate groups */
  logFn: (line: string) => void;
  /* diagnostics and the run summary */
  errFn: (line: string) => void;
  color?: boolean;
};

let activeAbortController: AbortController | undefined;

export async function findDupesCmdMain(parsedArgv: ParsedArgv, opts: FindDupesCmdOpts): Promise<FindDupesResult> {
  let rootPaths: string[];
  let flags: FindDupesFlags;
  let sortOpts: SortDupesOpts;
  let abortController: AbortController;
  let timer: Timer;
  let findDupesRes: FindDupesResult;
  let elapsedMs: number;

  const c = getFindDupesColors(opts.color ?? false);

  let findDupesArgv = getFindDupesArgv(parsedArgv);
  rootPaths = findDupesArgv.rootPaths;
  flags = getFindDupesFlags(findDupesArgv.opts);
  sortOpts = {
    sortKeys: (flags.sort === undefined)
      ? DEFAULT_SORT_KEYS
      : parseSortKeys(flags.sort)
    ,
    preferLocation: (flags.prefer === undefined)
      ? undefined
      : getPathRelativeToCwd(flags.prefer)
    ,
  };

  abortController = new AbortController();
  timer = Timer.start();

  let findDupesRun = findDupes({
    rootPaths,
    recursive: flags.recursive,
    maxDepth: flags.max_depth,
    minSize: flags.min_size,
    followSymlinks: flags.follow,
    maxRunning: flags.workers,
    signal: abortController.signal,
  });
  activeAbortController = abortController;
  logger.info({
    rootPaths,
    flags,
  }, 'find-dupes start');

  let groupCount = 0;
  const printGroup = (dupeGroup: DuplicateGroup) => {
    let lines: string[];
    if(groupCount++ > 0) {
      opts.logFn('');
    }
    lines = formatDupeGroup(sortDupeGroup(dupeGroup, sortOpts), c);
    for(let i = 0; i < lines.length; ++i) {
      opts.logFn(lines[i]);
    }
  };
  const printGroups = async () => {
    for await (const dupeGroup of findDupesRun.groups) {
      printGroup(dupeGroup);
    }
  };

  try {
    [ , findDupesRes ] = await Promise.all([
      printGroups(),
      findDupesRun.result,
    ]);
  } finally {
    activeAbortController = undefined;
  }
  elapsedMs = timer.stop();

  for(let i = 0; i < findDupesRes.diagnostics.length; ++i) {
    opts.errFn(formatDiagnostic(findDupesRes.diagnostics[i], c));
  }
  if(groupCount > 0) {
    opts.errFn('');
  }
  formatRunStats(findDupesRes.stats, elapsedMs, c).forEach(line => {
    opts.errFn(line);
  });
  if(findDupesRes.aborted) {
    opts.errFn(c.error('scan aborted, results are incomplete'));
  }
  logger.info({
    stats: findDupesRes.stats,
    aborted: findDupesRes.aborted,
    elapsedMs,
  }, 'find-dupes complete');
  return findDupesRes;
}

export function stopRunningFindDupes() {
  activeAbortController?.abort();
}
