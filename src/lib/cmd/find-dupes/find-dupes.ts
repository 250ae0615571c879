import { config } from '../../../config';
import { DEFAULT_MIN_SIZE } from '../../../constants';
import { logger } from '../../logger';
import { AsyncChannel } from '../../models/async-channel';
import { ConfigError } from '../../models/config-error';
import {
  Diagnostic,
  DuplicateGroup,
  RunStatistics,
  initRunStatistics,
} from '../../models/dupe-types';
import { checkDir, getPathRelativeToCwd } from '../../util/files';
import { hashFile } from '../../util/hasher';
import { sleepImmediate } from '../../util/sleep';
import { Timer } from '../../util/timer';
import { DupeAggregator } from './dupe-aggregator';
import { HashFn, HashPool } from './hash-pool';
import { WalkEvent, walkDir } from './walk-dir';

/*
  the walk hands the event loop over to finished hashes this often
*/
const INTERRUPT_MS = 25;

export type FindDupesOpts = {
  rootPaths: string[];
  recursive?: boolean;
  maxDepth?: number;
  minSize?: number;
  followSymlinks?: boolean;
  maxRunning?: number;
  signal?: AbortSignal;
  hashFn?: HashFn;
};

export type FindDupesResult = {
  stats: RunStatistics;
  diagnostics: Diagnostic[];
  aborted: boolean;
};

export type FindDupesRun = {
  groups: AsyncIterable<DuplicateGroup>;
  result: Promise<FindDupesResult>;
};

type ResolvedFindDupesOpts = {
  rootPaths: string[];
  maxDepth: number | undefined;
  minSize: number;
  followSymlinks: boolean;
  maxRunning: number;
  signal: AbortSignal | undefined;
  hashFn: HashFn;
};

/*
  Validates opts synchronously, throwing ConfigError, then starts the
    run. Consume groups and await result together, e.g. via
    Promise.all(), so a failed run is always observed.
*/
export function findDupes(opts: FindDupesOpts): FindDupesRun {
  let resolvedOpts: ResolvedFindDupesOpts;
  let groupChannel: AsyncChannel<DuplicateGroup>;
  let resultPromise: Promise<FindDupesResult>;
  resolvedOpts = resolveFindDupesOpts(opts);
  groupChannel = new AsyncChannel();
  resultPromise = runFindDupes(resolvedOpts, groupChannel).then((findDupesRes) => {
    groupChannel.close();
    return findDupesRes;
  }, (err: unknown) => {
    groupChannel.fail(err);
    throw err;
  });
  return {
    groups: groupChannel,
    result: resultPromise,
  };
}

/*
  Runs to completion, collecting every group
*/
export async function collectDupes(opts: FindDupesOpts): Promise<FindDupesResult & {
  groups: DuplicateGroup[];
}> {
  let findDupesRun: FindDupesRun;
  let groups: DuplicateGroup[];
  findDupesRun = findDupes(opts);
  groups = [];
  const readGroups = async () => {
    for await (const group of findDupesRun.groups) {
      groups.push(group);
    }
  };
  let [ , findDupesRes ] = await Promise.all([
    readGroups(),
    findDupesRun.result,
  ]);
  return {
    ...findDupesRes,
    groups,
  };
}

async function runFindDupes(
  opts: ResolvedFindDupesOpts,
  groupChannel: AsyncChannel<DuplicateGroup>
): Promise<FindDupesResult> {
  let stats: RunStatistics;
  let diagnostics: Diagnostic[];
  let seenPaths: Set<string>;
  let seenDirs: Set<string>;
  let hashPool: HashPool;
  let aggregator: DupeAggregator;
  let interruptTimer: Timer;
  let iterCount: number;

  stats = initRunStatistics();
  diagnostics = [];
  seenPaths = new Set();
  seenDirs = new Set();

  const onDiagnostic = (diagnostic: Diagnostic) => {
    diagnostics.push(diagnostic);
    logger.warn(diagnostic, `${diagnostic.kind} error`);
  };

  hashPool = new HashPool({
    maxRunning: opts.maxRunning,
    hashFn: opts.hashFn,
    onResult: (hashResult) => {
      aggregator.onHashResult(hashResult);
    },
  });
  aggregator = new DupeAggregator({
    stats,
    submitHash: (record) => {
      hashPool.submit(record);
    },
    onGroup: (dupeGroup) => {
      groupChannel.push(dupeGroup);
    },
    onDiagnostic,
  });

  const onAbort = () => {
    let droppedJobs = hashPool.cancel();
    aggregator.cancel();
    logger.info({
      droppedHashes: droppedJobs.length,
      unfinishedBuckets: aggregator.getPendingBucketCount(),
    }, 'find-dupes aborted');
  };
  if(opts.signal?.aborted) {
    onAbort();
  } else {
    opts.signal?.addEventListener('abort', onAbort, {
      once: true,
    });
  }

  const handleWalkEvent = (walkEvent: WalkEvent) => {
    switch(walkEvent.kind) {
      case 'dir':
        if(seenDirs.has(walkEvent.path)) {
          break;
        }
        seenDirs.add(walkEvent.path);
        stats.dirsScanned++;
        break;
      case 'file':
        if(seenPaths.has(walkEvent.record.path)) {
          break;
        }
        seenPaths.add(walkEvent.record.path);
        stats.totalFiles++;
        aggregator.addRecord(walkEvent.record);
        break;
      case 'skip':
        if(seenPaths.has(walkEvent.path)) {
          break;
        }
        seenPaths.add(walkEvent.path);
        stats.totalFiles++;
        stats.skippedMinSize++;
        break;
      case 'error':
        stats.traversalErrors++;
        onDiagnostic(walkEvent.diagnostic);
        break;
    }
  };

  interruptTimer = Timer.start();
  iterCount = 0;
  try {
    for(let i = 0; i < opts.rootPaths.length; ++i) {
      let walker = walkDir({
        rootPath: opts.rootPaths[i],
        maxDepth: opts.maxDepth,
        minSize: opts.minSize,
        followSymlinks: opts.followSymlinks,
      });
      while(!(opts.signal?.aborted ?? false)) {
        let iterRes = walker.next();
        if(iterRes.done) {
          break;
        }
        handleWalkEvent(iterRes.value);
        if(
          ((iterCount++ % 100) === 0)
          && (interruptTimer.currentMs() > INTERRUPT_MS)
        ) {
          await sleepImmediate();
          interruptTimer.reset();
        }
      }
    }
    if(!(opts.signal?.aborted ?? false)) {
      aggregator.closeWalk();
    }
    await hashPool.drain();
  } finally {
    opts.signal?.removeEventListener('abort', onAbort);
  }
  return {
    stats,
    diagnostics,
    aborted: opts.signal?.aborted ?? false,
  };
}

function resolveFindDupesOpts(opts: FindDupesOpts): ResolvedFindDupesOpts {
  let rootPaths: string[];
  let maxDepth: number | undefined;
  let minSize: number;
  let maxRunning: number;
  if(opts.rootPaths.length < 1) {
    throw new ConfigError('At least one directory is required');
  }
  rootPaths = [];
  for(let i = 0; i < opts.rootPaths.length; ++i) {
    let rootPath = getPathRelativeToCwd(opts.rootPaths[i]);
    if(!checkDir(rootPath)) {
      throw new ConfigError(`Not a directory: ${opts.rootPaths[i]}`);
    }
    if(!rootPaths.includes(rootPath)) {
      rootPaths.push(rootPath);
    }
  }
  if(
    (opts.maxDepth !== undefined)
    && !opts.recursive
  ) {
    throw new ConfigError('maxDepth requires recursive');
  }
  assertNonNegativeInt('maxDepth', opts.maxDepth);
  assertNonNegativeInt('minSize', opts.minSize);
  assertNonNegativeInt('maxRunning', opts.maxRunning);
  maxDepth = opts.recursive
    ? opts.maxDepth
    : 0
  ;
  minSize = opts.minSize ?? DEFAULT_MIN_SIZE;
  maxRunning = opts.maxRunning ?? config.MAX_RUNNING_HASHES;
  if(maxRunning < 1) {
    throw new ConfigError(`maxRunning must be at least 1, received: ${maxRunning}`);
  }
  return {
    rootPaths,
    maxDepth,
    minSize,
    followSymlinks: opts.followSymlinks ?? false,
    maxRunning,
    signal: opts.signal,
    hashFn: opts.hashFn ?? ((filePath) => hashFile(filePath, {
      highWaterMark: config.HASH_HWM,
    })),
  };
}

function assertNonNegativeInt(optName: string, val: number | undefined) {
  if(val === undefined) {
    return;
  }
  if(
    !Number.isInteger(val)
    || (val < 0)
  ) {
    throw new ConfigError(`${optName} must be a non-negative integer, received: ${val}`);
  }
}
