import { Dirent, Stats, lstatSync, readdirSync, statSync } from 'fs';
import path from 'path';

import { Diagnostic, FileRecord } from '../../models/dupe-types';
import { Dll } from '../../models/lists/dll';
import { getErrorCode, getErrorMessage } from '../../util/validate-primitives';

export type WalkDirOpts = {
  rootPath: string;
  /* undefined walks without a depth bound */
  maxDepth?: number;
  minSize: number;
  followSymlinks?: boolean;
};

export type WalkEvent = {
  kind: 'file';
  record: FileRecord;
} | {
  kind: 'skip';
  path: string;
  size: number;
} | {
  kind: 'dir';
  path: string;
  depth: number;
} | {
  kind: 'error';
  diagnostic: Diagnostic;
};

type DirQueueItem = {
  dirPath: string;
  depth: number;
  /* (dev, ino) keys of this dir and its ancestors, only kept when following links */
  ancestorKeys: string[];
};

/*
  Lazily walks one root. Synchronous fs calls, driven one event at a
    time by the caller so it can interleave hashing and honor aborts.
  Files directly in the root have depth 0; a directory at depth N is
    only read when N <= maxDepth.
*/
export function *walkDir(opts: WalkDirOpts): Generator<WalkEvent, undefined, undefined> {
  let dirQueue: Dll<DirQueueItem>;
  let currItem: DirQueueItem | undefined;
  let rootStats: Stats;

  try {
    rootStats = statSync(opts.rootPath);
  } catch(e) {
    yield getErrorEvent(opts.rootPath, e);
    return;
  }
  dirQueue = new Dll([
    {
      dirPath: opts.rootPath,
      depth: 0,
      ancestorKeys: opts.followSymlinks
        ? [ getInodeKey(rootStats) ]
        : []
      ,
    },
  ]);

  while((currItem = dirQueue.popFront()) !== undefined) {
    let dirents: Dirent[];
    try {
      dirents = readdirSync(currItem.dirPath, {
        withFileTypes: true,
      });
    } catch(e) {
      yield getErrorEvent(currItem.dirPath, e);
      continue;
    }
    yield {
      kind: 'dir',
      path: currItem.dirPath,
      depth: currItem.depth,
    };
    for(let i = 0; i < dirents.length; ++i) {
      let fullPath: string;
      let stats: Stats;
      fullPath = path.join(currItem.dirPath, dirents[i].name);
      try {
        stats = opts.followSymlinks
          ? statSync(fullPath)
          : lstatSync(fullPath)
        ;
      } catch(e) {
        yield getErrorEvent(fullPath, e);
        continue;
      }
      if(stats.isSymbolicLink()) {
        continue;
      }
      if(stats.isDirectory()) {
        let childDepth: number;
        let inodeKey: string;
        childDepth = currItem.depth + 1;
        if(
          (opts.maxDepth !== undefined)
          && (childDepth > opts.maxDepth)
        ) {
          continue;
        }
        if(!opts.followSymlinks) {
          dirQueue.push({
            dirPath: fullPath,
            depth: childDepth,
            ancestorKeys: [],
          });
          continue;
        }
        inodeKey = getInodeKey(stats);
        if(currItem.ancestorKeys.includes(inodeKey)) {
          yield {
            kind: 'error',
            diagnostic: {
              kind: 'traversal',
              path: fullPath,
              code: 'ELOOP',
              message: `cycle in links detected at: ${fullPath}`,
            },
          };
          continue;
        }
        dirQueue.push({
          dirPath: fullPath,
          depth: childDepth,
          ancestorKeys: [
            ...currItem.ancestorKeys,
            inodeKey,
          ],
        });
      } else if(stats.isFile()) {
        if(stats.size < opts.minSize) {
          yield {
            kind: 'skip',
            path: fullPath,
            size: stats.size,
          };
          continue;
        }
        yield {
          kind: 'file',
          record: {
            path: fullPath,
            size: stats.size,
            depth: currItem.depth,
            mtimeMs: stats.mtimeMs,
            rootPath: opts.rootPath,
          },
        };
      }
    }
  }
}

function getInodeKey(stats: Stats): string {
  return `${stats.dev}:${stats.ino}`;
}

function getErrorEvent(entryPath: string, err: unknown): WalkEvent {
  let errCode: string | undefined;
  errCode = getErrorCode(err);
  /*
    anything that is not a plain fs error is a bug, not a bad entry
  */
  if(errCode === undefined) {
    throw err;
  }
  return {
    kind: 'error',
    diagnostic: {
      kind: 'traversal',
      path: entryPath,
      code: errCode,
      message: getErrorMessage(err),
    },
  };
}
