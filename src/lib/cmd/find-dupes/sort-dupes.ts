import path from 'path';

import { ConfigError } from '../../models/config-error';
import { DuplicateGroup, FileRecord } from '../../models/dupe-types';
import { isWithinDir } from '../../util/files';

export const SORT_KEYS = [
  'mtime',
  'path',
  'depth',
] as const;

export type SortKey = typeof SORT_KEYS[number];

/*
  keys the caller leaves out are appended in this order
*/
export const DEFAULT_SORT_KEYS: readonly SortKey[] = SORT_KEYS;

export type SortDupesOpts = {
  sortKeys: readonly SortKey[];
  /* members inside this dir sort before all others */
  preferLocation?: string;
};

type RecordComparator = (a: FileRecord, b: FileRecord) => number;

const comparatorMap: Record<SortKey, RecordComparator> = {
  path: comparePathParts,
  mtime: (a, b) => compareNums(a.mtimeMs, b.mtimeMs),
  depth: (a, b) => compareNums(a.depth, b.depth),
};

export function isSortKey(val: string): val is SortKey {
  return SORT_KEYS.some(sortKey => sortKey === val);
}

/*
  parses a comma separated key list, e.g. 'mtime,depth'
*/
export function parseSortKeys(rawKeys: string): SortKey[] {
  let sortKeys: SortKey[];
  let keyStrs: string[];
  sortKeys = [];
  keyStrs = rawKeys.split(',').map(keyStr => keyStr.trim());
  for(let i = 0; i < keyStrs.length; ++i) {
    let keyStr = keyStrs[i];
    if(!isSortKey(keyStr)) {
      throw new ConfigError(`Invalid sort key: '${keyStr}', expected one of: ${SORT_KEYS.join(', ')}`);
    }
    if(sortKeys.includes(keyStr)) {
      throw new ConfigError(`Duplicate sort key: '${keyStr}'`);
    }
    sortKeys.push(keyStr);
  }
  for(let i = 0; i < DEFAULT_SORT_KEYS.length; ++i) {
    if(!sortKeys.includes(DEFAULT_SORT_KEYS[i])) {
      sortKeys.push(DEFAULT_SORT_KEYS[i]);
    }
  }
  return sortKeys;
}

export function sortDupeGroup(dupeGroup: DuplicateGroup, opts: SortDupesOpts): DuplicateGroup {
  let members: FileRecord[];
  let comparators: RecordComparator[];
  comparators = opts.sortKeys.map(sortKey => comparatorMap[sortKey]);
  if(opts.preferLocation !== undefined) {
    comparators.unshift(getPreferLocationComparator(opts.preferLocation));
  }
  comparators.push((a, b) => compareStrs(a.path, b.path));
  members = dupeGroup.members.slice();
  members.sort((a, b) => {
    for(let i = 0; i < comparators.length; ++i) {
      let cmpRes = comparators[i](a, b);
      if(cmpRes !== 0) {
        return cmpRes;
      }
    }
    return 0;
  });
  return {
    ...dupeGroup,
    members,
  };
}

function getPreferLocationComparator(preferLocation: string): RecordComparator {
  let preferDir = path.resolve(preferLocation);
  return (a, b) => {
    let aPreferred = isWithinDir(a.path, preferDir);
    let bPreferred = isWithinDir(b.path, preferDir);
    if(aPreferred === bPreferred) {
      return 0;
    }
    return aPreferred
      ? -1
      : 1
    ;
  };
}

/*
  parent dir, then file name without extension, then extension
*/
function comparePathParts(a: FileRecord, b: FileRecord): number {
  let aParts = path.parse(a.path);
  let bParts = path.parse(b.path);
  return compareStrs(aParts.dir, bParts.dir)
    || compareStrs(aParts.name, bParts.name)
    || compareStrs(aParts.ext, bParts.ext)
  ;
}

function compareStrs(a: string, b: string): number {
  if(a < b) {
    return -1;
  } else if(a > b) {
    return 1;
  } else {
    return 0;
  }
}

function compareNums(a: number, b: number): number {
  return a - b;
}
