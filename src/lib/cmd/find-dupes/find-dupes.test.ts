import { describe, it, expect, vi, beforeEach } from 'vitest';
import { fs as mfs, vol } from 'memfs';

import { logger } from '../../logger';
import { ConfigError } from '../../models/config-error';
import { DuplicateGroup } from '../../models/dupe-types';
import { hashFile } from '../../util/hasher';
import { genTestDirs, GenTestDirRes } from '../../../test/gen-test-dirs';
import { collectDupes, findDupes } from './find-dupes';
import { HashFn } from './hash-pool';

vi.mock('fs', () => {
  return mfs;
});

vi.mock('../../logger', () => {
  return {
    logger: {
      debug: vi.fn(),
      info: vi.fn(),
      warn: vi.fn(),
      error: vi.fn(),
    },
  };
});

function getGroupPaths(groups: DuplicateGroup[]): string[][] {
  return groups.map(group => group.members.map(member => member.path).sort()).sort();
}

describe('findDupes tests', () => {
  beforeEach(() => {
    vol.reset();
    vi.clearAllMocks();
  });

  it('tests a same-size file with different content is excluded', async () => {
    let findDupesRes: Awaited<ReturnType<typeof collectDupes>>;
    vol.fromJSON({
      '/data/a.bin': 'x'.repeat(100),
      '/data/b.bin': 'x'.repeat(100),
      '/data/c.bin': 'y'.repeat(100),
    });
    findDupesRes = await collectDupes({
      rootPaths: [ '/data' ],
    });
    expect(getGroupPaths(findDupesRes.groups)).toEqual([
      [ '/data/a.bin', '/data/b.bin' ],
    ]);
    expect(findDupesRes.groups[0].size).toBe(100);
    expect(findDupesRes.groups[0].digest).toHaveLength(128);
    expect(findDupesRes.stats).toMatchObject({
      totalFiles: 3,
      filesSeen: 3,
      candidatesHashed: 3,
      duplicateGroups: 1,
      duplicateFiles: 2,
      wastedBytes: 100,
    });
    expect(findDupesRes.aborted).toBe(false);
  });

  it('tests empty files are skipped by the default min size', async () => {
    let findDupesRes: Awaited<ReturnType<typeof collectDupes>>;
    vol.fromJSON({
      '/data/a.txt': '',
      '/data/b.txt': '',
    });
    findDupesRes = await collectDupes({
      rootPaths: [ '/data' ],
    });
    expect(findDupesRes.groups).toEqual([]);
    expect(findDupesRes.stats.skippedMinSize).toBe(2);
  });

  it('tests empty files are grouped with minSize 0', async () => {
    let findDupesRes: Awaited<ReturnType<typeof collectDupes>>;
    vol.fromJSON({
      '/data/a.txt': '',
      '/data/b.txt': '',
    });
    findDupesRes = await collectDupes({
      rootPaths: [ '/data' ],
      minSize: 0,
    });
    expect(getGroupPaths(findDupesRes.groups)).toEqual([
      [ '/data/a.txt', '/data/b.txt' ],
    ]);
    expect(findDupesRes.groups[0].size).toBe(0);
    expect(findDupesRes.stats.wastedBytes).toBe(0);
  });

  it('tests identical files below minSize are skipped', async () => {
    let findDupesRes: Awaited<ReturnType<typeof collectDupes>>;
    vol.fromJSON({
      '/data/a.txt': 'z'.repeat(500),
      '/data/b.txt': 'z'.repeat(999),
    });
    findDupesRes = await collectDupes({
      rootPaths: [ '/data' ],
      minSize: 1000,
    });
    expect(findDupesRes.groups).toEqual([]);
    expect(findDupesRes.stats.skippedMinSize).toBe(2);
    expect(findDupesRes.stats.totalFiles).toBe(2);
    expect(findDupesRes.stats.filesSeen).toBe(0);
  });

  it('tests a copy deeper than maxDepth is never seen', async () => {
    let findDupesRes: Awaited<ReturnType<typeof collectDupes>>;
    vol.fromJSON({
      '/data/one/a.txt': 'same',
      '/data/one/two/b.txt': 'same',
    });
    findDupesRes = await collectDupes({
      rootPaths: [ '/data' ],
      recursive: true,
      maxDepth: 1,
    });
    expect(findDupesRes.groups).toEqual([]);
    expect(findDupesRes.stats.filesSeen).toBe(1);
    expect(findDupesRes.stats.candidatesHashed).toBe(0);
  });

  it('tests an unreadable file leaves a single survivor out of the results', async () => {
    let findDupesRes: Awaited<ReturnType<typeof collectDupes>>;
    const hashFn: HashFn = (filePath) => {
      let readErr: NodeJS.ErrnoException;
      if(filePath === '/data/b.txt') {
        readErr = new Error(`EACCES: permission denied, open '${filePath}'`);
        readErr.code = 'EACCES';
        return Promise.reject(readErr);
      }
      return hashFile(filePath);
    };
    vol.fromJSON({
      '/data/a.txt': 'same',
      '/data/b.txt': 'same',
    });
    findDupesRes = await collectDupes({
      rootPaths: [ '/data' ],
      hashFn,
    });
    expect(findDupesRes.groups).toEqual([]);
    expect(findDupesRes.diagnostics).toEqual([
      {
        kind: 'hash',
        path: '/data/b.txt',
        code: 'EACCES',
        message: 'EACCES: permission denied, open \'/data/b.txt\'',
      },
    ]);
    expect(findDupesRes.stats.hashErrors).toBe(1);
    expect(findDupesRes.stats.duplicateFiles).toBe(0);
  });

  it('tests non-recursive runs only read the roots', async () => {
    let findDupesRes: Awaited<ReturnType<typeof collectDupes>>;
    vol.fromJSON({
      '/data/a.txt': 'same',
      '/data/sub/b.txt': 'same',
    });
    findDupesRes = await collectDupes({
      rootPaths: [ '/data' ],
    });
    expect(findDupesRes.groups).toEqual([]);
    expect(findDupesRes.stats.dirsScanned).toBe(1);
  });

  it('tests groups across a generated tree', async () => {
    let genRes: GenTestDirRes;
    let findDupesRes: Awaited<ReturnType<typeof collectDupes>>;
    genRes = genTestDirs(mfs, {
      basePath: '/gen',
      dirDepth: 3,
      dirsPerLevel: 2,
      filesPerDir: 3,
    });
    findDupesRes = await collectDupes({
      rootPaths: [ '/gen' ],
      recursive: true,
      maxRunning: 2,
    });
    expect(findDupesRes.groups.length).toBe(genRes.numDupeGroups);
    expect(findDupesRes.stats.duplicateFiles).toBe(genRes.numDupeFiles);
    expect(findDupesRes.stats.totalFiles).toBe(genRes.numFiles);
    expect(findDupesRes.stats.dirsScanned).toBe(genRes.numDirs + 1);
  });

  it('tests files across several roots are grouped together', async () => {
    let findDupesRes: Awaited<ReturnType<typeof collectDupes>>;
    vol.fromJSON({
      '/left/a.txt': 'same',
      '/right/b.txt': 'same',
    });
    findDupesRes = await collectDupes({
      rootPaths: [ '/left', '/right', '/left' ],
    });
    expect(getGroupPaths(findDupesRes.groups)).toEqual([
      [ '/left/a.txt', '/right/b.txt' ],
    ]);
    expect(findDupesRes.groups[0].members.map(member => member.rootPath).sort()).toEqual([
      '/left',
      '/right',
    ]);
  });

  it('tests the same dir given twice does not pair a file with itself', async () => {
    let findDupesRes: Awaited<ReturnType<typeof collectDupes>>;
    vol.fromJSON({
      '/data/a.txt': 'only one copy',
    });
    findDupesRes = await collectDupes({
      rootPaths: [ '/data', '/data/' ],
    });
    expect(findDupesRes.groups).toEqual([]);
    expect(findDupesRes.stats.totalFiles).toBe(1);
    expect(findDupesRes.stats.filesSeen).toBe(1);
    expect(findDupesRes.stats.dirsScanned).toBe(1);
    expect(findDupesRes.stats.wastedBytes).toBe(0);
  });

  it('tests nested roots with a trailing slash count each file once', async () => {
    let findDupesRes: Awaited<ReturnType<typeof collectDupes>>;
    vol.fromJSON({
      '/data/a.txt': 'same',
      '/data/sub/b.txt': 'same',
    });
    findDupesRes = await collectDupes({
      rootPaths: [ '/data', '/data/sub/' ],
      recursive: true,
    });
    expect(getGroupPaths(findDupesRes.groups)).toEqual([
      [ '/data/a.txt', '/data/sub/b.txt' ],
    ]);
    expect(findDupesRes.stats.totalFiles).toBe(2);
    expect(findDupesRes.stats.dirsScanned).toBe(2);
    expect(findDupesRes.stats.wastedBytes).toBe(4);
  });

  it('tests no two groups share a member across overlapping roots', async () => {
    let genRes: GenTestDirRes;
    let findDupesRes: Awaited<ReturnType<typeof collectDupes>>;
    let memberPaths: string[];
    genRes = genTestDirs(mfs, {
      basePath: '/gen',
      dirDepth: 2,
      dirsPerLevel: 2,
      filesPerDir: 3,
    });
    findDupesRes = await collectDupes({
      rootPaths: [ '/gen', '/gen/test-dir_0_0/', '/gen/' ],
      recursive: true,
    });
    memberPaths = findDupesRes.groups.flatMap(group => group.members.map(member => member.path));
    expect(new Set(memberPaths).size).toBe(memberPaths.length);
    expect(memberPaths.every(memberPath => !memberPath.includes('//'))).toBe(true);
    expect(findDupesRes.groups.length).toBe(genRes.numDupeGroups);
    expect(memberPaths.length).toBe(genRes.numDupeFiles);
    expect(findDupesRes.stats.totalFiles).toBe(genRes.numFiles);
    expect(findDupesRes.stats.dirsScanned).toBe(genRes.numDirs + 1);
  });

  it('tests two runs over an unchanged tree find the same groups', async () => {
    let firstRes: Awaited<ReturnType<typeof collectDupes>>;
    let secondRes: Awaited<ReturnType<typeof collectDupes>>;
    genTestDirs(mfs, {
      basePath: '/gen',
      dirDepth: 2,
      dirsPerLevel: 2,
      filesPerDir: 3,
    });
    vol.fromJSON({
      '/gen/extra/a.txt': 'extra',
      '/gen/extra/b.txt': 'extra',
    });
    firstRes = await collectDupes({
      rootPaths: [ '/gen', '/gen/extra/' ],
      recursive: true,
      maxRunning: 1,
    });
    secondRes = await collectDupes({
      rootPaths: [ '/gen', '/gen/extra/' ],
      recursive: true,
      maxRunning: 3,
    });
    expect(firstRes.groups.length).toBeGreaterThan(0);
    expect(getGroupPaths(secondRes.groups)).toEqual(getGroupPaths(firstRes.groups));
    expect(secondRes.stats).toEqual(firstRes.stats);
  });

  it('tests groups are streamed through the channel', async () => {
    let groups: DuplicateGroup[];
    vol.fromJSON({
      '/data/a.txt': 'aaaa',
      '/data/b.txt': 'aaaa',
      '/data/c.txt': 'bb',
      '/data/d.txt': 'bb',
    });
    let findDupesRun = findDupes({
      rootPaths: [ '/data' ],
    });
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
    expect(groups.map(group => group.size).sort()).toEqual([ 2, 4 ]);
    expect(findDupesRes.stats.duplicateGroups).toBe(2);
  });

  it('tests an aborted run emits no groups', async () => {
    let abortController: AbortController;
    let findDupesRes: Awaited<ReturnType<typeof collectDupes>>;
    vol.fromJSON({
      '/data/a.txt': 'same',
      '/data/b.txt': 'same',
    });
    abortController = new AbortController();
    abortController.abort();
    findDupesRes = await collectDupes({
      rootPaths: [ '/data' ],
      signal: abortController.signal,
    });
    expect(findDupesRes.aborted).toBe(true);
    expect(findDupesRes.groups).toEqual([]);
    expect(findDupesRes.stats.totalFiles).toBe(0);
  });

  it('tests aborting while hashes run finalizes nothing', async () => {
    let abortController: AbortController;
    let findDupesRes: Awaited<ReturnType<typeof collectDupes>>;
    let hashCalls: string[];
    vol.fromJSON({
      '/data/a.txt': 'same',
      '/data/b.txt': 'same',
    });
    abortController = new AbortController();
    hashCalls = [];
    const hashFn: HashFn = (filePath) => {
      hashCalls.push(filePath);
      abortController.abort();
      return hashFile(filePath);
    };
    findDupesRes = await collectDupes({
      rootPaths: [ '/data' ],
      maxRunning: 1,
      signal: abortController.signal,
      hashFn,
    });
    expect(findDupesRes.aborted).toBe(true);
    expect(findDupesRes.groups).toEqual([]);
    expect(hashCalls.length).toBe(1);
    expect(logger.info).toHaveBeenCalledWith(expect.objectContaining({
      unfinishedBuckets: 1,
    }), 'find-dupes aborted');
  });

  it('tests invalid options throw ConfigError before walking', () => {
    vol.fromJSON({
      '/data/a.txt': 'a',
    });
    expect(() => findDupes({
      rootPaths: [ '/missing' ],
    })).toThrowError(ConfigError);
    expect(() => findDupes({
      rootPaths: [ '/data/a.txt' ],
    })).toThrowError('Not a directory: /data/a.txt');
    expect(() => findDupes({
      rootPaths: [],
    })).toThrowError(ConfigError);
    expect(() => findDupes({
      rootPaths: [ '/data' ],
      maxDepth: 2,
    })).toThrowError('maxDepth requires recursive');
    expect(() => findDupes({
      rootPaths: [ '/data' ],
      minSize: -1,
    })).toThrowError('minSize must be a non-negative integer');
    expect(() => findDupes({
      rootPaths: [ '/data' ],
      maxRunning: 0,
    })).toThrowError('maxRunning must be at least 1');
  });
});
