import { describe, it, expect } from 'vitest';

import { FileRecord, HashResult } from '../../models/dupe-types';
import { Deferred } from '../../util/deferred';
import { sleepImmediate } from '../../util/sleep';
import { HashPool } from './hash-pool';

function getRecord(filePath: string): FileRecord {
  return {
    path: filePath,
    size: 1,
    depth: 0,
    mtimeMs: 0,
    rootPath: '/root',
  };
}

/*
  hashFn whose jobs only complete when the test says so
*/
function getControlledHashFn() {
  let started: string[];
  let jobMap: Map<string, Deferred<string>>;
  started = [];
  jobMap = new Map();
  const hashFn = (filePath: string) => {
    let job: Deferred<string>;
    job = Deferred.init<string>();
    started.push(filePath);
    jobMap.set(filePath, job);
    return job.promise;
  };
  const getJob = (filePath: string) => {
    let job: Deferred<string> | undefined;
    job = jobMap.get(filePath);
    if(job === undefined) {
      throw new Error(`job not started: ${filePath}`);
    }
    return job;
  };
  return {
    started,
    hashFn,
    getJob,
  };
}

describe('hash-pool tests', () => {
  it('tests no more than maxRunning jobs run at once', async () => {
    let ctrl: ReturnType<typeof getControlledHashFn>;
    let hashPool: HashPool;
    let results: HashResult[];
    ctrl = getControlledHashFn();
    results = [];
    hashPool = new HashPool({
      maxRunning: 2,
      hashFn: ctrl.hashFn,
      onResult: (hashResult) => {
        results.push(hashResult);
      },
    });
    [ '/root/a', '/root/b', '/root/c' ].forEach(filePath => {
      hashPool.submit(getRecord(filePath));
    });
    expect(ctrl.started).toEqual([ '/root/a', '/root/b' ]);
    expect(hashPool.running).toBe(2);
    expect(hashPool.queued).toBe(1);
    ctrl.getJob('/root/b').resolve('digest-b');
    await sleepImmediate();
    expect(ctrl.started).toEqual([ '/root/a', '/root/b', '/root/c' ]);
    expect(results.map(res => res.record.path)).toEqual([ '/root/b' ]);
    ctrl.getJob('/root/a').resolve('digest-a');
    ctrl.getJob('/root/c').resolve('digest-c');
    await hashPool.drain();
    expect(hashPool.running).toBe(0);
    expect(results.length).toBe(3);
  });

  it('tests a failed hash becomes a failed result', async () => {
    let hashPool: HashPool;
    let results: HashResult[];
    let readErr: Error;
    results = [];
    readErr = new Error('permission denied');
    hashPool = new HashPool({
      maxRunning: 1,
      hashFn: (filePath) => {
        return (filePath === '/root/bad')
          ? Promise.reject(readErr)
          : Promise.resolve('digest')
        ;
      },
      onResult: (hashResult) => {
        results.push(hashResult);
      },
    });
    hashPool.submit(getRecord('/root/bad'));
    hashPool.submit(getRecord('/root/good'));
    await hashPool.drain();
    expect(results).toEqual([
      {
        ok: false,
        record: getRecord('/root/bad'),
        error: readErr,
      },
      {
        ok: true,
        record: getRecord('/root/good'),
        digest: 'digest',
      },
    ]);
  });

  it('tests drain() resolves immediately when idle', async () => {
    let hashPool: HashPool;
    hashPool = new HashPool({
      maxRunning: 1,
      hashFn: () => Promise.resolve('digest'),
      onResult: () => undefined,
    });
    await expect(hashPool.drain()).resolves.toBeUndefined();
  });

  it('tests cancel() drops queued jobs and lets running jobs finish', async () => {
    let ctrl: ReturnType<typeof getControlledHashFn>;
    let hashPool: HashPool;
    let results: HashResult[];
    let droppedJobs: FileRecord[];
    let drainPromise: Promise<void>;
    ctrl = getControlledHashFn();
    results = [];
    hashPool = new HashPool({
      maxRunning: 1,
      hashFn: ctrl.hashFn,
      onResult: (hashResult) => {
        results.push(hashResult);
      },
    });
    hashPool.submit(getRecord('/root/a'));
    hashPool.submit(getRecord('/root/b'));
    hashPool.submit(getRecord('/root/c'));
    droppedJobs = hashPool.cancel();
    expect(droppedJobs.map(rec => rec.path)).toEqual([ '/root/b', '/root/c' ]);
    expect(hashPool.submit(getRecord('/root/d'))).toBe(false);
    drainPromise = hashPool.drain();
    ctrl.getJob('/root/a').resolve('digest-a');
    await drainPromise;
    expect(ctrl.started).toEqual([ '/root/a' ]);
    expect(results.map(res => res.record.path)).toEqual([ '/root/a' ]);
  });

  it('tests an error thrown by onResult rejects drain()', async () => {
    let hashPool: HashPool;
    hashPool = new HashPool({
      maxRunning: 1,
      hashFn: () => Promise.resolve('digest'),
      onResult: () => {
        throw new Error('bucket bookkeeping broke');
      },
    });
    hashPool.submit(getRecord('/root/a'));
    await expect(hashPool.drain()).rejects.toThrowError('bucket bookkeeping broke');
  });

  it('tests an invalid maxRunning throws', () => {
    expect(() => new HashPool({
      maxRunning: 0,
      hashFn: () => Promise.resolve('digest'),
      onResult: () => undefined,
    })).toThrowError('Invalid maxRunning');
  });
});
