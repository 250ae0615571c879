import { FileRecord, HashResult } from '../../models/dupe-types';
import { Dll } from '../../models/lists/dll';
import { Deferred } from '../../util/deferred';

export type HashFn = (filePath: string) => Promise<string>;

export type HashPoolOpts = {
  maxRunning: number;
  hashFn: HashFn;
  onResult: (hashResult: HashResult) => void;
};

/*
  Bounded FIFO pool of file hash jobs. A failed read becomes a
    failed HashResult; only an error thrown by onResult fails the pool,
    surfacing through drain().
*/
export class HashPool {
  private maxRunning: number;
  private hashFn: HashFn;
  private onResult: (hashResult: HashResult) => void;

  private jobQueue: Dll<FileRecord>;
  private _running: number;
  private _cancelled: boolean;
  private drainDeferred: Deferred | undefined;
  private failure: { err: unknown } | undefined;

  constructor(opts: HashPoolOpts) {
    if(
      !Number.isInteger(opts.maxRunning)
      || (opts.maxRunning < 1)
    ) {
      throw new Error(`Invalid maxRunning: ${opts.maxRunning}`);
    }
    this.maxRunning = opts.maxRunning;
    this.hashFn = opts.hashFn;
    this.onResult = opts.onResult;
    this.jobQueue = new Dll();
    this._running = 0;
    this._cancelled = false;
  }

  get running() {
    return this._running;
  }

  get queued() {
    return this.jobQueue.length;
  }

  get cancelled() {
    return this._cancelled;
  }

  submit(record: FileRecord): boolean {
    if(this._cancelled) {
      return false;
    }
    this.jobQueue.push(record);
    this.pump();
    return true;
  }

  /*
    Drops every job that has not started. Running jobs finish and
      still report their results.
  */
  cancel(): FileRecord[] {
    let droppedJobs: FileRecord[];
    this._cancelled = true;
    droppedJobs = this.jobQueue.drain();
    this.checkDrained();
    return droppedJobs;
  }

  drain(): Promise<void> {
    if(this.failure !== undefined) {
      return Promise.reject(this.failure.err);
    }
    if(this.isIdle()) {
      return Promise.resolve();
    }
    if(this.drainDeferred === undefined) {
      this.drainDeferred = Deferred.init();
    }
    return this.drainDeferred.promise;
  }

  private isIdle() {
    return (
      (this._running === 0)
      && (this.jobQueue.length === 0)
    );
  }

  private pump() {
    let record: FileRecord | undefined;
    while(
      (this._running < this.maxRunning)
      && (this.failure === undefined)
      && ((record = this.jobQueue.popFront()) !== undefined)
    ) {
      this._running++;
      this.runJob(record).catch((err: unknown) => {
        this.fail(err);
      });
    }
  }

  private async runJob(record: FileRecord) {
    let hashResult: HashResult;
    try {
      let digest = await this.hashFn(record.path);
      hashResult = {
        ok: true,
        record,
        digest,
      };
    } catch(e) {
      hashResult = {
        ok: false,
        record,
        error: e,
      };
    }
    this._running--;
    this.onResult(hashResult);
    this.pump();
    this.checkDrained();
  }

  private fail(err: unknown) {
    let drainDeferred: Deferred | undefined;
    if(this.failure !== undefined) {
      return;
    }
    this.failure = {
      err,
    };
    this.jobQueue.drain();
    drainDeferred = this.drainDeferred;
    this.drainDeferred = undefined;
    drainDeferred?.reject(err);
  }

  private checkDrained() {
    let drainDeferred: Deferred | undefined;
    if(!this.isIdle()) {
      return;
    }
    drainDeferred = this.drainDeferred;
    this.drainDeferred = undefined;
    drainDeferred?.resolve();
  }
}
