import {
  Diagnostic,
  DuplicateGroup,
  FileRecord,
  HashResult,
  RunStatistics,
} from '../../models/dupe-types';
import { getErrorCode, getErrorMessage } from '../../util/validate-primitives';
import { SizeBucket, SizeBucketTable } from './size-buckets';

export type DupeAggregatorOpts = {
  stats: RunStatistics;
  submitHash: (record: FileRecord) => void;
  onGroup: (dupeGroup: DuplicateGroup) => void;
  onDiagnostic: (diagnostic: Diagnostic) => void;
};

/*
  Owns the size buckets. A bucket is finalized once the walk is closed
    and none of its hashes are pending, so no later file can join a
    group after it has been emitted.
*/
export class DupeAggregator {
  private stats: RunStatistics;
  private submitHash: (record: FileRecord) => void;
  private onGroup: (dupeGroup: DuplicateGroup) => void;
  private onDiagnostic: (diagnostic: Diagnostic) => void;

  private bucketTable: SizeBucketTable;
  private _walkClosed: boolean;
  private _cancelled: boolean;

  constructor(opts: DupeAggregatorOpts) {
    this.stats = opts.stats;
    this.submitHash = opts.submitHash;
    this.onGroup = opts.onGroup;
    this.onDiagnostic = opts.onDiagnostic;
    this.bucketTable = new SizeBucketTable();
    this._walkClosed = false;
    this._cancelled = false;
  }

  addRecord(record: FileRecord) {
    let newlyHashable: FileRecord[];
    if(this._walkClosed) {
      throw new Error(`Attempt to add record after walk closed: ${record.path}`);
    }
    if(this._cancelled) {
      return;
    }
    this.stats.filesSeen++;
    newlyHashable = this.bucketTable.addMember(record).newlyHashable;
    for(let i = 0; i < newlyHashable.length; ++i) {
      this.stats.candidatesHashed++;
      this.submitHash(newlyHashable[i]);
    }
  }

  onHashResult(hashResult: HashResult) {
    let bucket: SizeBucket | undefined;
    bucket = this.bucketTable.get(hashResult.record.size);
    if(bucket === undefined) {
      throw new Error(`No bucket for hash result: ${hashResult.record.path}`);
    }
    bucket.recordHashResult(hashResult);
    if(!hashResult.ok) {
      this.stats.hashErrors++;
      this.onDiagnostic({
        kind: 'hash',
        path: hashResult.record.path,
        code: getErrorCode(hashResult.error),
        message: getErrorMessage(hashResult.error),
      });
    }
    if(
      this._walkClosed
      && bucket.isSettled()
    ) {
      this.finalizeBucket(bucket);
    }
  }

  /*
    No more records will arrive. Buckets with nothing pending are
      finalized now, the rest as their last hash lands.
  */
  closeWalk() {
    if(this._walkClosed) {
      return;
    }
    this._walkClosed = true;
    for(const bucket of this.bucketTable) {
      if(bucket.isSettled()) {
        this.finalizeBucket(bucket);
      }
    }
  }

  cancel() {
    this._cancelled = true;
  }

  /*
    buckets with two or more members still waiting on hashes
  */
  getPendingBucketCount(): number {
    let pendingCount: number;
    pendingCount = 0;
    for(const bucket of this.bucketTable) {
      if(
        !bucket.finalized
        && (bucket.members.length > 1)
      ) {
        pendingCount++;
      }
    }
    return pendingCount;
  }

  private finalizeBucket(bucket: SizeBucket) {
    let dupeGroups: DuplicateGroup[];
    if(this._cancelled) {
      return;
    }
    dupeGroups = bucket.finalize();
    for(let i = 0; i < dupeGroups.length; ++i) {
      let dupeGroup = dupeGroups[i];
      this.stats.duplicateGroups++;
      this.stats.duplicateFiles += dupeGroup.members.length;
      this.stats.wastedBytes += dupeGroup.size * (dupeGroup.members.length - 1);
      this.onGroup(dupeGroup);
    }
  }
}
