import { DuplicateGroup, FileRecord, HashResult } from '../../models/dupe-types';

/*
  All records of one exact byte size. Members are only hashed once
    there are at least two of them; the second arrival activates the
    first retroactively.
*/
export class SizeBucket {
  readonly size: number;
  readonly members: FileRecord[];
  readonly hashes: Map<string, FileRecord[]>;
  private submittedCount: number;
  private _pendingHashCount: number;
  private _failedCount: number;
  private _finalized: boolean;

  constructor(size: number) {
    this.size = size;
    this.members = [];
    this.hashes = new Map();
    this.submittedCount = 0;
    this._pendingHashCount = 0;
    this._failedCount = 0;
    this._finalized = false;
  }

  get pendingHashCount() {
    return this._pendingHashCount;
  }

  get failedCount() {
    return this._failedCount;
  }

  get finalized() {
    return this._finalized;
  }

  /*
    Returns the members that became hashable with this addition. They
      are counted as pending here, the caller must submit every one.
  */
  addMember(record: FileRecord): FileRecord[] {
    let newlyHashable: FileRecord[];
    if(record.size !== this.size) {
      throw new Error(`Record size ${record.size} does not match bucket size ${this.size}: ${record.path}`);
    }
    if(this._finalized) {
      throw new Error(`Attempt to add member to finalized bucket of size ${this.size}`);
    }
    this.members.push(record);
    if(this.members.length < 2) {
      return [];
    }
    newlyHashable = this.members.slice(this.submittedCount);
    this.submittedCount = this.members.length;
    this._pendingHashCount += newlyHashable.length;
    return newlyHashable;
  }

  recordHashResult(hashResult: HashResult) {
    let digestMembers: FileRecord[] | undefined;
    if(this._pendingHashCount < 1) {
      throw new Error(`Unexpected hash result for bucket of size ${this.size}: ${hashResult.record.path}`);
    }
    this._pendingHashCount--;
    if(!hashResult.ok) {
      this._failedCount++;
      return;
    }
    digestMembers = this.hashes.get(hashResult.digest);
    if(digestMembers === undefined) {
      digestMembers = [];
      this.hashes.set(hashResult.digest, digestMembers);
    }
    digestMembers.push(hashResult.record);
  }

  /*
    ready once every submitted member has a result. Single-member
      buckets are never ready, there is nothing to compare.
  */
  isSettled(): boolean {
    return (
      !this._finalized
      && (this.members.length > 1)
      && (this._pendingHashCount === 0)
    );
  }

  finalize(): DuplicateGroup[] {
    let dupeGroups: DuplicateGroup[];
    if(this._finalized) {
      throw new Error(`Bucket of size ${this.size} already finalized`);
    }
    if(this._pendingHashCount !== 0) {
      throw new Error(`Attempt to finalize bucket of size ${this.size} with ${this._pendingHashCount} pending hashes`);
    }
    this._finalized = true;
    dupeGroups = [];
    for(const [ digest, digestMembers ] of this.hashes) {
      if(digestMembers.length < 2) {
        continue;
      }
      dupeGroups.push({
        size: this.size,
        digest,
        members: digestMembers.slice(),
      });
    }
    this.hashes.clear();
    return dupeGroups;
  }
}

/*
  size -> bucket index into a flat bucket arena
*/
export class SizeBucketTable {
  private bucketIdxMap: Map<number, number>;
  private buckets: SizeBucket[];

  constructor() {
    this.bucketIdxMap = new Map();
    this.buckets = [];
  }

  get(size: number): SizeBucket | undefined {
    let bucketIdx: number | undefined;
    bucketIdx = this.bucketIdxMap.get(size);
    if(bucketIdx === undefined) {
      return undefined;
    }
    return this.buckets[bucketIdx];
  }

  addMember(record: FileRecord): {
    bucket: SizeBucket;
    newlyHashable: FileRecord[];
  } {
    let bucket: SizeBucket | undefined;
    bucket = this.get(record.size);
    if(bucket === undefined) {
      bucket = new SizeBucket(record.size);
      this.bucketIdxMap.set(record.size, this.buckets.length);
      this.buckets.push(bucket);
    }
    return {
      bucket,
      newlyHashable: bucket.addMember(record),
    };
  }

  [Symbol.iterator]() {
    return this.buckets[Symbol.iterator]();
  }
}
