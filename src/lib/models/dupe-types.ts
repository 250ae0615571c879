
/*
  A regular file seen by the walker. depth is the nesting level of
    the directory holding the file, the root itself being 0.
*/
export type FileRecord = {
  readonly path: string;
  readonly size: number;
  readonly depth: number;
  readonly mtimeMs: number;
  readonly rootPath: string;
};

export type HashResult = {
  ok: true;
  record: FileRecord;
  digest: string;
} | {
  ok: false;
  record: FileRecord;
  error: unknown;
};

export type DuplicateGroup = {
  size: number;
  digest: string;
  members: FileRecord[];
};

export type DiagnosticKind = 'traversal' | 'hash';

export type Diagnostic = {
  kind: DiagnosticKind;
  path: string;
  code?: string;
  message: string;
};

export type RunStatistics = {
  /** every regular file found under the roots */
  totalFiles: number;
  /** files that passed the min-size check and were grouped by size */
  filesSeen: number;
  skippedMinSize: number;
  dirsScanned: number;
  candidatesHashed: number;
  hashErrors: number;
  traversalErrors: number;
  /** members of emitted groups, originals included */
  duplicateFiles: number;
  duplicateGroups: number;
  /** sum over groups of size * (members - 1) */
  wastedBytes: number;
};

export function initRunStatistics(): RunStatistics {
  return {
    totalFiles: 0,
    filesSeen: 0,
    skippedMinSize: 0,
    dirsScanned: 0,
    candidatesHashed: 0,
    hashErrors: 0,
    traversalErrors: 0,
    duplicateFiles: 0,
    duplicateGroups: 0,
    wastedBytes: 0,
  };
}
