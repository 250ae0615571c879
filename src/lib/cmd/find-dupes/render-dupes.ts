import { Diagnostic, DuplicateGroup, RunStatistics } from '../../models/dupe-types';
import {
  getCountString,
  getIntuitiveByteString,
  getIntuitiveTimeString,
} from '../../util/format-util';
import { FindDupesColors } from './find-dupes-colors';

/*
  ┌ 4 bytes
  ├ /data/a.txt
  └ /data/b.txt
*/
export function formatDupeGroup(dupeGroup: DuplicateGroup, c: FindDupesColors): string[] {
  let lines: string[];
  lines = [
    `${c.tree('┌')} ${c.size(dupeGroup.size)} bytes`,
  ];
  for(let i = 0; i < dupeGroup.members.length; ++i) {
    let treeChar = (i === (dupeGroup.members.length - 1))
      ? '└'
      : '├'
    ;
    lines.push(`${c.tree(treeChar)} ${c.path(dupeGroup.members[i].path)}`);
  }
  return lines;
}

export function formatRunStats(stats: RunStatistics, elapsedMs: number, c: FindDupesColors): string[] {
  let lines: string[];
  lines = [
    `found ${c.count(getCountString(stats.totalFiles))} files in ${c.count(getCountString(stats.dirsScanned))} dirs`,
  ];
  if(stats.skippedMinSize > 0) {
    lines.push(`skipped ${c.count(getCountString(stats.skippedMinSize))} files below min size`);
  }
  lines.push(`hashed ${c.count(getCountString(stats.candidatesHashed))} files`);
  lines.push([
    `${c.count(getCountString(stats.duplicateGroups))} duplicate groups`,
    `${c.count(getCountString(stats.duplicateFiles))} files`,
    `${c.bytes(getIntuitiveByteString(stats.wastedBytes))} wasted`,
  ].join(', '));
  if(
    (stats.traversalErrors > 0)
    || (stats.hashErrors > 0)
  ) {
    lines.push(c.warn(`errors: ${getCountString(stats.traversalErrors)} traversal, ${getCountString(stats.hashErrors)} hash`));
  }
  lines.push(`took ${c.time(getIntuitiveTimeString(elapsedMs))}`);
  return lines;
}

export function formatDiagnostic(diagnostic: Diagnostic, c: FindDupesColors): string {
  return `${c.warn(`[${diagnostic.kind}]`)} ${diagnostic.path}: ${diagnostic.message}`;
}
