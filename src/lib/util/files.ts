import { Stats, statSync } from 'fs';
import path from 'path';

import { getErrorCode } from './validate-primitives';

/*
  absolute, with no trailing separator
*/
export function getPathRelativeToCwd(filePath: string) {
  return path.resolve(process.cwd(), filePath);
}

export function checkDir(dirPath: string): boolean {
  let stats: Stats;
  try {
    stats = statSync(dirPath);
  } catch(e) {
    let errCode = getErrorCode(e);
    if(
      (errCode === 'ENOENT')
      || (errCode === 'ENOTDIR')
    ) {
      return false;
    } else {
      throw e;
    }
  }
  return stats.isDirectory();
}

/*
  true when targetPath is dirPath itself or lives somewhere below it
*/
export function isWithinDir(targetPath: string, dirPath: string): boolean {
  let relPath: string;
  relPath = path.relative(dirPath, targetPath);
  return (
    (relPath !== '..')
    && !relPath.startsWith(`..${path.sep}`)
    && !path.isAbsolute(relPath)
  );
}
