import { createHash, Hash } from 'crypto';
import { createReadStream, ReadStream } from 'fs';

/*
  512-bit digest, only used for content equality
*/
export const DEFAULT_ALG = 'blake2b512';
const outputFormat = 'hex';

export interface Hasher {
  update(data: string | Buffer | NodeJS.TypedArray | DataView): void;
  digest: () => string;
}

export function getHasher(alg = DEFAULT_ALG): Hasher {
  let hash: Hash;

  hash = createHash(alg);

  return {
    update,
    digest,
  };

  function update(data: string | Buffer | NodeJS.TypedArray | DataView) {
    hash.update(data);
  }
  function digest() {
    return hash.digest(outputFormat);
  }
}

export type HashFileOpts = {
  highWaterMark?: number;
  alg?: string;
};

/*
  Streams the file through the hasher, never holding more than
    one highWaterMark chunk in memory.
*/
export async function hashFile(filePath: string, opts: HashFileOpts = {}): Promise<string> {
  let hashStr: string;
  let hasher: Hasher;
  let rs: ReadStream;
  hasher = getHasher(opts.alg);
  rs = createReadStream(filePath, {
    highWaterMark: opts.highWaterMark,
  });

  const chunkCb = (chunk: string | Buffer) => {
    hasher.update(chunk);
  };

  await new Promise<void>((resolve, reject) => {
    rs.on('error', reject);
    rs.on('end', resolve);
    rs.on('data', chunkCb);
  });

  hashStr = hasher.digest();
  return hashStr;
}
