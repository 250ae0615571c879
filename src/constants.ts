
import path from 'path';

export const BASE_DIR = path.resolve(__dirname, '..');

const LOG_DIR_NAME = 'logs';
export const LOG_DIR_PATH = [
  BASE_DIR,
  LOG_DIR_NAME,
].join(path.sep);

export const DEFAULT_MAX_RUNNING_HASHES = 64;
export const DEFAULT_HASH_HWM = 64 * 1024;
export const DEFAULT_MIN_SIZE = 1;
