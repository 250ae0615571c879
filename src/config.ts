
import dotenv from 'dotenv';

import { isString } from './lib/util/validate-primitives';
import {
  DEFAULT_HASH_HWM,
  DEFAULT_MAX_RUNNING_HASHES,
  LOG_DIR_PATH,
} from './constants';

dotenv.config();

const config = {
  ENVIRONMENT: getEnvironment(),
  LOG_DIR: getEnvVar('DUPESCAN_LOG_DIR') ?? LOG_DIR_PATH,
  MAX_RUNNING_HASHES: getPositiveIntEnvVar('DUPESCAN_MAX_RUNNING_HASHES', DEFAULT_MAX_RUNNING_HASHES),
  HASH_HWM: getPositiveIntEnvVar('DUPESCAN_HASH_HWM', DEFAULT_HASH_HWM),
} as const;

export {
  config,
};

function getEnvVar(envKey: string): string | undefined {
  let rawEnvVar: string | undefined;
  rawEnvVar = process.env[envKey];
  if(
    !isString(rawEnvVar)
    || (rawEnvVar.length === 0)
  ) {
    return undefined;
  }
  return rawEnvVar;
}

function getPositiveIntEnvVar(envKey: string, defaultVal: number): number {
  let rawEnvVar: string | undefined;
  let envVal: number;
  rawEnvVar = getEnvVar(envKey);
  if(rawEnvVar === undefined) {
    return defaultVal;
  }
  envVal = +rawEnvVar;
  if(
    !Number.isInteger(envVal)
    || (envVal < 1)
  ) {
    throw new Error(`Invalid ${envKey}: ${rawEnvVar}`);
  }
  return envVal;
}

function getEnvironment() {
  return process.env.ENVIRONMENT ?? 'development';
}
