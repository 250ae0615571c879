import { z } from 'zod';

import { ConfigError } from '../models/config-error';
import { ParsedArgv } from './parse-argv';

export enum DUPESCAN_CMD_ENUM {
  FIND = 'FIND',
  HELP = 'HELP',
}

const BoolFlagArgSchema = z.tuple([]).transform(() => [ true ]).or(
  z.tuple([
    z.literal('true').or(z.literal('false')).transform(val => {
      return val === 'true' ? true : false;
    }),
  ]),
);

const NonNegativeIntArgSchema = z.tuple([
  z.coerce.number().int().nonnegative(),
]);

const RECURSIVE_FLAGS = [ '-r', '--recursive' ] as const;
const FOLLOW_FLAGS = [ '-f', '--follow' ] as const;

const FindDupesOptsSchema = z.tuple([
  z.enum(RECURSIVE_FLAGS).transform(() => 'recursive' as const),
  BoolFlagArgSchema,
]).or(
  z.tuple([
    z.enum(FOLLOW_FLAGS).transform(() => 'follow' as const),
    BoolFlagArgSchema,
  ])
).or(
  z.tuple([
    z.literal('-m').or(z.literal('--min-size')).transform(() => 'min_size' as const),
    NonNegativeIntArgSchema,
  ])
).or(
  z.tuple([
    z.literal('-d').or(z.literal('--max-depth')).transform(() => 'max_depth' as const),
    NonNegativeIntArgSchema,
  ])
).or(
  z.tuple([
    z.literal('-s').or(z.literal('--sort')).transform(() => 'sort' as const),
    z.tuple([
      z.string().min(1),
    ]),
  ])
).or(
  z.tuple([
    z.literal('-p').or(z.literal('--prefer')).transform(() => 'prefer' as const),
    z.tuple([
      z.string().min(1),
    ]),
  ])
).or(
  z.tuple([
    z.literal('-w').or(z.literal('--workers')).transform(() => 'workers' as const),
    z.tuple([
      z.coerce.number().int().positive(),
    ]),
  ])
);

export type FindDupesFlags = {
  recursive?: boolean;
  follow?: boolean;
  min_size?: number;
  max_depth?: number;
  sort?: string;
  prefer?: string;
  workers?: number;
};

export function getCmdKind(cmdStr: string): DUPESCAN_CMD_ENUM {
  switch(cmdStr) {
    case 'find':
    case 'f':
      return DUPESCAN_CMD_ENUM.FIND;
    case 'help':
    case 'h':
      return DUPESCAN_CMD_ENUM.HELP;
    default:
      throw new ConfigError(`Invalid command: ${cmdStr}`);
  }
}

/*
  Values after a boolean flag that are not 'true' or 'false' are dirs,
    so 'find -r ./a ./b' reads as expected.
*/
export function getFindDupesArgv(parsedArgv: ParsedArgv): {
  rootPaths: string[];
  opts: [string, string[]][];
} {
  let rootPaths: string[];
  let opts: [string, string[]][];
  rootPaths = [ ...parsedArgv.args ];
  opts = [];
  for(const [ flag, flagArgs ] of parsedArgv.opts) {
    if(
      isBoolFlag(flag)
      && (flagArgs.length > 0)
      && !isBoolStr(flagArgs[0])
    ) {
      rootPaths.push(...flagArgs);
      opts.push([ flag, [] ]);
      continue;
    }
    opts.push([ flag, flagArgs ]);
  }
  if(rootPaths.length < 1) {
    throw new ConfigError('Invalid find command: expected at least one directory');
  }
  return {
    rootPaths,
    opts,
  };
}

export function getFindDupesFlags(opts: [string, string[]][]): FindDupesFlags {
  let findDupesFlags: FindDupesFlags;
  findDupesFlags = {};
  for(let i = 0; i < opts.length; ++i) {
    let parseRes = FindDupesOptsSchema.safeParse(opts[i]);
    if(!parseRes.success) {
      throw new ConfigError(`Invalid option: ${[ opts[i][0], ...opts[i][1] ].join(' ')}`);
    }
    let findDupesOpt = parseRes.data;
    switch(findDupesOpt[0]) {
      case 'recursive':
        findDupesFlags.recursive = findDupesOpt[1][0];
        break;
      case 'follow':
        findDupesFlags.follow = findDupesOpt[1][0];
        break;
      case 'min_size':
        findDupesFlags.min_size = findDupesOpt[1][0];
        break;
      case 'max_depth':
        findDupesFlags.max_depth = findDupesOpt[1][0];
        break;
      case 'sort':
        findDupesFlags.sort = findDupesOpt[1][0];
        break;
      case 'prefer':
        findDupesFlags.prefer = findDupesOpt[1][0];
        break;
      case 'workers':
        findDupesFlags.workers = findDupesOpt[1][0];
        break;
    }
  }
  if(
    (findDupesFlags.max_depth !== undefined)
    && !findDupesFlags.recursive
  ) {
    throw new ConfigError('--max-depth requires -r/--recursive');
  }
  return findDupesFlags;
}

function isBoolFlag(flag: string): boolean {
  return [
    ...RECURSIVE_FLAGS,
    ...FOLLOW_FLAGS,
  ].some(boolFlag => boolFlag === flag);
}

function isBoolStr(val: string): boolean {
  return (
    (val === 'true')
    || (val === 'false')
  );
}
