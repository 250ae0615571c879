import { ConfigError } from '../models/config-error';

export type ParsedArgv = {
  cmd: string;
  args: string[];
  opts: Map<string, string[]>;
};

type ArgvToken = {
  kind: ArgvTokenEnum;
  val: string;
}

enum ArgvTokenEnum {
  CMD = 'CMD',
  FLAG = 'FLAG',
  ARG = 'ARG',
  END = 'END',
}

enum ArgvParserState {
  INIT = 'INIT',
  CMD = 'CMD',
  FLAG = 'FLAG',
  ARG = 'ARG',
}

/*
  <cmd> [arg...] [flag [arg...]...]
  Args following a flag belong to that flag. '--flag=val' is the same
    as '--flag val'.
*/
export function parseArgv(argv: string[]): ParsedArgv {
  let cmd: string | undefined;
  let cmdArgs: string[];
  let flags: Map<string, string[]>;

  let argvParser: Generator<ArgvToken, undefined, undefined>;
  let tokenStack: ArgvToken[];

  argv = argv.slice(2);
  cmdArgs = [];
  flags = new Map();

  argvParser = getArgvParser(argv);
  tokenStack = [];

  for(const currToken of argvParser) {
    /*
      CMD, FLAG and END are terminal, consume the args stacked on the
        previous CMD or FLAG
    */
    switch(currToken.kind) {
      case ArgvTokenEnum.FLAG:
      case ArgvTokenEnum.CMD:
      case ArgvTokenEnum.END:
        consumeCmdOrFlag();
        tokenStack.push(currToken);
        break;
      case ArgvTokenEnum.ARG:
        tokenStack.push(currToken);
    }
  }

  if(cmd === undefined) {
    throw new ConfigError('No command given');
  }

  return {
    cmd,
    args: cmdArgs,
    opts: flags,
  };

  function consumeCmdOrFlag() {
    if(tokenStack.length < 1) {
      return;
    }
    let token: ArgvToken | undefined;
    let argTokens: ArgvToken[];
    let argToken: ArgvToken | undefined;
    argTokens = [];
    while(
      ((token = tokenStack.pop()) !== undefined)
      && (token.kind === ArgvTokenEnum.ARG)
    ) {
      argTokens.push(token);
    }
    if(
      (token === undefined)
      || (
        token.kind !== ArgvTokenEnum.FLAG
        && token.kind !== ArgvTokenEnum.CMD
      )
    ) {
      throw new ConfigError(`Unexpected token: expected command or flag, found: ${token?.kind}`);
    }
    if(token.kind === ArgvTokenEnum.CMD) {
      if(cmd !== undefined) {
        throw new ConfigError(`Unexpected command '${token.val}', command already set to '${cmd}'`);
      }
      cmd = token.val;
      while((argToken = argTokens.pop()) !== undefined) {
        cmdArgs.push(argToken.val);
      }
    } else {
      let flagOpts: string[];
      if(flags.has(token.val)) {
        throw new ConfigError(`Flag '${token.val}' given more than once`);
      }
      flagOpts = [];
      while((argToken = argTokens.pop()) !== undefined) {
        flagOpts.push(argToken.val);
      }
      flags.set(token.val, flagOpts);
    }
  }
}

function *getArgvParser(argv: string[]): Generator<ArgvToken, undefined, undefined> {
  let pos: number;
  let parseState: ArgvParserState;
  parseState = ArgvParserState.INIT;
  pos = 0;
  while(pos < argv.length) {
    let currArg = argv[pos];
    switch(parseState) {
      case ArgvParserState.INIT:
        if(pos === 0) {
          parseState = ArgvParserState.CMD;
        } else if(isFlagArg(currArg)) {
          parseState = ArgvParserState.FLAG;
        } else {
          parseState = ArgvParserState.ARG;
        }
        break;
      case ArgvParserState.CMD:
        if(!isCmdStr(currArg)) {
          throw new ConfigError(`Invalid command: '${currArg}'`);
        }
        yield {
          kind: ArgvTokenEnum.CMD,
          val: currArg,
        };
        pos++;
        parseState = ArgvParserState.INIT;
        break;
      case ArgvParserState.FLAG: {
        let eqIdx = currArg.indexOf('=');
        if(eqIdx === -1) {
          yield {
            kind: ArgvTokenEnum.FLAG,
            val: currArg,
          };
        } else {
          yield {
            kind: ArgvTokenEnum.FLAG,
            val: currArg.substring(0, eqIdx),
          };
          yield {
            kind: ArgvTokenEnum.ARG,
            val: currArg.substring(eqIdx + 1),
          };
        }
        pos++;
        parseState = ArgvParserState.INIT;
        break;
      }
      case ArgvParserState.ARG:
        yield {
          kind: ArgvTokenEnum.ARG,
          val: currArg,
        };
        pos++;
        parseState = ArgvParserState.INIT;
        break;
    }
  }
  yield {
    kind: ArgvTokenEnum.END,
    val: '',
  };
}

function isFlagArg(argStr: string): boolean {
  return /^-{1,2}[a-zA-Z][a-zA-Z-]*/.test(argStr);
}

function isCmdStr(cmdStr: string): boolean {
  return /^[a-z0-9]+(-[a-z0-9]+)*$/.test(cmdStr);
}
