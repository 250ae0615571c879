export type ColorFormatter = (val: unknown) => string;

export class CliColors {

  static comb(fns: ColorFormatter[]): ColorFormatter {
    let fmtFn: ColorFormatter | undefined;
    for(let i = 0; i < fns.length; ++i) {
      if(fmtFn === undefined) {
        fmtFn = fns[i];
      } else {
        fmtFn = _comb(fmtFn, fns[i]);
      }
    }
    if(fmtFn === undefined) {
      fmtFn = CliColors.plain;
    }
    return fmtFn;
  }

  static rgb(r: number, g: number, b: number): ColorFormatter {
    return (val: unknown) => {
      return `\x1B[38;2;${r};${g};${b}m${val}\x1B[39m`;
    };
  }
  /*
    used in place of every formatter when output is not a TTY
  */
  static plain(val: unknown) {
    return `${val}`;
  }
  static dim(val: unknown) {
    return `\x1B[2m${val}\x1B[22m`;
  }
  static bold(val: unknown) {
    return `\x1B[1m${val}\x1B[22m`;
  }
}

function _comb(a: ColorFormatter, b: ColorFormatter): ColorFormatter {
  return (str) => {
    return a(b(str));
  };
}
