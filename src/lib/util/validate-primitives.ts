
export function isObject(val: unknown): val is Record<string, unknown> {
  return (
    (val !== null)
    && ((typeof val) === 'object')
  );
}

export function isString(val: unknown): val is string {
  return (typeof val) === 'string';
}

/*
  Node fs errors carry a string `code`, e.g. 'ENOENT'
*/
export function getErrorCode(err: unknown): string | undefined {
  if(
    isObject(err)
    && isString(err.code)
  ) {
    return err.code;
  }
  return undefined;
}

export function getErrorMessage(err: unknown): string {
  if(err instanceof Error) {
    return err.message;
  }
  return String(err);
}
