
/*
  Invalid roots, numbers or flag combinations. Raised before any
    traversal starts; the cli reports it and exits non-zero.
*/
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}
