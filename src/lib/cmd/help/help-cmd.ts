const USAGE_LINES = [
  'usage: dupescan <command> [args] [flags]',
  '',
  'commands:',
  '  find, f <dir...>     report groups of identical files under each dir',
  '  help, h              print this message',
  '',
  'find flags:',
  '  -r, --recursive      walk into subdirectories',
  '  -d, --max-depth N    with -r, read directories at most N levels below a root',
  '  -m, --min-size N     ignore files smaller than N bytes (default 1)',
  '  -f, --follow         follow symbolic links',
  '  -s, --sort KEYS      member order, comma separated from: mtime, path, depth',
  '  -p, --prefer DIR     list members under DIR first',
  '  -w, --workers N      files hashed at once',
];

export function getUsageLines(): string[] {
  return USAGE_LINES.slice();
}

export function helpCmdMain(logFn: (line: string) => void = console.log) {
  USAGE_LINES.forEach(line => {
    logFn(line);
  });
}
