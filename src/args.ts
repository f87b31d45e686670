import path from 'path';

export const DEFAULT_OUT = 'pymeta-scan.json';

export interface CliOptions {
  command: string;
  project: string;
  out: string;
  ignore: string[];
  help: boolean;
}

export function parseArgs(argv: string[], cwd: string = process.cwd()): CliOptions {
  const opts: CliOptions = {
    command: 'scan',
    project: cwd,
    out: DEFAULT_OUT,
    ignore: [],
    help: false
  };

  const args = [...argv];
  const first = args[0];
  if (first && !first.startsWith('-')) {
    opts.command = first;
    args.shift();
  }

  while (args.length) {
    const arg = args.shift();
    if (!arg) break;
    if (arg === '--help' || arg === '-h') {
      opts.help = true;
    } else if (arg === '--project' || arg === '--out' || arg === '--ignore') {
      const value = args.shift();
      if (!value) break;
      if (arg === '--project') opts.project = value;
      else if (arg === '--out') opts.out = value;
      else opts.ignore.push(value);
    }
  }

  return opts;
}

export function helpText(): string {
  return `pymeta-scan [scan] [options]

If no command is provided, \`scan\` is run by default.

Options:
  --project <path>   Project folder (default: cwd)
  --out <path>       Output JSON file (default: ${DEFAULT_OUT})
  --ignore <glob>    Skip matching paths; repeatable (node_modules and .git are always skipped)
  -h, --help         Show this help
`;
}

/**
 * A directory, a path ending in a separator, or a missing path without an
 * extension gets the default file name appended.
 */
export function resolveOutputPath(out: string, isDirectory: boolean | undefined, cwd: string = process.cwd()): string {
  const outputPath = path.resolve(cwd, out);
  const endsWithSeparator = out.endsWith('/') || out.endsWith('\\');
  const hasExtension = Boolean(path.extname(outputPath));
  if (isDirectory || endsWithSeparator || (isDirectory === undefined && !hasExtension)) {
    return path.join(outputPath, DEFAULT_OUT);
  }
  return outputPath;
}
