type ParsedArgs = {
  command: 'help' | 'harvest';
  positionals: string[];
  options: Record<string, string>;
};

// Flags that never take a value, so `--no-resume <url>` keeps the URL positional.
const BOOLEAN_FLAGS = new Set(['no-resume', 'help']);

/**
 * `cli <url> [options]` harvests; no arguments, `help`, `--help` or `-h`
 * ask for usage.
 */
export function parseArgs(argv: string[]): ParsedArgs {
  const positionals: string[] = [];
  const options: Record<string, string> = {};

  for (let index = 0; index < argv.length; index += 1) {
    const arg = argv[index];
    if (arg === undefined) {
      continue;
    }

    if (arg === '-h') {
      options.help = 'true';
      continue;
    }

    if (!arg.startsWith('--')) {
      positionals.push(arg);
      continue;
    }

    const [key, maybeValue] = arg.slice(2).split('=', 2);
    if (!key) {
      continue;
    }

    if (maybeValue !== undefined) {
      options[key] = maybeValue;
      continue;
    }

    const next = argv[index + 1];
    if (!BOOLEAN_FLAGS.has(key) && next && !next.startsWith('--')) {
      options[key] = next;
      index += 1;
      continue;
    }

    options[key] = 'true';
  }

  const [first] = positionals;
  if (first === undefined || first === 'help' || options.help === 'true') {
    return { command: 'help', positionals: [], options };
  }

  return { command: 'harvest', positionals, options };
}

export type { ParsedArgs };
