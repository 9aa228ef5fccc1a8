#!/usr/bin/env node
import { harvestArgsSchema, runHarvestAction } from './actions/harvest.js';
import { parseArgs } from './cli-args.js';

function printHelp(): void {
  console.log(`ldes-harvester CLI

Usage:
  cli help
  cli https://example.org/ldes
  cli https://example.org/ldes --cacheDir="./tmp/cache"
  cli https://example.org/ldes --no-resume
  cli https://example.org/ldes --logLevel=debug

Walks a Linked Data Event Stream and caches every member as N-Triples.

Arguments:
  <url>         Required. Entry point of the stream (collection or page).

Options:
  --cacheDir    Optional. Directory for members, state and log (default: ./cache).
                Also accepted as --cache-dir.
  --no-resume   Optional. Ignore saved state and start a fresh harvest.
  --logLevel    Optional. One of: fatal, error, warn, info, debug, trace, silent.
                Defaults to LOG_LEVEL or info.
  --help, -h    Show this help message.

Exit codes:
  0  Harvest finished (page and member errors are reported in the summary)
  1  Invalid arguments, setup failure, unreachable entry point, fatal error
     or interrupt
`);
}

async function main(): Promise<number> {
  const { command, positionals, options } = parseArgs(process.argv.slice(2));

  if (command === 'help') {
    printHelp();
    return 0;
  }

  const [url, ...extra] = positionals;
  if (extra.length > 0) {
    console.error(`Unexpected argument: ${extra.join(' ')}`);
    printHelp();
    return 1;
  }

  const parsedHarvestArgs = harvestArgsSchema.safeParse({
    url,
    cacheDir: options.cacheDir ?? options['cache-dir'],
    noResume: options['no-resume'],
    logLevel: options.logLevel,
  });
  if (!parsedHarvestArgs.success) {
    console.error(
      parsedHarvestArgs.error.issues[0]?.message ?? 'Invalid arguments',
    );
    printHelp();
    return 1;
  }

  return runHarvestAction(parsedHarvestArgs.data.url, {
    cacheDir: parsedHarvestArgs.data.cacheDir,
    resume: !parsedHarvestArgs.data.noResume,
    logLevel: parsedHarvestArgs.data.logLevel,
  });
}

const exitCode = await main();
process.exitCode = exitCode;
