#!/usr/bin/env node

import { parseArgs } from "./args.js";
import { runDesign } from "./commands/design.js";

const VERSION = "0.1.0";

function printHelp(): void {
  process.stdout.write(`
\x1b[36mgrna-designer\x1b[0m — CRISPR guide RNA designer (NGG PAM)
\x1b[2mv${VERSION}\x1b[0m

\x1b[1mUSAGE\x1b[0m
  grna-designer <target_sequence> [options]

\x1b[1mOPTIONS\x1b[0m
  --length <n>                 Guide length upstream of the PAM (default: 20)
  --top <n>                    Candidates listed in the text report (default: 10)
  --format <fmt>               Output: text, json (default: text)
  --verbose                    Set log level to debug
  --quiet                      Suppress info/warn output
  -h, --help                   Show this help
  -v, --version                Print version

\x1b[1mEXAMPLES\x1b[0m
  grna-designer ATGCTAGCTAGCTAGCTAGCTAGCTAGCTAGCTAG
  grna-designer ATGCTAGCTAGCTAGCTAGCTAGCTAGCTAGCTAG --length 18 --top 3
  grna-designer ATGCTAGCTAGCTAGCTAGCTAGCTAGCTAGCTAG --format json

\x1b[1mCONFIG\x1b[0m
  .grna.yml in the working directory: guide_length, max_display, format

\x1b[1mENVIRONMENT\x1b[0m
  GRNA_LOG_LEVEL               Log level: debug, info, warn, error, silent

`);
}

function main(): number {
  const { args, positional } = parseArgs(process.argv.slice(2));

  if (args["help"] === "true") {
    printHelp();
    return 0;
  }

  if (args["version"] === "true") {
    process.stdout.write(`grna-designer v${VERSION}\n`);
    return 0;
  }

  return runDesign(args, positional, process.cwd());
}

try {
  process.exitCode = main();
} catch (err) {
  process.stderr.write(`[grna] Fatal: ${err instanceof Error ? err.message : String(err)}\n`);
  process.exit(1);
}
