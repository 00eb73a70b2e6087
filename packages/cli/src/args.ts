const BOOLEAN_FLAGS = new Set(["help", "version", "verbose", "quiet"]);

const KNOWN_FLAGS = new Set([...BOOLEAN_FLAGS, "length", "top", "format"]);

export interface ParsedArgs {
  args: Record<string, string>;
  positional: string[];
}

export function parseArgs(argv: string[]): ParsedArgs {
  const args: Record<string, string> = {};
  const positional: string[] = [];

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg.startsWith("--")) {
      const key = arg.slice(2);

      if (!KNOWN_FLAGS.has(key)) {
        process.stderr.write(`[grna] Warning: unknown flag --${key}\n`);
      }

      if (BOOLEAN_FLAGS.has(key)) {
        args[key] = "true";
      } else {
        if (i + 1 >= argv.length || argv[i + 1].startsWith("--")) {
          process.stderr.write(`[grna] Error: --${key} requires a value\n`);
          process.exit(1);
        }
        args[key] = argv[++i];
      }
    } else if (arg.startsWith("-") && arg.length > 1) {
      const key = arg.slice(1);
      if (key === "h") args["help"] = "true";
      else if (key === "v") args["version"] = "true";
      else process.stderr.write(`[grna] Warning: unknown flag -${key}\n`);
    } else {
      positional.push(arg);
    }
  }

  // Handle --verbose / --quiet
  if (args["verbose"] === "true") {
    process.env.GRNA_LOG_LEVEL = "debug";
  } else if (args["quiet"] === "true") {
    process.env.GRNA_LOG_LEVEL = "error";
  }

  return { args, positional };
}
