import { z } from "zod";
import {
  DEFAULT_CONFIG,
  designGuides,
  loadConfig,
  logger,
  OutputFormatSchema,
  type GrnaConfig,
  type OutputFormat,
} from "@grna-designer/engine";
import { formatReport, HEAVY_RULE } from "../formatter.js";

export const BANNER = "CRISPR gRNA Designer";
export const USAGE = "Usage: grna-designer <target_sequence> [options]";
export const EXAMPLE = 'Example: grna-designer "ATGCTAGCTAGCTAGCTAGCTAGCTAGCTAGCTAG"';

export interface DesignOptions {
  sequence: string;
  guideLength: number;
  maxDisplay: number;
  format: OutputFormat;
}

const PositiveIntArg = z.coerce.number().int().positive();

function positiveInt(flag: string, raw: string): number {
  const result = PositiveIntArg.safeParse(raw);
  if (!result.success) {
    throw new Error(`invalid --${flag} '${raw}'. Must be a positive integer`);
  }
  return result.data;
}

function outputFormat(raw: string): OutputFormat {
  const result = OutputFormatSchema.safeParse(raw);
  if (!result.success) {
    throw new Error(
      `invalid format '${raw}'. Must be one of: ${OutputFormatSchema.options.join(", ")}`,
    );
  }
  return result.data;
}

/**
 * Merge CLI flags over the config file. Throws on malformed flag values.
 */
export function resolveDesignOptions(
  sequence: string,
  args: Record<string, string>,
  config: GrnaConfig | null,
): DesignOptions {
  const defaults = config ?? DEFAULT_CONFIG;
  return {
    sequence,
    guideLength: args["length"] !== undefined
      ? positiveInt("length", args["length"])
      : defaults.guide_length,
    maxDisplay: args["top"] !== undefined
      ? positiveInt("top", args["top"])
      : defaults.max_display,
    format: args["format"] !== undefined
      ? outputFormat(args["format"])
      : defaults.format,
  };
}

function write(lines: string[]): void {
  process.stdout.write(lines.join("\n") + "\n");
}

/**
 * Run a design from parsed arguments and return the process exit code.
 */
export function runDesign(
  args: Record<string, string>,
  positional: string[],
  cwd: string,
): number {
  const config = loadConfig(cwd);

  let options: DesignOptions;
  try {
    options = resolveDesignOptions(positional[0] ?? "", args, config);
  } catch (err) {
    process.stderr.write(`[grna] Error: ${err instanceof Error ? err.message : String(err)}\n`);
    return 1;
  }

  const text = options.format === "text";
  if (text || positional.length === 0) write([BANNER, HEAVY_RULE]);

  if (positional.length === 0) {
    write(["", USAGE, EXAMPLE]);
    return 1;
  }

  if (positional.length > 1) {
    logger.warn(`Ignoring ${positional.length - 1} extra argument(s)`);
  }

  if (text) {
    write(["", `Target Sequence: ${options.sequence}`, `Length: ${options.sequence.length} bp`, ""]);
  }

  const candidates = designGuides(options.sequence, options.guideLength);
  logger.debug(`Designed ${candidates.length} candidate(s) with guide length ${options.guideLength}`);

  process.stdout.write(formatReport(candidates, { format: options.format, maxDisplay: options.maxDisplay }));
  return 0;
}
