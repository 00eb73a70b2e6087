/**
 * Config loader — reads and validates `.grna.yml` configuration files.
 * Uses Zod for schema validation; problems are warnings and fall back to defaults.
 */

import { readFileSync, existsSync } from "node:fs";
import { resolve, join } from "node:path";
import yaml from "js-yaml";
import { z } from "zod";
import { logger } from "./logger.js";
import {
  DEFAULT_GUIDE_LENGTH,
  DEFAULT_MAX_DISPLAY,
  GuideLengthSchema,
  OutputFormatSchema,
  type OutputFormat,
} from "./schemas.js";

/* ------------------------------------------------------------------ */
/*  Types                                                              */
/* ------------------------------------------------------------------ */

export const CONFIG_FILE = ".grna.yml";

export interface GrnaConfig {
  /** Length of the protospacer extracted upstream of each PAM */
  guide_length: number;
  /** How many candidates the text report lists */
  max_display: number;
  /** Report format: "text" or "json" */
  format: OutputFormat;
}

export const DEFAULT_CONFIG: GrnaConfig = {
  guide_length: DEFAULT_GUIDE_LENGTH,
  max_display: DEFAULT_MAX_DISPLAY,
  format: "text",
};

const KNOWN_KEYS = ["guide_length", "max_display", "format"] as const;

/* ------------------------------------------------------------------ */
/*  Zod schema                                                         */
/* ------------------------------------------------------------------ */

const grnaConfigSchema = z.object({
  guide_length: GuideLengthSchema.optional(),
  max_display: z.number().int().positive().optional(),
  format: OutputFormatSchema.optional(),
}).passthrough();

/* ------------------------------------------------------------------ */
/*  Helpers                                                            */
/* ------------------------------------------------------------------ */

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export function didYouMean(input: string, valid: readonly string[]): string | null {
  let best: string | null = null;
  let bestDist = Infinity;

  for (const candidate of valid) {
    const dist = levenshtein(input.toLowerCase(), candidate.toLowerCase());
    if (dist < bestDist && dist <= 3) {
      bestDist = dist;
      best = candidate;
    }
  }

  return best;
}

function levenshtein(a: string, b: string): number {
  const m = a.length;
  const n = b.length;
  const dp: number[][] = Array.from({ length: m + 1 }, () => Array<number>(n + 1).fill(0));

  for (let i = 0; i <= m; i++) dp[i][0] = i;
  for (let j = 0; j <= n; j++) dp[0][j] = j;

  for (let i = 1; i <= m; i++) {
    for (let j = 1; j <= n; j++) {
      dp[i][j] = a[i - 1] === b[j - 1]
        ? dp[i - 1][j - 1]
        : 1 + Math.min(dp[i - 1][j], dp[i][j - 1], dp[i - 1][j - 1]);
    }
  }

  return dp[m][n];
}

/* ------------------------------------------------------------------ */
/*  Loader                                                             */
/* ------------------------------------------------------------------ */

/**
 * Load `.grna.yml` from the given directory.
 * Returns the parsed config merged with defaults, or null if no config file exists.
 */
export function loadConfig(dir: string): GrnaConfig | null {
  const configPath = resolve(join(dir, CONFIG_FILE));

  if (!existsSync(configPath)) return null;

  let raw: string;
  try {
    raw = readFileSync(configPath, "utf-8");
  } catch (err) {
    logger.warn(`Warning: could not read ${CONFIG_FILE} — ${errorMessage(err)}. Using defaults.`);
    return { ...DEFAULT_CONFIG };
  }

  let parsed: unknown;
  try {
    parsed = yaml.load(raw);
  } catch (err) {
    logger.warn(`Warning: could not parse ${CONFIG_FILE} — ${errorMessage(err)}. Using defaults.`);
    return { ...DEFAULT_CONFIG };
  }

  if (!parsed || typeof parsed !== "object") return { ...DEFAULT_CONFIG };

  const result = grnaConfigSchema.safeParse(parsed);
  if (!result.success) {
    for (const issue of result.error.issues) {
      logger.warn(`Warning: config validation error — ${issue.path.join(".")}: ${issue.message}`);
    }
    return { ...DEFAULT_CONFIG };
  }

  const data = result.data;

  const known = new Set<string>(KNOWN_KEYS);
  for (const key of Object.keys(data)) {
    if (known.has(key)) continue;
    const suggestion = didYouMean(key, KNOWN_KEYS);
    const hint = suggestion ? ` — did you mean '${suggestion}'?` : "";
    logger.warn(`Warning: unknown config key '${key}'${hint}`);
  }

  return {
    guide_length: data.guide_length ?? DEFAULT_CONFIG.guide_length,
    max_display: data.max_display ?? DEFAULT_CONFIG.max_display,
    format: data.format ?? DEFAULT_CONFIG.format,
  };
}
