import {
  DEFAULT_MAX_DISPLAY,
  DesignReportSchema,
  MAX_SCORE,
  type GuideCandidate,
  type OutputFormat,
} from "@grna-designer/engine";

const RULE_WIDTH = 80;
export const HEAVY_RULE = "=".repeat(RULE_WIDTH);
const LIGHT_RULE = "-".repeat(RULE_WIDTH);

export const NO_CANDIDATES = "No suitable gRNA candidates found.";

export interface FormatOptions {
  format: OutputFormat;
  /** Candidates listed by the text report; JSON always carries all of them. */
  maxDisplay?: number;
}

export function formatReport(
  candidates: readonly GuideCandidate[],
  options: FormatOptions,
): string {
  switch (options.format) {
    case "json":
      return formatJson(candidates);
    case "text":
    default:
      return formatText(candidates, options.maxDisplay ?? DEFAULT_MAX_DISPLAY);
  }
}

function formatJson(candidates: readonly GuideCandidate[]): string {
  const report = DesignReportSchema.parse({
    count: candidates.length,
    candidates: candidates.map((c) => ({ ...c, warnings: [...c.warnings] })),
  });
  return JSON.stringify(report, null, 2) + "\n";
}

function strand(sequence: string): string {
  return `5'-${sequence}-3'`;
}

function formatText(candidates: readonly GuideCandidate[], maxDisplay: number): string {
  if (candidates.length === 0) return `${NO_CANDIDATES}\n`;

  const lines: string[] = [];

  lines.push("");
  lines.push(`Found ${candidates.length} gRNA candidate(s)`);
  lines.push("");
  lines.push(HEAVY_RULE);

  candidates.slice(0, maxDisplay).forEach((candidate, i) => {
    lines.push("");
    lines.push(`Candidate #${i + 1}`);
    lines.push(LIGHT_RULE);
    lines.push(`gRNA Sequence:  ${strand(candidate.sequence)}`);
    lines.push(`PAM:            ${candidate.pam}`);
    lines.push(`Position:       ${candidate.position}`);
    lines.push(`GC Content:     ${candidate.gcContent.toFixed(1)}%`);
    lines.push(`Quality Score:  ${candidate.score}/${MAX_SCORE}`);
    lines.push(
      candidate.warnings.length > 0
        ? `Warnings:       ${candidate.warnings.join(", ")}`
        : "Warnings:       None (Good candidate!)",
    );
  });

  lines.push("");
  lines.push(HEAVY_RULE);
  lines.push("");
  lines.push(`Top candidate: ${strand(candidates[0].sequence)}`);
  lines.push("Recommended for experimental validation.");

  return lines.join("\n") + "\n";
}
