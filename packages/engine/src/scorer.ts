/**
 * Heuristic guide quality score.
 *
 * Three independent rules are summed, so a guide with a TTTT stretch is
 * penalised both as a homopolymer and as a Pol III terminator.
 *
 *   GC 40-60%          +3
 *   GC 30-70%          +2  (suboptimal)
 *   otherwise          +1  (outside range)
 *   homopolymer run    -1  (else +2)
 *   TTTT               -2
 */

import { gcContent, hasHomopolymer } from "./metrics.js";

/** Display maximum for the quality score. Scores are never clamped to it. */
export const MAX_SCORE = 5;

export const HOMOPOLYMER_RUN = 4;
export const POL_III_TERMINATOR = "TTTT";

export const WARNINGS = {
  gcSuboptimal: "GC content suboptimal",
  gcOutOfRange: "GC content outside recommended range",
  homopolymer: "Contains homopolymer run (potential off-target risk)",
  terminator: "Contains TTTT (Pol III terminator)",
} as const;

export interface GuideEvaluation {
  score: number;
  warnings: string[];
}

export function evaluateGuide(sequence: string): GuideEvaluation {
  const gc = gcContent(sequence);
  const warnings: string[] = [];
  let score = 0;

  if (gc >= 40 && gc <= 60) {
    score += 3;
  } else if (gc >= 30 && gc <= 70) {
    score += 2;
    warnings.push(WARNINGS.gcSuboptimal);
  } else {
    score += 1;
    warnings.push(WARNINGS.gcOutOfRange);
  }

  if (hasHomopolymer(sequence, HOMOPOLYMER_RUN)) {
    score -= 1;
    warnings.push(WARNINGS.homopolymer);
  } else {
    score += 2;
  }

  if (sequence.includes(POL_III_TERMINATOR)) {
    score -= 2;
    warnings.push(WARNINGS.terminator);
  }

  return { score, warnings };
}
