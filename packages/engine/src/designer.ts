/**
 * Guide design pipeline: scan → extract → score → rank.
 */

import { logger } from "./logger.js";
import { gcContent } from "./metrics.js";
import { findPamSites, PAM_LENGTH } from "./pam.js";
import { DEFAULT_GUIDE_LENGTH, GuideLengthSchema, type GuideCandidate } from "./schemas.js";
import { evaluateGuide } from "./scorer.js";

/**
 * Stable sort by score, best first. Equal scores keep their input order,
 * which for designer output is ascending position.
 */
export function rankCandidates(candidates: readonly GuideCandidate[]): GuideCandidate[] {
  return [...candidates].sort((a, b) => b.score - a.score);
}

/**
 * Design guides against every NGG site in `target` that has `guideLength`
 * bases of upstream sequence. Throws a ZodError when `guideLength` is not a
 * positive integer; sequence content itself is never rejected.
 */
export function designGuides(
  target: string,
  guideLength: number = DEFAULT_GUIDE_LENGTH,
): GuideCandidate[] {
  const length = GuideLengthSchema.parse(guideLength);
  const sequence = target.toUpperCase();
  const sites = findPamSites(sequence);

  logger.debug(`Found ${sites.length} PAM site(s) in ${sequence.length} bp`);

  const candidates: GuideCandidate[] = [];

  for (const pamPos of sites) {
    const start = pamPos - length;
    if (start < 0) {
      logger.debug(`Skipping PAM at ${pamPos}: only ${pamPos} bp upstream`);
      continue;
    }

    const guide = sequence.slice(start, pamPos);
    if (guide.length !== length) continue;

    const { score, warnings } = evaluateGuide(guide);

    candidates.push(
      Object.freeze({
        sequence: guide,
        pam: sequence.slice(pamPos, pamPos + PAM_LENGTH),
        position: start,
        gcContent: gcContent(guide),
        score,
        warnings: Object.freeze(warnings),
      }),
    );
  }

  return rankCandidates(candidates);
}
