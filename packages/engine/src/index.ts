// ---------------------------------------------------------------------------
// @grna-designer/engine
//
// NGG PAM scanning, sequence metrics and heuristic gRNA scoring.
// ---------------------------------------------------------------------------

// Pipeline
export { findPamSites, PAM_LENGTH } from "./pam.js";
export { gcContent, hasHomopolymer } from "./metrics.js";
export {
  evaluateGuide,
  MAX_SCORE,
  HOMOPOLYMER_RUN,
  POL_III_TERMINATOR,
  WARNINGS,
  type GuideEvaluation,
} from "./scorer.js";
export { designGuides, rankCandidates } from "./designer.js";

// Schemas
export {
  DEFAULT_GUIDE_LENGTH,
  DEFAULT_MAX_DISPLAY,
  GuideLengthSchema,
  OutputFormatSchema,
  GuideCandidateSchema,
  DesignReportSchema,
  type GuideCandidate,
  type DesignReport,
  type OutputFormat,
} from "./schemas.js";

// Config
export {
  loadConfig,
  didYouMean,
  CONFIG_FILE,
  DEFAULT_CONFIG,
  type GrnaConfig,
} from "./config.js";

// Logging
export { logger, parseLevel } from "./logger.js";
