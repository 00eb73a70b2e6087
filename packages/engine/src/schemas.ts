import { z } from "zod";

export const DEFAULT_GUIDE_LENGTH = 20;
export const DEFAULT_MAX_DISPLAY = 10;

export const GuideLengthSchema = z.number().int().positive();

export const OutputFormatSchema = z.enum(["text", "json"]);

export type OutputFormat = z.infer<typeof OutputFormatSchema>;

export const GuideCandidateSchema = z.object({
  sequence: z.string(),
  pam: z.string().length(3),
  position: z.number().int().nonnegative(),
  gcContent: z.number().min(0).max(100),
  score: z.number().int(),
  warnings: z.array(z.string()),
});

export type GuideCandidate = Readonly<
  Omit<z.infer<typeof GuideCandidateSchema>, "warnings"> & { warnings: readonly string[] }
>;

export const DesignReportSchema = z.object({
  count: z.number().int().nonnegative(),
  candidates: z.array(GuideCandidateSchema),
});

export type DesignReport = z.infer<typeof DesignReportSchema>;
