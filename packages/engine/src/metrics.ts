const CANONICAL_BASES = ["A", "T", "G", "C"] as const;

/** Percentage (0-100) of G and C bases. An empty sequence has 0% GC. */
export function gcContent(sequence: string): number {
  if (sequence.length === 0) return 0;

  let gc = 0;
  for (const base of sequence) {
    if (base === "G" || base === "C") gc++;
  }
  return (100 * gc) / sequence.length;
}

/**
 * True when any canonical base repeats at least `maxRun` times in a row.
 * Non-ACGT characters never form a run.
 */
export function hasHomopolymer(sequence: string, maxRun = 4): boolean {
  return CANONICAL_BASES.some((base) => sequence.includes(base.repeat(maxRun)));
}
