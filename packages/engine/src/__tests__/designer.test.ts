import { describe, it, expect } from "vitest";
import { designGuides, rankCandidates } from "../designer.js";
import type { GuideCandidate } from "../schemas.js";
import { WARNINGS } from "../scorer.js";

const A20 = "A".repeat(20);
const BALANCED = "ATGCATGCATGCATGCATGC";

function makeCandidate(position: number, score: number): GuideCandidate {
  return {
    sequence: BALANCED,
    pam: "AGG",
    position,
    gcContent: 50,
    score,
    warnings: [],
  };
}

describe("designGuides", () => {
  it("extracts the single guide upstream of a PAM", () => {
    const candidates = designGuides(`${A20}AGGCCCC`);

    expect(candidates).toEqual([
      {
        sequence: A20,
        pam: "AGG",
        position: 0,
        gcContent: 0,
        score: 0,
        warnings: [WARNINGS.gcOutOfRange, WARNINGS.homopolymer],
      },
    ]);
  });

  it("upper-cases the target before scanning", () => {
    const [candidate] = designGuides("atgcatgcatgcatgcatgcagg");
    expect(candidate.sequence).toBe(BALANCED);
    expect(candidate.pam).toBe("AGG");
    expect(candidate.score).toBe(5);
  });

  it("ranks candidates best first", () => {
    const candidates = designGuides(`${A20}TGG${BALANCED}CGG`);

    expect(candidates.map((c) => [c.position, c.pam, c.score])).toEqual([
      [23, "CGG", 5],
      [0, "TGG", 0],
    ]);
  });

  it("keeps position order for equal scores", () => {
    const candidates = designGuides("ACGTAAGGTCAGG", 5);

    expect(candidates.map((c) => [c.sequence, c.position, c.gcContent, c.score])).toEqual([
      ["ACGTA", 0, 40, 5],
      ["AGGTC", 5, 60, 5],
    ]);
  });

  it("skips PAM sites without enough upstream sequence", () => {
    expect(designGuides("ACGTAAGGTCAGG")).toEqual([]);
    expect(designGuides("AGGATGCATGCATGC")).toEqual([]);
  });

  it("never returns a negative start or a guide of the wrong length", () => {
    const target = "GGATCCGGTTAGGCATGGGACCTGGAAGGCTAGGTTTTGGCAGGGCCGG";
    for (const length of [1, 3, 5, 8, 12, 20]) {
      for (const c of designGuides(target, length)) {
        expect(c.position).toBeGreaterThanOrEqual(0);
        expect(c.sequence).toHaveLength(length);
        expect(target.slice(c.position, c.position + length)).toBe(c.sequence);
        expect(target.slice(c.position + length + 1, c.position + length + 3)).toBe("GG");
      }
    }
  });

  it("returns an empty list for empty or non-DNA input", () => {
    expect(designGuides("")).toEqual([]);
    expect(designGuides("hello world")).toEqual([]);
  });

  it("rejects a non-positive or fractional guide length", () => {
    expect(() => designGuides(BALANCED, 0)).toThrow();
    expect(() => designGuides(BALANCED, -4)).toThrow();
    expect(() => designGuides(BALANCED, 2.5)).toThrow();
  });

  it("returns frozen candidates", () => {
    const [candidate] = designGuides(`${A20}AGG`);
    expect(Object.isFrozen(candidate)).toBe(true);
    expect(Object.isFrozen(candidate.warnings)).toBe(true);
  });
});

describe("rankCandidates", () => {
  it("sorts by score descending and keeps ties in input order", () => {
    const ranked = rankCandidates([
      makeCandidate(0, 2),
      makeCandidate(1, 5),
      makeCandidate(2, 2),
      makeCandidate(3, 5),
    ]);
    expect(ranked.map((c) => c.position)).toEqual([1, 3, 0, 2]);
  });

  it("is idempotent", () => {
    const once = rankCandidates([
      makeCandidate(0, -1),
      makeCandidate(1, 3),
      makeCandidate(2, 3),
      makeCandidate(3, 0),
    ]);
    expect(rankCandidates(once)).toEqual(once);
  });

  it("does not mutate its input", () => {
    const input = [makeCandidate(0, 1), makeCandidate(1, 4)];
    rankCandidates(input);
    expect(input.map((c) => c.position)).toEqual([0, 1]);
  });
});
