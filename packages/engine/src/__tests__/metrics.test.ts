import { describe, it, expect } from "vitest";
import { gcContent, hasHomopolymer } from "../metrics.js";

describe("gcContent", () => {
  it("returns 0 for an empty sequence", () => {
    expect(gcContent("")).toBe(0);
  });

  it("returns 100 for all-GC and 0 for all-AT", () => {
    expect(gcContent("GCGC")).toBe(100);
    expect(gcContent("ATAT")).toBe(0);
  });

  it("computes exact band edges for a 20-mer", () => {
    expect(gcContent("GGGGGGGGAAAAAAAAAAAA")).toBe(40);
    expect(gcContent("GGGGGGGGGGGGAAAAAAAA")).toBe(60);
    expect(gcContent("CCCCCCCCCCCCCCAAAAAA")).toBe(70);
  });

  it("counts non-ACGT characters in the length only", () => {
    expect(gcContent("GNNN")).toBe(25);
  });

  it("stays within [0, 100]", () => {
    for (const seq of ["A", "G", "ATGCN", "NNNN", "GGGCCCAT"]) {
      const gc = gcContent(seq);
      expect(gc).toBeGreaterThanOrEqual(0);
      expect(gc).toBeLessThanOrEqual(100);
    }
  });
});

describe("hasHomopolymer", () => {
  it("detects a run of four", () => {
    expect(hasHomopolymer("AAAAT")).toBe(true);
  });

  it("detects runs longer than the threshold", () => {
    expect(hasHomopolymer("CGGGGGGA")).toBe(true);
  });

  it("ignores shorter runs", () => {
    expect(hasHomopolymer("ATGC")).toBe(false);
    expect(hasHomopolymer("AAATTTGGGCCC")).toBe(false);
  });

  it("honours a custom run length", () => {
    expect(hasHomopolymer("AAATTTGGGCCC", 3)).toBe(true);
    expect(hasHomopolymer("AAAAT", 5)).toBe(false);
  });

  it("never counts non-canonical characters as a run", () => {
    expect(hasHomopolymer("NNNNNN")).toBe(false);
    expect(hasHomopolymer("aaaa")).toBe(false);
  });
});
