import { describe, expect, it } from "vitest";
import { ConfigurationError } from "../../src/domain/errors";
import type { HighlightCandidate } from "../../src/domain/types";
import { intervalsCompatible, preprocessCandidates, selectHighlights } from "../../src/application/highlightSelector";

const candidate = (startSeconds: number, endSeconds: number, viralityScore: number): HighlightCandidate => ({
  startSeconds,
  endSeconds,
  viralityScore,
  title: `${startSeconds}-${endSeconds}`,
  rationale: ""
});

const bounds = { maxReels: 2, minDurationSeconds: 30, maxDurationSeconds: 90, sourceDurationSeconds: 300 };

const span = (highlight: { startSeconds: number; endSeconds: number; viralityScore: number }) => [
  highlight.startSeconds,
  highlight.endSeconds,
  highlight.viralityScore
];

// Small deterministic PRNG so the exhaustive comparison is reproducible.
function mulberry32(seed: number) {
  let state = seed;
  return () => {
    state = (state + 0x6d2b79f5) | 0;
    let t = Math.imul(state ^ (state >>> 15), 1 | state);
    t = (t + Math.imul(t ^ (t >>> 7), 61 | t)) ^ t;
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

function bestByExhaustiveSearch(candidates: HighlightCandidate[], maxReels: number) {
  let best = 0;
  const total = 1 << candidates.length;
  for (let mask = 1; mask < total; mask += 1) {
    const picked = candidates.filter((_, index) => mask & (1 << index));
    if (picked.length > maxReels) {
      continue;
    }
    const compatible = picked.every((a, i) => picked.every((b, j) => i === j || intervalsCompatible(a, b)));
    if (compatible) {
      best = Math.max(best, picked.reduce((acc, item) => acc + item.viralityScore, 0));
    }
  }
  return best;
}

describe("highlight selection", () => {
  const scenario = [candidate(0, 40, 9), candidate(30, 70, 7), candidate(80, 120, 8), candidate(200, 240, 6)];

  it("picks the highest scoring compatible pair", () => {
    const result = selectHighlights(scenario, bounds);
    expect(result.selected.map(span)).toEqual([
      [0, 40, 9],
      [80, 120, 8]
    ]);
    expect(result.selected.map((highlight) => [highlight.id, highlight.rank])).toEqual([
      ["highlight-0", 0],
      ["highlight-1", 1]
    ]);
    expect(result.totalScore).toBe(17);
    expect(result.discarded).toEqual([]);
  });

  it("takes the single best interval when maxReels is 1", () => {
    const result = selectHighlights(scenario, { ...bounds, maxReels: 1 });
    expect(result.selected.map(span)).toEqual([[0, 40, 9]]);
    expect(result.totalScore).toBe(9);
  });

  it("discards candidates shorter than the minimum duration", () => {
    const result = selectHighlights([candidate(10, 15, 5)], bounds);
    expect(result.selected).toEqual([]);
    expect(result.totalScore).toBe(0);
    expect(result.discarded).toHaveLength(1);
    expect(result.discarded[0]).toMatchObject({ reason: "too-short", durationSeconds: 5 });
  });

  it("truncates long candidates from their original start", () => {
    const result = selectHighlights([candidate(10, 150, 8)], bounds);
    expect(result.selected.map(span)).toEqual([[10, 100, 8]]);
  });

  it("treats touching intervals as compatible", () => {
    const result = selectHighlights([candidate(0, 40, 5), candidate(40, 80, 5)], bounds);
    expect(result.selected.map(span)).toEqual([
      [0, 40, 5],
      [40, 80, 5]
    ]);
  });

  it("rejects malformed candidates and keeps the rest", () => {
    const malformed = [candidate(50, 40, 9), candidate(-5, 40, 9), candidate(250, 310, 9), candidate(0, 40, Number.NaN)];
    const result = selectHighlights([...malformed, candidate(100, 140, 4)], bounds);

    expect(result.selected.map(span)).toEqual([[100, 140, 4]]);
    expect(result.discarded.map((item) => item.reason)).toEqual(["malformed", "malformed", "malformed", "malformed"]);
    const first = result.discarded[0];
    expect(first.reason === "malformed" && first.error.kind).toBe("malformed-candidate");
    expect(first.reason === "malformed" && first.error.message).toBe("Malformed candidate [50, 40]: start is not before end");
  });

  it("prefers the earlier interval when scores tie", () => {
    const result = selectHighlights([candidate(40, 70, 5), candidate(0, 30, 5)], { ...bounds, maxReels: 1 });
    expect(result.selected.map(span)).toEqual([[0, 30, 5]]);
  });

  it("does not pad the selection with zero-score intervals", () => {
    const result = selectHighlights([candidate(0, 10, 0), candidate(10, 20, 10)], {
      maxReels: 2,
      minDurationSeconds: 1,
      maxDurationSeconds: 100,
      sourceDurationSeconds: 100
    });
    expect(result.selected.map(span)).toEqual([[10, 20, 10]]);
  });

  it("ranks by score and breaks rank ties by start", () => {
    const result = selectHighlights([candidate(100, 140, 6), candidate(0, 40, 6), candidate(200, 240, 8)], {
      ...bounds,
      maxReels: 3
    });
    expect(result.selected.map((highlight) => [highlight.startSeconds, highlight.rank])).toEqual([
      [200, 0],
      [0, 1],
      [100, 2]
    ]);
  });

  it("returns an empty selection for no candidates", () => {
    expect(selectHighlights([], bounds)).toEqual({ selected: [], discarded: [], totalScore: 0 });
  });

  it("rejects invalid bounds", () => {
    expect(() => selectHighlights(scenario, { ...bounds, maxReels: 0 })).toThrow(ConfigurationError);
    expect(() => selectHighlights(scenario, { ...bounds, minDurationSeconds: 100 })).toThrow(ConfigurationError);
  });

  it("is deterministic", () => {
    expect(selectHighlights(scenario, bounds)).toEqual(selectHighlights(scenario, bounds));
  });

  it("matches exhaustive search and keeps every invariant on random inputs", () => {
    const random = mulberry32(42);
    for (let round = 0; round < 200; round += 1) {
      const count = 1 + Math.floor(random() * 8);
      const maxReels = 1 + Math.floor(random() * 3);
      const input = Array.from({ length: count }, () => {
        const start = Math.floor(random() * 200);
        const duration = 10 + Math.floor(random() * 110);
        return candidate(start, start + duration, 1 + Math.floor(random() * 10));
      });
      const roundBounds = { ...bounds, maxReels };

      const result = selectHighlights(input, roundBounds);
      const { eligible } = preprocessCandidates(input, roundBounds);

      expect(result.totalScore).toBe(bestByExhaustiveSearch(eligible, maxReels));
      expect(result.selected.length).toBeLessThanOrEqual(maxReels);
      for (const highlight of result.selected) {
        const duration = highlight.endSeconds - highlight.startSeconds;
        expect(duration).toBeGreaterThanOrEqual(roundBounds.minDurationSeconds);
        expect(duration).toBeLessThanOrEqual(roundBounds.maxDurationSeconds);
      }
      for (const a of result.selected) {
        for (const b of result.selected) {
          if (a !== b) {
            expect(intervalsCompatible(a, b)).toBe(true);
          }
        }
      }
    }
  });
});
