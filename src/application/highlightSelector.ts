import { ConfigurationError, MalformedCandidateError } from "../domain/errors";
import type { HighlightCandidate, SelectedHighlight } from "../domain/types";

export interface SelectionBounds {
  maxReels: number;
  minDurationSeconds: number;
  maxDurationSeconds: number;
  sourceDurationSeconds: number;
}

export type DiscardedCandidate =
  | { candidate: HighlightCandidate; reason: "malformed"; error: MalformedCandidateError }
  | { candidate: HighlightCandidate; reason: "too-short"; durationSeconds: number };

export interface SelectionResult {
  /** Ordered by rank: highest virality first. */
  selected: SelectedHighlight[];
  discarded: DiscardedCandidate[];
  totalScore: number;
}

const EPSILON = 1e-9;

export function selectHighlights(candidates: HighlightCandidate[], bounds: SelectionBounds): SelectionResult {
  assertBounds(bounds);
  const { eligible, discarded } = preprocessCandidates(candidates, bounds);
  if (!eligible.length) {
    return { selected: [], discarded, totalScore: 0 };
  }

  const sorted = [...eligible].sort(compareByEnd);
  const chosen = scheduleWeighted(sorted, bounds.maxReels);
  const selected = rankHighlights(chosen);
  const totalScore = selected.reduce((acc, highlight) => acc + highlight.viralityScore, 0);
  return { selected, discarded, totalScore };
}

/**
 * Rejects malformed candidates, truncates long ones to `maxDurationSeconds`
 * from their original start and drops those shorter than `minDurationSeconds`.
 */
export function preprocessCandidates(candidates: HighlightCandidate[], bounds: SelectionBounds) {
  const eligible: HighlightCandidate[] = [];
  const discarded: DiscardedCandidate[] = [];

  for (const candidate of candidates) {
    const problem = findMalformation(candidate, bounds.sourceDurationSeconds);
    if (problem) {
      discarded.push({ candidate, reason: "malformed", error: new MalformedCandidateError(candidate, problem) });
      continue;
    }

    const duration = candidate.endSeconds - candidate.startSeconds;
    if (duration < bounds.minDurationSeconds) {
      discarded.push({ candidate, reason: "too-short", durationSeconds: duration });
      continue;
    }

    if (duration > bounds.maxDurationSeconds) {
      eligible.push({ ...candidate, endSeconds: candidate.startSeconds + bounds.maxDurationSeconds });
    } else {
      eligible.push(candidate);
    }
  }

  return { eligible, discarded };
}

export function intervalsCompatible(a: HighlightCandidate, b: HighlightCandidate) {
  return a.endSeconds <= b.startSeconds || b.endSeconds <= a.startSeconds;
}

function assertBounds(bounds: SelectionBounds) {
  if (!Number.isInteger(bounds.maxReels) || bounds.maxReels <= 0) {
    throw new ConfigurationError(`maxReels must be a positive integer (got ${bounds.maxReels}).`);
  }
  if (!(bounds.minDurationSeconds >= 0) || !(bounds.maxDurationSeconds >= bounds.minDurationSeconds)) {
    throw new ConfigurationError(
      `Invalid duration bounds [${bounds.minDurationSeconds}, ${bounds.maxDurationSeconds}].`
    );
  }
}

function findMalformation(candidate: HighlightCandidate, sourceDuration: number) {
  const { startSeconds, endSeconds, viralityScore } = candidate;
  if (!Number.isFinite(startSeconds) || !Number.isFinite(endSeconds)) {
    return "timestamps are not finite numbers";
  }
  if (!Number.isFinite(viralityScore)) {
    return "virality score is not a finite number";
  }
  if (startSeconds >= endSeconds) {
    return "start is not before end";
  }
  if (startSeconds < 0 || endSeconds > sourceDuration) {
    return `outside the source range [0, ${sourceDuration}]`;
  }
  return null;
}

function compareByEnd(a: HighlightCandidate, b: HighlightCandidate) {
  return a.endSeconds - b.endSeconds || b.viralityScore - a.viralityScore || a.startSeconds - b.startSeconds;
}

/** Score, then sum of starts, then clip count; additive, compared lexicographically. */
interface Plan {
  score: number;
  startSum: number;
  count: number;
}

const EMPTY_PLAN: Plan = { score: 0, startSum: 0, count: 0 };

function isBetter(a: Plan, b: Plan) {
  if (Math.abs(a.score - b.score) > EPSILON) {
    return a.score > b.score;
  }
  if (Math.abs(a.startSum - b.startSum) > EPSILON) {
    return a.startSum < b.startSum;
  }
  return a.count < b.count;
}

/**
 * Weighted interval scheduling capped at `maxReels` picks.
 * best[i][k]: best plan over the first i intervals with at most k picks.
 */
function scheduleWeighted(sorted: HighlightCandidate[], maxReels: number) {
  const n = sorted.length;
  const cap = Math.min(maxReels, n);
  const predecessors = sorted.map((candidate, index) => latestCompatible(sorted, index, candidate.startSeconds));

  const best: Plan[][] = [Array.from({ length: cap + 1 }, () => EMPTY_PLAN)];
  const took: boolean[][] = [Array.from({ length: cap + 1 }, () => false)];

  for (let i = 1; i <= n; i += 1) {
    const candidate = sorted[i - 1];
    const previous = predecessors[i - 1];
    const row: Plan[] = [EMPTY_PLAN];
    const tookRow: boolean[] = [false];
    for (let k = 1; k <= cap; k += 1) {
      const skip = best[i - 1][k];
      const base = best[previous][k - 1];
      const take: Plan = {
        score: base.score + candidate.viralityScore,
        startSum: base.startSum + candidate.startSeconds,
        count: base.count + 1
      };
      const useTake = isBetter(take, skip);
      row.push(useTake ? take : skip);
      tookRow.push(useTake);
    }
    best.push(row);
    took.push(tookRow);
  }

  const chosen: HighlightCandidate[] = [];
  let i = n;
  let k = cap;
  while (i > 0 && k > 0) {
    if (took[i][k]) {
      chosen.push(sorted[i - 1]);
      i = predecessors[i - 1];
      k -= 1;
    } else {
      i -= 1;
    }
  }
  return chosen.reverse();
}

/** Number of leading intervals (in end order) that end at or before `start`. */
function latestCompatible(sorted: HighlightCandidate[], index: number, start: number) {
  let low = 0;
  let high = index;
  while (low < high) {
    const mid = (low + high) >> 1;
    if (sorted[mid].endSeconds <= start) {
      low = mid + 1;
    } else {
      high = mid;
    }
  }
  return low;
}

function rankHighlights(chosen: HighlightCandidate[]): SelectedHighlight[] {
  return [...chosen]
    .sort((a, b) => b.viralityScore - a.viralityScore || a.startSeconds - b.startSeconds)
    .map((candidate, rank) => ({ ...candidate, id: `highlight-${rank}`, rank }));
}
