import type { ErrorKind } from "../domain/errors";
import type {
  ClipFailure,
  HighlightOutcome,
  Platform,
  Reel,
  RunReport,
  SelectedHighlight,
  StageOutcome
} from "../domain/types";

interface HighlightEntry {
  highlight: SelectedHighlight;
  reels: Reel[];
  failures: ClipFailure[];
  finished: boolean;
}

/**
 * Append-only sink for stage and per-highlight outcomes. Workers only ever
 * append to their own highlight's entry.
 */
export class ResultCollector {
  private readonly stages: StageOutcome[] = [];
  private readonly entries = new Map<string, HighlightEntry>();
  private selected: SelectedHighlight[] = [];
  private discardedCandidates = 0;

  constructor(
    private readonly runId: string,
    private readonly input: string,
    private readonly platformOrder: Platform[],
    private readonly startedAt: number = Date.now()
  ) {}

  recordStage(outcome: StageOutcome) {
    this.stages.push(outcome);
  }

  recordSelection(selected: SelectedHighlight[], discardedCandidates: number) {
    this.selected = [...selected];
    this.discardedCandidates = discardedCandidates;
    for (const highlight of selected) {
      this.entries.set(highlight.id, { highlight, reels: [], failures: [], finished: false });
    }
  }

  recordReel(highlightId: string, reel: Reel) {
    this.entry(highlightId).reels.push(reel);
  }

  recordFailure(failure: ClipFailure) {
    this.entry(failure.highlightId).failures.push(failure);
  }

  markFinished(highlightId: string) {
    this.entry(highlightId).finished = true;
  }

  build(state: RunReport["state"], error: { kind: ErrorKind; stage: string | null; message: string } | null, now = Date.now()): RunReport {
    const highlights = [...this.entries.values()]
      .sort((a, b) => a.highlight.rank - b.highlight.rank)
      .map((entry) => this.toOutcome(entry));
    const reels = highlights.flatMap((outcome) => [...outcome.reels].sort((a, b) => this.platformIndex(a) - this.platformIndex(b)));
    const failures = highlights.flatMap((outcome) => outcome.failures);
    const averageViralityScore = reels.length
      ? reels.reduce((acc, reel) => acc + reel.viralityScore, 0) / reels.length
      : 0;

    return {
      runId: this.runId,
      state,
      input: this.input,
      reels,
      highlights,
      failures,
      stages: [...this.stages],
      selected: [...this.selected],
      discardedCandidates: this.discardedCandidates,
      error,
      averageViralityScore,
      durationMs: now - this.startedAt
    };
  }

  private toOutcome(entry: HighlightEntry): HighlightOutcome {
    let status: HighlightOutcome["status"];
    if (!entry.reels.length) {
      status = "failed";
    } else if (entry.failures.length || !entry.finished) {
      status = "partial";
    } else {
      status = "succeeded";
    }
    return {
      highlightId: entry.highlight.id,
      rank: entry.highlight.rank,
      status,
      reels: [...entry.reels],
      failures: [...entry.failures]
    };
  }

  private platformIndex(reel: Reel) {
    const index = this.platformOrder.indexOf(reel.platform);
    return index === -1 ? this.platformOrder.length : index;
  }

  private entry(highlightId: string) {
    const entry = this.entries.get(highlightId);
    if (!entry) {
      throw new Error(`Unknown highlight ${highlightId}.`);
    }
    return entry;
  }
}
