import type { HighlightCandidate, Transcript } from "../../domain/types";
import type { CallContext, HighlightDetectorPort } from "../../interfaces/ports";
import { rankWindows } from "../../application/highlightScoring";

/** Offline detector: scores transcript windows without calling a model. */
export class TranscriptHighlightDetector implements HighlightDetectorPort {
  constructor(private readonly candidatesPerReel = 4) {}

  async detect(
    transcript: Transcript,
    context: CallContext & { maxHighlights: number; minDurationSeconds: number; maxDurationSeconds: number; focusSpeaker?: string }
  ): Promise<HighlightCandidate[]> {
    return rankWindows(
      transcript,
      {
        minDurationSeconds: context.minDurationSeconds,
        maxDurationSeconds: context.maxDurationSeconds,
        focusSpeaker: context.focusSpeaker
      },
      context.maxHighlights * this.candidatesPerReel
    );
  }
}
