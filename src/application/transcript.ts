import type { Transcript, TranscriptSegment } from "../domain/types";

/**
 * Maps segment times from a sped-up audio track back to original-speed time
 * and restores start order.
 */
export function rescaleTranscript(transcript: Transcript, speedFactor: number): Transcript {
  const segments = transcript.segments
    .map((segment) => ({
      ...segment,
      startSeconds: segment.startSeconds * speedFactor,
      endSeconds: segment.endSeconds * speedFactor
    }))
    .sort((a, b) => a.startSeconds - b.startSeconds);
  return { language: transcript.language, segments };
}

/** Segments overlapping [start, end), re-based so that `start` becomes 0 and clamped to the clip. */
export function sliceTranscript(transcript: Transcript, start: number, end: number): TranscriptSegment[] {
  const length = Math.max(0, end - start);
  return transcript.segments
    .filter((segment) => segment.endSeconds > start && segment.startSeconds < end)
    .map((segment) => ({
      ...segment,
      startSeconds: Math.max(0, segment.startSeconds - start),
      endSeconds: Math.min(length, segment.endSeconds - start)
    }));
}
