import type { HighlightCandidate, Transcript, TranscriptSegment } from "../domain/types";

export interface WindowOptions {
  minDurationSeconds: number;
  maxDurationSeconds: number;
  /** Windows where this speaker talks rank ahead of the rest. */
  focusSpeaker?: string;
}

/**
 * Every run of consecutive segments whose span fits the duration bounds,
 * starting at each segment boundary.
 */
export function buildTranscriptWindows(transcript: Transcript, options: WindowOptions) {
  const windows: { startSeconds: number; endSeconds: number; segments: TranscriptSegment[] }[] = [];
  const segments = transcript.segments;
  for (let cursor = 0; cursor < segments.length; cursor += 1) {
    const start = segments[cursor].startSeconds;
    for (let idx = cursor; idx < segments.length; idx += 1) {
      const end = segments[idx].endSeconds;
      if (end - start > options.maxDurationSeconds) {
        break;
      }
      if (end - start >= options.minDurationSeconds) {
        windows.push({ startSeconds: start, endSeconds: end, segments: segments.slice(cursor, idx + 1) });
      }
    }
  }
  return windows;
}

/** Scores a window on a 1-10 scale from word density, keyword hits and exclamations. */
export function scoreWindow(segments: TranscriptSegment[], durationSeconds: number) {
  const text = segments.map((segment) => segment.text).join(" ");
  const words = tokenize(text);
  const density = words.length / Math.max(1, durationSeconds);
  const keywords = keywordHits(words);
  const excitement = excitementScore(text);
  const raw = Math.min(1, density / 3) * 0.5 + Math.min(1, keywords / 6) * 0.3 + Math.min(1, excitement / 3) * 0.2;
  return Math.round((1 + raw * 9) * 10) / 10;
}

export function rankWindows(transcript: Transcript, options: WindowOptions, limit: number): HighlightCandidate[] {
  const scored = buildTranscriptWindows(transcript, options).map((window) => {
    const duration = window.endSeconds - window.startSeconds;
    const keyword = pickKeyword(window.segments);
    return {
      focused: options.focusSpeaker ? window.segments.some((segment) => segment.speaker === options.focusSpeaker) : false,
      startSeconds: window.startSeconds,
      endSeconds: window.endSeconds,
      viralityScore: scoreWindow(window.segments, duration),
      title: window.segments[0]?.text.slice(0, 60) ?? "",
      rationale: keyword ? `keyword: ${keyword}` : "dense speech"
    };
  });
  return scored
    .sort((a, b) => Number(b.focused) - Number(a.focused) || b.viralityScore - a.viralityScore || a.startSeconds - b.startSeconds)
    .slice(0, Math.max(1, limit))
    .map(({ focused: _focused, ...candidate }) => candidate);
}

function pickKeyword(segments: TranscriptSegment[]) {
  const words = tokenize(segments.map((segment) => segment.text).join(" "));
  return words.find((word) => KEYWORDS.includes(word)) ?? null;
}

function tokenize(text: string) {
  return text
    .toLowerCase()
    .replace(/[^\p{L}\p{M}\p{N}\s]/gu, " ")
    .split(/\s+/)
    .filter(Boolean);
}

function keywordHits(words: string[]) {
  return words.filter((word) => KEYWORDS.includes(word)).length;
}

function excitementScore(text: string) {
  return (text.match(/[!?]/g) ?? []).length;
}

const KEYWORDS = [
  "secret",
  "important",
  "mistake",
  "story",
  "tip",
  "example",
  "trick",
  "wow",
  "incredible",
  "result",
  "never",
  "always",
  "סוד",
  "חשוב",
  "טעות",
  "סיפור",
  "טיפ",
  "דוגמה"
];
