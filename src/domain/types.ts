import type { ErrorKind } from "./errors";

export const PLATFORMS = ["instagram", "tiktok", "youtube_shorts"] as const;
export type Platform = (typeof PLATFORMS)[number];

export type SpeedFactor = 1 | 2;

export type RunState =
  | "created"
  | "ingesting"
  | "extracting_audio"
  | "transcribing"
  | "detecting_highlights"
  | "selecting"
  | "processing"
  | "completed"
  | "aborted";

/** Forward order of a successful run. */
export const RUN_STATE_ORDER: readonly RunState[] = [
  "created",
  "ingesting",
  "extracting_audio",
  "transcribing",
  "detecting_highlights",
  "selecting",
  "processing",
  "completed"
];

export type GlobalStage = "ingest" | "extract_audio" | "transcribe" | "detect" | "select";
export type ClipStage = "extract" | "subtitles" | "burn" | "export" | "dispatch";

export interface SourceVideo {
  id: string;
  uri: string;
  filePath: string;
  durationSeconds: number;
  title?: string | null;
}

export interface AudioTrack {
  sourceVideoId: string;
  sampleRate: number;
  channels: number;
  speedFactor: SpeedFactor;
  path: string;
}

export interface TranscriptSegment {
  startSeconds: number;
  endSeconds: number;
  text: string;
  confidence: number | null;
  speaker?: string | null;
}

export interface Transcript {
  language: string;
  segments: TranscriptSegment[];
}

export interface HighlightCandidate {
  startSeconds: number;
  endSeconds: number;
  viralityScore: number;
  title: string;
  rationale: string;
}

export interface SelectedHighlight extends HighlightCandidate {
  id: string;
  rank: number;
}

export interface Clip {
  id: string;
  selectedHighlightId: string;
  path: string;
  startSeconds: number;
  endSeconds: number;
  durationSeconds: number;
}

export interface SubtitleCue {
  startSeconds: number;
  endSeconds: number;
  text: string;
}

export interface SubtitleTrack {
  clipId: string;
  path: string;
  cues: SubtitleCue[];
}

export interface Reel {
  path: string;
  durationSeconds: number;
  viralityScore: number;
  platform: Platform;
  highlightId: string;
  rank: number;
  title: string;
}

export interface PlatformSpec {
  platform: Platform;
  maxDurationSeconds: number;
  width: number;
  height: number;
  videoCodec: string;
  audioCodec: string;
  maxFileSizeMb: number;
}

export interface RunOptions {
  input: string;
  maxReels: number;
  speedUpAudio: boolean;
  targetPlatforms: Platform[];
  minDurationSeconds: number;
  maxDurationSeconds: number;
  paddingBeforeSeconds: number;
  paddingAfterSeconds: number;
  language: string;
  workerCount: number;
  retainArtifacts: boolean;
  /** Speaker label the detectors should favour, as it appears in the transcript. */
  focusSpeaker?: string;
}

export interface StageOutcome {
  stage: GlobalStage;
  status: "succeeded" | "failed";
  attempts: number;
  durationMs: number;
  error?: string | null;
}

export interface ClipFailure {
  highlightId: string;
  stage: ClipStage;
  platform: Platform | null;
  kind: ErrorKind;
  message: string;
  attempts: number;
}

export interface HighlightOutcome {
  highlightId: string;
  rank: number;
  status: "succeeded" | "partial" | "failed";
  reels: Reel[];
  failures: ClipFailure[];
}

export interface RunReport {
  runId: string;
  state: "completed" | "aborted";
  input: string;
  reels: Reel[];
  highlights: HighlightOutcome[];
  failures: ClipFailure[];
  stages: StageOutcome[];
  selected: SelectedHighlight[];
  discardedCandidates: number;
  error: { kind: ErrorKind; stage: string | null; message: string } | null;
  averageViralityScore: number;
  durationMs: number;
}
