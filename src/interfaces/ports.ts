import type {
  AudioTrack,
  Clip,
  HighlightCandidate,
  Platform,
  PlatformSpec,
  RunOptions,
  SourceVideo,
  SpeedFactor,
  SubtitleTrack,
  Transcript,
  TranscriptSegment
} from "../domain/types";

/** Passed to every collaborator call; `signal` aborts when the attempt times out or the run is cancelled. */
export interface CallContext {
  runId: string;
  signal: AbortSignal;
}

export interface VideoSourcePort {
  load(uriOrPath: string, context: CallContext): Promise<SourceVideo>;
}

export interface AudioExtractorPort {
  extract(video: SourceVideo, speedFactor: SpeedFactor, context: CallContext & { outputDir: string }): Promise<AudioTrack>;
}

export interface TranscriberPort {
  /** Returns segments in the audio track's own time base. */
  transcribe(audio: AudioTrack, context: CallContext & { language: string }): Promise<Transcript>;
}

export interface HighlightDetectorPort {
  detect(
    transcript: Transcript,
    context: CallContext & {
      maxHighlights: number;
      minDurationSeconds: number;
      maxDurationSeconds: number;
      focusSpeaker?: string;
    }
  ): Promise<HighlightCandidate[]>;
}

export interface ClipExtractorPort {
  cut(
    video: SourceVideo,
    startSeconds: number,
    endSeconds: number,
    context: CallContext & { clipId: string; selectedHighlightId: string; outputPath: string }
  ): Promise<Clip>;
}

export interface SubtitleGeneratorPort {
  /** Segments arrive already re-based to the clip's local time. */
  generate(segments: TranscriptSegment[], context: CallContext & { clipId: string; outputPath: string }): Promise<SubtitleTrack>;
}

export interface SubtitleBurnerPort {
  burn(clip: Clip, track: SubtitleTrack, context: CallContext & { outputPath: string }): Promise<Clip>;
}

export interface ExportedFile {
  path: string;
  durationSeconds: number;
  platform: Platform;
}

export interface PlatformExporterPort {
  export(clip: Clip, spec: PlatformSpec, context: CallContext & { outputPath: string }): Promise<ExportedFile>;
}

export interface ArtifactScope {
  dir: string;
  file(name: string): string;
  release(): Promise<void>;
}

export interface RunWorkspace {
  dir: string;
  outputDir: string;
  scope(name: string): Promise<ArtifactScope>;
  release(): Promise<void>;
}

export interface StoragePort {
  createRunWorkspace(runId: string, options: { retainArtifacts: boolean }): Promise<RunWorkspace>;
}

export interface JobQueuePort {
  enqueueRun(options: { runId: string; request: RunOptions }): Promise<void>;
}

export interface LoggerPort {
  info(runId: string, message: string): Promise<void>;
  warn(runId: string, message: string): Promise<void>;
  error(runId: string, message: string): Promise<void>;
}
