import type { ClipStage, GlobalStage, HighlightCandidate, Platform } from "./types";

export type ErrorKind =
  | "configuration"
  | "invalid-input"
  | "not-found"
  | "download-failed"
  | "tool-failure"
  | "model-error"
  | "timeout"
  | "malformed-response"
  | "rate-limit"
  | "out-of-range"
  | "encoding-error"
  | "unsupported-spec"
  | "malformed-candidate"
  | "cancelled"
  | "unknown";

export class PipelineError extends Error {
  constructor(message: string, public readonly kind: ErrorKind, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "PipelineError";
  }
}

export class ConfigurationError extends PipelineError {
  constructor(message: string) {
    super(message, "configuration");
    this.name = "ConfigurationError";
  }
}

export class TimeoutError extends PipelineError {
  constructor(message: string) {
    super(message, "timeout");
    this.name = "TimeoutError";
  }
}

export class CancelledError extends PipelineError {
  constructor(message = "Run cancelled.") {
    super(message, "cancelled");
    this.name = "CancelledError";
  }
}

/**
 * A global stage that exhausted its retry budget. The kind is inherited from the
 * last attempt's error, which is kept as `cause`.
 */
export class StageError extends PipelineError {
  constructor(public readonly stage: GlobalStage, cause: PipelineError) {
    super(`Stage ${stage} failed: ${cause.message}`, cause.kind, { cause });
    this.name = "StageError";
  }
}

export class IngestError extends StageError {
  constructor(cause: PipelineError) {
    super("ingest", cause);
    this.name = "IngestError";
  }
}

export class AudioError extends StageError {
  constructor(cause: PipelineError) {
    super("extract_audio", cause);
    this.name = "AudioError";
  }
}

export class TranscriptionError extends StageError {
  constructor(cause: PipelineError) {
    super("transcribe", cause);
    this.name = "TranscriptionError";
  }
}

export class DetectionError extends StageError {
  constructor(cause: PipelineError) {
    super("detect", cause);
    this.name = "DetectionError";
  }
}

export class MalformedCandidateError extends PipelineError {
  constructor(public readonly candidate: HighlightCandidate, reason: string) {
    super(
      `Malformed candidate [${candidate.startSeconds}, ${candidate.endSeconds}]: ${reason}`,
      "malformed-candidate"
    );
    this.name = "MalformedCandidateError";
  }
}

export class ClipError extends PipelineError {
  constructor(
    public readonly highlightId: string,
    public readonly stage: ClipStage,
    public readonly platform: Platform | null,
    public readonly attempts: number,
    cause: PipelineError
  ) {
    super(`Highlight ${highlightId} failed at ${stage}: ${cause.message}`, cause.kind, { cause });
    this.name = "ClipError";
  }
}

export function formatError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function toPipelineError(error: unknown): PipelineError {
  if (error instanceof PipelineError) {
    return error;
  }
  return new PipelineError(formatError(error), "unknown", { cause: error });
}
