import type { ErrorKind } from "../domain/errors";
import type { GlobalStage } from "../domain/types";

export interface RetryPolicy {
  maxAttempts: number;
  baseDelayMs: number;
  backoffMultiplier: number;
  retryableErrorKinds: readonly ErrorKind[];
  /** Bound on a single attempt; null leaves attempts unbounded. */
  attemptTimeoutMs: number | null;
}

export type RetryPolicies = Record<Exclude<GlobalStage, "select"> | "clip", RetryPolicy>;

export interface AttemptTimeouts {
  downloadMs: number;
  ffmpegMs: number;
  transcribeMs: number;
  detectMs: number;
}

export function buildRetryPolicies(timeouts: AttemptTimeouts): RetryPolicies {
  return {
    ingest: {
      maxAttempts: 3,
      baseDelayMs: 2000,
      backoffMultiplier: 2,
      retryableErrorKinds: ["download-failed", "timeout"],
      attemptTimeoutMs: timeouts.downloadMs
    },
    extract_audio: {
      maxAttempts: 2,
      baseDelayMs: 1000,
      backoffMultiplier: 2,
      retryableErrorKinds: ["tool-failure", "timeout"],
      attemptTimeoutMs: timeouts.ffmpegMs
    },
    transcribe: {
      maxAttempts: 3,
      baseDelayMs: 5000,
      backoffMultiplier: 2,
      retryableErrorKinds: ["model-error", "timeout"],
      attemptTimeoutMs: timeouts.transcribeMs
    },
    detect: {
      maxAttempts: 3,
      baseDelayMs: 2000,
      backoffMultiplier: 2,
      retryableErrorKinds: ["malformed-response", "rate-limit", "timeout"],
      attemptTimeoutMs: timeouts.detectMs
    },
    clip: {
      maxAttempts: 2,
      baseDelayMs: 1000,
      backoffMultiplier: 2,
      retryableErrorKinds: ["tool-failure", "timeout", "encoding-error"],
      attemptTimeoutMs: timeouts.ffmpegMs
    }
  };
}

export function backoffDelay(policy: RetryPolicy, attempt: number) {
  return policy.baseDelayMs * policy.backoffMultiplier ** (attempt - 1);
}
