import { CancelledError, PipelineError, TimeoutError, toPipelineError } from "../domain/errors";
import type { LoggerPort } from "../interfaces/ports";
import { backoffDelay, type RetryPolicy } from "./retryPolicies";

export interface AttemptContext {
  attempt: number;
  signal: AbortSignal;
}

export type StageFn<I, O> = (input: I, attempt: AttemptContext) => Promise<O>;

export type StageResult<O> =
  | { ok: true; stage: string; value: O; attempts: number; durationMs: number }
  | { ok: false; stage: string; error: PipelineError; attempts: number; durationMs: number };

export interface ExecuteOptions {
  stage: string;
  runId: string;
  signal?: AbortSignal;
}

export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

/**
 * Runs one stage with the given retry policy. Only the value of a successful
 * attempt is ever returned; failed attempts leave nothing behind for the caller
 * to consume.
 */
export class StageExecutor {
  constructor(
    private readonly logger: LoggerPort,
    private readonly sleep: Sleep = abortableSleep,
    private readonly now: () => number = Date.now
  ) {}

  async execute<I, O>(stageFn: StageFn<I, O>, input: I, policy: RetryPolicy, options: ExecuteOptions): Promise<StageResult<O>> {
    const startedAt = this.now();
    const maxAttempts = Math.max(1, policy.maxAttempts);
    let lastError: PipelineError = new PipelineError(`Stage ${options.stage} did not run.`, "unknown");
    let attempts = 0;

    for (let attempt = 1; attempt <= maxAttempts; attempt += 1) {
      if (options.signal?.aborted) {
        lastError = new CancelledError(`Run cancelled before ${options.stage}.`);
        break;
      }

      attempts = attempt;
      try {
        const value = await this.runAttempt(stageFn, input, attempt, policy, options);
        return { ok: true, stage: options.stage, value, attempts, durationMs: this.now() - startedAt };
      } catch (error) {
        lastError = toPipelineError(error);
      }

      const retryable = policy.retryableErrorKinds.includes(lastError.kind);
      if (!retryable || attempt === maxAttempts) {
        break;
      }

      const delay = backoffDelay(policy, attempt);
      await this.logger.warn(
        options.runId,
        `${options.stage} attempt ${attempt}/${maxAttempts} failed (${lastError.kind}): ${lastError.message}. Retrying in ${delay}ms.`
      );
      try {
        await this.sleep(delay, options.signal);
      } catch {
        lastError = new CancelledError(`Run cancelled while waiting to retry ${options.stage}.`);
        break;
      }
    }

    await this.logger.error(
      options.runId,
      `${options.stage} failed after ${attempts} attempt(s) (${lastError.kind}): ${lastError.message}`
    );
    return { ok: false, stage: options.stage, error: lastError, attempts, durationMs: this.now() - startedAt };
  }

  private async runAttempt<I, O>(
    stageFn: StageFn<I, O>,
    input: I,
    attempt: number,
    policy: RetryPolicy,
    options: ExecuteOptions
  ): Promise<O> {
    const controller = new AbortController();
    const forwardAbort = () => controller.abort();
    options.signal?.addEventListener("abort", forwardAbort, { once: true });

    let timer: NodeJS.Timeout | undefined;

    try {
      const pending = stageFn(input, { attempt, signal: controller.signal });
      if (!policy.attemptTimeoutMs) {
        return await pending;
      }
      const timeoutMs = policy.attemptTimeoutMs;
      const timeout = new Promise<never>((_, reject) => {
        timer = setTimeout(() => {
          reject(new TimeoutError(`${options.stage} attempt ${attempt} timed out after ${timeoutMs}ms.`));
          controller.abort();
        }, timeoutMs);
      });
      // The losing promise may still reject later; mark it handled.
      pending.catch(() => undefined);
      return await Promise.race([pending, timeout]);
    } finally {
      if (timer) {
        clearTimeout(timer);
      }
      options.signal?.removeEventListener("abort", forwardAbort);
    }
  }
}

export function abortableSleep(ms: number, signal?: AbortSignal) {
  return new Promise<void>((resolve, reject) => {
    if (signal?.aborted) {
      reject(new CancelledError());
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      reject(new CancelledError());
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}
