import { describe, expect, it } from "vitest";
import { PipelineError } from "../../src/domain/errors";
import { StageExecutor, abortableSleep } from "../../src/application/stageExecutor";
import { MemoryLogger, policy } from "../support/fakes";

function recordingSleep() {
  const delays: number[] = [];
  const sleep = async (ms: number) => {
    delays.push(ms);
  };
  return { delays, sleep };
}

const options = { stage: "demo", runId: "run-1" };

describe("StageExecutor", () => {
  it("retries retryable failures with exponential backoff", async () => {
    const logger = new MemoryLogger();
    const { delays, sleep } = recordingSleep();
    const executor = new StageExecutor(logger, sleep);
    let calls = 0;

    const result = await executor.execute(
      async (input: number) => {
        calls += 1;
        if (calls < 3) {
          throw new PipelineError("ffmpeg crashed", "tool-failure");
        }
        return input * 2;
      },
      21,
      policy({ maxAttempts: 3, baseDelayMs: 100 }),
      options
    );

    expect(result).toMatchObject({ ok: true, value: 42, attempts: 3 });
    expect(delays).toEqual([100, 200]);
    expect(logger.messages("warn")[0]).toBe("demo attempt 1/3 failed (tool-failure): ffmpeg crashed. Retrying in 100ms.");
  });

  it("returns the last error once attempts are exhausted", async () => {
    const logger = new MemoryLogger();
    const { delays, sleep } = recordingSleep();
    const executor = new StageExecutor(logger, sleep);

    const result = await executor.execute(
      async () => {
        throw new PipelineError("boom", "tool-failure");
      },
      null,
      policy({ maxAttempts: 3, baseDelayMs: 100 }),
      options
    );

    expect(result.ok).toBe(false);
    expect(result.attempts).toBe(3);
    expect(!result.ok && result.error.kind).toBe("tool-failure");
    expect(delays).toEqual([100, 200]);
    expect(logger.messages("error")).toEqual(["demo failed after 3 attempt(s) (tool-failure): boom"]);
  });

  it("does not retry non-retryable kinds", async () => {
    const { delays, sleep } = recordingSleep();
    const executor = new StageExecutor(new MemoryLogger(), sleep);

    const result = await executor.execute(
      async () => {
        throw new PipelineError("missing file", "not-found");
      },
      null,
      policy({ maxAttempts: 3 }),
      options
    );

    expect(result.attempts).toBe(1);
    expect(!result.ok && result.error.kind).toBe("not-found");
    expect(delays).toEqual([]);
  });

  it("classifies unexpected errors as unknown", async () => {
    const executor = new StageExecutor(new MemoryLogger(), recordingSleep().sleep);

    const result = await executor.execute(
      async () => {
        throw new TypeError("bad value");
      },
      null,
      policy({ maxAttempts: 3, retryableErrorKinds: ["tool-failure"] }),
      options
    );

    expect(result.attempts).toBe(1);
    expect(!result.ok && result.error.kind).toBe("unknown");
    expect(!result.ok && result.error.message).toBe("bad value");
  });

  it("times out a hanging attempt and aborts its signal", async () => {
    const executor = new StageExecutor(new MemoryLogger(), recordingSleep().sleep);
    const signals: AbortSignal[] = [];

    const result = await executor.execute(
      (_input: null, attempt) => {
        signals.push(attempt.signal);
        return new Promise<string>(() => undefined);
      },
      null,
      policy({ maxAttempts: 1, attemptTimeoutMs: 20 }),
      { stage: "slow", runId: "run-1" }
    );

    expect(!result.ok && result.error.kind).toBe("timeout");
    expect(!result.ok && result.error.message).toBe("slow attempt 1 timed out after 20ms.");
    expect(signals[0].aborted).toBe(true);
  });

  it("retries after a timeout and succeeds", async () => {
    const executor = new StageExecutor(new MemoryLogger(), recordingSleep().sleep);

    const result = await executor.execute(
      (_input: null, attempt) => (attempt.attempt === 1 ? new Promise<string>(() => undefined) : Promise.resolve("done")),
      null,
      policy({ maxAttempts: 2, attemptTimeoutMs: 20 }),
      options
    );

    expect(result).toMatchObject({ ok: true, value: "done", attempts: 2 });
  });

  it("does not start when the run is already cancelled", async () => {
    const executor = new StageExecutor(new MemoryLogger(), recordingSleep().sleep);
    const controller = new AbortController();
    controller.abort();
    let called = false;

    const result = await executor.execute(
      async () => {
        called = true;
        return 1;
      },
      null,
      policy(),
      { ...options, signal: controller.signal }
    );

    expect(called).toBe(false);
    expect(result.attempts).toBe(0);
    expect(!result.ok && result.error.kind).toBe("cancelled");
    expect(!result.ok && result.error.message).toBe("Run cancelled before demo.");
  });

  it("stops retrying when cancelled during backoff", async () => {
    const executor = new StageExecutor(new MemoryLogger(), async () => {
      throw new Error("aborted");
    });

    const result = await executor.execute(
      async () => {
        throw new PipelineError("ffmpeg crashed", "tool-failure");
      },
      null,
      policy({ maxAttempts: 3 }),
      options
    );

    expect(result.attempts).toBe(1);
    expect(!result.ok && result.error.kind).toBe("cancelled");
  });

  it("forwards run cancellation to the running attempt", async () => {
    const executor = new StageExecutor(new MemoryLogger(), recordingSleep().sleep);
    const controller = new AbortController();

    const pending = executor.execute(
      (_input: null, attempt) =>
        new Promise<string>((_, reject) => {
          attempt.signal.addEventListener("abort", () => reject(new PipelineError("stopped", "cancelled")));
        }),
      null,
      policy({ maxAttempts: 3, retryableErrorKinds: ["tool-failure"] }),
      { ...options, signal: controller.signal }
    );
    controller.abort();
    const result = await pending;

    expect(result.attempts).toBe(1);
    expect(!result.ok && result.error.message).toBe("stopped");
  });

  it("measures duration with the injected clock", async () => {
    const ticks = [1000, 1250];
    const executor = new StageExecutor(new MemoryLogger(), recordingSleep().sleep, () => ticks.shift() ?? 0);

    const result = await executor.execute(async () => "ok", null, policy(), options);

    expect(result.durationMs).toBe(250);
  });
});

describe("abortableSleep", () => {
  it("rejects when the signal aborts", async () => {
    const controller = new AbortController();
    const pending = abortableSleep(10_000, controller.signal);
    controller.abort();
    await expect(pending).rejects.toMatchObject({ kind: "cancelled" });
  });
});
