import { spawn } from "node:child_process";
import { PipelineError, type ErrorKind } from "../../domain/errors";

export interface RunProcessOptions {
  /** Kind reported when the tool exits non-zero or cannot start. */
  failureKind: ErrorKind;
  signal?: AbortSignal;
  timeoutMs?: number;
}

/**
 * Runs a command to completion and resolves with its stdout. Keeps the last
 * few KB of stderr for the error message. Aborting the signal kills the child.
 */
export async function runProcess(command: string, args: string[], options: RunProcessOptions) {
  if (options.signal?.aborted) {
    throw new PipelineError(`${command} was cancelled before it started.`, "cancelled");
  }

  return new Promise<string>((resolve, reject) => {
    const proc = spawn(command, args, { stdio: ["ignore", "pipe", "pipe"] });
    const tail = createTailBuffer(8192);
    let stdout = "";
    let timedOut = false;
    let aborted = false;

    const timer = options.timeoutMs
      ? setTimeout(() => {
          timedOut = true;
          proc.kill("SIGTERM");
        }, options.timeoutMs)
      : null;
    const onAbort = () => {
      aborted = true;
      proc.kill("SIGTERM");
    };
    options.signal?.addEventListener("abort", onAbort, { once: true });

    const cleanup = () => {
      if (timer) {
        clearTimeout(timer);
      }
      options.signal?.removeEventListener("abort", onAbort);
    };

    proc.stdout.on("data", (data: Buffer) => (stdout += data.toString()));
    proc.stderr.on("data", (data: Buffer) => tail.append(data));
    proc.on("error", (error) => {
      cleanup();
      reject(new PipelineError(`${command} not found or failed to start: ${error.message}`, options.failureKind, { cause: error }));
    });
    proc.on("close", (code) => {
      cleanup();
      if (code === 0) {
        resolve(stdout);
        return;
      }
      const detail = tail.value();
      const suffix = detail ? `\n${detail}` : "";
      if (aborted) {
        reject(new PipelineError(`${command} was cancelled.`, "cancelled"));
      } else if (timedOut) {
        reject(new PipelineError(`${command} timed out after ${options.timeoutMs}ms.${suffix}`, "timeout"));
      } else {
        reject(new PipelineError(`${command} exited with code ${code ?? "unknown"}.${suffix}`, options.failureKind));
      }
    });
  });
}

export async function probeDuration(filePath: string, signal?: AbortSignal) {
  const output = await runProcess(
    "ffprobe",
    ["-v", "error", "-show_entries", "format=duration", "-of", "default=noprint_wrappers=1:nokey=1", filePath],
    { failureKind: "tool-failure", signal }
  );
  const value = Number.parseFloat(output.trim());
  if (!Number.isFinite(value) || value <= 0) {
    throw new PipelineError(`ffprobe returned no duration for ${filePath}.`, "tool-failure");
  }
  return value;
}

function createTailBuffer(limit: number) {
  let buffer = Buffer.alloc(0);
  return {
    append(chunk: Buffer) {
      buffer = Buffer.concat([buffer, chunk]);
      if (buffer.length > limit) {
        buffer = buffer.subarray(buffer.length - limit);
      }
    },
    value() {
      return buffer.toString("utf-8").trim().replaceAll(/\s+/g, " ");
    }
  };
}
