import { Worker, type Job } from "bullmq";
import IORedis from "ioredis";
import { PipelineOrchestrator } from "../src/application/pipelineOrchestrator";
import { formatError } from "../src/domain/errors";
import { RUN_STATE_ORDER, type RunState } from "../src/domain/types";
import { loadConfig } from "../src/infrastructure/config";
import { getDependencies } from "../src/infrastructure/container";
import { RUN_JOB_NAME, getQueueName, type RunJobData } from "../src/infrastructure/queue/redisQueue";

const concurrency = Math.max(1, parseIntEnv(process.env.WORKER_CONCURRENCY, 1));
const maxRssMb = Math.max(0, parseIntEnv(process.env.WORKER_MAX_RSS_MB, 0));

function parseIntEnv(value: string | undefined, fallback: number) {
  const parsed = Number.parseInt(value ?? "", 10);
  return Number.isFinite(parsed) ? parsed : fallback;
}

function startWorker() {
  const config = loadConfig();
  const connection = new IORedis(config.redisUrl, { maxRetriesPerRequest: null });
  const deps = getDependencies(config);
  const orchestrator = new PipelineOrchestrator(deps);
  const running = new Map<string, AbortController>();

  const processRun = async (job: Job<RunJobData>) => {
    if (job.name !== RUN_JOB_NAME) {
      throw new Error(`Unknown job ${job.name}.`);
    }
    const controller = new AbortController();
    const runId = job.data.runId;
    running.set(runId, controller);
    try {
      const report = await orchestrator.run(job.data.request, {
        runId,
        signal: controller.signal,
        onStateChange: (state: RunState) => job.updateProgress({ state, progress: progressOf(state) })
      });
      if (report.state === "aborted") {
        throw new Error(report.error ? `${report.error.kind}: ${report.error.message}` : "Run aborted.");
      }
      return report;
    } finally {
      running.delete(runId);
    }
  };

  const worker = new Worker<RunJobData>(getQueueName(), processRun, { connection, concurrency });

  worker.on("failed", (job, err) => {
    console.error("Run failed", job?.id, formatError(err));
  });

  worker.on("error", (err) => {
    console.error("Worker error", err);
  });

  setupMemoryGuard(worker, maxRssMb);

  const shutdown = async () => {
    for (const controller of running.values()) {
      controller.abort();
    }
    await worker.close();
    await deps.queue.close();
    await connection.quit();
    process.exit(0);
  };

  process.on("SIGTERM", shutdown);
  process.on("SIGINT", shutdown);

  console.log(`Reel worker running (pid=${process.pid}, concurrency=${concurrency}).`);
}

function progressOf(state: RunState) {
  const index = RUN_STATE_ORDER.indexOf(state);
  return index === -1 ? 100 : Math.round((index / (RUN_STATE_ORDER.length - 1)) * 100);
}

function setupMemoryGuard(worker: Worker<RunJobData>, limitMb: number) {
  if (limitMb <= 0) {
    return;
  }
  const resumeThreshold = limitMb * 0.85;
  let paused = false;
  let checking = false;

  const interval = setInterval(async () => {
    if (checking) {
      return;
    }
    checking = true;
    try {
      const rssMb = process.memoryUsage().rss / 1024 / 1024;
      if (!paused && rssMb >= limitMb) {
        await worker.pause();
        paused = true;
        console.warn(`Paused new runs (RSS ${rssMb.toFixed(1)}MB >= ${limitMb}MB).`);
      } else if (paused && rssMb <= resumeThreshold) {
        await worker.resume();
        paused = false;
        console.info(`Resumed new runs (RSS ${rssMb.toFixed(1)}MB <= ${resumeThreshold.toFixed(1)}MB).`);
      }
    } catch (error) {
      console.error("Memory guard failed", error);
    } finally {
      checking = false;
    }
  }, 5000);

  interval.unref();
}

try {
  startWorker();
} catch (error) {
  console.error(formatError(error));
  process.exit(2);
}
