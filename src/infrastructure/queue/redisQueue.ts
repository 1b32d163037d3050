import { Queue } from "bullmq";
import IORedis from "ioredis";
import type { RunOptions } from "../../domain/types";
import type { JobQueuePort } from "../../interfaces/ports";

const QUEUE_NAME = "reelcutter";
export const RUN_JOB_NAME = "runPipeline";

export interface RunJobData {
  runId: string;
  request: RunOptions;
}

export class RedisQueue implements JobQueuePort {
  private readonly connection: IORedis;
  private readonly queue: Queue<RunJobData>;

  constructor(redisUrl: string) {
    this.connection = new IORedis(redisUrl, { maxRetriesPerRequest: null, lazyConnect: true });
    this.queue = new Queue<RunJobData>(QUEUE_NAME, { connection: this.connection });
  }

  async enqueueRun(options: RunJobData) {
    await this.queue.add(RUN_JOB_NAME, options, { jobId: options.runId, removeOnComplete: 50, removeOnFail: 50 });
  }

  async close() {
    await this.queue.close();
    await this.connection.quit();
  }
}

export function getQueueName() {
  return QUEUE_NAME;
}
