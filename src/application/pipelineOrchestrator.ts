import { randomUUID } from "node:crypto";
import {
  AudioError,
  CancelledError,
  DetectionError,
  IngestError,
  PipelineError,
  StageError,
  TranscriptionError,
  formatError,
  toPipelineError
} from "../domain/errors";
import type { GlobalStage, RunOptions, RunReport, RunState, SpeedFactor } from "../domain/types";
import type {
  AudioExtractorPort,
  ClipExtractorPort,
  HighlightDetectorPort,
  JobQueuePort,
  LoggerPort,
  PlatformExporterPort,
  RunWorkspace,
  StoragePort,
  SubtitleBurnerPort,
  SubtitleGeneratorPort,
  TranscriberPort,
  VideoSourcePort
} from "../interfaces/ports";
import { ClipWorkerPool } from "./clipWorkerPool";
import { selectHighlights } from "./highlightSelector";
import { ResultCollector } from "./resultCollector";
import type { RetryPolicies, RetryPolicy } from "./retryPolicies";
import { parseRunRequest } from "./runRequest";
import { StageExecutor, type Sleep, type StageFn } from "./stageExecutor";
import { rescaleTranscript } from "./transcript";

export interface PipelineDependencies {
  source: VideoSourcePort;
  audioExtractor: AudioExtractorPort;
  transcriber: TranscriberPort;
  detector: HighlightDetectorPort;
  clipExtractor: ClipExtractorPort;
  subtitleGenerator: SubtitleGeneratorPort;
  subtitleBurner: SubtitleBurnerPort;
  platformExporter: PlatformExporterPort;
  storage: StoragePort;
  queue: JobQueuePort;
  logger: LoggerPort;
  retryPolicies: RetryPolicies;
  sleep?: Sleep;
}

export interface RunHooks {
  runId?: string;
  signal?: AbortSignal;
  onStateChange?: (state: RunState, runId: string) => void | Promise<void>;
}

type StageErrorFactory = new (cause: PipelineError) => StageError;

const SPEED_UP_FACTOR: SpeedFactor = 2;

/**
 * Drives one run through its global stages, then hands the selected highlights
 * to the clip worker pool. A run always ends in `completed` or `aborted` and
 * always yields a report.
 */
export class PipelineOrchestrator {
  private readonly executor: StageExecutor;
  private readonly pool: ClipWorkerPool;

  constructor(private readonly deps: PipelineDependencies) {
    this.executor = new StageExecutor(deps.logger, deps.sleep);
    this.pool = new ClipWorkerPool(
      {
        clipExtractor: deps.clipExtractor,
        subtitleGenerator: deps.subtitleGenerator,
        subtitleBurner: deps.subtitleBurner,
        platformExporter: deps.platformExporter,
        executor: this.executor,
        logger: deps.logger
      },
      deps.retryPolicies.clip
    );
  }

  async run(request: unknown, hooks: RunHooks = {}): Promise<RunReport> {
    const runId = hooks.runId ?? randomUUID();
    const run = new RunContext(runId, this.deps.logger, hooks);
    await run.transition("created");

    let options: RunOptions;
    try {
      options = parseRunRequest(request);
    } catch (error) {
      const failure = toPipelineError(error);
      await this.deps.logger.error(runId, failure.message);
      await run.transition("aborted");
      const input = isRecord(request) && typeof request.input === "string" ? request.input : "";
      return new ResultCollector(runId, input, []).build("aborted", { kind: failure.kind, stage: null, message: failure.message });
    }

    const collector = new ResultCollector(runId, options.input, options.targetPlatforms);
    let workspace: RunWorkspace | null = null;

    try {
      workspace = await this.deps.storage.createRunWorkspace(runId, { retainArtifacts: options.retainArtifacts });
      const activeWorkspace = workspace;
      const signal = hooks.signal;

      const video = await this.runStage(run, collector, "ingesting", "ingest", this.deps.retryPolicies.ingest, IngestError, (_, attempt) =>
        this.deps.source.load(options.input, { runId, signal: attempt.signal })
      );
      await this.deps.logger.info(runId, `Loaded ${video.uri} (${video.durationSeconds.toFixed(1)}s).`);

      const speedFactor: SpeedFactor = options.speedUpAudio ? SPEED_UP_FACTOR : 1;
      const audio = await this.runStage(
        run,
        collector,
        "extracting_audio",
        "extract_audio",
        this.deps.retryPolicies.extract_audio,
        AudioError,
        (_, attempt) =>
          this.deps.audioExtractor.extract(video, speedFactor, { runId, signal: attempt.signal, outputDir: activeWorkspace.dir })
      );

      const rawTranscript = await this.runStage(
        run,
        collector,
        "transcribing",
        "transcribe",
        this.deps.retryPolicies.transcribe,
        TranscriptionError,
        (_, attempt) => this.deps.transcriber.transcribe(audio, { runId, signal: attempt.signal, language: options.language })
      );
      const transcript = rescaleTranscript(rawTranscript, audio.speedFactor);
      await this.deps.logger.info(runId, `Transcribed ${transcript.segments.length} segment(s) at speed x${audio.speedFactor}.`);

      const candidates = await this.runStage(
        run,
        collector,
        "detecting_highlights",
        "detect",
        this.deps.retryPolicies.detect,
        DetectionError,
        (_, attempt) =>
          this.deps.detector.detect(transcript, {
            runId,
            signal: attempt.signal,
            maxHighlights: options.maxReels,
            minDurationSeconds: options.minDurationSeconds,
            maxDurationSeconds: options.maxDurationSeconds,
            focusSpeaker: options.focusSpeaker
          })
      );
      await this.deps.logger.info(runId, `Detector proposed ${candidates.length} candidate(s).`);

      this.checkCancelled(signal);
      await run.transition("selecting");
      const selectionStartedAt = Date.now();
      const selection = selectHighlights(candidates, {
        maxReels: options.maxReels,
        minDurationSeconds: options.minDurationSeconds,
        maxDurationSeconds: options.maxDurationSeconds,
        sourceDurationSeconds: video.durationSeconds
      });
      for (const discarded of selection.discarded) {
        const detail =
          discarded.reason === "malformed"
            ? discarded.error.message
            : `Candidate [${discarded.candidate.startSeconds}, ${discarded.candidate.endSeconds}] is shorter than ${options.minDurationSeconds}s.`;
        await this.deps.logger.warn(runId, `Discarded candidate: ${detail}`);
      }
      collector.recordSelection(selection.selected, selection.discarded.length);
      collector.recordStage({
        stage: "select",
        status: "succeeded",
        attempts: 1,
        durationMs: Date.now() - selectionStartedAt,
        error: null
      });
      await this.deps.logger.info(
        runId,
        `Selected ${selection.selected.length} highlight(s), total score ${selection.totalScore}.`
      );

      // An aborted signal still reaches the pool, which records each highlight it never dispatched.
      if (selection.selected.length) {
        await run.transition("processing");
        await this.pool.run({
          runId,
          options,
          signal,
          workspace: activeWorkspace,
          video,
          transcript,
          highlights: selection.selected,
          collector
        });
        this.checkCancelled(signal);
      }

      await run.transition("completed");
      const report = collector.build("completed", null);
      await this.deps.logger.info(
        runId,
        `Run completed with ${report.reels.length} reel(s) and ${report.failures.length} failure(s).`
      );
      return report;
    } catch (error) {
      const failure = toPipelineError(error);
      const stage = failure instanceof StageError ? failure.stage : null;
      await this.deps.logger.error(runId, `Run aborted: ${failure.message}`);
      await run.transition("aborted");
      return collector.build("aborted", { kind: failure.kind, stage, message: failure.message });
    } finally {
      if (workspace) {
        await this.releaseWorkspace(runId, workspace);
      }
    }
  }

  /** Validates and queues a run for the worker; returns the run id. */
  async enqueue(request: unknown) {
    const options = parseRunRequest(request);
    const runId = randomUUID();
    await this.deps.queue.enqueueRun({ runId, request: options });
    await this.deps.logger.info(runId, "Run queued.");
    return runId;
  }

  private async runStage<O>(
    run: RunContext,
    collector: ResultCollector,
    state: RunState,
    stage: Exclude<GlobalStage, "select">,
    policy: RetryPolicy,
    ErrorType: StageErrorFactory,
    fn: StageFn<null, O>
  ): Promise<O> {
    this.checkCancelled(run.signal);
    await run.transition(state);
    const result = await this.executor.execute(fn, null, policy, { stage, runId: run.runId, signal: run.signal });
    collector.recordStage({
      stage,
      status: result.ok ? "succeeded" : "failed",
      attempts: result.attempts,
      durationMs: result.durationMs,
      error: result.ok ? null : result.error.message
    });
    if (!result.ok) {
      throw new ErrorType(result.error);
    }
    return result.value;
  }

  private checkCancelled(signal: AbortSignal | undefined) {
    if (signal?.aborted) {
      throw new CancelledError();
    }
  }

  private async releaseWorkspace(runId: string, workspace: RunWorkspace) {
    try {
      await workspace.release();
    } catch (error) {
      await this.deps.logger.warn(runId, `Failed to release run workspace: ${formatError(error)}`);
    }
  }
}

class RunContext {
  state: RunState | null = null;

  constructor(
    readonly runId: string,
    private readonly logger: LoggerPort,
    private readonly hooks: RunHooks
  ) {}

  get signal() {
    return this.hooks.signal;
  }

  async transition(next: RunState) {
    const previous = this.state;
    this.state = next;
    await this.logger.info(this.runId, previous ? `State ${previous} -> ${next}.` : `State ${next}.`);
    try {
      await this.hooks.onStateChange?.(next, this.runId);
    } catch (error) {
      await this.logger.warn(this.runId, `State listener failed on ${next}: ${formatError(error)}`);
    }
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}
