import path from "node:path";
import { ClipError, formatError, toPipelineError } from "../domain/errors";
import { getPlatformSpec } from "../domain/platforms";
import type { Clip, ClipStage, Platform, RunOptions, SelectedHighlight, SourceVideo, Transcript } from "../domain/types";
import type {
  ArtifactScope,
  ClipExtractorPort,
  LoggerPort,
  PlatformExporterPort,
  RunWorkspace,
  SubtitleBurnerPort,
  SubtitleGeneratorPort
} from "../interfaces/ports";
import type { ResultCollector } from "./resultCollector";
import type { RetryPolicy } from "./retryPolicies";
import type { StageExecutor, StageFn } from "./stageExecutor";
import { sliceTranscript } from "./transcript";

export interface ClipWorkerDependencies {
  clipExtractor: ClipExtractorPort;
  subtitleGenerator: SubtitleGeneratorPort;
  subtitleBurner: SubtitleBurnerPort;
  platformExporter: PlatformExporterPort;
  executor: StageExecutor;
  logger: LoggerPort;
}

export interface ClipBatch {
  runId: string;
  options: RunOptions;
  signal?: AbortSignal;
  workspace: RunWorkspace;
  video: SourceVideo;
  transcript: Transcript;
  highlights: SelectedHighlight[];
  collector: ResultCollector;
}

/**
 * Fans selected highlights out over at most `concurrency` workers. Each
 * highlight is its own failure domain: its errors are recorded on the
 * collector and never reach the caller.
 */
export class ClipWorkerPool {
  constructor(
    private readonly deps: ClipWorkerDependencies,
    private readonly retryPolicy: RetryPolicy
  ) {}

  async run(batch: ClipBatch, concurrency = batch.options.workerCount) {
    const queue = [...batch.highlights].sort((a, b) => a.rank - b.rank);
    let cursor = 0;

    const lane = async () => {
      while (cursor < queue.length) {
        const highlight = queue[cursor];
        cursor += 1;
        if (batch.signal?.aborted) {
          this.recordUndispatched(batch, highlight);
          continue;
        }
        await this.processHighlight(batch, highlight);
      }
    };

    const lanes = Math.max(1, Math.min(concurrency, queue.length));
    await Promise.all(Array.from({ length: lanes }, () => lane()));
  }

  private recordUndispatched(batch: ClipBatch, highlight: SelectedHighlight) {
    batch.collector.recordFailure({
      highlightId: highlight.id,
      stage: "dispatch",
      platform: null,
      kind: "cancelled",
      message: "Run cancelled before this highlight was dispatched.",
      attempts: 0
    });
    batch.collector.markFinished(highlight.id);
  }

  private async processHighlight(batch: ClipBatch, highlight: SelectedHighlight) {
    let scope: ArtifactScope | null = null;
    try {
      scope = await batch.workspace.scope(highlight.id);
      await this.deps.logger.info(batch.runId, `Processing ${highlight.id} (rank ${highlight.rank}).`);
      await this.runSubPipeline(batch, highlight, scope);
    } catch (error) {
      const failure = error instanceof ClipError ? error : new ClipError(highlight.id, "dispatch", null, 0, toPipelineError(error));
      batch.collector.recordFailure({
        highlightId: highlight.id,
        stage: failure.stage,
        platform: failure.platform,
        kind: failure.kind,
        message: formatError(failure.cause),
        attempts: failure.attempts
      });
      await this.deps.logger.warn(batch.runId, failure.message);
    } finally {
      batch.collector.markFinished(highlight.id);
      if (scope) {
        await this.releaseScope(batch.runId, scope);
      }
    }
  }

  private async runSubPipeline(batch: ClipBatch, highlight: SelectedHighlight, scope: ArtifactScope) {
    const { options, video, runId } = batch;
    const clipId = `${highlight.id}-clip`;
    const start = Math.max(0, highlight.startSeconds - options.paddingBeforeSeconds);
    const end = Math.min(video.durationSeconds, highlight.endSeconds + options.paddingAfterSeconds);

    const clip = await this.step(batch, highlight, "extract", null, (_, attempt) =>
      this.deps.clipExtractor.cut(video, start, end, {
        runId,
        signal: attempt.signal,
        clipId,
        selectedHighlightId: highlight.id,
        outputPath: scope.file("clip.mp4")
      })
    );

    const segments = sliceTranscript(batch.transcript, clip.startSeconds, clip.endSeconds);
    const track = await this.step(batch, highlight, "subtitles", null, (_, attempt) =>
      this.deps.subtitleGenerator.generate(segments, {
        runId,
        signal: attempt.signal,
        clipId: clip.id,
        outputPath: scope.file("subtitles.srt")
      })
    );

    const burned = await this.step(batch, highlight, "burn", null, (_, attempt) =>
      this.deps.subtitleBurner.burn(clip, track, {
        runId,
        signal: attempt.signal,
        outputPath: scope.file("burned.mp4")
      })
    );

    let exported = 0;
    for (const platform of options.targetPlatforms) {
      if (await this.exportPlatform(batch, highlight, burned, platform)) {
        exported += 1;
      }
    }
    await this.deps.logger.info(
      runId,
      `${highlight.id} exported ${exported}/${options.targetPlatforms.length} platform reel(s).`
    );
  }

  private async exportPlatform(batch: ClipBatch, highlight: SelectedHighlight, clip: Clip, platform: Platform) {
    const outputPath = path.join(batch.workspace.outputDir, `reel-${highlight.rank}-${platform}.mp4`);
    try {
      const file = await this.step(batch, highlight, "export", platform, (_, attempt) =>
        this.deps.platformExporter.export(clip, getPlatformSpec(platform), {
          runId: batch.runId,
          signal: attempt.signal,
          outputPath
        })
      );
      batch.collector.recordReel(highlight.id, {
        path: file.path,
        durationSeconds: file.durationSeconds,
        viralityScore: highlight.viralityScore,
        platform: file.platform,
        highlightId: highlight.id,
        rank: highlight.rank,
        title: highlight.title
      });
      return true;
    } catch (error) {
      if (!(error instanceof ClipError)) {
        throw error;
      }
      batch.collector.recordFailure({
        highlightId: highlight.id,
        stage: "export",
        platform,
        kind: error.kind,
        message: formatError(error.cause),
        attempts: error.attempts
      });
      await this.deps.logger.warn(batch.runId, `${error.message} (${platform})`);
      return false;
    }
  }

  private async step<O>(
    batch: ClipBatch,
    highlight: SelectedHighlight,
    stage: ClipStage,
    platform: Platform | null,
    fn: StageFn<null, O>
  ): Promise<O> {
    const result = await this.deps.executor.execute(fn, null, this.retryPolicy, {
      stage: `${highlight.id}:${stage}${platform ? `:${platform}` : ""}`,
      runId: batch.runId,
      signal: batch.signal
    });
    if (!result.ok) {
      throw new ClipError(highlight.id, stage, platform, result.attempts, result.error);
    }
    return result.value;
  }

  private async releaseScope(runId: string, scope: ArtifactScope) {
    try {
      await scope.release();
    } catch (error) {
      await this.deps.logger.warn(runId, `Failed to release ${scope.dir}: ${formatError(error)}`);
    }
  }
}
