import { promises as fs } from "node:fs";
import path from "node:path";
import { z } from "zod";
import { PipelineError, formatError } from "../../domain/errors";
import type { Clip, PlatformSpec, SourceVideo, SubtitleTrack } from "../../domain/types";
import type {
  CallContext,
  ClipExtractorPort,
  ExportedFile,
  PlatformExporterPort,
  SubtitleBurnerPort
} from "../../interfaces/ports";
import { runProcess } from "../process/runProcess";

const RANGE_TOLERANCE_SECONDS = 0.05;

export interface ExportOptions {
  /** EBU R128 normalisation to -14 LUFS instead of passing audio through. */
  loudnorm: boolean;
}

export class FfmpegClipExtractor implements ClipExtractorPort {
  async cut(
    video: SourceVideo,
    startSeconds: number,
    endSeconds: number,
    context: CallContext & { clipId: string; selectedHighlightId: string; outputPath: string }
  ): Promise<Clip> {
    if (startSeconds < 0 || endSeconds <= startSeconds || endSeconds > video.durationSeconds + RANGE_TOLERANCE_SECONDS) {
      throw new PipelineError(
        `Clip range [${startSeconds}, ${endSeconds}] is outside the source (0-${video.durationSeconds}s).`,
        "out-of-range"
      );
    }
    const end = Math.min(endSeconds, video.durationSeconds);
    const duration = end - startSeconds;

    await ensureParent(context.outputPath);
    await runFfmpeg(
      [
        "-y",
        "-ss",
        startSeconds.toFixed(3),
        "-i",
        video.filePath,
        "-t",
        duration.toFixed(3),
        "-c:v",
        "libx264",
        "-preset",
        "fast",
        "-pix_fmt",
        "yuv420p",
        "-c:a",
        "aac",
        "-b:a",
        "160k",
        context.outputPath
      ],
      context.signal
    );

    return {
      id: context.clipId,
      selectedHighlightId: context.selectedHighlightId,
      path: context.outputPath,
      startSeconds,
      endSeconds: end,
      durationSeconds: duration
    };
  }
}

export class FfmpegSubtitleBurner implements SubtitleBurnerPort {
  async burn(clip: Clip, track: SubtitleTrack, context: CallContext & { outputPath: string }): Promise<Clip> {
    await ensureParent(context.outputPath);
    if (!track.cues.length) {
      await fs.copyFile(clip.path, context.outputPath);
      return { ...clip, path: context.outputPath };
    }

    await runFfmpeg(
      [
        "-y",
        "-i",
        clip.path,
        "-vf",
        buildSubtitleFilter(track.path),
        "-c:v",
        "libx264",
        "-preset",
        "fast",
        "-pix_fmt",
        "yuv420p",
        "-c:a",
        "copy",
        context.outputPath
      ],
      context.signal,
      "encoding-error"
    );
    return { ...clip, path: context.outputPath };
  }
}

export class FfmpegPlatformExporter implements PlatformExporterPort {
  constructor(private readonly options: ExportOptions = { loudnorm: false }) {}

  async export(clip: Clip, spec: PlatformSpec, context: CallContext & { outputPath: string }): Promise<ExportedFile> {
    const duration = Math.min(clip.durationSeconds, spec.maxDurationSeconds);
    const { width, height } = await probeVideo(clip.path, context.signal);
    const crop = buildCrop(width, height, spec);
    const filters = [
      `crop=${crop.width}:${crop.height}:${crop.x}:${crop.y}`,
      `scale=${spec.width}:${spec.height}`,
      "fps=30",
      "setsar=1"
    ];
    const audioFilter = this.options.loudnorm ? "loudnorm=I=-14:TP=-1.5:LRA=11" : "volume=1.0";

    await ensureParent(context.outputPath);
    await runFfmpeg(
      [
        "-y",
        "-i",
        clip.path,
        "-t",
        duration.toFixed(3),
        "-vf",
        filters.join(","),
        "-af",
        audioFilter,
        "-c:v",
        spec.videoCodec,
        "-preset",
        "fast",
        "-profile:v",
        "high",
        "-pix_fmt",
        "yuv420p",
        "-b:v",
        "4000k",
        "-c:a",
        spec.audioCodec,
        "-b:a",
        "160k",
        "-movflags",
        "+faststart",
        context.outputPath
      ],
      context.signal
    );

    const { size } = await fs.stat(context.outputPath);
    const limit = spec.maxFileSizeMb * 1024 * 1024;
    if (size > limit) {
      await fs.rm(context.outputPath, { force: true });
      throw new PipelineError(
        `${spec.platform} export is ${(size / 1024 / 1024).toFixed(1)}MB, above the ${spec.maxFileSizeMb}MB limit.`,
        "unsupported-spec"
      );
    }

    return { path: context.outputPath, durationSeconds: duration, platform: spec.platform };
  }
}

const probeSchema = z.object({
  streams: z
    .array(z.object({ width: z.number().int().positive().optional(), height: z.number().int().positive().optional() }))
    .default([])
});

async function probeVideo(inputPath: string, signal: AbortSignal) {
  const output = await runProcess(
    "ffprobe",
    ["-v", "error", "-select_streams", "v:0", "-show_entries", "stream=width,height", "-of", "json", inputPath],
    { failureKind: "tool-failure", signal }
  );
  let json: unknown;
  try {
    json = JSON.parse(output);
  } catch (error) {
    throw new PipelineError(`ffprobe returned invalid JSON. ${summarize(output)}`, "tool-failure", { cause: error });
  }
  const parsed = probeSchema.safeParse(json);
  const stream = parsed.success ? parsed.data.streams[0] : undefined;
  return {
    width: stream?.width ?? 1920,
    height: stream?.height ?? 1080
  };
}

/** Centre crop to the target aspect ratio, keeping the full height where possible. */
export function buildCrop(width: number, height: number, spec: Pick<PlatformSpec, "width" | "height">) {
  const targetWidth = Math.min(width, Math.floor((height * spec.width) / spec.height));
  const targetHeight = targetWidth < width ? height : Math.min(height, Math.floor((width * spec.height) / spec.width));
  const x = Math.max(0, Math.floor((width - targetWidth) / 2));
  const y = Math.max(0, Math.floor((height - targetHeight) / 2));
  return { width: targetWidth, height: targetHeight, x, y };
}

export function buildSubtitleFilter(subtitlesPath: string) {
  const escaped = escapeForFfmpeg(subtitlesPath);
  const style = "Fontsize=48,PrimaryColour=&HFFFFFF&,OutlineColour=&H000000&,BorderStyle=3,Outline=2,Shadow=1,Alignment=2,MarginV=120";
  return `subtitles='${escaped}':force_style='${style}'`;
}

export function escapeForFfmpeg(value: string) {
  return value.replaceAll("\\", String.raw`\\`).replaceAll(":", String.raw`\:`).replaceAll("'", String.raw`\'`);
}

async function runFfmpeg(args: string[], signal: AbortSignal, failureKind: "tool-failure" | "encoding-error" = "tool-failure") {
  await runProcess("ffmpeg", args, { failureKind, signal });
}

async function ensureParent(filePath: string) {
  try {
    await fs.mkdir(path.dirname(filePath), { recursive: true });
  } catch (error) {
    throw new PipelineError(`Cannot create ${path.dirname(filePath)}: ${formatError(error)}`, "tool-failure", { cause: error });
  }
}

function summarize(output: string) {
  return output.trim().replaceAll(/\s+/g, " ");
}
