import { createHash, randomUUID } from "node:crypto";
import { promises as fs } from "node:fs";
import path from "node:path";
import { isRemoteUrl } from "../../../lib/validateUrl";
import { PipelineError } from "../../domain/errors";
import type { SourceVideo } from "../../domain/types";
import type { CallContext, VideoSourcePort } from "../../interfaces/ports";
import { probeDuration, runProcess } from "../process/runProcess";

const SUPPORTED_EXTENSIONS = new Set([".mp4", ".mkv", ".avi", ".webm", ".mov", ".m4v", ".flv"]);

export class VideoSourceResolver implements VideoSourcePort {
  constructor(private readonly downloadsDir: string) {}

  async load(uriOrPath: string, context: CallContext): Promise<SourceVideo> {
    const filePath = isRemoteUrl(uriOrPath)
      ? await this.download(uriOrPath, context.signal)
      : await resolveLocalFile(uriOrPath);
    const durationSeconds = await probeDuration(filePath, context.signal);
    return {
      id: randomUUID(),
      uri: uriOrPath,
      filePath,
      durationSeconds,
      title: path.parse(filePath).name
    };
  }

  private async download(url: string, signal: AbortSignal) {
    await fs.mkdir(this.downloadsDir, { recursive: true });
    const safeName = createHash("sha256").update(url).digest("hex").slice(0, 16);
    const outPath = path.join(this.downloadsDir, `download-${safeName}.mp4`);
    if (await fileExists(outPath)) {
      return outPath;
    }

    const format = "bv*[ext=mp4]+ba[ext=m4a]/bv*+ba/best";
    try {
      await runProcess(
        "yt-dlp",
        ["-f", format, "--merge-output-format", "mp4", "--no-playlist", "--no-part", "--force-overwrites", "-o", outPath, url],
        { failureKind: "download-failed", signal }
      );
    } catch (error) {
      await fs.unlink(outPath).catch(() => undefined);
      throw error;
    }
    return outPath;
  }
}

async function resolveLocalFile(input: string) {
  const filePath = path.resolve(input);
  if (!(await fileExists(filePath))) {
    throw new PipelineError(`Video file not found: ${input}`, "not-found");
  }
  const ext = path.extname(filePath).toLowerCase();
  if (!SUPPORTED_EXTENSIONS.has(ext)) {
    throw new PipelineError(
      `Unsupported video format: ${ext || "(none)"}. Supported: ${[...SUPPORTED_EXTENSIONS].join(", ")}`,
      "invalid-input"
    );
  }
  return filePath;
}

async function fileExists(filePath: string) {
  try {
    await fs.access(filePath);
    return true;
  } catch {
    return false;
  }
}
