import path from "node:path";
import { promises as fs } from "node:fs";
import { PipelineError, formatError } from "../../domain/errors";
import type { AudioTrack, Transcript } from "../../domain/types";
import type { CallContext, LoggerPort, TranscriberPort } from "../../interfaces/ports";
import { runProcess } from "../process/runProcess";
import { parseSrt } from "./srt";

export interface WhisperOptions {
  provider: "mock" | "whisper";
  command: string;
  model: string;
  device: string | null;
}

export class WhisperTranscriber implements TranscriberPort {
  constructor(
    private readonly options: WhisperOptions,
    private readonly logger: LoggerPort
  ) {}

  async transcribe(audio: AudioTrack, context: CallContext & { language: string }): Promise<Transcript> {
    if (this.options.provider === "mock") {
      // Times are in audio time, so the demo transcript shrinks with the speed factor.
      return {
        language: context.language,
        segments: [
          { startSeconds: 0, endSeconds: 20 / audio.speedFactor, text: "Demo transcript.", confidence: null },
          { startSeconds: 20 / audio.speedFactor, endSeconds: 45 / audio.speedFactor, text: "Replace this with whisper output.", confidence: null }
        ]
      };
    }

    if (!this.options.device || this.options.device === "cpu") {
      await this.logger.warn(context.runId, "Whisper running on CPU. Expect slower transcription.");
    }
    const outputDir = path.dirname(audio.path);
    const args = [
      audio.path,
      "--model",
      this.options.model,
      "--language",
      context.language,
      "--output_format",
      "srt",
      "--output_dir",
      outputDir
    ];
    if (this.options.device) {
      args.push("--device", this.options.device);
    }

    await runProcess(this.options.command, args, { failureKind: "model-error", signal: context.signal });

    const srtPath = path.join(outputDir, `${path.parse(audio.path).name}.srt`);
    let srt: string;
    try {
      srt = await fs.readFile(srtPath, "utf-8");
    } catch (error) {
      throw new PipelineError(`Whisper produced no transcript at ${srtPath}: ${formatError(error)}`, "model-error", { cause: error });
    }
    return parseSrt(srt, context.language);
  }
}
