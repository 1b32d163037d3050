import path from "node:path";
import type { AudioTrack, SourceVideo, SpeedFactor } from "../../domain/types";
import type { AudioExtractorPort, CallContext } from "../../interfaces/ports";
import { runProcess } from "../process/runProcess";

const SAMPLE_RATE = 16000;
const CHANNELS = 1;

/** Audio only, mono 16 kHz: the layout whisper expects. */
export class FfmpegAudioExtractor implements AudioExtractorPort {
  async extract(video: SourceVideo, speedFactor: SpeedFactor, context: CallContext & { outputDir: string }): Promise<AudioTrack> {
    const suffix = speedFactor === 1 ? "" : `-x${speedFactor}`;
    const outputPath = path.join(context.outputDir, `audio${suffix}.wav`);
    const args = ["-y", "-i", video.filePath, "-vn", "-ac", String(CHANNELS), "-ar", String(SAMPLE_RATE)];
    if (speedFactor !== 1) {
      args.push("-af", `atempo=${speedFactor}`);
    }
    args.push(outputPath);

    await runProcess("ffmpeg", args, { failureKind: "tool-failure", signal: context.signal });
    return {
      sourceVideoId: video.id,
      sampleRate: SAMPLE_RATE,
      channels: CHANNELS,
      speedFactor,
      path: outputPath
    };
  }
}
