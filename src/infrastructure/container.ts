import path from "node:path";
import type { PipelineDependencies } from "../application/pipelineOrchestrator";
import { buildRetryPolicies } from "../application/retryPolicies";
import type { HighlightDetectorPort } from "../interfaces/ports";
import { FfmpegAudioExtractor } from "./audio/ffmpegAudioExtractor";
import type { AppConfig } from "./config";
import { GeminiHighlightDetector } from "./highlights/geminiHighlightDetector";
import { TranscriptHighlightDetector } from "./highlights/transcriptHighlightDetector";
import { LocalLogger } from "./logger/localLogger";
import { RedisQueue } from "./queue/redisQueue";
import { FfmpegClipExtractor, FfmpegPlatformExporter, FfmpegSubtitleBurner } from "./render/ffmpegRenderer";
import { LocalStorage } from "./storage/localStorage";
import { SrtSubtitleGenerator } from "./transcription/subtitles";
import { WhisperTranscriber } from "./transcription/whisperTranscriber";
import { VideoSourceResolver } from "./video/videoSource";

export interface AppDependencies extends PipelineDependencies {
  queue: RedisQueue;
}

let cached: AppDependencies | null = null;

export function getDependencies(config: AppConfig): AppDependencies {
  if (cached) {
    return cached;
  }

  const logger = new LocalLogger(config.logsPath, config.logToConsole);

  cached = {
    source: new VideoSourceResolver(path.join(config.storagePath, "downloads")),
    audioExtractor: new FfmpegAudioExtractor(),
    transcriber: new WhisperTranscriber(config.whisper, logger),
    detector: createDetector(config),
    clipExtractor: new FfmpegClipExtractor(),
    subtitleGenerator: new SrtSubtitleGenerator(),
    subtitleBurner: new FfmpegSubtitleBurner(),
    platformExporter: new FfmpegPlatformExporter({ loudnorm: config.ffmpegLoudnorm }),
    storage: new LocalStorage(config.storagePath, config.outputPath, logger),
    queue: new RedisQueue(config.redisUrl),
    logger,
    retryPolicies: buildRetryPolicies(config.timeouts)
  };

  return cached;
}

function createDetector(config: AppConfig): HighlightDetectorPort {
  const highlights = config.highlights;
  if (highlights.provider === "gemini") {
    return new GeminiHighlightDetector({ apiKey: highlights.apiKey, model: highlights.model, minScore: highlights.minScore });
  }
  return new TranscriptHighlightDetector();
}
