import path from "node:path";
import { z } from "zod";
import { ConfigurationError } from "../domain/errors";

const booleanFlag = z
  .enum(["1", "0", "true", "false", "yes", "no"])
  .transform((value) => value === "1" || value === "true" || value === "yes");

const timeout = (fallback: number) => z.coerce.number().int().positive().default(fallback);

const envSchema = z
  .object({
    STORAGE_PATH: z.string().min(1).optional(),
    LOGS_PATH: z.string().min(1).optional(),
    OUTPUT_PATH: z.string().min(1).optional(),
    LOG_TO_CONSOLE: booleanFlag.default("true"),
    REDIS_URL: z.string().url().default("redis://localhost:6379"),
    WHISPER_PROVIDER: z.enum(["mock", "whisper"]).default("mock"),
    WHISPER_CMD: z.string().min(1).default("whisper"),
    WHISPER_MODEL: z.string().min(1).default("large-v3"),
    WHISPER_DEVICE: z.string().min(1).optional(),
    HIGHLIGHT_PROVIDER: z.enum(["gemini", "heuristic"]).default("gemini"),
    GEMINI_API_KEY: z.string().min(1).optional(),
    GEMINI_MODEL: z.string().min(1).default("gemini-2.5-flash"),
    HIGHLIGHT_MIN_SCORE: z.coerce.number().min(0).max(10).default(6),
    FFMPEG_LOUDNORM: booleanFlag.default("false"),
    YT_DOWNLOAD_TIMEOUT_MS: timeout(600_000),
    FFMPEG_TIMEOUT_MS: timeout(600_000),
    TRANSCRIBE_TIMEOUT_MS: timeout(3_600_000),
    DETECT_TIMEOUT_MS: timeout(120_000),
    CLIP_WORKERS: z.coerce.number().int().min(1).max(16).default(2)
  })
  .superRefine((env, ctx) => {
    if (env.HIGHLIGHT_PROVIDER === "gemini" && !env.GEMINI_API_KEY) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["GEMINI_API_KEY"],
        message: "Required when HIGHLIGHT_PROVIDER=gemini"
      });
    }
  });

export interface AppConfig {
  storagePath: string;
  logsPath: string;
  outputPath: string;
  logToConsole: boolean;
  redisUrl: string;
  whisper: {
    provider: "mock" | "whisper";
    command: string;
    model: string;
    device: string | null;
  };
  highlights:
    | { provider: "gemini"; apiKey: string; model: string; minScore: number }
    | { provider: "heuristic" };
  ffmpegLoudnorm: boolean;
  timeouts: {
    downloadMs: number;
    ffmpegMs: number;
    transcribeMs: number;
    detectMs: number;
  };
  clipWorkers: number;
}

type Env = Record<string, string | undefined>;

export function loadConfig(env: Env = process.env, cwd = process.cwd()): AppConfig {
  const parsed = envSchema.safeParse(withoutBlanks(env));
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join(".") || "env"}: ${issue.message}`);
    throw new ConfigurationError(`Invalid configuration: ${issues.join("; ")}`);
  }
  const values = parsed.data;

  let highlights: AppConfig["highlights"];
  if (values.HIGHLIGHT_PROVIDER === "gemini") {
    if (!values.GEMINI_API_KEY) {
      throw new ConfigurationError("Invalid configuration: GEMINI_API_KEY: Required when HIGHLIGHT_PROVIDER=gemini");
    }
    highlights = { provider: "gemini", apiKey: values.GEMINI_API_KEY, model: values.GEMINI_MODEL, minScore: values.HIGHLIGHT_MIN_SCORE };
  } else {
    highlights = { provider: "heuristic" };
  }

  return {
    storagePath: path.resolve(cwd, values.STORAGE_PATH ?? "storage"),
    logsPath: path.resolve(cwd, values.LOGS_PATH ?? "logs"),
    outputPath: path.resolve(cwd, values.OUTPUT_PATH ?? "output"),
    logToConsole: values.LOG_TO_CONSOLE,
    redisUrl: values.REDIS_URL,
    whisper: {
      provider: values.WHISPER_PROVIDER,
      command: values.WHISPER_CMD,
      model: values.WHISPER_MODEL,
      device: values.WHISPER_DEVICE ?? null
    },
    highlights,
    ffmpegLoudnorm: values.FFMPEG_LOUDNORM,
    timeouts: {
      downloadMs: values.YT_DOWNLOAD_TIMEOUT_MS,
      ffmpegMs: values.FFMPEG_TIMEOUT_MS,
      transcribeMs: values.TRANSCRIBE_TIMEOUT_MS,
      detectMs: values.DETECT_TIMEOUT_MS
    },
    clipWorkers: values.CLIP_WORKERS
  };
}

function withoutBlanks(env: Env) {
  const result: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== "") {
      result[key] = value.trim();
    }
  }
  return result;
}
