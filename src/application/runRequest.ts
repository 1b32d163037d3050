import { z } from "zod";
import { ConfigurationError } from "../domain/errors";
import { PLATFORMS, type RunOptions } from "../domain/types";

const schema = z
  .object({
    input: z.string().trim().min(1, "input path or URL is required"),
    maxReels: z.coerce.number().int().positive().default(5),
    speedUpAudio: z.boolean().default(true),
    targetPlatforms: z.array(z.enum(PLATFORMS)).min(1, "at least one target platform is required").default([...PLATFORMS]),
    minDurationSeconds: z.coerce.number().min(0).default(30),
    maxDurationSeconds: z.coerce.number().positive().default(90),
    paddingBeforeSeconds: z.coerce.number().min(0).default(0),
    paddingAfterSeconds: z.coerce.number().min(0).default(0),
    language: z.string().min(2).default("he"),
    workerCount: z.coerce.number().int().min(1).max(16).default(2),
    retainArtifacts: z.boolean().default(false),
    focusSpeaker: z.string().trim().min(1).optional()
  })
  .refine((value) => value.minDurationSeconds <= value.maxDurationSeconds, {
    message: "minDurationSeconds must not exceed maxDurationSeconds",
    path: ["minDurationSeconds"]
  });

export function parseRunRequest(input: unknown): RunOptions {
  const parsed = schema.safeParse(input);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join(".") || "request"}: ${issue.message}`);
    throw new ConfigurationError(`Invalid run request: ${issues.join("; ")}`);
  }
  const { targetPlatforms, ...rest } = parsed.data;
  return { ...rest, targetPlatforms: [...new Set(targetPlatforms)] };
}
