import { ConfigurationError } from "./errors";
import type { Platform, PlatformSpec } from "./types";

const PLATFORM_SPECS: Record<Platform, PlatformSpec> = {
  instagram: {
    platform: "instagram",
    maxDurationSeconds: 90,
    width: 1080,
    height: 1920,
    videoCodec: "libx264",
    audioCodec: "aac",
    maxFileSizeMb: 100
  },
  tiktok: {
    platform: "tiktok",
    maxDurationSeconds: 180,
    width: 1080,
    height: 1920,
    videoCodec: "libx264",
    audioCodec: "aac",
    maxFileSizeMb: 287
  },
  youtube_shorts: {
    platform: "youtube_shorts",
    maxDurationSeconds: 60,
    width: 1080,
    height: 1920,
    videoCodec: "libx264",
    audioCodec: "aac",
    maxFileSizeMb: 256
  }
};

export function getPlatformSpec(platform: Platform): PlatformSpec {
  const spec = PLATFORM_SPECS[platform];
  if (!spec) {
    throw new ConfigurationError(`Unknown platform: ${String(platform)}.`);
  }
  return spec;
}
