import { describe, expect, it } from "vitest";
import { ConfigurationError } from "../../src/domain/errors";
import { parseRunRequest } from "../../src/application/runRequest";

describe("parseRunRequest", () => {
  it("fills in defaults", () => {
    expect(parseRunRequest({ input: "  episode.mp4 " })).toEqual({
      input: "episode.mp4",
      maxReels: 5,
      speedUpAudio: true,
      targetPlatforms: ["instagram", "tiktok", "youtube_shorts"],
      minDurationSeconds: 30,
      maxDurationSeconds: 90,
      paddingBeforeSeconds: 0,
      paddingAfterSeconds: 0,
      language: "he",
      workerCount: 2,
      retainArtifacts: false
    });
  });

  it("coerces numeric strings and collapses duplicate platforms", () => {
    const options = parseRunRequest({
      input: "episode.mp4",
      maxReels: "3",
      targetPlatforms: ["tiktok", "instagram", "tiktok"],
      minDurationSeconds: "20",
      workerCount: "4"
    });

    expect(options.maxReels).toBe(3);
    expect(options.minDurationSeconds).toBe(20);
    expect(options.workerCount).toBe(4);
    expect(options.targetPlatforms).toEqual(["tiktok", "instagram"]);
  });

  it("keeps a trimmed focus speaker", () => {
    expect(parseRunRequest({ input: "episode.mp4", focusSpeaker: " Speaker B " }).focusSpeaker).toBe("Speaker B");
    expect(parseRunRequest({ input: "episode.mp4" })).not.toHaveProperty("focusSpeaker");
  });

  it.each([
    [{ input: "episode.mp4", maxReels: 0 }, /maxReels/],
    [{ input: "episode.mp4", maxReels: 2.5 }, /maxReels/],
    [{ input: "episode.mp4", targetPlatforms: [] }, /targetPlatforms: at least one target platform is required/],
    [{ input: "episode.mp4", targetPlatforms: ["vimeo"] }, /targetPlatforms\.0/],
    [{ input: "episode.mp4", minDurationSeconds: 100, maxDurationSeconds: 60 }, /minDurationSeconds: minDurationSeconds must not exceed maxDurationSeconds/],
    [{ input: "" }, /input: input path or URL is required/],
    [null, /request/]
  ])("rejects %j", (request, message) => {
    expect(() => parseRunRequest(request)).toThrow(ConfigurationError);
    expect(() => parseRunRequest(request)).toThrow(message);
  });
});
