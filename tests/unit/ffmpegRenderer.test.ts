import { describe, expect, it } from "vitest";
import { getPlatformSpec } from "../../src/domain/platforms";
import {
  FfmpegClipExtractor,
  buildCrop,
  buildSubtitleFilter,
  escapeForFfmpeg
} from "../../src/infrastructure/render/ffmpegRenderer";
import { video } from "../support/fakes";

describe("ffmpeg rendering helpers", () => {
  const vertical = getPlatformSpec("tiktok");

  it("centre-crops landscape video to 9:16", () => {
    expect(buildCrop(1920, 1080, vertical)).toEqual({ width: 607, height: 1080, x: 656, y: 0 });
  });

  it("keeps portrait video whole", () => {
    expect(buildCrop(1080, 1920, vertical)).toEqual({ width: 1080, height: 1920, x: 0, y: 0 });
  });

  it("crops the height of video narrower than 9:16", () => {
    expect(buildCrop(720, 1920, vertical)).toEqual({ width: 720, height: 1280, x: 0, y: 320 });
  });

  it("escapes paths for filter arguments", () => {
    expect(escapeForFfmpeg("C:\\clips\\it's.srt")).toBe("C\\:\\\\clips\\\\it\\'s.srt");
    expect(buildSubtitleFilter("/tmp/a.srt")).toBe(
      "subtitles='/tmp/a.srt':force_style='Fontsize=48,PrimaryColour=&HFFFFFF&,OutlineColour=&H000000&,BorderStyle=3,Outline=2,Shadow=1,Alignment=2,MarginV=120'"
    );
  });

  it("refuses to cut outside the source", async () => {
    const extractor = new FfmpegClipExtractor();
    const context = {
      runId: "run-1",
      signal: new AbortController().signal,
      clipId: "highlight-0-clip",
      selectedHighlightId: "highlight-0",
      outputPath: "/tmp/never-written.mp4"
    };

    await expect(extractor.cut(video, 280, 320, context)).rejects.toMatchObject({ kind: "out-of-range" });
    await expect(extractor.cut(video, 40, 40, context)).rejects.toMatchObject({ kind: "out-of-range" });
  });
});

describe("platform table", () => {
  it("describes each target platform", () => {
    expect(getPlatformSpec("instagram")).toMatchObject({ maxDurationSeconds: 90, maxFileSizeMb: 100, width: 1080, height: 1920 });
    expect(getPlatformSpec("tiktok")).toMatchObject({ maxDurationSeconds: 180, maxFileSizeMb: 287 });
    expect(getPlatformSpec("youtube_shorts")).toMatchObject({ maxDurationSeconds: 60, maxFileSizeMb: 256 });
  });
});
