import { promises as fs } from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, describe, expect, it } from "vitest";
import { formatTime, parseSrt, toSrt } from "../../src/infrastructure/transcription/srt";
import { SrtSubtitleGenerator, buildCues } from "../../src/infrastructure/transcription/subtitles";
import { cleanTranscriptText, splitLines } from "../../src/infrastructure/transcription/textCleanup";

const segment = (startSeconds: number, endSeconds: number, text: string) => ({ startSeconds, endSeconds, text, confidence: null });

describe("srt", () => {
  it("formats timestamps", () => {
    expect(formatTime(3661.5)).toBe("01:01:01,500");
    expect(formatTime(0.0004)).toBe("00:00:00,000");
    expect(formatTime(-3)).toBe("00:00:00,000");
  });

  it("writes and reads cues", () => {
    const srt = toSrt([
      { startSeconds: 0, endSeconds: 1.5, text: "Hello" },
      { startSeconds: 2, endSeconds: 3, text: "World" }
    ]);

    expect(srt).toBe("1\n00:00:00,000 --> 00:00:01,500\nHello\n\n2\n00:00:02,000 --> 00:00:03,000\nWorld\n");
    expect(parseSrt(srt, "en")).toEqual({
      language: "en",
      segments: [segment(0, 1.5, "Hello"), segment(2, 3, "World")]
    });
  });

  it("joins multi-line cue text when parsing", () => {
    const transcript = parseSrt("1\r\n00:01:00.250 --> 00:01:02,000\r\nfirst line\r\nsecond line\r\n", "en");
    expect(transcript.segments).toEqual([segment(60.25, 62, "first line second line")]);
  });
});

describe("subtitle text", () => {
  it("strips niqqud and collapses whitespace", () => {
    expect(cleanTranscriptText("  \u05E9\u05C1\u05B8\u05DC\u05D5\u05B9\u05DD   world \n")).toBe("\u05E9\u05DC\u05D5\u05DD world");
  });

  it("wraps words greedily at the line limit", () => {
    expect(splitLines("one two three four", 10)).toEqual(["one two", "three four"]);
    expect(splitLines("extraordinarily long", 5)).toEqual(["extraordinarily", "long"]);
  });

  it("builds cues, skipping empty and inverted segments", () => {
    const cues = buildCues(
      [segment(0, 2, "  one two three four "), segment(2, 2, "zero length"), segment(3, 4, "   "), segment(4, 6, "\u05E9\u05DC\u05D5\u05DD \u05E2\u05D5\u05DC\u05DD")],
      10
    );

    expect(cues).toEqual([
      { startSeconds: 0, endSeconds: 2, text: "one two\nthree four" },
      { startSeconds: 4, endSeconds: 6, text: "\u200F\u05E9\u05DC\u05D5\u05DD \u05E2\u05D5\u05DC\u05DD\u200F" }
    ]);
  });
});

describe("SrtSubtitleGenerator", () => {
  let dir: string | null = null;

  afterEach(async () => {
    if (dir) {
      await fs.rm(dir, { recursive: true, force: true });
      dir = null;
    }
  });

  it("writes the track to the requested path", async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "reel-subs-"));
    const outputPath = path.join(dir, "nested", "subtitles.srt");
    const generator = new SrtSubtitleGenerator();

    const track = await generator.generate([segment(0, 1.5, "Hello")], {
      runId: "run-1",
      signal: new AbortController().signal,
      clipId: "highlight-0-clip",
      outputPath
    });

    expect(track).toEqual({
      clipId: "highlight-0-clip",
      path: outputPath,
      cues: [{ startSeconds: 0, endSeconds: 1.5, text: "Hello" }]
    });
    expect(await fs.readFile(outputPath, "utf-8")).toBe("1\n00:00:00,000 --> 00:00:01,500\nHello\n");
  });
});
