import { describe, expect, it } from "vitest";
import type { Transcript } from "../../src/domain/types";
import { rescaleTranscript, sliceTranscript } from "../../src/application/transcript";

const segment = (startSeconds: number, endSeconds: number, text: string) => ({ startSeconds, endSeconds, text, confidence: 0.9 });

describe("transcript timing", () => {
  it("rescales sped-up timestamps back to source time in start order", () => {
    const transcript: Transcript = { language: "he", segments: [segment(5, 10, "b"), segment(0, 5, "a")] };

    expect(rescaleTranscript(transcript, 2)).toEqual({
      language: "he",
      segments: [segment(0, 10, "a"), segment(10, 20, "b")]
    });
  });

  it("leaves timestamps alone at normal speed", () => {
    const transcript: Transcript = { language: "en", segments: [segment(1.5, 3, "a")] };
    expect(rescaleTranscript(transcript, 1).segments).toEqual([segment(1.5, 3, "a")]);
  });

  it("slices overlapping segments into clip-local time", () => {
    const transcript: Transcript = {
      language: "en",
      segments: [segment(0, 10, "a"), segment(10, 20, "b"), segment(20, 30, "c"), segment(30, 40, "d")]
    };

    expect(sliceTranscript(transcript, 5, 25)).toEqual([segment(0, 5, "a"), segment(5, 15, "b"), segment(15, 20, "c")]);
  });

  it("excludes segments that only touch the clip bounds", () => {
    const transcript: Transcript = { language: "en", segments: [segment(0, 10, "a"), segment(20, 30, "b")] };
    expect(sliceTranscript(transcript, 10, 20)).toEqual([]);
  });
});
