import { promises as fs } from "node:fs";
import path from "node:path";
import { PipelineError, formatError } from "../../domain/errors";
import type { SubtitleCue, SubtitleTrack, TranscriptSegment } from "../../domain/types";
import type { CallContext, SubtitleGeneratorPort } from "../../interfaces/ports";
import { toSrt } from "./srt";
import { cleanTranscriptText, isMostlyHebrew, splitLines, wrapRtl } from "./textCleanup";

const MAX_CHARS_PER_LINE = 42;

export class SrtSubtitleGenerator implements SubtitleGeneratorPort {
  constructor(private readonly maxCharsPerLine = MAX_CHARS_PER_LINE) {}

  async generate(segments: TranscriptSegment[], context: CallContext & { clipId: string; outputPath: string }): Promise<SubtitleTrack> {
    const cues = buildCues(segments, this.maxCharsPerLine);
    try {
      await fs.mkdir(path.dirname(context.outputPath), { recursive: true });
      await fs.writeFile(context.outputPath, toSrt(cues), "utf-8");
    } catch (error) {
      throw new PipelineError(`Failed to write subtitles for ${context.clipId}: ${formatError(error)}`, "encoding-error", {
        cause: error
      });
    }
    return { clipId: context.clipId, path: context.outputPath, cues };
  }
}

export function buildCues(segments: TranscriptSegment[], maxCharsPerLine = MAX_CHARS_PER_LINE): SubtitleCue[] {
  const cues: SubtitleCue[] = [];
  for (const segment of segments) {
    const text = cleanTranscriptText(segment.text);
    if (!text || segment.endSeconds <= segment.startSeconds) {
      continue;
    }
    const rtl = isMostlyHebrew(text);
    const lines = splitLines(text, maxCharsPerLine).map((line) => (rtl ? wrapRtl(line) : line));
    cues.push({ startSeconds: segment.startSeconds, endSeconds: segment.endSeconds, text: lines.join("\n") });
  }
  return cues;
}
