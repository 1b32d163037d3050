import type { SubtitleCue, Transcript, TranscriptSegment } from "../../domain/types";

export function parseSrt(srt: string, language: string): Transcript {
  const blocks = srt.split(/\r?\n\r?\n/).filter((block) => block.trim());
  const segments: TranscriptSegment[] = [];
  for (const block of blocks) {
    const lines = block.split(/\r?\n/).filter(Boolean);
    if (lines.length < 2) {
      continue;
    }
    const timeIndex = lines[1].includes("-->") ? 1 : 0;
    const [startRaw, endRaw] = lines[timeIndex].split("-->").map((s) => s.trim());
    if (!startRaw || !endRaw) {
      continue;
    }
    segments.push({
      startSeconds: parseTime(startRaw),
      endSeconds: parseTime(endRaw),
      text: lines.slice(timeIndex + 1).join(" "),
      confidence: null
    });
  }
  return { language, segments };
}

export function toSrt(cues: SubtitleCue[]): string {
  return cues
    .map((cue, index) => {
      const start = formatTime(cue.startSeconds);
      const end = formatTime(cue.endSeconds);
      return `${index + 1}\n${start} --> ${end}\n${cue.text}\n`;
    })
    .join("\n");
}

function parseTime(value: string) {
  const [time, msRaw] = value.split(/,|\./);
  const parts = time.split(":").map((part) => Number(part));
  const [hours, minutes, seconds] = parts.length === 3 ? parts : [0, parts[0], parts[1]];
  const ms = Number(msRaw ?? 0);
  return hours * 3600 + minutes * 60 + seconds + ms / 1000;
}

export function formatTime(seconds: number) {
  const totalMs = Math.max(0, Math.round(seconds * 1000));
  const hrs = Math.floor(totalMs / 3_600_000);
  const mins = Math.floor((totalMs % 3_600_000) / 60_000);
  const secs = Math.floor((totalMs % 60_000) / 1000);
  const ms = totalMs % 1000;
  return `${pad(hrs)}:${pad(mins)}:${pad(secs)},${pad(ms, 3)}`;
}

function pad(value: number, size = 2) {
  return value.toString().padStart(size, "0");
}
