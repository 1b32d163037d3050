import { GoogleGenAI } from "@google/genai";
import { z } from "zod";
import { PipelineError, formatError } from "../../domain/errors";
import type { HighlightCandidate, Transcript } from "../../domain/types";
import type { CallContext, HighlightDetectorPort } from "../../interfaces/ports";

export interface GeminiDetectorOptions {
  apiKey: string;
  model: string;
  minScore: number;
  temperature?: number;
}

type DetectContext = CallContext & {
  maxHighlights: number;
  minDurationSeconds: number;
  maxDurationSeconds: number;
  focusSpeaker?: string;
};

const responseSchema = z.object({
  highlights: z.array(
    z.object({
      start: z.coerce.number(),
      end: z.coerce.number(),
      virality_score: z.coerce.number(),
      suggested_title: z.string().optional().nullable(),
      reason: z.string().optional().nullable(),
      text: z.string().optional().nullable()
    })
  )
});

const PROMPT = `You are an expert in short-form social video. Below is a timestamped podcast transcript.

Find the {maxHighlights} strongest standalone moments that would work as reels on Instagram, TikTok or YouTube Shorts.

Rules:
- every moment must last between {minDuration} and {maxDuration} seconds
- prefer moments that teach something, explain an idea or give practical advice
- skip promotional content about the speakers' own services
- each moment must make sense without extra context
- rate each moment's virality from 1 to 10
- write the reason and the title in the transcript's language{focusRule}

Transcript:
{transcript}

Reply with JSON only:
{"highlights": [{"start": <seconds>, "end": <seconds>, "text": "<quote>", "virality_score": <1-10>, "reason": "<why it works>", "suggested_title": "<reel title>"}]}`;

export class GeminiHighlightDetector implements HighlightDetectorPort {
  private readonly ai: GoogleGenAI;

  constructor(private readonly options: GeminiDetectorOptions) {
    this.ai = new GoogleGenAI({ apiKey: options.apiKey });
  }

  async detect(transcript: Transcript, context: DetectContext): Promise<HighlightCandidate[]> {
    if (!transcript.segments.length) {
      return [];
    }

    const prompt = buildPrompt(transcript, context);
    let rawText: string | undefined;
    try {
      const response = await this.ai.models.generateContent({
        model: this.options.model,
        contents: prompt,
        config: {
          responseMimeType: "application/json",
          temperature: this.options.temperature ?? 0.7,
          abortSignal: context.signal
        }
      });
      rawText = response.text;
    } catch (error) {
      throw classifyGeminiError(error);
    }

    return parseHighlightResponse(rawText ?? "", this.options.minScore);
  }
}

export function buildPrompt(
  transcript: Transcript,
  context: Pick<DetectContext, "maxHighlights" | "minDurationSeconds" | "maxDurationSeconds" | "focusSpeaker">
) {
  const lines = transcript.segments.map((segment) => {
    const minutes = Math.floor(segment.startSeconds / 60);
    const seconds = Math.floor(segment.startSeconds % 60);
    const speaker = segment.speaker ? `(${segment.speaker}) ` : "";
    return `[${pad(minutes)}:${pad(seconds)}] ${speaker}${segment.text}`;
  });
  const focusRule = context.focusSpeaker ? `\n- prefer moments where (${context.focusSpeaker}) is the one speaking` : "";
  // Function replacers keep `$` sequences in transcript text literal.
  return PROMPT.replace("{maxHighlights}", () => String(context.maxHighlights))
    .replace("{minDuration}", () => String(context.minDurationSeconds))
    .replace("{maxDuration}", () => String(context.maxDurationSeconds))
    .replace("{focusRule}", () => focusRule)
    .replace("{transcript}", () => lines.join("\n"));
}

/** Parses the model's JSON reply; anything unusable is a retryable malformed-response. */
export function parseHighlightResponse(rawText: string, minScore: number): HighlightCandidate[] {
  const start = rawText.indexOf("{");
  const end = rawText.lastIndexOf("}");
  if (start === -1 || end <= start) {
    throw new PipelineError("Highlight reply contained no JSON object.", "malformed-response");
  }

  let json: unknown;
  try {
    json = JSON.parse(rawText.slice(start, end + 1));
  } catch (error) {
    throw new PipelineError(`Highlight reply is not valid JSON: ${formatError(error)}`, "malformed-response", { cause: error });
  }

  const parsed = responseSchema.safeParse(json);
  if (!parsed.success) {
    throw new PipelineError(`Highlight reply has an unexpected shape: ${parsed.error.issues[0]?.message ?? "invalid"}`, "malformed-response");
  }

  return parsed.data.highlights
    .filter((highlight) => highlight.virality_score >= minScore)
    .map((highlight) => ({
      startSeconds: highlight.start,
      endSeconds: highlight.end,
      viralityScore: highlight.virality_score,
      title: highlight.suggested_title ?? highlight.text?.slice(0, 60) ?? "",
      rationale: highlight.reason ?? ""
    }));
}

function classifyGeminiError(error: unknown) {
  const message = formatError(error);
  const status = readStatus(error);
  if (status === 429 || /RESOURCE_EXHAUSTED|rate limit/i.test(message)) {
    return new PipelineError(`Gemini rate limit: ${message}`, "rate-limit", { cause: error });
  }
  if (error instanceof Error && error.name === "AbortError") {
    return new PipelineError("Gemini request aborted.", "cancelled", { cause: error });
  }
  return new PipelineError(`Gemini request failed: ${message}`, "model-error", { cause: error });
}

function readStatus(error: unknown) {
  if (typeof error === "object" && error !== null && "status" in error && typeof error.status === "number") {
    return error.status;
  }
  return null;
}

function pad(value: number) {
  return value.toString().padStart(2, "0");
}
