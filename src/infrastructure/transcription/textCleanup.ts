const NIQQUD = /[\u0591-\u05C7]/g;
const HEBREW_CHAR = /[\u0590-\u05FF]/;
const RLM = "\u200F";

export function cleanTranscriptText(text: string) {
  return text.replace(NIQQUD, "").replace(/\s+/g, " ").trim();
}

/** Greedy word wrap; a single word longer than the limit keeps its own line. */
export function splitLines(text: string, maxChars: number) {
  const lines: string[] = [];
  let current = "";
  for (const word of text.split(" ").filter(Boolean)) {
    if (!current) {
      current = word;
    } else if (current.length + word.length + 1 <= maxChars) {
      current = `${current} ${word}`;
    } else {
      lines.push(current);
      current = word;
    }
  }
  if (current) {
    lines.push(current);
  }
  return lines;
}

export function isMostlyHebrew(text: string) {
  const letters = [...text].filter((char) => char.trim());
  if (!letters.length) {
    return false;
  }
  const hebrew = letters.filter((char) => HEBREW_CHAR.test(char)).length;
  return hebrew / letters.length > 0.3;
}

export function wrapRtl(line: string) {
  return `${RLM}${line}${RLM}`;
}
