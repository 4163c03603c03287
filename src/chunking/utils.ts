export function splitIntoWords(text: string): string[] {
  return text.replace(/\s+/g, " ").trim().split(" ").filter(Boolean);
}

export function countWords(text: string): number {
  return splitIntoWords(text).length;
}

/**
 * Splits text on sentence-ending punctuation (`.`, `!`, `?`) followed by
 * whitespace. The punctuation stays with its sentence.
 *
 * This is a regex heuristic: abbreviations such as "Dr. Smith" or ellipses
 * will produce extra splits.
 */
export function splitSentences(text: string): string[] {
  return text
    .trim()
    .split(/(?<=[.!?])\s+/)
    .map((s) => s.trim())
    .filter(Boolean);
}
