const STOP_WORDS = new Set([
  "about",
  "after",
  "again",
  "also",
  "because",
  "before",
  "between",
  "could",
  "every",
  "first",
  "from",
  "have",
  "into",
  "more",
  "must",
  "only",
  "other",
  "should",
  "some",
  "such",
  "than",
  "that",
  "their",
  "them",
  "then",
  "there",
  "these",
  "they",
  "this",
  "those",
  "through",
  "used",
  "using",
  "what",
  "when",
  "where",
  "which",
  "while",
  "with",
  "would"
]);

const INCOMPLETE_ENDINGS = [
  " and",
  " or",
  " but",
  " nor",
  " with",
  " of",
  " the",
  " an",
  " to",
  " via",
  " because",
  " such as",
  " including",
  " e.g",
  " i.e",
  "並",
  "以及",
  "而且",
  "且",
  "並且",
  "引進",
  "推行",
  "包含",
  "包括",
  "例如",
  "如",
  "等",
  "等等",
  "並將"
];

const DANGLING_PUNCTUATION = ["(", "（", "[", ":", "：", ",", "，", "、", "-", "—", "…"];

const WORD_TOKEN = /[\p{L}\p{N}_]+|[^\s\p{L}\p{N}_]/gu;
const WORD_OR_SPACE_TOKEN = /[\p{L}\p{N}_]+|[^\s\p{L}\p{N}_]|\s+/gu;

export function normalizeWhitespace(value: string): string {
  return value.replace(/\r/g, "\n").replace(/\t/g, " ").replace(/ {2,}/g, " ").trim();
}

/** Collapses every whitespace run, newlines included, to a single space. */
export function collapseWhitespace(value: string): string {
  return value.replace(/\u00a0/g, " ").replace(/\s+/g, " ").trim();
}

export function normalizeLine(line: string): string {
  return collapseWhitespace(line);
}

export function normalizeLines(text: string): string[] {
  return text
    .split(/\r?\n/)
    .map((line) => normalizeLine(line))
    .filter((line) => line.length > 0);
}

/**
 * Splits on sentence terminators, semicolons and newlines. Returned sentences carry no terminal
 * punctuation; joinSentences puts it back.
 */
export function splitSentences(text: string): string[] {
  return text
    .replace(/[;；]+/g, "\n")
    .split(/\n+|(?<=[.!?])\s+|(?<=[。！？])/)
    .map((sentence) => stripTerminal(sentence.trim()))
    .filter((sentence) => sentence.length > 0);
}

export function stripTerminal(sentence: string): string {
  return sentence.replace(/^[.!?。！？\s]+/, "").replace(/[.!?。！？\s]+$/, "");
}

export function joinSentences(sentences: string[]): string {
  return sentences
    .map((sentence) => `${sentence}${isCjk(sentence.charAt(sentence.length - 1)) ? "。" : "."}`)
    .join(" ")
    .replace(/。 /g, "。");
}

export function isIncompleteSentence(sentence: string): boolean {
  const trimmed = stripTerminal(sentence.trim());
  if (!trimmed) {
    return true;
  }

  const lower = ` ${trimmed.toLowerCase()}`;
  if (INCOMPLETE_ENDINGS.some((ending) => lower.endsWith(ending))) {
    return true;
  }
  if (DANGLING_PUNCTUATION.some((mark) => trimmed.endsWith(mark))) {
    return true;
  }

  return count(trimmed, "(") > count(trimmed, ")") || count(trimmed, "（") > count(trimmed, "）");
}

export function estimateTokens(text: string): number {
  return text.match(WORD_TOKEN)?.length ?? 0;
}

export function trimToTokens(text: string, maxTokens: number): string {
  if (maxTokens <= 0) {
    return text;
  }

  let counted = 0;
  const kept: string[] = [];
  for (const token of text.match(WORD_OR_SPACE_TOKEN) ?? []) {
    if (/^\s+$/.test(token)) {
      kept.push(token);
      continue;
    }
    counted += 1;
    if (counted > maxTokens) {
      break;
    }
    kept.push(token);
  }

  return kept.join("").trim();
}

export function textHead(text: string, maxChars: number): string {
  if (maxChars <= 0 || text.length <= maxChars) {
    return text;
  }
  return text.slice(0, maxChars).trimEnd();
}

export function extractKeywords(text: string, maxCount: number): string[] {
  const frequency = new Map<string, number>();
  const normalized = normalizeWhitespace(text).toLowerCase();
  const tokens = normalized
    .replace(/[^\p{L}\p{N}\s-]/gu, " ")
    .split(/\s+/)
    .map((token) => token.trim())
    .filter((token) => token.length >= 4 && !STOP_WORDS.has(token));

  for (const token of tokens) {
    frequency.set(token, (frequency.get(token) ?? 0) + 1);
  }

  return [...frequency.entries()]
    .sort((left, right) => right[1] - left[1])
    .slice(0, maxCount)
    .map(([keyword]) => keyword);
}

export function slugify(value: string): string {
  return value
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, "-")
    .replace(/^-+|-+$/g, "")
    .replace(/--+/g, "-");
}

export function createId(prefix: string, seed: string): string {
  const slug = slugify(seed) || "item";
  return `${prefix}-${slug}`;
}

export function uniqueStrings(values: Iterable<string>): string[] {
  return [...new Set(values)];
}

function isCjk(character: string): boolean {
  return /[\u3000-\u303f\u4e00-\u9fff\uff00-\uffef]/.test(character);
}

function count(text: string, character: string): number {
  return text.split(character).length - 1;
}
