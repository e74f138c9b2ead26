import { QualityPolicy } from "../config/runtimeConfig.js";
import { Chunk } from "../domain/models.js";
import { collapseWhitespace, normalizeLines } from "./text.js";

const ALLOWED_CHARACTER =
  /[A-Za-z0-9\u4e00-\u9fff\u3000-\u303f\uff00-\uffef。，、；：？！「」『』（）()《》“”"'’‘—–\-…·•.,;:!?%\/\s]/;

const SECTION_TITLE_PATTERNS = [
  /^第\s*\d+\s*[章節篇].*/,
  /^\d+\.\d+(\.\d+)?\s+.+/,
  /^[•▌■◆▍▶►]\s*\S+/
];

export function allowedCharRatio(text: string): number {
  if (!text) {
    return 0;
  }

  let allowed = 0;
  for (const character of text) {
    if (ALLOWED_CHARACTER.test(character)) {
      allowed += 1;
    }
  }
  return allowed / [...text].length;
}

export function isLowInfoLine(line: string): boolean {
  if (!line) {
    return true;
  }

  const lower = line.toLowerCase().trim();
  if (["note", "notes", "page"].includes(lower)) {
    return true;
  }
  if (/^\d+$/.test(line) || line.length <= 2) {
    return true;
  }
  if (line.length > 5 && new Set(line).size / line.length < 0.2) {
    return true;
  }

  const wordCharacters = line.match(/[\p{L}\p{N}_]/gu)?.length ?? 0;
  if (wordCharacters / line.length < 0.3) {
    return true;
  }

  return /[-_=~]{4,}/.test(line) || /[*•·]{3,}/.test(line);
}

export function isNoisyLine(line: string, policy: QualityPolicy): boolean {
  if (line.includes("\ufffd")) {
    return true;
  }
  if (/[\x00-\x08\x0b-\x1f]/.test(line)) {
    return true;
  }
  return line.length >= 8 && allowedCharRatio(line) < policy.noisyLineMinAllowedRatio;
}

export function detectSectionTitle(line: string): string | null {
  if (SECTION_TITLE_PATTERNS.some((pattern) => pattern.test(line))) {
    return line;
  }

  const isUpperCase = line === line.toUpperCase() && line !== line.toLowerCase();
  if (isUpperCase && line.length >= 3 && line.length <= 30) {
    return line;
  }

  return null;
}

/**
 * Body lines of a chunk: the leading heading and every low-information, noisy or heading line
 * are removed.
 */
export function chunkBodyLines(chunk: Chunk, policy: QualityPolicy): string[] {
  let lines = normalizeLines(chunk.text);
  if (lines.length > 0 && (detectSectionTitle(lines[0]) || (chunk.sectionTitle && lines[0] === chunk.sectionTitle))) {
    lines = lines.slice(1);
  }

  return lines.filter(
    (line) => !isLowInfoLine(line) && !isNoisyLine(line, policy) && !detectSectionTitle(line)
  );
}

export function isLowInfoChunk(chunk: Chunk, policy: QualityPolicy): boolean {
  const lines = chunkBodyLines(chunk, policy);
  if (lines.length === 0) {
    return true;
  }

  const body = lines.join(" ");
  return body.length < policy.lowInfoChunkMinChars || allowedCharRatio(body) < policy.lowInfoChunkMinAllowedRatio;
}

export function filterInformativeChunks<T extends Chunk>(chunks: readonly T[], policy: QualityPolicy): T[] {
  return chunks.filter((chunk) => !isLowInfoChunk(chunk, policy));
}

/**
 * Picks a verbatim quote from the chunk body: a line of preferred length first, then any line of
 * the minimum length, then the joined body. Returns "" when nothing qualifies.
 */
export function extractQuote(chunk: Chunk, policy: QualityPolicy): string {
  const lines = chunkBodyLines(chunk, policy);
  const clean = (text: string) => allowedCharRatio(text) >= policy.quoteMinAllowedRatio;
  const cut = (text: string) => text.slice(0, policy.quoteMaxChars).trimEnd();

  for (const minLength of [policy.quotePreferredChars, policy.quoteMinChars]) {
    const line = lines.find((candidate) => candidate.length >= minLength && clean(candidate));
    if (line && cut(line).length >= policy.quoteMinChars) {
      return cut(line);
    }
  }

  // The joined body only counts when it is still contiguous in the chunk text.
  const body = lines.join(" ").trim();
  if (body.length >= policy.quoteMinChars && clean(body) && collapseWhitespace(chunk.text).includes(cut(body))) {
    return cut(body);
  }

  return "";
}

export function isAcceptableQuote(quote: string, policy: QualityPolicy): boolean {
  const text = quote.trim();
  return (
    text.length >= policy.quoteMinChars &&
    text.length <= policy.quoteMaxChars &&
    allowedCharRatio(text) >= policy.quoteMinAllowedRatio &&
    !isNoisyLine(text, policy)
  );
}
