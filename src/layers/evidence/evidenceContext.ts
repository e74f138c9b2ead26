import { Chunk, MiniSummary } from "../../domain/models.js";
import { estimateTokens, trimToTokens } from "../../utils/text.js";

/**
 * Serializes chunks for a prompt. Chunks are taken front to back until the token or character
 * budget runs out; the first entry is always kept.
 */
export function formatEvidence(chunks: readonly Chunk[], maxTokens: number, maxChars: number): string {
  const entries: Array<{ chunkId: string; page: number; sectionTitle: string; text: string }> = [];
  let totalTokens = 0;
  let totalChars = 0;

  for (const chunk of chunks) {
    const remainingTokens = maxTokens - totalTokens;
    if (remainingTokens <= 0) {
      break;
    }

    const text = trimToTokens(chunk.text, remainingTokens);
    const entry = { chunkId: chunk.chunkId, page: chunk.page, sectionTitle: chunk.sectionTitle, text };
    const serialized = JSON.stringify(entry);
    if (maxChars > 0 && totalChars + serialized.length > maxChars && entries.length > 0) {
      break;
    }

    entries.push(entry);
    totalTokens += estimateTokens(text);
    totalChars += serialized.length;
    if (maxChars > 0 && totalChars >= maxChars) {
      break;
    }
  }

  return JSON.stringify(entries, null, 2);
}

export function formatMiniSummaries(summaries: readonly MiniSummary[], maxTokens: number, maxChars: number): string {
  const entries: Array<Pick<MiniSummary, "miniSummary" | "keywords" | "citations">> = [];
  let totalTokens = 0;
  let totalChars = 0;

  for (const summary of summaries) {
    const entry = { miniSummary: summary.miniSummary, keywords: summary.keywords, citations: summary.citations };
    const serialized = JSON.stringify(entry);
    const tokens = estimateTokens(serialized);

    if (maxTokens > 0 && totalTokens + tokens > maxTokens && entries.length > 0) {
      break;
    }
    if (maxChars > 0 && totalChars + serialized.length > maxChars && entries.length > 0) {
      break;
    }

    entries.push(entry);
    totalTokens += tokens;
    totalChars += serialized.length;
  }

  return JSON.stringify(entries, null, 2);
}
