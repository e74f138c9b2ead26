import { QualityPolicy } from "../../config/runtimeConfig.js";
import { Chunk, Citation, citationOf, MiniSummary, SummaryBlock, SummarySection } from "../../domain/models.js";
import { isIncompleteSentence, joinSentences, splitSentences } from "../../utils/text.js";
import { isLowInfoChunk } from "../../utils/textQuality.js";

export const MAX_SECTION_CITATIONS = 4;
export const MIN_KEYPOINTS = 5;
export const MAX_KEYPOINTS = 8;
export const COVERAGE_RATIO = 0.6;

export interface CitationFloors {
  minCitations: number;
  minUniquePages: number;
}

export interface SectionGroup {
  title: string;
  chunks: Chunk[];
}

export function distinctPages(chunks: readonly { page: number }[]): number[] {
  return [...new Set(chunks.map((chunk) => chunk.page))].sort((left, right) => left - right);
}

/** Both floors are 2, relaxed to 1 when the evidence spans fewer than 2 pages. */
export function citationFloors(selected: readonly Chunk[]): CitationFloors {
  const floor = distinctPages(selected).length >= 2 ? 2 : 1;
  return { minCitations: floor, minUniquePages: floor };
}

export function targetSectionCount(selected: readonly Chunk[]): number {
  return Math.min(6, Math.max(3, Math.floor((distinctPages(selected).length + 4) / 5)));
}

/**
 * Resegments text into complete sentences, backfills from `fallback` when short of `min` and
 * caps at `max`. Returns "" when nothing usable remains.
 */
export function normalizeParagraph(text: string, min: number, max: number, fallback: readonly string[]): string {
  const sentences = splitSentences(text).filter((sentence) => !isIncompleteSentence(sentence));

  if (sentences.length < min) {
    for (const candidate of fallback.flatMap((entry) => splitSentences(entry))) {
      if (sentences.length >= min) {
        break;
      }
      if (!isIncompleteSentence(candidate) && !sentences.includes(candidate)) {
        sentences.push(candidate);
      }
    }
  }

  return sentences.length > 0 ? joinSentences(sentences.slice(0, max)) : "";
}

export function sentencesFromMiniSummaries(summaries: readonly MiniSummary[]): string[] {
  const sentences: string[] = [];
  for (const summary of summaries) {
    for (const sentence of splitSentences(summary.miniSummary)) {
      if (!isIncompleteSentence(sentence) && !sentences.includes(sentence)) {
        sentences.push(sentence);
      }
    }
  }
  return sentences;
}

export function cleanKeypoint(value: string): string {
  return value
    .replace(/p\d+_c\d+/g, "")
    .replace(/[(（]\s*[)）]/g, "")
    .trim()
    .replace(/[。；;.\s]+$/, "")
    .trim();
}

export function normalizeKeypoints(raw: readonly string[], ...fallbacks: readonly (readonly string[])[]): string[] {
  const keypoints: string[] = [];
  const add = (value: string) => {
    const keypoint = cleanKeypoint(value);
    if (keypoint && !isIncompleteSentence(keypoint) && !keypoints.includes(keypoint)) {
      keypoints.push(keypoint);
    }
  };

  raw.forEach(add);
  for (const fallback of fallbacks) {
    for (const candidate of fallback) {
      if (keypoints.length >= MIN_KEYPOINTS) {
        break;
      }
      add(candidate);
    }
  }

  return keypoints.slice(0, MAX_KEYPOINTS);
}

export function dedupeCitationsByPage(citations: readonly Citation[], max = MAX_SECTION_CITATIONS): Citation[] {
  const seenPages = new Set<number>();
  const deduped: Citation[] = [];
  for (const citation of citations) {
    if (seenPages.has(citation.page)) {
      continue;
    }
    seenPages.add(citation.page);
    deduped.push(citation);
    if (deduped.length >= max) {
      break;
    }
  }
  return deduped;
}

/**
 * Adds ranked matches on new pages to the page-distinct base citations, up to `max`. Same-page
 * matches only top up when distinct pages cannot reach `min`.
 */
export function mergeCitations(
  base: readonly Citation[],
  matches: readonly Chunk[],
  min: number,
  max = MAX_SECTION_CITATIONS
): Citation[] {
  const merged = dedupeCitationsByPage(base, max);
  for (const chunk of matches) {
    if (merged.length >= max) {
      break;
    }
    if (!merged.some((citation) => citation.page === chunk.page)) {
      merged.push(citationOf(chunk));
    }
  }

  for (const chunk of matches) {
    if (merged.length >= min) {
      break;
    }
    if (!merged.some((citation) => citation.chunkId === chunk.chunkId)) {
      merged.push(citationOf(chunk));
    }
  }
  return merged;
}

/**
 * Groups the selected chunks by page ranges. When page ranges give fewer than three groups the
 * chunks themselves are split into groups instead.
 */
export function buildSectionGroups(selected: readonly Chunk[], target: number, policy: QualityPolicy): SectionGroup[] {
  const informative = selected.filter((chunk) => !isLowInfoChunk(chunk, policy));
  const pages = distinctPages(selected);
  if (pages.length === 0 || informative.length === 0) {
    return [];
  }

  const bucketSize = Math.max(1, Math.ceil(pages.length / target));
  const groups: SectionGroup[] = [];
  for (let index = 0; index < pages.length; index += bucketSize) {
    const bucketPages = pages.slice(index, index + bucketSize);
    const chunks = informative.filter((chunk) => bucketPages.includes(chunk.page));
    if (chunks.length > 0) {
      groups.push({ title: groupTitle(chunks, bucketPages), chunks });
    }
  }

  if (groups.length >= 3 || informative.length < 3) {
    return groups;
  }

  const groupSize = Math.ceil(informative.length / Math.min(target, informative.length));
  const chunkGroups: SectionGroup[] = [];
  for (let index = 0; index < informative.length; index += groupSize) {
    const chunks = informative.slice(index, index + groupSize);
    chunkGroups.push({ title: groupTitle(chunks, distinctPages(chunks)), chunks });
  }
  return chunkGroups;
}

function groupTitle(chunks: readonly Chunk[], pages: readonly number[]): string {
  const first = pages[0];
  const last = pages[pages.length - 1];
  return chunks[0].sectionTitle || (first === last ? `Page ${first}` : `Pages ${first}-${last}`);
}

/**
 * Appends sections until there are `min`, each reusing an existing section's citations with the
 * next two-sentence window of `sentences`.
 */
export function padSections(sections: readonly SummarySection[], min: number, sentences: readonly string[]): SummarySection[] {
  const padded = [...sections];
  for (let index = sections.length; sections.length > 0 && index < min; index += 1) {
    const source = sections[index % sections.length];
    const offset = (2 * index) % Math.max(1, sentences.length);
    const summary = normalizeParagraph("", 2, 2, [...sentences.slice(offset), ...sentences.slice(0, offset)]);
    padded.push({ title: `${source.title} (${index + 1})`, summary, citations: [...source.citations] });
  }
  return padded;
}

/**
 * When fewer than 60% of the selected pages are cited, injects one citation per uncovered page,
 * round-robin over the sections. Sections already holding four citations are skipped.
 */
export function ensureSectionCoverage(
  sections: readonly SummarySection[],
  selected: readonly Chunk[],
  policy: QualityPolicy
): SummarySection[] {
  const result = sections.map((section) => ({ ...section, citations: [...section.citations] }));
  const pages = distinctPages(selected);
  if (result.length === 0 || pages.length === 0) {
    return result;
  }

  const required = Math.max(1, Math.floor(pages.length * COVERAGE_RATIO));
  const covered = new Set(result.flatMap((section) => section.citations.map((citation) => citation.page)));
  if (covered.size >= required) {
    return result;
  }

  const missing = pages.filter((page) => !covered.has(page));
  missing.forEach((page, index) => {
    const chunk = selected.find((candidate) => candidate.page === page && !isLowInfoChunk(candidate, policy));
    const section = result[index % result.length];
    if (!chunk || section.citations.length >= MAX_SECTION_CITATIONS) {
      return;
    }
    if (!section.citations.some((citation) => citation.page === page)) {
      section.citations.push(citationOf(chunk));
    }
  });

  return result;
}

export function validateSummaryBlock(block: SummaryBlock, floors: CitationFloors): boolean {
  if (splitSentences(block.overview).length < 2) {
    return false;
  }
  if (block.sections.length < 3 || block.keypoints.length < MIN_KEYPOINTS) {
    return false;
  }

  return block.sections.every(
    (section) =>
      splitSentences(section.summary).length >= 2 &&
      section.citations.length >= floors.minCitations &&
      distinctPages(section.citations).length >= floors.minUniquePages
  );
}
