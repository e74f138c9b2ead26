import { AgentRuntime } from "../../agents/runtime/agentRuntime.js";
import { AgentStageResult, StageRecorder } from "../../agents/runtime/stageResult.js";
import { RuntimeConfig } from "../../config/runtimeConfig.js";
import { Chunk, ChunkLookup, Citation, citationOf, MiniSummary, SummaryBlock, SummarySection } from "../../domain/models.js";
import { normalizeSummaryDraft, SectionDraft, SummaryDraft } from "../../domain/normalize.js";
import { isIncompleteSentence, splitSentences, uniqueStrings } from "../../utils/text.js";
import { filterInformativeChunks } from "../../utils/textQuality.js";
import { formatMiniSummaries } from "../evidence/evidenceContext.js";
import { EvidenceIndex } from "../evidence/evidenceIndex.js";
import {
  buildSectionGroups,
  citationFloors,
  dedupeCitationsByPage,
  ensureSectionCoverage,
  MAX_SECTION_CITATIONS,
  mergeCitations,
  normalizeKeypoints,
  normalizeParagraph,
  padSections,
  sentencesFromMiniSummaries,
  targetSectionCount,
  validateSummaryBlock
} from "./summaryRules.js";

const REDUCE_SYSTEM_PROMPT = [
  "You write a study summary of lecture material from per-excerpt mini summaries.",
  "Use only facts present in the mini summaries. Do not add outside knowledge.",
  "The overview has 2-3 complete sentences.",
  "Each section has a short title, a summary of 2-4 complete sentences and 2-4 citations from different pages.",
  "Keypoints are 5-8 short standalone statements without citation markers.",
  "Return only JSON.",
  "Output schema:",
  "{",
  '  "overview": string,',
  '  "sections": [{ "title": string, "summary": string, "citations": [{ "page": number, "chunkId": string }] }],',
  '  "keypoints": string[]',
  "}"
].join("\n");

const SECTION_SEARCH_K = 6;
const CITATION_SEARCH_K = Math.max(8, MAX_SECTION_CITATIONS * 2);

export interface ReduceInput {
  miniSummaries: readonly MiniSummary[];
  selected: readonly Chunk[];
  index: EvidenceIndex;
  lookup: ChunkLookup;
}

export interface ReduceArtifact {
  summary: SummaryBlock;
  attempts: number;
  fallbackUsed: boolean;
}

export class ReduceSummarizer {
  constructor(
    private readonly runtime: AgentRuntime,
    private readonly config: RuntimeConfig
  ) {}

  async summarize(input: ReduceInput): Promise<AgentStageResult<ReduceArtifact>> {
    const recorder = new StageRecorder();
    const floors = citationFloors(input.selected);
    const maxAttempts = this.config.pipeline.summaryRetries + 1;
    const userPrompt = this.buildUserPrompt(input);

    for (let attempt = 1; attempt <= maxAttempts; attempt += 1) {
      const draft = recorder.record(
        await this.runtime.runJson<SummaryDraft | null>({
          stage: "reduce-summary",
          agentName: `reduce-attempt-${attempt}`,
          systemPrompt: REDUCE_SYSTEM_PROMPT,
          userPrompt,
          parse: (value) => normalizeSummaryDraft(value, input.lookup),
          fallback: () => null,
          timeoutMs: this.config.reduceTimeoutMs
        })
      );

      if (!draft) {
        continue;
      }

      const block = await this.normalizeDraft(draft, input);
      if (validateSummaryBlock(block, floors)) {
        console.log(`[reduce] Summary accepted on attempt ${attempt}`);
        return recorder.finish({ summary: block, attempts: attempt, fallbackUsed: false });
      }
      console.warn(`[reduce] Summary attempt ${attempt} failed validation`);
    }

    console.warn("[reduce] Falling back to the extractive summary");
    const summary = await this.buildFallbackSummary(input);
    return recorder.finish({ summary, attempts: maxAttempts, fallbackUsed: true });
  }

  /**
   * Deterministic summary built only from mini-summary sentences and the selected chunks. Too
   * few section groups are padded with further sentence windows so the block always has three
   * sections.
   */
  async buildFallbackSummary(input: ReduceInput): Promise<SummaryBlock> {
    // Chunk sentences only backfill once the mini-summary sentences run out.
    const sentences = uniqueStrings([
      ...sentencesFromMiniSummaries(input.miniSummaries),
      ...filterInformativeChunks(input.selected, this.config.quality).flatMap((chunk) =>
        splitSentences(chunk.text).filter((sentence) => !isIncompleteSentence(sentence))
      )
    ]);
    const byChunkId = new Map(input.miniSummaries.map((summary) => [summary.chunkId, summary]));
    const floors = citationFloors(input.selected);
    const target = targetSectionCount(input.selected);
    const sections: SummarySection[] = [];

    for (const group of buildSectionGroups(input.selected, target, this.config.quality)) {
      const groupSentences = sentencesFromMiniSummaries(
        group.chunks.flatMap((chunk) => {
          const summary = byChunkId.get(chunk.chunkId);
          return summary ? [summary] : [];
        })
      );
      const summary = normalizeParagraph("", 2, 4, [...groupSentences, ...sentences]);
      if (!summary) {
        continue;
      }

      const citations = await this.completeCitations(
        group.chunks.map(citationOf),
        `${group.title} ${summary}`,
        floors.minCitations,
        input.index
      );
      sections.push({ title: group.title, summary, citations });
      if (sections.length >= target) {
        break;
      }
    }

    const keywords = uniqueStrings(input.miniSummaries.flatMap((summary) => summary.keywords));
    return {
      overview: normalizeParagraph("", 2, 3, sentences),
      sections: ensureSectionCoverage(padSections(sections, 3, sentences), input.selected, this.config.quality),
      keypoints: normalizeKeypoints([], sentences, keywords)
    };
  }

  private async normalizeDraft(draft: SummaryDraft, input: ReduceInput): Promise<SummaryBlock> {
    const sentences = sentencesFromMiniSummaries(input.miniSummaries);
    const sections: SummarySection[] = [];
    const target = targetSectionCount(input.selected);

    for (const raw of draft.sections) {
      const section = await this.normalizeSection(raw, input);
      if (section) {
        sections.push(section);
      }
      if (sections.length >= target) {
        break;
      }
    }

    return {
      overview: normalizeParagraph(draft.overview, 2, 3, sentences),
      sections: ensureSectionCoverage(sections, input.selected, this.config.quality),
      keypoints: normalizeKeypoints(draft.keypoints, sentences)
    };
  }

  private async normalizeSection(raw: SectionDraft, input: ReduceInput): Promise<SummarySection | null> {
    const query = `${raw.title} ${raw.summary}`.trim();
    const matches = query
      ? filterInformativeChunks(await input.index.search(query, SECTION_SEARCH_K), this.config.quality)
      : [];
    const byChunkId = new Map(input.miniSummaries.map((summary) => [summary.chunkId, summary]));
    const fallbackSentences = sentencesFromMiniSummaries(
      matches.flatMap((chunk) => {
        const summary = byChunkId.get(chunk.chunkId);
        return summary ? [summary] : [];
      })
    );

    const summary = normalizeParagraph(raw.summary, 2, 4, fallbackSentences);
    if (!summary) {
      return null;
    }

    const title = raw.title || matches[0]?.sectionTitle || (matches[0] ? `Page ${matches[0].page}` : "Key ideas");
    const citations = await this.completeCitations(raw.citations, query || summary, 2, input.index);
    return { title, summary, citations };
  }

  /** Page-distinct citations, backfilled by a retrieval query when fewer than `min` remain. */
  private async completeCitations(
    citations: readonly Citation[],
    query: string,
    min: number,
    index: EvidenceIndex
  ): Promise<Citation[]> {
    const deduped = dedupeCitationsByPage(citations);
    if (deduped.length >= min) {
      return deduped;
    }

    const matches = filterInformativeChunks(await index.search(query, CITATION_SEARCH_K), this.config.quality);
    return mergeCitations(deduped, matches, min);
  }

  private buildUserPrompt(input: ReduceInput): string {
    return [
      `Target sections: ${targetSectionCount(input.selected)}`,
      "Mini summaries:",
      formatMiniSummaries(
        input.miniSummaries,
        this.config.pipeline.summaryBudgetTokens,
        this.config.pipeline.maxInputChars
      )
    ].join("\n");
  }
}

