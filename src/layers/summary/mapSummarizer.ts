import { AgentRuntime } from "../../agents/runtime/agentRuntime.js";
import { AgentStageResult, StageRecorder } from "../../agents/runtime/stageResult.js";
import { RuntimeConfig } from "../../config/runtimeConfig.js";
import { Chunk, ChunkLookup, citationOf, MiniSummary } from "../../domain/models.js";
import { normalizeMiniSummary } from "../../domain/normalize.js";
import { mapInPool } from "../../utils/concurrency.js";
import { collapseWhitespace, extractKeywords, textHead, trimToTokens } from "../../utils/text.js";
import { chunkBodyLines } from "../../utils/textQuality.js";

const MINI_SUMMARY_FALLBACK_CHARS = 120;

const MAP_SYSTEM_PROMPT = [
  "You summarize one excerpt of lecture material for a study guide.",
  "Use only facts stated in the excerpt. Do not add outside knowledge.",
  "Write 1-2 complete sentences in the language of the excerpt.",
  "Return only JSON.",
  "Output schema:",
  "{",
  '  "miniSummary": string,',
  '  "keywords": string[2..5],',
  '  "citations": [{ "page": number, "chunkId": string }]',
  "}"
].join("\n");

export class MapSummarizer {
  constructor(
    private readonly runtime: AgentRuntime,
    private readonly config: RuntimeConfig
  ) {}

  async summarize(chunks: readonly Chunk[], lookup: ChunkLookup): Promise<AgentStageResult<MiniSummary[]>> {
    console.log(`[map] Summarizing ${chunks.length} chunk(s)`);
    const recorder = new StageRecorder();

    const summaries = await mapInPool(chunks, { concurrency: this.config.mapConcurrency }, async (chunk) => {
      const run = await this.runtime.runJson<MiniSummary>({
        stage: "map-summary",
        agentName: `map-${chunk.chunkId}`,
        systemPrompt: MAP_SYSTEM_PROMPT,
        userPrompt: this.buildUserPrompt(chunk),
        parse: (value) => normalizeMiniSummary(value, chunk, lookup),
        fallback: () => ({
          page: chunk.page,
          chunkId: chunk.chunkId,
          miniSummary: "",
          keywords: [],
          citations: [citationOf(chunk)]
        })
      });

      return this.complete(recorder.record(run), chunk);
    });

    console.log(`[map] Mini summaries: ${summaries.length}`);
    return recorder.finish(summaries);
  }

  private buildUserPrompt(chunk: Chunk): string {
    return JSON.stringify(
      {
        page: chunk.page,
        chunkId: chunk.chunkId,
        sectionTitle: chunk.sectionTitle,
        text: trimToTokens(textHead(chunk.text, this.config.pipeline.maxInputChars), this.config.pipeline.evidenceBudgetTokens)
      },
      null,
      2
    );
  }

  private complete(summary: MiniSummary, chunk: Chunk): MiniSummary {
    const body = chunkBodyLines(chunk, this.config.quality).join(" ") || collapseWhitespace(chunk.text);

    return {
      ...summary,
      miniSummary: summary.miniSummary || textHead(body, MINI_SUMMARY_FALLBACK_CHARS),
      keywords: summary.keywords.length > 0 ? summary.keywords : extractKeywords(body, 5)
    };
  }
}
