import { AgentRuntime } from "../../agents/runtime/agentRuntime.js";
import { AgentStageResult, StageRecorder } from "../../agents/runtime/stageResult.js";
import { RuntimeConfig } from "../../config/runtimeConfig.js";
import { ChunkLookup, Citation, Concept, MiniSummary } from "../../domain/models.js";
import { normalizeConcepts } from "../../domain/normalize.js";
import { formatMiniSummaries } from "../evidence/evidenceContext.js";

const SNIPPET_NAME_CHARS = 20;
const KEYWORD_DESCRIPTION_CHARS = 50;

const CONCEPT_SYSTEM_PROMPT = [
  "You pick examinable concepts from a lecture study summary.",
  "Each concept must be supported by the provided keypoints and mini summaries.",
  "Cite the chunks that support each concept using the chunk ids provided.",
  "Return only JSON.",
  "Output schema:",
  "{",
  '  "concepts": [{ "name": string, "description": string, "citations": [{ "page": number, "chunkId": string }], "difficulty": "easy|medium|hard" }]',
  "}"
].join("\n");

export class ConceptExtractor {
  constructor(
    private readonly runtime: AgentRuntime,
    private readonly config: RuntimeConfig
  ) {}

  async extract(
    keypoints: readonly string[],
    miniSummaries: readonly MiniSummary[],
    lookup: ChunkLookup
  ): Promise<AgentStageResult<Concept[]>> {
    const recorder = new StageRecorder();
    const limit = this.config.pipeline.questionCount;

    const extracted = recorder.record(
      await this.runtime.runJson<Concept[]>({
        stage: "concepts",
        agentName: "concept-extractor",
        systemPrompt: CONCEPT_SYSTEM_PROMPT,
        userPrompt: this.buildUserPrompt(keypoints, miniSummaries, limit),
        parse: (value) => normalizeConcepts(value, lookup),
        fallback: () => []
      })
    );

    const concepts = extracted.slice(0, limit);
    if (concepts.length < limit) {
      const used = new Set(concepts.map((concept) => concept.name));
      for (const concept of buildFallbackConcepts(keypoints, miniSummaries, limit)) {
        if (concepts.length >= limit) {
          break;
        }
        if (!used.has(concept.name)) {
          used.add(concept.name);
          concepts.push(concept);
        }
      }
    }

    console.log(`[concepts] ${concepts.length} concept(s), ${extracted.length} from the model`);
    return recorder.finish(concepts);
  }

  private buildUserPrompt(keypoints: readonly string[], miniSummaries: readonly MiniSummary[], limit: number): string {
    return [
      `Return at most ${limit} concepts.`,
      "Keypoints:",
      ...keypoints.map((keypoint) => `- ${keypoint}`),
      "Mini summaries:",
      formatMiniSummaries(miniSummaries, this.config.pipeline.summaryBudgetTokens, this.config.pipeline.maxInputChars)
    ].join("\n");
  }
}

/**
 * Deterministic concepts: keypoints first, then mini-summary keywords, then short snippets of the
 * mini summaries. Stops at `limit`.
 */
export function buildFallbackConcepts(
  keypoints: readonly string[],
  miniSummaries: readonly MiniSummary[],
  limit: number
): Concept[] {
  const concepts: Concept[] = [];
  const used = new Set<string>();
  const add = (name: string, description: string, citations: Citation[]) => {
    if (name && !used.has(name) && concepts.length < limit) {
      used.add(name);
      concepts.push({ name, description, citations, difficulty: "medium" });
    }
  };

  const firstCitation = miniSummaries.find((summary) => summary.citations.length > 0)?.citations[0];
  for (const keypoint of keypoints) {
    add(keypoint, "", firstCitation ? [firstCitation] : []);
  }

  for (const summary of miniSummaries) {
    const citations = summary.citations.slice(0, 1);
    for (const keyword of summary.keywords) {
      add(keyword, summary.miniSummary.slice(0, KEYWORD_DESCRIPTION_CHARS), citations);
    }

    const snippet = summary.miniSummary.trim();
    if (snippet) {
      add(`${snippet.slice(0, SNIPPET_NAME_CHARS).replace(/[,.;，。；\s]+$/, "")}...`, snippet, citations);
    }
  }

  return concepts;
}
