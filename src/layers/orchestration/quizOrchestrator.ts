import { AgentRuntime, AgentRunTrace } from "../../agents/runtime/agentRuntime.js";
import { AgentStageResult, StageRawResponse } from "../../agents/runtime/stageResult.js";
import { AgentMode, RuntimeConfig } from "../../config/runtimeConfig.js";
import { buildChunkLookup, Chunk, ChunkLookup, Concept, Question, QuizOutput } from "../../domain/models.js";
import { createId } from "../../utils/text.js";
import { filterInformativeChunks } from "../../utils/textQuality.js";
import { ConceptExtractor } from "../concepts/conceptExtractor.js";
import { EmbeddingCache } from "../evidence/embeddingCache.js";
import { buildEmbeddings, EmbedFunction, EvidenceIndex } from "../evidence/evidenceIndex.js";
import { InputPreprocessingLayer, PreparedDocument } from "../input/inputPreprocessingLayer.js";
import { QuestionGenerator } from "../questions/questionGenerator.js";
import { MapSummarizer } from "../summary/mapSummarizer.js";
import { ReduceSummarizer } from "../summary/reduceSummarizer.js";
import { QuestionVerifier, VerificationContext, VerificationOutcome } from "../verification/questionVerifier.js";
import { PipelineArtifactStore } from "./pipelineArtifactStore.js";

export interface QuizOrchestratorDependencies {
  config: RuntimeConfig;
  runtime: AgentRuntime;
  inputLayer: InputPreprocessingLayer;
  mapSummarizer: MapSummarizer;
  reduceSummarizer: ReduceSummarizer;
  conceptExtractor: ConceptExtractor;
  questionGenerator: QuestionGenerator;
  questionVerifier: QuestionVerifier;
  /** null disables the on-disk embedding cache. */
  embeddingCache: EmbeddingCache | null;
  outputDirectory: string;
}

export interface OrchestrationResult {
  runId: string;
  quiz: QuizOutput;
  quizOutputPath: string;
  runDirectory: string;
  stageArtifacts: Record<string, string>;
  tracesPath: string;
  requestedQuestions: number;
  summaryFallbackUsed: boolean;
  mode: AgentMode;
}

interface SelectionArtifact {
  pageCount: number;
  chunkCount: number;
  selectorUsed: boolean;
  selectedChunkIds: string[];
  embeddingCacheHit: boolean;
  embeddingCachePath: string | null;
}

interface QuestionBatch {
  questions: Question[];
  outcomes: VerificationOutcome[];
}

export class QuizOrchestrator {
  private readonly traces: AgentRunTrace[] = [];
  private readonly rawResponses: StageRawResponse[] = [];

  constructor(private readonly dependencies: QuizOrchestratorDependencies) {}

  async run(): Promise<OrchestrationResult> {
    const { config, runtime } = this.dependencies;
    const pipeline = config.pipeline;
    this.traces.length = 0;
    this.rawResponses.length = 0;

    const document = await this.dependencies.inputLayer.prepare(pipeline);
    if (document.chunks.length === 0) {
      throw new Error(`No text chunks could be built from ${document.source.filePath}.`);
    }

    const runId = createId("run", `${document.source.title}-${Date.now()}`);
    const artifactStore = new PipelineArtifactStore(this.dependencies.outputDirectory, runId);
    const stageArtifacts: Record<string, string> = {};
    this.log(`[${runId}] Starting quiz run for ${document.source.title} (${document.chunks.length} chunks)`);

    const chunks = this.dropLowInfoChunks(document.chunks);
    if (!(await runtime.checkHealth())) {
      throw new Error(`Model backend is unreachable in ${runtime.mode} mode; health check failed.`);
    }

    const lookup = buildChunkLookup(chunks);
    const embedText: EmbedFunction = (text) => runtime.embed(text);
    const { index, cacheHit, cachePath } = await this.buildIndex(document, chunks, embedText);
    const { selected, selectorUsed } = await this.selectChunks(document, index);
    const selection: SelectionArtifact = {
      pageCount: document.pages.length,
      chunkCount: chunks.length,
      selectorUsed,
      selectedChunkIds: selected.map((chunk) => chunk.chunkId),
      embeddingCacheHit: cacheHit,
      embeddingCachePath: cachePath
    };
    stageArtifacts.input = await artifactStore.persistStageArtifact("input", { source: document.source, chunks });
    stageArtifacts.selection = await artifactStore.persistStageArtifact("selection", selection);
    this.log(`[${runId}] Selected ${selected.length} chunk(s) for map-reduce (selector=${selectorUsed})`);

    const miniSummaries = this.collect(await this.dependencies.mapSummarizer.summarize(selected, lookup));
    stageArtifacts.mapSummary = await artifactStore.persistStageArtifact("map-summary", miniSummaries);

    const reduced = this.collect(
      await this.dependencies.reduceSummarizer.summarize({ miniSummaries, selected, index, lookup })
    );
    stageArtifacts.reduceSummary = await artifactStore.persistStageArtifact("reduce-summary", reduced);
    this.log(`[${runId}] Keypoints: ${reduced.summary.keypoints.length}`);

    const concepts = this.collect(
      await this.dependencies.conceptExtractor.extract(reduced.summary.keypoints, miniSummaries, lookup)
    );
    stageArtifacts.concepts = await artifactStore.persistStageArtifact("concepts", concepts);

    const context: VerificationContext = {
      index,
      lookup,
      concepts: new Map(concepts.map((concept) => [concept.name, concept]))
    };

    const generated = await this.generateInitial(concepts, index, lookup);
    stageArtifacts.questions = await artifactStore.persistStageArtifact("questions", generated);

    const outcomes = this.collect(await this.dependencies.questionVerifier.verifyAll(generated, context));
    stageArtifacts.verification = await artifactStore.persistStageArtifact("verification", outcomes);

    const accepted = outcomes.flatMap((outcome) => (outcome.question ? [outcome.question] : []));
    const topUp = await this.topUp(accepted, concepts, context);
    stageArtifacts.topUp = await artifactStore.persistStageArtifact("top-up", topUp);

    const quiz: QuizOutput = {
      summary: reduced.summary,
      questions: [...accepted, ...topUp.questions]
    };
    if (quiz.questions.length < pipeline.questionCount) {
      console.warn(`[orchestrator] Only ${quiz.questions.length}/${pipeline.questionCount} question(s) could be grounded`);
    }

    const quizOutputPath = await artifactStore.persistQuizOutput(quiz);
    stageArtifacts.quiz = await artifactStore.persistStageArtifact("quiz", quiz);
    for (const stage of new Set(this.rawResponses.map((response) => response.stage))) {
      await artifactStore.persistRawResponses(
        stage,
        this.rawResponses.filter((response) => response.stage === stage)
      );
    }
    const tracesPath = await artifactStore.persistTraces(this.traces);
    await artifactStore.persistRunSummary({
      runId,
      sourceDocument: document.source,
      stageArtifacts,
      questionCount: quiz.questions.length,
      requestedQuestions: pipeline.questionCount,
      summaryFallbackUsed: reduced.fallbackUsed,
      traceCount: this.traces.length,
      startedAt: this.traces[0]?.startedAt,
      completedAt: new Date().toISOString()
    });

    this.log(`[${runId}] Completed in ${runtime.mode} mode -> ${quizOutputPath}`);
    return {
      runId,
      quiz,
      quizOutputPath,
      runDirectory: artifactStore.directoryPath,
      stageArtifacts,
      tracesPath,
      requestedQuestions: pipeline.questionCount,
      summaryFallbackUsed: reduced.fallbackUsed,
      mode: runtime.mode
    };
  }

  private dropLowInfoChunks(chunks: readonly Chunk[]): Chunk[] {
    const informative = filterInformativeChunks(chunks, this.dependencies.config.quality);
    if (informative.length === 0) {
      console.warn("[orchestrator] Every chunk looks low-information; keeping all of them");
      return [...chunks];
    }

    const removed = chunks.length - informative.length;
    if (removed > 0) {
      this.log(`Filtered ${removed} low-information chunk(s)`);
    }
    return informative;
  }

  private async buildIndex(
    document: PreparedDocument,
    chunks: readonly Chunk[],
    embedText: EmbedFunction
  ): Promise<{ index: EvidenceIndex; cacheHit: boolean; cachePath: string | null }> {
    const { config } = this.dependencies;
    const pipeline = config.pipeline;
    const build = () => buildEmbeddings(chunks, embedText, config.embedConcurrency);
    const cache = this.dependencies.embeddingCache;

    if (!cache) {
      return { index: new EvidenceIndex(chunks, await build(), embedText), cacheHit: false, cachePath: null };
    }

    const loaded = await cache.loadOrBuild(
      {
        documentHash: document.source.documentHash,
        embedModel: config.embedModel,
        chunkChars: pipeline.chunkChars,
        overlapChars: pipeline.overlapChars,
        minChunkChars: pipeline.minChunkChars,
        pageFilter: pipeline.pageFilter,
        chapterFilter: pipeline.chapterFilter,
        maxPages: pipeline.maxPages,
        chunkCount: chunks.length
      },
      chunks,
      build
    );
    return {
      index: new EvidenceIndex(chunks, loaded.embeddings, embedText),
      cacheHit: loaded.cacheHit,
      cachePath: loaded.cachePath
    };
  }

  private async selectChunks(
    document: PreparedDocument,
    index: EvidenceIndex
  ): Promise<{ selected: Chunk[]; selectorUsed: boolean }> {
    const pipeline = this.dependencies.config.pipeline;
    const chunkCount = index.size;
    const selectorUsed =
      document.pages.length >= pipeline.longDocThresholdPages ||
      chunkCount >= pipeline.selectorChunkThreshold ||
      chunkCount > pipeline.maxChunks;

    if (!selectorUsed) {
      return { selected: [...index.chunks], selectorUsed };
    }

    const k = Math.min(pipeline.topKChunks, pipeline.maxChunks, chunkCount);
    return { selected: await index.select(k, pipeline.seed, true), selectorUsed };
  }

  private async generateInitial(concepts: readonly Concept[], index: EvidenceIndex, lookup: ChunkLookup): Promise<Question[]> {
    const pipeline = this.dependencies.config.pipeline;
    const questions: Question[] = [];

    for (const [position, concept] of concepts.slice(0, pipeline.questionCount).entries()) {
      const question = await this.generateOne(concept, position + 1, index, lookup);
      if (question) {
        questions.push(question);
      }
    }

    this.log(`Generated ${questions.length} question(s) from ${concepts.length} concept(s)`);
    return questions;
  }

  /**
   * Cycles through the concepts until the requested count is reached or the attempt budget
   * runs out. Accepted questions get fresh ids after the initial ones.
   */
  private async topUp(
    accepted: readonly Question[],
    concepts: readonly Concept[],
    context: VerificationContext
  ): Promise<QuestionBatch> {
    const pipeline = this.dependencies.config.pipeline;
    const batch: QuestionBatch = { questions: [], outcomes: [] };
    if (concepts.length === 0) {
      return batch;
    }

    const budget = pipeline.questionCount * (pipeline.questionRetries + 2);
    let nextId = pipeline.questionCount + 1;

    for (let attempt = 0; accepted.length + batch.questions.length < pipeline.questionCount && attempt < budget; attempt += 1) {
      const concept = concepts[attempt % concepts.length];
      const question = await this.generateOne(concept, nextId, context.index, context.lookup);
      if (!question) {
        continue;
      }

      const outcome = this.collect(await this.dependencies.questionVerifier.verify(question, context));
      batch.outcomes.push(outcome);
      if (outcome.question) {
        batch.questions.push(outcome.question);
        nextId += 1;
      }
    }

    if (batch.outcomes.length > 0) {
      this.log(`Top-up added ${batch.questions.length} question(s)`);
    }
    return batch;
  }

  private async generateOne(
    concept: Concept,
    idNumber: number,
    index: EvidenceIndex,
    lookup: ChunkLookup
  ): Promise<Question | null> {
    const { config } = this.dependencies;
    const types = config.pipeline.questionTypes;
    const evidence = await this.dependencies.questionGenerator.selectEvidence(concept, index, lookup);
    const outcome = this.collect(
      await this.dependencies.questionGenerator.generate({
        concept,
        evidence,
        id: `q${idNumber}`,
        type: types[(idNumber - 1) % types.length],
        lookup
      })
    );
    return outcome.question;
  }

  private collect<T>(result: AgentStageResult<T>): T {
    this.traces.push(...result.traces);
    this.rawResponses.push(...result.rawResponses);
    return result.artifact;
  }

  private log(message: string): void {
    console.log(`[orchestrator] ${message}`);
  }
}
