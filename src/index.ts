#!/usr/bin/env node
import "dotenv/config";

import path from "node:path";

import { AgentRuntime } from "./agents/runtime/agentRuntime.js";
import { GatewayModelBackend, MockModelBackend, ModelBackend } from "./agents/runtime/modelBackend.js";
import { loadRuntimeConfig, RuntimeConfig } from "./config/runtimeConfig.js";
import { ConceptExtractor } from "./layers/concepts/conceptExtractor.js";
import { EmbeddingCache } from "./layers/evidence/embeddingCache.js";
import { InputPreprocessingLayer } from "./layers/input/inputPreprocessingLayer.js";
import { QuizOrchestrator } from "./layers/orchestration/quizOrchestrator.js";
import { QuestionGenerator } from "./layers/questions/questionGenerator.js";
import { MapSummarizer } from "./layers/summary/mapSummarizer.js";
import { ReduceSummarizer } from "./layers/summary/reduceSummarizer.js";
import { QuestionVerifier } from "./layers/verification/questionVerifier.js";

function createBackend(config: RuntimeConfig): ModelBackend {
  if (config.mode === "live" && config.gatewayApiKey) {
    return new GatewayModelBackend(config.gatewayApiKey);
  }
  return new MockModelBackend();
}

async function main(): Promise<void> {
  const inputArgument = process.argv[2];
  if (!inputArgument) {
    throw new Error("Usage: groundquiz <document.json|document.txt> [output-directory]");
  }

  const runtimeConfig = loadRuntimeConfig();
  const runtime = new AgentRuntime(runtimeConfig, createBackend(runtimeConfig));
  const inputPath = path.resolve(process.cwd(), inputArgument);
  const outputDirectory = path.resolve(process.cwd(), process.argv[3] ?? "output");
  const pipeline = runtimeConfig.pipeline;

  console.log(
    `[bootstrap] groundquiz starting in ${runtimeConfig.mode} mode (${runtimeConfig.chatModel}) for ${pipeline.questionCount} question(s) of type ${pipeline.questionTypes.join("/")}`
  );

  const questionGenerator = new QuestionGenerator(runtime, runtimeConfig);
  const orchestrator = new QuizOrchestrator({
    config: runtimeConfig,
    runtime,
    inputLayer: new InputPreprocessingLayer(inputPath),
    mapSummarizer: new MapSummarizer(runtime, runtimeConfig),
    reduceSummarizer: new ReduceSummarizer(runtime, runtimeConfig),
    conceptExtractor: new ConceptExtractor(runtime, runtimeConfig),
    questionGenerator,
    questionVerifier: new QuestionVerifier(runtime, runtimeConfig, questionGenerator),
    embeddingCache: pipeline.embedCacheEnabled
      ? new EmbeddingCache(path.resolve(process.cwd(), pipeline.embedCacheDir))
      : null,
    outputDirectory
  });

  const result = await orchestrator.run();

  console.log(`Generated ${result.quiz.questions.length}/${result.requestedQuestions} question(s):`);
  console.log(`  Quiz: ${result.quizOutputPath}`);
  console.log(`  Run artifacts: ${result.runDirectory}`);
  console.log(`  Agent traces: ${result.tracesPath}`);
  console.log(`  Summary fallback: ${result.summaryFallbackUsed ? "yes" : "no"}`);
  console.log(`  Mode: ${result.mode}`);
}

main().catch((error: unknown) => {
  if (error instanceof Error) {
    console.error(`Pipeline failed: ${error.message}`);
  } else {
    console.error("Pipeline failed due to an unknown error.");
  }

  process.exitCode = 1;
});
