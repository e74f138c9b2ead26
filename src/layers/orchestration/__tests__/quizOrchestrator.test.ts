import assert from "node:assert/strict";
import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";
import { after, before, describe, it } from "node:test";

import { AgentRuntime } from "../../../agents/runtime/agentRuntime.js";
import { MockModelBackend, ModelBackend } from "../../../agents/runtime/modelBackend.js";
import { RuntimeConfig } from "../../../config/runtimeConfig.js";
import { mockConfig, ScriptedModelBackend } from "../../../testing/scriptedModelBackend.js";
import { ConceptExtractor } from "../../concepts/conceptExtractor.js";
import { InputPreprocessingLayer } from "../../input/inputPreprocessingLayer.js";
import { QuestionGenerator } from "../../questions/questionGenerator.js";
import { MapSummarizer } from "../../summary/mapSummarizer.js";
import { ReduceSummarizer } from "../../summary/reduceSummarizer.js";
import { QuestionVerifier } from "../../verification/questionVerifier.js";
import { QuizOrchestrator } from "../quizOrchestrator.js";

const LECTURE = [
  "An agent perceives its environment through sensors and acts through actuators.",
  "Breadth-first search expands the shallowest unexpanded node in the frontier first.",
  "A heuristic function estimates the cost of the cheapest path to a goal state."
].join("\f");

let workspace = "";

function orchestrator(config: RuntimeConfig, backend: ModelBackend, inputFile: string): QuizOrchestrator {
  const runtime = new AgentRuntime(config, backend);
  const questionGenerator = new QuestionGenerator(runtime, config);
  return new QuizOrchestrator({
    config,
    runtime,
    inputLayer: new InputPreprocessingLayer(path.join(workspace, inputFile)),
    mapSummarizer: new MapSummarizer(runtime, config),
    reduceSummarizer: new ReduceSummarizer(runtime, config),
    conceptExtractor: new ConceptExtractor(runtime, config),
    questionGenerator,
    questionVerifier: new QuestionVerifier(runtime, config, questionGenerator),
    embeddingCache: null,
    outputDirectory: path.join(workspace, "output")
  });
}

describe("QuizOrchestrator", () => {
  before(async () => {
    workspace = await mkdtemp(path.join(tmpdir(), "groundquiz-run-"));
    await writeFile(path.join(workspace, "lecture.txt"), LECTURE, "utf8");
    await writeFile(path.join(workspace, "blank.txt"), " \n\f\n ", "utf8");
  });

  after(async () => {
    await rm(workspace, { recursive: true, force: true });
  });

  it("runs the whole pipeline offline and writes the quiz", async () => {
    const config = mockConfig({ GROUNDQUIZ_QUESTION_COUNT: "2", GROUNDQUIZ_QUESTION_TYPES: "tf" });

    const result = await orchestrator(config, new MockModelBackend(), "lecture.txt").run();

    assert.equal(result.mode, "mock");
    assert.equal(result.summaryFallbackUsed, true);
    assert.equal(result.requestedQuestions, 2);
    assert.deepEqual(
      result.quiz.questions.map((question) => [question.id, question.type, question.answer]),
      [
        ["q1", "tf", "true"],
        ["q2", "tf", "true"]
      ]
    );
    assert.equal(result.quiz.summary.sections.length, 3);
    assert.equal(result.quizOutputPath, path.join(workspace, "output", "quiz-output.json"));
    assert.deepEqual(Object.keys(result.stageArtifacts), [
      "input",
      "selection",
      "mapSummary",
      "reduceSummary",
      "concepts",
      "questions",
      "verification",
      "topUp",
      "quiz"
    ]);

    const written = await readFile(result.quizOutputPath, "utf8");
    assert.deepEqual(JSON.parse(written), JSON.parse(JSON.stringify(result.quiz)));
    assert.equal(path.dirname(result.tracesPath), result.runDirectory);
  });

  it("tops up with fresh ids when an initial question cannot be built", async () => {
    const config = mockConfig({ GROUNDQUIZ_QUESTION_COUNT: "2", GROUNDQUIZ_QUESTION_TYPES: "tf,mcq" });

    const result = await orchestrator(config, new MockModelBackend(), "lecture.txt").run();

    assert.deepEqual(
      result.quiz.questions.map((question) => question.id),
      ["q1", "q3"]
    );
  });

  it("completes the run when one chunk cannot be embedded", async () => {
    const config = mockConfig({ GROUNDQUIZ_QUESTION_COUNT: "2", GROUNDQUIZ_QUESTION_TYPES: "tf" });
    const backend = new ScriptedModelBackend();
    backend.failEmbeddingsFor = ["Breadth-first"];

    const result = await orchestrator(config, backend, "lecture.txt").run();

    assert.ok(backend.embedRequests.some((text) => text.startsWith("Breadth-first")));
    assert.equal(result.quiz.summary.sections.length, 3);
    assert.deepEqual(
      result.quiz.questions.map((question) => [question.id, question.type]),
      [
        ["q1", "tf"],
        ["q2", "tf"]
      ]
    );
  });

  it("fails when the document yields no chunks", async () => {
    await assert.rejects(orchestrator(mockConfig(), new MockModelBackend(), "blank.txt").run(), {
      message: `No text chunks could be built from ${path.join(workspace, "blank.txt")}.`
    });
  });

  it("fails when the backend is unhealthy", async () => {
    const backend = new ScriptedModelBackend();
    backend.healthy = false;

    await assert.rejects(orchestrator(mockConfig(), backend, "lecture.txt").run(), {
      message: "Model backend is unreachable in mock mode; health check failed."
    });
  });
});
