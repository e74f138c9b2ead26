import assert from "node:assert/strict";
import { describe, it } from "node:test";

import { AgentRuntime } from "../../../agents/runtime/agentRuntime.js";
import { hashedEmbedding, MockModelBackend } from "../../../agents/runtime/modelBackend.js";
import { buildChunkLookup, Chunk, MiniSummary } from "../../../domain/models.js";
import { mockConfig, ScriptedModelBackend, testConfig } from "../../../testing/scriptedModelBackend.js";
import { EvidenceIndex } from "../../evidence/evidenceIndex.js";
import { ReduceInput, ReduceSummarizer } from "../reduceSummarizer.js";
import { citationFloors, validateSummaryBlock } from "../summaryRules.js";

const chunks: Chunk[] = [1, 2, 3, 4, 5, 6].map((page) => ({
  chunkId: `p${page}_c1`,
  page,
  sectionTitle: "",
  text: `Lecture page ${page} explains concept number ${page} with a worked example and a definition.`
}));

const miniSummaries: MiniSummary[] = chunks.map((chunk) => ({
  page: chunk.page,
  chunkId: chunk.chunkId,
  miniSummary: `Concept ${chunk.page} is defined in lecture ${chunk.page}. It matters for topic ${chunk.page}.`,
  keywords: [`concept${chunk.page}`],
  citations: [{ page: chunk.page, chunkId: chunk.chunkId }]
}));

function reduceInput(selected: Chunk[] = chunks, summaries: MiniSummary[] = miniSummaries): ReduceInput {
  return {
    miniSummaries: summaries,
    selected,
    index: new EvidenceIndex(
      selected,
      selected.map((chunk) => hashedEmbedding(chunk.text)),
      async (text) => hashedEmbedding(text)
    ),
    lookup: buildChunkLookup(selected)
  };
}

const singleChunk: Chunk = {
  chunkId: "p1_c1",
  page: 1,
  sectionTitle: "",
  text: [
    "An agent perceives its environment through sensors.",
    "It acts on the environment through actuators.",
    "A rational agent maximizes its expected performance measure."
  ].join("\n")
};

const singleSummary: MiniSummary = {
  page: 1,
  chunkId: "p1_c1",
  miniSummary: "Agents sense environments and act.",
  keywords: ["agent", "environment"],
  citations: [{ page: 1, chunkId: "p1_c1" }]
};

const validReply = JSON.stringify({
  overview: "The lecture covers agents and search. It also covers planning.",
  sections: [
    { title: "Agents", summary: "Agents perceive their environment. Agents act on it.", citations: ["p1_c1", "p2_c1"] },
    { title: "Search", summary: "Search explores a state space. It returns a path.", citations: ["p1_c1", "p2_c1"] },
    { title: "Planning", summary: "Planning orders actions. Plans reach goals.", citations: ["p1_c1", "p2_c1"] }
  ],
  keypoints: [
    "Agents perceive the environment",
    "Search explores states",
    "Planning orders actions",
    "Logic supports inference",
    "Learning improves behavior"
  ]
});

describe("ReduceSummarizer", () => {
  it("builds the extractive summary from mini summaries", async () => {
    const config = mockConfig();
    const summarizer = new ReduceSummarizer(new AgentRuntime(config, new MockModelBackend()), config);

    const summary = await summarizer.buildFallbackSummary(reduceInput());

    assert.equal(summary.overview, "Concept 1 is defined in lecture 1. It matters for topic 1.");
    assert.deepEqual(
      summary.sections.map((section) => [section.title, section.summary, section.citations.map((citation) => citation.page)]),
      [
        ["Pages 1-2", "Concept 1 is defined in lecture 1. It matters for topic 1.", [1, 2]],
        ["Pages 3-4", "Concept 3 is defined in lecture 3. It matters for topic 3.", [3, 4]],
        ["Pages 5-6", "Concept 5 is defined in lecture 5. It matters for topic 5.", [5, 6]]
      ]
    );
    assert.deepEqual(summary.keypoints, [
      "Concept 1 is defined in lecture 1",
      "It matters for topic 1",
      "Concept 2 is defined in lecture 2",
      "It matters for topic 2",
      "Concept 3 is defined in lecture 3"
    ]);
  });

  it("builds the same valid fallback block on every call", async () => {
    const config = mockConfig();
    const summarizer = new ReduceSummarizer(new AgentRuntime(config, new MockModelBackend()), config);

    const first = await summarizer.buildFallbackSummary(reduceInput());
    const second = await summarizer.buildFallbackSummary(reduceInput());

    assert.deepEqual(first, second);
    assert.equal(validateSummaryBlock(first, citationFloors(chunks)), true);
  });

  it("pads a single-chunk fallback to three sections and five keypoints", async () => {
    const config = mockConfig();
    const summarizer = new ReduceSummarizer(new AgentRuntime(config, new MockModelBackend()), config);
    const input = () => reduceInput([singleChunk], [singleSummary]);

    const first = await summarizer.buildFallbackSummary(input());
    const second = await summarizer.buildFallbackSummary(input());

    assert.deepEqual(first, second);
    assert.equal(validateSummaryBlock(first, citationFloors([singleChunk])), true);
    assert.deepEqual(
      first.sections.map((section) => section.title),
      ["Page 1", "Page 1 (2)", "Page 1 (3)"]
    );
    assert.equal(
      first.sections[1].summary,
      "It acts on the environment through actuators. A rational agent maximizes its expected performance measure."
    );
    assert.deepEqual(first.sections[2].citations, [{ page: 1, chunkId: "p1_c1" }]);
    assert.equal(first.keypoints.length, 5);
  });

  it("falls back after every attempt in mock mode", async () => {
    const config = mockConfig();
    const summarizer = new ReduceSummarizer(new AgentRuntime(config, new MockModelBackend()), config);

    const result = await summarizer.summarize(reduceInput());

    assert.equal(result.artifact.fallbackUsed, true);
    assert.equal(result.artifact.attempts, 2);
    assert.equal(result.traces.length, 2);
    assert.equal(result.artifact.summary.sections.length, 3);
  });

  it("accepts a valid model summary and covers uncited pages", async () => {
    const config = testConfig();
    const summarizer = new ReduceSummarizer(new AgentRuntime(config, new ScriptedModelBackend([validReply])), config);

    const result = await summarizer.summarize(reduceInput());

    assert.equal(result.artifact.fallbackUsed, false);
    assert.equal(result.artifact.attempts, 1);
    assert.equal(result.artifact.summary.overview, "The lecture covers agents and search. It also covers planning.");
    assert.deepEqual(
      result.artifact.summary.sections.map((section) => [section.title, section.citations.map((citation) => citation.page)]),
      [
        ["Agents", [1, 2, 3, 6]],
        ["Search", [1, 2, 4]],
        ["Planning", [1, 2, 5]]
      ]
    );
    assert.equal(result.artifact.summary.keypoints.length, 5);
  });

  it("retries when a reply fails validation", async () => {
    const thin = JSON.stringify({
      overview: "Agents act. Search explores.",
      sections: [{ title: "Agents", summary: "Agents sense. Agents act.", citations: ["p1_c1", "p2_c1"] }],
      keypoints: ["Agents act"]
    });
    const config = testConfig();
    const backend = new ScriptedModelBackend([thin, validReply]);
    const summarizer = new ReduceSummarizer(new AgentRuntime(config, backend), config);

    const result = await summarizer.summarize(reduceInput());

    assert.equal(result.artifact.fallbackUsed, false);
    assert.equal(result.artifact.attempts, 2);
    assert.equal(result.rawResponses.length, 2);
    assert.equal(backend.remainingReplies, 0);
  });
});
