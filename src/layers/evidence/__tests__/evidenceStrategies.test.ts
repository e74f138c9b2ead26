import assert from "node:assert/strict";
import { describe, it } from "node:test";

import { DEFAULT_QUALITY_POLICY } from "../../../config/runtimeConfig.js";
import { buildChunkLookup, Chunk, citationOf } from "../../../domain/models.js";
import { formatEvidence } from "../evidenceContext.js";
import { EvidenceIndex } from "../evidenceIndex.js";
import { citationSearchStrategies, resolveEvidence } from "../evidenceStrategies.js";

const agents: Chunk = {
  chunkId: "p1_c1",
  page: 1,
  sectionTitle: "",
  text: "An agent perceives its environment through sensors and acts through actuators."
};
const search: Chunk = {
  chunkId: "p2_c1",
  page: 2,
  sectionTitle: "",
  text: "Breadth-first search expands the shallowest unexpanded node in the frontier first."
};
const noise: Chunk = { chunkId: "p3_c1", page: 3, sectionTitle: "", text: "Page\n12" };

const chunks = [agents, search, noise];
const lookup = buildChunkLookup(chunks);
const index = new EvidenceIndex(
  chunks,
  [
    [1, 0],
    [0, 1],
    [1, 1]
  ],
  async () => [0, 1]
);

function strategies(citations: Chunk[], query: string) {
  return citationSearchStrategies({
    citations: citations.map(citationOf),
    query,
    searchK: 5,
    index,
    lookup,
    policy: DEFAULT_QUALITY_POLICY
  });
}

describe("resolveEvidence", () => {
  it("uses deduplicated citations first", async () => {
    const resolved = await resolveEvidence(strategies([agents, agents], "search"), DEFAULT_QUALITY_POLICY);
    assert.equal(resolved.strategy, "citations");
    assert.deepEqual(resolved.chunks, [agents]);
  });

  it("falls through to similarity when cited chunks are low-information", async () => {
    const resolved = await resolveEvidence(strategies([noise], "search"), DEFAULT_QUALITY_POLICY);
    assert.equal(resolved.strategy, "similarity");
    assert.deepEqual(resolved.chunks, [search, agents]);
  });

  it("ends with the leading informative chunks", async () => {
    const resolved = await resolveEvidence(strategies([], ""), DEFAULT_QUALITY_POLICY);
    assert.equal(resolved.strategy, "informative-head");
    assert.deepEqual(resolved.chunks, [agents, search]);
  });

  it("caps the result", async () => {
    const resolved = await resolveEvidence(strategies([agents, search], ""), DEFAULT_QUALITY_POLICY, 1);
    assert.deepEqual(resolved.chunks, [agents]);
  });
});

describe("formatEvidence", () => {
  it("always keeps the first chunk and stops at the character budget", () => {
    assert.deepEqual(JSON.parse(formatEvidence([agents, search], 1000, 50)), [
      { chunkId: "p1_c1", page: 1, sectionTitle: "", text: agents.text }
    ]);
  });
});
