import assert from "node:assert/strict";
import { describe, it } from "node:test";

import { DEFAULT_QUALITY_POLICY } from "../../../config/runtimeConfig.js";
import { Chunk, SummaryBlock } from "../../../domain/models.js";
import {
  buildSectionGroups,
  citationFloors,
  cleanKeypoint,
  dedupeCitationsByPage,
  ensureSectionCoverage,
  mergeCitations,
  normalizeKeypoints,
  normalizeParagraph,
  targetSectionCount,
  validateSummaryBlock
} from "../summaryRules.js";

function chunk(page: number, index = 1): Chunk {
  return {
    chunkId: `p${page}_c${index}`,
    page,
    sectionTitle: "",
    text: `Lecture page ${page} explains concept number ${page} with a worked example and a definition.`
  };
}

describe("paragraph and keypoint normalization", () => {
  it("drops incomplete sentences and backfills from the fallback", () => {
    assert.equal(
      normalizeParagraph("Agents act. They use sensors and", 2, 4, ["Search helps. Planning works."]),
      "Agents act. Search helps."
    );
  });

  it("caps paragraphs at the maximum", () => {
    assert.equal(normalizeParagraph("One. Two. Three. Four.", 2, 3, []), "One. Two. Three.");
  });

  it("returns an empty paragraph when nothing is usable", () => {
    assert.equal(normalizeParagraph("", 2, 3, []), "");
  });

  it("strips citation markers from keypoints", () => {
    assert.equal(cleanKeypoint("Agents act (p1_c1)。"), "Agents act");
  });

  it("deduplicates keypoints and backfills up to five", () => {
    assert.deepEqual(
      normalizeKeypoints(
        ["Agents act", "Agents act.", "Search explores"],
        ["Planning works", "Logic helps", "Learning adapts", "Extra idea"]
      ),
      ["Agents act", "Search explores", "Planning works", "Logic helps", "Learning adapts"]
    );
  });
});

describe("citations", () => {
  it("relaxes floors for single-page evidence", () => {
    assert.deepEqual(citationFloors([chunk(1), chunk(1, 2)]), { minCitations: 1, minUniquePages: 1 });
    assert.deepEqual(citationFloors([chunk(1), chunk(2)]), { minCitations: 2, minUniquePages: 2 });
  });

  it("keeps one citation per page, at most four", () => {
    const citations = [1, 1, 2, 3, 4, 5].map((page, index) => ({ page, chunkId: `p${page}_c${index}` }));
    assert.deepEqual(
      dedupeCitationsByPage(citations).map((citation) => citation.page),
      [1, 2, 3, 4]
    );
  });

  it("prefers new pages when merging retrieval matches", () => {
    const merged = mergeCitations([{ page: 1, chunkId: "p1_c1" }], [chunk(1, 2), chunk(3)], 2);
    assert.deepEqual(merged, [
      { page: 1, chunkId: "p1_c1" },
      { page: 3, chunkId: "p3_c1" }
    ]);
  });

  it("uses same-page matches only to reach the minimum", () => {
    const merged = mergeCitations([{ page: 1, chunkId: "p1_c1" }], [chunk(1, 2)], 2);
    assert.deepEqual(merged, [
      { page: 1, chunkId: "p1_c1" },
      { page: 1, chunkId: "p1_c2" }
    ]);
  });
});

describe("section groups and coverage", () => {
  it("sizes the section target by page count", () => {
    assert.equal(targetSectionCount([chunk(1)]), 3);
    assert.equal(targetSectionCount(Array.from({ length: 30 }, (_, index) => chunk(index + 1))), 6);
  });

  it("buckets pages into page-range groups", () => {
    const groups = buildSectionGroups([1, 2, 3, 4, 5, 6].map((page) => chunk(page)), 3, DEFAULT_QUALITY_POLICY);
    assert.deepEqual(
      groups.map((group) => [group.title, group.chunks.map((entry) => entry.chunkId)]),
      [
        ["Pages 1-2", ["p1_c1", "p2_c1"]],
        ["Pages 3-4", ["p3_c1", "p4_c1"]],
        ["Pages 5-6", ["p5_c1", "p6_c1"]]
      ]
    );
  });

  it("groups by chunk when pages give fewer than three groups", () => {
    const groups = buildSectionGroups([chunk(1), chunk(1, 2), chunk(1, 3)], 3, DEFAULT_QUALITY_POLICY);
    assert.deepEqual(
      groups.map((group) => group.title),
      ["Page 1", "Page 1", "Page 1"]
    );
  });

  it("injects citations for uncovered pages", () => {
    const selected = [1, 2, 3, 4, 5].map((page) => chunk(page));
    const sections = [
      { title: "A", summary: "", citations: [{ page: 1, chunkId: "p1_c1" }] },
      { title: "B", summary: "", citations: [] }
    ];

    const covered = ensureSectionCoverage(sections, selected, DEFAULT_QUALITY_POLICY);

    assert.deepEqual(
      covered.map((section) => section.citations.map((citation) => citation.page)),
      [
        [1, 2, 4],
        [3, 5]
      ]
    );
    assert.deepEqual(sections[1].citations, []);
  });
});

describe("validateSummaryBlock", () => {
  const section = {
    title: "Agents",
    summary: "Agents sense. Agents act.",
    citations: [
      { page: 1, chunkId: "p1_c1" },
      { page: 2, chunkId: "p2_c1" }
    ]
  };
  const block: SummaryBlock = {
    overview: "Agents act. Search explores.",
    sections: [section, section, section],
    keypoints: ["a", "b", "c", "d", "e"]
  };

  it("accepts a complete block", () => {
    assert.equal(validateSummaryBlock(block, { minCitations: 2, minUniquePages: 2 }), true);
  });

  it("rejects thin blocks", () => {
    assert.equal(validateSummaryBlock({ ...block, overview: "Only one." }, { minCitations: 2, minUniquePages: 2 }), false);
    assert.equal(validateSummaryBlock({ ...block, keypoints: ["a"] }, { minCitations: 2, minUniquePages: 2 }), false);
    assert.equal(
      validateSummaryBlock(
        { ...block, sections: [section, section, { ...section, citations: [{ page: 1, chunkId: "p1_c1" }] }] },
        { minCitations: 2, minUniquePages: 2 }
      ),
      false
    );
  });
});
