import assert from "node:assert/strict";
import { describe, it } from "node:test";

import { DEFAULT_QUALITY_POLICY } from "../../../config/runtimeConfig.js";
import { buildChunkLookup, Chunk } from "../../../domain/models.js";
import { QuestionDraft } from "../../../domain/normalize.js";
import {
  containsExternalReference,
  groundQuestion,
  isMetaQuestion,
  isVerbatimQuote,
  normalizeChoices,
  normalizeTrueFalseAnswer,
  questionProblems,
  resolveCorrectOption,
  shapeQuestion,
  toTrueFalseStatement
} from "../questionRules.js";

const agents: Chunk = {
  chunkId: "p1_c1",
  page: 1,
  sectionTitle: "",
  text: "An agent perceives its environment through sensors and acts through actuators."
};
const lookup = buildChunkLookup([agents]);

function draft(overrides: Partial<QuestionDraft> = {}): QuestionDraft {
  return {
    type: null,
    question: "An agent acts through actuators.",
    answer: "true",
    rationale: "Agents act.",
    citations: [{ page: 1, chunkId: "p1_c1" }],
    choices: [],
    correctOption: "",
    stepByStep: [],
    finalAnswer: "",
    difficulty: "easy",
    conceptTags: [],
    insufficientEvidence: false,
    ...overrides
  };
}

describe("question text rules", () => {
  it("detects questions about the document itself", () => {
    assert.equal(isMetaQuestion("Which page defines an agent?"), true);
    assert.equal(isMetaQuestion("What does p3_c2 say?"), true);
    assert.equal(isMetaQuestion("An agent acts through actuators."), false);
  });

  it("turns true/false prompts into statements", () => {
    assert.equal(toTrueFalseStatement("True or false: An agent acts through actuators?"), "An agent acts through actuators");
    assert.equal(toTrueFalseStatement("Is an agent rational?"), null);
  });

  it("normalizes true/false literals", () => {
    assert.equal(normalizeTrueFalseAnswer("Yes."), "true");
    assert.equal(normalizeTrueFalseAnswer("錯"), "false");
    assert.equal(normalizeTrueFalseAnswer("maybe"), null);
  });

  it("forces choice prefixes", () => {
    assert.deepEqual(normalizeChoices(["A. Sensors", "(B) Actuators", "Goals", "A Percepts"]), [
      "A Sensors",
      "B Actuators",
      "C Goals",
      "D A Percepts"
    ]);
  });

  it("resolves the correct option from a letter or the choice text", () => {
    const choices = ["A Sensors", "B Actuators", "C Goals", "D Percepts"];
    assert.equal(resolveCorrectOption(draft({ answer: "B" }), choices), "B");
    assert.equal(resolveCorrectOption(draft({ answer: "actuators" }), choices), "B");
    assert.equal(resolveCorrectOption(draft({ answer: "wheels", correctOption: "d" }), choices), "D");
    assert.equal(resolveCorrectOption(draft({ answer: "wheels" }), choices), null);
  });

  it("flags titled works the evidence never mentions", () => {
    const text = 'As the book "Deep Thoughts" explains, agents act.';
    assert.equal(containsExternalReference(text, "agents act"), true);
    assert.equal(containsExternalReference(text, "The book Deep Thoughts says agents act."), false);
  });

  it("matches quotes verbatim up to whitespace", () => {
    assert.equal(isVerbatimQuote({ page: 1, chunkId: "p1_c1", quote: "perceives its\n environment" }, lookup), true);
    assert.equal(isVerbatimQuote({ page: 1, chunkId: "p1_c1", quote: "perceives the world" }, lookup), false);
    assert.equal(isVerbatimQuote({ page: 1, chunkId: "p9_c9", quote: "perceives" }, lookup), false);
  });
});

describe("shapeQuestion", () => {
  it("shapes a multiple-choice draft", () => {
    const result = shapeQuestion(
      draft({ choices: ["Sensors", "Actuators", "Goals", "Percepts"], answer: "B", question: "How does an agent act?" }),
      "q2",
      "mcq",
      null
    );

    assert.ok(result.ok);
    assert.equal(result.question.type, "mcq");
    assert.equal(result.question.id, "q2");
    assert.equal(result.question.answer, "B");
    if (result.question.type === "mcq") {
      assert.equal(result.question.correctOption, "B");
      assert.deepEqual(result.question.choices, ["A Sensors", "B Actuators", "C Goals", "D Percepts"]);
    }
  });

  it("tags the concept when the draft has no tags", () => {
    const result = shapeQuestion(draft(), "q1", "tf", {
      name: "agent",
      description: "",
      citations: [],
      difficulty: "easy"
    });

    assert.ok(result.ok);
    assert.deepEqual(result.question.conceptTags, ["agent"]);
    assert.equal(result.question.question, "An agent acts through actuators.");
  });

  it("keeps the source concept ahead of the draft's own tags", () => {
    const concept = { name: "agent", description: "", citations: [], difficulty: "easy" as const };
    const result = shapeQuestion(draft({ conceptTags: ["made-up tag", "agent"] }), "q1", "tf", concept);

    assert.ok(result.ok);
    assert.deepEqual(result.question.conceptTags, ["agent", "made-up tag"]);
  });

  it("rejects a multiple-choice answer that contradicts the correct option", () => {
    const choices = ["Sensors", "Actuators", "Goals", "Percepts"];
    const mismatch = shapeQuestion(draft({ choices, correctOption: "B", answer: "C" }), "q1", "mcq", null);
    const agreeing = shapeQuestion(draft({ choices, correctOption: "B", answer: "(B) Actuators" }), "q1", "mcq", null);

    assert.deepEqual(mismatch, { ok: false, reason: "mcq answer mismatch" });
    assert.ok(agreeing.ok);
    assert.equal(agreeing.question.answer, "B");
  });

  it("names the broken rule", () => {
    const reasons = [
      shapeQuestion(draft({ insufficientEvidence: true }), "q1", "tf", null),
      shapeQuestion(draft({ question: "Is an agent rational?" }), "q1", "tf", null),
      shapeQuestion(draft({ answer: "sometimes" }), "q1", "tf", null),
      shapeQuestion(draft({ choices: ["A", "B", "C", "All of the above"] }), "q1", "mcq", null),
      shapeQuestion(draft({ choices: ["A", "B"] }), "q1", "mcq", null),
      shapeQuestion(draft({ answer: "yes" }), "q1", "short", null),
      shapeQuestion(draft(), "q1", "calc", null)
    ].map((result) => (result.ok ? "ok" : result.reason));

    assert.deepEqual(reasons, [
      "insufficient evidence",
      "tf question format",
      "tf answer",
      "banned mcq choice",
      "mcq needs exactly 4 choices",
      "short answer format",
      "calc steps"
    ]);
  });
});

describe("groundQuestion", () => {
  it("restricts citations to the evidence and attaches a verbatim quote", () => {
    const shaped = shapeQuestion(draft({ citations: [{ page: 9, chunkId: "p9_c9" }] }), "q1", "tf", null);
    assert.ok(shaped.ok);

    const grounded = groundQuestion(shaped.question, [agents], DEFAULT_QUALITY_POLICY);

    assert.deepEqual(grounded.citations, [{ page: 1, chunkId: "p1_c1" }]);
    assert.deepEqual(grounded.evidenceQuotes, [{ page: 1, chunkId: "p1_c1", quote: agents.text }]);
    assert.equal(grounded.rationale, `Agents act. (Quote: "${agents.text}")`);
    assert.deepEqual(questionProblems(grounded, { allowedTypes: ["tf"], policy: DEFAULT_QUALITY_POLICY, lookup }), []);
    assert.deepEqual(questionProblems(grounded, { allowedTypes: ["mcq"], policy: DEFAULT_QUALITY_POLICY, lookup }), [
      "type tf not requested"
    ]);
  });
});
