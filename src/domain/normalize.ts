import {
  asBoolean,
  asObject,
  asObjectArray,
  asString,
  asStringArray,
  isRecord,
  pick
} from "../utils/json.js";
import {
  Chunk,
  ChunkLookup,
  Citation,
  citationOf,
  Concept,
  Difficulty,
  MiniSummary,
  QUESTION_TYPES,
  QuestionType
} from "./models.js";

const CHUNK_ID_TOKEN = /p\d+_c\d+/g;

/**
 * Loosely shaped question as it comes back from the model, before type rules and grounding.
 */
export interface QuestionDraft {
  type: QuestionType | null;
  question: string;
  answer: string;
  rationale: string;
  citations: Citation[];
  choices: string[];
  correctOption: string;
  stepByStep: string[];
  finalAnswer: string;
  difficulty: Difficulty;
  conceptTags: string[];
  insufficientEvidence: boolean;
}

export interface SectionDraft {
  title: string;
  summary: string;
  citations: Citation[];
}

export interface SummaryDraft {
  overview: string;
  sections: SectionDraft[];
  keypoints: string[];
}

export interface VerificationVerdict {
  /** null when no model verdict was obtained; local checks then decide alone. */
  supported: boolean | null;
  reason: string;
  revisedQuestion: QuestionDraft | null;
}

export function normalizeDifficulty(value: unknown): Difficulty {
  const text = asString(value).toLowerCase();
  if (text === "easy" || text === "medium" || text === "hard") {
    return text;
  }
  return "medium";
}

export function normalizeQuestionType(value: unknown): QuestionType | null {
  const text = asString(value).toLowerCase();
  return QUESTION_TYPES.find((type) => type === text) ?? null;
}

/**
 * Keeps only citations that resolve to a known chunk, taking the page from the chunk itself.
 * Accepts citation objects or bare chunk-id strings.
 */
export function normalizeCitations(value: unknown, lookup: ChunkLookup): Citation[] {
  if (!Array.isArray(value)) {
    return [];
  }

  const citations: Citation[] = [];
  const seen = new Set<string>();
  const add = (chunk: Chunk | undefined) => {
    if (chunk && !seen.has(chunk.chunkId)) {
      seen.add(chunk.chunkId);
      citations.push(citationOf(chunk));
    }
  };

  for (const item of value) {
    if (isRecord(item)) {
      add(lookup.get(asString(pick(item, "chunkId", "chunk_id", "id"))));
      continue;
    }

    const text = asString(item);
    if (lookup.has(text)) {
      add(lookup.get(text));
      continue;
    }
    for (const token of text.match(CHUNK_ID_TOKEN) ?? []) {
      add(lookup.get(token));
    }
  }

  return citations;
}

export function normalizeMiniSummary(value: unknown, chunk: Chunk, lookup: ChunkLookup): MiniSummary {
  const root = asObject(value);
  const citations = normalizeCitations(pick(root, "citations"), lookup);

  return {
    page: chunk.page,
    chunkId: chunk.chunkId,
    miniSummary: asString(pick(root, "miniSummary", "mini_summary", "summary")),
    keywords: asStringArray(pick(root, "keywords")).slice(0, 5),
    citations: citations.length > 0 ? citations : [citationOf(chunk)]
  };
}

/** Concepts deduplicated by name; the first occurrence wins. */
export function normalizeConcepts(value: unknown, lookup: ChunkLookup): Concept[] {
  const root = isRecord(value) ? value.concepts : value;
  const concepts: Concept[] = [];
  const seen = new Set<string>();

  for (const item of asObjectArray(root)) {
    const name = asString(pick(item, "name", "concept"));
    if (!name || seen.has(name)) {
      continue;
    }

    seen.add(name);
    concepts.push({
      name,
      description: asString(pick(item, "description")),
      citations: normalizeCitations(pick(item, "citations"), lookup),
      difficulty: normalizeDifficulty(pick(item, "difficulty"))
    });
  }

  return concepts;
}

export function normalizeQuestionDraft(value: unknown, lookup: ChunkLookup): QuestionDraft {
  const outer = asObject(value);
  const nested = outer.question;
  const root = isRecord(nested) ? nested : outer;

  return {
    type: normalizeQuestionType(pick(root, "type")),
    question: asString(pick(root, "question", "prompt")),
    answer: asString(pick(root, "answer")),
    rationale: asString(pick(root, "rationale", "explanation")),
    citations: normalizeCitations(pick(root, "citations"), lookup),
    choices: asStringArray(pick(root, "choices", "options")),
    correctOption: asString(pick(root, "correctOption", "correct_option")).toUpperCase(),
    stepByStep: asStringArray(pick(root, "stepByStep", "step_by_step", "steps")),
    finalAnswer: asString(pick(root, "finalAnswer", "final_answer")),
    difficulty: normalizeDifficulty(pick(root, "difficulty")),
    conceptTags: asStringArray(pick(root, "conceptTags", "concept_tags")),
    insufficientEvidence: asBoolean(pick(root, "insufficientEvidence", "insufficient_evidence"))
  };
}

export function normalizeSummaryDraft(value: unknown, lookup: ChunkLookup): SummaryDraft {
  const root = asObject(value);

  return {
    overview: asString(pick(root, "overview")),
    sections: asObjectArray(pick(root, "sections")).map((section) => ({
      title: asString(pick(section, "title")),
      summary: asString(pick(section, "summary")),
      citations: normalizeCitations(pick(section, "citations"), lookup)
    })),
    keypoints: asStringArray(pick(root, "keypoints", "keyPoints", "key_points"))
  };
}

export function normalizeVerdict(value: unknown, lookup: ChunkLookup): VerificationVerdict {
  const root = asObject(value);
  const revised = pick(root, "revisedQuestion", "revised_question");
  const supported = pick(root, "supported");

  return {
    supported: supported === undefined ? null : asBoolean(supported),
    reason: asString(pick(root, "reason")),
    revisedQuestion: isRecord(revised) ? normalizeQuestionDraft(revised, lookup) : null
  };
}
