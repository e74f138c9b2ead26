import { AgentRuntime } from "../../agents/runtime/agentRuntime.js";
import { AgentStageResult, StageRecorder } from "../../agents/runtime/stageResult.js";
import { QualityPolicy, RuntimeConfig } from "../../config/runtimeConfig.js";
import { Chunk, ChunkLookup, citationOf, Concept, Question, QuestionType } from "../../domain/models.js";
import { normalizeQuestionDraft, QuestionDraft } from "../../domain/normalize.js";
import { stripTerminal } from "../../utils/text.js";
import { extractQuote } from "../../utils/textQuality.js";
import { formatEvidence } from "../evidence/evidenceContext.js";
import { EvidenceIndex } from "../evidence/evidenceIndex.js";
import { citationSearchStrategies, resolveEvidence } from "../evidence/evidenceStrategies.js";
import { groundQuestion, questionProblems, shapeQuestion } from "./questionRules.js";

const CONCEPT_SEARCH_K = 8;

const TYPE_INSTRUCTIONS: Record<QuestionType, string> = {
  tf: 'A true/false item: "question" is a declarative statement (no question mark, no interrogative words) and "answer" is "true" or "false".',
  mcq: 'A multiple-choice item: exactly 4 "choices" prefixed "A ", "B ", "C ", "D "; "correctOption" and "answer" are the same letter. Never use "All of the above".',
  short: 'A short-answer item: "answer" is a short phrase from the evidence, never "true" or "false".',
  calc: 'A calculation item: "stepByStep" lists the worked steps and "finalAnswer" holds the result.'
};

const QUESTION_SYSTEM_PROMPT = [
  "You write one exam question about a concept from lecture material.",
  "Use only the evidence excerpts. Do not ask about pages, chunks, sections or where something appears.",
  "Do not mention books, papers or other works that the evidence does not name.",
  "Cite the evidence chunks that support the answer.",
  'If the evidence cannot support a question, return { "insufficientEvidence": true }.',
  "Return only JSON.",
  "Output schema:",
  "{",
  '  "question": string,',
  '  "answer": string,',
  '  "rationale": string,',
  '  "choices": string[],',
  '  "correctOption": "A|B|C|D",',
  '  "stepByStep": string[],',
  '  "finalAnswer": string,',
  '  "citations": [{ "page": number, "chunkId": string }],',
  '  "difficulty": "easy|medium|hard",',
  '  "conceptTags": string[],',
  '  "insufficientEvidence": boolean',
  "}"
].join("\n");

/** What a draft is shaped against. The concept only supplies default tags. */
export interface DraftContext {
  concept: Concept | null;
  evidence: readonly Chunk[];
  id: string;
  type: QuestionType;
  lookup: ChunkLookup;
}

export interface QuestionRequest extends DraftContext {
  concept: Concept;
}

export interface GenerationOutcome {
  question: Question | null;
  attempts: number;
  rejections: string[];
}

export class QuestionGenerator {
  constructor(
    private readonly runtime: AgentRuntime,
    private readonly config: RuntimeConfig
  ) {}

  /** Evidence for a concept: its citations, else a search on its name, else the leading informative chunks. */
  async selectEvidence(concept: Concept, index: EvidenceIndex, lookup: ChunkLookup): Promise<Chunk[]> {
    const resolved = await resolveEvidence(
      citationSearchStrategies({
        citations: concept.citations,
        query: concept.name,
        searchK: CONCEPT_SEARCH_K,
        index,
        lookup,
        policy: this.config.quality
      }),
      this.config.quality
    );
    return resolved.chunks;
  }

  async generate(request: QuestionRequest): Promise<AgentStageResult<GenerationOutcome>> {
    const recorder = new StageRecorder();
    const maxAttempts = this.config.pipeline.questionRetries + 1;
    const rejections: string[] = [];
    const userPrompt = this.buildUserPrompt(request);

    for (let attempt = 1; attempt <= maxAttempts; attempt += 1) {
      const run = await this.runtime.runJson<QuestionDraft | null>({
        stage: "questions",
        agentName: `question-${request.id}-attempt-${attempt}`,
        systemPrompt: `${QUESTION_SYSTEM_PROMPT}\n${TYPE_INSTRUCTIONS[request.type]}`,
        userPrompt,
        parse: (value) => normalizeQuestionDraft(value, request.lookup),
        fallback: () => buildExtractiveDraft(request.concept, request.evidence, request.type, this.config.quality),
        temperature: 0.3
      });
      const draft = recorder.record(run);

      const built = draft ? this.buildFromDraft(draft, request) : "no draft";
      if (typeof built !== "string") {
        console.log(`[questions] ${request.id} accepted on attempt ${attempt}`);
        return recorder.finish({ question: built, attempts: attempt, rejections });
      }

      rejections.push(built);
      console.warn(`[questions] ${request.id} rejected (${built}), attempt ${attempt}/${maxAttempts}`);
      if (run.trace.fallbackUsed && this.runtime.mode === "mock") {
        break;
      }
    }

    return recorder.finish({ question: null, attempts: maxAttempts, rejections });
  }

  /** Shapes, grounds and validates one draft. Returns the question, or the rejection reason. */
  buildFromDraft(draft: QuestionDraft, request: DraftContext): Question | string {
    const shaped = shapeQuestion(draft, request.id, request.type, request.concept);
    if (!shaped.ok) {
      return shaped.reason;
    }

    const grounded = groundQuestion(shaped.question, request.evidence, this.config.quality);
    const problems = questionProblems(grounded, {
      allowedTypes: this.config.pipeline.questionTypes,
      policy: this.config.quality,
      lookup: request.lookup
    });
    return problems.length === 0 ? grounded : problems.join(", ");
  }

  private buildUserPrompt(request: QuestionRequest): string {
    return [
      `Question id: ${request.id}`,
      `Question type: ${request.type}`,
      `Concept: ${JSON.stringify({ name: request.concept.name, description: request.concept.description })}`,
      "Evidence:",
      formatEvidence(request.evidence, this.config.pipeline.evidenceBudgetTokens, this.config.pipeline.maxInputChars)
    ].join("\n");
  }
}

/**
 * Question built straight from an evidence quote, used when the model gives no usable reply.
 * Only true/false statements and fill-in-the-blank short answers can be built this way.
 */
export function buildExtractiveDraft(
  concept: Concept,
  evidence: readonly Chunk[],
  type: QuestionType,
  policy: QualityPolicy
): QuestionDraft | null {
  for (const chunk of evidence) {
    const quote = extractQuote(chunk, policy);
    const statement = stripTerminal(quote);
    if (!statement) {
      continue;
    }

    const base: QuestionDraft = {
      type,
      question: statement,
      answer: "true",
      rationale: `The lecture states: "${quote}"`,
      citations: [citationOf(chunk)],
      choices: [],
      correctOption: "",
      stepByStep: [],
      finalAnswer: "",
      difficulty: concept.difficulty,
      conceptTags: [concept.name],
      insufficientEvidence: false
    };

    if (type === "tf") {
      return base;
    }

    if (type === "short") {
      const position = statement.toLowerCase().indexOf(concept.name.toLowerCase());
      if (position < 0 || concept.name.length >= statement.length) {
        continue;
      }
      const answer = statement.slice(position, position + concept.name.length);
      const blanked = `${statement.slice(0, position)}____${statement.slice(position + concept.name.length)}`;
      return { ...base, question: `Fill in the blank: ${blanked}`, answer };
    }

    return null;
  }

  return null;
}
