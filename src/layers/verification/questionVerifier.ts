import { AgentRuntime } from "../../agents/runtime/agentRuntime.js";
import { AgentStageResult, StageRecorder } from "../../agents/runtime/stageResult.js";
import { RuntimeConfig } from "../../config/runtimeConfig.js";
import { Chunk, ChunkLookup, Concept, Question } from "../../domain/models.js";
import { normalizeVerdict, VerificationVerdict } from "../../domain/normalize.js";
import { formatEvidence } from "../evidence/evidenceContext.js";
import { EvidenceIndex } from "../evidence/evidenceIndex.js";
import { citationSearchStrategies, resolveEvidence } from "../evidence/evidenceStrategies.js";
import { QuestionGenerator } from "../questions/questionGenerator.js";
import {
  containsExternalReference,
  hasBannedChoice,
  isBooleanLiteral,
  isInterrogative,
  isMetaQuestion,
  isVerbatimQuote
} from "../questions/questionRules.js";

const VERIFY_SEARCH_K = 5;

const VERIFY_SYSTEM_PROMPT = [
  "You check whether an exam question is fully supported by the evidence excerpts.",
  "A question is supported only if its answer and rationale follow from the evidence alone.",
  "If it is not supported, explain why and give a corrected question of the same type that the evidence supports.",
  "Return only JSON.",
  "Output schema:",
  "{",
  '  "supported": boolean,',
  '  "reason": string,',
  '  "revisedQuestion": null | { "question": string, "answer": string, "rationale": string, "choices": string[], "correctOption": string, "stepByStep": string[], "finalAnswer": string, "citations": [{ "page": number, "chunkId": string }], "difficulty": string, "conceptTags": string[] }',
  "}"
].join("\n");

export type VerificationState = "proposed" | "accepted" | "rewritten" | "regenerated" | "dropped";

export interface VerificationStep {
  state: VerificationState;
  questionId: string;
  attempt: number;
  reason: string;
}

export interface VerificationOutcome {
  question: Question | null;
  finalState: "accepted" | "dropped";
  history: VerificationStep[];
}

export interface VerificationContext {
  index: EvidenceIndex;
  lookup: ChunkLookup;
  concepts: ReadonlyMap<string, Concept>;
}

/**
 * Local grounding checks that override any model verdict. Empty when the question is grounded.
 */
export function groundingViolations(question: Question, evidence: readonly Chunk[], lookup: ChunkLookup): string[] {
  const violations: string[] = [];

  if (question.citations.length === 0) {
    violations.push("no citations");
  }
  if (question.citations.some((citation) => !lookup.has(citation.chunkId))) {
    violations.push("unknown citation");
  }
  if (isMetaQuestion(question.question)) {
    violations.push("meta question");
  }
  if (question.type === "tf" && isInterrogative(question.question)) {
    violations.push("tf question reads as a question");
  }
  if (question.type === "short" && isBooleanLiteral(question.answer)) {
    violations.push("short answer is a boolean");
  }
  if (question.type === "mcq" && hasBannedChoice(question.choices)) {
    violations.push("banned mcq choice");
  }

  const claimText = [question.question, question.answer, question.rationale].join(" ");
  if (containsExternalReference(claimText, evidence.map((chunk) => chunk.text).join("\n"))) {
    violations.push("external reference");
  }
  if (question.evidenceQuotes.some((quote) => !isVerbatimQuote(quote, lookup))) {
    violations.push("quote not verbatim");
  }

  return violations;
}

export class QuestionVerifier {
  constructor(
    private readonly runtime: AgentRuntime,
    private readonly config: RuntimeConfig,
    private readonly generator: QuestionGenerator
  ) {}

  async verifyAll(
    questions: readonly Question[],
    context: VerificationContext
  ): Promise<AgentStageResult<VerificationOutcome[]>> {
    const recorder = new StageRecorder();
    const outcomes: VerificationOutcome[] = [];

    for (const question of questions) {
      outcomes.push(recorder.absorb(await this.verify(question, context)));
    }

    const accepted = outcomes.filter((outcome) => outcome.finalState === "accepted").length;
    console.log(`[verify] ${accepted}/${questions.length} question(s) accepted`);
    return recorder.finish(outcomes);
  }

  /**
   * Proposed -> Accepted | Rewritten -> Proposed | Regenerated -> Proposed | Dropped.
   * A regenerated question is verified once more without further regeneration.
   */
  async verify(
    question: Question,
    context: VerificationContext,
    allowRegeneration = true
  ): Promise<AgentStageResult<VerificationOutcome>> {
    const recorder = new StageRecorder();
    const history: VerificationStep[] = [{ state: "proposed", questionId: question.id, attempt: 0, reason: "" }];
    const maxAttempts = this.config.pipeline.verifyRetries + 1;
    let current = question;

    for (let attempt = 1; attempt <= maxAttempts; attempt += 1) {
      const evidence = await this.collectEvidence(current, context);
      const verdict = recorder.record(
        await this.runtime.runJson<VerificationVerdict>({
          stage: "verify",
          agentName: `verify-${current.id}-attempt-${attempt}`,
          systemPrompt: VERIFY_SYSTEM_PROMPT,
          userPrompt: this.buildUserPrompt(current, evidence),
          parse: (value) => normalizeVerdict(value, context.lookup),
          fallback: () => ({ supported: null, reason: "no verdict from the model", revisedQuestion: null })
        })
      );

      const violations = groundingViolations(current, evidence, context.lookup);
      if (violations.length === 0 && verdict.supported !== false) {
        history.push({ state: "accepted", questionId: current.id, attempt, reason: verdict.reason });
        return recorder.finish({ question: current, finalState: "accepted", history });
      }

      const reason = violations.length > 0 ? violations.join(", ") : verdict.reason || "not supported by the evidence";
      if (!verdict.revisedQuestion) {
        console.warn(`[verify] ${current.id} unsupported (${reason}), no revision offered`);
        continue;
      }

      const concept = context.concepts.get(current.conceptTags[0] ?? "") ?? null;
      const revised = verdict.revisedQuestion;
      const built = this.generator.buildFromDraft(
        { ...revised, conceptTags: revised.conceptTags.length > 0 ? revised.conceptTags : current.conceptTags },
        { id: current.id, type: current.type, evidence, lookup: context.lookup, concept }
      );
      if (typeof built === "string") {
        console.warn(`[verify] ${current.id} revision rejected (${built})`);
        continue;
      }

      current = built;
      history.push({ state: "rewritten", questionId: current.id, attempt, reason });
      console.log(`[verify] ${current.id} rewritten (${reason})`);

      if (attempt === maxAttempts && groundingViolations(current, evidence, context.lookup).length === 0) {
        history.push({ state: "accepted", questionId: current.id, attempt, reason: "rewrite passed local checks" });
        return recorder.finish({ question: current, finalState: "accepted", history });
      }
    }

    if (allowRegeneration) {
      const regenerated = await this.regenerate(current, question, context, recorder);
      if (regenerated) {
        history.push({ state: "regenerated", questionId: regenerated.id, attempt: maxAttempts, reason: "verification failed" });
        const nested = recorder.absorb(await this.verify(regenerated, context, false));
        history.push(...nested.history);
        if (nested.question) {
          return recorder.finish({ question: nested.question, finalState: "accepted", history });
        }
        return recorder.finish({ question: null, finalState: "dropped", history });
      }
    }

    console.warn(`[verify] ${question.id} dropped`);
    history.push({ state: "dropped", questionId: question.id, attempt: maxAttempts, reason: "could not be grounded" });
    return recorder.finish({ question: null, finalState: "dropped", history });
  }

  private async regenerate(
    current: Question,
    original: Question,
    context: VerificationContext,
    recorder: StageRecorder
  ): Promise<Question | null> {
    const concept =
      context.concepts.get(current.conceptTags[0] ?? "") ?? context.concepts.get(original.conceptTags[0] ?? "");
    if (!concept) {
      return null;
    }

    const evidence = await this.generator.selectEvidence(concept, context.index, context.lookup);
    const outcome = recorder.absorb(
      await this.generator.generate({
        concept,
        evidence,
        id: original.id,
        type: original.type,
        lookup: context.lookup
      })
    );
    return outcome.question;
  }

  private async collectEvidence(question: Question, context: VerificationContext): Promise<Chunk[]> {
    const resolved = await resolveEvidence(
      citationSearchStrategies({
        citations: question.citations,
        query: question.question,
        searchK: VERIFY_SEARCH_K,
        index: context.index,
        lookup: context.lookup,
        policy: this.config.quality
      }),
      this.config.quality
    );
    return resolved.chunks;
  }

  private buildUserPrompt(question: Question, evidence: readonly Chunk[]): string {
    return [
      "Question:",
      JSON.stringify(question, null, 2),
      "Evidence:",
      formatEvidence(evidence, this.config.pipeline.evidenceBudgetTokens, this.config.pipeline.maxInputChars)
    ].join("\n");
  }
}
