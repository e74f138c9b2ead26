import { QualityPolicy } from "../../config/runtimeConfig.js";
import {
  Chunk,
  CHOICE_LETTERS,
  ChoiceLetter,
  ChunkLookup,
  Citation,
  citationOf,
  Concept,
  EvidenceQuote,
  Question,
  QuestionType
} from "../../domain/models.js";
import { QuestionDraft } from "../../domain/normalize.js";
import { collapseWhitespace } from "../../utils/text.js";
import { extractQuote, isAcceptableQuote } from "../../utils/textQuality.js";

const META_QUESTION =
  /(哪一頁|哪一段|頁碼|頁號|頁面|出處|來源|段落|\bpages?\b|\bchunk(?:_id|s)?\b|p\d+_c\d+|which (?:section|paragraph|source)|source (?:text|document|material))/i;

const BANNED_CHOICE = /(all of the above|all the above|all of these|以上皆是|以上皆對|以上皆為|以上皆正確)/i;

const ENGLISH_QUESTION_START =
  /^(is|are|was|were|do|does|did|can|could|should|would|will|has|have|had|which|what|why|who)\b/i;
const CJK_QUESTION_WORD = /(什麼|為何|為什麼|如何|哪|多少|是否|是不是|能否|可否)/;
const CJK_QUESTION_PARTICLE = /(嗎|呢)$/;

const TRUE_LITERALS = new Set(["true", "t", "yes", "correct", "對", "是", "正確", "真"]);
const FALSE_LITERALS = new Set(["false", "f", "no", "incorrect", "錯", "否", "錯誤", "假"]);

const CHOICE_PREFIX = /^\s*[(（]?([A-D])(?:[.)．、:：）]\s*|\s+)/;
const ANSWER_LETTER = /^\s*[(（]?([A-D])(?:[.)．、:：）\s]|$)|^\s*([a-d])\s*$/;

export type ShapeResult = { ok: true; question: Question } | { ok: false; reason: string };

export interface ValidationOptions {
  allowedTypes: readonly QuestionType[];
  policy: QualityPolicy;
  lookup?: ChunkLookup;
}

export function isMetaQuestion(text: string): boolean {
  return Boolean(text) && META_QUESTION.test(text);
}

export function isInterrogative(text: string): boolean {
  const trimmed = text.trim();
  if (!trimmed) {
    return false;
  }

  return (
    /[?？]$/.test(trimmed) ||
    CJK_QUESTION_PARTICLE.test(trimmed) ||
    ENGLISH_QUESTION_START.test(trimmed) ||
    CJK_QUESTION_WORD.test(trimmed)
  );
}

/**
 * Turns a true/false prompt into a plain statement. Returns null when the cleaned text still
 * reads as a question.
 */
export function toTrueFalseStatement(text: string): string | null {
  const cleaned = text
    .trim()
    .replace(/^(true or false|true\/false|t\/f)\s*[:：,，-]?\s*/i, "")
    .replace(/^(請問|請回答|判斷)\s*[:：]?\s*/, "")
    .replace(/[?？]+$/, "")
    .replace(/(是否|是不是|能否|可否)/g, "")
    .replace(CJK_QUESTION_PARTICLE, "")
    .trim();

  if (!cleaned || isInterrogative(cleaned)) {
    return null;
  }
  return cleaned;
}

export function normalizeTrueFalseAnswer(answer: string): "true" | "false" | null {
  const text = answer.trim().toLowerCase().replace(/[.。!！]+$/, "");
  if (TRUE_LITERALS.has(text)) {
    return "true";
  }
  if (FALSE_LITERALS.has(text)) {
    return "false";
  }
  return null;
}

export function isBooleanLiteral(answer: string): boolean {
  return normalizeTrueFalseAnswer(answer) !== null;
}

export function hasBannedChoice(choices: readonly string[]): boolean {
  return choices.some((choice) => BANNED_CHOICE.test(choice));
}

/** Forces the "A " ... "D " prefixes; an existing prefix is dropped only when it names the same slot. */
export function normalizeChoices(choices: readonly string[]): string[] {
  return choices.map((choice, index) => {
    const letter = CHOICE_LETTERS[index] ?? String.fromCharCode(65 + index);
    const prefix = choice.match(CHOICE_PREFIX);
    const body = prefix && prefix[1] === letter ? choice.slice(prefix[0].length) : choice;
    return `${letter} ${body.trim()}`;
  });
}

export function toChoiceLetter(value: string): ChoiceLetter | null {
  const upper = value.trim().toUpperCase();
  return CHOICE_LETTERS.find((letter) => letter === upper) ?? null;
}

/**
 * Correct option from the explicit field, a leading letter in the answer, or an answer that
 * repeats one choice's text.
 */
export function resolveCorrectOption(draft: QuestionDraft, choices: readonly string[]): ChoiceLetter | null {
  const explicit = toChoiceLetter(draft.correctOption);
  if (explicit) {
    return explicit;
  }

  const lettered = draft.answer.match(ANSWER_LETTER);
  if (lettered) {
    return toChoiceLetter(lettered[1] ?? lettered[2] ?? "");
  }

  const answer = collapseWhitespace(draft.answer).toLowerCase();
  if (!answer) {
    return null;
  }
  const index = choices.findIndex((choice) => collapseWhitespace(choice.slice(2)).toLowerCase() === answer);
  return index >= 0 ? CHOICE_LETTERS[index] : null;
}

/**
 * True when the text names a titled work (《...》 or a book/paper/article "...") that the
 * evidence never mentions.
 */
export function containsExternalReference(text: string, evidenceText: string): boolean {
  const titles = [
    ...[...text.matchAll(/《([^》]{2,20})》/g)].map((match) => match[1]),
    ...[...text.matchAll(/\b(?:book|novel|film|movie|paper|article|textbook)\s+["“]([^"”]{2,60})["”]/gi)].map(
      (match) => match[1]
    )
  ];
  const haystack = evidenceText.toLowerCase();
  return titles.some((title) => !haystack.includes(title.toLowerCase()));
}

export function isVerbatimQuote(quote: EvidenceQuote, lookup: ChunkLookup): boolean {
  const chunk = lookup.get(quote.chunkId);
  const text = collapseWhitespace(quote.quote);
  return Boolean(chunk) && text.length > 0 && collapseWhitespace(chunk?.text ?? "").includes(text);
}

/**
 * Applies the per-type format rules to a model draft. The requested type and id always win over
 * whatever the draft claims, and the source concept stays the first tag.
 */
export function shapeQuestion(draft: QuestionDraft, id: string, type: QuestionType, concept: Concept | null): ShapeResult {
  if (draft.insufficientEvidence) {
    return { ok: false, reason: "insufficient evidence" };
  }
  if (isMetaQuestion(draft.question)) {
    return { ok: false, reason: "meta question" };
  }

  const base = {
    id,
    question: draft.question,
    answer: draft.answer,
    rationale: draft.rationale,
    citations: draft.citations,
    evidenceQuotes: [],
    difficulty: draft.difficulty,
    conceptTags: concept ? [...new Set([concept.name, ...draft.conceptTags])] : draft.conceptTags
  };

  switch (type) {
    case "tf": {
      const statement = toTrueFalseStatement(draft.question);
      if (!statement) {
        return { ok: false, reason: "tf question format" };
      }
      const answer = normalizeTrueFalseAnswer(draft.answer);
      if (!answer) {
        return { ok: false, reason: "tf answer" };
      }
      return { ok: true, question: { ...base, type, question: statement, answer } };
    }
    case "mcq": {
      if (hasBannedChoice(draft.choices)) {
        return { ok: false, reason: "banned mcq choice" };
      }
      if (draft.choices.length !== 4) {
        return { ok: false, reason: "mcq needs exactly 4 choices" };
      }
      const choices = normalizeChoices(draft.choices);
      const correctOption = resolveCorrectOption(draft, choices);
      if (!correctOption) {
        return { ok: false, reason: "mcq correct option" };
      }
      const answerLetter = draft.answer.match(ANSWER_LETTER);
      if (answerLetter && toChoiceLetter(answerLetter[1] ?? answerLetter[2] ?? "") !== correctOption) {
        return { ok: false, reason: "mcq answer mismatch" };
      }
      return { ok: true, question: { ...base, type, choices, correctOption, answer: correctOption } };
    }
    case "short": {
      if (isBooleanLiteral(draft.answer)) {
        return { ok: false, reason: "short answer format" };
      }
      return { ok: true, question: { ...base, type } };
    }
    case "calc": {
      const finalAnswer = draft.finalAnswer || draft.answer;
      if (draft.stepByStep.length === 0 || !finalAnswer) {
        return { ok: false, reason: "calc steps" };
      }
      return {
        ok: true,
        question: { ...base, type, answer: draft.answer || finalAnswer, stepByStep: draft.stepByStep, finalAnswer }
      };
    }
  }
}

/**
 * Restricts citations to the evidence, attaches one verbatim evidence quote and makes sure the
 * rationale carries it.
 */
export function groundQuestion<T extends Question>(question: T, evidence: readonly Chunk[], policy: QualityPolicy): T {
  const evidenceIds = new Set(evidence.map((chunk) => chunk.chunkId));
  let citations: Citation[] = question.citations.filter((citation) => evidenceIds.has(citation.chunkId));
  if (citations.length === 0 && evidence.length > 0) {
    citations = [citationOf(evidence[0])];
  }

  const cited = citations.flatMap((citation) => evidence.filter((chunk) => chunk.chunkId === citation.chunkId));
  const quote = firstQuote(cited, policy) ?? firstQuote(evidence, policy);
  if (quote && !citations.some((citation) => citation.chunkId === quote.chunkId)) {
    citations = [...citations, { page: quote.page, chunkId: quote.chunkId }];
  }

  const evidenceQuotes = quote ? [quote] : [];
  const rationale =
    quote && !question.rationale.includes(quote.quote)
      ? `${question.rationale} (Quote: "${quote.quote}")`.trim()
      : question.rationale;

  return { ...question, citations, evidenceQuotes, rationale };
}

function firstQuote(chunks: readonly Chunk[], policy: QualityPolicy): EvidenceQuote | null {
  for (const chunk of chunks) {
    const quote = extractQuote(chunk, policy);
    if (quote) {
      return { page: chunk.page, chunkId: chunk.chunkId, quote };
    }
  }
  return null;
}

/** Every reason the question would be rejected; empty when it is acceptable. */
export function questionProblems(question: Question, options: ValidationOptions): string[] {
  const problems: string[] = [];

  if (!options.allowedTypes.includes(question.type)) {
    problems.push(`type ${question.type} not requested`);
  }
  if (!question.question || !question.answer || !question.rationale) {
    problems.push("missing question, answer or rationale");
  }
  if (isMetaQuestion(question.question)) {
    problems.push("meta question");
  }
  if (question.citations.length === 0) {
    problems.push("no citations");
  }
  if (options.lookup && question.citations.some((citation) => !options.lookup?.has(citation.chunkId))) {
    problems.push("unknown citation");
  }
  if (question.evidenceQuotes.length === 0) {
    problems.push("no evidence quote");
  }
  if (question.evidenceQuotes.some((quote) => !isAcceptableQuote(quote.quote, options.policy))) {
    problems.push("unacceptable evidence quote");
  }

  switch (question.type) {
    case "mcq":
      if (question.choices.length !== 4) {
        problems.push("mcq needs exactly 4 choices");
      }
      if (hasBannedChoice(question.choices)) {
        problems.push("banned mcq choice");
      }
      if (question.choices.some((choice, index) => !choice.startsWith(`${CHOICE_LETTERS[index]} `))) {
        problems.push("mcq choice prefix");
      }
      if (!toChoiceLetter(question.correctOption) || question.answer !== question.correctOption) {
        problems.push("mcq correct option");
      }
      break;
    case "tf":
      if (question.answer !== "true" && question.answer !== "false") {
        problems.push("tf answer");
      }
      if (isInterrogative(question.question)) {
        problems.push("tf question reads as a question");
      }
      break;
    case "short":
      if (isBooleanLiteral(question.answer)) {
        problems.push("short answer is a boolean");
      }
      break;
    case "calc":
      if (question.stepByStep.length === 0 || !question.finalAnswer) {
        problems.push("calc steps");
      }
      break;
  }

  return problems;
}
