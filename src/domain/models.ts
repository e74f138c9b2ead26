export const QUESTION_TYPES = ["tf", "mcq", "short", "calc"] as const;

export type QuestionType = (typeof QUESTION_TYPES)[number];

export type Difficulty = "easy" | "medium" | "hard";

export const CHOICE_LETTERS = ["A", "B", "C", "D"] as const;

export type ChoiceLetter = (typeof CHOICE_LETTERS)[number];

export interface PageRecord {
  page: number;
  text: string;
  lines: string[];
}

export interface Chunk {
  readonly chunkId: string;
  readonly page: number;
  readonly sectionTitle: string;
  readonly text: string;
}

export interface Citation {
  page: number;
  chunkId: string;
}

export interface EvidenceQuote {
  page: number;
  chunkId: string;
  quote: string;
}

export interface MiniSummary {
  page: number;
  chunkId: string;
  miniSummary: string;
  keywords: string[];
  citations: Citation[];
}

export interface Concept {
  name: string;
  description: string;
  citations: Citation[];
  difficulty: Difficulty;
}

export interface SummarySection {
  title: string;
  summary: string;
  citations: Citation[];
}

export interface SummaryBlock {
  overview: string;
  sections: SummarySection[];
  keypoints: string[];
}

interface QuestionBase {
  id: string;
  question: string;
  answer: string;
  rationale: string;
  citations: Citation[];
  evidenceQuotes: EvidenceQuote[];
  difficulty: Difficulty;
  conceptTags: string[];
}

export interface TrueFalseQuestion extends QuestionBase {
  type: "tf";
}

export interface MultipleChoiceQuestion extends QuestionBase {
  type: "mcq";
  choices: string[];
  correctOption: string;
}

export interface ShortAnswerQuestion extends QuestionBase {
  type: "short";
}

export interface CalculationQuestion extends QuestionBase {
  type: "calc";
  stepByStep: string[];
  finalAnswer: string;
}

export type Question = TrueFalseQuestion | MultipleChoiceQuestion | ShortAnswerQuestion | CalculationQuestion;

export interface QuizOutput {
  summary: SummaryBlock;
  questions: Question[];
}

export type ChunkLookup = ReadonlyMap<string, Chunk>;

export function buildChunkLookup(chunks: readonly Chunk[]): Map<string, Chunk> {
  return new Map(chunks.map((chunk) => [chunk.chunkId, chunk]));
}

export function citationOf(chunk: Chunk): Citation {
  return { page: chunk.page, chunkId: chunk.chunkId };
}
