import { QUESTION_TYPES, QuestionType } from "../domain/models.js";

export type AgentMode = "live" | "mock";

export type Environment = Readonly<Record<string, string | undefined>>;

/**
 * Character-quality thresholds used to reject garbled evidence. They are tuned for mixed CJK and
 * Latin lecture notes and can be overridden per run.
 */
export interface QualityPolicy {
  readonly quoteMinChars: number;
  readonly quotePreferredChars: number;
  readonly quoteMaxChars: number;
  readonly quoteMinAllowedRatio: number;
  readonly noisyLineMinAllowedRatio: number;
  readonly lowInfoChunkMinChars: number;
  readonly lowInfoChunkMinAllowedRatio: number;
}

export interface PipelineSettings {
  readonly questionCount: number;
  readonly questionTypes: readonly QuestionType[];
  readonly questionRetries: number;
  readonly verifyRetries: number;
  readonly summaryRetries: number;
  readonly chunkChars: number;
  readonly overlapChars: number;
  readonly minChunkChars: number;
  readonly topKChunks: number;
  readonly maxChunks: number;
  readonly longDocThresholdPages: number;
  readonly selectorChunkThreshold: number;
  readonly seed: number;
  readonly maxInputChars: number;
  readonly evidenceBudgetTokens: number;
  readonly summaryBudgetTokens: number;
  readonly embedCacheEnabled: boolean;
  readonly embedCacheDir: string;
  readonly pageFilter: readonly number[] | null;
  readonly chapterFilter: string | null;
  readonly maxPages: number | null;
}

export interface RuntimeConfig {
  readonly mode: AgentMode;
  readonly gatewayApiKey?: string;
  readonly chatModel: string;
  readonly embedModel: string;
  readonly maxOutputTokens: number;
  readonly temperature: number;
  readonly retryCount: number;
  readonly chatTimeoutMs: number;
  readonly reduceTimeoutMs: number;
  readonly embedTimeoutMs: number;
  readonly healthTimeoutMs: number;
  readonly mapConcurrency: number;
  readonly embedConcurrency: number;
  readonly verboseAgentLogs: boolean;
  readonly pipeline: PipelineSettings;
  readonly quality: QualityPolicy;
}

const DEFAULT_CHAT_MODEL = "openai/gpt-4o-mini";
const DEFAULT_EMBED_MODEL = "openai/text-embedding-3-small";

export const DEFAULT_QUALITY_POLICY: QualityPolicy = Object.freeze({
  quoteMinChars: 20,
  quotePreferredChars: 40,
  quoteMaxChars: 80,
  quoteMinAllowedRatio: 0.7,
  noisyLineMinAllowedRatio: 0.6,
  lowInfoChunkMinChars: 40,
  lowInfoChunkMinAllowedRatio: 0.6
});

export function loadRuntimeConfig(env: Environment = process.env): RuntimeConfig {
  const reader = new EnvReader(env);
  const gatewayApiKey = env.AI_GATEWAY_API_KEY?.trim() || undefined;
  const mode = resolveMode(reader, gatewayApiKey);

  if (mode === "live" && !gatewayApiKey) {
    throw new Error(
      "AI_GATEWAY_API_KEY is required for live agent mode. Set GROUNDQUIZ_AGENT_MODE=mock to run without API calls."
    );
  }

  const pipeline: PipelineSettings = {
    questionCount: reader.integer("GROUNDQUIZ_QUESTION_COUNT", 5, 1),
    questionTypes: reader.questionTypes("GROUNDQUIZ_QUESTION_TYPES", ["tf", "mcq"]),
    questionRetries: reader.integer("GROUNDQUIZ_QUESTION_RETRIES", 2, 0),
    verifyRetries: reader.integer("GROUNDQUIZ_VERIFY_RETRIES", 1, 0),
    summaryRetries: reader.integer("GROUNDQUIZ_SUMMARY_RETRIES", 1, 0),
    chunkChars: reader.integer("GROUNDQUIZ_CHUNK_CHARS", 800, 100),
    overlapChars: reader.integer("GROUNDQUIZ_OVERLAP_CHARS", 120, 0),
    minChunkChars: reader.integer("GROUNDQUIZ_MIN_CHUNK_CHARS", 40, 0),
    topKChunks: reader.integer("GROUNDQUIZ_TOP_K_CHUNKS", 40, 1),
    maxChunks: reader.integer("GROUNDQUIZ_MAX_CHUNKS", 60, 1),
    longDocThresholdPages: reader.integer("GROUNDQUIZ_LONG_DOC_THRESHOLD_PAGES", 30, 1),
    selectorChunkThreshold: reader.integer("GROUNDQUIZ_SELECTOR_CHUNK_THRESHOLD", 80, 1),
    seed: reader.integer("GROUNDQUIZ_SEED", 42, 0),
    maxInputChars: reader.integer("GROUNDQUIZ_MAX_INPUT_CHARS", 12000, 500),
    evidenceBudgetTokens: reader.integer("GROUNDQUIZ_EVIDENCE_BUDGET_TOKENS", 1200, 50),
    summaryBudgetTokens: reader.integer("GROUNDQUIZ_SUMMARY_BUDGET_TOKENS", 2500, 50),
    embedCacheEnabled: reader.boolean("GROUNDQUIZ_EMBED_CACHE", true),
    embedCacheDir: reader.string("GROUNDQUIZ_EMBED_CACHE_DIR", ".cache/embeddings"),
    pageFilter: parsePageRanges(env.GROUNDQUIZ_PAGES),
    chapterFilter: env.GROUNDQUIZ_CHAPTER?.trim() || null,
    maxPages: reader.optionalInteger("GROUNDQUIZ_MAX_PAGES", 1)
  };

  const quality: QualityPolicy = {
    quoteMinChars: DEFAULT_QUALITY_POLICY.quoteMinChars,
    quotePreferredChars: DEFAULT_QUALITY_POLICY.quotePreferredChars,
    quoteMaxChars: DEFAULT_QUALITY_POLICY.quoteMaxChars,
    quoteMinAllowedRatio: reader.ratio("GROUNDQUIZ_QUOTE_MIN_ALLOWED_RATIO", DEFAULT_QUALITY_POLICY.quoteMinAllowedRatio),
    noisyLineMinAllowedRatio: reader.ratio(
      "GROUNDQUIZ_NOISY_LINE_MIN_ALLOWED_RATIO",
      DEFAULT_QUALITY_POLICY.noisyLineMinAllowedRatio
    ),
    lowInfoChunkMinChars: reader.integer("GROUNDQUIZ_LOW_INFO_MIN_CHARS", DEFAULT_QUALITY_POLICY.lowInfoChunkMinChars, 0),
    lowInfoChunkMinAllowedRatio: reader.ratio(
      "GROUNDQUIZ_LOW_INFO_MIN_ALLOWED_RATIO",
      DEFAULT_QUALITY_POLICY.lowInfoChunkMinAllowedRatio
    )
  };

  return deepFreeze({
    mode,
    gatewayApiKey,
    chatModel: reader.string("AI_GATEWAY_MODEL", DEFAULT_CHAT_MODEL),
    embedModel: reader.string("AI_GATEWAY_EMBED_MODEL", DEFAULT_EMBED_MODEL),
    maxOutputTokens: reader.integer("GROUNDQUIZ_MAX_OUTPUT_TOKENS", 2048, 256),
    temperature: reader.number("GROUNDQUIZ_TEMPERATURE", 0.2, 0),
    retryCount: reader.integer("GROUNDQUIZ_RETRY_COUNT", 0, 0),
    chatTimeoutMs: reader.integer("GROUNDQUIZ_CHAT_TIMEOUT_MS", 120000, 1000),
    reduceTimeoutMs: reader.integer("GROUNDQUIZ_REDUCE_TIMEOUT_MS", 240000, 1000),
    embedTimeoutMs: reader.integer("GROUNDQUIZ_EMBED_TIMEOUT_MS", 60000, 1000),
    healthTimeoutMs: reader.integer("GROUNDQUIZ_HEALTH_TIMEOUT_MS", 10000, 1000),
    mapConcurrency: reader.integer("GROUNDQUIZ_MAP_CONCURRENCY", 1, 1),
    embedConcurrency: reader.integer("GROUNDQUIZ_EMBED_CONCURRENCY", 1, 1),
    verboseAgentLogs: reader.boolean("GROUNDQUIZ_VERBOSE_LOGS", true),
    pipeline,
    quality
  });
}

/**
 * Parses "1-3,5" style page lists. Malformed parts are skipped; an empty result means no filter.
 */
export function parsePageRanges(value: string | undefined): number[] | null {
  if (!value?.trim()) {
    return null;
  }

  const pages = new Set<number>();
  for (const part of value.split(",").map((item) => item.trim()).filter((item) => item.length > 0)) {
    const range = part.match(/^(\d+)\s*-\s*(\d+)$/);
    if (range) {
      const start = Number(range[1]);
      const end = Number(range[2]);
      for (let page = Math.min(start, end); page <= Math.max(start, end); page += 1) {
        pages.add(page);
      }
      continue;
    }

    if (/^\d+$/.test(part)) {
      pages.add(Number(part));
    }
  }

  return pages.size > 0 ? [...pages].sort((left, right) => left - right) : null;
}

function resolveMode(reader: EnvReader, apiKey: string | undefined): AgentMode {
  const raw = reader.string("GROUNDQUIZ_AGENT_MODE", "auto").toLowerCase();

  if (raw === "live") {
    return "live";
  }
  if (raw === "mock") {
    return "mock";
  }

  return apiKey ? "live" : "mock";
}

class EnvReader {
  constructor(private readonly env: Environment) {}

  string(name: string, fallback: string): string {
    const value = this.env[name]?.trim();
    return value && value.length > 0 ? value : fallback;
  }

  number(name: string, fallback: number, min: number): number {
    const raw = this.env[name]?.trim();
    if (!raw) {
      return fallback;
    }

    const parsed = Number(raw);
    if (!Number.isFinite(parsed) || parsed < min) {
      throw new Error(`${name} must be a number greater than or equal to ${min}. Received: ${raw}`);
    }

    return parsed;
  }

  integer(name: string, fallback: number, min: number): number {
    const value = this.number(name, fallback, min);
    if (!Number.isInteger(value)) {
      throw new Error(`${name} must be a whole number. Received: ${value}`);
    }
    return value;
  }

  optionalInteger(name: string, min: number): number | null {
    const raw = this.env[name]?.trim();
    return raw ? this.integer(name, min, min) : null;
  }

  ratio(name: string, fallback: number): number {
    const value = this.number(name, fallback, 0);
    if (value > 1) {
      throw new Error(`${name} must be a ratio between 0 and 1. Received: ${value}`);
    }
    return value;
  }

  boolean(name: string, fallback: boolean): boolean {
    const raw = this.env[name]?.trim().toLowerCase();
    if (!raw) {
      return fallback;
    }

    if (["1", "true", "yes", "on"].includes(raw)) {
      return true;
    }
    if (["0", "false", "no", "off"].includes(raw)) {
      return false;
    }

    throw new Error(`${name} must be a boolean (true/false). Received: ${raw}`);
  }

  questionTypes(name: string, fallback: QuestionType[]): QuestionType[] {
    const raw = this.env[name]?.trim();
    if (!raw) {
      return fallback;
    }

    const types: QuestionType[] = [];
    const items = raw
      .split(",")
      .map((value) => value.trim().toLowerCase())
      .filter((value) => value.length > 0);

    for (const item of items) {
      const known = QUESTION_TYPES.find((type) => type === item);
      if (!known) {
        throw new Error(`${name} must list question types from ${QUESTION_TYPES.join(", ")}. Received: ${raw}`);
      }
      if (!types.includes(known)) {
        types.push(known);
      }
    }

    return types.length > 0 ? types : fallback;
  }
}

function deepFreeze<T>(value: T): T {
  if (value && typeof value === "object" && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const nested of Object.values(value)) {
      deepFreeze(nested);
    }
  }
  return value;
}
