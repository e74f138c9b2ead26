import { AgentMode, RuntimeConfig } from "../../config/runtimeConfig.js";
import { parseJsonFromModelText } from "../../utils/json.js";
import { createId } from "../../utils/text.js";
import { formatError, ModelBackend } from "./modelBackend.js";

const RETRY_BACKOFF_MS = 300;

export interface JsonAgentRequest<T> {
  stage: string;
  agentName: string;
  systemPrompt: string;
  userPrompt: string;
  /** Turns the parsed reply into the stage's type; throwing counts as a failed attempt. */
  parse: (value: unknown) => T;
  fallback: () => T;
  temperature?: number;
  maxOutputTokens?: number;
  retryCount?: number;
  timeoutMs?: number;
}

export interface AgentRunTrace {
  traceId: string;
  stage: string;
  agentName: string;
  mode: AgentMode;
  model: string;
  startedAt: string;
  completedAt: string;
  durationMs: number;
  attemptCount: number;
  inputTokens: number;
  outputTokens: number;
  fallbackUsed: boolean;
  errorMessage?: string;
}

export interface AgentRunResult<T> {
  data: T;
  trace: AgentRunTrace;
  rawText: string;
}

interface AttemptState {
  attempts: number;
  rawText: string;
  inputTokens: number;
  outputTokens: number;
  error?: unknown;
}

/**
 * Runs JSON-returning agents against a model backend. Every call ends with data: the parsed
 * reply, or the request's fallback once retries are spent. Mock mode never reaches the backend.
 */
export class AgentRuntime {
  constructor(
    private readonly config: RuntimeConfig,
    private readonly backend: ModelBackend
  ) {}

  get mode(): AgentMode {
    return this.config.mode;
  }

  async checkHealth(): Promise<boolean> {
    return this.backend.checkHealth(this.config.healthTimeoutMs);
  }

  /** Embeds one text with the configured embedding model. Failures propagate to the caller. */
  async embed(text: string): Promise<number[]> {
    return this.backend.embed({
      model: this.config.embedModel,
      text,
      timeoutMs: this.config.embedTimeoutMs
    });
  }

  async runJson<T>(request: JsonAgentRequest<T>): Promise<AgentRunResult<T>> {
    const startedAtMs = Date.now();

    if (this.config.mode === "mock") {
      const state: AttemptState = { attempts: 1, rawText: "", inputTokens: 0, outputTokens: 0 };
      return {
        data: request.fallback(),
        trace: this.buildTrace(request, "mock-runtime", startedAtMs, state, true),
        rawText: ""
      };
    }

    const maxAttempts = Math.max(1, (request.retryCount ?? this.config.retryCount) + 1);
    const state: AttemptState = { attempts: 0, rawText: "", inputTokens: 0, outputTokens: 0 };

    while (state.attempts < maxAttempts) {
      state.attempts += 1;
      try {
        const data = await this.attempt(request, state);
        return this.finish(request, startedAtMs, state, data, false);
      } catch (error) {
        state.error = error;
        if (state.attempts < maxAttempts) {
          await delay(RETRY_BACKOFF_MS * state.attempts);
        }
      }
    }

    return this.finish(request, startedAtMs, state, request.fallback(), true);
  }

  private async attempt<T>(request: JsonAgentRequest<T>, state: AttemptState): Promise<T> {
    const response = await this.backend.chat({
      model: this.config.chatModel,
      messages: [
        { role: "system", content: request.systemPrompt },
        { role: "user", content: request.userPrompt }
      ],
      jsonMode: true,
      temperature: request.temperature ?? this.config.temperature,
      maxOutputTokens: request.maxOutputTokens ?? this.config.maxOutputTokens,
      timeoutMs: request.timeoutMs ?? this.config.chatTimeoutMs
    });

    state.rawText = response.text;
    state.inputTokens = response.inputTokens;
    state.outputTokens = response.outputTokens;
    return request.parse(parseJsonFromModelText(response.text));
  }

  private finish<T>(
    request: JsonAgentRequest<T>,
    startedAtMs: number,
    state: AttemptState,
    data: T,
    fallbackUsed: boolean
  ): AgentRunResult<T> {
    const trace = this.buildTrace(request, this.config.chatModel, startedAtMs, state, fallbackUsed);
    if (this.config.verboseAgentLogs) {
      this.logTrace(trace);
    }
    return { data, trace, rawText: state.rawText };
  }

  private buildTrace(
    request: JsonAgentRequest<unknown>,
    model: string,
    startedAtMs: number,
    state: AttemptState,
    fallbackUsed: boolean
  ): AgentRunTrace {
    const completedAtMs = Date.now();
    return {
      traceId: createId("trace", `${request.stage}-${request.agentName}-${completedAtMs}`),
      stage: request.stage,
      agentName: request.agentName,
      mode: this.config.mode,
      model,
      startedAt: new Date(startedAtMs).toISOString(),
      completedAt: new Date(completedAtMs).toISOString(),
      durationMs: completedAtMs - startedAtMs,
      attemptCount: state.attempts,
      inputTokens: state.inputTokens,
      outputTokens: state.outputTokens,
      fallbackUsed,
      errorMessage: fallbackUsed && state.error !== undefined ? formatError(state.error) : undefined
    };
  }

  private logTrace(trace: AgentRunTrace): void {
    const path = trace.fallbackUsed ? "fallback" : "primary";
    const reason = trace.errorMessage ? ` (${trace.errorMessage})` : "";
    console.log(
      `[agent:${trace.stage}] ${trace.agentName} ${trace.mode}/${path} in ${trace.durationMs}ms (${trace.inputTokens}/${trace.outputTokens} tokens)${reason}`
    );
  }
}

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
