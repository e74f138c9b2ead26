import { createGateway, embed, generateText } from "ai";

export interface ChatMessage {
  role: "system" | "user";
  content: string;
}

export interface ChatRequest {
  model: string;
  messages: ChatMessage[];
  jsonMode: boolean;
  temperature?: number;
  maxOutputTokens?: number;
  timeoutMs: number;
}

export interface ChatResponse {
  text: string;
  inputTokens: number;
  outputTokens: number;
}

export interface EmbedRequest {
  model: string;
  text: string;
  timeoutMs: number;
}

/**
 * Request/response contract of the language-model service. Implementations throw on transport
 * failures; callers decide how to degrade.
 */
export interface ModelBackend {
  readonly name: string;
  checkHealth(timeoutMs: number): Promise<boolean>;
  chat(request: ChatRequest): Promise<ChatResponse>;
  embed(request: EmbedRequest): Promise<number[]>;
}

const JSON_MODE_INSTRUCTION = "Respond with a single JSON object and nothing else.";

export class GatewayModelBackend implements ModelBackend {
  readonly name = "ai-gateway";
  private readonly gateway: ReturnType<typeof createGateway>;

  constructor(apiKey: string) {
    this.gateway = createGateway({ apiKey });
  }

  async checkHealth(timeoutMs: number): Promise<boolean> {
    try {
      const metadata = await withTimeout(this.gateway.getAvailableModels(), timeoutMs);
      return metadata.models.length > 0;
    } catch (error) {
      console.warn(`[backend] Health probe failed: ${formatError(error)}`);
      return false;
    }
  }

  async chat(request: ChatRequest): Promise<ChatResponse> {
    const systemParts = request.messages.filter((message) => message.role === "system").map((message) => message.content);
    if (request.jsonMode) {
      systemParts.push(JSON_MODE_INSTRUCTION);
    }

    const result = await generateText({
      model: this.gateway(request.model),
      system: systemParts.join("\n\n"),
      prompt: request.messages
        .filter((message) => message.role === "user")
        .map((message) => message.content)
        .join("\n\n"),
      temperature: request.temperature,
      maxOutputTokens: request.maxOutputTokens,
      maxRetries: 0,
      abortSignal: AbortSignal.timeout(request.timeoutMs)
    });

    return {
      text: result.text.trim(),
      inputTokens: result.usage?.inputTokens ?? 0,
      outputTokens: result.usage?.outputTokens ?? 0
    };
  }

  async embed(request: EmbedRequest): Promise<number[]> {
    const result = await embed({
      model: this.gateway.textEmbeddingModel(request.model),
      value: request.text,
      maxRetries: 0,
      abortSignal: AbortSignal.timeout(request.timeoutMs)
    });
    return result.embedding;
  }
}

/**
 * Offline backend. Embeddings are hashed bag-of-words vectors; chat is never served, so every
 * component runs its deterministic fallback.
 */
export class MockModelBackend implements ModelBackend {
  readonly name = "mock";

  async checkHealth(): Promise<boolean> {
    return true;
  }

  async chat(): Promise<ChatResponse> {
    throw new Error("The mock backend does not serve chat completions.");
  }

  async embed(request: EmbedRequest): Promise<number[]> {
    return hashedEmbedding(request.text);
  }
}

export function hashedEmbedding(text: string, dimensions = 256): number[] {
  const vector = new Array<number>(dimensions).fill(0);
  for (const token of text.toLowerCase().match(/[\p{L}\p{N}]+/gu) ?? []) {
    vector[fnv1a(token) % dimensions] += 1;
  }
  return vector;
}

function fnv1a(value: string): number {
  let hash = 0x811c9dc5;
  for (let index = 0; index < value.length; index += 1) {
    hash ^= value.charCodeAt(index);
    hash = Math.imul(hash, 0x01000193) >>> 0;
  }
  return hash;
}

function withTimeout<T>(promise: Promise<T>, timeoutMs: number): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new Error(`Timed out after ${timeoutMs}ms.`)), timeoutMs);
  });

  return Promise.race([promise, timeout]).finally(() => clearTimeout(timer));
}

export function formatError(value: unknown): string {
  if (value instanceof Error) {
    return value.message;
  }
  return "Unknown runtime error.";
}
