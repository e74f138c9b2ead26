import { Chunk } from "../../domain/models.js";
import { formatError } from "../../agents/runtime/modelBackend.js";
import { mapInPool } from "../../utils/concurrency.js";

export type EmbedFunction = (text: string) => Promise<number[]>;

/** Generic probes for examinable material, in English and Chinese. */
export const SELECTION_PROBES = [
  "definition",
  "theorem",
  "algorithm",
  "conclusion",
  "summary",
  "key point",
  "重要",
  "結論",
  "定義",
  "方法",
  "例子"
] as const;

export interface ScoredChunk {
  chunk: Chunk;
  score: number;
}

export function cosineSimilarity(left: readonly number[], right: readonly number[]): number {
  if (left.length === 0 || right.length === 0 || left.length !== right.length) {
    return 0;
  }

  let dot = 0;
  let leftNorm = 0;
  let rightNorm = 0;
  for (let index = 0; index < left.length; index += 1) {
    dot += left[index] * right[index];
    leftNorm += left[index] * left[index];
    rightNorm += right[index] * right[index];
  }

  if (leftNorm === 0 || rightNorm === 0) {
    return 0;
  }
  return dot / (Math.sqrt(leftNorm) * Math.sqrt(rightNorm));
}

/** Ranks chunks by similarity to the query vector, descending; equal scores keep input order. */
export function rankBySimilarity(
  queryVector: readonly number[],
  chunks: readonly Chunk[],
  embeddings: readonly (readonly number[])[],
  k: number
): Chunk[] {
  return chunks
    .map((chunk, index) => ({ chunk, index, score: cosineSimilarity(queryVector, embeddings[index] ?? []) }))
    .sort((left, right) => right.score - left.score || left.index - right.index)
    .slice(0, Math.max(0, k))
    .map((entry) => entry.chunk);
}

export function bucketOf(chunk: Chunk): string {
  return chunk.sectionTitle || `page_${chunk.page}`;
}

/**
 * Greedy quota fill over chunks already sorted by score. Each bucket takes at most
 * ceil(k / bucketCount) chunks; leftover slots are then filled in score order.
 */
export function balancedSelect(scored: readonly ScoredChunk[], k: number, balanced: boolean): Chunk[] {
  const limit = Math.max(0, k);
  if (!balanced) {
    return scored.slice(0, limit).map((entry) => entry.chunk);
  }

  const bucketCounts = new Map<string, number>();
  for (const entry of scored) {
    bucketCounts.set(bucketOf(entry.chunk), 0);
  }

  const quota = Math.max(1, Math.ceil(limit / Math.max(1, bucketCounts.size)));
  const selected: Chunk[] = [];
  const remainder: Chunk[] = [];

  for (const entry of scored) {
    if (selected.length >= limit) {
      break;
    }

    const bucket = bucketOf(entry.chunk);
    const taken = bucketCounts.get(bucket) ?? 0;
    if (taken < quota) {
      selected.push(entry.chunk);
      bucketCounts.set(bucket, taken + 1);
    } else {
      remainder.push(entry.chunk);
    }
  }

  if (selected.length < limit) {
    selected.push(...remainder.slice(0, limit - selected.length));
  }
  return selected.slice(0, limit);
}

/** Seeded permutation rank per position, used to order exact-score ties. */
export function seededTieRanks(length: number, seed: number): number[] {
  const random = mulberry32(seed);
  const order = Array.from({ length }, (_, index) => index);
  for (let index = order.length - 1; index > 0; index -= 1) {
    const swap = Math.floor(random() * (index + 1));
    [order[index], order[swap]] = [order[swap], order[index]];
  }

  const ranks = new Array<number>(length);
  order.forEach((position, rank) => {
    ranks[position] = rank;
  });
  return ranks;
}

function mulberry32(seed: number): () => number {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let value = state;
    value = Math.imul(value ^ (value >>> 15), value | 1);
    value ^= value + Math.imul(value ^ (value >>> 7), value | 61);
    return ((value ^ (value >>> 14)) >>> 0) / 4294967296;
  };
}

/** Embeds every chunk. A chunk whose call fails gets an empty vector instead of failing the build. */
export async function buildEmbeddings(
  chunks: readonly Chunk[],
  embedText: EmbedFunction,
  concurrency: number
): Promise<number[][]> {
  console.log(`[evidence] Embedding ${chunks.length} chunk(s)`);
  return mapInPool(
    chunks,
    {
      concurrency,
      onProgress: (completed, total) => {
        if (completed % 20 === 0) {
          console.log(`[evidence] Embedded ${completed}/${total} chunks`);
        }
      }
    },
    async (chunk) => {
      try {
        return await embedText(chunk.text);
      } catch (error) {
        console.warn(`[evidence] Embedding failed for ${chunk.chunkId}; it scores 0 in search (${formatError(error)})`);
        return [];
      }
    }
  );
}

/**
 * Brute-force cosine index over embedded chunks. Query vectors are memoized per index family so
 * repeated probes cost one embedding call.
 */
export class EvidenceIndex {
  private readonly positions: Map<string, number>;

  constructor(
    readonly chunks: readonly Chunk[],
    readonly embeddings: readonly (readonly number[])[],
    private readonly embedText: EmbedFunction,
    private readonly queryVectors = new Map<string, Promise<number[] | null>>()
  ) {
    if (chunks.length !== embeddings.length) {
      throw new Error(`Evidence index needs one embedding per chunk (${chunks.length} chunks, ${embeddings.length} embeddings).`);
    }
    this.positions = new Map(chunks.map((chunk, index) => [chunk.chunkId, index]));
  }

  static async build(chunks: readonly Chunk[], embedText: EmbedFunction, concurrency = 1): Promise<EvidenceIndex> {
    return new EvidenceIndex(chunks, await buildEmbeddings(chunks, embedText, concurrency), embedText);
  }

  get size(): number {
    return this.chunks.length;
  }

  has(chunkId: string): boolean {
    return this.positions.has(chunkId);
  }

  /** Same index restricted to the given chunks; unknown chunks are ignored. */
  restrictTo(chunks: readonly Chunk[]): EvidenceIndex {
    const kept = chunks.filter((chunk) => this.positions.has(chunk.chunkId));
    return new EvidenceIndex(
      kept,
      kept.map((chunk) => this.embeddings[this.positions.get(chunk.chunkId) ?? 0]),
      this.embedText,
      this.queryVectors
    );
  }

  async search(query: string, k: number): Promise<Chunk[]> {
    const vector = await this.queryVector(query);
    return rankBySimilarity(vector ?? [], this.chunks, this.embeddings, k);
  }

  async select(k: number, seed: number, balanced = true): Promise<Chunk[]> {
    console.log(`[evidence] Selecting top ${k} of ${this.chunks.length} chunks (balanced=${balanced})`);
    const probes: number[][] = [];
    for (const probe of SELECTION_PROBES) {
      const vector = await this.queryVector(probe);
      if (vector) {
        probes.push(vector);
      }
    }
    const tieRanks = seededTieRanks(this.chunks.length, seed);

    const scored = this.chunks
      .map((chunk, index) => ({
        chunk,
        index,
        score: probes.length === 0 ? 0 : Math.max(...probes.map((probe) => cosineSimilarity(this.embeddings[index], probe)))
      }))
      .sort((left, right) => right.score - left.score || tieRanks[left.index] - tieRanks[right.index]);

    return balancedSelect(scored, k, balanced);
  }

  private queryVector(query: string): Promise<number[] | null> {
    let pending = this.queryVectors.get(query);
    if (!pending) {
      pending = this.embedText(query).catch((error: unknown) => {
        console.warn(`[evidence] Query embedding failed for "${query.slice(0, 40)}": ${formatError(error)}`);
        this.queryVectors.delete(query);
        return null;
      });
      this.queryVectors.set(query, pending);
    }
    return pending;
  }
}
