import { createHash } from "node:crypto";
import { mkdir, readFile, writeFile } from "node:fs/promises";
import path from "node:path";

import { Chunk } from "../../domain/models.js";
import { asObject } from "../../utils/json.js";

export interface EmbeddingCacheKey {
  documentHash: string;
  embedModel: string;
  chunkChars: number;
  overlapChars: number;
  minChunkChars: number;
  pageFilter: readonly number[] | null;
  chapterFilter: string | null;
  maxPages: number | null;
  chunkCount: number;
}

export interface EmbeddingLoadResult {
  embeddings: number[][];
  cacheHit: boolean;
  cachePath: string;
}

export class EmbeddingCache {
  constructor(private readonly directory: string) {}

  pathFor(key: EmbeddingCacheKey): string {
    const meta = [
      key.documentHash,
      key.embedModel,
      String(key.chunkChars),
      String(key.overlapChars),
      String(key.minChunkChars),
      key.pageFilter ? [...key.pageFilter].sort((left, right) => left - right).join(",") : "all",
      String(key.maxPages ?? ""),
      key.chapterFilter ?? "",
      String(key.chunkCount)
    ].join("|");

    return path.join(this.directory, `embeddings_${sha1(meta)}.json`);
  }

  /**
   * Returns cached vectors only when the stored chunk-id sequence matches the given chunks
   * exactly. A missing, unreadable or mismatched file is a miss.
   */
  async load(cachePath: string, chunks: readonly Chunk[]): Promise<number[][] | null> {
    let raw: string;
    try {
      raw = await readFile(cachePath, "utf8");
    } catch {
      // absent cache file
      return null;
    }

    let root: Record<string, unknown>;
    try {
      root = asObject(JSON.parse(raw));
    } catch {
      console.warn(`[embedding-cache] Ignoring unreadable cache file ${cachePath}`);
      return null;
    }

    const chunkIds = Array.isArray(root.chunk_ids) ? root.chunk_ids : [];
    if (chunkIds.length !== chunks.length || chunks.some((chunk, index) => chunkIds[index] !== chunk.chunkId)) {
      return null;
    }

    const embeddings = parseEmbeddings(root.embeddings);
    if (!embeddings || embeddings.length !== chunks.length) {
      return null;
    }
    return embeddings;
  }

  async save(cachePath: string, chunks: readonly Chunk[], embeddings: readonly number[][]): Promise<void> {
    await mkdir(path.dirname(cachePath), { recursive: true });
    const payload = {
      chunk_ids: chunks.map((chunk) => chunk.chunkId),
      embeddings
    };
    await writeFile(cachePath, JSON.stringify(payload), "utf8");
  }

  async loadOrBuild(
    key: EmbeddingCacheKey,
    chunks: readonly Chunk[],
    build: () => Promise<number[][]>
  ): Promise<EmbeddingLoadResult> {
    const cachePath = this.pathFor(key);
    const cached = await this.load(cachePath, chunks);
    if (cached) {
      console.log(`[embedding-cache] Loaded ${cached.length} embedding(s) from ${cachePath}`);
      return { embeddings: cached, cacheHit: true, cachePath };
    }

    const embeddings = await build();
    const missing = embeddings.filter((vector) => vector.length === 0).length;
    if (missing > 0) {
      console.warn(`[embedding-cache] Not storing embeddings: ${missing} chunk(s) have no vector`);
      return { embeddings, cacheHit: false, cachePath };
    }
    await this.save(cachePath, chunks, embeddings);
    console.log(`[embedding-cache] Stored ${embeddings.length} embedding(s) at ${cachePath}`);
    return { embeddings, cacheHit: false, cachePath };
  }
}

export function sha1(value: string | Buffer): string {
  return createHash("sha1").update(value).digest("hex");
}

function parseEmbeddings(value: unknown): number[][] | null {
  if (!Array.isArray(value)) {
    return null;
  }

  const vectors: number[][] = [];
  for (const item of value) {
    if (!Array.isArray(item) || !item.every((entry): entry is number => typeof entry === "number")) {
      return null;
    }
    vectors.push(item);
  }
  return vectors;
}
