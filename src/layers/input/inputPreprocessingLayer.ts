import { readFile } from "node:fs/promises";
import path from "node:path";

import { PipelineSettings } from "../../config/runtimeConfig.js";
import { Chunk, PageRecord } from "../../domain/models.js";
import { asInteger, asObjectArray, asString, isRecord, pick } from "../../utils/json.js";
import { normalizeLines } from "../../utils/text.js";
import { sha1 } from "../evidence/embeddingCache.js";
import { chunkPages, ChunkingOptions } from "./textChunker.js";

export interface SourceDocument {
  filePath: string;
  title: string;
  documentHash: string;
  importedAt: string;
}

/** An ingested document: page records to be chunked, or chunk records taken as they are. */
export type LoadedDocument =
  | { kind: "pages"; source: SourceDocument; pages: PageRecord[] }
  | { kind: "chunks"; source: SourceDocument; chunks: Chunk[] };

export interface PreparedDocument {
  source: SourceDocument;
  pages: PageRecord[];
  chunks: Chunk[];
}

type PageFilterSettings = Pick<PipelineSettings, "pageFilter" | "chapterFilter" | "maxPages">;

export class InputPreprocessingLayer {
  constructor(private readonly inputPath: string) {}

  async load(): Promise<LoadedDocument> {
    const buffer = await readFile(this.inputPath);
    const source: SourceDocument = {
      filePath: this.inputPath,
      title: path.basename(this.inputPath, path.extname(this.inputPath)),
      documentHash: sha1(buffer),
      importedAt: new Date().toISOString()
    };
    const text = buffer.toString("utf8");

    if (path.extname(this.inputPath).toLowerCase() !== ".json") {
      const pages = text.split("\f").map((pageText, index) => toPageRecord(index + 1, pageText));
      return { kind: "pages", source, pages: pages.filter((page) => page.lines.length > 0) };
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(text);
    } catch (error) {
      throw new Error(`Input file ${this.inputPath} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`);
    }
    return parseDocument(parsed, source);
  }

  /** Loads, filters and chunks the document. */
  async prepare(settings: PipelineSettings): Promise<PreparedDocument> {
    const document = await this.load();
    const options: ChunkingOptions = {
      chunkChars: settings.chunkChars,
      overlapChars: settings.overlapChars,
      minChunkChars: settings.minChunkChars
    };

    if (document.kind === "pages") {
      const pages = filterPages(document.pages, settings);
      return { source: document.source, pages, chunks: chunkPages(pages, options) };
    }

    const pages = filterPages(pagesFromChunks(document.chunks), settings);
    const keptPages = new Set(pages.map((page) => page.page));
    return {
      source: document.source,
      pages,
      chunks: document.chunks.filter((chunk) => keptPages.has(chunk.page))
    };
  }
}

export function parseDocument(value: unknown, source: SourceDocument): LoadedDocument {
  const root = isRecord(value) ? value : { pages: value };

  const chunkItems = pick(root, "chunks");
  if (Array.isArray(chunkItems)) {
    const chunks: Chunk[] = [];
    const seen = new Set<string>();
    for (const item of asObjectArray(chunkItems)) {
      const page = asInteger(pick(item, "page"));
      const chunkId = asString(pick(item, "chunkId", "chunk_id"));
      const text = asString(pick(item, "text"));
      if (page === null || !chunkId || !text || seen.has(chunkId)) {
        continue;
      }
      seen.add(chunkId);
      chunks.push({ chunkId, page, sectionTitle: asString(pick(item, "sectionTitle", "section_title")), text });
    }
    return { kind: "chunks", source, chunks };
  }

  const pages: PageRecord[] = [];
  asObjectArray(pick(root, "pages")).forEach((item, index) => {
    const page = asInteger(pick(item, "page")) ?? index + 1;
    const record = toPageRecord(page, asString(pick(item, "text")));
    if (record.lines.length > 0) {
      pages.push(record);
    }
  });
  return { kind: "pages", source, pages };
}

/**
 * Applies the page filter, then the chapter filter, then the max-pages cap. A page filter that
 * matches nothing falls back to the full document; a chapter filter that matches nothing keeps
 * the previous selection.
 */
export function filterPages(pages: readonly PageRecord[], settings: PageFilterSettings): PageRecord[] {
  let filtered = [...pages];

  if (settings.pageFilter) {
    const wanted = new Set(settings.pageFilter);
    const matches = filtered.filter((page) => wanted.has(page.page));
    if (matches.length > 0) {
      filtered = matches;
    } else {
      console.warn("[input] Page filter matched no pages; using the full document");
    }
  }

  const chapter = settings.chapterFilter;
  if (chapter) {
    const matches = filtered.filter(
      (page) => page.text.includes(chapter) || page.lines.some((line) => line.includes(chapter))
    );
    if (matches.length > 0) {
      filtered = matches;
    } else {
      console.warn(`[input] Chapter filter "${chapter}" matched no pages; keeping the previous selection`);
    }
  }

  if (settings.maxPages !== null) {
    filtered = filtered.slice(0, settings.maxPages);
  }

  return filtered;
}

function toPageRecord(page: number, text: string): PageRecord {
  return { page, text, lines: normalizeLines(text) };
}

function pagesFromChunks(chunks: readonly Chunk[]): PageRecord[] {
  const texts = new Map<number, string[]>();
  for (const chunk of chunks) {
    const parts = texts.get(chunk.page) ?? [];
    parts.push(chunk.text);
    texts.set(chunk.page, parts);
  }
  return [...texts.entries()].map(([page, parts]) => toPageRecord(page, parts.join("\n")));
}
