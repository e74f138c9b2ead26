import { Chunk, PageRecord } from "../../domain/models.js";
import { normalizeLines } from "../../utils/text.js";
import { detectSectionTitle } from "../../utils/textQuality.js";

export interface ChunkingOptions {
  chunkChars: number;
  overlapChars: number;
  minChunkChars: number;
}

interface TextWindow {
  start: number;
  end: number;
}

/**
 * Character windows over one text. A window that would end mid-text is cut back to the last
 * whitespace in its second half; the next window starts `overlapChars` before the cut.
 */
export function splitIntoWindows(text: string, options: ChunkingOptions): TextWindow[] {
  const size = Math.max(1, options.chunkChars);
  const overlap = Math.min(Math.max(0, options.overlapChars), size - 1);
  const windows: TextWindow[] = [];
  let start = 0;

  while (start < text.length) {
    let end = Math.min(start + size, text.length);
    if (end < text.length) {
      const cut = lastWhitespace(text, start + Math.floor(size / 2), end);
      if (cut > start) {
        end = cut;
      }
    }

    windows.push({ start, end });
    if (end === text.length) {
      break;
    }

    const next = Math.max(end - overlap, start + 1);
    start = skipToWordStart(text, next, end);
  }

  return windows;
}

/**
 * Splits page records into chunks with ids `p{page}_c{n}`. Each chunk carries the most recent
 * section title seen at or before its start, across pages. A trailing window shorter than
 * `minChunkChars` is folded into the previous chunk of the same page.
 */
export function chunkPages(pages: readonly PageRecord[], options: ChunkingOptions): Chunk[] {
  const chunks: Chunk[] = [];
  let currentTitle = "";

  for (const page of pages) {
    const lines = page.lines.length > 0 ? page.lines : normalizeLines(page.text);
    const text = lines.join("\n");
    if (!text.trim()) {
      continue;
    }

    const titles: { offset: number; title: string }[] = [];
    let offset = 0;
    for (const line of lines) {
      const title = detectSectionTitle(line);
      if (title) {
        titles.push({ offset, title });
      }
      offset += line.length + 1;
    }

    const pageChunks: { start: number; end: number; title: string }[] = [];
    for (const window of splitIntoWindows(text, options)) {
      if (!text.slice(window.start, window.end).trim()) {
        continue;
      }

      for (const entry of titles) {
        if (entry.offset <= window.start) {
          currentTitle = entry.title;
        }
      }

      const previous = pageChunks[pageChunks.length - 1];
      if (previous && text.slice(window.start, window.end).trim().length < options.minChunkChars) {
        previous.end = window.end;
        continue;
      }
      pageChunks.push({ start: window.start, end: window.end, title: currentTitle });
    }

    // Titles that appear inside the page's last window still count for the next page.
    for (const entry of titles) {
      currentTitle = entry.title;
    }

    pageChunks.forEach((entry, index) => {
      chunks.push({
        chunkId: `p${page.page}_c${index + 1}`,
        page: page.page,
        sectionTitle: entry.title,
        text: text.slice(entry.start, entry.end).trim()
      });
    });
  }

  console.log(`[chunker] Created ${chunks.length} chunk(s) from ${pages.length} page(s)`);
  return chunks;
}

function lastWhitespace(text: string, from: number, to: number): number {
  for (let index = to - 1; index >= from; index -= 1) {
    if (/\s/.test(text.charAt(index))) {
      return index;
    }
  }
  return -1;
}

function skipToWordStart(text: string, from: number, limit: number): number {
  if (from === 0 || /\s/.test(text.charAt(from - 1))) {
    return from;
  }
  for (let index = from; index < limit; index += 1) {
    if (/\s/.test(text.charAt(index))) {
      return index + 1;
    }
  }
  return from;
}
