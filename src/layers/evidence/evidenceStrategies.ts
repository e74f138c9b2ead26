import { QualityPolicy } from "../../config/runtimeConfig.js";
import { Chunk, ChunkLookup, Citation } from "../../domain/models.js";
import { filterInformativeChunks } from "../../utils/textQuality.js";
import { EvidenceIndex } from "./evidenceIndex.js";

export interface EvidenceStrategy {
  name: string;
  resolve: () => Promise<readonly Chunk[]> | readonly Chunk[];
}

export interface ResolvedEvidence {
  strategy: string;
  chunks: Chunk[];
}

export const MAX_EVIDENCE_CHUNKS = 6;

/**
 * Tries each strategy in order and returns the first informative, deduplicated result.
 */
export async function resolveEvidence(
  strategies: readonly EvidenceStrategy[],
  policy: QualityPolicy,
  limit = MAX_EVIDENCE_CHUNKS
): Promise<ResolvedEvidence> {
  for (const strategy of strategies) {
    const chunks = dedupeChunks(filterInformativeChunks(await strategy.resolve(), policy)).slice(0, limit);
    if (chunks.length > 0) {
      return { strategy: strategy.name, chunks };
    }
  }

  return { strategy: "none", chunks: [] };
}

export function chunksForCitations(citations: readonly Citation[], lookup: ChunkLookup): Chunk[] {
  return citations.flatMap((citation) => {
    const chunk = lookup.get(citation.chunkId);
    return chunk ? [chunk] : [];
  });
}

export function dedupeChunks(chunks: readonly Chunk[]): Chunk[] {
  const seen = new Set<string>();
  return chunks.filter((chunk) => {
    if (seen.has(chunk.chunkId)) {
      return false;
    }
    seen.add(chunk.chunkId);
    return true;
  });
}

/** Citations first, then a similarity search, then the leading informative chunks. */
export function citationSearchStrategies(input: {
  citations: readonly Citation[];
  query: string;
  searchK: number;
  index: EvidenceIndex;
  lookup: ChunkLookup;
  policy: QualityPolicy;
}): EvidenceStrategy[] {
  return [
    {
      name: "citations",
      resolve: () => chunksForCitations(input.citations, input.lookup)
    },
    {
      name: "similarity",
      resolve: () => (input.query ? input.index.search(input.query, input.searchK) : [])
    },
    {
      name: "informative-head",
      resolve: () => filterInformativeChunks(input.index.chunks, input.policy).slice(0, 3)
    }
  ];
}
