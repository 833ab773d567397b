export interface Chunk {
  id: string;
  documentId: string;
  text: string;
  embedding: number[];
  ordinal: number;
  sourceFilename: string;
  createdAt: Date;
}

/** A chunk as returned by read paths; the embedding is not loaded back. */
export type StoredChunk = Omit<Chunk, "embedding">;

export interface ChunkingConfig {
  chunkSize: number;
  chunkOverlap: number;
}

export interface ChunkResult {
  content: string;
  index: number;
  metadata: {
    startChar: number;
    endChar: number;
  };
}

export const CHUNK_LINK_TYPE = "NEXT";

export function chunkIdFor(documentId: string, ordinal: number): string {
  return `${documentId}-chunk-${String(ordinal)}`;
}
