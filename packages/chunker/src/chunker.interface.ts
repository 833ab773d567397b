import type { ChunkResult, ChunkingConfig } from "@docweave/types";

export interface IChunker {
  readonly strategy: string;
  chunk(content: string, config: ChunkingConfig): ChunkResult[];
}
