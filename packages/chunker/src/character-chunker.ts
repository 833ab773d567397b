import type { ChunkResult, ChunkingConfig } from "@docweave/types";
import { ValidationError } from "@docweave/errors";
import type { IChunker } from "./chunker.interface.js";

/** Paragraph, then line, then word. Falling through all of them cuts mid-word. */
const DEFAULT_SEPARATORS = ["\n\n", "\n", " "];

export const DEFAULT_CHUNKING: ChunkingConfig = { chunkSize: 1000, chunkOverlap: 200 };

/**
 * Sliding character window with boundary-aware cut points.
 *
 * Each chunk is at most `chunkSize` characters and starts exactly
 * `chunkOverlap` characters before the previous one ended, so dropping the
 * first `chunkOverlap` characters of every chunk after the first and
 * concatenating yields the original text. Content is never trimmed.
 */
export class CharacterChunker implements IChunker {
  readonly strategy = "character";
  private separators: string[];

  constructor(separators?: string[]) {
    this.separators = separators ?? DEFAULT_SEPARATORS;
  }

  chunk(content: string, config: ChunkingConfig = DEFAULT_CHUNKING): ChunkResult[] {
    validateChunkingConfig(config);
    const { chunkSize, chunkOverlap } = config;
    const results: ChunkResult[] = [];

    let start = 0;
    while (start < content.length) {
      const end =
        content.length - start <= chunkSize
          ? content.length
          : this.findCut(content, start, chunkSize, chunkOverlap);

      results.push({
        content: content.slice(start, end),
        index: results.length,
        metadata: { startChar: start, endChar: end },
      });

      if (end === content.length) break;
      start = end - chunkOverlap;
    }

    return results;
  }

  /**
   * Latest separator inside the window that still leaves more than
   * `chunkOverlap` characters in the chunk; otherwise a hard cut.
   */
  private findCut(content: string, start: number, chunkSize: number, chunkOverlap: number): number {
    const window = content.slice(start, start + chunkSize);

    for (const separator of this.separators) {
      const at = window.lastIndexOf(separator);
      if (at === -1) continue;
      const cut = at + separator.length;
      if (cut > chunkOverlap) {
        return start + cut;
      }
    }

    return start + chunkSize;
  }
}

export function validateChunkingConfig({ chunkSize, chunkOverlap }: ChunkingConfig): void {
  if (!Number.isInteger(chunkSize) || chunkSize <= 0) {
    throw new ValidationError("Invalid chunking configuration", {
      chunkSize: "must be a positive integer",
    });
  }
  if (!Number.isInteger(chunkOverlap) || chunkOverlap < 0 || chunkOverlap >= chunkSize) {
    throw new ValidationError("Invalid chunking configuration", {
      chunkOverlap: "must be a non-negative integer smaller than chunkSize",
    });
  }
}
