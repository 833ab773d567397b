import { DimensionMismatchError, StoreUnavailableError } from "@docweave/errors";
import { CHUNK_LINK_TYPE } from "@docweave/types";
import type {
  Chunk,
  Document,
  DocumentSummary,
  ExtractedEntity,
  KnowledgeExtraction,
  SimilarityMetric,
  StoredChunk,
} from "@docweave/types";
import type { BackendStats, IVectorStore, IndexSpec, ScoredChunk } from "./vector-store.interface.js";
import { assertDimensions, similarity } from "./similarity.js";

interface ChunkLink {
  from: string;
  to: string;
  type: string;
}

interface StoredRelation {
  source: string;
  target: string;
  type: string;
}

function withoutEmbedding({ embedding: _embedding, ...chunk }: Chunk): StoredChunk {
  return chunk;
}

const entityKey = (entity: ExtractedEntity): string => `${entity.label}\u0000${entity.name}`;

/**
 * Process-local backend for development and tests. Same contract as the
 * pgvector backend, including atomic document writes and NEXT links.
 */
export class InMemoryVectorStore implements IVectorStore {
  readonly backend = "memory";
  private index: IndexSpec | null = null;
  private readonly documents = new Map<string, Document>();
  private readonly chunksByDocument = new Map<string, Chunk[]>();
  private links: ChunkLink[] = [];
  private readonly entities = new Map<string, ExtractedEntity>();
  private readonly mentions = new Map<string, Set<string>>();
  private relations: StoredRelation[] = [];
  private closed = false;

  constructor(private readonly defaultMetric: SimilarityMetric = "cosine") {}

  async ensureIndex(spec: IndexSpec): Promise<void> {
    this.assertOpen();
    assertDimensions(spec.dimensions);

    const stored = this.storedDimensions();
    if (stored !== null && stored !== spec.dimensions) {
      throw new DimensionMismatchError(stored, spec.dimensions, "index");
    }
    this.index = { ...spec };
  }

  async insertDocument(document: Document, chunks: Chunk[]): Promise<void> {
    this.assertOpen();

    const ordered = [...chunks]
      .sort((a, b) => a.ordinal - b.ordinal)
      .map((chunk) => ({ ...chunk, embedding: [...chunk.embedding] }));

    this.documents.set(document.id, { ...document });
    this.chunksByDocument.set(document.id, ordered);
    for (let i = 1; i < ordered.length; i++) {
      const from = ordered[i - 1];
      const to = ordered[i];
      if (from && to) {
        this.links.push({ from: from.id, to: to.id, type: CHUNK_LINK_TYPE });
      }
    }
  }

  async search(vector: number[], k: number): Promise<ScoredChunk[]> {
    this.assertOpen();
    if (k <= 0) return [];

    const metric = this.index?.metric ?? this.defaultMetric;
    return this.allChunks()
      .filter((chunk) => chunk.embedding.length === vector.length)
      .map((chunk) => ({ chunk: withoutEmbedding(chunk), score: similarity(metric, vector, chunk.embedding) }))
      .sort((a, b) => b.score - a.score)
      .slice(0, k);
  }

  async searchText(query: string, k: number): Promise<ScoredChunk[]> {
    this.assertOpen();
    if (query.length === 0 || k <= 0) return [];

    const needle = query.toLowerCase();
    return this.allChunks()
      .filter((chunk) => chunk.text.toLowerCase().includes(needle))
      .slice(0, k)
      .map((chunk) => ({ chunk: withoutEmbedding(chunk), score: 1.0 }));
  }

  async getStoredDimensions(): Promise<number | null> {
    this.assertOpen();
    return this.storedDimensions();
  }

  async saveKnowledge(chunkId: string, extraction: KnowledgeExtraction): Promise<void> {
    this.assertOpen();

    const mentioned = this.mentions.get(chunkId) ?? new Set<string>();
    for (const entity of extraction.entities) {
      const key = entityKey(entity);
      this.entities.set(key, { label: entity.label, name: entity.name });
      mentioned.add(key);
    }
    this.mentions.set(chunkId, mentioned);

    for (const rel of extraction.relationships) {
      const exists = this.relations.some(
        (r) => r.source === rel.source && r.target === rel.target && r.type === rel.type,
      );
      if (!exists) this.relations.push({ ...rel });
    }
  }

  async listDocuments(): Promise<DocumentSummary[]> {
    this.assertOpen();
    return [...this.documents.values()]
      .map((doc) => ({ ...doc, chunkCount: this.chunksByDocument.get(doc.id)?.length ?? 0 }))
      .sort((a, b) => b.ingestedAt.getTime() - a.ingestedAt.getTime());
  }

  async deleteDocument(documentId: string): Promise<boolean> {
    this.assertOpen();

    const chunks = this.chunksByDocument.get(documentId);
    if (!this.documents.delete(documentId)) return false;

    const ids = new Set((chunks ?? []).map((chunk) => chunk.id));
    this.chunksByDocument.delete(documentId);
    this.links = this.links.filter((link) => !ids.has(link.from) && !ids.has(link.to));
    for (const id of ids) this.mentions.delete(id);
    return true;
  }

  async clear(): Promise<void> {
    this.assertOpen();
    this.index = null;
    this.documents.clear();
    this.chunksByDocument.clear();
    this.links = [];
    this.entities.clear();
    this.mentions.clear();
    this.relations = [];
  }

  async getStats(): Promise<BackendStats> {
    this.assertOpen();
    return {
      totalDocuments: this.documents.size,
      totalChunks: this.allChunks().length,
      indexExists: this.index !== null,
    };
  }

  async healthCheck(): Promise<boolean> {
    return !this.closed;
  }

  async close(): Promise<void> {
    this.closed = true;
  }

  /** NEXT edges in insertion order, for inspection. */
  linksOf(documentId: string): Array<{ from: string; to: string; type: string }> {
    const ids = new Set((this.chunksByDocument.get(documentId) ?? []).map((chunk) => chunk.id));
    return this.links.filter((link) => ids.has(link.from)).map((link) => ({ ...link }));
  }

  /** Entities mentioned by a chunk. */
  entitiesOf(chunkId: string): ExtractedEntity[] {
    return [...(this.mentions.get(chunkId) ?? [])].flatMap((key) => {
      const entity = this.entities.get(key);
      return entity ? [{ ...entity }] : [];
    });
  }

  get relationCount(): number {
    return this.relations.length;
  }

  private allChunks(): Chunk[] {
    return [...this.chunksByDocument.values()].flat();
  }

  private storedDimensions(): number | null {
    return this.allChunks()[0]?.embedding.length ?? null;
  }

  private assertOpen(): void {
    if (this.closed) {
      throw new StoreUnavailableError("In-memory vector store is closed");
    }
  }
}
