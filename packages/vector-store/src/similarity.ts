import { ValidationError } from "@docweave/errors";
import type { SimilarityMetric } from "@docweave/types";

const IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]{0,62}$/;

export function assertIdentifier(name: string): void {
  if (!IDENTIFIER.test(name)) {
    throw new ValidationError("Invalid index name", { name: "must be a SQL identifier" });
  }
}

export function assertDimensions(dimensions: number): void {
  if (!Number.isInteger(dimensions) || dimensions <= 0) {
    throw new ValidationError("Invalid vector dimensions", { dimensions: "must be a positive integer" });
  }
}

/** pgvector distance operator and HNSW operator class per metric. */
export const PG_METRICS: Record<SimilarityMetric, { operator: string; opclass: string }> = {
  cosine: { operator: "<=>", opclass: "vector_cosine_ops" },
  euclidean: { operator: "<->", opclass: "vector_l2_ops" },
  dot: { operator: "<#>", opclass: "vector_ip_ops" },
};

/**
 * Converts a pgvector distance into a higher-is-better score. `<#>` returns
 * the negated inner product. Cosine distance to a zero vector is NaN and
 * scores 0, as in `similarity`.
 */
export function scoreFromDistance(metric: SimilarityMetric, distance: number): number {
  if (!Number.isFinite(distance)) return 0;
  switch (metric) {
    case "cosine":
      return 1 - distance;
    case "euclidean":
      return 1 / (1 + distance);
    case "dot":
      return -distance;
  }
}

export function similarity(metric: SimilarityMetric, a: number[], b: number[]): number {
  let dot = 0;
  let normA = 0;
  let normB = 0;
  let squared = 0;

  const length = Math.min(a.length, b.length);
  for (let i = 0; i < length; i++) {
    const x = a[i] ?? 0;
    const y = b[i] ?? 0;
    dot += x * y;
    normA += x * x;
    normB += y * y;
    squared += (x - y) * (x - y);
  }

  switch (metric) {
    case "cosine":
      // Zero vectors (offline embeddings) match nothing
      return normA === 0 || normB === 0 ? 0 : dot / (Math.sqrt(normA) * Math.sqrt(normB));
    case "euclidean":
      return 1 / (1 + Math.sqrt(squared));
    case "dot":
      return dot;
  }
}

export function indexDdl({ name, dimensions, metric }: { name: string; dimensions: number; metric: SimilarityMetric }): string {
  assertIdentifier(name);
  assertDimensions(dimensions);
  return `CREATE INDEX IF NOT EXISTS ${name} ON chunks USING hnsw ((embedding::vector(${String(dimensions)})) ${PG_METRICS[metric].opclass})`;
}

/** Escapes LIKE wildcards so user text matches literally. */
export function escapeLike(value: string): string {
  return value.replace(/[\\%_]/g, "\\$&");
}
