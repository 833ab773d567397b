export type DocumentFileType = "pdf" | "txt" | "unknown";

export interface Document {
  id: string;
  filename: string;
  filetype: DocumentFileType;
  ingestedAt: Date;
}

export interface DocumentSummary extends Document {
  chunkCount: number;
}

export interface TextStats {
  chars: number;
  words: number;
  lines: number;
}

/**
 * Raw uploaded text staged for analysis. Only `lastAccessedAt` changes after
 * creation.
 */
export interface CachedDocument {
  key: string;
  filename: string;
  rawText: string;
  fileType: DocumentFileType;
  sizeBytes: number;
  textStats: TextStats;
  processingTimeMs: number;
  createdAt: Date;
  expiresAt: Date;
  lastAccessedAt: Date;
}

export interface DocumentCacheStats {
  count: number;
  maxCount: number;
  memoryMB: number;
  totalFileSizeMB: number;
  ttlMinutes: number;
  cleanupIntervalMinutes: number;
}

export function detectFileType(filename: string): DocumentFileType {
  const lower = filename.toLowerCase();
  if (lower.endsWith(".pdf")) return "pdf";
  if (lower.endsWith(".txt")) return "txt";
  return "unknown";
}
