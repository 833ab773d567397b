import { randomUUID } from "node:crypto";
import { Mutex } from "async-mutex";
import { CacheFullError, NotFoundError, ValidationError } from "@docweave/errors";
import { createChildLogger, createSilentLogger } from "@docweave/logger";
import type { Logger } from "@docweave/logger";
import { detectFileType } from "@docweave/types";
import type { CachedDocument, DocumentCacheStats, TextStats } from "@docweave/types";

export interface DocumentCacheOptions {
  ttlMs: number;
  maxDocuments: number;
  cleanupIntervalMs: number;
  logger?: Logger;
}

export type CachedDocumentSummary = Omit<CachedDocument, "rawText">;

const MB = 1024 * 1024;

export function computeTextStats(text: string): TextStats {
  return {
    chars: text.length,
    words: text.split(/\s+/).filter((word) => word.length > 0).length,
    lines: text.length === 0 ? 0 : text.split("\n").length,
  };
}

function roundTo2(value: number): number {
  return Math.round(value * 100) / 100;
}

function copy(entry: CachedDocument): CachedDocument {
  return {
    ...entry,
    textStats: { ...entry.textStats },
    createdAt: new Date(entry.createdAt),
    expiresAt: new Date(entry.expiresAt),
    lastAccessedAt: new Date(entry.lastAccessedAt),
  };
}

/**
 * Short-lived store for uploaded text awaiting analysis.
 *
 * Entries expire a fixed `ttlMs` after creation and are removed when a
 * reader finds them expired or when the periodic reaper runs. A full cache
 * first purges expired entries and then refuses the insert; nothing is
 * evicted early. Every access to the entry map, the reaper's included, runs
 * under one mutex.
 */
export class DocumentCache {
  private readonly entries = new Map<string, CachedDocument>();
  private readonly mutex = new Mutex();
  private readonly logger: Logger;
  private reaper: NodeJS.Timeout | null = null;
  private closed = false;

  constructor(private readonly options: DocumentCacheOptions) {
    if (options.ttlMs <= 0 || options.maxDocuments <= 0 || options.cleanupIntervalMs <= 0) {
      throw new ValidationError("Invalid document cache options", {
        ttlMs: "must be positive",
        maxDocuments: "must be positive",
        cleanupIntervalMs: "must be positive",
      });
    }
    this.logger = createChildLogger(options.logger ?? createSilentLogger(), "document-cache");
  }

  /** Stages `text` and returns its key. Throws CacheFullError at capacity. */
  async store(
    text: string,
    filename: string,
    sizeBytes: number,
    processingTimeMs: number,
  ): Promise<string> {
    const key = await this.mutex.runExclusive(() => {
      const now = Date.now();

      if (this.entries.size >= this.options.maxDocuments) {
        this.purgeLocked(now);
      }
      if (this.entries.size >= this.options.maxDocuments) {
        throw new CacheFullError(this.options.maxDocuments);
      }

      const entry: CachedDocument = {
        key: randomUUID(),
        filename,
        rawText: text,
        fileType: detectFileType(filename),
        sizeBytes,
        textStats: computeTextStats(text),
        processingTimeMs,
        createdAt: new Date(now),
        expiresAt: new Date(now + this.options.ttlMs),
        lastAccessedAt: new Date(now),
      };
      this.entries.set(entry.key, entry);
      return entry.key;
    });

    this.startReaper();
    this.logger.debug({ key, filename, sizeBytes }, "Document cached");
    return key;
  }

  /** The entry, or null when missing or expired. Refreshes `lastAccessedAt`. */
  async get(key: string): Promise<CachedDocument | null> {
    return this.mutex.runExclusive(() => {
      const entry = this.entries.get(key);
      if (!entry) return null;

      const now = Date.now();
      if (now >= entry.expiresAt.getTime()) {
        this.entries.delete(key);
        return null;
      }

      entry.lastAccessedAt = new Date(now);
      return copy(entry);
    });
  }

  async require(key: string): Promise<CachedDocument> {
    const entry = await this.get(key);
    if (!entry) {
      throw new NotFoundError(`Document ${key} not found or expired`, { details: { key } });
    }
    return entry;
  }

  async remove(key: string): Promise<boolean> {
    return this.mutex.runExclusive(() => this.entries.delete(key));
  }

  /** Live entries without their text, newest first. */
  async list(): Promise<CachedDocumentSummary[]> {
    return this.mutex.runExclusive(() => {
      this.purgeLocked(Date.now());
      return [...this.entries.values()]
        .sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime())
        .map((entry) => {
          const { rawText: _rawText, ...summary } = copy(entry);
          return summary;
        });
    });
  }

  async stats(): Promise<DocumentCacheStats> {
    return this.mutex.runExclusive(() => {
      let textBytes = 0;
      let fileBytes = 0;
      for (const entry of this.entries.values()) {
        textBytes += Buffer.byteLength(entry.rawText, "utf8");
        fileBytes += entry.sizeBytes;
      }

      return {
        count: this.entries.size,
        maxCount: this.options.maxDocuments,
        memoryMB: roundTo2(textBytes / MB),
        totalFileSizeMB: roundTo2(fileBytes / MB),
        ttlMinutes: this.options.ttlMs / 60_000,
        cleanupIntervalMinutes: this.options.cleanupIntervalMs / 60_000,
      };
    });
  }

  /** Removes expired entries and returns how many were removed. */
  async purgeExpired(): Promise<number> {
    return this.mutex.runExclusive(() => this.purgeLocked(Date.now()));
  }

  async clear(): Promise<number> {
    return this.mutex.runExclusive(() => {
      const removed = this.entries.size;
      this.entries.clear();
      return removed;
    });
  }

  /** Stops the reaper. Entries stay readable. */
  close(): void {
    this.closed = true;
    if (this.reaper) {
      clearInterval(this.reaper);
      this.reaper = null;
    }
  }

  private startReaper(): void {
    if (this.reaper || this.closed) return;

    this.reaper = setInterval(() => {
      this.purgeExpired().then(
        (removed) => {
          if (removed > 0) {
            this.logger.info({ removed }, "Expired documents purged");
          }
        },
        (err: unknown) => {
          this.logger.error({ err }, "Document cache cleanup failed");
        },
      );
    }, this.options.cleanupIntervalMs);
    this.reaper.unref();
  }

  private purgeLocked(now: number): number {
    let removed = 0;
    for (const [key, entry] of this.entries) {
      if (now >= entry.expiresAt.getTime()) {
        this.entries.delete(key);
        removed++;
      }
    }
    return removed;
  }
}
