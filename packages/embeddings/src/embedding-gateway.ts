import {
  AppError,
  ConfigurationError,
  DimensionMismatchError,
  EmbeddingCountMismatchError,
  ProviderFailureError,
  withRetry,
} from "@docweave/errors";
import { createChildLogger, createSilentLogger } from "@docweave/logger";
import type { Logger } from "@docweave/logger";
import type { ProviderName } from "@docweave/types";
import type { IModelProvider, ProviderKind } from "./model-provider.interface.js";
import { API_KEY_VARIABLES } from "./factory.js";
import type { ProviderRegistry } from "./factory.js";

const RETRYABLE_CODES = ["RATE_LIMITED", "PROVIDER_TRANSIENT"];

export interface EmbeddingGatewayOptions {
  defaultProvider: ProviderName;
  maxRetries: number;
  retryBaseDelayMs: number;
  retryMaxDelayMs: number;
  /** Per-call deadline in milliseconds; 0 disables it. */
  timeoutMs: number;
  /** Return zero vectors when the local provider fails instead of throwing. */
  offlineFallback: boolean;
  logger?: Logger;
}

export interface EmbedOptions {
  provider?: ProviderName;
  signal?: AbortSignal;
}

export interface GatewayTextOptions extends EmbedOptions {
  format?: "json";
}

export interface ProviderDescription {
  name: ProviderName;
  kind: ProviderKind;
  model: string;
  dimensions: number;
}

/** Vectors for one embed call; `degraded` means they are zero-vector placeholders. */
export type EmbeddingBatch =
  | { vectors: number[][]; degraded: false }
  | { vectors: number[][]; degraded: true; error: unknown };

export function zeroVectors(count: number, dimensions: number): number[][] {
  return Array.from({ length: count }, () => new Array<number>(dimensions).fill(0));
}

/**
 * Single entry point for embeddings and text generation across providers.
 *
 * Remote calls are batched to the provider limit and retried on throttling and
 * 5xx answers. The local provider gets the whole input at once and, with
 * `offlineFallback`, degrades to zero vectors. Every batch must return one
 * vector per input text, and a provider must keep returning vectors of the
 * length it returned first.
 */
export class EmbeddingGateway {
  private readonly observedDimensions = new Map<ProviderName, number>();
  private readonly logger: Logger;

  constructor(
    private readonly providers: ProviderRegistry,
    private readonly options: EmbeddingGatewayOptions,
  ) {
    this.logger = createChildLogger(options.logger ?? createSilentLogger(), "embedding-gateway");
  }

  get defaultProvider(): ProviderName {
    return this.options.defaultProvider;
  }

  /** The configured provider, or ConfigurationError when its credentials are missing. */
  provider(name: ProviderName = this.options.defaultProvider): IModelProvider {
    const provider = this.providers.get(name);
    if (!provider) {
      const variable = name === "ollama" ? "OLLAMA_BASE_URL" : API_KEY_VARIABLES[name];
      throw new ConfigurationError(`${variable} is not configured; cannot use the ${name} provider`, {
        details: { provider: name },
      });
    }
    return provider;
  }

  listProviders(): ProviderDescription[] {
    return [...this.providers.values()].map((provider) => ({
      name: provider.name,
      kind: provider.kind,
      model: provider.model,
      dimensions: this.dimensionsOf(provider.name),
    }));
  }

  /** Vector length last observed from the provider, else its configured length. */
  dimensionsOf(name: ProviderName = this.options.defaultProvider): number {
    return this.observedDimensions.get(name) ?? this.provider(name).dimensions;
  }

  async embed(texts: string[], options: EmbedOptions = {}): Promise<number[][]> {
    const batch = await this.embedWithStatus(texts, options);
    return batch.vectors;
  }

  /** Like `embed`, but says whether the offline fallback produced the vectors. */
  async embedWithStatus(texts: string[], options: EmbedOptions = {}): Promise<EmbeddingBatch> {
    if (texts.length === 0) {
      return { vectors: [], degraded: false };
    }

    const provider = this.provider(options.provider);
    const signal = this.callSignal(options.signal);

    if (provider.kind === "local") {
      try {
        return { vectors: await this.embedBatch(provider, texts, signal), degraded: false };
      } catch (err) {
        if (!this.options.offlineFallback || options.signal?.aborted || isFatal(err)) {
          throw err;
        }
        this.logger.warn(
          { err, provider: provider.name, count: texts.length },
          "Local embedding failed, using zero vectors",
        );
        return {
          vectors: zeroVectors(texts.length, this.dimensionsOf(provider.name)),
          degraded: true,
          error: err,
        };
      }
    }

    const vectors: number[][] = [];
    for (let i = 0; i < texts.length; i += provider.maxBatchSize) {
      const batch = texts.slice(i, i + provider.maxBatchSize);
      vectors.push(...(await this.embedWithRetry(provider, batch, signal)));
    }
    return { vectors, degraded: false };
  }

  async generateText(prompt: string, options: GatewayTextOptions = {}): Promise<string> {
    const provider = this.provider(options.provider);
    return provider.generateText(prompt, {
      format: options.format,
      signal: this.callSignal(options.signal),
    });
  }

  /** False for unconfigured providers instead of throwing. */
  async healthCheck(name: ProviderName = this.options.defaultProvider): Promise<boolean> {
    const provider = this.providers.get(name);
    return provider ? provider.healthCheck() : false;
  }

  private async embedWithRetry(
    provider: IModelProvider,
    batch: string[],
    signal?: AbortSignal,
  ): Promise<number[][]> {
    let attempts = 0;

    try {
      return await withRetry(
        () => {
          attempts++;
          return this.embedBatch(provider, batch, signal);
        },
        {
          maxRetries: this.options.maxRetries,
          baseDelayMs: this.options.retryBaseDelayMs,
          maxDelayMs: this.options.retryMaxDelayMs,
          retryableErrors: RETRYABLE_CODES,
          signal,
          onRetry: ({ attempt, delayMs, error }) => {
            this.logger.warn(
              { err: error, provider: provider.name, attempt, delayMs },
              "Embedding request failed, retrying",
            );
          },
        },
      );
    } catch (err) {
      if (!signal?.aborted && AppError.isAppError(err) && RETRYABLE_CODES.includes(err.code)) {
        throw new ProviderFailureError(
          `Embedding generation with ${provider.name} failed after ${String(attempts)} attempts`,
          { provider: provider.name, operation: "embed", attempts },
          err,
        );
      }
      throw err;
    }
  }

  private async embedBatch(
    provider: IModelProvider,
    batch: string[],
    signal?: AbortSignal,
  ): Promise<number[][]> {
    const result = await provider.generateEmbeddings(batch, { signal });

    if (result.embeddings.length !== batch.length) {
      throw new EmbeddingCountMismatchError(batch.length, result.embeddings.length, provider.name);
    }
    this.recordDimensions(provider.name, result.embeddings);

    return result.embeddings;
  }

  private recordDimensions(name: ProviderName, vectors: number[][]): void {
    const first = vectors[0];
    if (!first) return;

    for (const vector of vectors) {
      if (vector.length !== first.length) {
        throw new DimensionMismatchError(first.length, vector.length, `${name} batch`);
      }
    }

    const known = this.observedDimensions.get(name);
    if (known === undefined) {
      this.observedDimensions.set(name, first.length);
      this.logger.debug({ provider: name, dimensions: first.length }, "Recorded embedding dimensions");
    } else if (known !== first.length) {
      throw new DimensionMismatchError(known, first.length, name);
    }
  }

  private callSignal(signal?: AbortSignal): AbortSignal | undefined {
    if (this.options.timeoutMs <= 0) return signal;

    const timeout = AbortSignal.timeout(this.options.timeoutMs);
    return signal ? AbortSignal.any([signal, timeout]) : timeout;
  }
}

function isFatal(err: unknown): boolean {
  return AppError.isAppError(err) && !err.isOperational;
}
