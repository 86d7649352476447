import { RAG_CONFIG } from "./config.js";
import { mapWithConcurrency } from "./concurrency.js";
import { EmbeddingError, errorMessage, isAbortError } from "./errors.js";
import { postOpenRouter, type OpenRouterOptions } from "./openrouter.js";
import { withRetry } from "./retry.js";

export interface EmbeddingModel {
  readonly name: string;
  embedBatch(batch: string[], signal?: AbortSignal): Promise<number[][]>;
}

interface EmbeddingResponse {
  data: Array<{ embedding: number[]; index: number }>;
}

export class OpenRouterEmbeddingModel implements EmbeddingModel {
  readonly name: string;

  constructor(
    private readonly api: OpenRouterOptions,
    model: string = RAG_CONFIG.embeddingModel,
  ) {
    this.name = model;
  }

  async embedBatch(batch: string[], signal?: AbortSignal): Promise<number[][]> {
    const res = await postOpenRouter("/embeddings", { model: this.name, input: batch }, this.api, signal);
    const json = (await res.json()) as EmbeddingResponse;
    return [...json.data].sort((a, b) => a.index - b.index).map((item) => item.embedding);
  }
}

export interface EmbedderOptions {
  dimensions: number;
  batchSize: number;
  concurrency: number;
  attempts: number;
  baseDelayMs: number;
  queryPrefix: string;
  log?: (msg: string) => void;
}

export interface EmbedProgress {
  onProgress?: (done: number, total: number) => void;
  signal?: AbortSignal;
}

/**
 * Batches texts for an embedding model, retrying each batch on transient
 * failures. Either every text gets a vector of the configured dimension or
 * the call throws EmbeddingError.
 */
export class Embedder {
  private readonly options: EmbedderOptions;

  constructor(
    private readonly model: EmbeddingModel,
    options: Partial<EmbedderOptions> = {},
  ) {
    this.options = {
      dimensions: options.dimensions ?? RAG_CONFIG.embeddingDimensions,
      batchSize: options.batchSize ?? RAG_CONFIG.embeddingBatchSize,
      concurrency: options.concurrency ?? RAG_CONFIG.embeddingConcurrency,
      attempts: options.attempts ?? RAG_CONFIG.retryAttempts,
      baseDelayMs: options.baseDelayMs ?? RAG_CONFIG.retryBaseDelayMs,
      queryPrefix: options.queryPrefix ?? RAG_CONFIG.queryPrefix,
      log: options.log,
    };
  }

  get dimensions(): number {
    return this.options.dimensions;
  }

  async embedTexts(texts: string[], progress: EmbedProgress = {}): Promise<number[][]> {
    const batches: string[][] = [];
    for (let i = 0; i < texts.length; i += this.options.batchSize) {
      batches.push(texts.slice(i, i + this.options.batchSize));
    }

    // the first batch that fails for good stops the others
    const failed = new AbortController();
    const signal = progress.signal ? AbortSignal.any([progress.signal, failed.signal]) : failed.signal;

    let completed = 0;
    const results = await mapWithConcurrency(batches, this.options.concurrency, async (batch, batchIdx) => {
      signal.throwIfAborted();
      try {
        const vectors = await this.embedBatch(batch, batchIdx, signal);
        completed += batch.length;
        progress.onProgress?.(completed, texts.length);
        return vectors;
      } catch (err) {
        if (err instanceof EmbeddingError) failed.abort(err);
        throw err;
      }
    });

    return results.flat();
  }

  async embedQuery(query: string, signal?: AbortSignal): Promise<number[]> {
    const [vector] = await this.embedTexts([this.options.queryPrefix + query], { signal });
    return vector;
  }

  private async embedBatch(batch: string[], batchIdx: number, signal?: AbortSignal): Promise<number[][]> {
    let vectors: number[][];
    try {
      vectors = await withRetry(() => this.model.embedBatch(batch, signal), {
        attempts: this.options.attempts,
        baseDelayMs: this.options.baseDelayMs,
        signal,
        onRetry: (err, attempt, delay) => {
          this.options.log?.(
            `embedding: batch ${batchIdx + 1} attempt ${attempt} failed (${errorMessage(err)}), retrying in ${delay}ms`,
          );
        },
      });
    } catch (err) {
      if (isAbortError(err)) throw err;
      throw new EmbeddingError(`Embedding failed for batch ${batchIdx + 1}: ${errorMessage(err)}`, { cause: err });
    }

    if (vectors.length !== batch.length) {
      throw new EmbeddingError(
        `Embedding model returned ${vectors.length} vectors for ${batch.length} inputs`,
      );
    }
    for (const vector of vectors) {
      if (vector.length !== this.options.dimensions) {
        throw new EmbeddingError(
          `Embedding has ${vector.length} dimensions, expected ${this.options.dimensions}`,
        );
      }
    }
    return vectors;
  }
}
