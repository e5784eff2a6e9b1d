import {
  ConfigurationError,
  describeError,
  EmbeddingServiceError,
} from "../domain/errors.js";
import { EmbeddingModel } from "../domain/ports.js";
import { Embedding } from "../domain/types.js";
import { isFiniteVector, l2Normalize } from "../utils/vector.js";

export interface EmbedderOptions {
  dimension: number;
  batchSize: number;
  timeoutMs: number;
}

/**
 * Turns text into unit-length vectors. Every vector that reaches the index or a
 * query goes through here, so ingestion and query time share one normalization.
 */
export class Embedder {
  constructor(
    private readonly model: EmbeddingModel,
    private readonly options: EmbedderOptions,
  ) {}

  get modelName(): string {
    return this.model.modelName;
  }

  get dimension(): number {
    return this.options.dimension;
  }

  async embed(text: string): Promise<Embedding> {
    const [embedding] = await this.embedMany([text]);
    return embedding;
  }

  async embedMany(texts: string[]): Promise<Embedding[]> {
    const embeddings: Embedding[] = [];
    for (let offset = 0; offset < texts.length; offset += this.options.batchSize) {
      const batch = texts.slice(offset, offset + this.options.batchSize);
      embeddings.push(...(await this.embedBatch(batch)));
    }
    return embeddings;
  }

  private async embedBatch(texts: string[]): Promise<Embedding[]> {
    let raw: number[][];
    try {
      raw = await this.model.embedTexts(texts, { timeoutMs: this.options.timeoutMs });
    } catch (error) {
      throw new EmbeddingServiceError(
        `Embedding model ${this.model.modelName} is unavailable: ${describeError(error)}`,
        { cause: error },
      );
    }

    if (raw.length !== texts.length) {
      throw new EmbeddingServiceError(
        `Embedding count mismatch (${raw.length} vectors for ${texts.length} texts).`,
      );
    }

    return raw.map((vector) => {
      if (vector.length !== this.options.dimension) {
        throw new ConfigurationError(
          `Embedding model ${this.model.modelName} returned ${vector.length} dimensions; the index is configured for ${this.options.dimension}.`,
        );
      }
      const normalized = isFiniteVector(vector) ? l2Normalize(vector) : null;
      if (!normalized) {
        throw new EmbeddingServiceError(
          `Embedding model ${this.model.modelName} returned a zero or non-finite vector.`,
        );
      }
      return normalized;
    });
  }
}
