import { Embedding, RetrievalResult } from "../domain/types.js";
import { VectorIndex } from "../infra/store/vectorIndex.js";
import { ReadWriteLock } from "../utils/locks.js";
import { Embedder } from "./embedder.js";

export interface RetrievalOptions {
  k: number;
  minScore: number;
}

export class Retriever {
  constructor(
    private readonly embedder: Embedder,
    private readonly getIndex: () => VectorIndex,
    private readonly lock: ReadWriteLock,
    private readonly defaults: RetrievalOptions,
  ) {}

  async retrieve(queryText: string, options?: Partial<RetrievalOptions>): Promise<RetrievalResult> {
    const queryEmbedding = await this.embedQuery(queryText);
    return this.search(queryEmbedding, options);
  }

  embedQuery(queryText: string): Promise<Embedding> {
    return this.embedder.embed(queryText);
  }

  /** An empty result means nothing cleared the similarity floor. */
  search(queryEmbedding: Embedding, options?: Partial<RetrievalOptions>): Promise<RetrievalResult> {
    const k = options?.k ?? this.defaults.k;
    const minScore = options?.minScore ?? this.defaults.minScore;
    return this.lock.read(() => this.getIndex().search(queryEmbedding, k, minScore));
  }
}
