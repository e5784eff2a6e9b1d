import { ConfigurationError } from "../../domain/errors.js";
import { Embedding, PassageRecord, RetrievalResult } from "../../domain/types.js";
import { dot, isFiniteVector } from "../../utils/vector.js";

export interface VectorIndexEntry {
  passage: PassageRecord;
  embedding: Embedding;
}

export interface VectorIndexSnapshot {
  dimension: number;
  generation: number;
  entries: VectorIndexEntry[];
}

/**
 * Exact nearest-neighbour index over unit-length embeddings. Scores are dot
 * products, which equal cosine similarity because vectors are normalized at
 * embedding time.
 */
export class VectorIndex {
  private readonly entries = new Map<string, VectorIndexEntry>();

  private readonly passageIdsBySource = new Map<string, Set<string>>();

  private currentGeneration: number;

  constructor(
    readonly dimension: number,
    generation = 0,
  ) {
    if (!Number.isInteger(dimension) || dimension <= 0) {
      throw new ConfigurationError(`Vector dimension must be a positive integer, got ${dimension}.`);
    }
    this.currentGeneration = generation;
  }

  static fromSnapshot(snapshot: VectorIndexSnapshot): VectorIndex {
    const index = new VectorIndex(snapshot.dimension);
    for (const entry of snapshot.entries) {
      index.put(entry.passage, entry.embedding);
    }
    index.currentGeneration = snapshot.generation;
    return index;
  }

  get generation(): number {
    return this.currentGeneration;
  }

  get size(): number {
    return this.entries.size;
  }

  /** Replaces any prior entry with the same passage id. */
  insert(passage: PassageRecord, embedding: Embedding): void {
    this.put(passage, embedding);
    this.currentGeneration += 1;
  }

  remove(passageId: string): boolean {
    const existing = this.entries.get(passageId);
    if (!existing) {
      return false;
    }
    this.entries.delete(passageId);
    this.untrackSource(existing.passage.sourceId, passageId);
    this.currentGeneration += 1;
    return true;
  }

  removeSource(sourceId: string): number {
    const ids = [...(this.passageIdsBySource.get(sourceId) ?? [])];
    for (const id of ids) {
      this.remove(id);
    }
    return ids.length;
  }

  clear(): void {
    if (this.entries.size === 0) {
      return;
    }
    this.entries.clear();
    this.passageIdsBySource.clear();
    this.currentGeneration += 1;
  }

  has(passageId: string): boolean {
    return this.entries.has(passageId);
  }

  sourceIds(): string[] {
    return [...this.passageIdsBySource.keys()].sort(compareIds);
  }

  passages(): PassageRecord[] {
    return [...this.entries.values()]
      .map((entry) => entry.passage)
      .sort((a, b) => compareIds(a.id, b.id));
  }

  search(queryEmbedding: Embedding, k: number, minScore: number): RetrievalResult {
    this.assertDimension(queryEmbedding);
    if (this.entries.size === 0 || k <= 0) {
      return [];
    }

    const scored: RetrievalResult = [];
    for (const entry of this.entries.values()) {
      const score = dot(queryEmbedding, entry.embedding);
      if (score >= minScore) {
        scored.push({ passage: entry.passage, score });
      }
    }

    scored.sort((a, b) => b.score - a.score || compareIds(a.passage.id, b.passage.id));
    return scored.slice(0, k);
  }

  snapshot(): VectorIndexSnapshot {
    return {
      dimension: this.dimension,
      generation: this.currentGeneration,
      entries: [...this.entries.values()]
        .sort((a, b) => compareIds(a.passage.id, b.passage.id))
        .map((entry) => ({
          passage: { ...entry.passage, metadata: { ...entry.passage.metadata } },
          embedding: [...entry.embedding],
        })),
    };
  }

  private put(passage: PassageRecord, embedding: Embedding): void {
    this.assertDimension(embedding);
    const previous = this.entries.get(passage.id);
    if (previous && previous.passage.sourceId !== passage.sourceId) {
      this.untrackSource(previous.passage.sourceId, passage.id);
    }
    this.entries.set(passage.id, { passage, embedding: [...embedding] });

    let ids = this.passageIdsBySource.get(passage.sourceId);
    if (!ids) {
      ids = new Set<string>();
      this.passageIdsBySource.set(passage.sourceId, ids);
    }
    ids.add(passage.id);
  }

  private untrackSource(sourceId: string, passageId: string): void {
    const ids = this.passageIdsBySource.get(sourceId);
    if (!ids) {
      return;
    }
    ids.delete(passageId);
    if (ids.size === 0) {
      this.passageIdsBySource.delete(sourceId);
    }
  }

  private assertDimension(embedding: Embedding): void {
    if (embedding.length !== this.dimension) {
      throw new ConfigurationError(
        `Embedding dimension ${embedding.length} does not match index dimension ${this.dimension}.`,
      );
    }
    if (!isFiniteVector(embedding)) {
      throw new ConfigurationError("Embedding contains non-finite values.");
    }
  }
}

export function compareIds(a: string, b: string): number {
  if (a === b) {
    return 0;
  }
  return a < b ? -1 : 1;
}
