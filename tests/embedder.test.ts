import { describe, expect, it } from "vitest";
import { ConfigurationError, EmbeddingServiceError } from "../src/domain/errors.js";
import { EmbeddingModel } from "../src/domain/ports.js";
import { Embedder } from "../src/services/embedder.js";
import { l2Norm } from "../src/utils/vector.js";
import { VocabularyEmbeddingModel } from "./helpers/fakes.js";

describe("Embedder", () => {
  it("returns unit-length vectors in input order", async () => {
    const model = new VocabularyEmbeddingModel();
    const embedder = new Embedder(model, { dimension: model.dimension, batchSize: 8, timeoutMs: 1_000 });

    const [sky, grass] = await embedder.embedMany(["sky sky blue", "green grass"]);
    expect(l2Norm(sky)).toBeCloseTo(1, 12);
    expect(l2Norm(grass)).toBeCloseTo(1, 12);
    expect(sky[0]).toBeCloseTo(2 / Math.sqrt(5), 12);
    expect(grass[2]).toBeCloseTo(1 / Math.sqrt(2), 12);
  });

  it("sends texts in batches of the configured size", async () => {
    const model = new VocabularyEmbeddingModel();
    const embedder = new Embedder(model, { dimension: model.dimension, batchSize: 2, timeoutMs: 1_000 });

    const embeddings = await embedder.embedMany(["sky", "sea", "snow", "river", "grass"]);
    expect(embeddings).toHaveLength(5);
    expect(model.calls).toEqual([["sky", "sea"], ["snow", "river"], ["grass"]]);
  });

  it("wraps provider failures as embedding service errors", async () => {
    const model = new VocabularyEmbeddingModel();
    model.failNext = new Error("connection reset");
    const embedder = new Embedder(model, { dimension: model.dimension, batchSize: 8, timeoutMs: 1_000 });

    await expect(embedder.embed("sky")).rejects.toThrow(EmbeddingServiceError);
  });

  it("rejects a zero vector", async () => {
    const model = new VocabularyEmbeddingModel();
    const embedder = new Embedder(model, { dimension: model.dimension, batchSize: 8, timeoutMs: 1_000 });

    await expect(embedder.embed("nothing known here")).rejects.toThrow("zero or non-finite vector");
  });

  it("treats a dimension mismatch as a configuration error", async () => {
    const model = new VocabularyEmbeddingModel();
    const embedder = new Embedder(model, { dimension: model.dimension + 1, batchSize: 8, timeoutMs: 1_000 });

    await expect(embedder.embed("sky")).rejects.toThrow(ConfigurationError);
  });

  it("rejects a response with the wrong number of vectors", async () => {
    const model: EmbeddingModel = {
      modelName: "short-model",
      embedTexts: async () => [[1, 0]],
    };
    const embedder = new Embedder(model, { dimension: 2, batchSize: 8, timeoutMs: 1_000 });

    await expect(embedder.embedMany(["a", "b"])).rejects.toThrow("Embedding count mismatch (1 vectors for 2 texts).");
  });
});
