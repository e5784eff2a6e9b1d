import path from "node:path";
import { describe, expect, it } from "vitest";
import { createRagEngine } from "../src/bootstrap.js";
import { loadConfig } from "../src/config/env.js";
import { createObjectStore } from "../src/infra/store/createObjectStore.js";
import { FileSystemObjectStore } from "../src/infra/store/fileSystemObjectStore.js";
import { MemoryObjectStore } from "../src/infra/store/memoryObjectStore.js";
import { S3ObjectStore } from "../src/infra/store/s3ObjectStore.js";
import { ScriptedCompletionModel, StaticDocumentSource, VocabularyEmbeddingModel } from "./helpers/fakes.js";

function createConfig() {
  return loadConfig({
    INDEX_STORE_BACKEND: "memory",
    VECTOR_DIMENSION: "16",
    BUDGET_UNIT: "chars",
    CHUNK_SIZE: "200",
    CHUNK_OVERLAP: "20",
    RETRIEVAL_MIN_SCORE: "0.2",
  });
}

describe("createRagEngine", () => {
  it("ingests the document source into an empty index", async () => {
    const source = new StaticDocumentSource([
      { id: "colors.md", text: "The sky is blue. Grass is green.", metadata: {} },
      { id: "empty.md", text: " ", metadata: {} },
    ]);
    const { engine, close } = await createRagEngine(createConfig(), {
      embeddingModel: new VocabularyEmbeddingModel(),
      completionModel: new ScriptedCompletionModel(["Blue."]),
      conversationLog: null,
      documentSource: source,
    });

    try {
      expect(engine.passageCount()).toBe(1);
      const result = await engine.ask("s1", "What color is the sky?");
      expect(result.answer).toBe("Blue.");
      expect(result.cited_source_ids).toEqual(["colors.md"]);
      await expect(engine.health()).resolves.toMatchObject({ dirty: false, passage_count: 1 });
    } finally {
      await close();
    }
  });

  it("starts without a document source", async () => {
    const { engine, close } = await createRagEngine(createConfig(), {
      embeddingModel: new VocabularyEmbeddingModel(),
      completionModel: new ScriptedCompletionModel(),
      documentSource: null,
    });

    expect(engine.passageCount()).toBe(0);
    await close();
  });
});

describe("createObjectStore", () => {
  it("selects the configured backend", async () => {
    const base = { VECTOR_DIMENSION: "16", INDEX_STORE_PATH: ".tmp-tests-backends" };

    const memory = createObjectStore(loadConfig({ ...base, INDEX_STORE_BACKEND: "memory" }));
    const fs = createObjectStore(loadConfig({ ...base, INDEX_STORE_BACKEND: "fs" }));
    const s3 = createObjectStore(
      loadConfig({ ...base, INDEX_STORE_BACKEND: "s3", S3_BUCKET: "test-bucket", S3_REGION: "eu-west-1" }),
    );

    expect(memory.objectStore).toBeInstanceOf(MemoryObjectStore);
    expect(fs.objectStore).toBeInstanceOf(FileSystemObjectStore);
    expect(fs.objectStore.description).toBe(`file://${path.resolve(".tmp-tests-backends")}`);
    expect(s3.objectStore).toBeInstanceOf(S3ObjectStore);
    expect(s3.objectStore.description).toBe("s3://test-bucket");

    await Promise.all([memory.close(), fs.close(), s3.close()]);
  });
});
