import { describe, expect, it } from "vitest";
import { IndexCorruptError } from "../src/domain/errors.js";
import { PassageRecord } from "../src/domain/types.js";
import { IndexStore, IndexStoreOptions } from "../src/infra/store/indexStore.js";
import { MemoryObjectStore } from "../src/infra/store/memoryObjectStore.js";
import { VectorIndex } from "../src/infra/store/vectorIndex.js";

const OPTIONS: IndexStoreOptions = {
  key: "indexes/test.json",
  dimension: 3,
  embeddingModel: "test-model",
  maxBytes: 1_000_000,
};

interface SnapshotJson {
  format_version: number;
  dimension: number;
  embedding_model: string;
  passages: unknown[];
  embeddings: number[][];
}

const CORRUPTIONS: Array<[string, (raw: SnapshotJson) => unknown]> = [
  ["invalid JSON", () => "{not json"],
  ["an unknown format version", (raw) => ({ ...raw, format_version: 2 })],
  ["a missing embedding", (raw) => ({ ...raw, embeddings: raw.embeddings.slice(1) })],
  ["a different dimension", (raw) => ({ ...raw, dimension: 4 })],
  ["another embedding model", (raw) => ({ ...raw, embedding_model: "other-model" })],
  ["a repeated passage id", (raw) => ({ ...raw, passages: [raw.passages[0], raw.passages[0]] })],
  ["a short vector", (raw) => ({ ...raw, embeddings: [[1, 0], ...raw.embeddings.slice(1)] })],
  ["an infinite component", (raw) => JSON.stringify(raw).replace("[1,0,0]", "[1e999,0,0]")],
  ["a vector that is not unit length", (raw) => ({ ...raw, embeddings: [[2, 0, 0], ...raw.embeddings.slice(1)] })],
];

describe("IndexStore", () => {
  it("loads an empty index when no snapshot exists", async () => {
    const store = new IndexStore(new MemoryObjectStore(), OPTIONS);
    const index = await store.load();

    expect(index.size).toBe(0);
    expect(index.dimension).toBe(3);
    expect(store.lastSavedGeneration).toBeNull();
  });

  it("restores an index that answers searches identically", async () => {
    const objects = new MemoryObjectStore();
    const original = createIndex();
    const query = [0.6, 0.8, 0];

    await new IndexStore(objects, OPTIONS).save(original);
    const reloadedStore = new IndexStore(objects, OPTIONS);
    const reloaded = await reloadedStore.load();

    expect(reloaded.generation).toBe(original.generation);
    expect(reloaded.passages()).toEqual(original.passages());
    expect(reloaded.search(query, 3, 0)).toEqual(original.search(query, 3, 0));
    expect(reloadedStore.lastSavedGeneration).toBe(original.generation);
  });

  it("skips a save when the generation is already persisted", async () => {
    const objects = new MemoryObjectStore();
    const store = new IndexStore(objects, OPTIONS);
    const index = createIndex();

    await expect(store.save(index)).resolves.toBe(true);
    await expect(store.save(index)).resolves.toBe(false);
    expect(store.isStale(index)).toBe(false);

    index.insert(passage("c", 0), [0, 0, 1]);
    expect(store.isStale(index)).toBe(true);
    await expect(store.save(index)).resolves.toBe(true);
  });

  it("rejects a snapshot over the size limit and keeps the previous one", async () => {
    const objects = new MemoryObjectStore();
    await new IndexStore(objects, OPTIONS).save(createIndex());
    const before = await objects.get(OPTIONS.key);

    const tight = new IndexStore(objects, { ...OPTIONS, maxBytes: 64 });
    await expect(tight.save(createIndex(5))).rejects.toThrow("Index snapshot exceeds size limit");
    expect(await objects.get(OPTIONS.key)).toEqual(before);
  });

  it("reports where the snapshot lives", async () => {
    const objects = new MemoryObjectStore();
    const store = new IndexStore(objects, OPTIONS);
    await store.save(createIndex());

    const info = await store.getStorageInfo();
    const stored = await objects.get(OPTIONS.key);
    expect(info).toEqual({
      key: "indexes/test.json",
      location: "memory://",
      exists: true,
      size_bytes: stored?.byteLength,
      max_bytes: 1_000_000,
    });
  });

  it.each(CORRUPTIONS)("rejects a snapshot with %s as a whole", async (_label, corrupt) => {
    const objects = new MemoryObjectStore();
    await new IndexStore(objects, OPTIONS).save(createIndex());
    const raw: SnapshotJson = JSON.parse((await objects.get(OPTIONS.key))?.toString("utf-8") ?? "");
    const corrupted = corrupt(raw);
    await objects.put(
      OPTIONS.key,
      Buffer.from(typeof corrupted === "string" ? corrupted : JSON.stringify(corrupted), "utf-8"),
    );

    await expect(new IndexStore(objects, OPTIONS).load()).rejects.toThrow(IndexCorruptError);
  });
});

function createIndex(extra = 0): VectorIndex {
  const index = new VectorIndex(3);
  index.insert(passage("a", 0), [1, 0, 0]);
  index.insert(passage("b", 0), [0, 1, 0]);
  for (let ordinal = 0; ordinal < extra; ordinal += 1) {
    index.insert(passage("extra", ordinal), [0, 0, 1]);
  }
  return index;
}

function passage(sourceId: string, ordinal: number): PassageRecord {
  const text = `${sourceId} passage ${ordinal}`;
  return {
    id: `${sourceId}:${ordinal}`,
    sourceId,
    ordinal,
    text,
    start: 0,
    end: text.length,
    overlapStart: 0,
    metadata: { source: sourceId },
  };
}
