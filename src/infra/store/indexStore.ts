import { z } from "zod";
import { describeError, IndexCorruptError } from "../../domain/errors.js";
import { ObjectStore } from "../../domain/ports.js";
import { l2Norm } from "../../utils/vector.js";
import { VectorIndex } from "./vectorIndex.js";

const CURRENT_FORMAT_VERSION = 1;

// Stored vectors are unit length; search scores them by dot product.
const UNIT_NORM_TOLERANCE = 1e-3;

const metadataValueSchema = z.union([z.string(), z.number(), z.boolean(), z.null()]);

const passageSchema = z.object({
  id: z.string().min(1),
  sourceId: z.string().min(1),
  ordinal: z.number().int().nonnegative(),
  text: z.string().min(1),
  start: z.number().int().nonnegative(),
  end: z.number().int().nonnegative(),
  overlapStart: z.number().int().nonnegative(),
  metadata: z.record(metadataValueSchema),
});

const snapshotSchema = z.object({
  format_version: z.literal(CURRENT_FORMAT_VERSION),
  generation: z.number().int().nonnegative(),
  dimension: z.number().int().positive(),
  embedding_model: z.string(),
  saved_at: z.string(),
  passages: z.array(passageSchema),
  embeddings: z.array(z.array(z.number().finite())),
});

type PersistedIndexSnapshot = z.infer<typeof snapshotSchema>;

export interface IndexStoreOptions {
  key: string;
  dimension: number;
  embeddingModel: string;
  maxBytes: number;
}

export interface IndexStorageInfo {
  key: string;
  location: string;
  exists: boolean;
  size_bytes: number | null;
  max_bytes: number;
}

/**
 * Persists the vector index as a single snapshot object. Loads are all or
 * nothing; saves are serialized and skipped when nothing changed since the
 * last successful save.
 */
export class IndexStore {
  private writeChain: Promise<unknown> = Promise.resolve();

  private lastSaved: number | null = null;

  constructor(
    private readonly objectStore: ObjectStore,
    private readonly options: IndexStoreOptions,
  ) {}

  get lastSavedGeneration(): number | null {
    return this.lastSaved;
  }

  isStale(index: VectorIndex): boolean {
    return this.lastSaved !== index.generation;
  }

  async load(): Promise<VectorIndex> {
    const bytes = await this.objectStore.get(this.options.key);
    if (!bytes) {
      this.lastSaved = null;
      return new VectorIndex(this.options.dimension);
    }

    const index = this.decode(bytes);
    this.lastSaved = index.generation;
    return index;
  }

  /** Resolves to true when a snapshot was uploaded, false when it was already current. */
  save(index: VectorIndex): Promise<boolean> {
    const task = async () => {
      const snapshot = index.snapshot();
      if (snapshot.generation === this.lastSaved) {
        return false;
      }

      const payload: PersistedIndexSnapshot = {
        format_version: CURRENT_FORMAT_VERSION,
        generation: snapshot.generation,
        dimension: snapshot.dimension,
        embedding_model: this.options.embeddingModel,
        saved_at: new Date().toISOString(),
        passages: snapshot.entries.map((entry) => entry.passage),
        embeddings: snapshot.entries.map((entry) => entry.embedding),
      };

      const serialized = Buffer.from(JSON.stringify(payload), "utf-8");
      if (serialized.byteLength > this.options.maxBytes) {
        throw new Error(
          `Index snapshot exceeds size limit (${serialized.byteLength} > ${this.options.maxBytes} bytes).`,
        );
      }

      await this.objectStore.put(this.options.key, serialized);
      this.lastSaved = snapshot.generation;
      return true;
    };

    const result = this.writeChain.then(task, task);
    this.writeChain = result.catch(() => undefined);
    return result;
  }

  async getStorageInfo(): Promise<IndexStorageInfo> {
    const stat = await this.objectStore.stat(this.options.key);
    return {
      key: this.options.key,
      location: this.objectStore.description,
      exists: stat !== null,
      size_bytes: stat?.sizeBytes ?? null,
      max_bytes: this.options.maxBytes,
    };
  }

  private decode(bytes: Buffer): VectorIndex {
    let raw: unknown;
    try {
      raw = JSON.parse(bytes.toString("utf-8"));
    } catch (error) {
      throw new IndexCorruptError("Index snapshot is not valid JSON.", { cause: error });
    }

    const parsed = snapshotSchema.safeParse(raw);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      throw new IndexCorruptError(
        `Index snapshot failed validation at "${issue?.path.join(".") ?? ""}": ${issue?.message ?? "invalid"}.`,
        { cause: parsed.error },
      );
    }

    const snapshot = parsed.data;
    if (snapshot.passages.length !== snapshot.embeddings.length) {
      throw new IndexCorruptError(
        `Index snapshot has ${snapshot.passages.length} passages but ${snapshot.embeddings.length} embeddings.`,
      );
    }
    if (snapshot.dimension !== this.options.dimension) {
      throw new IndexCorruptError(
        `Index snapshot dimension ${snapshot.dimension} does not match configured dimension ${this.options.dimension}.`,
      );
    }
    if (snapshot.embedding_model !== this.options.embeddingModel) {
      throw new IndexCorruptError(
        `Index snapshot was built with ${snapshot.embedding_model}, but ${this.options.embeddingModel} is configured.`,
      );
    }

    const seen = new Set<string>();
    snapshot.passages.forEach((passage, position) => {
      if (seen.has(passage.id)) {
        throw new IndexCorruptError(`Index snapshot repeats passage id ${passage.id}.`);
      }
      seen.add(passage.id);
      if (snapshot.embeddings[position].length !== snapshot.dimension) {
        throw new IndexCorruptError(
          `Embedding for passage ${passage.id} has ${snapshot.embeddings[position].length} dimensions, expected ${snapshot.dimension}.`,
        );
      }
      const norm = l2Norm(snapshot.embeddings[position]);
      if (Math.abs(norm - 1) > UNIT_NORM_TOLERANCE) {
        throw new IndexCorruptError(
          `Embedding for passage ${passage.id} is not unit length (norm ${norm.toFixed(4)}).`,
        );
      }
    });

    try {
      return VectorIndex.fromSnapshot({
        dimension: snapshot.dimension,
        generation: snapshot.generation,
        entries: snapshot.passages.map((passage, position) => ({
          passage,
          embedding: snapshot.embeddings[position],
        })),
      });
    } catch (error) {
      throw new IndexCorruptError(`Index snapshot could not be restored: ${describeError(error)}`, {
        cause: error,
      });
    }
  }
}
