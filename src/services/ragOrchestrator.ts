import {
  ConfigurationError,
  ConversationLogError,
  describeError,
  EmbeddingServiceError,
  GenerationFatalError,
  GenerationUnavailableError,
  IndexCorruptError,
  RagRequestError,
  RequestErrorKind,
} from "../domain/errors.js";
import { DocumentSource } from "../domain/ports.js";
import {
  AskResult,
  DocumentRecord,
  FailedIngestion,
  IndexHealth,
  IngestResult,
  RebuildResult,
} from "../domain/types.js";
import { IndexStore } from "../infra/store/indexStore.js";
import { VectorIndex, VectorIndexEntry } from "../infra/store/vectorIndex.js";
import { ChunkSplitter, prepareText } from "../pipelines/chunking.js";
import { ContextAssembler } from "../pipelines/contextAssembly.js";
import { KeyedMutex, ReadWriteLock } from "../utils/locks.js";
import { ConversationMemoryStore } from "./conversationMemory.js";
import { Embedder } from "./embedder.js";
import { GenerationClient } from "./generationClient.js";
import { QueryLifecycle, QueryStateListener } from "./queryLifecycle.js";
import { RetrievalOptions, Retriever } from "./retriever.js";

export interface RagOrchestratorDependencies {
  splitter: ChunkSplitter;
  embedder: Embedder;
  indexStore: IndexStore;
  assembler: ContextAssembler;
  generator: GenerationClient;
  memory: ConversationMemoryStore;
  documentSource?: DocumentSource | null;
}

export interface RagOrchestratorOptions {
  retrieval: RetrievalOptions;
  refuseWithoutContext: boolean;
  noContextAnswer: string;
  onQueryState?: QueryStateListener;
}

const INDEX_MUTATION_KEY = "index";

/**
 * Owns the process's vector index. Queries read it under a shared lock;
 * ingestion, removal and rebuilds are serialized and swap in their changes
 * under an exclusive one. The index is persisted once per completed batch.
 */
export class RagOrchestrator {
  private index: VectorIndex;

  private initializing: Promise<void> | null = null;

  private rebuildRecommended = false;

  private readonly lock = new ReadWriteLock();

  private readonly mutations = new KeyedMutex();

  private readonly retriever: Retriever;

  constructor(
    private readonly deps: RagOrchestratorDependencies,
    private readonly options: RagOrchestratorOptions,
  ) {
    this.index = new VectorIndex(deps.embedder.dimension);
    this.retriever = new Retriever(deps.embedder, () => this.index, this.lock, options.retrieval);
  }

  initialize(): Promise<void> {
    this.initializing ??= this.loadIndex();
    return this.initializing;
  }

  async ask(sessionId: string, queryText: string): Promise<AskResult> {
    await this.initialize();
    const session = sessionId.trim();
    const query = queryText.trim();
    if (!session) {
      throw new RagRequestError("invalid_request", "Session id is required.", false);
    }
    if (!query) {
      throw new RagRequestError("invalid_request", "Query text is required.", false);
    }

    return this.deps.memory.runExclusive(session, async (memory) => {
      const startedAt = Date.now();
      const lifecycle = new QueryLifecycle(session, this.options.onQueryState);

      try {
        lifecycle.advance("EMBEDDING");
        const queryEmbedding = await this.retriever.embedQuery(query);

        lifecycle.advance("RETRIEVING");
        const hits = await this.retriever.search(queryEmbedding);

        lifecycle.advance("ASSEMBLING");
        const context = this.deps.assembler.assemble(hits, memory.history(), query);

        let answer: string;
        if (context.passages.length === 0 && this.options.refuseWithoutContext) {
          answer = this.options.noContextAnswer;
        } else {
          lifecycle.advance("GENERATING");
          answer = await this.deps.generator.generate(context.prompt);
        }

        await this.deps.memory.record(memory, {
          query,
          answer,
          at: new Date().toISOString(),
        });
        lifecycle.advance("ANSWERED");

        return {
          session_id: session,
          answer,
          cited_source_ids: context.citedSourceIds,
          citations: context.passages.map((hit) => ({
            passage_id: hit.passage.id,
            source_id: hit.passage.sourceId,
            score: Number(hit.score.toFixed(4)),
          })),
          retrieved_count: hits.length,
          latency_ms: Date.now() - startedAt,
        };
      } catch (error) {
        lifecycle.fail();
        throw toRequestError(error);
      }
    });
  }

  /** Ingests one document and persists the index; throws on any failure. */
  async ingest(document: DocumentRecord): Promise<IngestResult> {
    await this.initialize();
    const passageCount = await this.mutations
      .run(INDEX_MUTATION_KEY, () => this.indexDocument(document))
      .catch((error: unknown) => {
        throw toRequestError(error);
      });
    await this.persist();

    return {
      indexed_count: 1,
      passage_count: passageCount,
      failed: [],
      generation: this.index.generation,
    };
  }

  /**
   * Ingests a batch. A failing document is reported in `failed` and leaves the
   * index as it was for that document; the batch is persisted once at the end.
   */
  async ingestMany(documents: DocumentRecord[]): Promise<IngestResult> {
    await this.initialize();
    const failed: FailedIngestion[] = [];
    let indexedCount = 0;
    let passageCount = 0;

    await this.mutations.run(INDEX_MUTATION_KEY, async () => {
      for (let position = 0; position < documents.length; position += 1) {
        const document = documents[position];
        try {
          passageCount += await this.indexDocument(document);
          indexedCount += 1;
        } catch (error) {
          const requestError = toRequestError(error);
          failed.push({
            source_id: document.id.trim() || `document-${position + 1}`,
            kind: requestError.kind,
            reason: requestError.message,
          });
        }
      }
    });

    if (indexedCount > 0) {
      await this.persist();
    }

    return {
      indexed_count: indexedCount,
      passage_count: passageCount,
      failed,
      generation: this.index.generation,
    };
  }

  async removeDocument(sourceId: string): Promise<number> {
    await this.initialize();
    const removed = await this.mutations.run(INDEX_MUTATION_KEY, () =>
      this.lock.write(() => this.index.removeSource(sourceId.trim())),
    );
    if (removed > 0) {
      await this.persist();
    }
    return removed;
  }

  /**
   * Re-embeds everything into a fresh index and swaps it in. Documents come
   * from the document source when one is configured, otherwise from the
   * passages already indexed.
   */
  async rebuildIndex(): Promise<RebuildResult> {
    await this.initialize();
    return this.runRebuild();
  }

  passageCount(): number {
    return this.index.size;
  }

  indexGeneration(): number {
    return this.index.generation;
  }

  async health(): Promise<IndexHealth> {
    await this.initialize();
    const storage = await this.deps.indexStore.getStorageInfo().catch((error: unknown) => {
      throw toRequestError(error, "index_store_unavailable");
    });

    return {
      passage_count: this.index.size,
      generation: this.index.generation,
      dimension: this.index.dimension,
      dirty: this.deps.indexStore.isStale(this.index),
      last_saved_generation: this.deps.indexStore.lastSavedGeneration,
      rebuild_recommended: this.rebuildRecommended,
      snapshot_key: storage.key,
      snapshot_size_bytes: storage.size_bytes,
    };
  }

  endSession(sessionId: string): boolean {
    return this.deps.memory.end(sessionId);
  }

  /** Persists the index if it changed since the last save. */
  async flush(): Promise<boolean> {
    if (!this.initializing) {
      return false;
    }
    await this.initializing;
    return this.persist();
  }

  private async loadIndex(): Promise<void> {
    try {
      this.index = await this.deps.indexStore.load();
      console.error(
        `[rag] index loaded: ${this.index.size} passages, generation ${this.index.generation}`,
      );
    } catch (error) {
      if (!(error instanceof IndexCorruptError)) {
        this.initializing = null;
        throw toRequestError(error, "index_store_unavailable");
      }
      console.error(`[rag] index snapshot rejected, starting empty: ${error.message}`);
      this.index = new VectorIndex(this.deps.embedder.dimension);
      this.rebuildRecommended = true;
    }

    if (this.rebuildRecommended && this.deps.documentSource) {
      try {
        await this.runRebuild();
      } catch (error) {
        // The empty index stays in place with the rebuild still recommended.
        console.error(`[rag] startup rebuild failed: ${describeError(error)}`);
      }
    }
  }

  private runRebuild(): Promise<RebuildResult> {
    return this.mutations
      .run(INDEX_MUTATION_KEY, async () => {
        const documents = this.deps.documentSource
          ? await this.deps.documentSource.listDocuments()
          : null;
        console.error(
          `[rag] rebuilding index from ${documents ? this.deps.documentSource?.description : "indexed passages"}`,
        );

        const entries: VectorIndexEntry[] = [];
        let documentCount = 0;

        if (documents) {
          for (const document of documents) {
            const passages = this.deps.splitter.split(document);
            if (passages.length === 0) {
              console.error(`[rag] skipped ${document.id}: empty content`);
              continue;
            }
            const embeddings = await this.deps.embedder.embedMany(passages.map((p) => p.text));
            passages.forEach((passage, position) => entries.push({ passage, embedding: embeddings[position] }));
            documentCount += 1;
          }
        } else {
          const passages = await this.lock.read(() => this.index.passages());
          const embeddings = await this.deps.embedder.embedMany(passages.map((p) => p.text));
          passages.forEach((passage, position) => entries.push({ passage, embedding: embeddings[position] }));
          documentCount = new Set(passages.map((passage) => passage.sourceId)).size;
        }

        const fresh = VectorIndex.fromSnapshot({
          dimension: this.index.dimension,
          generation: this.index.generation + 1,
          entries,
        });

        await this.lock.write(() => {
          this.index = fresh;
        });
        this.rebuildRecommended = false;
        console.error(
          `[rag] rebuild finished: ${documentCount} documents, ${fresh.size} passages, generation ${fresh.generation}`,
        );

        return {
          document_count: documentCount,
          passage_count: fresh.size,
          generation: fresh.generation,
        };
      })
      .then(async (result) => {
        await this.persist();
        return result;
      })
      .catch((error: unknown) => {
        throw toRequestError(error);
      });
  }

  private async indexDocument(document: DocumentRecord): Promise<number> {
    const valid = validateDocument(document);
    const passages = this.deps.splitter.split(valid);
    const embeddings = await this.deps.embedder.embedMany(passages.map((p) => p.text));

    await this.lock.write(() => {
      this.index.removeSource(valid.id);
      passages.forEach((passage, position) => this.index.insert(passage, embeddings[position]));
    });
    return passages.length;
  }

  private async persist(): Promise<boolean> {
    const index = this.index;
    try {
      const saved = await this.deps.indexStore.save(index);
      if (saved) {
        console.error(`[rag] index snapshot saved at generation ${index.generation}`);
      }
      return saved;
    } catch (error) {
      throw toRequestError(error, "index_store_unavailable");
    }
  }
}

function validateDocument(document: DocumentRecord): DocumentRecord {
  const id = document.id.trim();
  if (!id) {
    throw new RagRequestError("invalid_request", "Document id is required.", false);
  }
  if (!prepareText(document.text)) {
    throw new RagRequestError("invalid_request", `Document ${id} has empty content.`, false);
  }
  return { ...document, id };
}

export function toRequestError(
  error: unknown,
  fallbackKind: RequestErrorKind = "internal",
): RagRequestError {
  if (error instanceof RagRequestError) {
    return error;
  }

  const message = describeError(error);
  const options = { cause: error };
  if (error instanceof EmbeddingServiceError) {
    return new RagRequestError("embedding_unavailable", message, true, options);
  }
  if (error instanceof GenerationFatalError) {
    return new RagRequestError("generation_failed", message, false, options);
  }
  if (error instanceof GenerationUnavailableError) {
    return new RagRequestError("generation_unavailable", message, true, options);
  }
  if (error instanceof ConversationLogError) {
    return new RagRequestError("conversation_log_unavailable", message, true, options);
  }
  if (error instanceof ConfigurationError) {
    return new RagRequestError("configuration", message, false, options);
  }
  if (error instanceof IndexCorruptError) {
    return new RagRequestError("index_store_unavailable", message, false, options);
  }
  return new RagRequestError(fallbackKind, message, fallbackKind === "index_store_unavailable", options);
}
