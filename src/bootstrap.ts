import { AppConfig, resolveEmbeddingModelName } from "./config/env.js";
import { CompletionModel, ConversationLog, DocumentSource, EmbeddingModel } from "./domain/ports.js";
import { createModelClients } from "./infra/ai/createModelClients.js";
import { PgConversationLog } from "./infra/db/pgConversationLog.js";
import { createPostgresPool } from "./infra/db/postgres.js";
import { FileSystemDocumentSource } from "./infra/sources/fileSystemDocumentSource.js";
import { createObjectStore } from "./infra/store/createObjectStore.js";
import { IndexStore } from "./infra/store/indexStore.js";
import { ChunkSplitter } from "./pipelines/chunking.js";
import { ContextAssembler } from "./pipelines/contextAssembly.js";
import { ConversationMemoryStore } from "./services/conversationMemory.js";
import { Embedder } from "./services/embedder.js";
import { GenerationClient } from "./services/generationClient.js";
import { QueryStateListener } from "./services/queryLifecycle.js";
import { RagOrchestrator } from "./services/ragOrchestrator.js";
import { createTextMeasure } from "./utils/text.js";

export interface RagEngineOverrides {
  embeddingModel?: EmbeddingModel;
  completionModel?: CompletionModel;
  conversationLog?: ConversationLog | null;
  documentSource?: DocumentSource | null;
  onQueryState?: QueryStateListener;
}

export interface RagEngineBootstrapResult {
  engine: RagOrchestrator;
  close: () => Promise<void>;
}

/**
 * Wires the engine from configuration, loads the persisted index and, when a
 * document directory is configured and the index is empty, ingests it.
 */
export async function createRagEngine(
  config: AppConfig,
  overrides: RagEngineOverrides = {},
): Promise<RagEngineBootstrapResult> {
  const shutdownTasks: Array<() => Promise<void>> = [];

  const models =
    overrides.embeddingModel && overrides.completionModel
      ? { embeddingModel: overrides.embeddingModel, completionModel: overrides.completionModel }
      : createModelClients(config);
  const embeddingModel = overrides.embeddingModel ?? models.embeddingModel;
  const completionModel = overrides.completionModel ?? models.completionModel;

  const { objectStore, close: closeObjectStore } = createObjectStore(config);
  shutdownTasks.push(closeObjectStore);

  let conversationLog = overrides.conversationLog;
  if (conversationLog === undefined) {
    conversationLog = null;
    if (config.databaseUrl) {
      const pool = createPostgresPool(config.databaseUrl);
      const pgLog = new PgConversationLog(pool);
      shutdownTasks.push(async () => {
        await pool.end();
      });
      conversationLog = pgLog;
    }
  }

  const documentSource =
    overrides.documentSource !== undefined
      ? overrides.documentSource
      : config.documentsDir
        ? new FileSystemDocumentSource(config.documentsDir)
        : null;

  const engine = new RagOrchestrator(
    {
      splitter: new ChunkSplitter({
        chunkSize: config.chunkSize,
        chunkOverlap: config.chunkOverlap,
      }),
      embedder: new Embedder(embeddingModel, {
        dimension: config.vectorDimension,
        batchSize: config.embeddingBatchSize,
        timeoutMs: config.embeddingTimeoutMs,
      }),
      indexStore: new IndexStore(objectStore, {
        key: config.indexSnapshotKey,
        dimension: config.vectorDimension,
        embeddingModel: resolveEmbeddingModelName(config),
        maxBytes: config.maxIndexSnapshotBytes,
      }),
      assembler: new ContextAssembler({
        budget: config.contextBudget,
        historyBudget: config.historyBudget,
        systemPrompt: config.systemPrompt,
        measure: createTextMeasure(config.budgetUnit),
      }),
      generator: new GenerationClient(completionModel, {
        maxAttempts: config.generationMaxAttempts,
        baseDelayMs: config.generationBackoffMs,
        maxDelayMs: config.generationBackoffMaxMs,
        timeoutMs: config.generationTimeoutMs,
        maxOutputTokens: config.generationMaxOutputTokens,
        temperature: config.generationTemperature,
      }),
      memory: new ConversationMemoryStore({
        turnLimit: config.conversationTurnLimit,
        log: conversationLog,
      }),
      documentSource,
    },
    {
      retrieval: { k: config.topK, minScore: config.minScore },
      refuseWithoutContext: config.refuseWithoutContext,
      noContextAnswer: config.noContextAnswer,
      onQueryState: overrides.onQueryState,
    },
  );

  const runShutdownTasks = async () => {
    for (const task of [...shutdownTasks].reverse()) {
      await task();
    }
  };

  const close = async () => {
    try {
      await engine.flush();
    } finally {
      await runShutdownTasks();
    }
  };

  try {
    if (conversationLog instanceof PgConversationLog) {
      await conversationLog.initialize();
    }
    await engine.initialize();
    if (documentSource && engine.passageCount() === 0) {
      const documents = await documentSource.listDocuments();
      const result = await engine.ingestMany(documents);
      console.error(
        `[rag] ingested ${result.indexed_count} documents (${result.passage_count} passages) from ${documentSource.description}`,
      );
      for (const failure of result.failed) {
        console.error(`[rag] skipped ${failure.source_id}: ${failure.reason}`);
      }
    }
  } catch (error) {
    await runShutdownTasks();
    throw error;
  }

  return { engine, close };
}
