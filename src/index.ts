export { createRagEngine } from "./bootstrap.js";
export type { RagEngineBootstrapResult, RagEngineOverrides } from "./bootstrap.js";
export { loadConfig } from "./config/env.js";
export type { AppConfig, BudgetUnit } from "./config/env.js";
export * from "./domain/errors.js";
export type * from "./domain/ports.js";
export type * from "./domain/types.js";
export { PgConversationLog } from "./infra/db/pgConversationLog.js";
export { FileSystemDocumentSource } from "./infra/sources/fileSystemDocumentSource.js";
export { FileSystemObjectStore } from "./infra/store/fileSystemObjectStore.js";
export { IndexStore } from "./infra/store/indexStore.js";
export { MemoryObjectStore } from "./infra/store/memoryObjectStore.js";
export { S3ObjectStore } from "./infra/store/s3ObjectStore.js";
export { VectorIndex } from "./infra/store/vectorIndex.js";
export { ChunkSplitter } from "./pipelines/chunking.js";
export { ContextAssembler } from "./pipelines/contextAssembly.js";
export { ConversationMemory, ConversationMemoryStore } from "./services/conversationMemory.js";
export { Embedder } from "./services/embedder.js";
export { GenerationClient } from "./services/generationClient.js";
export { QueryLifecycle } from "./services/queryLifecycle.js";
export type { QueryState, QueryStateEvent, QueryStateListener } from "./services/queryLifecycle.js";
export { RagOrchestrator, toRequestError } from "./services/ragOrchestrator.js";
export { Retriever } from "./services/retriever.js";
