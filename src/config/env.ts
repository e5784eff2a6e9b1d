import { z } from "zod";

const booleanFlag = z.enum(["true", "false"]).default("false");

const envSchema = z.object({
  EMBEDDING_PROVIDER: z.enum(["openai", "ollama"]).optional(),
  GENERATION_PROVIDER: z.enum(["gemini", "openai", "ollama"]).optional(),
  OPENAI_API_KEY: z.string().optional(),
  OPENAI_BASE_URL: z.string().url().default("https://api.openai.com/v1"),
  OPENAI_EMBEDDING_MODEL: z.string().default("text-embedding-3-small"),
  OPENAI_CHAT_MODEL: z.string().default("gpt-4o-mini"),
  OLLAMA_BASE_URL: z.string().default("http://127.0.0.1:11434"),
  OLLAMA_CHAT_MODEL: z.string().default("qwen2.5:7b-instruct"),
  OLLAMA_EMBEDDING_MODEL: z.string().default("nomic-embed-text"),
  GEMINI_API_KEY: z.string().optional(),
  GEMINI_MODEL: z.string().default("gemini-2.0-flash"),
  VECTOR_DIMENSION: z.coerce.number().int().positive().optional(),
  CHUNK_SIZE: z.coerce.number().int().positive().default(500),
  CHUNK_OVERLAP: z.coerce.number().int().nonnegative().default(50),
  EMBEDDING_BATCH_SIZE: z.coerce.number().int().positive().default(32),
  EMBEDDING_TIMEOUT_MS: z.coerce.number().int().positive().default(15_000),
  RETRIEVAL_TOP_K: z.coerce.number().int().positive().max(100).default(4),
  RETRIEVAL_MIN_SCORE: z.coerce.number().min(-1).max(1).default(0.25),
  CONTEXT_BUDGET: z.coerce.number().int().positive().default(3000),
  HISTORY_BUDGET: z.coerce.number().int().nonnegative().default(800),
  BUDGET_UNIT: z.enum(["tokens", "chars"]).default("tokens"),
  SYSTEM_PROMPT: z
    .string()
    .default(
      "Answer the question using only the context and conversation below. If they do not contain the answer, say that you do not know.",
    ),
  CONVERSATION_TURN_LIMIT: z.coerce.number().int().positive().default(6),
  GENERATION_MAX_ATTEMPTS: z.coerce.number().int().positive().max(10).default(3),
  GENERATION_BACKOFF_MS: z.coerce.number().int().nonnegative().default(500),
  GENERATION_BACKOFF_MAX_MS: z.coerce.number().int().nonnegative().default(8000),
  GENERATION_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
  GENERATION_MAX_OUTPUT_TOKENS: z.coerce.number().int().positive().default(512),
  GENERATION_TEMPERATURE: z.coerce.number().min(0).max(2).default(0.2),
  REFUSE_WITHOUT_CONTEXT: booleanFlag,
  NO_CONTEXT_ANSWER: z
    .string()
    .default("I couldn't find relevant information in the indexed documents. Please rephrase."),
  INDEX_STORE_BACKEND: z.enum(["fs", "s3", "memory"]).default("fs"),
  INDEX_STORE_PATH: z.string().default(".data/vectorstore"),
  INDEX_SNAPSHOT_KEY: z.string().min(1).default("vectorstore/index.json"),
  MAX_INDEX_SNAPSHOT_BYTES: z.coerce.number().int().positive().default(200 * 1024 * 1024),
  STORE_TIMEOUT_MS: z.coerce.number().int().positive().default(20_000),
  S3_BUCKET: z.string().default("vectorstore-bucket"),
  S3_REGION: z.string().default("us-east-1"),
  S3_ENDPOINT: z.string().optional(),
  S3_ACCESS_KEY_ID: z.string().optional(),
  S3_SECRET_ACCESS_KEY: z.string().optional(),
  S3_FORCE_PATH_STYLE: booleanFlag,
  DATABASE_URL: z.string().optional(),
  DOCUMENTS_DIR: z.string().optional(),
});

export type EmbeddingProviderName = "openai" | "ollama";
export type GenerationProviderName = "gemini" | "openai" | "ollama";
export type BudgetUnit = "tokens" | "chars";
export type IndexStoreBackend = "fs" | "s3" | "memory";

export interface AppConfig {
  embeddingProvider: EmbeddingProviderName;
  generationProvider: GenerationProviderName;
  openaiApiKey: string | null;
  openaiBaseUrl: string;
  openaiEmbeddingModel: string;
  openaiChatModel: string;
  ollamaBaseUrl: string;
  ollamaChatModel: string;
  ollamaEmbeddingModel: string;
  geminiApiKey: string | null;
  geminiModel: string;
  vectorDimension: number;
  chunkSize: number;
  chunkOverlap: number;
  embeddingBatchSize: number;
  embeddingTimeoutMs: number;
  topK: number;
  minScore: number;
  contextBudget: number;
  historyBudget: number;
  budgetUnit: BudgetUnit;
  systemPrompt: string;
  conversationTurnLimit: number;
  generationMaxAttempts: number;
  generationBackoffMs: number;
  generationBackoffMaxMs: number;
  generationTimeoutMs: number;
  generationMaxOutputTokens: number;
  generationTemperature: number;
  refuseWithoutContext: boolean;
  noContextAnswer: string;
  indexStoreBackend: IndexStoreBackend;
  indexStorePath: string;
  indexSnapshotKey: string;
  maxIndexSnapshotBytes: number;
  storeTimeoutMs: number;
  s3Bucket: string;
  s3Region: string;
  s3Endpoint: string | null;
  s3AccessKeyId: string | null;
  s3SecretAccessKey: string | null;
  s3ForcePathStyle: boolean;
  databaseUrl: string | null;
  documentsDir: string | null;
}

const KNOWN_DIMENSIONS: Record<string, number> = {
  "text-embedding-3-small": 1536,
  "text-embedding-3-large": 3072,
  "text-embedding-ada-002": 1536,
  "nomic-embed-text": 768,
  "mxbai-embed-large": 1024,
  "all-minilm": 384,
};

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.parse(env);
  const openaiApiKey = nonEmpty(parsed.OPENAI_API_KEY);
  const geminiApiKey = nonEmpty(parsed.GEMINI_API_KEY);

  const embeddingProvider =
    parsed.EMBEDDING_PROVIDER ?? (openaiApiKey ? "openai" : "ollama");
  const generationProvider =
    parsed.GENERATION_PROVIDER ??
    (geminiApiKey ? "gemini" : openaiApiKey ? "openai" : "ollama");

  if ((embeddingProvider === "openai" || generationProvider === "openai") && !openaiApiKey) {
    throw new Error("EMBEDDING_PROVIDER=openai or GENERATION_PROVIDER=openai requires OPENAI_API_KEY.");
  }
  if (generationProvider === "gemini" && !geminiApiKey) {
    throw new Error("GENERATION_PROVIDER=gemini requires GEMINI_API_KEY.");
  }
  if (parsed.CHUNK_OVERLAP >= parsed.CHUNK_SIZE) {
    throw new Error(
      `CHUNK_OVERLAP (${parsed.CHUNK_OVERLAP}) must be smaller than CHUNK_SIZE (${parsed.CHUNK_SIZE}).`,
    );
  }
  if (parsed.HISTORY_BUDGET > parsed.CONTEXT_BUDGET) {
    throw new Error(
      `HISTORY_BUDGET (${parsed.HISTORY_BUDGET}) must not exceed CONTEXT_BUDGET (${parsed.CONTEXT_BUDGET}).`,
    );
  }
  if (parsed.INDEX_STORE_BACKEND === "s3" && !parsed.S3_BUCKET.trim()) {
    throw new Error("INDEX_STORE_BACKEND=s3 requires S3_BUCKET.");
  }

  const embeddingModel =
    embeddingProvider === "openai"
      ? parsed.OPENAI_EMBEDDING_MODEL
      : parsed.OLLAMA_EMBEDDING_MODEL;
  const vectorDimension = parsed.VECTOR_DIMENSION ?? KNOWN_DIMENSIONS[embeddingModel];
  if (!vectorDimension) {
    throw new Error(
      `VECTOR_DIMENSION is required for embedding model "${embeddingModel}".`,
    );
  }

  return {
    embeddingProvider,
    generationProvider,
    openaiApiKey,
    openaiBaseUrl: parsed.OPENAI_BASE_URL.replace(/\/+$/, ""),
    openaiEmbeddingModel: parsed.OPENAI_EMBEDDING_MODEL,
    openaiChatModel: parsed.OPENAI_CHAT_MODEL,
    ollamaBaseUrl: parsed.OLLAMA_BASE_URL.replace(/\/+$/, ""),
    ollamaChatModel: parsed.OLLAMA_CHAT_MODEL,
    ollamaEmbeddingModel: parsed.OLLAMA_EMBEDDING_MODEL,
    geminiApiKey,
    geminiModel: parsed.GEMINI_MODEL,
    vectorDimension,
    chunkSize: parsed.CHUNK_SIZE,
    chunkOverlap: parsed.CHUNK_OVERLAP,
    embeddingBatchSize: parsed.EMBEDDING_BATCH_SIZE,
    embeddingTimeoutMs: parsed.EMBEDDING_TIMEOUT_MS,
    topK: parsed.RETRIEVAL_TOP_K,
    minScore: parsed.RETRIEVAL_MIN_SCORE,
    contextBudget: parsed.CONTEXT_BUDGET,
    historyBudget: parsed.HISTORY_BUDGET,
    budgetUnit: parsed.BUDGET_UNIT,
    systemPrompt: parsed.SYSTEM_PROMPT,
    conversationTurnLimit: parsed.CONVERSATION_TURN_LIMIT,
    generationMaxAttempts: parsed.GENERATION_MAX_ATTEMPTS,
    generationBackoffMs: parsed.GENERATION_BACKOFF_MS,
    generationBackoffMaxMs: Math.max(parsed.GENERATION_BACKOFF_MAX_MS, parsed.GENERATION_BACKOFF_MS),
    generationTimeoutMs: parsed.GENERATION_TIMEOUT_MS,
    generationMaxOutputTokens: parsed.GENERATION_MAX_OUTPUT_TOKENS,
    generationTemperature: parsed.GENERATION_TEMPERATURE,
    refuseWithoutContext: parsed.REFUSE_WITHOUT_CONTEXT === "true",
    noContextAnswer: parsed.NO_CONTEXT_ANSWER,
    indexStoreBackend: parsed.INDEX_STORE_BACKEND,
    indexStorePath: parsed.INDEX_STORE_PATH,
    indexSnapshotKey: parsed.INDEX_SNAPSHOT_KEY,
    maxIndexSnapshotBytes: parsed.MAX_INDEX_SNAPSHOT_BYTES,
    storeTimeoutMs: parsed.STORE_TIMEOUT_MS,
    s3Bucket: parsed.S3_BUCKET.trim(),
    s3Region: parsed.S3_REGION,
    s3Endpoint: nonEmpty(parsed.S3_ENDPOINT),
    s3AccessKeyId: nonEmpty(parsed.S3_ACCESS_KEY_ID),
    s3SecretAccessKey: nonEmpty(parsed.S3_SECRET_ACCESS_KEY),
    s3ForcePathStyle: parsed.S3_FORCE_PATH_STYLE === "true",
    databaseUrl: nonEmpty(parsed.DATABASE_URL),
    documentsDir: nonEmpty(parsed.DOCUMENTS_DIR),
  };
}

export function resolveEmbeddingModelName(config: AppConfig): string {
  return config.embeddingProvider === "openai"
    ? config.openaiEmbeddingModel
    : config.ollamaEmbeddingModel;
}

function nonEmpty(value: string | undefined): string | null {
  const trimmed = value?.trim();
  return trimmed ? trimmed : null;
}
