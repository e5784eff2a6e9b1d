import { ConversationTurn, DocumentRecord } from "./types.js";

export interface EmbedRequestOptions {
  timeoutMs: number;
}

export interface EmbeddingModel {
  readonly modelName: string;
  embedTexts(texts: string[], options: EmbedRequestOptions): Promise<number[][]>;
}

export interface CompletionOptions {
  maxOutputTokens: number;
  temperature: number;
  timeoutMs: number;
}

export interface CompletionModel {
  readonly modelName: string;
  complete(prompt: string, options: CompletionOptions): Promise<string>;
}

export interface ObjectStat {
  sizeBytes: number;
}

/** Remote or local blob storage holding index snapshots. `put` must be atomic. */
export interface ObjectStore {
  readonly description: string;
  get(key: string): Promise<Buffer | null>;
  put(key: string, bytes: Buffer): Promise<void>;
  stat(key: string): Promise<ObjectStat | null>;
}

export interface ConversationLog {
  append(sessionId: string, turn: ConversationTurn): Promise<void>;
  /** Newest `limit` turns, returned oldest first. */
  readRecent(sessionId: string, limit: number): Promise<ConversationTurn[]>;
}

export interface DocumentSource {
  readonly description: string;
  listDocuments(): Promise<DocumentRecord[]>;
}
