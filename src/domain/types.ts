import type { RequestErrorKind } from "./errors.js";

export type MetadataValue = string | number | boolean | null;

export type DocumentMetadata = Record<string, MetadataValue>;

export interface DocumentRecord {
  id: string;
  text: string;
  metadata: DocumentMetadata;
}

export interface PassageRecord {
  id: string;
  sourceId: string;
  ordinal: number;
  text: string;
  start: number;
  end: number;
  /** Characters at the start of this passage repeated from the previous one. */
  overlapStart: number;
  metadata: DocumentMetadata;
}

export type Embedding = number[];

export interface RetrievalHit {
  passage: PassageRecord;
  score: number;
}

export type RetrievalResult = RetrievalHit[];

export interface ConversationTurn {
  query: string;
  answer: string;
  at: string;
}

export interface Citation {
  passage_id: string;
  source_id: string;
  score: number;
}

export interface AskResult {
  session_id: string;
  answer: string;
  cited_source_ids: string[];
  citations: Citation[];
  retrieved_count: number;
  latency_ms: number;
}

export interface FailedIngestion {
  source_id: string;
  kind: RequestErrorKind;
  reason: string;
}

export interface IngestResult {
  indexed_count: number;
  passage_count: number;
  failed: FailedIngestion[];
  generation: number;
}

export interface RebuildResult {
  document_count: number;
  passage_count: number;
  generation: number;
}

export interface IndexHealth {
  passage_count: number;
  generation: number;
  dimension: number;
  dirty: boolean;
  last_saved_generation: number | null;
  rebuild_recommended: boolean;
  snapshot_key: string;
  snapshot_size_bytes: number | null;
}
