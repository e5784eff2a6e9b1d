import type { Pool } from "pg";
import { ConversationLog } from "../../domain/ports.js";
import { ConversationTurn } from "../../domain/types.js";

interface ConversationTurnRow {
  query: string;
  answer: string;
  created_at: Date | string;
}

/** Append-only record of every answered turn, used to hydrate sessions after a restart. */
export class PgConversationLog implements ConversationLog {
  private initializing: Promise<void> | null = null;

  constructor(private readonly pool: Pick<Pool, "query">) {}

  initialize(): Promise<void> {
    this.initializing ??= this.createSchema().catch((error: unknown) => {
      this.initializing = null;
      throw error;
    });
    return this.initializing;
  }

  async append(sessionId: string, turn: ConversationTurn): Promise<void> {
    await this.initialize();
    await this.pool.query(
      `
        INSERT INTO conversation_turns (session_id, query, answer, created_at)
        VALUES ($1, $2, $3, $4::timestamptz)
      `,
      [sessionId, turn.query, turn.answer, turn.at],
    );
  }

  /** Returns at most `limit` turns, oldest first. */
  async readRecent(sessionId: string, limit: number): Promise<ConversationTurn[]> {
    await this.initialize();
    if (limit <= 0) {
      return [];
    }

    const result = await this.pool.query<ConversationTurnRow>(
      `
        SELECT query, answer, created_at
        FROM conversation_turns
        WHERE session_id = $1
        ORDER BY id DESC
        LIMIT $2
      `,
      [sessionId, limit],
    );

    return result.rows.reverse().map((row) => ({
      query: row.query,
      answer: row.answer,
      at: new Date(row.created_at).toISOString(),
    }));
  }

  private async createSchema(): Promise<void> {
    await this.pool.query(`
      CREATE TABLE IF NOT EXISTS conversation_turns (
        id BIGSERIAL PRIMARY KEY,
        session_id TEXT NOT NULL,
        query TEXT NOT NULL,
        answer TEXT NOT NULL,
        created_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
      )
    `);
    await this.pool.query(
      `CREATE INDEX IF NOT EXISTS idx_conversation_turns_session ON conversation_turns(session_id, id)`,
    );
  }
}
