import { ConversationLogError, describeError } from "../domain/errors.js";
import { ConversationLog } from "../domain/ports.js";
import { ConversationTurn } from "../domain/types.js";
import { KeyedMutex } from "../utils/locks.js";

/** Bounded, chronological window of one session's turns. Eviction is by turn count. */
export class ConversationMemory {
  private readonly turns: ConversationTurn[] = [];

  constructor(
    readonly sessionId: string,
    private readonly turnLimit: number,
    initialTurns: ConversationTurn[] = [],
  ) {
    for (const turn of initialTurns) {
      this.append(turn);
    }
  }

  history(): readonly ConversationTurn[] {
    return [...this.turns];
  }

  get length(): number {
    return this.turns.length;
  }

  append(turn: ConversationTurn): void {
    this.turns.push(turn);
    while (this.turns.length > this.turnLimit) {
      this.turns.shift();
    }
  }
}

export interface ConversationMemoryStoreOptions {
  turnLimit: number;
  log?: ConversationLog | null;
}

/**
 * Sessions keyed by id. Work on one session is serialized, so turns land in
 * the order their generations complete; sessions never block each other.
 */
export class ConversationMemoryStore {
  private readonly sessions = new Map<string, ConversationMemory>();

  private readonly mutex = new KeyedMutex();

  constructor(private readonly options: ConversationMemoryStoreOptions) {}

  runExclusive<T>(sessionId: string, task: (memory: ConversationMemory) => Promise<T>): Promise<T> {
    return this.mutex.run(sessionId, async () => task(await this.getOrCreate(sessionId)));
  }

  /** Writes the turn to the log first; memory only keeps turns the log accepted. */
  async record(memory: ConversationMemory, turn: ConversationTurn): Promise<void> {
    if (this.options.log) {
      try {
        await this.options.log.append(memory.sessionId, turn);
      } catch (error) {
        throw new ConversationLogError(
          `Conversation log append failed for session ${memory.sessionId}: ${describeError(error)}`,
          { cause: error },
        );
      }
    }
    memory.append(turn);
  }

  has(sessionId: string): boolean {
    return this.sessions.has(sessionId);
  }

  end(sessionId: string): boolean {
    return this.sessions.delete(sessionId);
  }

  get sessionCount(): number {
    return this.sessions.size;
  }

  private async getOrCreate(sessionId: string): Promise<ConversationMemory> {
    const existing = this.sessions.get(sessionId);
    if (existing) {
      return existing;
    }

    const restored = await this.restore(sessionId);
    const memory = new ConversationMemory(sessionId, this.options.turnLimit, restored);
    this.sessions.set(sessionId, memory);
    return memory;
  }

  private async restore(sessionId: string): Promise<ConversationTurn[]> {
    if (!this.options.log) {
      return [];
    }
    try {
      return await this.options.log.readRecent(sessionId, this.options.turnLimit);
    } catch (error) {
      throw new ConversationLogError(
        `Conversation log read failed for session ${sessionId}: ${describeError(error)}`,
        { cause: error },
      );
    }
  }
}
