export type QueryState =
  | "RECEIVED"
  | "EMBEDDING"
  | "RETRIEVING"
  | "ASSEMBLING"
  | "GENERATING"
  | "ANSWERED"
  | "ERRORED";

export interface QueryStateEvent {
  sessionId: string;
  state: QueryState;
  previous: QueryState | null;
  at: number;
}

export type QueryStateListener = (event: QueryStateEvent) => void;

const TRANSITIONS: Record<QueryState, readonly QueryState[]> = {
  RECEIVED: ["EMBEDDING", "ERRORED"],
  EMBEDDING: ["RETRIEVING", "ERRORED"],
  RETRIEVING: ["ASSEMBLING", "ERRORED"],
  ASSEMBLING: ["GENERATING", "ANSWERED", "ERRORED"],
  GENERATING: ["ANSWERED", "ERRORED"],
  ANSWERED: [],
  ERRORED: [],
};

/** Tracks one `ask` call through its states and reports each transition. */
export class QueryLifecycle {
  private current: QueryState = "RECEIVED";

  constructor(
    private readonly sessionId: string,
    private readonly listener?: QueryStateListener,
  ) {
    this.emit(null);
  }

  get state(): QueryState {
    return this.current;
  }

  get terminal(): boolean {
    return TRANSITIONS[this.current].length === 0;
  }

  advance(next: QueryState): void {
    if (!TRANSITIONS[this.current].includes(next)) {
      throw new Error(`Illegal query state transition ${this.current} -> ${next}.`);
    }
    const previous = this.current;
    this.current = next;
    this.emit(previous);
  }

  fail(): void {
    if (!this.terminal) {
      this.advance("ERRORED");
    }
  }

  private emit(previous: QueryState | null): void {
    this.listener?.({
      sessionId: this.sessionId,
      state: this.current,
      previous,
      at: Date.now(),
    });
  }
}
