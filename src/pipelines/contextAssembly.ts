import { BudgetExceededError } from "../domain/errors.js";
import { ConversationTurn, RetrievalHit, RetrievalResult } from "../domain/types.js";
import { TextMeasure } from "../utils/text.js";

export const SEGMENT_SEPARATOR = "\n\n";
export const CONTEXT_HEADING = "Context:";
export const HISTORY_HEADING = "Conversation so far:";

export interface ContextAssemblerOptions {
  budget: number;
  historyBudget: number;
  systemPrompt: string;
  measure: TextMeasure;
}

export interface AssembledContext {
  prompt: string;
  passages: RetrievalHit[];
  citedSourceIds: string[];
  turns: ConversationTurn[];
  cost: number;
}

class BudgetLedger {
  private spentSoFar = 0;

  constructor(private readonly limit: number) {}

  get remaining(): number {
    return Math.max(0, this.limit - this.spentSoFar);
  }

  get spent(): number {
    return this.spentSoFar;
  }

  charge(cost: number): void {
    if (cost > this.remaining) {
      throw new BudgetExceededError(cost, this.remaining);
    }
    this.spentSoFar += cost;
  }
}

/**
 * Builds the generation prompt. The instruction header and the question are
 * always present; history is kept newest-first inside its own sub-budget and
 * passages fill what remains in relevance order, whole or not at all.
 */
export class ContextAssembler {
  constructor(private readonly options: ContextAssemblerOptions) {}

  assemble(
    retrieval: RetrievalResult,
    history: readonly ConversationTurn[],
    query: string,
    budget: number = this.options.budget,
  ): AssembledContext {
    const header = this.options.systemPrompt.trim();
    const question = formatQuestion(query);
    const fixedCost = (header ? this.cost(header) : 0) + this.cost(question);
    const ledger = new BudgetLedger(budget - fixedCost);

    const turns = this.selectTurns(history, Math.min(this.options.historyBudget, ledger.remaining));
    ledger.charge(turns.cost);

    const passages: RetrievalHit[] = [];
    for (const hit of retrieval) {
      const heading = passages.length === 0 ? this.cost(CONTEXT_HEADING) : 0;
      if (!tryCharge(ledger, heading + this.cost(formatPassage(hit)))) {
        continue;
      }
      passages.push(hit);
    }

    const segments: string[] = [];
    if (header) {
      segments.push(header);
    }
    if (passages.length > 0) {
      segments.push(CONTEXT_HEADING, ...passages.map(formatPassage));
    }
    if (turns.selected.length > 0) {
      segments.push(HISTORY_HEADING, ...turns.selected.map(formatTurn));
    }
    segments.push(question);

    return {
      prompt: segments.join(SEGMENT_SEPARATOR),
      passages,
      citedSourceIds: [...new Set(passages.map((hit) => hit.passage.sourceId))],
      turns: turns.selected,
      cost: fixedCost + ledger.spent,
    };
  }

  private selectTurns(
    history: readonly ConversationTurn[],
    limit: number,
  ): { selected: ConversationTurn[]; cost: number } {
    const ledger = new BudgetLedger(limit);
    const newestFirst: ConversationTurn[] = [];

    for (let i = history.length - 1; i >= 0; i -= 1) {
      const heading = newestFirst.length === 0 ? this.cost(HISTORY_HEADING) : 0;
      if (!tryCharge(ledger, heading + this.cost(formatTurn(history[i])))) {
        break;
      }
      newestFirst.push(history[i]);
    }

    return { selected: newestFirst.reverse(), cost: ledger.spent };
  }

  private cost(segment: string): number {
    return this.options.measure(`${segment}${SEGMENT_SEPARATOR}`);
  }
}

function tryCharge(ledger: BudgetLedger, cost: number): boolean {
  try {
    ledger.charge(cost);
    return true;
  } catch (error) {
    if (error instanceof BudgetExceededError) {
      return false;
    }
    throw error;
  }
}

export function formatPassage(hit: RetrievalHit): string {
  return `[source: ${hit.passage.sourceId}]\n${hit.passage.text}`;
}

export function formatTurn(turn: ConversationTurn): string {
  return `User: ${turn.query}\nAssistant: ${turn.answer}`;
}

export function formatQuestion(query: string): string {
  return `Question: ${query}`;
}
