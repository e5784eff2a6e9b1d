import { BudgetUnit } from "../config/env.js";

// Rough average for BPE tokenizers on English prose.
const CHARS_PER_TOKEN = 4;

export function normalizeText(text: string): string {
  return text.replace(/\r\n/g, "\n").replace(/\t/g, " ").trim();
}

export function estimateTokens(text: string): number {
  if (!text) {
    return 0;
  }
  return Math.ceil(text.length / CHARS_PER_TOKEN);
}

export type TextMeasure = (text: string) => number;

export function createTextMeasure(unit: BudgetUnit): TextMeasure {
  return unit === "chars" ? (text) => text.length : estimateTokens;
}
