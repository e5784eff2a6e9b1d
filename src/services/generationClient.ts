import {
  describeError,
  GenerationFatalError,
  GenerationUnavailableError,
} from "../domain/errors.js";
import { CompletionModel } from "../domain/ports.js";
import { isTransientFailure, ModelServiceError } from "../infra/ai/modelServiceError.js";
import { AttemptOutcome, runWithRetry, Sleep } from "../utils/retry.js";

export interface GenerationClientOptions {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  timeoutMs: number;
  maxOutputTokens: number;
  temperature: number;
  sleep?: Sleep;
}

export class GenerationClient {
  constructor(
    private readonly model: CompletionModel,
    private readonly options: GenerationClientOptions,
  ) {}

  async generate(prompt: string): Promise<string> {
    const result = await runWithRetry(
      (attempt) => this.attempt(prompt, attempt),
      {
        maxAttempts: this.options.maxAttempts,
        baseDelayMs: this.options.baseDelayMs,
        maxDelayMs: this.options.maxDelayMs,
      },
      {
        sleep: this.options.sleep,
        onRetry: (attempt, delayMs, error) => {
          console.error(
            `[rag] generation attempt ${attempt} with ${this.model.modelName} failed, retrying in ${delayMs}ms: ${describeError(error)}`,
          );
        },
      },
    );

    if (result.ok) {
      return result.value;
    }
    if (result.reason === "fatal") {
      throw new GenerationFatalError(
        `Generation with ${this.model.modelName} failed: ${describeError(result.error)}`,
        { cause: result.error },
      );
    }
    throw new GenerationUnavailableError(
      `Generation with ${this.model.modelName} unavailable after ${result.attempts} attempts: ${describeError(result.error)}`,
      result.attempts,
      { cause: result.error },
    );
  }

  private async attempt(prompt: string, attempt: number): Promise<AttemptOutcome<string>> {
    try {
      const answer = await this.model.complete(prompt, {
        maxOutputTokens: this.options.maxOutputTokens,
        temperature: this.options.temperature,
        timeoutMs: this.options.timeoutMs,
      });
      if (!answer.trim()) {
        return {
          kind: "retryable",
          error: new ModelServiceError(`Empty completion on attempt ${attempt}.`, null, true),
        };
      }
      return { kind: "success", value: answer.trim() };
    } catch (error) {
      return isTransientFailure(error)
        ? { kind: "retryable", error }
        : { kind: "fatal", error };
    }
  }
}
