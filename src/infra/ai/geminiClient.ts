import {
  GoogleGenerativeAI,
  GoogleGenerativeAIError,
  GoogleGenerativeAIFetchError,
} from "@google/generative-ai";
import { CompletionModel, CompletionOptions } from "../../domain/ports.js";
import { isTransientFailure, isTransientStatus, ModelServiceError } from "./modelServiceError.js";

interface GeminiClientOptions {
  apiKey: string;
  model: string;
}

export class GeminiClient implements CompletionModel {
  private readonly genAI: GoogleGenerativeAI;

  constructor(private readonly options: GeminiClientOptions) {
    this.genAI = new GoogleGenerativeAI(options.apiKey);
  }

  get modelName(): string {
    return this.options.model;
  }

  async complete(prompt: string, options: CompletionOptions): Promise<string> {
    const model = this.genAI.getGenerativeModel(
      {
        model: this.options.model,
        generationConfig: {
          maxOutputTokens: options.maxOutputTokens,
          temperature: options.temperature,
        },
      },
      { timeout: options.timeoutMs },
    );

    try {
      const result = await model.generateContent(prompt);
      return result.response.text().trim();
    } catch (error) {
      throw toModelServiceError(error);
    }
  }
}

function toModelServiceError(error: unknown): ModelServiceError {
  const status = readStatus(error);
  const message = error instanceof Error ? error.message : "unknown error";
  const transient =
    status !== null ? isTransientStatus(status) : isFetchLayerFailure(error) || isTransientFailure(error);
  return new ModelServiceError(`Gemini generation failed: ${message}`, status, transient, {
    cause: error,
  });
}

function readStatus(error: unknown): number | null {
  if (!error || typeof error !== "object" || !("status" in error)) {
    return null;
  }
  return typeof error.status === "number" ? error.status : null;
}

// The SDK rewraps timeouts and network failures thrown by fetch without a status.
function isFetchLayerFailure(error: unknown): boolean {
  return (
    error instanceof GoogleGenerativeAIError &&
    !(error instanceof GoogleGenerativeAIFetchError) &&
    error.message.includes("Error fetching from")
  );
}
