import {
  CompletionModel,
  CompletionOptions,
  EmbeddingModel,
  EmbedRequestOptions,
} from "../../domain/ports.js";
import { assertOk, ModelServiceError } from "./modelServiceError.js";

interface OllamaClientOptions {
  baseUrl: string;
  chatModel: string;
  embeddingModel: string;
}

interface OllamaEmbeddingsResponse {
  embedding?: number[];
}

interface OllamaChatResponse {
  message?: {
    content?: string;
  };
}

const EMBEDDING_CONCURRENCY = 4;

export class OllamaClient {
  constructor(private readonly options: OllamaClientOptions) {}

  async embedTexts(texts: string[], request: EmbedRequestOptions): Promise<number[][]> {
    if (texts.length === 0) {
      return [];
    }

    const workers = Math.min(EMBEDDING_CONCURRENCY, texts.length);
    const embeddings: number[][] = new Array(texts.length);
    let cursor = 0;

    const runWorker = async () => {
      while (true) {
        const index = cursor;
        cursor += 1;
        if (index >= texts.length) {
          return;
        }
        embeddings[index] = await this.embedQuery(texts[index], request);
      }
    };

    await Promise.all(Array.from({ length: workers }, () => runWorker()));
    return embeddings;
  }

  async embedQuery(query: string, request: EmbedRequestOptions): Promise<number[]> {
    const response = await fetch(`${this.options.baseUrl}/api/embeddings`, {
      method: "POST",
      headers: {
        "Content-Type": "application/json",
      },
      body: JSON.stringify({
        model: this.options.embeddingModel,
        prompt: query,
      }),
      signal: AbortSignal.timeout(request.timeoutMs),
    });
    await assertOk(response, "Ollama embeddings");

    const data = (await response.json()) as OllamaEmbeddingsResponse;
    if (!data.embedding || data.embedding.length === 0) {
      throw new ModelServiceError("Ollama embeddings returned empty vector.", response.status, true);
    }
    return data.embedding;
  }

  async complete(prompt: string, options: CompletionOptions): Promise<string> {
    const response = await fetch(`${this.options.baseUrl}/api/chat`, {
      method: "POST",
      headers: {
        "Content-Type": "application/json",
      },
      body: JSON.stringify({
        model: this.options.chatModel,
        stream: false,
        keep_alive: "30m",
        options: {
          temperature: options.temperature,
          num_predict: options.maxOutputTokens,
        },
        messages: [{ role: "user", content: prompt }],
      }),
      signal: AbortSignal.timeout(options.timeoutMs),
    });
    await assertOk(response, "Ollama chat");

    const data = (await response.json()) as OllamaChatResponse;
    return data.message?.content?.trim() ?? "";
  }

  embeddingModel(): EmbeddingModel {
    return {
      modelName: this.options.embeddingModel,
      embedTexts: (texts, request) => this.embedTexts(texts, request),
    };
  }

  completionModel(): CompletionModel {
    return {
      modelName: this.options.chatModel,
      complete: (prompt, options) => this.complete(prompt, options),
    };
  }
}
