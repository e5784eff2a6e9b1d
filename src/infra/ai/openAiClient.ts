import {
  CompletionModel,
  CompletionOptions,
  EmbeddingModel,
  EmbedRequestOptions,
} from "../../domain/ports.js";
import { assertOk, ModelServiceError } from "./modelServiceError.js";

interface OpenAiClientOptions {
  apiKey: string | null;
  baseUrl: string;
  embeddingModel: string;
  chatModel: string;
}

interface EmbeddingResponse {
  data: Array<{
    embedding: number[];
    index: number;
  }>;
}

interface ChatResponse {
  choices: Array<{
    message: {
      content: string | null;
    };
  }>;
}

export class OpenAiClient {
  constructor(private readonly options: OpenAiClientOptions) {}

  async embedTexts(texts: string[], request: EmbedRequestOptions): Promise<number[][]> {
    if (texts.length === 0) {
      return [];
    }
    const apiKey = this.requireApiKey();

    const response = await fetch(`${this.options.baseUrl}/embeddings`, {
      method: "POST",
      headers: {
        Authorization: `Bearer ${apiKey}`,
        "Content-Type": "application/json",
      },
      body: JSON.stringify({
        model: this.options.embeddingModel,
        input: texts,
      }),
      signal: AbortSignal.timeout(request.timeoutMs),
    });
    await assertOk(response, "OpenAI embeddings");

    const data = (await response.json()) as EmbeddingResponse;
    return [...data.data]
      .sort((a, b) => a.index - b.index)
      .map((item) => item.embedding);
  }

  async complete(prompt: string, options: CompletionOptions): Promise<string> {
    const apiKey = this.requireApiKey();

    const response = await fetch(`${this.options.baseUrl}/chat/completions`, {
      method: "POST",
      headers: {
        Authorization: `Bearer ${apiKey}`,
        "Content-Type": "application/json",
      },
      body: JSON.stringify({
        model: this.options.chatModel,
        temperature: options.temperature,
        max_tokens: options.maxOutputTokens,
        messages: [{ role: "user", content: prompt }],
      }),
      signal: AbortSignal.timeout(options.timeoutMs),
    });
    await assertOk(response, "OpenAI chat");

    const data = (await response.json()) as ChatResponse;
    return data.choices[0]?.message?.content?.trim() ?? "";
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

  private requireApiKey(): string {
    if (!this.options.apiKey) {
      throw new ModelServiceError("OPENAI_API_KEY is required for OpenAI operations.", null, false);
    }
    return this.options.apiKey;
  }
}
