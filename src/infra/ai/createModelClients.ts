import { AppConfig } from "../../config/env.js";
import { CompletionModel, EmbeddingModel } from "../../domain/ports.js";
import { GeminiClient } from "./geminiClient.js";
import { OllamaClient } from "./ollamaClient.js";
import { OpenAiClient } from "./openAiClient.js";

export interface ModelClients {
  embeddingModel: EmbeddingModel;
  completionModel: CompletionModel;
}

export function createModelClients(config: AppConfig): ModelClients {
  const openAi = new OpenAiClient({
    apiKey: config.openaiApiKey,
    baseUrl: config.openaiBaseUrl,
    embeddingModel: config.openaiEmbeddingModel,
    chatModel: config.openaiChatModel,
  });
  const ollama = new OllamaClient({
    baseUrl: config.ollamaBaseUrl,
    chatModel: config.ollamaChatModel,
    embeddingModel: config.ollamaEmbeddingModel,
  });

  const embeddingModel =
    config.embeddingProvider === "openai" ? openAi.embeddingModel() : ollama.embeddingModel();

  return {
    embeddingModel,
    completionModel: selectCompletionModel(config, openAi, ollama),
  };
}

function selectCompletionModel(
  config: AppConfig,
  openAi: OpenAiClient,
  ollama: OllamaClient,
): CompletionModel {
  if (config.generationProvider === "gemini") {
    if (!config.geminiApiKey) {
      throw new Error("GEMINI_API_KEY is required for Gemini generation.");
    }
    return new GeminiClient({ apiKey: config.geminiApiKey, model: config.geminiModel });
  }
  if (config.generationProvider === "openai") {
    return openAi.completionModel();
  }
  return ollama.completionModel();
}
