import { describe, expect, it, vi } from "vitest";
import { GenerationFatalError, GenerationUnavailableError } from "../src/domain/errors.js";
import { ModelServiceError } from "../src/infra/ai/modelServiceError.js";
import { GenerationClient, GenerationClientOptions } from "../src/services/generationClient.js";
import { ScriptedCompletionModel } from "./helpers/fakes.js";

function createOptions(sleep: (ms: number) => Promise<void>): GenerationClientOptions {
  return {
    maxAttempts: 3,
    baseDelayMs: 100,
    maxDelayMs: 150,
    timeoutMs: 5_000,
    maxOutputTokens: 256,
    temperature: 0.2,
    sleep,
  };
}

describe("GenerationClient", () => {
  it("retries transient failures and returns the first answer", async () => {
    const sleep = vi.fn(async (_ms: number) => {});
    const model = new ScriptedCompletionModel([
      new ModelServiceError("overloaded", 503, true),
      new ModelServiceError("rate limited", 429, true),
      "  The sky is blue.  ",
    ]);
    const client = new GenerationClient(model, createOptions(sleep));

    await expect(client.generate("prompt")).resolves.toBe("The sky is blue.");
    expect(model.prompts).toEqual(["prompt", "prompt", "prompt"]);
    expect(sleep.mock.calls).toEqual([[100], [150]]);
    expect(model.options[0]).toEqual({ maxOutputTokens: 256, temperature: 0.2, timeoutMs: 5_000 });
  });

  it("gives up after the configured attempts", async () => {
    const sleep = vi.fn(async (_ms: number) => {});
    const model = new ScriptedCompletionModel([new ModelServiceError("unavailable", 503, true)]);
    const client = new GenerationClient(model, createOptions(sleep));

    const error = await client.generate("prompt").catch((reason: unknown) => reason);
    expect(error).toBeInstanceOf(GenerationUnavailableError);
    expect(error).toMatchObject({ attempts: 3, retryable: true });
    expect(model.prompts).toHaveLength(3);
    expect(sleep).toHaveBeenCalledTimes(2);
  });

  it("does not retry a fatal failure", async () => {
    const sleep = vi.fn(async (_ms: number) => {});
    const model = new ScriptedCompletionModel([new ModelServiceError("bad key", 401, false), "unused"]);
    const client = new GenerationClient(model, createOptions(sleep));

    await expect(client.generate("prompt")).rejects.toThrow(GenerationFatalError);
    expect(model.prompts).toHaveLength(1);
    expect(sleep).not.toHaveBeenCalled();
  });

  it("treats network errors as transient", async () => {
    const sleep = vi.fn(async (_ms: number) => {});
    const model = new ScriptedCompletionModel([new TypeError("fetch failed"), "Recovered."]);
    const client = new GenerationClient(model, createOptions(sleep));

    await expect(client.generate("prompt")).resolves.toBe("Recovered.");
    expect(sleep).toHaveBeenCalledTimes(1);
  });

  it("retries an empty completion", async () => {
    const model = new ScriptedCompletionModel(["   ", "Second try."]);
    const client = new GenerationClient(model, createOptions(async () => {}));

    await expect(client.generate("prompt")).resolves.toBe("Second try.");
    expect(model.prompts).toHaveLength(2);
  });
});
