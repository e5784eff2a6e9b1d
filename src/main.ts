import { randomUUID } from "node:crypto";
import readline from "node:readline";
import "dotenv/config";
import { createRagEngine } from "./bootstrap.js";
import { loadConfig } from "./config/env.js";
import { RagRequestError } from "./domain/errors.js";
import { RagOrchestrator } from "./services/ragOrchestrator.js";

async function main() {
  const config = loadConfig();
  const { engine, close } = await createRagEngine(config);
  const sessionId = `cli-${randomUUID()}`;

  let closing: Promise<void> | null = null;
  const shutdown = () => {
    closing ??= close()
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        console.error("[rag] shutdown failed:", error);
        process.exit(1);
      });
    return closing;
  };

  process.on("SIGINT", () => {
    void shutdown();
  });
  process.on("SIGTERM", () => {
    void shutdown();
  });

  console.error(`[rag] ready with ${engine.passageCount()} passages; type a question, :health, :rebuild or :quit`);

  const lines = readline.createInterface({ input: process.stdin, terminal: false });
  for await (const line of lines) {
    const input = line.trim();
    if (!input) {
      continue;
    }
    if (input === ":quit") {
      break;
    }
    await handleLine(engine, sessionId, input);
  }

  await shutdown();
}

async function handleLine(engine: RagOrchestrator, sessionId: string, input: string): Promise<void> {
  try {
    if (input === ":health") {
      process.stdout.write(`${JSON.stringify(await engine.health(), null, 2)}\n`);
      return;
    }
    if (input === ":rebuild") {
      process.stdout.write(`${JSON.stringify(await engine.rebuildIndex(), null, 2)}\n`);
      return;
    }

    const result = await engine.ask(sessionId, input);
    process.stdout.write(`${result.answer}\n`);
    if (result.cited_source_ids.length > 0) {
      process.stdout.write(`Sources: ${result.cited_source_ids.join(", ")}\n`);
    }
  } catch (error) {
    if (error instanceof RagRequestError) {
      console.error(`[rag] ${error.kind}${error.retryable ? " (retryable)" : ""}: ${error.message}`);
      return;
    }
    throw error;
  }
}

main().catch((error) => {
  console.error("[rag] failed to start:", error);
  process.exit(1);
});
