import { describe, expect, it } from "vitest";
import { ConversationLogError } from "../src/domain/errors.js";
import { ConversationTurn } from "../src/domain/types.js";
import { ConversationMemory, ConversationMemoryStore } from "../src/services/conversationMemory.js";
import { createDeferred, InMemoryConversationLog } from "./helpers/fakes.js";

function turn(n: number): ConversationTurn {
  return { query: `question ${n}`, answer: `answer ${n}`, at: `2026-03-0${n}T12:00:00.000Z` };
}

describe("ConversationMemory", () => {
  it("evicts the oldest turns beyond the limit", () => {
    const memory = new ConversationMemory("s1", 2);
    memory.append(turn(1));
    memory.append(turn(2));
    memory.append(turn(3));

    expect(memory.length).toBe(2);
    expect(memory.history()).toEqual([turn(2), turn(3)]);
  });

  it("hands out copies of its history", () => {
    const memory = new ConversationMemory("s1", 3, [turn(1)]);
    const history = memory.history();
    memory.append(turn(2));

    expect(history).toEqual([turn(1)]);
  });
});

describe("ConversationMemoryStore", () => {
  it("serializes work per session and lets other sessions through", async () => {
    const store = new ConversationMemoryStore({ turnLimit: 5 });
    const gate = createDeferred<void>();
    const order: string[] = [];

    const first = store.runExclusive("alpha", async (memory) => {
      await gate.promise;
      await store.record(memory, turn(1));
      order.push("alpha-1");
    });
    const second = store.runExclusive("alpha", async (memory) => {
      await store.record(memory, turn(2));
      order.push("alpha-2");
      return memory.history();
    });
    const other = store.runExclusive("beta", async () => {
      order.push("beta");
    });

    await other;
    expect(order).toEqual(["beta"]);

    gate.resolve();
    await first;
    const history = await second;

    expect(order).toEqual(["beta", "alpha-1", "alpha-2"]);
    expect(history).toEqual([turn(1), turn(2)]);
  });

  it("hydrates a new session from the conversation log", async () => {
    const log = new InMemoryConversationLog();
    for (const n of [1, 2, 3]) {
      await log.append("s1", turn(n));
    }
    const store = new ConversationMemoryStore({ turnLimit: 2, log });

    const history = await store.runExclusive("s1", async (memory) => memory.history());
    expect(history).toEqual([turn(2), turn(3)]);
  });

  it("appends recorded turns to the log", async () => {
    const log = new InMemoryConversationLog();
    const store = new ConversationMemoryStore({ turnLimit: 2, log });

    await store.runExclusive("s1", (memory) => store.record(memory, turn(1)));
    expect(log.turns.get("s1")).toEqual([turn(1)]);
  });

  it("reports a failing log append as a conversation log error", async () => {
    const log = new InMemoryConversationLog();
    log.failAppend = new Error("connection refused");
    const store = new ConversationMemoryStore({ turnLimit: 2, log });

    await expect(
      store.runExclusive("s1", (memory) => store.record(memory, turn(1))),
    ).rejects.toThrow(ConversationLogError);

    const history = await store.runExclusive("s1", async (memory) => memory.history());
    expect(history).toEqual([]);
  });

  it("forgets an ended session", async () => {
    const store = new ConversationMemoryStore({ turnLimit: 2 });
    await store.runExclusive("s1", (memory) => store.record(memory, turn(1)));

    expect(store.has("s1")).toBe(true);
    expect(store.end("s1")).toBe(true);
    expect(store.sessionCount).toBe(0);

    const history = await store.runExclusive("s1", async (memory) => memory.history());
    expect(history).toEqual([]);
  });
});
