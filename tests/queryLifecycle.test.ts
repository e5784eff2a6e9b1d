import { describe, expect, it } from "vitest";
import { QueryLifecycle, QueryStateEvent } from "../src/services/queryLifecycle.js";

describe("QueryLifecycle", () => {
  it("reports every transition of a generated answer", () => {
    const events: QueryStateEvent[] = [];
    const lifecycle = new QueryLifecycle("s1", (event) => events.push(event));

    for (const state of ["EMBEDDING", "RETRIEVING", "ASSEMBLING", "GENERATING", "ANSWERED"] as const) {
      lifecycle.advance(state);
    }

    expect(events.map((event) => [event.previous, event.state])).toEqual([
      [null, "RECEIVED"],
      ["RECEIVED", "EMBEDDING"],
      ["EMBEDDING", "RETRIEVING"],
      ["RETRIEVING", "ASSEMBLING"],
      ["ASSEMBLING", "GENERATING"],
      ["GENERATING", "ANSWERED"],
    ]);
    expect(lifecycle.terminal).toBe(true);
  });

  it("answers straight from assembly when generation is skipped", () => {
    const lifecycle = new QueryLifecycle("s1");
    lifecycle.advance("EMBEDDING");
    lifecycle.advance("RETRIEVING");
    lifecycle.advance("ASSEMBLING");
    lifecycle.advance("ANSWERED");

    expect(lifecycle.state).toBe("ANSWERED");
  });

  it("rejects skipped states", () => {
    const lifecycle = new QueryLifecycle("s1");
    expect(() => lifecycle.advance("GENERATING")).toThrow("Illegal query state transition RECEIVED -> GENERATING.");
  });

  it("fails from any non-terminal state and stays put once terminal", () => {
    const lifecycle = new QueryLifecycle("s1");
    lifecycle.advance("EMBEDDING");
    lifecycle.fail();
    expect(lifecycle.state).toBe("ERRORED");

    lifecycle.fail();
    expect(lifecycle.state).toBe("ERRORED");
    expect(() => lifecycle.advance("RETRIEVING")).toThrow();
  });
});
