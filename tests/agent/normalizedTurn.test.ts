import { describe, expect, it } from "vitest";
import { ClaudeStreamDecoder } from "../../src/adapters/ClaudeAdapter.js";
import { CodexStreamDecoder } from "../../src/adapters/CodexAdapter.js";
import { NormalizedTurn, STREAM_TIMEOUT_MESSAGE } from "../../src/agent/NormalizedTurn.js";
import type { ProcessSignal } from "../../src/process/executor.js";
import { assistantLine, collect, exit, line } from "../helpers/fakes.js";

async function* replay(signals: ProcessSignal[], failure?: Error): AsyncGenerator<ProcessSignal> {
  for (const signal of signals) yield signal;
  if (failure) throw failure;
}

describe("NormalizedTurn", () => {
  it("emits tokens in read order and ends with done", async () => {
    const turn = new NormalizedTurn(
      replay([assistantLine("Recursion "), assistantLine("is self-reference."), exit(0)]),
      new ClaudeStreamDecoder()
    );
    expect(await collect(turn)).toEqual([
      { type: "token", token: "Recursion " },
      { type: "token", token: "is self-reference." },
      { type: "done" }
    ]);
    expect(turn.succeeded).toBe(true);
    expect(turn.text).toBe("Recursion is self-reference.");
  });

  it("turns a non-zero exit with stderr into an error before done", async () => {
    const turn = new NormalizedTurn(replay([exit(1, "rate limited")]), new ClaudeStreamDecoder());
    expect(await collect(turn)).toEqual([{ type: "error", error: "rate limited" }, { type: "done" }]);
    expect(turn.succeeded).toBe(false);
  });

  it("stays quiet about a non-zero exit without stderr but does not succeed", async () => {
    const turn = new NormalizedTurn(replay([exit(2, "")]), new ClaudeStreamDecoder());
    expect(await collect(turn)).toEqual([{ type: "done" }]);
    expect(turn.succeeded).toBe(false);
  });

  it("reports a read timeout after the tokens already seen", async () => {
    const turn = new NormalizedTurn(
      replay([assistantLine("partial"), { kind: "timeout", timeoutMs: 1000 }]),
      new ClaudeStreamDecoder()
    );
    expect(await collect(turn)).toEqual([
      { type: "token", token: "partial" },
      { type: "error", error: STREAM_TIMEOUT_MESSAGE },
      { type: "done" }
    ]);
    expect(turn.succeeded).toBe(false);
  });

  it("converts a failing signal source into an error event", async () => {
    const turn = new NormalizedTurn(replay([assistantLine("Hi")], new Error("pipe closed")), new ClaudeStreamDecoder());
    expect(await collect(turn)).toEqual([
      { type: "token", token: "Hi" },
      { type: "error", error: "pipe closed" },
      { type: "done" }
    ]);
    expect(turn.succeeded).toBe(false);
  });

  it("passes backend error events on without failing a clean exit", async () => {
    const turn = new NormalizedTurn(
      replay([
        line({ type: "error", message: "Reconnecting..." }),
        line({ type: "item.completed", item: { type: "agent_message", text: "Answer" } }),
        exit(0)
      ]),
      new CodexStreamDecoder()
    );
    expect(await collect(turn)).toEqual([
      { type: "error", error: "Reconnecting..." },
      { type: "token", token: "Answer" },
      { type: "done" }
    ]);
    expect(turn.succeeded).toBe(true);
  });

  it("does not succeed when reading fails after a clean exit", async () => {
    const turn = new NormalizedTurn(replay([exit(0)], new Error("pipe closed")), new ClaudeStreamDecoder());
    await collect(turn);
    expect(turn.succeeded).toBe(false);
  });

  it("exposes the thread id learned while decoding", async () => {
    const turn = new NormalizedTurn(
      replay([
        line({ type: "thread.started", thread_id: "thread-1" }),
        line({ type: "item.completed", item: { type: "agent_message", text: "Hi" } }),
        exit(0)
      ]),
      new CodexStreamDecoder()
    );
    await collect(turn);
    expect(turn.nativeResumeId).toBe("thread-1");
    expect(turn.succeeded).toBe(true);
  });

  it("does not succeed when the signals stop without an exit", async () => {
    const turn = new NormalizedTurn(replay([assistantLine("Hi")]), new ClaudeStreamDecoder());
    expect((await collect(turn)).at(-1)).toEqual({ type: "done" });
    expect(turn.succeeded).toBe(false);
  });
});
