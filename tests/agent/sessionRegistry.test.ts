import { setTimeout as delay } from "node:timers/promises";
import { describe, expect, it } from "vitest";
import { SessionRegistry } from "../../src/agent/SessionRegistry.js";
import { TurnTimeoutError } from "../../src/errors.js";

describe("SessionRegistry", () => {
  it("stores, resolves and removes sessions per key", () => {
    const registry = new SessionRegistry();
    expect(registry.resolve("project-1")).toBeUndefined();

    registry.commit("project-1", "session-1");
    expect(registry.resolve("project-1")).toEqual({
      conversationKey: "project-1",
      sessionId: "session-1",
      nativeResumeId: null
    });
    expect(registry.size).toBe(1);

    expect(registry.remove("project-1")).toBe(true);
    expect(registry.remove("project-1")).toBe(false);
    expect(registry.resolve("project-1")).toBeUndefined();
  });

  it("keeps the native id of the same session when none is passed", () => {
    const registry = new SessionRegistry();
    registry.commit("project-1", "session-1", "thread-1");
    expect(registry.commit("project-1", "session-1").nativeResumeId).toBe("thread-1");
    expect(registry.commit("project-1", "session-2").nativeResumeId).toBeNull();
  });

  it("lists sessions across keys", () => {
    const registry = new SessionRegistry();
    registry.commit("a", "session-a");
    registry.commit("b", "session-b", "thread-b");
    expect(registry.list().map((session) => session.sessionId)).toEqual(["session-a", "session-b"]);
  });

  it("runs tasks for one key one after another", async () => {
    const registry = new SessionRegistry();
    const order: string[] = [];
    const task = (name: string, ms: number) => async () => {
      order.push(`${name}:start`);
      await delay(ms);
      order.push(`${name}:end`);
      return name;
    };

    const results = await Promise.all([
      registry.withLock("project-1", task("first", 30)),
      registry.withLock("project-1", task("second", 0))
    ]);

    expect(results).toEqual(["first", "second"]);
    expect(order).toEqual(["first:start", "first:end", "second:start", "second:end"]);
  });

  it("lets different keys proceed independently", async () => {
    const registry = new SessionRegistry();
    const order: string[] = [];
    await Promise.all([
      registry.withLock("a", async () => {
        order.push("a:start");
        await delay(30);
        order.push("a:end");
      }),
      registry.withLock("b", async () => {
        order.push("b:start");
      })
    ]);
    expect(order).toEqual(["a:start", "b:start", "a:end"]);
  });

  it("releases the lock when a task fails", async () => {
    const registry = new SessionRegistry();
    await expect(
      registry.withLock("project-1", async () => {
        throw new Error("boom");
      })
    ).rejects.toThrow("boom");
    await expect(registry.withLock("project-1", async () => "next")).resolves.toBe("next");
  });

  it("ignores a second release", async () => {
    const registry = new SessionRegistry();
    const release = await registry.acquire("project-1");
    release();
    release();
    const again = await registry.acquire("project-1");
    again();
  });

  it("gives up waiting after the deadline and keeps the queue moving", async () => {
    const registry = new SessionRegistry();
    const held = await registry.acquire("project-1");

    await expect(registry.acquire("project-1", 20)).rejects.toBeInstanceOf(TurnTimeoutError);

    const order: string[] = [];
    const waiting = registry.withLock(
      "project-1",
      async () => {
        order.push("waiter");
      },
      5_000
    );
    held();
    await waiting;
    expect(order).toEqual(["waiter"]);
  });

  it("acquires within the deadline once the holder releases", async () => {
    const registry = new SessionRegistry();
    const held = await registry.acquire("project-1");
    setTimeout(held, 10);
    const release = await registry.acquire("project-1", 5_000);
    release();
  });
});
