import { TurnTimeoutError } from "../errors.js";
import type { LogicalSession } from "../types.js";

export type Release = () => void;

/**
 * In-memory map from conversation key to session identity, with a
 * per-key lock so turns on one conversation run one after another.
 */
export class SessionRegistry {
  private readonly sessions = new Map<string, LogicalSession>();
  private readonly locks = new Map<string, Promise<void>>();

  get size(): number {
    return this.sessions.size;
  }

  resolve(conversationKey: string): LogicalSession | undefined {
    return this.sessions.get(conversationKey);
  }

  /** Keeps a previously learned native id when none is passed. */
  commit(conversationKey: string, sessionId: string, nativeResumeId?: string | null): LogicalSession {
    const existing = this.sessions.get(conversationKey);
    const session: LogicalSession = {
      conversationKey,
      sessionId,
      nativeResumeId:
        nativeResumeId ?? (existing?.sessionId === sessionId ? existing.nativeResumeId : null)
    };
    this.sessions.set(conversationKey, session);
    return session;
  }

  /** Returns whether a session was removed; removing an unknown key is fine. */
  remove(conversationKey: string): boolean {
    return this.sessions.delete(conversationKey);
  }

  list(): LogicalSession[] {
    return [...this.sessions.values()];
  }

  /**
   * Waits for earlier holders of the same key; call the returned function
   * exactly once. With `waitMs`, gives up with a TurnTimeoutError when the
   * key is still held after that long, so a holder that never releases
   * cannot block the key forever.
   */
  async acquire(conversationKey: string, waitMs?: number): Promise<Release> {
    const previous = this.locks.get(conversationKey) ?? Promise.resolve();
    let unlock: () => void = () => undefined;
    const current = new Promise<void>((resolve) => {
      unlock = resolve;
    });
    const tail = previous.then(() => current);
    this.locks.set(conversationKey, tail);

    let released = false;
    const release = () => {
      if (released) return;
      released = true;
      unlock();
      if (this.locks.get(conversationKey) === tail) this.locks.delete(conversationKey);
    };

    if (waitMs === undefined) {
      await previous;
      return release;
    }

    let timer: NodeJS.Timeout | undefined;
    const gaveUp = new Promise<true>((resolve) => {
      timer = setTimeout(() => resolve(true), waitMs);
    });
    try {
      const timedOut = await Promise.race([previous.then(() => false), gaveUp]);
      if (!timedOut) return release;
    } finally {
      clearTimeout(timer);
    }
    // Keep the queue moving: this slot is handed straight on once it comes up.
    void previous.then(release);
    throw new TurnTimeoutError(waitMs, `lock on ${conversationKey}`);
  }

  async withLock<T>(conversationKey: string, task: () => Promise<T>, waitMs?: number): Promise<T> {
    const release = await this.acquire(conversationKey, waitMs);
    try {
      return await task();
    } finally {
      release();
    }
  }
}
