import type { NormalizedEvent } from "./types.js";

export function nowTimestamp(): string {
  return new Date().toISOString();
}

export function tokenEvent(token: string): NormalizedEvent {
  return { type: "token", token };
}

export function errorEvent(error: string): NormalizedEvent {
  return { type: "error", error };
}

export function doneEvent(): NormalizedEvent {
  return { type: "done" };
}

/** One line of the streamed-turn wire protocol. */
export function serializeEvent(event: NormalizedEvent): string {
  return JSON.stringify(event);
}
