import type { LineDecoder } from "../adapters/types.js";
import { decodeJsonLine } from "../adapters/jsonl.js";
import { errorMessage } from "../errors.js";
import { doneEvent, errorEvent } from "../events.js";
import type { ProcessSignal } from "../process/executor.js";
import type { NormalizedEvent } from "../types.js";

export const STREAM_TIMEOUT_MESSAGE = "Stream timeout";

/**
 * One streamed turn in the canonical protocol: tokens and errors in read
 * order, always closed by a single `done`. Iterate it once.
 */
export class NormalizedTurn implements AsyncIterable<NormalizedEvent> {
  private readonly tokens: string[] = [];
  private broken = false;
  private exitCode: number | null = null;
  private completed = false;

  constructor(
    private readonly signals: AsyncIterable<ProcessSignal>,
    private readonly decoder: LineDecoder
  ) {}

  /**
   * Exit 0 with no timeout and no failure reading the process. Error events
   * the backend prints itself are passed on but do not fail the turn.
   */
  get succeeded(): boolean {
    return this.completed && !this.broken && this.exitCode === 0;
  }

  get text(): string {
    return this.tokens.join("");
  }

  get nativeResumeId(): string | null {
    return this.decoder.nativeResumeId;
  }

  async *[Symbol.asyncIterator](): AsyncGenerator<NormalizedEvent> {
    try {
      for await (const signal of this.signals) {
        for (const event of this.handle(signal)) {
          if (event.type === "token") this.tokens.push(event.token);
          yield event;
        }
      }
    } catch (error) {
      this.broken = true;
      yield errorEvent(errorMessage(error));
    }
    yield doneEvent();
  }

  private handle(signal: ProcessSignal): NormalizedEvent[] {
    switch (signal.kind) {
      case "line":
        return this.decoder.decode(decodeJsonLine(signal.line));
      case "timeout":
        return [errorEvent(STREAM_TIMEOUT_MESSAGE)];
      case "exit":
        this.exitCode = signal.exitCode;
        this.completed = true;
        return signal.exitCode !== 0 && signal.stderr ? [errorEvent(signal.stderr)] : [];
    }
  }
}
