import { z } from "zod";
import { ConfigurationError } from "../errors.js";
import { errorEvent, tokenEvent } from "../events.js";
import type { NormalizedEvent, OutputMode } from "../types.js";
import type {
  AdapterOptions,
  AgentAdapter,
  BufferedOutput,
  CommandTurn,
  LineDecoder,
  ProcessCommand,
  SandboxOptions
} from "./types.js";
import type { DecodedLine } from "./jsonl.js";
import { decodeJsonLine } from "./jsonl.js";

export const TURN_FAILED_MESSAGE = "Codex turn failed";

const threadStartedSchema = z.object({ thread_id: z.string().min(1) });
const textPartSchema = z.object({ text: z.string() });
const itemSchema = z.object({
  text: z.unknown().optional(),
  message: z.unknown().optional()
});
const messageSchema = z.object({
  text: z.unknown().optional(),
  content: z.unknown().optional()
});
const errorSchema = z.object({
  message: z.unknown().optional(),
  error: z.unknown().optional()
});

/**
 * Best-effort text of an `item.*` payload: the item's own `text`, then
 * `message.text`, then the joined text parts of `message.content`.
 */
export function extractItemText(item: unknown): string {
  const parsed = itemSchema.safeParse(item);
  if (!parsed.success) return "";
  if (typeof parsed.data.text === "string" && parsed.data.text) return parsed.data.text;

  const message = messageSchema.safeParse(parsed.data.message);
  if (!message.success) return "";
  if (typeof message.data.text === "string" && message.data.text) return message.data.text;
  if (!Array.isArray(message.data.content)) return "";
  return message.data.content
    .map((part) => {
      const text = textPartSchema.safeParse(part);
      return text.success ? text.data.text : "";
    })
    .join("");
}

function extractErrorMessage(payload: Record<string, unknown>): string {
  const parsed = errorSchema.safeParse(payload);
  if (!parsed.success) return "Unknown error";
  const { message, error } = parsed.data;
  if (typeof message === "string" && message) return message;
  if (typeof error === "string" && error) return error;
  const nested = z.object({ message: z.string().min(1) }).safeParse(error);
  return nested.success ? nested.data.message : "Unknown error";
}

/** Codex `exec --json` vocabulary (thread/turn/item events). */
export class CodexStreamDecoder implements LineDecoder {
  private threadId: string | null = null;

  get nativeResumeId(): string | null {
    return this.threadId;
  }

  decode(line: DecodedLine): NormalizedEvent[] {
    if (line.kind === "text") return line.content ? [tokenEvent(line.content)] : [];

    const { payload } = line;
    const type = typeof payload.type === "string" ? payload.type : "";

    if (type === "thread.started") {
      const parsed = threadStartedSchema.safeParse(payload);
      if (parsed.success) this.threadId = parsed.data.thread_id;
      return [];
    }
    if (type.startsWith("item.")) {
      const text = extractItemText(payload.item);
      return text ? [tokenEvent(text)] : [];
    }
    if (type === "error") return [errorEvent(extractErrorMessage(payload))];
    if (type === "turn.failed") return [errorEvent(TURN_FAILED_MESSAGE)];
    return [];
  }
}

export class CodexAdapter implements AgentAdapter {
  name = "codex" as const;
  skillSigil = "$";
  // Codex assigns its own thread id; the relay's session id is not a valid resume target.
  requiresNativeResumeId = true;

  private readonly cliPath: string;
  private readonly sandbox?: SandboxOptions;

  constructor(options: AdapterOptions = {}) {
    this.cliPath = options.cliPath ?? "codex";
    this.sandbox = options.sandbox;
  }

  /** Output mode does not change the invocation: `--json` is already line-delimited. */
  buildCommand(turn: CommandTurn, _mode: OutputMode): ProcessCommand {
    const args = ["exec"];
    if (turn.isNew) {
      args.push("--json", ...this.sandboxArgs(), turn.prompt);
    } else {
      if (!turn.resumeId) {
        throw new ConfigurationError(
          `Codex resume requires a thread id; none is known for session ${turn.sessionId}`
        );
      }
      args.push("resume", "--json", ...this.sandboxArgs(), turn.resumeId, turn.prompt);
    }
    return { file: this.cliPath, args, cwd: this.sandbox?.workingDirectory };
  }

  createDecoder(): LineDecoder {
    return new CodexStreamDecoder();
  }

  parseBufferedOutput(stdout: string): BufferedOutput {
    const text = stdout.trim();
    const decoder = new CodexStreamDecoder();
    const parts: string[] = [];
    let sawJson = false;

    for (const raw of text.split("\n")) {
      const line = raw.trim();
      if (!line) continue;
      const decoded = decodeJsonLine(line);
      // Plain lines around the JSON events are noise in buffered mode.
      if (decoded.kind === "text") continue;
      sawJson = true;
      for (const event of decoder.decode(decoded)) {
        if (event.type === "token") parts.push(event.token);
      }
    }

    if (!sawJson) return { text, nativeResumeId: null };
    return { text: parts.join("").trim(), nativeResumeId: decoder.nativeResumeId };
  }

  private sandboxArgs(): string[] {
    if (!this.sandbox) return [];
    const args: string[] = [];
    if (this.sandbox.workingDirectory) args.push("--cd", this.sandbox.workingDirectory);
    for (const dir of this.sandbox.allowedDirectories) args.push("--add-dir", dir);
    if (this.sandbox.permissionMode) args.push("--sandbox", this.sandbox.permissionMode);
    return args;
  }
}
