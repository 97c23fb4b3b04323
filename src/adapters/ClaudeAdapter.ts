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
import { tryParseJson } from "./jsonl.js";

const textBlockSchema = z.object({ type: z.literal("text"), text: z.string() });

const assistantSchema = z.object({
  message: z.object({ content: z.array(z.unknown()) })
});

const deltaSchema = z.object({
  delta: z.object({ type: z.literal("text_delta"), text: z.string() })
});

const resultSchema = z.object({ result: z.string() });

const errorSchema = z.object({
  error: z.union([z.string(), z.object({ message: z.string() })])
});

/**
 * Claude Code stream-json vocabulary.
 *
 * `result` restates the whole answer, so it only becomes a token when no
 * assistant or delta text was seen earlier in the turn.
 */
export class ClaudeStreamDecoder implements LineDecoder {
  readonly nativeResumeId = null;
  private sawToken = false;

  decode(line: DecodedLine): NormalizedEvent[] {
    if (line.kind === "text") return this.tokens([line.content]);

    const { payload } = line;
    switch (payload.type) {
      case "assistant": {
        const parsed = assistantSchema.safeParse(payload);
        if (!parsed.success) return [];
        const texts = parsed.data.message.content.flatMap((block) => {
          const text = textBlockSchema.safeParse(block);
          return text.success ? [text.data.text] : [];
        });
        return this.tokens(texts);
      }
      case "content_block_delta": {
        const parsed = deltaSchema.safeParse(payload);
        return parsed.success ? this.tokens([parsed.data.delta.text]) : [];
      }
      case "result": {
        if (this.sawToken) return [];
        const parsed = resultSchema.safeParse(payload);
        return parsed.success ? this.tokens([parsed.data.result]) : [];
      }
      case "text": {
        const content = payload.content;
        return typeof content === "string" ? this.tokens([content]) : [];
      }
      case "error": {
        const parsed = errorSchema.safeParse(payload);
        if (!parsed.success) return [errorEvent("Unknown error")];
        const { error } = parsed.data;
        return [errorEvent(typeof error === "string" ? error : error.message)];
      }
      default:
        return [];
    }
  }

  private tokens(texts: string[]): NormalizedEvent[] {
    const events = texts.filter((text) => text.length > 0).map((text) => tokenEvent(text));
    if (events.length > 0) this.sawToken = true;
    return events;
  }
}

export class ClaudeAdapter implements AgentAdapter {
  name = "claude" as const;
  skillSigil = "/";
  requiresNativeResumeId = false;

  private readonly cliPath: string;
  private readonly sandbox?: SandboxOptions;

  constructor(options: AdapterOptions = {}) {
    this.cliPath = options.cliPath ?? "claude";
    this.sandbox = options.sandbox;
  }

  buildCommand(turn: CommandTurn, mode: OutputMode): ProcessCommand {
    const args: string[] = [];
    if (turn.isNew) {
      args.push("--session-id", turn.sessionId);
    } else {
      const resumeId = turn.resumeId ?? turn.sessionId;
      if (!resumeId) throw new ConfigurationError("Claude resume requires a session id");
      args.push("--resume", resumeId);
    }

    args.push("--print");
    if (mode === "streaming") {
      // stream-json is rejected without --verbose in print mode.
      args.push("--verbose", "--output-format", "stream-json");
    } else {
      args.push("--output-format", "json");
    }

    if (this.sandbox) {
      for (const dir of this.sandbox.allowedDirectories) args.push("--add-dir", dir);
      if (this.sandbox.permissionMode) args.push("--permission-mode", this.sandbox.permissionMode);
    }

    args.push("-p", turn.prompt);
    return { file: this.cliPath, args, cwd: this.sandbox?.workingDirectory };
  }

  createDecoder(): LineDecoder {
    return new ClaudeStreamDecoder();
  }

  parseBufferedOutput(stdout: string): BufferedOutput {
    const text = stdout.trim();
    const parsed = resultSchema.safeParse(tryParseJson(text));
    return { text: parsed.success ? parsed.data.result : text, nativeResumeId: null };
  }
}
