import { z } from "zod";
import type { CallToolResult } from "@modelcontextprotocol/sdk/types.js";
import type { TurnRunner } from "../agent/TurnRunner.js";
import type { ChatHistorySink } from "../chat/ChatHistorySink.js";
import { toErrorPayload } from "../errors.js";
import { serializeEvent } from "../events.js";
import type { NormalizedEvent } from "../types.js";

const turnSchema = z.object({
  conversationKey: z.string().min(1),
  question: z.string().min(1),
  agentType: z.string().optional(),
  userId: z.string().optional(),
  messageType: z.string().optional(),
  resume: z.boolean().optional()
});

const sessionsSchema = z.object({});

const clearSessionSchema = z.object({
  conversationKey: z.string().min(1)
});

const historySchema = z.object({
  conversationKey: z.string().min(1),
  limit: z.number().int().positive().max(500).optional()
});

const infoSchema = z.object({});

export type ToolDefinition = {
  name: string;
  description: string;
  inputShape: z.ZodRawShape;
  handler: (args: unknown) => Promise<CallToolResult>;
};

export interface ToolContext {
  runner: TurnRunner;
  chat: ChatHistorySink;
  version: string;
  adapters: string[];
  startedAt: number;
}

/** Arguments are parsed again here so handlers never trust the transport. */
const defineTool = <T extends z.AnyZodObject>(tool: {
  name: string;
  description: string;
  inputSchema: T;
  handler: (args: z.infer<T>) => Promise<CallToolResult>;
}): ToolDefinition => ({
  name: tool.name,
  description: tool.description,
  inputShape: tool.inputSchema.shape,
  handler: async (args: unknown) => tool.handler(tool.inputSchema.parse(args ?? {}))
});

const wrapResult = (data: Record<string, unknown>): CallToolResult => ({
  content: [{ type: "text", text: JSON.stringify(data) }],
  structuredContent: data
});

const wrapError = (error: unknown): CallToolResult => {
  const data = { error: toErrorPayload(error) };
  return {
    content: [{ type: "text", text: JSON.stringify(data) }],
    structuredContent: data,
    isError: true
  };
};

export function buildTools(context: ToolContext): ToolDefinition[] {
  const { runner, chat } = context;

  return [
    defineTool({
      name: "relay:ask",
      description: "Ask the agent a question and wait for the full answer. The first question for a conversation key starts a session; later ones resume it.",
      inputSchema: turnSchema,
      handler: async (args) => {
        try {
          const result = await runner.ask(args);
          return wrapResult({ ...result });
        } catch (error) {
          return wrapError(error);
        }
      }
    }),
    defineTool({
      name: "relay:stream",
      description: "Ask the agent a question as a streamed turn; returns the normalized token/error/done events in order.",
      inputSchema: turnSchema,
      handler: async (args) => {
        const events: NormalizedEvent[] = [];
        for await (const event of runner.stream(args)) events.push(event);
        const message = events.map((event) => (event.type === "token" ? event.token : "")).join("");
        // Text content is the JSONL wire form, one event per line.
        return {
          content: [{ type: "text", text: events.map(serializeEvent).join("\n") }],
          structuredContent: { events, message }
        };
      }
    }),
    defineTool({
      name: "relay:sessions",
      description: "List active conversation sessions.",
      inputSchema: sessionsSchema,
      handler: async () => {
        const sessions = Object.fromEntries(
          runner.listSessions().map((session) => [session.conversationKey, session.sessionId])
        );
        return wrapResult({ sessions, count: Object.keys(sessions).length });
      }
    }),
    defineTool({
      name: "relay:clear_session",
      description: "Forget the session for a conversation key; the next question starts a new one.",
      inputSchema: clearSessionSchema,
      handler: async (args) => {
        const success = runner.clearSession(args.conversationKey);
        return wrapResult({
          success,
          message: success
            ? `Session cleared for ${args.conversationKey}`
            : `No session found for ${args.conversationKey}`
        });
      }
    }),
    defineTool({
      name: "relay:history",
      description: "Fetch stored chat messages for a conversation key.",
      inputSchema: historySchema,
      handler: async (args) => {
        const messages = await chat.fetchMessages(args.conversationKey, args.limit);
        return wrapResult({ messages: messages ?? [] });
      }
    }),
    defineTool({
      name: "relay:info",
      description: "Server version, backend, adapters, active sessions and uptime.",
      inputSchema: infoSchema,
      handler: async () =>
        wrapResult({
          version: context.version,
          backend: runner.backend,
          adapters: context.adapters,
          activeSessions: runner.registry.size,
          uptimeMs: Date.now() - context.startedAt
        })
    })
  ];
}
