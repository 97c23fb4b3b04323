import { z } from "zod";
import { errorMessage } from "../errors.js";
import { componentLogger } from "../logger.js";
import type { Logger } from "../logger.js";

export const HTTP_TIMEOUT_MS = 30_000;

export type ChatMessage = Record<string, unknown>;

export interface ChatHistorySink {
  push(conversationKey: string, actorId: string, text: string, messageType: string): Promise<void>;
  fetchMessages(conversationKey: string, limit?: number): Promise<ChatMessage[] | null>;
}

/** Supplies the bearer credential for outbound chat calls, if any. */
export interface AuthContext {
  getToken(): string | undefined;
}

export class StaticAuthContext implements AuthContext {
  constructor(private token?: string) {}

  getToken(): string | undefined {
    return this.token;
  }

  setToken(token: string | undefined): void {
    this.token = token;
  }
}

export class NoopChatHistorySink implements ChatHistorySink {
  async push(): Promise<void> {
    return undefined;
  }

  async fetchMessages(): Promise<ChatMessage[] | null> {
    return null;
  }
}

const messagesResponseSchema = z.object({
  messages: z.array(z.record(z.unknown())).default([])
});

export interface HttpChatHistorySinkOptions {
  baseUrl: string;
  auth?: AuthContext;
  fetchImpl?: typeof fetch;
  timeoutMs?: number;
  logger?: Logger;
}

/**
 * Client for the external chat storage API. Storage problems are logged and
 * never fail the turn that produced the message.
 */
export class HttpChatHistorySink implements ChatHistorySink {
  private readonly baseUrl: string;
  private readonly auth?: AuthContext;
  private readonly fetchImpl: typeof fetch;
  private readonly timeoutMs: number;
  private readonly logger: Logger;

  constructor(options: HttpChatHistorySinkOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, "");
    this.auth = options.auth;
    this.fetchImpl = options.fetchImpl ?? fetch;
    this.timeoutMs = options.timeoutMs ?? HTTP_TIMEOUT_MS;
    this.logger = options.logger ?? componentLogger("chat-history");
  }

  async push(conversationKey: string, actorId: string, text: string, messageType: string): Promise<void> {
    const url = `${this.baseUrl}/chat/add_message`;
    try {
      const response = await this.fetchImpl(url, {
        method: "POST",
        headers: this.headers({ "Content-Type": "application/json" }),
        body: JSON.stringify({
          project_id: conversationKey,
          user_id: actorId,
          message: text,
          type: messageType
        }),
        signal: AbortSignal.timeout(this.timeoutMs)
      });
      if (!response.ok) {
        this.logger.warn({ conversationKey, status: response.status }, "Failed to push chat message");
        return;
      }
      this.logger.debug({ conversationKey, messageType }, "Pushed chat message");
    } catch (error) {
      this.logger.warn({ conversationKey, err: errorMessage(error) }, "Chat API error");
    }
  }

  async fetchMessages(conversationKey: string, limit = 50): Promise<ChatMessage[] | null> {
    const params = new URLSearchParams({ project_id: conversationKey, limit: String(limit) });
    const url = `${this.baseUrl}/chat/get_messages?${params.toString()}`;
    try {
      const response = await this.fetchImpl(url, {
        headers: this.headers({}),
        signal: AbortSignal.timeout(this.timeoutMs)
      });
      if (!response.ok) {
        this.logger.warn({ conversationKey, status: response.status }, "Failed to fetch chat messages");
        return null;
      }
      const parsed = messagesResponseSchema.safeParse(await response.json());
      if (!parsed.success) {
        this.logger.warn({ conversationKey }, "Unexpected chat messages payload");
        return null;
      }
      return parsed.data.messages;
    } catch (error) {
      this.logger.warn({ conversationKey, err: errorMessage(error) }, "Chat API error");
      return null;
    }
  }

  private headers(base: Record<string, string>): Record<string, string> {
    const token = this.auth?.getToken();
    return token ? { ...base, Authorization: `Bearer ${token}` } : base;
  }
}
