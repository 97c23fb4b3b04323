import { randomUUID } from "node:crypto";
import type { AgentAdapter, CommandTurn, ProcessCommand } from "../adapters/types.js";
import type { ChatHistorySink } from "../chat/ChatHistorySink.js";
import { NoopChatHistorySink } from "../chat/ChatHistorySink.js";
import { ConfigurationError, errorMessage } from "../errors.js";
import { doneEvent, errorEvent, nowTimestamp } from "../events.js";
import { componentLogger } from "../logger.js";
import type { Logger } from "../logger.js";
import type { ProcessExecutor } from "../process/executor.js";
import type { PromptResolver } from "../profiles/resolver.js";
import type {
  AskResult,
  ConversationRequest,
  LogicalSession,
  NormalizedEvent,
  OutputMode,
  TurnRequest
} from "../types.js";
import { NormalizedTurn } from "./NormalizedTurn.js";
import { SessionRegistry } from "./SessionRegistry.js";
import type { Release } from "./SessionRegistry.js";

export const DEFAULT_USER_ID = "default_user";
export const ANSWER_MESSAGE_TYPE = "agent";

export interface TurnRunnerOptions {
  adapter: AgentAdapter;
  resolver: PromptResolver;
  executor: ProcessExecutor;
  timeoutMs: number;
  registry?: SessionRegistry;
  chat?: ChatHistorySink;
  defaultMessageType?: string;
  newSessionId?: () => string;
  logger?: Logger;
}

interface PlannedTurn {
  turn: TurnRequest;
  sessionId: string;
  existing?: LogicalSession;
}

/**
 * Runs one turn at a time per conversation against the configured backend
 * and owns the session registry.
 */
export class TurnRunner {
  readonly registry: SessionRegistry;
  private readonly adapter: AgentAdapter;
  private readonly resolver: PromptResolver;
  private readonly executor: ProcessExecutor;
  private readonly chat: ChatHistorySink;
  private readonly timeoutMs: number;
  private readonly defaultMessageType: string;
  private readonly newSessionId: () => string;
  private readonly logger: Logger;

  constructor(options: TurnRunnerOptions) {
    this.adapter = options.adapter;
    this.resolver = options.resolver;
    this.executor = options.executor;
    this.timeoutMs = options.timeoutMs;
    this.registry = options.registry ?? new SessionRegistry();
    this.chat = options.chat ?? new NoopChatHistorySink();
    this.defaultMessageType = options.defaultMessageType ?? "question";
    this.newSessionId = options.newSessionId ?? randomUUID;
    this.logger = options.logger ?? componentLogger("turn-runner");
  }

  get backend(): string {
    return this.adapter.name;
  }

  async ask(request: ConversationRequest): Promise<AskResult> {
    return this.registry.withLock(request.conversationKey, () => this.runBuffered(request), this.timeoutMs);
  }

  /**
   * Failures arrive as `error` events; the last event is always `done`, and
   * the session is committed before it is sent. The conversation stays
   * locked until the generator finishes or `return()` is called; a caller
   * that drops it half way holds the key until later turns give up waiting
   * after `timeoutMs`.
   */
  async *stream(request: ConversationRequest): AsyncGenerator<NormalizedEvent> {
    let release: Release;
    try {
      release = await this.registry.acquire(request.conversationKey, this.timeoutMs);
    } catch (error) {
      this.logger.error({ conversationKey: request.conversationKey, err: errorMessage(error) }, "Turn rejected");
      yield errorEvent(errorMessage(error));
      yield doneEvent();
      return;
    }
    try {
      let prepared: { planned: PlannedTurn; command: ProcessCommand } | undefined;
      let failure: unknown;
      try {
        const planned = this.plan(request);
        prepared = { planned, command: await this.prepare(planned, "streaming") };
      } catch (error) {
        failure = error;
      }
      if (!prepared) {
        this.logger.error({ conversationKey: request.conversationKey, err: errorMessage(failure) }, "Turn rejected");
        yield errorEvent(errorMessage(failure));
        yield doneEvent();
        return;
      }

      const { planned, command } = prepared;
      const turn = new NormalizedTurn(
        this.executor.stream(command, { timeoutMs: this.timeoutMs }),
        this.adapter.createDecoder()
      );
      for await (const event of turn) {
        if (event.type !== "done") yield event;
      }

      if (turn.succeeded) {
        this.commit(request.conversationKey, planned, turn.nativeResumeId);
        this.logger.info(
          { conversationKey: request.conversationKey, chars: turn.text.length },
          "Stream completed"
        );
        await this.recordExchange(request, turn.text);
      } else {
        this.logger.warn({ conversationKey: request.conversationKey }, "Streamed turn failed");
      }
      yield doneEvent();
    } finally {
      release();
    }
  }

  listSessions(): LogicalSession[] {
    return this.registry.list();
  }

  clearSession(conversationKey: string): boolean {
    const removed = this.registry.remove(conversationKey);
    if (removed) this.logger.info({ conversationKey }, "Cleared session");
    return removed;
  }

  private async runBuffered(request: ConversationRequest): Promise<AskResult> {
    const planned = this.plan(request);
    const command = await this.prepare(planned, "buffered");
    const stdout = await this.executor.run(command, { timeoutMs: this.timeoutMs });
    const output = this.adapter.parseBufferedOutput(stdout);

    this.commit(request.conversationKey, planned, output.nativeResumeId);
    this.logger.info(
      { conversationKey: request.conversationKey, chars: output.text.length },
      "Turn completed"
    );
    await this.recordExchange(request, output.text);

    return {
      message: output.text,
      conversationKey: request.conversationKey,
      userId: request.userId ?? DEFAULT_USER_ID,
      sessionId: planned.sessionId,
      isNewSession: planned.turn.isNew,
      timestamp: nowTimestamp()
    };
  }

  private plan(request: ConversationRequest): PlannedTurn {
    const existing = this.registry.resolve(request.conversationKey);
    const agentType = request.agentType ?? null;
    if (existing) {
      this.logger.info(
        { conversationKey: request.conversationKey, sessionId: existing.sessionId },
        "Resuming session"
      );
      return {
        turn: { question: request.question, sessionId: existing.sessionId, isNew: false, agentType },
        sessionId: existing.sessionId,
        existing
      };
    }
    if (request.resume) {
      throw new ConfigurationError(`No session to resume for conversation ${request.conversationKey}`);
    }
    // Registered only once the first turn succeeds.
    const sessionId = this.newSessionId();
    this.logger.info({ conversationKey: request.conversationKey, sessionId }, "Starting new session");
    return {
      turn: { question: request.question, sessionId, isNew: true, agentType },
      sessionId
    };
  }

  private async prepare(planned: PlannedTurn, mode: OutputMode): Promise<ProcessCommand> {
    const prompt = await this.resolver.resolve(planned.turn.question, planned.turn.agentType);
    const commandTurn: CommandTurn = {
      isNew: planned.turn.isNew,
      sessionId: planned.sessionId,
      resumeId: this.resumeIdFor(planned.existing),
      prompt
    };
    return this.adapter.buildCommand(commandTurn, mode);
  }

  private resumeIdFor(session?: LogicalSession): string | null {
    if (!session) return null;
    if (session.nativeResumeId) return session.nativeResumeId;
    return this.adapter.requiresNativeResumeId ? null : session.sessionId;
  }

  private commit(conversationKey: string, planned: PlannedTurn, nativeResumeId: string | null): void {
    const learned = nativeResumeId !== null && nativeResumeId !== planned.existing?.nativeResumeId;
    if (!planned.turn.isNew && !learned) return;
    this.registry.commit(conversationKey, planned.sessionId, nativeResumeId);
    this.logger.info({ conversationKey, sessionId: planned.sessionId, nativeResumeId }, "Stored session");
  }

  private async recordExchange(request: ConversationRequest, answer: string): Promise<void> {
    if (!answer) return;
    const userId = request.userId ?? DEFAULT_USER_ID;
    await this.chat.push(
      request.conversationKey,
      userId,
      request.question,
      request.messageType ?? this.defaultMessageType
    );
    await this.chat.push(request.conversationKey, userId, answer, ANSWER_MESSAGE_TYPE);
  }
}
