export type BackendName = "claude" | "codex";
export type OutputMode = "buffered" | "streaming";
export type ProfileStrategy = "skill" | "instructions";

export type NormalizedEvent =
  | { type: "token"; token: string }
  | { type: "error"; error: string }
  | { type: "done" };

export interface LogicalSession {
  conversationKey: string;
  sessionId: string;
  /** Backend-assigned resume identity (e.g. a Codex thread id), null until the backend reports one. */
  nativeResumeId: string | null;
}

export interface TurnRequest {
  question: string;
  sessionId: string | null;
  isNew: boolean;
  agentType: string | null;
}

export interface ConversationRequest {
  conversationKey: string;
  question: string;
  agentType?: string | null;
  userId?: string;
  messageType?: string;
  /** Require an existing session instead of starting a new one. */
  resume?: boolean;
}

export interface AskResult {
  message: string;
  conversationKey: string;
  userId: string;
  sessionId: string;
  isNewSession: boolean;
  timestamp: string;
}
