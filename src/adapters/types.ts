import type { BackendName, NormalizedEvent, OutputMode } from "../types.js";
import type { DecodedLine } from "./jsonl.js";

export interface ProcessCommand {
  file: string;
  args: string[];
  cwd?: string;
}

export interface CommandTurn {
  isNew: boolean;
  sessionId: string;
  /** Native resume identity from the session registry, if the backend reported one. */
  resumeId: string | null;
  prompt: string;
}

export interface SandboxOptions {
  workingDirectory?: string;
  allowedDirectories: string[];
  permissionMode?: string;
}

export interface AdapterOptions {
  cliPath?: string;
  sandbox?: SandboxOptions;
}

/** Per-turn decoder; carries whatever state a vocabulary needs across lines. */
export interface LineDecoder {
  decode(line: DecodedLine): NormalizedEvent[];
  readonly nativeResumeId: string | null;
}

export interface BufferedOutput {
  text: string;
  nativeResumeId: string | null;
}

export interface AgentAdapter {
  name: BackendName;
  /** Character that prefixes an in-band skill invocation. */
  skillSigil: string;
  /** Whether resuming needs the backend-native id rather than the session id. */
  requiresNativeResumeId: boolean;
  buildCommand(turn: CommandTurn, mode: OutputMode): ProcessCommand;
  createDecoder(): LineDecoder;
  parseBufferedOutput(stdout: string): BufferedOutput;
}
