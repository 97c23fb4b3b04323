export abstract class RelayError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }

  details(): Record<string, unknown> {
    return {};
  }
}

export class ProcessFailedError extends RelayError {
  constructor(
    readonly exitCode: number | null,
    readonly stderr: string,
    command = "agent"
  ) {
    super(`${command} failed: ${stderr || "Unknown error"}`);
  }

  override details(): Record<string, unknown> {
    return { exitCode: this.exitCode, stderr: this.stderr };
  }
}

export class TurnTimeoutError extends RelayError {
  constructor(readonly timeoutMs: number, command = "agent") {
    super(`${command} timed out after ${Math.round(timeoutMs / 1000)} seconds`);
  }

  override details(): Record<string, unknown> {
    return { timeoutMs: this.timeoutMs };
  }
}

export class ConfigurationError extends RelayError {}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function toErrorPayload(error: unknown): Record<string, unknown> {
  if (error instanceof RelayError) {
    return { name: error.name, message: error.message, ...error.details() };
  }
  return { name: "Error", message: errorMessage(error) };
}
