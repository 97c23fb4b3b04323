import pino from "pino";
import type { Logger } from "pino";

// stdout carries the MCP protocol, so logs go to stderr.
export const logger: Logger = pino(
  { name: "agent-relay", level: process.env.LOG_LEVEL ?? "info" },
  pino.destination(2)
);

export function componentLogger(component: string, parent: Logger = logger): Logger {
  return parent.child({ component });
}

export type { Logger };
