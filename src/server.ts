import process from "node:process";
import type { Readable, Writable } from "node:stream";
import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import type { Transport } from "@modelcontextprotocol/sdk/shared/transport.js";
import { loadConfig, VERSION } from "./config.js";
import type { RelayConfig } from "./config.js";
import { componentLogger, logger } from "./logger.js";
import { buildTools } from "./mcp/tools.js";
import { createRuntime } from "./runtime.js";
import type { Runtime, RuntimeOverrides } from "./runtime.js";

type ServerIo = {
  stdin?: Readable;
  stdout?: Writable;
  /** Replaces the stdio transport entirely. */
  transport?: Transport;
};

export interface ServerOptions extends ServerIo, RuntimeOverrides {
  config?: RelayConfig;
}

export async function createServer(options: ServerOptions = {}) {
  const config = options.config ?? loadConfig();
  logger.level = config.logLevel;
  const runtime: Runtime = createRuntime(config, options);
  const startedAt = Date.now();

  const server = new McpServer({ name: "agent-relay", version: VERSION });
  const tools = buildTools({
    runner: runtime.runner,
    chat: runtime.chat,
    version: VERSION,
    adapters: runtime.adapters.list(),
    startedAt
  });
  for (const tool of tools) {
    server.registerTool(
      tool.name,
      {
        description: tool.description,
        inputSchema: tool.inputShape
      },
      tool.handler
    );
  }

  const stdin = options.stdin ?? process.stdin;
  const transport = options.transport ?? new StdioServerTransport(stdin, options.stdout ?? process.stdout);
  await server.connect(transport);
  if (!options.transport && stdin === process.stdin) {
    process.stdin.resume();
  }

  return { server, transport, runtime };
}

export async function startServer(): Promise<void> {
  const log = componentLogger("server");
  await createServer();
  log.info({ version: VERSION }, "agent-relay listening on stdio");

  const stdin = process.stdin;
  stdin.resume();

  // Keep the process alive while stdin is open. In some environments, merely
  // attaching listeners/resuming stdin is not sufficient to prevent an early exit.
  const keepalive = setInterval(() => {
    // no-op
  }, 60_000);

  await new Promise<void>((resolve) => {
    const done = () => {
      clearInterval(keepalive);
      resolve();
    };
    stdin.once("end", done);
    stdin.once("close", done);
  });
  log.info("stdin closed, shutting down");
}
