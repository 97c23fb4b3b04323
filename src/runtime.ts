import { ClaudeAdapter } from "./adapters/ClaudeAdapter.js";
import { CodexAdapter } from "./adapters/CodexAdapter.js";
import { AdapterRegistry } from "./adapters/registry.js";
import type { AgentAdapter } from "./adapters/types.js";
import { TurnRunner } from "./agent/TurnRunner.js";
import type { ChatHistorySink } from "./chat/ChatHistorySink.js";
import { HttpChatHistorySink, NoopChatHistorySink, StaticAuthContext } from "./chat/ChatHistorySink.js";
import type { RelayConfig } from "./config.js";
import { componentLogger } from "./logger.js";
import { ChildProcessExecutor } from "./process/executor.js";
import type { ProcessExecutor } from "./process/executor.js";
import { InstructionFileResolver, SkillPrefixResolver } from "./profiles/resolver.js";
import type { PromptResolver } from "./profiles/resolver.js";

export interface Runtime {
  config: RelayConfig;
  adapters: AdapterRegistry;
  runner: TurnRunner;
  chat: ChatHistorySink;
}

export interface RuntimeOverrides {
  executor?: ProcessExecutor;
  chat?: ChatHistorySink;
}

export function createAdapterRegistry(config: RelayConfig): AdapterRegistry {
  const registry = new AdapterRegistry();
  registry.register(new ClaudeAdapter({ cliPath: config.cliPaths.claude, sandbox: config.sandbox }));
  registry.register(new CodexAdapter({ cliPath: config.cliPaths.codex, sandbox: config.sandbox }));
  return registry;
}

export function createResolver(config: RelayConfig, adapter: AgentAdapter): PromptResolver {
  if (config.profileStrategy === "instructions") {
    return new InstructionFileResolver({
      directory: config.profilesDir,
      defaultProfile: config.defaultProfile
    });
  }
  return new SkillPrefixResolver(adapter.skillSigil);
}

export function createChatSink(config: RelayConfig): ChatHistorySink {
  if (!config.chatApiBaseUrl) return new NoopChatHistorySink();
  return new HttpChatHistorySink({
    baseUrl: config.chatApiBaseUrl,
    auth: new StaticAuthContext(config.chatApiToken)
  });
}

export function createRuntime(config: RelayConfig, overrides: RuntimeOverrides = {}): Runtime {
  const adapters = createAdapterRegistry(config);
  const adapter = adapters.require(config.backend);
  const chat = overrides.chat ?? createChatSink(config);
  const runner = new TurnRunner({
    adapter,
    resolver: createResolver(config, adapter),
    executor: overrides.executor ?? new ChildProcessExecutor(),
    timeoutMs: config.timeoutMs,
    chat,
    defaultMessageType: config.defaultMessageType
  });

  componentLogger("runtime").info(
    {
      backend: adapter.name,
      cli: config.cliPaths[adapter.name],
      timeoutMs: config.timeoutMs,
      profiles: config.profileStrategy,
      sandbox: Boolean(config.sandbox),
      chatApi: config.chatApiBaseUrl ?? null
    },
    "Runtime ready"
  );
  return { config, adapters, runner, chat };
}
