import { z } from "zod";
import { ConfigurationError } from "./errors.js";
import type { BackendName, ProfileStrategy } from "./types.js";

export const VERSION = "0.1.0";

const optionalString = z
  .string()
  .trim()
  .optional()
  .transform((value) => (value ? value : undefined));

const flag = z
  .string()
  .trim()
  .toLowerCase()
  .default("false")
  .transform((value) => value === "true" || value === "1" || value === "yes");

const commaList = z
  .string()
  .default("")
  .transform((value) =>
    value
      .split(",")
      .map((item) => item.trim())
      .filter((item) => item.length > 0)
  );

const envSchema = z.object({
  AGENT_BACKEND: z.enum(["claude", "codex"]).default("claude"),
  CLAUDE_CLI_PATH: z.string().min(1).default("claude"),
  CODEX_CLI_PATH: z.string().min(1).default("codex"),
  AGENT_TIMEOUT_SECONDS: z.coerce.number().int().positive().default(300),
  PROFILE_STRATEGY: z.enum(["skill", "instructions"]).default("skill"),
  PROFILES_DIR: z.string().min(1).default("profiles"),
  DEFAULT_PROFILE: z.string().min(1).default("default"),
  SANDBOX_ENABLED: flag,
  AGENT_WORKDIR: optionalString,
  AGENT_ALLOWED_DIRS: commaList,
  AGENT_PERMISSION_MODE: optionalString,
  CHAT_API_BASE_URL: optionalString.pipe(z.string().url().optional()),
  CHAT_API_TOKEN: optionalString,
  DEFAULT_MESSAGE_TYPE: z.string().min(1).default("question"),
  LOG_LEVEL: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).default("info")
});

export interface SandboxConfig {
  workingDirectory?: string;
  allowedDirectories: string[];
  permissionMode?: string;
}

export interface RelayConfig {
  backend: BackendName;
  cliPaths: Record<BackendName, string>;
  timeoutMs: number;
  profileStrategy: ProfileStrategy;
  profilesDir: string;
  defaultProfile: string;
  /** Present only when sandboxing is enabled. */
  sandbox?: SandboxConfig;
  chatApiBaseUrl?: string;
  chatApiToken?: string;
  defaultMessageType: string;
  logLevel: string;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): RelayConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new ConfigurationError(`Invalid configuration: ${issues}`);
  }
  const values = parsed.data;
  return {
    backend: values.AGENT_BACKEND,
    cliPaths: { claude: values.CLAUDE_CLI_PATH, codex: values.CODEX_CLI_PATH },
    timeoutMs: values.AGENT_TIMEOUT_SECONDS * 1000,
    profileStrategy: values.PROFILE_STRATEGY,
    profilesDir: values.PROFILES_DIR,
    defaultProfile: values.DEFAULT_PROFILE,
    sandbox: values.SANDBOX_ENABLED
      ? {
          workingDirectory: values.AGENT_WORKDIR,
          allowedDirectories: values.AGENT_ALLOWED_DIRS,
          permissionMode: values.AGENT_PERMISSION_MODE
        }
      : undefined,
    chatApiBaseUrl: values.CHAT_API_BASE_URL,
    chatApiToken: values.CHAT_API_TOKEN,
    defaultMessageType: values.DEFAULT_MESSAGE_TYPE,
    logLevel: values.LOG_LEVEL
  };
}
