import { describe, expect, it } from "vitest";
import { loadConfig } from "../src/config.js";
import { ConfigurationError } from "../src/errors.js";

describe("loadConfig", () => {
  it("applies defaults for an empty environment", () => {
    expect(loadConfig({})).toEqual({
      backend: "claude",
      cliPaths: { claude: "claude", codex: "codex" },
      timeoutMs: 300_000,
      profileStrategy: "skill",
      profilesDir: "profiles",
      defaultProfile: "default",
      sandbox: undefined,
      chatApiBaseUrl: undefined,
      chatApiToken: undefined,
      defaultMessageType: "question",
      logLevel: "info"
    });
  });

  it("reads backend, paths, timeout and profile settings", () => {
    const config = loadConfig({
      AGENT_BACKEND: "codex",
      CODEX_CLI_PATH: "/opt/bin/codex",
      AGENT_TIMEOUT_SECONDS: "45",
      PROFILE_STRATEGY: "instructions",
      PROFILES_DIR: "/srv/profiles",
      DEFAULT_PROFILE: "tutor",
      CHAT_API_BASE_URL: "http://chat.test",
      CHAT_API_TOKEN: "test-token",
      DEFAULT_MESSAGE_TYPE: "homework",
      LOG_LEVEL: "debug"
    });
    expect(config).toMatchObject({
      backend: "codex",
      cliPaths: { claude: "claude", codex: "/opt/bin/codex" },
      timeoutMs: 45_000,
      profileStrategy: "instructions",
      profilesDir: "/srv/profiles",
      defaultProfile: "tutor",
      chatApiBaseUrl: "http://chat.test",
      chatApiToken: "test-token",
      defaultMessageType: "homework",
      logLevel: "debug"
    });
  });

  it("builds sandbox options only when enabled", () => {
    const env = {
      AGENT_WORKDIR: "/work/project",
      AGENT_ALLOWED_DIRS: "/work/project, /work/shared,,",
      AGENT_PERMISSION_MODE: "acceptEdits"
    };
    expect(loadConfig(env).sandbox).toBeUndefined();
    expect(loadConfig({ ...env, SANDBOX_ENABLED: "TRUE" }).sandbox).toEqual({
      workingDirectory: "/work/project",
      allowedDirectories: ["/work/project", "/work/shared"],
      permissionMode: "acceptEdits"
    });
    expect(loadConfig({ SANDBOX_ENABLED: "1" }).sandbox).toEqual({
      workingDirectory: undefined,
      allowedDirectories: [],
      permissionMode: undefined
    });
  });

  it("treats blank optional values as unset", () => {
    const config = loadConfig({ SANDBOX_ENABLED: "", CHAT_API_BASE_URL: "  ", CHAT_API_TOKEN: "" });
    expect(config.sandbox).toBeUndefined();
    expect(config.chatApiBaseUrl).toBeUndefined();
    expect(config.chatApiToken).toBeUndefined();
  });

  it("rejects invalid values with every issue listed", () => {
    const load = () => loadConfig({ AGENT_BACKEND: "opencode", AGENT_TIMEOUT_SECONDS: "-5" });
    expect(load).toThrow(ConfigurationError);
    expect(load).toThrow(/AGENT_BACKEND.*AGENT_TIMEOUT_SECONDS/);
  });

  it("rejects a malformed chat API URL", () => {
    expect(() => loadConfig({ CHAT_API_BASE_URL: "not a url" })).toThrow(/CHAT_API_BASE_URL/);
  });
});
