import { promises as fs } from "node:fs";
import { join } from "node:path";
import { errorMessage } from "../errors.js";
import { componentLogger } from "../logger.js";
import type { Logger } from "../logger.js";

export const USER_REQUEST_SEPARATOR = "\n\nUser request:\n";

const PROFILE_NAME = /^[a-z0-9][a-z0-9-]*$/;

export interface PromptResolver {
  resolve(question: string, agentType?: string | null): Promise<string>;
}

/** `" Code_Review "` and `"code-review"` both become `"code-review"`; blank input is no profile. */
export function normalizeProfileName(agentType?: string | null): string | null {
  if (!agentType) return null;
  const normalized = agentType.trim().toLowerCase().replace(/_/g, "-");
  return normalized || null;
}

export class SkillPrefixResolver implements PromptResolver {
  constructor(private readonly sigil: string) {}

  async resolve(question: string, agentType?: string | null): Promise<string> {
    const skill = normalizeProfileName(agentType);
    return skill ? `${this.sigil}${skill} ${question}` : question;
  }
}

export interface InstructionFileResolverOptions {
  directory: string;
  defaultProfile?: string | null;
  logger?: Logger;
}

/**
 * Reads `<directory>/<profile>.md` on every call so edits apply to the next
 * turn. Falls back from the requested profile to the default profile, then
 * to the bare question.
 */
export class InstructionFileResolver implements PromptResolver {
  private readonly directory: string;
  private readonly defaultProfile: string | null;
  private readonly logger: Logger;
  private directoryReady?: Promise<void>;

  constructor(options: InstructionFileResolverOptions) {
    this.directory = options.directory;
    this.defaultProfile = normalizeProfileName(options.defaultProfile);
    this.logger = options.logger ?? componentLogger("profiles");
  }

  async resolve(question: string, agentType?: string | null): Promise<string> {
    await this.ensureDirectory();
    const candidates = [normalizeProfileName(agentType), this.defaultProfile];
    for (const name of candidates) {
      if (!name) continue;
      const instruction = await this.loadProfile(name);
      if (instruction) {
        this.logger.debug({ profile: name }, "Using instruction profile");
        return `${instruction}${USER_REQUEST_SEPARATOR}${question}`;
      }
    }
    return question;
  }

  async loadProfile(name: string): Promise<string | null> {
    if (!PROFILE_NAME.test(name)) {
      this.logger.warn({ profile: name }, "Ignoring profile with invalid name");
      return null;
    }
    const path = join(this.directory, `${name}.md`);
    try {
      const text = (await fs.readFile(path, "utf8")).trim();
      return text || null;
    } catch (error) {
      if (isNotFound(error)) return null;
      this.logger.warn({ profile: name, path, err: errorMessage(error) }, "Skipping unreadable profile");
      return null;
    }
  }

  private ensureDirectory(): Promise<void> {
    if (!this.directoryReady) {
      this.directoryReady = fs.mkdir(this.directory, { recursive: true }).then(
        () => undefined,
        (error: unknown) => {
          this.directoryReady = undefined;
          throw error;
        }
      );
    }
    return this.directoryReady;
  }
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}
