import { ConfigurationError } from "../errors.js";
import type { BackendName } from "../types.js";
import type { AgentAdapter } from "./types.js";

export class AdapterRegistry {
  private readonly adapters = new Map<BackendName, AgentAdapter>();

  register(adapter: AgentAdapter): void {
    this.adapters.set(adapter.name, adapter);
  }

  get(name: BackendName): AgentAdapter | undefined {
    return this.adapters.get(name);
  }

  require(name: BackendName): AgentAdapter {
    const adapter = this.adapters.get(name);
    if (!adapter) throw new ConfigurationError(`Unknown agent backend: ${name}`);
    return adapter;
  }

  list(): BackendName[] {
    return [...this.adapters.keys()];
  }
}
