import type { DataSourceConfig } from "./config.js";
import type { AgentFactory, DataSource } from "./types.js";

export type DataSourceFactory = (id: string, config: DataSourceConfig) => DataSource;

/**
 * Name -> factory lookup, populated by explicit register() calls at startup.
 * New implementations are added here without touching the manager.
 */
export class Registry<T> {
  private readonly entries = new Map<string, T>();

  constructor(private readonly label: string) {}

  register(name: string, entry: T): this {
    if (this.entries.has(name)) {
      throw new Error(`${this.label} "${name}" is already registered`);
    }
    this.entries.set(name, entry);
    return this;
  }

  resolve(name: string): T | undefined {
    return this.entries.get(name);
  }

  has(name: string): boolean {
    return this.entries.has(name);
  }

  names(): ReadonlySet<string> {
    return new Set(this.entries.keys());
  }
}

export class AgentRegistry extends Registry<AgentFactory> {
  constructor() {
    super("Agent class");
  }
}

export class DataSourceRegistry extends Registry<DataSourceFactory> {
  constructor() {
    super("Data source kind");
  }
}
