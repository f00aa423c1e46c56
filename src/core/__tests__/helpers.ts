import { vi } from "vitest";
import { registerBuiltinAgents } from "../../agents/index.js";
import { registerBuiltinSources } from "../../sources/index.js";
import { IoTDataSource } from "../../sources/IoTDataSource.js";
import type { AgentManager } from "../AgentManager.js";
import { LocalEventHub } from "../EventHub.js";
import { DataSourceRegistry } from "../Registry.js";
import type { DataSource, FetchOptions, Reading } from "../types.js";
import { MemoryOutput } from "../../outputs/MemoryOutput.js";

export type FetchHandler = (
  subjectId: string,
  modality: string,
  options: FetchOptions
) => Promise<Reading | null>;

/**
 * Data source whose behaviour each test scripts
 */
export class StubSource implements DataSource {
  kind = "STUB";
  description = "Scripted test source";
  calls = 0;
  active = 0;
  maxActive = 0;

  constructor(public id: string, private handler: FetchHandler) {}

  setHandler(handler: FetchHandler): void {
    this.handler = handler;
  }

  async fetch(subjectId: string, modality: string, options: FetchOptions = {}) {
    this.calls++;
    this.active++;
    this.maxActive = Math.max(this.maxActive, this.active);
    try {
      return await this.handler(subjectId, modality, options);
    } finally {
      this.active--;
    }
  }
}

export function silenceConsole(): void {
  vi.spyOn(console, "log").mockImplementation(() => {});
  vi.spyOn(console, "warn").mockImplementation(() => {});
  vi.spyOn(console, "error").mockImplementation(() => {});
}

export function delay<T>(ms: number, value: T): Promise<T> {
  return new Promise((resolve) => setTimeout(() => resolve(value), ms));
}

export function reading(
  subjectId: string,
  value: Reading["value"],
  timestamp: string = "2026-01-01T00:00:00.000Z",
  modality: string = "heart_rate"
): Reading {
  return { subjectId, modality, timestamp, value };
}

/**
 * Built-in agents and sources plus a STUB kind backed by the given source
 */
export function createTestRuntime(stubs: StubSource[] = []) {
  const hub = new LocalEventHub();
  const log = new MemoryOutput();
  hub.subscribe(log);

  const sources: DataSourceRegistry = registerBuiltinSources(new DataSourceRegistry());
  sources.register("STUB", (id) => {
    const stub = stubs.find((candidate) => candidate.id === id);
    if (!stub) {
      throw new Error(`no stub source named ${id}`);
    }
    return stub;
  });

  return { hub, log, options: { hub, agents: registerBuiltinAgents(), sources } };
}

export function heartRateAgentConfig(
  agentId: string,
  sourceId: string,
  overrides: Record<string, unknown> = {}
) {
  return {
    agent_id: agentId,
    agent_class: "heart_rate_threshold",
    prediction_interval_seconds: 10,
    data_sources: { vitals: sourceId },
    config: { subjects: ["patient-001"], threshold: 120 },
    ...overrides,
  };
}

export function getIoTSource(manager: AgentManager, sourceId: string): IoTDataSource {
  const source = manager.getDataSource(sourceId);
  if (!(source instanceof IoTDataSource)) {
    throw new Error(`${sourceId} is not an IoT source`);
  }
  return source;
}
