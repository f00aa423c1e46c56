/**
 * Core types for the healthcare agent runtime
 */

export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

export type JsonObject = { [key: string]: JsonValue };

// One timestamped observation for a subject/modality
export interface Reading {
  subjectId: string;
  modality: string;
  timestamp: string; // ISO-8601
  value: JsonValue;
}

export enum Severity {
  INFO = "INFO",
  WARNING = "WARNING",
  ALERT = "ALERT",
  CRITICAL = "CRITICAL",
}

// A published notification describing a detected condition
export interface HealthEvent {
  id: string;
  agentId: string;
  subjectId: string;
  severity: Severity;
  category: string;
  timestamp: string; // ISO-8601
  payload: JsonObject;
}

export interface FetchOptions {
  // Return the newest reading taken at or before this instant
  asOf?: Date;
  timeoutMs?: number;
  signal?: AbortSignal;
}

// Read-only capability for subject-scoped readings.
// Resolves null when no data exists; rejects with SourceUnavailableError on
// timeout or transport failure.
export interface DataSource {
  id: string;
  kind: string;
  description: string;

  fetch(
    subjectId: string,
    modality: string,
    options?: FetchOptions
  ): Promise<Reading | null>;

  // Cleanup resources
  cleanup?(): Promise<void>;
}

// Sources that accept readings pushed to them (device gateways, ingestion)
export interface IngestingDataSource extends DataSource {
  ingest(reading: Reading): void;
}

export function canIngest(source: DataSource): source is IngestingDataSource {
  return "ingest" in source && typeof source.ingest === "function";
}

// Base interface for all event subscribers
export interface Output<T> {
  id: string;
  name: string;
  description: string;

  // Deliver data to the output
  sendData(data: T, signal?: AbortSignal): Promise<void>;

  // Cleanup resources
  cleanup?(): Promise<void>;
}

export interface PublishAck {
  eventId: string;
  deliveredTo: string[];
}

export interface PublishOptions {
  signal?: AbortSignal;
}

// Write-side capability shared by every agent
export interface EventHub {
  publish(event: HealthEvent, options?: PublishOptions): Promise<PublishAck>;
}

export type ConfigureResult = { ok: true } | { ok: false; issues: string[] };

export type CycleStatus = "ok" | "unavailable" | "publish_failed";

export interface CycleOutcome {
  status: CycleStatus;
  events: HealthEvent[];
  acks: PublishAck[];
  // Set for failed cycles
  reason?: string;
}

// Base interface for all agents
export interface Agent {
  id: string;
  intervalMs: number;

  // Apply the free-form settings from configuration
  configure(settings: Record<string, unknown>): ConfigureResult;

  // Pull readings, apply the decision rule, return the events to publish
  evaluate(signal: AbortSignal): Promise<HealthEvent[]>;

  // One full cycle: evaluate, then publish in order
  runCycle(signal: AbortSignal): Promise<CycleOutcome>;
}

export interface AgentTimeouts {
  fetchMs: number;
  publishMs: number;
}

// Everything an agent factory receives from the manager
export interface AgentContext {
  agentId: string;
  intervalMs: number;
  sources: Record<string, DataSource>;
  hub: EventHub;
  timeouts: AgentTimeouts;
}

export type AgentFactory = (context: AgentContext) => Agent;

export enum AgentState {
  CREATED = "created",
  CONFIGURED = "configured",
  RUNNING = "running",
  SUSPENDED = "suspended",
  STOPPED = "stopped",
}

export interface AgentFaultInfo {
  reason: string;
  at: string;
}

export interface AgentStatus {
  agentId: string;
  agentClass: string;
  state: AgentState;
  intervalMs: number;
  cronSchedule?: string;
  consecutiveFailures: number;
  suspensions: number;
  cycles: number;
  overruns: number;
  lastCycleAt: string | null;
  nextFireAt: string | null;
  lastFault: AgentFaultInfo | null;
}

// Event types for the agent lifecycle
export enum AgentEventType {
  AGENT_STARTED = "agent_started",
  AGENT_STOPPED = "agent_stopped",
  AGENT_SUSPENDED = "agent_suspended",
  AGENT_RESUMED = "agent_resumed",
  AGENT_ERROR = "agent_error",
  CYCLE_COMPLETED = "cycle_completed",
  CYCLE_OVERRUN = "cycle_overrun",
}

export interface AgentLifecycleEvent {
  type: AgentEventType;
  agentId: string;
  timestamp: Date;
  outcome?: CycleOutcome;
  error?: Error;
  // Milliseconds until the next retry, for suspensions
  backoffMs?: number;
}
