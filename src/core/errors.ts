/**
 * Error taxonomy for the agent runtime
 */

export class AgentRuntimeError extends Error {
  public readonly code: string;

  constructor(message: string, code: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "AgentRuntimeError";
    this.code = code;
  }
}

/**
 * Invalid or incomplete configuration. Carries every violation found.
 */
export class ConfigError extends AgentRuntimeError {
  public readonly violations: string[];

  constructor(violations: string[]) {
    super(
      `Invalid agent configuration (${violations.length} violation${
        violations.length === 1 ? "" : "s"
      }):\n${violations.map((v) => `  - ${v}`).join("\n")}`,
      "CONFIG_ERROR"
    );
    this.name = "ConfigError";
    this.violations = violations;
  }
}

/**
 * A data source timed out or its transport failed.
 * Retried on the agent's next scheduled cycle, never within the same one.
 */
export class SourceUnavailableError extends AgentRuntimeError {
  public readonly sourceId: string;

  constructor(sourceId: string, message: string, options?: { cause?: unknown }) {
    super(`Data source "${sourceId}" unavailable: ${message}`, "SOURCE_UNAVAILABLE", options);
    this.name = "SourceUnavailableError";
    this.sourceId = sourceId;
  }
}

/**
 * The event hub could not hand an event to any delivery mechanism.
 */
export class PublishError extends AgentRuntimeError {
  public readonly eventId: string;

  constructor(eventId: string, message: string, options?: { cause?: unknown }) {
    super(`Failed to publish event ${eventId}: ${message}`, "PUBLISH_ERROR", options);
    this.name = "PublishError";
    this.eventId = eventId;
  }
}

/**
 * Unexpected exception raised while an agent was evaluating.
 */
export class AgentFault extends AgentRuntimeError {
  public readonly agentId: string;
  public readonly cycleAt: Date;

  constructor(agentId: string, cycleAt: Date, cause: unknown) {
    super(
      `Agent "${agentId}" faulted during cycle at ${cycleAt.toISOString()}: ${describeError(cause)}`,
      "AGENT_FAULT",
      { cause }
    );
    this.name = "AgentFault";
    this.agentId = agentId;
    this.cycleAt = cycleAt;
  }
}

export class TimeoutError extends AgentRuntimeError {
  constructor(message: string) {
    super(message, "TIMEOUT");
    this.name = "TimeoutError";
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
