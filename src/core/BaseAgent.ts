import { randomUUID } from "crypto";
import {
  Agent,
  AgentContext,
  AgentState,
  AgentTimeouts,
  ConfigureResult,
  CycleOutcome,
  DataSource,
  EventHub,
  HealthEvent,
  JsonObject,
  PublishAck,
  Reading,
  Severity,
} from "./types.js";
import { PublishError, SourceUnavailableError, describeError } from "./errors.js";
import { withTimeout } from "../utils/timeout.js";

/**
 * Base implementation of an Agent that other agents can extend
 */
export abstract class BaseAgent implements Agent {
  readonly id: string;
  readonly intervalMs: number;
  protected readonly sources: Record<string, DataSource>;
  protected readonly hub: EventHub;
  protected readonly timeouts: AgentTimeouts;
  protected state: AgentState = AgentState.CREATED;

  // Sources that failed during the current cycle
  private unavailable: string[] = [];

  constructor(context: AgentContext) {
    this.id = context.agentId;
    this.intervalMs = context.intervalMs;
    this.sources = context.sources;
    this.hub = context.hub;
    this.timeouts = context.timeouts;
  }

  /**
   * Apply settings from configuration. Moves the agent to CONFIGURED on success.
   */
  configure(settings: Record<string, unknown>): ConfigureResult {
    const result = this.onConfigure(settings);
    if (result.ok) {
      this.state = AgentState.CONFIGURED;
    }
    return result;
  }

  get isConfigured(): boolean {
    return this.state === AgentState.CONFIGURED;
  }

  /**
   * Hook for subclasses to validate and store their settings
   */
  protected abstract onConfigure(settings: Record<string, unknown>): ConfigureResult;

  /**
   * Pull readings and apply the decision rule.
   * Must be deterministic given identical readings.
   */
  abstract evaluate(signal: AbortSignal): Promise<HealthEvent[]>;

  /**
   * Run one cycle: evaluate, then publish each event in order.
   * Errors other than unavailable sources and publish failures propagate.
   */
  async runCycle(signal: AbortSignal): Promise<CycleOutcome> {
    if (!this.isConfigured) {
      throw new Error(`Agent "${this.id}" has not been configured`);
    }

    this.unavailable = [];
    const events = await this.evaluate(signal);
    const acks: PublishAck[] = [];

    for (const event of events) {
      if (signal.aborted) {
        break;
      }

      try {
        acks.push(
          await withTimeout(
            (publishSignal) => this.hub.publish(event, { signal: publishSignal }),
            this.timeouts.publishMs,
            {
              signal,
              onTimeout: () =>
                new PublishError(event.id, `no ack within ${this.timeouts.publishMs}ms`),
            }
          )
        );
      } catch (error) {
        const failure =
          error instanceof PublishError
            ? error
            : new PublishError(event.id, describeError(error), { cause: error });
        console.error(`❌ [${this.id}] ${failure.message}`);
        return { status: "publish_failed", events, acks, reason: failure.message };
      }
    }

    if (this.unavailable.length > 0) {
      return {
        status: "unavailable",
        events,
        acks,
        reason: this.unavailable.join("; "),
      };
    }

    return { status: "ok", events, acks };
  }

  /**
   * Fetch the latest reading from a wired source. NotFound and unavailable
   * sources both resolve to null; the latter marks the cycle as failed.
   */
  protected async fetchReading(
    sourceName: string,
    subjectId: string,
    modality: string,
    signal: AbortSignal,
    asOf?: Date
  ): Promise<Reading | null> {
    const source = this.sources[sourceName];
    if (!source) {
      throw new Error(`Data source "${sourceName}" is not wired to agent "${this.id}"`);
    }

    const timeoutMs = this.timeouts.fetchMs;

    try {
      const reading = await withTimeout(
        (fetchSignal) =>
          source.fetch(subjectId, modality, { asOf, timeoutMs, signal: fetchSignal }),
        timeoutMs,
        {
          signal,
          onTimeout: () =>
            new SourceUnavailableError(source.id, `no response within ${timeoutMs}ms`),
        }
      );

      if (!reading) {
        console.log(`🔍 [${this.id}] No ${modality} reading for ${subjectId} in ${source.id}`);
        return null;
      }

      return reading;
    } catch (error) {
      if (error instanceof SourceUnavailableError) {
        console.warn(`⚠️ [${this.id}] ${error.message}`);
        this.unavailable.push(error.message);
        return null;
      }
      throw error;
    }
  }

  protected createEvent(
    subjectId: string,
    severity: Severity,
    category: string,
    payload: JsonObject
  ): HealthEvent {
    return {
      id: randomUUID(),
      agentId: this.id,
      subjectId,
      severity,
      category,
      timestamp: new Date().toISOString(),
      payload,
    };
  }

  /**
   * Issue for a logical source the agent needs but the configuration didn't wire
   */
  protected missingSource(name: string): string | null {
    return name in this.sources
      ? null
      : `data source "${name}" is not wired (add it to the agent's data_sources)`;
  }
}
