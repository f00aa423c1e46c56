import { EventEmitter } from "events";
import { ZodError } from "zod";
import { AgentRunner } from "./AgentRunner.js";
import { AgentConfig, RuntimePolicy, formatIssues, validateConfig } from "./config.js";
import { ConfigError, describeError } from "./errors.js";
import { AgentRegistry, DataSourceRegistry } from "./Registry.js";
import {
  Agent,
  AgentEventType,
  AgentLifecycleEvent,
  AgentState,
  AgentStatus,
  DataSource,
  EventHub,
} from "./types.js";

export interface AgentManagerOptions {
  // Shared by every agent for publishing
  hub: EventHub;
  agents: AgentRegistry;
  sources: DataSourceRegistry;
}

interface ManagedAgent {
  agent: Agent;
  config: AgentConfig;
  runner: AgentRunner | null;
  stopped: boolean;
}

/**
 * Builds agents from configuration, runs each one on its own schedule and
 * coordinates shutdown. Sole owner of every agent's schedule state.
 */
export class AgentManager {
  readonly policy: RuntimePolicy;
  private readonly managed = new Map<string, ManagedAgent>();
  private readonly dataSources = new Map<string, DataSource>();
  private readonly eventEmitter = new EventEmitter();

  /**
   * @throws ConfigError listing every violation found in the configuration
   */
  constructor(config: unknown, options: AgentManagerOptions) {
    const { config: validated, violations } = validateConfig(config, {
      agentClasses: options.agents.names(),
      sourceKinds: options.sources.names(),
    });
    this.policy = validated.policy;

    for (const [sourceId, sourceConfig] of Object.entries(validated.dataSources)) {
      const factory = options.sources.resolve(sourceConfig.source_type);
      if (!factory) {
        continue;
      }
      try {
        this.dataSources.set(sourceId, factory(sourceId, sourceConfig));
      } catch (error) {
        violations.push(
          ...(error instanceof ZodError
            ? formatIssues(error, `data_sources.${sourceId}`)
            : [`data_sources.${sourceId}: ${describeError(error)}`])
        );
      }
    }

    for (const agentConfig of validated.agents) {
      const factory = options.agents.resolve(agentConfig.agent_class);
      if (!factory) {
        violations.push(
          `agent "${agentConfig.agent_id}": agent_class "${agentConfig.agent_class}" is not registered`
        );
        continue;
      }

      const { sources, missing } = this.wireSources(agentConfig);
      if (missing.length > 0) {
        violations.push(
          ...missing.map(
            (sourceId) =>
              `agent "${agentConfig.agent_id}": data source "${sourceId}" could not be created`
          )
        );
        continue;
      }

      try {
        const agent = factory({
          agentId: agentConfig.agent_id,
          intervalMs: agentConfig.prediction_interval_seconds * 1000,
          sources,
          hub: options.hub,
          timeouts: {
            fetchMs: this.policy.fetchTimeoutMs,
            publishMs: this.policy.publishTimeoutMs,
          },
        });

        const result = agent.configure(agentConfig.config);
        if (result.ok) {
          this.managed.set(agent.id, { agent, config: agentConfig, runner: null, stopped: false });
        } else {
          violations.push(...result.issues.map((issue) => `agent "${agentConfig.agent_id}": ${issue}`));
        }
      } catch (error) {
        violations.push(`agent "${agentConfig.agent_id}": ${describeError(error)}`);
      }
    }

    if (violations.length > 0) {
      throw new ConfigError(violations);
    }

    console.log(
      `🔧 Configured ${this.managed.size} agent(s) over ${this.dataSources.size} data source(s)`
    );
  }

  /**
   * Start every configured agent on its own schedule. Resolves once all of
   * them are scheduled, whatever state they end up in.
   */
  async startAllAgents(): Promise<void> {
    for (const entry of this.managed.values()) {
      if (entry.runner || entry.stopped) {
        continue;
      }

      entry.runner = new AgentRunner({
        agent: entry.agent,
        agentClass: entry.config.agent_class,
        policy: this.policy,
        cronSchedule: entry.config.cron_schedule,
        notify: (event) => this.eventEmitter.emit(event.type, event),
      });
      entry.runner.start();
    }
  }

  /**
   * Stop every agent and wait, bounded by the grace timeout, for in-flight
   * cycles to finish
   */
  async stopAllAgents(graceMs: number = this.policy.shutdownGraceMs): Promise<void> {
    await Promise.all([...this.managed.keys()].map((agentId) => this.stopAgent(agentId, graceMs)));
  }

  async stopAgent(agentId: string, graceMs: number = this.policy.shutdownGraceMs): Promise<boolean> {
    const entry = this.managed.get(agentId);
    if (!entry) {
      return false;
    }

    entry.stopped = true;
    await entry.runner?.stop(graceMs);
    return true;
  }

  /**
   * Stop all agents, then release data source resources
   */
  async shutdown(graceMs: number = this.policy.shutdownGraceMs): Promise<void> {
    await this.stopAllAgents(graceMs);
    for (const source of this.dataSources.values()) {
      await source.cleanup?.();
    }
  }

  getAgentStatus(agentId: string): AgentStatus | null {
    const entry = this.managed.get(agentId);
    if (!entry) {
      return null;
    }
    if (entry.runner) {
      return entry.runner.getStatus();
    }

    return {
      agentId,
      agentClass: entry.config.agent_class,
      state: entry.stopped ? AgentState.STOPPED : AgentState.CONFIGURED,
      intervalMs: entry.agent.intervalMs,
      ...(entry.config.cron_schedule !== undefined
        ? { cronSchedule: entry.config.cron_schedule }
        : {}),
      consecutiveFailures: 0,
      suspensions: 0,
      cycles: 0,
      overruns: 0,
      lastCycleAt: null,
      nextFireAt: null,
      lastFault: null,
    };
  }

  listAgentStatuses(): AgentStatus[] {
    const statuses: AgentStatus[] = [];
    for (const agentId of this.managed.keys()) {
      const status = this.getAgentStatus(agentId);
      if (status) {
        statuses.push(status);
      }
    }
    return statuses;
  }

  getDataSource(sourceId: string): DataSource | undefined {
    return this.dataSources.get(sourceId);
  }

  /**
   * Subscribe to agent lifecycle events
   */
  on(eventType: AgentEventType, listener: (event: AgentLifecycleEvent) => void): this {
    this.eventEmitter.on(eventType, listener);
    return this;
  }

  off(eventType: AgentEventType, listener: (event: AgentLifecycleEvent) => void): this {
    this.eventEmitter.off(eventType, listener);
    return this;
  }

  // Sources that failed to build are reported against the agent as well
  private wireSources(agentConfig: AgentConfig): {
    sources: Record<string, DataSource>;
    missing: string[];
  } {
    const sources: Record<string, DataSource> = {};
    const missing: string[] = [];
    for (const [logical, sourceId] of Object.entries(agentConfig.data_sources)) {
      const source = this.dataSources.get(sourceId);
      if (source) {
        sources[logical] = source;
      } else {
        missing.push(sourceId);
      }
    }
    return { sources, missing };
  }
}
