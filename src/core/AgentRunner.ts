import cron, { type ScheduledTask } from "node-cron";
import type { RuntimePolicy } from "./config.js";
import { AgentFault } from "./errors.js";
import {
  Agent,
  AgentEventType,
  AgentFaultInfo,
  AgentLifecycleEvent,
  AgentState,
  AgentStatus,
  CycleOutcome,
} from "./types.js";

export interface AgentRunnerOptions {
  agent: Agent;
  agentClass: string;
  policy: RuntimePolicy;
  // When set, fire on this cron cadence instead of every agent.intervalMs
  cronSchedule?: string;
  notify: (event: AgentLifecycleEvent) => void;
}

/**
 * Drives one agent on its own schedule. Cycles never overlap: a firing that
 * arrives while the previous cycle is still running is skipped. After
 * policy.maxConsecutiveFaults failed cycles in a row the agent is suspended
 * and retried after an exponential backoff.
 */
export class AgentRunner {
  readonly agent: Agent;
  readonly agentClass: string;
  private readonly policy: RuntimePolicy;
  private readonly cronSchedule?: string;
  private readonly notify: (event: AgentLifecycleEvent) => void;

  private state = AgentState.CONFIGURED;
  private intervalTimer?: NodeJS.Timeout;
  private retryTimer?: NodeJS.Timeout;
  private cronTask?: ScheduledTask;
  private inFlight: Promise<void> | null = null;
  private cycleController: AbortController | null = null;

  private consecutiveFailures = 0;
  private suspensions = 0;
  private cycles = 0;
  private overruns = 0;
  private lastCycleAt: Date | null = null;
  private nextFireAt: Date | null = null;
  private lastFault: AgentFaultInfo | null = null;

  constructor(options: AgentRunnerOptions) {
    this.agent = options.agent;
    this.agentClass = options.agentClass;
    this.policy = options.policy;
    this.cronSchedule = options.cronSchedule;
    this.notify = options.notify;
  }

  get id(): string {
    return this.agent.id;
  }

  get currentState(): AgentState {
    return this.state;
  }

  /**
   * CONFIGURED -> RUNNING. Interval agents run their first cycle immediately;
   * cron agents wait for the first matching time.
   */
  start(): void {
    if (this.state !== AgentState.CONFIGURED) {
      console.warn(`⚠️ [${this.id}] Cannot start an agent that is ${this.state}`);
      return;
    }

    this.state = AgentState.RUNNING;
    this.emit(AgentEventType.AGENT_STARTED);
    console.log(`▶️ [${this.id}] Started (${this.describeCadence()})`);
    this.schedule(this.cronSchedule === undefined);
  }

  /**
   * Any state -> STOPPED. Cancels the pending firing right away, then waits
   * up to graceMs for an in-flight cycle. A cycle still running after that
   * is aborted and its result discarded.
   */
  async stop(graceMs: number = this.policy.shutdownGraceMs): Promise<void> {
    if (this.state === AgentState.STOPPED) {
      return;
    }

    this.state = AgentState.STOPPED;
    this.unschedule();
    clearTimeout(this.retryTimer);
    this.retryTimer = undefined;
    this.nextFireAt = null;

    const inFlight = this.inFlight;
    if (inFlight) {
      let graceTimer: NodeJS.Timeout | undefined;
      const expired = new Promise<false>((resolve) => {
        graceTimer = setTimeout(() => resolve(false), graceMs);
      });
      const finished = await Promise.race([inFlight.then(() => true as const), expired]);
      clearTimeout(graceTimer);

      if (!finished) {
        console.warn(`⚠️ [${this.id}] Cycle still running after ${graceMs}ms, abandoning it`);
        this.cycleController?.abort(new Error(`Agent "${this.id}" stopped`));
        this.cycleController = null;
        this.inFlight = null;
      }
    }

    this.emit(AgentEventType.AGENT_STOPPED);
    console.log(`⏹️ [${this.id}] Stopped`);
  }

  getStatus(): AgentStatus {
    return {
      agentId: this.id,
      agentClass: this.agentClass,
      state: this.state,
      intervalMs: this.agent.intervalMs,
      ...(this.cronSchedule !== undefined ? { cronSchedule: this.cronSchedule } : {}),
      consecutiveFailures: this.consecutiveFailures,
      suspensions: this.suspensions,
      cycles: this.cycles,
      overruns: this.overruns,
      lastCycleAt: this.lastCycleAt?.toISOString() ?? null,
      nextFireAt: this.nextFireAt?.toISOString() ?? null,
      lastFault: this.lastFault,
    };
  }

  private schedule(runNow: boolean): void {
    if (this.cronSchedule !== undefined) {
      if (this.cronTask) {
        this.cronTask.start();
      } else {
        this.cronTask = cron.schedule(this.cronSchedule, () => this.fire());
      }
    } else {
      this.intervalTimer = setInterval(() => this.fire(), this.agent.intervalMs);
      this.nextFireAt = new Date(Date.now() + this.agent.intervalMs);
    }

    if (runNow) {
      this.fire();
    }
  }

  private unschedule(): void {
    clearInterval(this.intervalTimer);
    this.intervalTimer = undefined;
    this.cronTask?.stop();
  }

  private fire(): void {
    if (this.state !== AgentState.RUNNING) {
      return;
    }

    if (this.cronSchedule === undefined) {
      this.nextFireAt = new Date(Date.now() + this.agent.intervalMs);
    }

    if (this.inFlight) {
      this.overruns++;
      console.warn(`⏱️ [${this.id}] Previous cycle still running, skipping this firing`);
      this.emit(AgentEventType.CYCLE_OVERRUN);
      return;
    }

    const controller = new AbortController();
    this.cycleController = controller;
    this.inFlight = this.runCycle(controller, new Date())
      .catch((error) => {
        console.error(`❌ [${this.id}] Cycle bookkeeping failed:`, error);
      })
      .finally(() => {
        if (this.cycleController === controller) {
          this.cycleController = null;
          this.inFlight = null;
        }
      });
  }

  private async runCycle(controller: AbortController, cycleAt: Date): Promise<void> {
    let outcome: CycleOutcome | null = null;
    let fault: AgentFault | null = null;

    try {
      outcome = await this.agent.runCycle(controller.signal);
    } catch (error) {
      fault = new AgentFault(this.id, cycleAt, error);
    }

    if (controller.signal.aborted) {
      console.warn(`🗑️ [${this.id}] Discarding result of abandoned cycle`);
      return;
    }

    this.cycles++;
    this.lastCycleAt = cycleAt;

    if (fault) {
      this.recordFailure(fault.message, fault);
    } else if (outcome && outcome.status !== "ok") {
      this.emit(AgentEventType.CYCLE_COMPLETED, { outcome });
      this.recordFailure(outcome.reason ?? outcome.status);
    } else if (outcome) {
      this.consecutiveFailures = 0;
      this.suspensions = 0;
      this.emit(AgentEventType.CYCLE_COMPLETED, { outcome });
    }
  }

  private recordFailure(reason: string, error?: Error): void {
    this.consecutiveFailures++;
    this.lastFault = { reason, at: new Date().toISOString() };
    console.error(
      `❌ [${this.id}] Cycle failed (${this.consecutiveFailures}/${this.policy.maxConsecutiveFaults}): ${reason}`
    );
    this.emit(AgentEventType.AGENT_ERROR, { error: error ?? new Error(reason) });

    if (
      this.state === AgentState.RUNNING &&
      this.consecutiveFailures >= this.policy.maxConsecutiveFaults
    ) {
      this.suspend();
    }
  }

  private suspend(): void {
    this.unschedule();
    this.state = AgentState.SUSPENDED;
    this.suspensions++;

    const backoffMs = Math.min(
      this.policy.backoffInitialMs * 2 ** (this.suspensions - 1),
      this.policy.backoffMaxMs
    );
    this.nextFireAt = new Date(Date.now() + backoffMs);
    console.warn(
      `⏸️ [${this.id}] Suspended after ${this.consecutiveFailures} failed cycles, retrying in ${backoffMs}ms`
    );
    this.emit(AgentEventType.AGENT_SUSPENDED, { backoffMs });

    this.retryTimer = setTimeout(() => this.resume(), backoffMs);
  }

  private resume(): void {
    this.retryTimer = undefined;
    if (this.state !== AgentState.SUSPENDED) {
      return;
    }

    this.state = AgentState.RUNNING;
    console.log(`🔄 [${this.id}] Resuming after backoff`);
    this.emit(AgentEventType.AGENT_RESUMED);
    this.schedule(true);
  }

  private describeCadence(): string {
    return this.cronSchedule !== undefined
      ? `cron "${this.cronSchedule}"`
      : `every ${this.agent.intervalMs}ms`;
  }

  private emit(
    type: AgentEventType,
    details: Pick<AgentLifecycleEvent, "outcome" | "error" | "backoffMs"> = {}
  ): void {
    // Listener errors are logged, never propagated
    try {
      this.notify({ type, agentId: this.id, timestamp: new Date(), ...details });
    } catch (error) {
      console.error(`❌ [${this.id}] Listener for ${type} threw:`, error);
    }
  }
}
