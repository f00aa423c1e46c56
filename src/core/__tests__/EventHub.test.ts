import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { LocalEventHub } from "../EventHub.js";
import { PublishError } from "../errors.js";
import { HealthEvent, Output, Severity } from "../types.js";
import { MemoryOutput } from "../../outputs/MemoryOutput.js";
import { silenceConsole } from "./helpers.js";

function event(agentId: string, seq: number): HealthEvent {
  return {
    id: `${agentId}-${seq}`,
    agentId,
    subjectId: "patient-001",
    severity: Severity.ALERT,
    category: "tachycardia",
    timestamp: "2026-01-01T00:00:00.000Z",
    payload: { seq, observed: 130 },
  };
}

class FailingOutput implements Output<HealthEvent> {
  name = "Failing Output";
  description = "Rejects everything";

  constructor(public id: string) {}

  async sendData(): Promise<void> {
    throw new Error("sink offline");
  }
}

describe("LocalEventHub", () => {
  let hub: LocalEventHub;
  let log: MemoryOutput;

  beforeEach(() => {
    silenceConsole();
    hub = new LocalEventHub();
    log = new MemoryOutput("log");
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("acks with the outputs that accepted the event", async () => {
    hub.subscribe(log);
    hub.subscribe(new MemoryOutput("audit"));

    const ack = await hub.publish(event("hr-1", 1));

    expect(ack).toEqual({ eventId: "hr-1-1", deliveredTo: ["log", "audit"] });
    expect(log.list()).toHaveLength(1);
  });

  it("fails when no output is subscribed", async () => {
    await expect(hub.publish(event("hr-1", 1))).rejects.toThrow(
      "Failed to publish event hr-1-1: no outputs subscribed"
    );
  });

  it("acks when at least one output accepts", async () => {
    hub.subscribe(new FailingOutput("pager"));
    hub.subscribe(log);

    const ack = await hub.publish(event("hr-1", 1));

    expect(ack.deliveredTo).toEqual(["log"]);
  });

  it("fails when every output rejects", async () => {
    hub.subscribe(new FailingOutput("pager"));

    const publishing = hub.publish(event("hr-1", 1));

    await expect(publishing).rejects.toBeInstanceOf(PublishError);
    await expect(publishing).rejects.toThrow("every output rejected it (pager: sink offline)");
  });

  it("rejects publishing with an already aborted signal", async () => {
    hub.subscribe(log);
    const controller = new AbortController();
    controller.abort();

    await expect(hub.publish(event("hr-1", 1), { signal: controller.signal })).rejects.toThrow(
      "publish was cancelled"
    );
    expect(log.list()).toEqual([]);
  });

  it("delivers frozen copies of published events", async () => {
    hub.subscribe(log);
    const original = event("hr-1", 1);

    await hub.publish(original);
    original.payload.observed = 999;

    const [delivered] = log.list();
    expect(delivered.payload.observed).toBe(130);
    expect(Object.isFrozen(delivered)).toBe(true);
    expect(Object.isFrozen(delivered.payload)).toBe(true);
  });

  it("keeps every event from 5 concurrent agents, in order per agent", async () => {
    // Earlier events take longer so unordered delivery would reorder them
    const slow: Output<HealthEvent> = {
      id: "slow",
      name: "Slow Output",
      description: "Delivers with a delay",
      sendData: async (e) => {
        const seq = Number(e.payload.seq);
        await new Promise((resolve) => setTimeout(resolve, (4 - seq) * 3));
        await log.sendData(e);
      },
    };
    hub.subscribe(slow);

    const agents = ["a1", "a2", "a3", "a4", "a5"];
    const publishes: Promise<unknown>[] = [];
    for (let seq = 1; seq <= 3; seq++) {
      for (const agentId of agents) {
        publishes.push(hub.publish(event(agentId, seq)));
      }
    }
    await Promise.all(publishes);

    expect(log.list()).toHaveLength(15);
    for (const agentId of agents) {
      expect(log.forAgent(agentId).map((e) => e.payload.seq)).toEqual([1, 2, 3]);
    }
  });

  it("keeps delivering an agent's later events after one fails", async () => {
    let failNext = true;
    hub.subscribe({
      id: "flaky",
      name: "Flaky Output",
      description: "Fails once",
      sendData: async (e) => {
        if (failNext) {
          failNext = false;
          throw new Error("hiccup");
        }
        await log.sendData(e);
      },
    });

    const first = hub.publish(event("hr-1", 1));
    const second = hub.publish(event("hr-1", 2));

    await expect(first).rejects.toBeInstanceOf(PublishError);
    await expect(second).resolves.toEqual({ eventId: "hr-1-2", deliveredTo: ["flaky"] });
    expect(log.list().map((e) => e.id)).toEqual(["hr-1-2"]);
  });

  it("rejects subscribing the same output twice", () => {
    hub.subscribe(log);
    expect(() => hub.subscribe(log)).toThrow('Output "log" is already subscribed');
  });

  it("cleans up outputs on close", async () => {
    hub.subscribe(log);
    await hub.publish(event("hr-1", 1));

    await hub.close();

    expect(log.list()).toEqual([]);
    expect(hub.subscriberCount).toBe(0);
  });
});
