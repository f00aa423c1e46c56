import type {
  EventHub,
  HealthEvent,
  Output,
  PublishAck,
  PublishOptions,
} from "./types.js";
import { PublishError, describeError } from "./errors.js";

/**
 * In-process event hub. Fans each event out to every registered output and
 * acks once at least one of them accepted it. Events from the same agent
 * are delivered in submission order.
 */
export class LocalEventHub implements EventHub {
  private readonly outputs = new Map<string, Output<HealthEvent>>();
  // Tail of the delivery chain per agent
  private readonly chains = new Map<string, Promise<unknown>>();

  subscribe(output: Output<HealthEvent>): void {
    if (this.outputs.has(output.id)) {
      throw new Error(`Output "${output.id}" is already subscribed`);
    }
    this.outputs.set(output.id, output);
  }

  unsubscribe(outputId: string): boolean {
    return this.outputs.delete(outputId);
  }

  get subscriberCount(): number {
    return this.outputs.size;
  }

  /**
   * Wait for pending deliveries, then release every output
   */
  async close(): Promise<void> {
    await Promise.all(this.chains.values());
    for (const output of this.outputs.values()) {
      await output.cleanup?.();
    }
    this.outputs.clear();
  }

  publish(event: HealthEvent, options: PublishOptions = {}): Promise<PublishAck> {
    const frozen = deepFreeze(structuredClone(event));
    const previous = this.chains.get(event.agentId) ?? Promise.resolve();
    const delivery = previous.then(() => this.deliver(frozen, options.signal));

    const tail = delivery.then(
      () => undefined,
      () => undefined
    );
    this.chains.set(event.agentId, tail);
    void tail.then(() => {
      if (this.chains.get(event.agentId) === tail) {
        this.chains.delete(event.agentId);
      }
    });

    return delivery;
  }

  private async deliver(event: HealthEvent, signal?: AbortSignal): Promise<PublishAck> {
    if (signal?.aborted) {
      throw new PublishError(event.id, "publish was cancelled");
    }

    const outputs = [...this.outputs.values()];
    if (outputs.length === 0) {
      throw new PublishError(event.id, "no outputs subscribed");
    }

    const results = await Promise.allSettled(
      outputs.map((output) => output.sendData(event, signal))
    );

    const deliveredTo: string[] = [];
    const failures: string[] = [];
    results.forEach((result, index) => {
      const output = outputs[index];
      if (result.status === "fulfilled") {
        deliveredTo.push(output.id);
      } else {
        failures.push(`${output.id}: ${describeError(result.reason)}`);
      }
    });

    if (failures.length > 0) {
      console.warn(`⚠️ Event ${event.id} not delivered to ${failures.join(", ")}`);
    }

    if (deliveredTo.length === 0) {
      throw new PublishError(event.id, `every output rejected it (${failures.join("; ")})`);
    }

    return { eventId: event.id, deliveredTo };
  }
}

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === "object" && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}
