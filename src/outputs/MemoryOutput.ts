import type { HealthEvent, Output } from "../core/types.js";

/**
 * Output that keeps the most recent events in memory
 */
export class MemoryOutput implements Output<HealthEvent> {
  id: string;
  name: string;
  description: string;
  private readonly capacity: number;
  private events: HealthEvent[] = [];

  constructor(
    id: string = "memory-output",
    capacity: number = 1000,
    name: string = "Memory Output",
    description: string = "Keeps recently published events in memory"
  ) {
    if (!Number.isInteger(capacity) || capacity <= 0) {
      throw new Error("Memory output capacity must be a positive integer");
    }
    this.id = id;
    this.capacity = capacity;
    this.name = name;
    this.description = description;
  }

  async sendData(event: HealthEvent): Promise<void> {
    this.events.push(event);
    if (this.events.length > this.capacity) {
      this.events.splice(0, this.events.length - this.capacity);
    }
  }

  /**
   * Recorded events, oldest first. With a limit, only the newest ones.
   */
  list(limit?: number): HealthEvent[] {
    if (limit === undefined) {
      return [...this.events];
    }
    return limit > 0 ? this.events.slice(-limit) : [];
  }

  forAgent(agentId: string): HealthEvent[] {
    return this.events.filter((event) => event.agentId === agentId);
  }

  clear(): void {
    this.events = [];
  }

  async cleanup(): Promise<void> {
    this.clear();
  }
}
