import type { HealthEvent, Output } from "../core/types.js";
import { Severity } from "../core/types.js";

const SEVERITY_ICONS: Record<Severity, string> = {
  [Severity.INFO]: "ℹ️",
  [Severity.WARNING]: "⚠️",
  [Severity.ALERT]: "🚨",
  [Severity.CRITICAL]: "🆘",
};

/**
 * Notification sink that prints each event to the console
 */
export class ConsoleOutput implements Output<HealthEvent> {
  id: string;
  name: string;
  description: string;

  constructor(
    id: string = "console-output",
    name: string = "Console Output",
    description: string = "Prints published events to the console"
  ) {
    this.id = id;
    this.name = name;
    this.description = description;
  }

  async sendData(event: HealthEvent): Promise<void> {
    console.log(formatEvent(event));
  }
}

export function formatEvent(event: HealthEvent): string {
  return `${SEVERITY_ICONS[event.severity]} [${event.severity}] ${event.category} for ${
    event.subjectId
  } from ${event.agentId} at ${event.timestamp}: ${JSON.stringify(event.payload)}`;
}
