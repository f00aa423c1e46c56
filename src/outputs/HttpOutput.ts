import type { HealthEvent, Output } from "../core/types.js";
import { TimeoutError } from "../core/errors.js";
import { withTimeout } from "../utils/timeout.js";

export interface HttpOutputConfig {
  url: string;
  timeoutMs?: number;
  headers?: Record<string, string>;
}

/**
 * Output that POSTs each event as JSON to an HTTP ingestion endpoint
 */
export class HttpOutput implements Output<HealthEvent> {
  id: string;
  name: string;
  description: string;
  private readonly config: Required<HttpOutputConfig>;

  constructor(config: HttpOutputConfig, id: string = "http-output") {
    let url: URL;
    try {
      url = new URL(config.url);
    } catch {
      throw new Error(`Invalid ingestion endpoint URL: ${config.url}`);
    }

    this.id = id;
    this.name = "HTTP Output";
    this.description = `Posts events to ${url.origin}${url.pathname}`;
    this.config = {
      url: url.toString(),
      timeoutMs: config.timeoutMs ?? 5000,
      headers: config.headers ?? {},
    };
  }

  async sendData(event: HealthEvent, signal?: AbortSignal): Promise<void> {
    const { url, timeoutMs, headers } = this.config;

    const response = await withTimeout(
      (requestSignal) =>
        fetch(url, {
          method: "POST",
          headers: { "Content-Type": "application/json", ...headers },
          body: JSON.stringify(event),
          signal: requestSignal,
        }),
      timeoutMs,
      {
        signal,
        onTimeout: () => new TimeoutError(`Ingestion endpoint did not respond within ${timeoutMs}ms`),
      }
    );

    if (!response.ok) {
      throw new Error(
        `Ingestion endpoint responded ${response.status} ${response.statusText}`.trim()
      );
    }
  }
}
