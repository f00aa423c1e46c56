import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { ConsoleOutput, formatEvent } from "../ConsoleOutput.js";
import { HttpOutput } from "../HttpOutput.js";
import { MemoryOutput } from "../MemoryOutput.js";
import { TimeoutError } from "../../core/errors.js";
import { HealthEvent, Severity } from "../../core/types.js";

function event(id: string, agentId = "hr-1"): HealthEvent {
  return {
    id,
    agentId,
    subjectId: "patient-001",
    severity: Severity.ALERT,
    category: "tachycardia",
    timestamp: "2026-01-01T00:00:00.000Z",
    payload: { observed: 125, threshold: 120 },
  };
}

describe("MemoryOutput", () => {
  it("keeps the newest events up to its capacity", async () => {
    const output = new MemoryOutput("log", 2);
    await output.sendData(event("e1"));
    await output.sendData(event("e2", "fall-1"));
    await output.sendData(event("e3"));

    expect(output.list().map((e) => e.id)).toEqual(["e2", "e3"]);
    expect(output.list(1).map((e) => e.id)).toEqual(["e3"]);
    expect(output.list(0)).toEqual([]);
    expect(output.forAgent("fall-1").map((e) => e.id)).toEqual(["e2"]);
  });

  it("rejects a non-positive capacity", () => {
    expect(() => new MemoryOutput("log", 0)).toThrow(
      "Memory output capacity must be a positive integer"
    );
  });
});

describe("ConsoleOutput", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("prints one line per event", async () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => {});

    await new ConsoleOutput().sendData(event("e1"));

    expect(log).toHaveBeenCalledWith(
      '🚨 [ALERT] tachycardia for patient-001 from hr-1 at 2026-01-01T00:00:00.000Z: {"observed":125,"threshold":120}'
    );
  });

  it("marks each severity", () => {
    expect(formatEvent({ ...event("e1"), severity: Severity.CRITICAL }).startsWith("🆘 [CRITICAL]")).toBe(
      true
    );
  });
});

describe("HttpOutput", () => {
  const fetchMock = vi.fn<typeof fetch>();

  beforeEach(() => {
    fetchMock.mockReset();
    vi.stubGlobal("fetch", fetchMock);
  });

  afterEach(() => {
    vi.useRealTimers();
    vi.unstubAllGlobals();
  });

  it("posts the event as JSON", async () => {
    fetchMock.mockResolvedValue(new Response(null, { status: 202 }));
    const output = new HttpOutput({
      url: "http://ingest.test/events",
      headers: { Authorization: "Bearer test-token" },
    });

    await output.sendData(event("e1"));

    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe("http://ingest.test/events");
    expect(init?.method).toBe("POST");
    expect(init?.headers).toEqual({
      "Content-Type": "application/json",
      Authorization: "Bearer test-token",
    });
    expect(typeof init?.body === "string" ? JSON.parse(init.body) : null).toEqual(event("e1"));
  });

  it("fails on an error response", async () => {
    fetchMock.mockResolvedValue(new Response("oops", { status: 500, statusText: "Internal Server Error" }));
    const output = new HttpOutput({ url: "http://ingest.test/events" });

    await expect(output.sendData(event("e1"))).rejects.toThrow(
      "Ingestion endpoint responded 500 Internal Server Error"
    );
  });

  it("gives up when the endpoint does not respond in time", async () => {
    vi.useFakeTimers();
    fetchMock.mockImplementation(() => new Promise<Response>(() => {}));
    const output = new HttpOutput({ url: "http://ingest.test/events", timeoutMs: 1_000 });

    const sending = output.sendData(event("e1"));
    const outcome = expect(sending).rejects.toBeInstanceOf(TimeoutError);
    await vi.advanceTimersByTimeAsync(1_000);

    await outcome;
    await expect(sending).rejects.toThrow("Ingestion endpoint did not respond within 1000ms");
  });

  it("rejects an invalid URL", () => {
    expect(() => new HttpOutput({ url: "not a url" })).toThrow(
      "Invalid ingestion endpoint URL: not a url"
    );
  });
});
