import type { Server } from "http";
import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { createServer } from "../server.js";
import { AgentManager } from "../core/AgentManager.js";
import { Severity } from "../core/types.js";
import { MemoryOutput } from "../outputs/MemoryOutput.js";
import {
  createTestRuntime,
  getIoTSource,
  heartRateAgentConfig,
  silenceConsole,
} from "../core/__tests__/helpers.js";

describe("server", () => {
  let server: Server;
  let baseUrl: string;
  let manager: AgentManager;
  let log: MemoryOutput;

  beforeEach(async () => {
    silenceConsole();
    const runtime = createTestRuntime();
    log = runtime.log;
    manager = new AgentManager(
      {
        agents: [heartRateAgentConfig("hr-1", "IOT")],
        data_sources: {
          IOT: { source_type: "IOT" },
          FHIR: { source_type: "CLINICAL_FHIR", endpoint: "http://fhir.test/fhir" },
        },
      },
      runtime.options
    );

    const app = createServer({ manager, eventLog: log, apiKey: "test-secret" });
    server = await new Promise<Server>((resolve) => {
      const listening = app.listen(0, "127.0.0.1", () => resolve(listening));
    });
    const address = server.address();
    if (!address || typeof address === "string") {
      throw new Error("server is not listening on a TCP port");
    }
    baseUrl = `http://127.0.0.1:${address.port}`;
  });

  afterEach(async () => {
    await new Promise<void>((resolve, reject) =>
      server.close((error) => (error ? reject(error) : resolve()))
    );
    await manager.shutdown();
    vi.restoreAllMocks();
  });

  function postReading(sourceId: string, body: unknown, apiKey: string | null = "test-secret") {
    return fetch(`${baseUrl}/sources/${sourceId}/readings`, {
      method: "POST",
      headers: {
        "Content-Type": "application/json",
        ...(apiKey ? { "X-API-Key": apiKey } : {}),
      },
      body: typeof body === "string" ? body : JSON.stringify(body),
    });
  }

  const valid = {
    subjectId: "patient-001",
    modality: "heart_rate",
    timestamp: "2026-01-01T00:00:00.000Z",
    value: 125,
  };

  it("answers health checks", async () => {
    const response = await fetch(`${baseUrl}/health`);
    expect(response.status).toBe(200);
    expect(await response.text()).toBe("Agent manager is running");
  });

  it("lists agent statuses", async () => {
    const response = await fetch(`${baseUrl}/agents`);
    const body = await response.json();

    expect(response.status).toBe(200);
    expect(body).toEqual([expect.objectContaining({ agentId: "hr-1", state: "configured" })]);
  });

  it("reports a single agent or 404", async () => {
    const found = await fetch(`${baseUrl}/agents/hr-1`);
    expect(await found.json()).toMatchObject({ agentClass: "heart_rate_threshold" });

    const missing = await fetch(`${baseUrl}/agents/hr-9`);
    expect(missing.status).toBe(404);
    expect(await missing.json()).toEqual({ error: 'Agent "hr-9" not found' });
  });

  it("ingests readings into IoT sources", async () => {
    const response = await postReading("IOT", valid);

    expect(response.status).toBe(202);
    expect(await response.json()).toEqual({ accepted: true });
    expect(await getIoTSource(manager, "IOT").fetch("patient-001", "heart_rate")).toEqual(valid);
  });

  it("requires the API key", async () => {
    const response = await postReading("IOT", valid, "wrong-key");

    expect(response.status).toBe(401);
    expect(await response.json()).toEqual({ error: "Invalid API key" });
    expect(getIoTSource(manager, "IOT").count("patient-001", "heart_rate")).toBe(0);
  });

  it("rejects unknown and read-only sources", async () => {
    const unknown = await postReading("NOPE", valid);
    expect(unknown.status).toBe(404);
    expect(await unknown.json()).toEqual({ error: 'Data source "NOPE" not found' });

    const readOnly = await postReading("FHIR", valid);
    expect(readOnly.status).toBe(409);
    expect(await readOnly.json()).toEqual({ error: 'Data source "FHIR" does not accept readings' });
  });

  it("validates readings", async () => {
    const response = await postReading("IOT", { ...valid, timestamp: "yesterday", subjectId: "" });

    expect(response.status).toBe(400);
    expect(await response.json()).toEqual({
      error: "Invalid reading",
      issues: ["subjectId: String must contain at least 1 character(s)", "timestamp: Invalid datetime"],
    });
  });

  it("rejects malformed JSON", async () => {
    const response = await postReading("IOT", "{not json");

    expect(response.status).toBe(400);
    expect(await response.json()).toEqual({ error: "Malformed JSON body" });
  });

  it("serves recent events", async () => {
    await log.sendData({
      id: "e1",
      agentId: "hr-1",
      subjectId: "patient-001",
      severity: Severity.ALERT,
      category: "tachycardia",
      timestamp: "2026-01-01T00:00:00.000Z",
      payload: { observed: 125 },
    });

    const response = await fetch(`${baseUrl}/events?limit=5`);
    expect(await response.json()).toEqual([expect.objectContaining({ id: "e1", category: "tachycardia" })]);

    const invalid = await fetch(`${baseUrl}/events?limit=-1`);
    expect(invalid.status).toBe(400);
  });

  describe("fall-risk agent service", () => {
    function sendTask(task: unknown, apiKey: string | null = "test-secret") {
      return fetch(`${baseUrl}/agents/v1/fallrisk/tasks/send`, {
        method: "POST",
        headers: {
          "Content-Type": "application/json",
          ...(apiKey ? { "X-API-Key": apiKey } : {}),
        },
        body: JSON.stringify({ task }),
      });
    }

    const parameters = {
      patient_id: "patient-001",
      age: 85,
      avg_gait_speed: 0.6,
      gait_variability: 0.2,
      medication_list: ["a", "b", "c", "d", "e", "f"],
    };

    it("publishes its agent card without an API key", async () => {
      const response = await fetch(`${baseUrl}/agents/v1/fallrisk/.well-known/agent.json`);

      expect(response.status).toBe(200);
      expect(await response.json()).toMatchObject({
        name: "Fall Risk Agent",
        url: `${baseUrl}/agents/v1/fallrisk`,
        skills: [expect.objectContaining({ name: "predict_fall_risk" })],
      });
    });

    it("scores a high-risk patient on demand", async () => {
      const response = await sendTask({ id: "task-1", skill_name: "predict_fall_risk", parameters });

      expect(response.status).toBe(200);
      expect(await response.json()).toEqual({
        task_id: "task-1",
        status: "completed",
        result: {
          patient_id: "patient-001",
          risk_score: 0.7685,
          prediction_status: "High",
          notification_message:
            "HIGH RISK ALERT: Patient patient-001 (85 years old) has been identified as high risk for a fall. Consider immediate intervention.",
        },
      });
    });

    it("reports a low-risk patient", async () => {
      const response = await sendTask({
        id: "task-2",
        skill_name: "predict_fall_risk",
        parameters: { patient_id: "patient-002", age: 40, avg_gait_speed: 1.3, gait_variability: 0.05 },
      });

      expect(await response.json()).toEqual({
        task_id: "task-2",
        status: "completed",
        result: {
          patient_id: "patient-002",
          risk_score: 0.0171,
          prediction_status: "Low",
          notification_message:
            "Patient patient-002 (40 years old) is currently low risk for a fall. Continue to monitor.",
        },
      });
    });

    it("requires the API key for tasks", async () => {
      const response = await sendTask({ id: "task-1", skill_name: "predict_fall_risk", parameters }, null);

      expect(response.status).toBe(401);
      expect(await response.json()).toEqual({ error: "Invalid API key" });
    });

    it("rejects unknown skills", async () => {
      const response = await sendTask({ id: "task-3", skill_name: "plan_trip", parameters: {} });

      expect(response.status).toBe(404);
      expect(await response.json()).toEqual({ error: "Skill 'plan_trip' not found." });
    });

    it("validates task parameters", async () => {
      const { age, ...withoutAge } = parameters;
      expect(age).toBe(85);

      const response = await sendTask({ id: "task-4", skill_name: "predict_fall_risk", parameters: withoutAge });

      expect(response.status).toBe(400);
      expect(await response.json()).toEqual({
        error: "Invalid task parameters",
        issues: ["parameters.age: Required"],
      });
    });

    it("rejects a message without a task", async () => {
      const response = await fetch(`${baseUrl}/agents/v1/fallrisk/tasks/send`, {
        method: "POST",
        headers: { "Content-Type": "application/json", "X-API-Key": "test-secret" },
        body: JSON.stringify({}),
      });

      expect(response.status).toBe(400);
      expect(await response.json()).toEqual({ error: "Invalid task", issues: ["task: Required"] });
    });
  });
});
