import express from "express";
import { z } from "zod";
import {
  DEFAULT_FALL_RISK_WEIGHTS,
  FallRiskWeights,
  fallRiskScore,
} from "./agents/FallRiskAgent.js";
import { formatIssues } from "./core/config.js";
import { requireApiKey } from "./middleware.js";

export const FALL_RISK_SKILL = "predict_fall_risk";

export interface FallRiskServiceOptions {
  apiKey?: string;
  riskThreshold?: number;
  weights?: FallRiskWeights;
}

const TaskMessageSchema = z.object({
  task: z.object({
    id: z.string().min(1),
    skill_name: z.string().min(1),
    parameters: z.record(z.unknown()).default({}),
  }),
});

export const FallRiskTaskParametersSchema = z.object({
  patient_id: z.string().min(1),
  age: z.number().nonnegative(),
  avg_gait_speed: z.number().nonnegative(),
  gait_variability: z.number().nonnegative(),
  medication_list: z.array(z.string()).default([]),
});

const AGENT_CARD = {
  name: "Fall Risk Agent",
  description: "Scores a patient's fall risk from age, active medications and gait measurements",
  version: "1.0.0",
  capabilities: { streaming: false },
  authentication: { schemes: ["apiKey"], header: "X-API-Key" },
  skills: [
    {
      name: FALL_RISK_SKILL,
      description: "Predict whether a patient is at high risk of falling",
      parameters: {
        patient_id: { type: "string", required: true },
        age: { type: "number", required: true },
        avg_gait_speed: { type: "number", required: true, unit: "m/s" },
        gait_variability: { type: "number", required: true },
        medication_list: { type: "array", items: "string", required: false },
      },
    },
  ],
};

/**
 * Agent-to-agent surface for on-demand fall-risk predictions: a public agent
 * card for discovery and a task endpoint that runs the scoring skill.
 */
export function createFallRiskService(options: FallRiskServiceOptions = {}): express.Router {
  const riskThreshold = options.riskThreshold ?? 0.75;
  const weights = options.weights ?? DEFAULT_FALL_RISK_WEIGHTS;
  const router = express.Router();

  router.get("/.well-known/agent.json", (req, res) => {
    res.status(200).json({
      ...AGENT_CARD,
      url: `${req.protocol}://${req.get("host")}${req.baseUrl}`,
    });
  });

  router.post("/tasks/send", requireApiKey(options.apiKey), (req, res) => {
    const message = TaskMessageSchema.safeParse(req.body);
    if (!message.success) {
      res.status(400).json({ error: "Invalid task", issues: formatIssues(message.error) });
      return;
    }

    const { task } = message.data;
    if (task.skill_name !== FALL_RISK_SKILL) {
      res.status(404).json({ error: `Skill '${task.skill_name}' not found.` });
      return;
    }

    const parameters = FallRiskTaskParametersSchema.safeParse(task.parameters);
    if (!parameters.success) {
      res.status(400).json({
        error: "Invalid task parameters",
        issues: formatIssues(parameters.error, "parameters"),
      });
      return;
    }

    const { patient_id, age, avg_gait_speed, gait_variability, medication_list } = parameters.data;
    const score = fallRiskScore(
      {
        age,
        medicationCount: medication_list.length,
        avgGaitSpeed: avg_gait_speed,
        gaitVariability: gait_variability,
      },
      weights
    );
    const highRisk = score >= riskThreshold;
    console.log(`🔍 Task ${task.id}: patient ${patient_id} fall risk score ${score.toFixed(2)}`);

    res.status(200).json({
      task_id: task.id,
      status: "completed",
      result: {
        patient_id,
        risk_score: Math.round(score * 10000) / 10000,
        prediction_status: highRisk ? "High" : "Low",
        notification_message: highRisk
          ? `HIGH RISK ALERT: Patient ${patient_id} (${age} years old) has been identified as high risk for a fall. Consider immediate intervention.`
          : `Patient ${patient_id} (${age} years old) is currently low risk for a fall. Continue to monitor.`,
      },
    });
  });

  return router;
}
