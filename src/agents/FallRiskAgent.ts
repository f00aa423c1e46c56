import { z } from "zod";
import { BaseAgent } from "../core/BaseAgent.js";
import { formatIssues } from "../core/config.js";
import { ConfigureResult, HealthEvent, Severity } from "../core/types.js";

export const FallRiskWeightsSchema = z.object({
  intercept: z.number().default(-4),
  age: z.number().default(0.04),
  medication_count: z.number().default(0.25),
  avg_gait_speed: z.number().default(-1.5),
  gait_variability: z.number().default(6),
});

export const FallRiskSettingsSchema = z.object({
  subjects: z.array(z.string().min(1)).min(1),
  risk_threshold: z.number().gt(0).lte(1).default(0.75),
  clinical_source: z.string().min(1).default("clinical"),
  iot_source: z.string().min(1).default("iot"),
  gait_modality: z.string().min(1).default("gait"),
  weights: FallRiskWeightsSchema.default({}),
});

export type FallRiskSettings = z.infer<typeof FallRiskSettingsSchema>;
export type FallRiskWeights = z.infer<typeof FallRiskWeightsSchema>;

export const DEFAULT_FALL_RISK_WEIGHTS: FallRiskWeights = FallRiskWeightsSchema.parse({});

const PatientValueSchema = z.object({ age: z.number().nonnegative() }).passthrough();
const MedicationsValueSchema = z.array(z.unknown());
const GaitValueSchema = z
  .object({
    avg_gait_speed: z.number().nonnegative(),
    gait_variability: z.number().nonnegative(),
  })
  .passthrough();

export interface FallRiskFeatures {
  age: number;
  medicationCount: number;
  avgGaitSpeed: number;
  gaitVariability: number;
}

/**
 * Logistic fall-risk score over clinical and gait features
 */
export function fallRiskScore(features: FallRiskFeatures, weights: FallRiskWeights): number {
  const z =
    weights.intercept +
    weights.age * features.age +
    weights.medication_count * features.medicationCount +
    weights.avg_gait_speed * features.avgGaitSpeed +
    weights.gait_variability * features.gaitVariability;
  return 1 / (1 + Math.exp(-z));
}

/**
 * Combines clinical data (age, active medications) with IoT gait data and
 * raises an ALERT when the fall-risk score reaches the configured threshold.
 */
export class FallRiskAgent extends BaseAgent {
  static readonly agentClass = "fall_risk";

  private settings: FallRiskSettings | null = null;

  protected onConfigure(settings: Record<string, unknown>): ConfigureResult {
    const parsed = FallRiskSettingsSchema.safeParse(settings);
    if (!parsed.success) {
      return { ok: false, issues: formatIssues(parsed.error, "config") };
    }

    const issues = [parsed.data.clinical_source, parsed.data.iot_source]
      .map((name) => this.missingSource(name))
      .filter((issue): issue is string => issue !== null);
    if (issues.length > 0) {
      return { ok: false, issues };
    }

    this.settings = parsed.data;
    return { ok: true };
  }

  async evaluate(signal: AbortSignal): Promise<HealthEvent[]> {
    if (!this.settings) {
      throw new Error(`Agent "${this.id}" has not been configured`);
    }

    const events: HealthEvent[] = [];
    for (const subjectId of this.settings.subjects) {
      const features = await this.collectFeatures(subjectId, this.settings, signal);
      if (!features) {
        continue;
      }

      const score = fallRiskScore(features, this.settings.weights);
      console.log(`🔍 [${this.id}] Patient ${subjectId} fall risk score: ${score.toFixed(2)}`);

      if (score >= this.settings.risk_threshold) {
        events.push(
          this.createEvent(subjectId, Severity.ALERT, "high_fall_risk", {
            riskScore: Math.round(score * 10000) / 10000,
            threshold: this.settings.risk_threshold,
            age: features.age,
            medicationCount: features.medicationCount,
            avgGaitSpeed: features.avgGaitSpeed,
            gaitVariability: features.gaitVariability,
          })
        );
      }
    }
    return events;
  }

  private async collectFeatures(
    subjectId: string,
    settings: FallRiskSettings,
    signal: AbortSignal
  ): Promise<FallRiskFeatures | null> {
    const patient = await this.fetchReading(settings.clinical_source, subjectId, "patient", signal);
    const gait = await this.fetchReading(settings.iot_source, subjectId, settings.gait_modality, signal);
    if (!patient || !gait) {
      return null;
    }

    const demographics = PatientValueSchema.safeParse(patient.value);
    const gaitValue = GaitValueSchema.safeParse(gait.value);
    if (!demographics.success || !gaitValue.success) {
      console.warn(`⚠️ [${this.id}] Incomplete patient or gait data for ${subjectId}`);
      return null;
    }

    // No active medications on record counts as zero
    const medications = await this.fetchReading(
      settings.clinical_source,
      subjectId,
      "medications",
      signal
    );
    const medicationList = MedicationsValueSchema.safeParse(medications?.value);

    return {
      age: demographics.data.age,
      medicationCount: medicationList.success ? medicationList.data.length : 0,
      avgGaitSpeed: gaitValue.data.avg_gait_speed,
      gaitVariability: gaitValue.data.gait_variability,
    };
  }
}
