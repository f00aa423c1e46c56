import { z } from "zod";
import { BaseAgent } from "../core/BaseAgent.js";
import { formatIssues } from "../core/config.js";
import {
  ConfigureResult,
  HealthEvent,
  JsonValue,
  Severity,
} from "../core/types.js";

export const HeartRateSettingsSchema = z
  .object({
    subjects: z.array(z.string().min(1)).min(1),
    // Beats per minute at or above which an alert is raised
    threshold: z.number().positive(),
    low_threshold: z.number().positive().optional(),
    modality: z.string().min(1).default("heart_rate"),
    source: z.string().min(1).default("vitals"),
  })
  .refine((s) => s.low_threshold === undefined || s.low_threshold < s.threshold, {
    message: "low_threshold must be below threshold",
    path: ["low_threshold"],
  });

export type HeartRateSettings = z.infer<typeof HeartRateSettingsSchema>;

/**
 * Threshold agent: raises an ALERT when a subject's latest heart rate is at
 * or above the threshold, or at or below the optional low threshold.
 */
export class HeartRateAgent extends BaseAgent {
  static readonly agentClass = "heart_rate_threshold";

  private settings: HeartRateSettings | null = null;

  protected onConfigure(settings: Record<string, unknown>): ConfigureResult {
    const parsed = HeartRateSettingsSchema.safeParse(settings);
    if (!parsed.success) {
      return { ok: false, issues: formatIssues(parsed.error, "config") };
    }

    const missing = this.missingSource(parsed.data.source);
    if (missing) {
      return { ok: false, issues: [missing] };
    }

    this.settings = parsed.data;
    return { ok: true };
  }

  async evaluate(signal: AbortSignal): Promise<HealthEvent[]> {
    if (!this.settings) {
      throw new Error(`Agent "${this.id}" has not been configured`);
    }

    const { subjects, modality, source, threshold, low_threshold } = this.settings;
    const events: HealthEvent[] = [];

    for (const subjectId of subjects) {
      const reading = await this.fetchReading(source, subjectId, modality, signal);
      if (!reading) {
        continue;
      }

      const bpm = beatsPerMinute(reading.value);
      if (bpm === null) {
        console.warn(`⚠️ [${this.id}] Non-numeric ${modality} reading for ${subjectId}`);
        continue;
      }

      if (bpm >= threshold) {
        events.push(
          this.createEvent(subjectId, Severity.ALERT, "tachycardia", {
            modality,
            observed: bpm,
            threshold,
            readingTimestamp: reading.timestamp,
          })
        );
      } else if (low_threshold !== undefined && bpm <= low_threshold) {
        events.push(
          this.createEvent(subjectId, Severity.ALERT, "bradycardia", {
            modality,
            observed: bpm,
            threshold: low_threshold,
            readingTimestamp: reading.timestamp,
          })
        );
      }
    }

    return events;
  }
}

// Readings carry either a bare number or { bpm } / { value }
function beatsPerMinute(value: JsonValue): number | null {
  if (typeof value === "number") {
    return Number.isFinite(value) ? value : null;
  }
  if (value !== null && typeof value === "object" && !Array.isArray(value)) {
    const candidate = value.bpm ?? value.value;
    return typeof candidate === "number" && Number.isFinite(candidate) ? candidate : null;
  }
  return null;
}
