import { z } from "zod";
import type { FetchOptions, IngestingDataSource, Reading } from "../core/types.js";
import { SourceUnavailableError } from "../core/errors.js";

export const IoTSourceConfigSchema = z.object({
  // Readings kept per subject/modality
  retention: z.number().int().positive().default(100),
});

export type IoTSourceConfig = z.input<typeof IoTSourceConfigSchema>;

/**
 * Source holding the latest readings pushed by devices or an edge gateway
 */
export class IoTDataSource implements IngestingDataSource {
  id: string;
  kind = "IOT";
  description: string;
  private readonly retention: number;
  private readonly readings = new Map<string, Reading[]>();

  constructor(id: string = "iot", config: IoTSourceConfig = {}) {
    this.id = id;
    this.retention = IoTSourceConfigSchema.parse(config).retention;
    this.description = `Latest device readings (last ${this.retention} per subject and modality)`;
  }

  /**
   * Store a reading, keeping each series ordered by timestamp
   */
  ingest(reading: Reading): void {
    const takenAt = Date.parse(reading.timestamp);
    if (Number.isNaN(takenAt)) {
      throw new Error(`Invalid reading timestamp: ${reading.timestamp}`);
    }

    const key = seriesKey(reading.subjectId, reading.modality);
    const series = this.readings.get(key) ?? [];

    let index = series.length;
    while (index > 0 && Date.parse(series[index - 1].timestamp) > takenAt) {
      index--;
    }
    series.splice(index, 0, structuredClone(reading));

    if (series.length > this.retention) {
      series.splice(0, series.length - this.retention);
    }
    this.readings.set(key, series);
  }

  async fetch(
    subjectId: string,
    modality: string,
    options: FetchOptions = {}
  ): Promise<Reading | null> {
    if (options.signal?.aborted) {
      throw new SourceUnavailableError(this.id, "request aborted");
    }

    const series = this.readings.get(seriesKey(subjectId, modality)) ?? [];
    const cutoff = options.asOf ? options.asOf.getTime() : Number.POSITIVE_INFINITY;

    for (let i = series.length - 1; i >= 0; i--) {
      if (Date.parse(series[i].timestamp) <= cutoff) {
        return structuredClone(series[i]);
      }
    }
    return null;
  }

  count(subjectId: string, modality: string): number {
    return this.readings.get(seriesKey(subjectId, modality))?.length ?? 0;
  }

  async cleanup(): Promise<void> {
    this.readings.clear();
  }
}

function seriesKey(subjectId: string, modality: string): string {
  return `${subjectId}\u0000${modality}`;
}
