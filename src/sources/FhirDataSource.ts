import { z } from "zod";
import type { DataSource, FetchOptions, JsonValue, Reading } from "../core/types.js";
import { SourceUnavailableError } from "../core/errors.js";
import { getJson } from "./http.js";

// LOINC codes for the vital-sign modalities agents ask for by name
export const DEFAULT_LOINC_CODES: Record<string, string> = {
  heart_rate: "8867-4",
  respiratory_rate: "9279-1",
  body_temperature: "8310-5",
  oxygen_saturation: "59408-5",
  body_weight: "29463-7",
};

export const FhirSourceConfigSchema = z.object({
  endpoint: z.string().url(),
  // Modality -> LOINC code, merged over the defaults
  codes: z.record(z.string()).default({}),
  headers: z.record(z.string()).default({}),
});

export type FhirSourceConfig = z.input<typeof FhirSourceConfigSchema>;

const CodeableConceptSchema = z
  .object({
    text: z.string().optional(),
    coding: z.array(z.object({ display: z.string().optional() }).passthrough()).optional(),
  })
  .passthrough();

const ObservationSchema = z
  .object({
    resourceType: z.literal("Observation"),
    effectiveDateTime: z.string().optional(),
    issued: z.string().optional(),
    valueQuantity: z
      .object({ value: z.number(), unit: z.string().optional() })
      .passthrough()
      .optional(),
    valueString: z.string().optional(),
    valueBoolean: z.boolean().optional(),
    valueInteger: z.number().int().optional(),
    valueCodeableConcept: CodeableConceptSchema.optional(),
  })
  .passthrough();

const PatientSchema = z
  .object({
    resourceType: z.literal("Patient"),
    birthDate: z.string().optional(),
    gender: z.string().optional(),
    meta: z.object({ lastUpdated: z.string().optional() }).passthrough().optional(),
  })
  .passthrough();

const MedicationStatementSchema = z
  .object({
    resourceType: z.literal("MedicationStatement"),
    medicationCodeableConcept: CodeableConceptSchema.optional(),
    effectiveDateTime: z.string().optional(),
  })
  .passthrough();

const BundleSchema = z
  .object({
    resourceType: z.literal("Bundle"),
    entry: z.array(z.object({ resource: z.unknown() }).passthrough()).default([]),
  })
  .passthrough();

/**
 * Source that reads observations, demographics and medications from a FHIR R4 server
 */
export class FhirDataSource implements DataSource {
  id: string;
  kind = "CLINICAL_FHIR";
  description: string;
  private readonly endpoint: string;
  private readonly codes: Record<string, string>;
  private readonly headers: Record<string, string>;

  constructor(id: string, config: FhirSourceConfig) {
    const parsed = FhirSourceConfigSchema.parse(config);
    this.id = id;
    this.endpoint = parsed.endpoint.replace(/\/+$/, "");
    this.codes = { ...DEFAULT_LOINC_CODES, ...parsed.codes };
    this.headers = { Accept: "application/fhir+json", ...parsed.headers };
    this.description = `FHIR server at ${this.endpoint}`;
  }

  async fetch(
    subjectId: string,
    modality: string,
    options: FetchOptions = {}
  ): Promise<Reading | null> {
    switch (modality) {
      case "patient":
        return this.fetchPatient(subjectId, options);
      case "medications":
        return this.fetchMedications(subjectId, options);
      default:
        return this.fetchObservation(subjectId, modality, options);
    }
  }

  private async fetchObservation(
    subjectId: string,
    modality: string,
    options: FetchOptions
  ): Promise<Reading | null> {
    // Unmapped modalities are taken as codes themselves
    const code = this.codes[modality] ?? modality;
    const params = new URLSearchParams({
      subject: `Patient/${subjectId}`,
      code,
      _sort: "-date",
      _count: "1",
    });
    if (options.asOf) {
      params.set("date", `le${options.asOf.toISOString()}`);
    }

    const observations = await this.search(
      `Observation?${params.toString()}`,
      ObservationSchema,
      options.signal
    );
    const observation = observations[0];
    if (!observation) {
      return null;
    }

    const value = observationValue(observation);
    if (value === null) {
      return null;
    }

    return {
      subjectId,
      modality,
      timestamp: observation.effectiveDateTime ?? observation.issued ?? new Date().toISOString(),
      value,
    };
  }

  private async fetchPatient(subjectId: string, options: FetchOptions): Promise<Reading | null> {
    const body = await getJson(
      this.id,
      `${this.endpoint}/Patient/${encodeURIComponent(subjectId)}`,
      { headers: this.headers, signal: options.signal }
    );
    if (body === null) {
      return null;
    }

    const patient = PatientSchema.safeParse(body);
    if (!patient.success) {
      throw new SourceUnavailableError(this.id, `unexpected Patient resource for ${subjectId}`);
    }

    const asOf = options.asOf ?? new Date();
    const { birthDate, gender } = patient.data;
    return {
      subjectId,
      modality: "patient",
      timestamp: patient.data.meta?.lastUpdated ?? asOf.toISOString(),
      value: {
        age: birthDate ? ageOn(birthDate, asOf) : null,
        gender: gender ?? null,
        birthDate: birthDate ?? null,
      },
    };
  }

  private async fetchMedications(
    subjectId: string,
    options: FetchOptions
  ): Promise<Reading | null> {
    const params = new URLSearchParams({
      subject: `Patient/${subjectId}`,
      status: "active",
    });
    const statements = await this.search(
      `MedicationStatement?${params.toString()}`,
      MedicationStatementSchema,
      options.signal
    );
    if (statements.length === 0) {
      return null;
    }

    const names = statements.map(
      (statement) => conceptText(statement.medicationCodeableConcept) ?? "unknown"
    );
    return {
      subjectId,
      modality: "medications",
      timestamp: (options.asOf ?? new Date()).toISOString(),
      value: names,
    };
  }

  private async search<T>(
    path: string,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    signal?: AbortSignal
  ): Promise<T[]> {
    const body = await getJson(this.id, `${this.endpoint}/${path}`, {
      headers: this.headers,
      signal,
    });
    if (body === null) {
      return [];
    }

    const bundle = BundleSchema.safeParse(body);
    if (!bundle.success) {
      throw new SourceUnavailableError(this.id, `expected a Bundle from ${path}`);
    }

    const resources: T[] = [];
    for (const entry of bundle.data.entry) {
      const resource = schema.safeParse(entry.resource);
      if (resource.success) {
        resources.push(resource.data);
      }
    }
    return resources;
  }
}

function observationValue(observation: z.infer<typeof ObservationSchema>): JsonValue {
  if (observation.valueQuantity) {
    return observation.valueQuantity.value;
  }
  if (observation.valueInteger !== undefined) {
    return observation.valueInteger;
  }
  if (observation.valueBoolean !== undefined) {
    return observation.valueBoolean;
  }
  if (observation.valueString !== undefined) {
    return observation.valueString;
  }
  return conceptText(observation.valueCodeableConcept) ?? null;
}

function conceptText(concept: z.infer<typeof CodeableConceptSchema> | undefined): string | undefined {
  return concept?.text ?? concept?.coding?.find((coding) => coding.display)?.display;
}

// Whole years between a FHIR date (YYYY, YYYY-MM or YYYY-MM-DD) and a reference date
export function ageOn(birthDate: string, on: Date): number | null {
  const match = /^(\d{4})(?:-(\d{2}))?(?:-(\d{2}))?$/.exec(birthDate);
  if (!match) {
    return null;
  }

  const year = Number(match[1]);
  const month = match[2] ? Number(match[2]) : 1;
  const day = match[3] ? Number(match[3]) : 1;

  let age = on.getUTCFullYear() - year;
  const beforeBirthday =
    on.getUTCMonth() + 1 < month ||
    (on.getUTCMonth() + 1 === month && on.getUTCDate() < day);
  if (beforeBirthday) {
    age--;
  }
  return age;
}
