import { z } from "zod";
import type { DataSource, FetchOptions, Reading } from "../core/types.js";
import { SourceUnavailableError } from "../core/errors.js";
import { getJson } from "./http.js";

export const DicomSourceConfigSchema = z.object({
  // DICOMweb service root, e.g. https://pacs.example.org/dicom-web
  endpoint: z.string().url(),
  headers: z.record(z.string()).default({}),
});

export type DicomSourceConfig = z.input<typeof DicomSourceConfigSchema>;

const TAGS = {
  studyDate: "00080020",
  studyTime: "00080030",
  modalitiesInStudy: "00080061",
  studyDescription: "00081030",
  studyInstanceUid: "0020000D",
} as const;

const AttributeSchema = z
  .object({
    vr: z.string().optional(),
    Value: z.array(z.unknown()).optional(),
  })
  .passthrough();

const StudiesSchema = z.array(z.record(AttributeSchema));

type StudyDataset = z.infer<typeof StudiesSchema>[number];

interface Study {
  studyInstanceUid: string;
  takenAt: Date;
  description: string | null;
  modalities: string[];
}

/**
 * Source that finds imaging studies through DICOMweb QIDO-RS.
 * The reading is the most recent study for the requested modality (CT, MR, ...).
 */
export class DicomDataSource implements DataSource {
  id: string;
  kind = "CLINICAL_DICOM";
  description: string;
  private readonly endpoint: string;
  private readonly headers: Record<string, string>;

  constructor(id: string, config: DicomSourceConfig) {
    const parsed = DicomSourceConfigSchema.parse(config);
    this.id = id;
    this.endpoint = parsed.endpoint.replace(/\/+$/, "");
    this.headers = { Accept: "application/dicom+json", ...parsed.headers };
    this.description = `DICOMweb service at ${this.endpoint}`;
  }

  async fetch(
    subjectId: string,
    modality: string,
    options: FetchOptions = {}
  ): Promise<Reading | null> {
    const params = new URLSearchParams({
      PatientID: subjectId,
      ModalitiesInStudy: modality,
    });
    if (options.asOf) {
      params.set("StudyDate", `-${dicomDate(options.asOf)}`);
    }

    const body = await getJson(this.id, `${this.endpoint}/studies?${params.toString()}`, {
      headers: this.headers,
      signal: options.signal,
    });
    if (body === null) {
      return null;
    }

    const datasets = StudiesSchema.safeParse(body);
    if (!datasets.success) {
      throw new SourceUnavailableError(this.id, "unexpected QIDO-RS response");
    }

    const cutoff = options.asOf?.getTime() ?? Number.POSITIVE_INFINITY;
    const latest = datasets.data
      .map(toStudy)
      .filter((study): study is Study => study !== null && study.takenAt.getTime() <= cutoff)
      .sort((a, b) => b.takenAt.getTime() - a.takenAt.getTime())[0];

    if (!latest) {
      return null;
    }

    return {
      subjectId,
      modality,
      timestamp: latest.takenAt.toISOString(),
      value: {
        studyInstanceUid: latest.studyInstanceUid,
        description: latest.description,
        modalities: latest.modalities,
      },
    };
  }
}

function toStudy(dataset: StudyDataset): Study | null {
  const uid = firstString(dataset, TAGS.studyInstanceUid);
  const date = firstString(dataset, TAGS.studyDate);
  if (!uid || !date) {
    return null;
  }

  const takenAt = parseDicomDateTime(date, firstString(dataset, TAGS.studyTime));
  if (!takenAt) {
    return null;
  }

  return {
    studyInstanceUid: uid,
    takenAt,
    description: firstString(dataset, TAGS.studyDescription) ?? null,
    modalities: (dataset[TAGS.modalitiesInStudy]?.Value ?? []).filter(
      (value): value is string => typeof value === "string"
    ),
  };
}

function firstString(dataset: StudyDataset, tag: string): string | undefined {
  const value = dataset[tag]?.Value?.[0];
  return typeof value === "string" ? value : undefined;
}

// DA is YYYYMMDD, TM is HHMMSS[.FFFFFF]; both read as UTC
export function parseDicomDateTime(date: string, time?: string): Date | null {
  const d = /^(\d{4})(\d{2})(\d{2})$/.exec(date);
  if (!d) {
    return null;
  }
  const t = /^(\d{2})(\d{2})?(\d{2})?/.exec(time ?? "");
  const [hours, minutes, seconds] = t
    ? [Number(t[1]), Number(t[2] ?? 0), Number(t[3] ?? 0)]
    : [0, 0, 0];

  return new Date(
    Date.UTC(Number(d[1]), Number(d[2]) - 1, Number(d[3]), hours, minutes, seconds)
  );
}

function dicomDate(date: Date): string {
  return date.toISOString().slice(0, 10).replace(/-/g, "");
}
