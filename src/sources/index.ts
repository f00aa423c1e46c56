import { DataSourceRegistry } from "../core/Registry.js";
import { DicomDataSource, DicomSourceConfigSchema } from "./DicomDataSource.js";
import { FhirDataSource, FhirSourceConfigSchema } from "./FhirDataSource.js";
import { IoTDataSource, IoTSourceConfigSchema } from "./IoTDataSource.js";

export { DicomDataSource } from "./DicomDataSource.js";
export { FhirDataSource } from "./FhirDataSource.js";
export { IoTDataSource } from "./IoTDataSource.js";

export enum SourceKind {
  CLINICAL_FHIR = "CLINICAL_FHIR",
  CLINICAL_DICOM = "CLINICAL_DICOM",
  IOT = "IOT",
}

/**
 * Register the built-in source kinds. Connection parameters are validated
 * by each source's own schema.
 */
export function registerBuiltinSources(
  registry: DataSourceRegistry = new DataSourceRegistry()
): DataSourceRegistry {
  return registry
    .register(
      SourceKind.CLINICAL_FHIR,
      (id, config) => new FhirDataSource(id, FhirSourceConfigSchema.parse(config))
    )
    .register(
      SourceKind.CLINICAL_DICOM,
      (id, config) => new DicomDataSource(id, DicomSourceConfigSchema.parse(config))
    )
    .register(SourceKind.IOT, (id, config) => new IoTDataSource(id, IoTSourceConfigSchema.parse(config)));
}
