/** A hydrant record exactly as delivered by the open-data API. */
export type RawRecord = Readonly<Record<string, unknown>>;

export const REQUIRED_FIELDS = Object.freeze([
  "objectid",
  "assetid",
  "lifecyclestatus",
  "servicearea",
  "staticpressure",
  "latitude",
  "longitude",
  "neighborhood"
] as const);

export type RequiredField = (typeof REQUIRED_FIELDS)[number];

export type ValidRecord = RawRecord & { readonly [K in RequiredField]: unknown };

export type ValidationResult = {
  validRecords: ValidRecord[];
  invalidCount: number;
};

export type PressureCategory = "INSUFFICIENT" | "MARGINAL" | "ADEQUATE" | "EXCELLENT";

export type ServiceQuality = "HIGH" | "MEDIUM" | "LOW" | "INACTIVE" | "UNKNOWN";

/** 0 = inactive, 1 = active, 2 = abandoned */
export type ActivityFlag = 0 | 1 | 2;

export type FeatureRecord = {
  objectid: number | null;
  assetid: number | null;
  record_hash: string;
  latitude: number | null;
  longitude: number | null;
  geo_cluster: string;
  neighborhood: string;
  servicearea: string;
  lifecyclestatus: string;
  is_active: ActivityFlag;
  staticpressure: number | null;
  pressure_category: PressureCategory | null;
  pressure_risk_score: number;
  service_quality: ServiceQuality;
  load_date: string;
  load_timestamp: Date;
};

export const FEATURE_COLUMNS = [
  "objectid",
  "assetid",
  "record_hash",
  "latitude",
  "longitude",
  "geo_cluster",
  "neighborhood",
  "servicearea",
  "lifecyclestatus",
  "is_active",
  "staticpressure",
  "pressure_category",
  "pressure_risk_score",
  "service_quality",
  "load_date",
  "load_timestamp"
] as const satisfies ReadonlyArray<keyof FeatureRecord>;

export type FeatureSummary = {
  rowCount: number;
  activeCount: number;
  activeRatio: number;
  pressureCategories: Partial<Record<PressureCategory, number>>;
  serviceQuality: Partial<Record<ServiceQuality, number>>;
};

export type PipelineStage = "fetch" | "validate" | "transform" | "write";

export type StageReport = {
  stage: PipelineStage;
  input: number;
  output: number;
  failed: number;
};
