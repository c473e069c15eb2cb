import {
  precisions,
  writeConsistencies,
  type Precision,
  type WriteConsistency
} from "../../ports/TimeSeriesClient";

export type ImporterConfig = {
  path?: string;
  compressed: boolean;
  precision: Precision;
  consistency: WriteConsistency;
  batchSize: number;
};

export type ImporterConfigInput = Partial<ImporterConfig>;

export const DEFAULT_BATCH_SIZE = 5000;

export const defaultImporterConfig: ImporterConfig = {
  compressed: false,
  precision: "ns",
  consistency: "any",
  batchSize: DEFAULT_BATCH_SIZE
};

export const importerCaps = {
  batchSize: { min: 1, max: 100000 }
} as const;

export const isPrecision = (value: string): value is Precision =>
  precisions.some((precision) => precision === value);

export const isWriteConsistency = (value: string): value is WriteConsistency =>
  writeConsistencies.some((consistency) => consistency === value);

const assertIntegerInRange = (name: string, value: number, min: number, max: number) => {
  if (!Number.isInteger(value) || value < min || value > max) {
    throw new Error(`${name}=${String(value)} is out of allowed range [${min}..${max}]`);
  }
};

export const validateImporterConfig = (config: ImporterConfig): ImporterConfig => {
  assertIntegerInRange("batchSize", config.batchSize, importerCaps.batchSize.min, importerCaps.batchSize.max);
  if (!isPrecision(config.precision)) {
    throw new Error(`precision=${String(config.precision)} must be one of ${precisions.join(", ")}`);
  }
  if (!isWriteConsistency(config.consistency)) {
    throw new Error(`consistency=${String(config.consistency)} must be one of ${writeConsistencies.join(", ")}`);
  }
  return config;
};

const normalizeOptionalString = (value: string | undefined): string | undefined => {
  if (typeof value !== "string") return undefined;
  const normalized = value.trim();
  return normalized === "" ? undefined : normalized;
};

export const resolveImporterConfig = (input: ImporterConfigInput = {}): ImporterConfig =>
  validateImporterConfig({
    ...defaultImporterConfig,
    ...input,
    path: normalizeOptionalString(input.path)
  });
