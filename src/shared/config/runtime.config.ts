import {
  defaultImporterConfig,
  type ImporterConfig,
  isPrecision,
  isWriteConsistency,
  validateImporterConfig
} from "../../application/import-dump/importer.config";
import { precisions, writeConsistencies, type Precision, type WriteConsistency } from "../../ports/TimeSeriesClient";

export const runtimeCaps = {
  timeoutMs: { min: 0, max: 300000 }
} as const;

export const DEFAULT_API_VERSION = "0.9";

export type RuntimeConfig = {
  importerConfig: ImporterConfig;
  timeoutMs: number;
  apiVersion: string;
};

const readOptionalString = (env: NodeJS.ProcessEnv, name: string): string | undefined => {
  const raw = env[name];
  if (raw == null || raw.trim() === "") return undefined;
  return raw.trim();
};

const parseOptionalIntInRange = (
  env: NodeJS.ProcessEnv,
  name: string,
  range: { min: number; max: number }
): number | undefined => {
  const raw = readOptionalString(env, name);
  if (raw == null) return undefined;

  const value = Number(raw);
  if (!Number.isInteger(value) || value < range.min || value > range.max) {
    throw new Error(`${name}=${raw} is out of allowed range [${range.min}..${range.max}]`);
  }

  return value;
};

const parseOptionalBoolean = (env: NodeJS.ProcessEnv, name: string): boolean | undefined => {
  const raw = readOptionalString(env, name)?.toLowerCase();
  if (raw == null) return undefined;
  if (raw === "1" || raw === "true") return true;
  if (raw === "0" || raw === "false") return false;
  throw new Error(`${name}=${raw} must be one of 1, true, 0, false`);
};

const parseOptionalPrecision = (env: NodeJS.ProcessEnv, name: string): Precision | undefined => {
  const raw = readOptionalString(env, name);
  if (raw == null) return undefined;
  if (!isPrecision(raw)) {
    throw new Error(`${name}=${raw} must be one of ${precisions.join(", ")}`);
  }
  return raw;
};

const parseOptionalConsistency = (env: NodeJS.ProcessEnv, name: string): WriteConsistency | undefined => {
  const raw = readOptionalString(env, name)?.toLowerCase();
  if (raw == null) return undefined;
  if (!isWriteConsistency(raw)) {
    throw new Error(`${name}=${raw} must be one of ${writeConsistencies.join(", ")}`);
  }
  return raw;
};

export const loadRuntimeConfigFromEnv = (env: NodeJS.ProcessEnv = process.env): RuntimeConfig => {
  const importerConfig = validateImporterConfig({
    ...defaultImporterConfig,
    path: readOptionalString(env, "IMPORT_PATH"),
    compressed: parseOptionalBoolean(env, "IMPORT_COMPRESSED") ?? defaultImporterConfig.compressed,
    precision: parseOptionalPrecision(env, "IMPORT_PRECISION") ?? defaultImporterConfig.precision,
    consistency: parseOptionalConsistency(env, "IMPORT_CONSISTENCY") ?? defaultImporterConfig.consistency
  });

  const timeoutMs =
    parseOptionalIntInRange(env, "INFLUX_TIMEOUT_MS", {
      min: runtimeCaps.timeoutMs.min,
      max: runtimeCaps.timeoutMs.max
    }) ?? 0;

  const apiVersion = readOptionalString(env, "INFLUX_VERSION") ?? DEFAULT_API_VERSION;

  return { importerConfig, timeoutMs, apiVersion };
};
