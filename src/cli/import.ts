#!/usr/bin/env node
import { Command, InvalidArgumentError } from "commander";
import { isPrecision, isWriteConsistency } from "../application/import-dump/importer.config";
import type { ImporterConfigInput } from "../application/import-dump/importer.config";
import { type ImportOverrides, runImport } from "../composition/root";
import type { Env } from "../shared/config/env";
import { runtimeCaps } from "../shared/config/runtime.config";
import { precisions, writeConsistencies, type Precision, type WriteConsistency } from "../ports/TimeSeriesClient";

type ErrorContext = Partial<{
  path: string;
  endpoint: string;
  linesScanned: number;
}>;

type CliErrorEnvelope = {
  event: "import.failed";
  name: string;
  message: string;
  code?: string;
  context?: ErrorContext;
  status?: number;
  stack?: string;
};

export type CliOptions = {
  path?: string;
  compressed?: boolean;
  precision?: Precision;
  consistency?: WriteConsistency;
  url?: string;
  username?: string;
  password?: string;
  apiVersion?: string;
  timeoutMs?: number;
};

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null;

const extractContext = (value: unknown): ErrorContext | undefined => {
  if (!isRecord(value)) return undefined;

  const sanitizedContext: ErrorContext = {};
  if (typeof value.path === "string") sanitizedContext.path = value.path;
  if (typeof value.endpoint === "string") sanitizedContext.endpoint = value.endpoint;
  if (typeof value.linesScanned === "number" && Number.isFinite(value.linesScanned)) {
    sanitizedContext.linesScanned = value.linesScanned;
  }

  return Object.keys(sanitizedContext).length > 0 ? sanitizedContext : undefined;
};

export const isDebugMode = (env: NodeJS.ProcessEnv = process.env): boolean => {
  const debug = env.DEBUG?.toLowerCase();
  return debug === "1" || debug === "true";
};

export const buildCliErrorEnvelope = (err: unknown, includeStack: boolean): CliErrorEnvelope => {
  const error = err instanceof Error ? err : new Error(String(err));
  const errorRecord = isRecord(err) ? err : {};

  const envelope: CliErrorEnvelope = {
    event: "import.failed",
    name: error.name || "Error",
    message: error.message
  };

  if (typeof errorRecord.code === "string") {
    envelope.code = errorRecord.code;
  }

  const context = extractContext(errorRecord.context);
  if (context) {
    envelope.context = context;
  }

  if (typeof errorRecord.status === "number" && Number.isFinite(errorRecord.status)) {
    envelope.status = errorRecord.status;
  }

  if (includeStack && typeof error.stack === "string") {
    envelope.stack = error.stack;
  }

  return envelope;
};

const parsePrecision = (value: string): Precision => {
  if (!isPrecision(value)) throw new InvalidArgumentError(`Must be one of ${precisions.join(", ")}.`);
  return value;
};

const parseConsistency = (value: string): WriteConsistency => {
  const normalized = value.toLowerCase();
  if (!isWriteConsistency(normalized)) {
    throw new InvalidArgumentError(`Must be one of ${writeConsistencies.join(", ")}.`);
  }
  return normalized;
};

const parseTimeoutMs = (value: string): number => {
  const parsed = Number(value);
  const { min, max } = runtimeCaps.timeoutMs;
  if (!Number.isInteger(parsed) || parsed < min || parsed > max) {
    throw new InvalidArgumentError(`Must be an integer in [${min}..${max}].`);
  }
  return parsed;
};

export const buildCliProgram = (): Command =>
  new Command()
    .name("dump-import")
    .description("Import a DDL/DML dump file into InfluxDB over its HTTP API")
    .option("--path <file>", "dump file to import (env: IMPORT_PATH)")
    .option("--compressed", "the dump file is gzip-compressed (env: IMPORT_COMPRESSED)")
    .option("--precision <precision>", "timestamp precision of the data lines (env: IMPORT_PRECISION)", parsePrecision)
    .option("--consistency <level>", "write consistency level (env: IMPORT_CONSISTENCY)", parseConsistency)
    .option("--url <url>", "server URL (env: INFLUX_URL)")
    .option("--username <name>", "username (env: INFLUX_USERNAME)")
    .option("--password <password>", "password (env: INFLUX_PASSWORD)")
    .option("--api-version <version>", "API version sent to the server (env: INFLUX_VERSION)")
    .option("--timeout-ms <ms>", "request timeout, 0 for none (env: INFLUX_TIMEOUT_MS)", parseTimeoutMs);

// Flags left out keep whatever the environment configures.
export const toImportOverrides = (options: CliOptions): ImportOverrides => {
  const env: Partial<Env> = {};
  if (options.url != null) env.INFLUX_URL = options.url;
  if (options.username != null) env.INFLUX_USERNAME = options.username;
  if (options.password != null) env.INFLUX_PASSWORD = options.password;

  const importerConfig: ImporterConfigInput = {};
  if (options.path != null) importerConfig.path = options.path;
  if (options.compressed != null) importerConfig.compressed = options.compressed;
  if (options.precision != null) importerConfig.precision = options.precision;
  if (options.consistency != null) importerConfig.consistency = options.consistency;

  const overrides: ImportOverrides = { env, importerConfig };
  if (options.timeoutMs != null) overrides.timeoutMs = options.timeoutMs;
  if (options.apiVersion != null) overrides.apiVersion = options.apiVersion;
  return overrides;
};

export const executeImportCli = async (argv: string[] = process.argv): Promise<void> => {
  const program = buildCliProgram();
  program.parse(argv);

  try {
    await runImport(toImportOverrides(program.opts<CliOptions>()));
  } catch (err) {
    const envelope = buildCliErrorEnvelope(err, isDebugMode());
    // eslint-disable-next-line no-console
    console.error(JSON.stringify(envelope));
    process.exit(1);
  }
};

if (require.main === module) {
  void executeImportCli();
}
