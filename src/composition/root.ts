import type { ImportRunSummary } from "../application/import-dump/import.error-handler";
import { importDump } from "../application/import-dump/importDump.usecase";
import { type ImporterConfigInput, validateImporterConfig } from "../application/import-dump/importer.config";
import { openDumpSource } from "../infrastructure/file/openDumpSource";
import { createInfluxClient } from "../infrastructure/influx/InfluxClientFactory";
import { type Env, loadEnv } from "../shared/config/env";
import { loadRuntimeConfigFromEnv, type RuntimeConfig } from "../shared/config/runtime.config";

export type ImportOverrides = {
  env?: Partial<Env>;
  importerConfig?: ImporterConfigInput;
  timeoutMs?: number;
  apiVersion?: string;
};

const safeEndpoint = (url: string): string => {
  const parsed = new URL(url);
  return `${parsed.origin}${parsed.pathname}`;
};

// An overridden setting is never read from the environment, so a bad value there cannot fail the run.
const withoutOverridden = (processEnv: NodeJS.ProcessEnv, overrides: ImportOverrides): NodeJS.ProcessEnv => {
  const importerConfig = overrides.importerConfig ?? {};
  const overridden: Array<[string, unknown]> = [
    ["IMPORT_PATH", importerConfig.path],
    ["IMPORT_COMPRESSED", importerConfig.compressed],
    ["IMPORT_PRECISION", importerConfig.precision],
    ["IMPORT_CONSISTENCY", importerConfig.consistency],
    ["INFLUX_TIMEOUT_MS", overrides.timeoutMs],
    ["INFLUX_VERSION", overrides.apiVersion]
  ];

  const env = { ...processEnv };
  for (const [name, value] of overridden) {
    if (value !== undefined) delete env[name];
  }
  return env;
};

export const resolveRunSettings = (
  overrides: ImportOverrides = {},
  processEnv: NodeJS.ProcessEnv = process.env
): { env: Env; runtime: RuntimeConfig } => {
  const env = loadEnv({ ...processEnv, ...overrides.env });
  const runtime = loadRuntimeConfigFromEnv(withoutOverridden(processEnv, overrides));

  return {
    env,
    runtime: {
      importerConfig: validateImporterConfig({ ...runtime.importerConfig, ...overrides.importerConfig }),
      timeoutMs: overrides.timeoutMs ?? runtime.timeoutMs,
      apiVersion: overrides.apiVersion ?? runtime.apiVersion
    }
  };
};

export const runImport = async (overrides: ImportOverrides = {}): Promise<ImportRunSummary> => {
  const { env, runtime } = resolveRunSettings(overrides);

  return importDump({
    connect: () =>
      createInfluxClient({
        url: env.INFLUX_URL,
        username: env.INFLUX_USERNAME,
        password: env.INFLUX_PASSWORD,
        apiVersion: runtime.apiVersion,
        timeoutMs: runtime.timeoutMs
      }),
    openSource: openDumpSource,
    config: runtime.importerConfig,
    endpoint: safeEndpoint(env.INFLUX_URL)
  });
};
