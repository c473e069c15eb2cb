import { createDatabaseContext, type DataLine, type Statement } from "../../core/dump/dump.types";
import type { DumpSource, OpenDumpSource } from "../../ports/DumpSource";
import type { TimeSeriesClient } from "../../ports/TimeSeriesClient";
import { createRendezvous } from "../../shared/concurrency/rendezvous";
import { runBatchAccumulator } from "./batchAccumulator";
import { runCommandExecutor } from "./commandExecutor";
import type { ImporterConfigInput } from "./importer.config";
import { resolveImporterConfig } from "./importer.config";
import {
  mergeImportTotals,
  shouldReportSummary,
  toErrorMessage,
  toImportFatalError,
  type ImportFailureCode,
  type ImportRunSummary
} from "./import.error-handler";
import { DumpScanError, scanDump } from "./scanDump";

export type ImportDumpDeps = {
  connect: () => Promise<TimeSeriesClient>;
  openSource: OpenDumpSource;
  config: ImporterConfigInput;
  endpoint?: string;
};

const sourceFailureCode = (err: unknown): ImportFailureCode =>
  typeof err === "object" && err !== null && "stage" in err && err.stage === "decompress"
    ? "decompress_failed"
    : "source_open_failed";

const closeSource = async (source: DumpSource, path: string): Promise<void> => {
  try {
    await source.close();
  } catch (err) {
    // eslint-disable-next-line no-console
    console.warn(JSON.stringify({ event: "import.source_close_failed", path, reason: toErrorMessage(err) }));
  }
};

/**
 * Imports one dump file: statements run on one worker, data lines are batched into
 * writes on another, and the file is scanned no faster than either can take lines.
 */
export const importDump = async (deps: ImportDumpDeps): Promise<ImportRunSummary> => {
  const config = resolveImporterConfig(deps.config);
  const { endpoint } = deps;
  const path = config.path;
  if (path == null) {
    throw toImportFatalError("missing_source_path", undefined, {});
  }

  let client: TimeSeriesClient;
  try {
    client = await deps.connect();
  } catch (err) {
    throw toImportFatalError("connect_failed", err, { endpoint });
  }

  let serverVersion: string | undefined;
  try {
    serverVersion = (await client.ping()).version;
  } catch (err) {
    throw toImportFatalError("ping_failed", err, { endpoint });
  }

  let source: DumpSource;
  try {
    source = await deps.openSource(path, config.compressed);
  } catch (err) {
    throw toImportFatalError(sourceFailureCode(err), err, { path });
  }

  console.log(JSON.stringify({ event: "import.started", path, compressed: config.compressed, serverVersion }));

  const context = createDatabaseContext();
  const commands = createRendezvous<Statement>();
  const lines = createRendezvous<DataLine>();
  const shutdown = new AbortController();

  const executor = runCommandExecutor({ client, commands, context, shutdown: shutdown.signal });
  const accumulator = runBatchAccumulator({
    client,
    lines,
    context,
    shutdown: shutdown.signal,
    batchSize: config.batchSize,
    precision: config.precision,
    consistency: config.consistency
  });

  let scanError: unknown;
  try {
    await scanDump({ source: source.lines, commands, lines, context });
  } catch (err) {
    scanError = err;
  } finally {
    shutdown.abort();
  }

  const summary = await Promise.all([executor, accumulator])
    .then(([executorTotals, accumulatorTotals]) => mergeImportTotals(executorTotals, accumulatorTotals))
    .finally(() => closeSource(source, path));

  if (shouldReportSummary(summary)) {
    console.log(JSON.stringify({ event: "import.completed", ...summary }));
  }

  if (scanError !== undefined) {
    const linesScanned = scanError instanceof DumpScanError ? scanError.linesScanned : undefined;
    throw toImportFatalError("scan_failed", scanError, { path, linesScanned });
  }

  return summary;
};
