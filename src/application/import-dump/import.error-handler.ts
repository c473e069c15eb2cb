export type ImportFailureCode =
  | "missing_source_path"
  | "connect_failed"
  | "ping_failed"
  | "source_open_failed"
  | "decompress_failed"
  | "scan_failed";

export type ImportErrorContext = {
  path?: string;
  endpoint?: string;
  linesScanned?: number;
};

export const toErrorMessage = (reason: unknown): string => {
  if (reason instanceof Error) return reason.message;
  return String(reason);
};

export class ImportFatalError extends Error {
  readonly code: ImportFailureCode;
  readonly context: ImportErrorContext;
  readonly cause?: unknown;

  constructor(args: { code: ImportFailureCode; message: string; context: ImportErrorContext; cause?: unknown }) {
    super(args.message);
    this.name = "ImportFatalError";
    this.code = args.code;
    this.context = args.context;
    this.cause = args.cause;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

const failureMessages: Record<ImportFailureCode, string> = {
  missing_source_path: "Source file path is required",
  connect_failed: "Could not create database client",
  ping_failed: "Failed to connect to database",
  source_open_failed: "Could not open source file",
  decompress_failed: "Could not decompress source file",
  scan_failed: "Reading source file failed"
};

export const toImportFatalError = (
  code: ImportFailureCode,
  reason: unknown,
  context: ImportErrorContext
): ImportFatalError => {
  const base = failureMessages[code];
  const message = reason === undefined ? base : `${base}: ${toErrorMessage(reason)}`;
  const cause = reason instanceof Error ? reason.cause ?? reason : reason;
  return new ImportFatalError({ code, message, context, cause });
};

export type ExecutorTotals = {
  totalCommands: number;
};

export type AccumulatorTotals = {
  totalInserts: number;
  failedInserts: number;
  unwrittenInserts: number;
};

export type ImportRunSummary = ExecutorTotals & AccumulatorTotals;

// Each worker owns its counters; they are merged once both have finished.
export const mergeImportTotals = (executor: ExecutorTotals, accumulator: AccumulatorTotals): ImportRunSummary => ({
  totalCommands: executor.totalCommands,
  totalInserts: accumulator.totalInserts,
  failedInserts: accumulator.failedInserts,
  unwrittenInserts: accumulator.unwrittenInserts
});

export const shouldReportSummary = (summary: ImportRunSummary): boolean => summary.totalInserts > 0;
