import { classifyDdlLine, classifyDmlLine } from "../../core/dump/classifyLine";
import type { DataLine, DatabaseContext, Statement } from "../../core/dump/dump.types";
import type { Rendezvous } from "../../shared/concurrency/rendezvous";

export type ScanTotals = {
  linesScanned: number;
  statements: number;
  dataLines: number;
  malformedDirectives: number;
};

export class DumpScanError extends Error {
  readonly linesScanned: number;
  readonly cause?: unknown;

  constructor(args: { message: string; linesScanned: number; cause?: unknown }) {
    super(args.message);
    this.name = "DumpScanError";
    this.linesScanned = args.linesScanned;
    this.cause = args.cause;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * Splits a dump into statements (before `# DML`) and data lines (after it), handing each
 * one over only when the matching worker takes it. Directives are read in the DML
 * section only and update `context` in place.
 */
export const scanDump = async (deps: {
  source: AsyncIterable<string>;
  commands: Rendezvous<Statement>;
  lines: Rendezvous<DataLine>;
  context: DatabaseContext;
}): Promise<ScanTotals> => {
  const { source, commands, lines, context } = deps;
  const totals: ScanTotals = { linesScanned: 0, statements: 0, dataLines: 0, malformedDirectives: 0 };
  let phase: "ddl" | "dml" = "ddl";

  try {
    for await (const line of source) {
      totals.linesScanned += 1;

      if (phase === "ddl") {
        const classified = classifyDdlLine(line);
        if (classified.kind === "sentinel") {
          phase = "dml";
        } else if (classified.kind === "statement") {
          await commands.send(classified.statement);
          totals.statements += 1;
        }
        continue;
      }

      const classified = classifyDmlLine(line);
      switch (classified.kind) {
        case "directive":
          context[classified.field] = classified.value;
          break;
        case "malformed_directive":
          totals.malformedDirectives += 1;
          // eslint-disable-next-line no-console
          console.warn(JSON.stringify({
            event: "import.directive_malformed",
            line: totals.linesScanned,
            field: classified.field
          }));
          break;
        case "comment":
          break;
        case "data":
          await lines.send(classified.line);
          totals.dataLines += 1;
          break;
      }
    }
  } catch (err) {
    throw new DumpScanError({
      message: err instanceof Error ? err.message : String(err),
      linesScanned: totals.linesScanned,
      cause: err
    });
  }

  return totals;
};
