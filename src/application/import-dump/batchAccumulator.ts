import type { DataLine, DatabaseContext } from "../../core/dump/dump.types";
import type { Precision, TimeSeriesClient, WriteConsistency } from "../../ports/TimeSeriesClient";
import type { Rendezvous } from "../../shared/concurrency/rendezvous";
import { toErrorMessage, type AccumulatorTotals } from "./import.error-handler";

/**
 * Collects data lines and writes every full batch as one request.
 *
 * The batch still filling when shutdown arrives is counted in `totalInserts` without
 * being written; `unwrittenInserts` records how many lines that was.
 */
export const runBatchAccumulator = async (deps: {
  client: TimeSeriesClient;
  lines: Rendezvous<DataLine>;
  context: DatabaseContext;
  shutdown: AbortSignal;
  batchSize: number;
  precision: Precision;
  consistency: WriteConsistency;
}): Promise<AccumulatorTotals> => {
  const { client, lines, context, shutdown, batchSize, precision, consistency } = deps;
  const batch: DataLine[] = [];
  const totals: AccumulatorTotals = { totalInserts: 0, failedInserts: 0, unwrittenInserts: 0 };

  while (true) {
    const next = await lines.receive(shutdown);
    if (next.done) break;

    batch.push(next.value);
    if (batch.length < batchSize) continue;

    const { database, retentionPolicy } = context;
    try {
      await client.writeBatch({ lines: batch.join("\n"), database, retentionPolicy, precision, consistency });
      totals.totalInserts += batch.length;
    } catch (err) {
      // eslint-disable-next-line no-console
      console.warn(JSON.stringify({
        event: "import.batch_failed",
        batchSize: batch.length,
        database,
        retentionPolicy,
        reason: toErrorMessage(err)
      }));
      totals.failedInserts += batch.length;
    }
    batch.length = 0;
  }

  totals.totalInserts += batch.length;
  totals.unwrittenInserts += batch.length;
  batch.length = 0;

  return totals;
};
