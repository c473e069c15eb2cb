import type { DatabaseContext, Statement } from "../../core/dump/dump.types";
import type { StatementResponse, TimeSeriesClient } from "../../ports/TimeSeriesClient";
import type { Rendezvous } from "../../shared/concurrency/rendezvous";
import { toErrorMessage, type ExecutorTotals } from "./import.error-handler";

export const statementResponseError = (response: StatementResponse): string | undefined => {
  if (response.error != null) return response.error;
  return response.results.find((result) => result.error != null)?.error;
};

/**
 * Runs statements strictly one at a time, in the order they were handed over.
 * Failures are logged and skipped.
 */
export const runCommandExecutor = async (deps: {
  client: TimeSeriesClient;
  commands: Rendezvous<Statement>;
  context: DatabaseContext;
  shutdown: AbortSignal;
}): Promise<ExecutorTotals> => {
  const { client, commands, context, shutdown } = deps;
  let totalCommands = 0;

  while (true) {
    const next = await commands.receive(shutdown);
    if (next.done) break;

    totalCommands += 1;
    const statement = next.value;

    let response: StatementResponse;
    try {
      response = await client.executeStatement(statement, context.database);
    } catch (err) {
      // eslint-disable-next-line no-console
      console.warn(JSON.stringify({ event: "import.statement_failed", statement, reason: toErrorMessage(err) }));
      continue;
    }

    const error = statementResponseError(response);
    if (error != null) {
      // eslint-disable-next-line no-console
      console.warn(JSON.stringify({ event: "import.statement_failed", statement, reason: error }));
    }
  }

  return { totalCommands };
};
