export const precisions = ["n", "ns", "u", "ms", "s", "m", "h"] as const;
export type Precision = (typeof precisions)[number];

export const writeConsistencies = ["any", "one", "quorum", "all"] as const;
export type WriteConsistency = (typeof writeConsistencies)[number];

export type PingResult = {
  version?: string;
};

export type StatementResult = {
  error?: string;
};

// Application-level errors travel inside the response; transport errors are thrown.
export type StatementResponse = {
  results: StatementResult[];
  error?: string;
};

export type WriteBatchParams = {
  lines: string;
  database: string;
  retentionPolicy: string;
  precision: Precision;
  consistency: WriteConsistency;
};

export interface TimeSeriesClient {
  ping(): Promise<PingResult>;
  executeStatement(statement: string, database: string): Promise<StatementResponse>;
  writeBatch(params: WriteBatchParams): Promise<void>;
}
