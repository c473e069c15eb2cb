export type Statement = string;
export type DataLine = string;

/**
 * Target of statements and writes. Empty strings mean "server default".
 */
export type DatabaseContext = {
  database: string;
  retentionPolicy: string;
};

export const createDatabaseContext = (): DatabaseContext => ({ database: "", retentionPolicy: "" });
