export type DumpSourceStage = "open" | "decompress";

export type DumpSource = {
  lines: AsyncIterable<string>;
  close(): Promise<void>;
};

export type OpenDumpSource = (path: string, compressed: boolean) => Promise<DumpSource>;
