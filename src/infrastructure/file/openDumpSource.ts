import { open, type FileHandle } from "fs/promises";
import { StringDecoder } from "string_decoder";
import { createGunzip } from "zlib";
import type { Readable } from "stream";
import type { DumpSource, DumpSourceStage, OpenDumpSource } from "../../ports/DumpSource";

export class DumpSourceError extends Error {
  readonly stage: DumpSourceStage;
  readonly cause?: unknown;

  constructor(args: { stage: DumpSourceStage; message: string; cause?: unknown }) {
    super(args.message);
    this.name = "DumpSourceError";
    this.stage = args.stage;
    this.cause = args.cause;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

const GZIP_MAGIC = [0x1f, 0x8b] as const;

const stripCarriageReturn = (line: string): string => (line.endsWith("\r") ? line.slice(0, -1) : line);

/**
 * Splits a byte/text stream on `\n`. A trailing `\r` is dropped from each line, and a
 * final line without a newline is still emitted.
 */
export async function* splitLines(chunks: AsyncIterable<string | Buffer>): AsyncGenerator<string> {
  const decoder = new StringDecoder("utf8");
  // Pieces of the current line; each chunk is searched once, however long the line gets.
  let pending: string[] = [];

  for await (const chunk of chunks) {
    const text = typeof chunk === "string" ? chunk : decoder.write(chunk);

    let start = 0;
    let newline = text.indexOf("\n");
    while (newline !== -1) {
      pending.push(text.slice(start, newline));
      yield stripCarriageReturn(pending.join(""));
      pending = [];
      start = newline + 1;
      newline = text.indexOf("\n", start);
    }
    if (start < text.length) pending.push(text.slice(start));
  }

  pending.push(decoder.end());
  const last = pending.join("");
  if (last !== "") yield stripCarriageReturn(last);
}

const assertGzipHeader = async (handle: FileHandle, path: string): Promise<void> => {
  const header = Buffer.alloc(GZIP_MAGIC.length);
  let bytesRead: number;
  try {
    ({ bytesRead } = await handle.read(header, 0, header.length, 0));
  } catch (err) {
    throw new DumpSourceError({ stage: "open", message: `Could not read ${path}`, cause: err });
  }

  if (bytesRead < GZIP_MAGIC.length || header[0] !== GZIP_MAGIC[0] || header[1] !== GZIP_MAGIC[1]) {
    throw new DumpSourceError({ stage: "decompress", message: `${path} is not gzip data: invalid header` });
  }
};

/**
 * Opens a dump file for line-by-line reading, through gunzip when `compressed`.
 * Corrupt compressed data past the header surfaces as a read error while iterating.
 */
export const openDumpSource: OpenDumpSource = async (path: string, compressed: boolean): Promise<DumpSource> => {
  let handle: FileHandle;
  try {
    handle = await open(path, "r");
  } catch (err) {
    throw new DumpSourceError({ stage: "open", message: `Could not open ${path}`, cause: err });
  }

  try {
    if (compressed) await assertGzipHeader(handle, path);
  } catch (err) {
    await handle.close();
    throw err;
  }

  const raw = handle.createReadStream({ start: 0, autoClose: false });
  let stream: Readable = raw;
  if (compressed) {
    const gunzip = createGunzip();
    raw.on("error", (err) => gunzip.destroy(err));
    stream = raw.pipe(gunzip);
  }

  let closed = false;
  return {
    lines: splitLines(stream),
    close: async () => {
      if (closed) return;
      closed = true;
      stream.destroy();
      raw.destroy();
      await handle.close();
    }
  };
};
