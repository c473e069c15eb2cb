import { mkdtemp, rm, writeFile } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";
import { gzipSync } from "zlib";
import { DumpSourceError, openDumpSource, splitLines } from "../../src/infrastructure/file/openDumpSource";

const collect = async (lines: AsyncIterable<string>): Promise<string[]> => {
  const out: string[] = [];
  for await (const line of lines) out.push(line);
  return out;
};

async function* chunksOf(...chunks: Array<string | Buffer>): AsyncGenerator<string | Buffer> {
  for (const chunk of chunks) yield chunk;
}

describe("splitLines", () => {
  it("joins lines split across chunks and drops carriage returns", async () => {
    await expect(collect(splitLines(chunksOf("CREATE DATABASE a\r\n# D", "ML\ncpu value=1", " 1000\n")))).resolves.toEqual([
      "CREATE DATABASE a",
      "# DML",
      "cpu value=1 1000"
    ]);
  });

  it("emits a final line without a newline and keeps blank lines in between", async () => {
    await expect(collect(splitLines(chunksOf("a\n\nb")))).resolves.toEqual(["a", "", "b"]);
  });

  it("assembles a long line from many chunks", async () => {
    const pieces = Array.from({ length: 2000 }, () => "x".repeat(64));

    const lines = await collect(splitLines(chunksOf("head\n", ...pieces, "\r", "\ntail")));

    expect(lines).toHaveLength(3);
    expect(lines[0]).toBe("head");
    expect(lines[1]).toBe("x".repeat(128000));
    expect(lines[2]).toBe("tail");
  });

  it("decodes multi-byte characters split across buffers", async () => {
    const bytes = Buffer.from("cpu,host=é value=1\n", "utf8");
    const splitAt = bytes.indexOf(0xc3) + 1;

    await expect(collect(splitLines(chunksOf(bytes.subarray(0, splitAt), bytes.subarray(splitAt))))).resolves.toEqual([
      "cpu,host=é value=1"
    ]);
  });
});

describe("openDumpSource", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "dump-source-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  const dump = "CREATE DATABASE x\n# DML\n# CONTEXT-DATABASE: x\ncpu value=1 1\n";

  it("reads a plain text dump line by line", async () => {
    const path = join(dir, "dump.txt");
    await writeFile(path, dump);

    const source = await openDumpSource(path, false);
    await expect(collect(source.lines)).resolves.toEqual([
      "CREATE DATABASE x",
      "# DML",
      "# CONTEXT-DATABASE: x",
      "cpu value=1 1"
    ]);
    await source.close();
  });

  it("reads a gzip-compressed dump", async () => {
    const path = join(dir, "dump.txt.gz");
    await writeFile(path, gzipSync(dump));

    const source = await openDumpSource(path, true);
    await expect(collect(source.lines)).resolves.toEqual([
      "CREATE DATABASE x",
      "# DML",
      "# CONTEXT-DATABASE: x",
      "cpu value=1 1"
    ]);
    await source.close();
  });

  it("reports a missing file as an open failure", async () => {
    const path = join(dir, "missing.txt");

    const error = await openDumpSource(path, false).catch((err: unknown) => err);
    expect(error).toBeInstanceOf(DumpSourceError);
    if (error instanceof DumpSourceError) {
      expect(error.stage).toBe("open");
      expect(error.message).toBe(`Could not open ${path}`);
    }
  });

  it("reports plain data read as compressed as a decompress failure", async () => {
    const path = join(dir, "dump.txt");
    await writeFile(path, dump);

    const error = await openDumpSource(path, true).catch((err: unknown) => err);
    expect(error).toBeInstanceOf(DumpSourceError);
    if (error instanceof DumpSourceError) {
      expect(error.stage).toBe("decompress");
      expect(error.message).toBe(`${path} is not gzip data: invalid header`);
    }
  });

  it("surfaces corrupt compressed data while reading", async () => {
    const path = join(dir, "corrupt.gz");
    const header = gzipSync(dump).subarray(0, 10);
    await writeFile(path, Buffer.concat([header, Buffer.from("this is not deflate data")]));

    const source = await openDumpSource(path, true);
    await expect(collect(source.lines)).rejects.toThrow();
    await source.close();
  });
});
