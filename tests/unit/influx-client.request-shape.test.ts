import http from "http";
import type { AddressInfo } from "net";
import { InfluxHttpClient, type InfluxClientOptions } from "../../src/infrastructure/influx/InfluxHttpClient";

type CapturedRequest = {
  method?: string;
  path: string;
  query: Record<string, string>;
  headers: http.IncomingHttpHeaders;
  body: string;
};

type TestServer = {
  baseUrl: string;
  requests: CapturedRequest[];
  close: () => Promise<void>;
};

const startServer = async (
  respond: (req: CapturedRequest, res: http.ServerResponse) => void
): Promise<TestServer> => {
  const requests: CapturedRequest[] = [];
  const server = http.createServer((req, res) => {
    const chunks: Buffer[] = [];
    req.on("data", (chunk: Buffer) => chunks.push(chunk));
    req.on("end", () => {
      const url = new URL(req.url ?? "/", "http://127.0.0.1");
      const captured: CapturedRequest = {
        method: req.method,
        path: url.pathname,
        query: Object.fromEntries(url.searchParams.entries()),
        headers: req.headers,
        body: Buffer.concat(chunks).toString("utf8")
      };
      requests.push(captured);
      respond(captured, res);
    });
  });
  await new Promise<void>((resolve) => {
    server.listen(0, "127.0.0.1", () => resolve());
  });

  const address = server.address() as AddressInfo;
  return {
    baseUrl: `http://127.0.0.1:${address.port}`,
    requests,
    close: () =>
      new Promise<void>((resolve, reject) => {
        server.close((err) => (err ? reject(err) : resolve()));
      })
  };
};

const options = (baseUrl: string, overrides: Partial<InfluxClientOptions> = {}): InfluxClientOptions => ({
  url: baseUrl,
  username: "",
  password: "",
  apiVersion: "0.9",
  timeoutMs: 0,
  ...overrides
});

describe("InfluxHttpClient request shape", () => {
  it("pings and reports the server version", async () => {
    const server = await startServer((_req, res) => {
      res.writeHead(204, { "X-Influxdb-Version": "0.9.6" });
      res.end();
    });

    const client = new InfluxHttpClient(options(server.baseUrl));
    await expect(client.ping()).resolves.toEqual({ version: "0.9.6" });

    expect(server.requests).toHaveLength(1);
    expect(server.requests[0]?.method).toBe("GET");
    expect(server.requests[0]?.path).toBe("/ping");
    expect(server.requests[0]?.headers["user-agent"]).toBe("dump-importer/0.9");
    expect(server.requests[0]?.headers.authorization).toBeUndefined();

    await server.close();
  });

  it("sends statements as a query with the target database", async () => {
    const server = await startServer((_req, res) => {
      res.writeHead(200, { "content-type": "application/json" });
      res.end(JSON.stringify({ results: [{}] }));
    });

    const client = new InfluxHttpClient(options(server.baseUrl));
    await expect(client.executeStatement("CREATE DATABASE x", "x")).resolves.toEqual({ results: [{}] });
    await client.executeStatement("SHOW DATABASES", "");

    expect(server.requests[0]?.method).toBe("GET");
    expect(server.requests[0]?.path).toBe("/query");
    expect(server.requests[0]?.query).toEqual({ q: "CREATE DATABASE x", db: "x" });
    expect(server.requests[1]?.query).toEqual({ q: "SHOW DATABASES" });

    await server.close();
  });

  it("posts batches to the write endpoint with context and credentials", async () => {
    const server = await startServer((_req, res) => {
      res.writeHead(204);
      res.end();
    });

    const client = new InfluxHttpClient(options(`${server.baseUrl}/`, { username: "admin", password: "test-secret" }));
    await client.writeBatch({
      lines: "cpu value=1 1\ncpu value=2 2",
      database: "metrics",
      retentionPolicy: "autogen",
      precision: "s",
      consistency: "quorum"
    });

    const request = server.requests[0];
    expect(request?.method).toBe("POST");
    expect(request?.path).toBe("/write");
    expect(request?.query).toEqual({ db: "metrics", rp: "autogen", precision: "s", consistency: "quorum" });
    expect(request?.body).toBe("cpu value=1 1\ncpu value=2 2");
    expect(request?.headers["content-type"]).toBe("text/plain; charset=utf-8");
    expect(request?.headers.authorization).toBe(`Basic ${Buffer.from("admin:test-secret").toString("base64")}`);

    await server.close();
  });

  it("omits an empty retention policy", async () => {
    const server = await startServer((_req, res) => {
      res.writeHead(204);
      res.end();
    });

    const client = new InfluxHttpClient(options(server.baseUrl));
    await client.writeBatch({ lines: "cpu value=1", database: "metrics", retentionPolicy: "", precision: "ns", consistency: "any" });

    expect(server.requests[0]?.query).toEqual({ db: "metrics", precision: "ns", consistency: "any" });

    await server.close();
  });

  it("keeps a base path in front of the API paths", async () => {
    const server = await startServer((_req, res) => {
      res.writeHead(204);
      res.end();
    });

    const client = new InfluxHttpClient(options(`${server.baseUrl}/influx`));
    await client.ping();

    expect(server.requests[0]?.path).toBe("/influx/ping");
    expect(client.endpoint).toBe(`${server.baseUrl}/influx`);

    await server.close();
  });
});
