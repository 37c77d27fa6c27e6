/**
 * HTTP server
 *
 * Routes exercised on an ephemeral loopback port with fake page fetchers.
 */

import http from "node:http";
import axios, { type AxiosInstance } from "axios";
import { afterEach, beforeEach, describe, it, expect, jest } from "@jest/globals";
import { createServer, parseJsonObject, type ServerOptions } from "../src/server.js";
import type { PageFetcher } from "../src/scrapers/types.js";

const emptyPage: PageFetcher = async () => "<html><head><title>Results</title></head><body></body></html>";

// Never resolves until the run is stopped.
const hangingFetcher: PageFetcher = (_url, opts) =>
  new Promise<string>((_resolve, reject) => {
    opts?.signal?.addEventListener("abort", () => reject(new Error("aborted")));
  });

interface RawResponse {
  status: number;
  body: unknown;
}

function responseOf(req: http.ClientRequest): Promise<RawResponse> {
  return new Promise((resolve, reject) => {
    req.on("response", (res) => {
      const chunks: Buffer[] = [];
      res.on("data", (chunk: Buffer) => chunks.push(chunk));
      res.on("end", () => {
        const body: unknown = JSON.parse(Buffer.concat(chunks).toString());
        resolve({ status: res.statusCode ?? 0, body });
      });
    });
    req.on("error", reject);
  });
}

async function waitUntil(check: () => Promise<boolean>): Promise<void> {
  for (let i = 0; i < 200; i++) {
    if (await check()) return;
    await new Promise((resolve) => setTimeout(resolve, 10));
  }
  throw new Error("Timed out waiting for the server");
}

describe("parseJsonObject", () => {
  it("parses an object body", () => {
    expect(parseJsonObject('{"raw":"4,099\\n5,899","extra":1}')).toEqual({
      raw: "4,099\n5,899",
      extra: 1,
    });
  });

  it.each([[""], ["   "], ["[1,2]"], ["null"], ["not json"], ['"text"']])(
    "falls back to an empty object for %p",
    (body) => {
      expect(parseJsonObject(body)).toEqual({});
    }
  );
});

describe("createServer", () => {
  let server: http.Server;
  let port: number;
  let client: AxiosInstance;

  async function start(opts: ServerOptions = {}): Promise<void> {
    server = createServer({ apiToken: "", fetcher: emptyPage, ...opts });
    await new Promise<void>((resolve) => server.listen(0, "127.0.0.1", () => resolve()));
    const address = server.address();
    if (address === null || typeof address === "string") {
      throw new Error("Server is not listening on a TCP port");
    }
    port = address.port;
    client = axios.create({
      baseURL: `http://127.0.0.1:${port}`,
      validateStatus: () => true,
    });
  }

  async function isRunning(): Promise<boolean> {
    const res = await client.get("/health");
    return res.data.isRunning === true;
  }

  beforeEach(() => {
    jest.spyOn(console, "log").mockImplementation(() => undefined);
    jest.spyOn(console, "warn").mockImplementation(() => undefined);
    jest.spyOn(console, "error").mockImplementation(() => undefined);
  });

  afterEach(async () => {
    server.closeAllConnections();
    await new Promise<void>((resolve, reject) =>
      server.close((err) => (err ? reject(err) : resolve()))
    );
    jest.restoreAllMocks();
  });

  it("reports health before any run", async () => {
    await start();
    const res = await client.get("/health");

    expect(res.status).toBe(200);
    expect(res.data).toEqual({ status: "ok", isRunning: false, lastRun: null });
  });

  it("answers 404 for unknown routes", async () => {
    await start();
    const res = await client.get("/nope");

    expect(res.status).toBe(404);
    expect(res.data).toEqual({ error: "Not found" });
  });

  it("normalizes a raw price block", async () => {
    await start();
    const res = await client.post("/parse-price", { raw: "4,099\n5,899\n30% OFF" });

    expect(res.status).toBe(200);
    expect(res.data).toEqual({ current: 4099, original: 5899, discountPercent: 30 });
  });

  it("rejects a parse-price body without raw text", async () => {
    await start();
    const res = await client.post("/parse-price", { text: "4,099" });

    expect(res.status).toBe(400);
    expect(res.data).toEqual({ error: 'Missing or invalid "raw" field' });
  });

  it("canonicalizes a product URL", async () => {
    await start();
    const res = await client.post("/canonical-url", {
      url: "https://www.noon.com/saudi-en/long-seo-text/N38503505A/p/?o=abc",
    });

    expect(res.status).toBe(200);
    expect(res.data).toEqual({ canonical: "https://www.noon.com/saudi-en/N38503505A/p/" });
  });

  it("rejects a trigger without a query and stays idle", async () => {
    await start();
    const res = await client.post("/trigger", { market: "UAE" });

    expect(res.status).toBe(400);
    expect(res.data).toEqual({ error: 'Missing or invalid "query" field' });
    expect(await isRunning()).toBe(false);
  });

  it("answers 409 to stop when nothing is running", async () => {
    await start();
    const res = await client.post("/stop");

    expect(res.status).toBe(409);
    expect(res.data).toEqual({ error: "No run is currently in progress" });
  });

  it("requires the bearer token when one is configured", async () => {
    await start({ apiToken: "test-secret" });

    expect((await client.post("/trigger", { query: "mouse" })).status).toBe(401);
    expect((await client.post("/stop")).status).toBe(401);

    const authed = await client.post(
      "/trigger",
      {},
      { headers: { Authorization: "Bearer test-secret" } }
    );
    expect(authed.status).toBe(400);
  });

  it("starts a dry run and records its outcome", async () => {
    await start();
    const res = await client.post("/trigger?dry_run=true", { query: "mouse", market: "UAE" });

    expect(res.status).toBe(202);
    expect(res.data).toEqual({
      message: "Run started",
      market: "UAE",
      query: "mouse",
      dryRun: true,
    });

    await waitUntil(async () => !(await isRunning()));
    const health = await client.get("/health");
    expect(health.data.lastRun).toEqual({
      outputPath: null,
      listings: 0,
      finishedAt: expect.any(String),
    });
  });

  it("refuses a second trigger while the first is still sending its body", async () => {
    await start({ fetcher: hangingFetcher });

    const first = http.request({
      host: "127.0.0.1",
      port,
      method: "POST",
      path: "/trigger",
      headers: { "Content-Type": "application/json" },
    });
    const firstResponse = responseOf(first);
    first.write('{"query":');
    await waitUntil(isRunning);

    const second = await client.post("/trigger", { query: "mouse" });
    expect(second.status).toBe(409);
    expect(second.data).toEqual({ error: "A run is already in progress" });

    first.end('"laptop"}');
    expect((await firstResponse).status).toBe(202);

    const stop = await client.post("/stop");
    expect(stop.status).toBe(200);
    expect(stop.data).toEqual({ message: "Stop signal sent" });

    await waitUntil(async () => !(await isRunning()));
  });
});
