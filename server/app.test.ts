import { describe, it, expect, beforeAll, afterAll, vi } from "vitest";
import { once } from "node:events";
import type { Server } from "node:http";
import { aggregateDay } from "../fusion/aggregate";
import { corroborate } from "../fusion/corroborate";
import { MemoryStorage } from "../fusion/ingest/storage";
import { chartKey, createForecastRecord, latestRecordKey, recordKey, serializeRecord } from "../fusion/record";
import { DATE, PARIS, SAMPLE_SLOTS } from "../fusion/test/fixtures";
import { createServer } from "./app";

const summary = aggregateDay(SAMPLE_SLOTS);
const record = createForecastRecord({
  city: PARIS,
  date: DATE,
  generatedAt: new Date("2026-10-19T18:00:00.000Z"),
  summary,
  slots: SAMPLE_SLOTS,
  references: [],
  verdict: corroborate({ summary, prior: "medium", references: [] }),
  chartKey: chartKey(DATE, PARIS.name),
  issues: []
});

const CHART_BYTES = new Uint8Array([0x89, 0x50, 0x4e, 0x47]);

describe("record server", () => {
  const storage = new MemoryStorage();
  let server: Server;
  let baseUrl: string;

  beforeAll(async () => {
    const encoded = new TextEncoder().encode(serializeRecord(record));
    await storage.put(recordKey(DATE, "Paris"), encoded);
    await storage.put(latestRecordKey("Paris"), encoded);
    await storage.put(chartKey(DATE, "Paris"), CHART_BYTES);
    await storage.put(recordKey(DATE, "Brussels"), new TextEncoder().encode('{"city":"Brussels"}'));

    server = createServer(storage).listen(0, "127.0.0.1");
    await once(server, "listening");
    const address = server.address();
    if (!address || typeof address === "string") {
      throw new Error("server has no port");
    }
    baseUrl = `http://127.0.0.1:${address.port}`;
  });

  afterAll(async () => {
    server.close();
    await once(server, "close");
  });

  it("serves a stored record", async () => {
    const res = await fetch(`${baseUrl}/api/forecasts/${DATE}/Paris`);

    expect(res.status).toBe(200);
    expect(res.headers.get("content-type")).toContain("application/json");
    expect(await res.json()).toEqual(record);
  });

  it("serves the latest record for a city", async () => {
    const res = await fetch(`${baseUrl}/api/forecasts/latest/paris`);
    const body: unknown = await res.json();

    expect(res.status).toBe(200);
    expect(body).toMatchObject({ recordId: record.recordId, date: DATE });
  });

  it("rejects a malformed date", async () => {
    const res = await fetch(`${baseUrl}/api/forecasts/20261020/Paris`);

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ error: "Invalid date (expected YYYY-MM-DD)" });
  });

  it("answers 404 for a missing record or chart", async () => {
    expect((await fetch(`${baseUrl}/api/forecasts/2026-10-21/Paris`)).status).toBe(404);
    expect((await fetch(`${baseUrl}/api/forecasts/latest/lyon`)).status).toBe(404);
    expect((await fetch(`${baseUrl}/charts/2026-10-21/paris.png`)).status).toBe(404);
  });

  it("refuses to serve a record that fails validation", async () => {
    vi.spyOn(console, "error").mockImplementation(() => undefined);
    const res = await fetch(`${baseUrl}/api/forecasts/${DATE}/Brussels`);

    expect(res.status).toBe(500);
    expect(await res.json()).toEqual({ error: "Failed to read forecast" });
  });

  it("serves chart bytes as PNG", async () => {
    const res = await fetch(`${baseUrl}/charts/${DATE}/paris.png`);

    expect(res.status).toBe(200);
    expect(res.headers.get("content-type")).toBe("image/png");
    expect(Array.from(new Uint8Array(await res.arrayBuffer()))).toEqual([0x89, 0x50, 0x4e, 0x47]);
  });
});
