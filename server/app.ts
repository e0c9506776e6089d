import express, { type Express, type Response } from "express";
import { parseDateKey } from "../fusion/time";
import { chartKey, latestRecordKey, parseRecord, recordKey, serializeRecord } from "../fusion/record";
import type { StorageBackend } from "../fusion/ingest/storage";

function isDateKey(value: string): boolean {
  return parseDateKey(value) !== null;
}

async function sendRecord(res: Response, storage: StorageBackend, key: string): Promise<void> {
  const bytes = await storage.get(key);
  if (!bytes) {
    res.status(404).json({ error: "Forecast not found" });
    return;
  }
  // Round-trip through the parser so a corrupted record is never served.
  const record = parseRecord(new TextDecoder().decode(bytes));
  res.type("application/json").send(serializeRecord(record));
}

export function createServer(storage: StorageBackend): Express {
  const app = express();

  app.get("/api/forecasts/latest/:city", async (req, res) => {
    try {
      await sendRecord(res, storage, latestRecordKey(req.params.city));
    } catch (error) {
      console.error("[server] Latest forecast read failed:", error);
      res.status(500).json({ error: "Failed to read forecast" });
    }
  });

  app.get("/api/forecasts/:date/:city", async (req, res) => {
    const { date, city } = req.params;
    if (!isDateKey(date)) {
      res.status(400).json({ error: "Invalid date (expected YYYY-MM-DD)" });
      return;
    }

    try {
      await sendRecord(res, storage, recordKey(date, city));
    } catch (error) {
      console.error("[server] Forecast read failed:", error);
      res.status(500).json({ error: "Failed to read forecast" });
    }
  });

  app.get("/charts/:date/:city.png", async (req, res) => {
    const { date, city } = req.params;
    if (!isDateKey(date)) {
      res.status(400).json({ error: "Invalid date (expected YYYY-MM-DD)" });
      return;
    }

    try {
      const bytes = await storage.get(chartKey(date, city));
      if (!bytes) {
        res.status(404).json({ error: "Chart not found" });
        return;
      }
      res.type("image/png").send(Buffer.from(bytes));
    } catch (error) {
      console.error("[server] Chart read failed:", error);
      res.status(500).json({ error: "Failed to read chart" });
    }
  });

  return app;
}
