import "dotenv/config";
import { createServer } from "http";
import { FileStorage } from "../fusion/ingest/storage";
import { createServer as createApp } from "./app";

async function startServer() {
  const outputDir = process.env.OUTPUT_DIR || "./data";
  const app = createApp(new FileStorage(outputDir));
  const server = createServer(app);

  const port = process.env.PORT || 3000;

  server.listen(port, () => {
    console.log(`[server] Serving forecasts from ${outputDir} on http://localhost:${port}/`);
  });
}

startServer().catch(console.error);
