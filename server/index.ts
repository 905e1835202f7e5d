import "dotenv/config";
import { createServer } from "http";
import {
  createStorage,
  createWeatherSource,
  handleCollection,
  loadConfig
} from "../collector";
import { createApp } from "./app";

async function startServer() {
  const config = loadConfig();
  const storage = createStorage(config.storage);
  const source = createWeatherSource(config);

  const app = createApp({
    collect: () =>
      handleCollection({
        source,
        storage,
        regionDelayMs: config.regionDelayMs
      })
  });
  const server = createServer(app);

  server.listen(config.port, () => {
    console.log(`[server] Collector listening on http://localhost:${config.port}/`);
  });
}

startServer().catch((error) => {
  console.error("[server] Failed to start:", error);
  process.exitCode = 1;
});
