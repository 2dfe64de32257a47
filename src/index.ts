import http from "http";
import { loadConfig } from "./config.js";
import { createPdfTools } from "./pdf-tools.js";
import { initializeQueue } from "./queue.js";
import { createApp } from "./server.js";
import { ensureTempDir, startTempSweeper } from "./temp-dir.js";

async function main(): Promise<void> {
  const config = loadConfig();

  await ensureTempDir(config.tempDir);
  const stopSweeper = startTempSweeper(
    config.tempDir,
    config.cleanup.staleAfterSeconds,
    config.cleanup.sweepIntervalSeconds,
  );

  initializeQueue(config.jobs);

  const tools = createPdfTools(config.tools);
  for (const status of await tools.probe()) {
    if (status.available) {
      console.log(`[pdf-unlocker] Found ${status.name}: ${status.version ?? "unknown version"}`);
    } else {
      console.warn(`[pdf-unlocker] ${status.name} is not available; PDF endpoints will fail.`);
    }
  }

  const app = createApp({ config, tools });
  const server = http.createServer(app);

  function shutdown(signal: string): void {
    console.log(`[pdf-unlocker] Received ${signal}, shutting down.`);
    stopSweeper();
    server.close(() => {
      process.exit(0);
    });
  }

  process.on("SIGTERM", () => shutdown("SIGTERM"));
  process.on("SIGINT", () => shutdown("SIGINT"));

  server.listen(config.port, config.host, () => {
    console.log(`[pdf-unlocker] Server listening on ${config.host}:${config.port}`);
  });
}

main().catch((error: unknown) => {
  console.error("[pdf-unlocker] Failed to start:", error);
  process.exit(1);
});
