import { serve } from "@hono/node-server";
import { createRequire } from "node:module";
import { loadConfig } from "@cliparchive/core/config";
import { createServer } from "./bootstrap.js";

const require = createRequire(import.meta.url);
const pkg = require("../package.json") as { version: string };

const DRAIN_TIMEOUT_MS = 5_000;

async function main(): Promise<void> {
  const rootPath = process.env.CLIPARCHIVE_ROOT_PATH;
  const config = await loadConfig({ rootPath });
  const { app, logger } = await createServer(config, { rootPath });

  const server = serve({ fetch: app.fetch, port: config.server.port }, (info) => {
    logger.info({ port: info.port, version: pkg.version }, "HTTP server started");
  });

  function shutdown(signal: string): void {
    logger.info({ signal }, "Shutdown signal received, draining connections");

    server.close(() => {
      logger.info("Server stopped");
      process.exit(0);
    });

    setTimeout(() => {
      logger.warn("Drain timeout exceeded, forcing exit");
      process.exit(1);
    }, DRAIN_TIMEOUT_MS).unref();
  }

  process.on("SIGTERM", () => shutdown("SIGTERM"));
  process.on("SIGINT", () => shutdown("SIGINT"));
}

main().catch((err) => {
  console.error("Failed to start server:", err);
  process.exit(1);
});
