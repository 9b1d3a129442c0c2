import "dotenv/config";
import { createLogger } from "@course-rag/core";
import { loadConfig } from "./config/app-config.js";
import { createRagSystem } from "./bootstrap.js";
import { createApp } from "./http/app.js";

async function main(): Promise<void> {
  const config = await loadConfig({ projectRoot: process.cwd(), env: process.env });
  const log = createLogger({ level: config.logLevel, name: "course-rag" });

  const { rag } = await createRagSystem(config, { logger: log });
  const app = createApp({ rag, logger: log });

  const server = app.listen(config.port, config.host, () => {
    log.info({ host: config.host, port: config.port }, "HTTP server started");
  });

  const shutdown = (signal: NodeJS.Signals): void => {
    log.info({ signal }, "shutting down");
    server.close((err) => {
      if (err) {
        log.error({ err }, "server close failed");
        process.exit(1);
      }
      process.exit(0);
    });
  };
  process.once("SIGINT", shutdown);
  process.once("SIGTERM", shutdown);
}

main().catch((err: unknown) => {
  console.error(
    "[course-rag] Fatal error:",
    err instanceof Error ? err.message : String(err)
  );
  process.exit(1);
});
