import { loadConfig } from "../shared/config.js";
import { createContext } from "../shared/context.js";
import { configureLogging, createLogger } from "../shared/logger.js";
import { createWebServer, listenOn } from "./server.js";

const log = createLogger("web");

async function main(): Promise<void> {
  const config = loadConfig();
  configureLogging(config.logging);
  const ctx = createContext(config);
  const server = createWebServer(ctx);

  await listenOn(server, config.port, config.host);
  log.info(`Web control server running at http://${config.host}:${config.port}`);
  const target = ctx.activeTarget.get();
  if (target) {
    log.info("Current target", { ...target });
  } else {
    log.info("No current target (waiting for first notification)");
  }

  server.on("error", (err) => {
    log.error("Web server error", { error: err.message });
  });

  // Graceful shutdown
  function shutdown() {
    log.info("Shutting down web server...");
    server.close(() => process.exit(0));
    // Force exit after 3s
    setTimeout(() => process.exit(0), 3000).unref();
  }

  process.on("SIGINT", shutdown);
  process.on("SIGTERM", shutdown);
}

main().catch((err) => {
  log.error("Web server failed to start", {
    error: err instanceof Error ? err.message : String(err),
  });
  process.exit(1);
});
