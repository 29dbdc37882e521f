import { fork, spawn, type ChildProcess } from "node:child_process";
import { existsSync } from "node:fs";
import { resolve } from "node:path";
import { fileURLToPath } from "node:url";
import { loadConfig, webBaseUrl } from "./shared/config.js";
import type { AppConfig } from "./shared/config.js";
import { configureLogging, createLogger } from "./shared/logger.js";

const __dirname = fileURLToPath(new URL(".", import.meta.url));
const log = createLogger("launch");

/** Delay before restarting a component that crashed */
const RESTART_DELAY_MS = 3000;

const children: Array<{ name: string; proc: ChildProcess }> = [];
let shuttingDown = false;

function spawnComponent(name: string, entry: string): ChildProcess {
  if (!existsSync(entry)) {
    log.error(`${name} entry point not found: ${entry}. Run npm run build first.`);
    process.exit(1);
  }

  const proc = entry.endsWith(".ts")
    ? spawn("npx", ["tsx", entry], { stdio: "inherit", env: { ...process.env } })
    : fork(entry, [], { stdio: "inherit", env: { ...process.env } });

  proc.on("exit", (code, signal) => {
    log.info(`${name} exited`, { code, signal });

    if (code !== 0 && !shuttingDown) {
      log.info(`Restarting ${name} in ${RESTART_DELAY_MS / 1000}s...`);
      setTimeout(() => {
        if (shuttingDown) return;
        const idx = children.findIndex((c) => c.proc === proc);
        if (idx !== -1) children.splice(idx, 1);
        spawnComponent(name, entry);
      }, RESTART_DELAY_MS);
    }
  });

  children.push({ name, proc });
  return proc;
}

function shutdown() {
  if (shuttingDown) return;
  shuttingDown = true;
  log.info("Shutting down all components...");

  for (const { name, proc } of children) {
    if (!proc.killed) {
      log.info(`Stopping ${name}`, { pid: proc.pid });
      proc.kill("SIGTERM");
    }
  }

  // Force kill after 5s
  setTimeout(() => {
    for (const { proc } of children) {
      if (!proc.killed) proc.kill("SIGKILL");
    }
    process.exit(0);
  }, 5000).unref();
}

process.on("SIGINT", shutdown);
process.on("SIGTERM", shutdown);

// --- Main ---

let config: AppConfig;
try {
  config = loadConfig();
  configureLogging(config.logging);
} catch (err) {
  log.error("Error loading config", {
    error: err instanceof Error ? err.message : String(err),
  });
  process.exit(1);
}

const isTsx = __dirname.endsWith("/src/") || __dirname.endsWith("/src");
const ext = isTsx ? ".ts" : ".js";
const webEntry = resolve(__dirname, "web", `index${ext}`);
const telegramEntry = resolve(__dirname, "telegram", `index${ext}`);

const args = process.argv.slice(2);
const noWeb = args.includes("--no-web");
const noTelegram = args.includes("--no-telegram");

log.info("Launching remote-pane...");

if (!noWeb) {
  spawnComponent("web", webEntry);
  log.info(`Web UI: ${webBaseUrl(config)}`);
}

if (!noTelegram) {
  if (config.telegram.botToken && config.telegram.chatId) {
    spawnComponent("telegram", telegramEntry);
  } else {
    log.warn("Telegram listener not started: bot token or chat ID missing");
  }
}

log.info("Components launched. Press Ctrl+C to stop.");
