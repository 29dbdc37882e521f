import { loadConfig } from "../shared/config.js";
import { createContext } from "../shared/context.js";
import { configureLogging, createLogger } from "../shared/logger.js";
import { createBot } from "./bot.js";
import { UpdatePoller, retryWithBackoff } from "./poller.js";

const log = createLogger("telegram");

async function main(): Promise<void> {
  const config = loadConfig();
  configureLogging(config.logging);
  const { botToken, chatId } = config.telegram;
  if (!botToken || !chatId) {
    throw new Error(
      "Telegram listener needs RP_TELEGRAM_BOT_TOKEN and RP_TELEGRAM_CHAT_ID"
    );
  }

  const app = createContext(config);
  const bot = createBot(botToken, chatId, app);
  const controller = new AbortController();
  const poller = new UpdatePoller(
    (offset, timeout, signal) =>
      bot.api.getUpdates({ offset, timeout, allowed_updates: ["message"] }, signal),
    (update) => bot.handleUpdate(update)
  );

  const shutdown = () => {
    log.info("Shutting down Telegram listener");
    controller.abort();
    process.exit(0);
  };
  process.on("SIGINT", shutdown);
  process.on("SIGTERM", shutdown);

  if (!(await retryWithBackoff("Bot login", () => bot.init(), controller.signal))) {
    return;
  }

  log.info("Starting Telegram listener", { bot: bot.botInfo.username, chatId });
  await poller.run(controller.signal);
}

main().catch((err) => {
  log.error("Telegram listener failed to start", {
    error: err instanceof Error ? err.message : String(err),
  });
  process.exit(1);
});
