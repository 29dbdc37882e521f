import { loadConfig } from "../shared/config.js";
import { createContext } from "../shared/context.js";
import { configureLogging, createLogger } from "../shared/logger.js";
import type { AppConfig } from "../shared/config.js";
import type { ChannelName } from "../shared/types.js";
import type { NotificationChannel } from "./channel.js";
import { dispatchNotification } from "./dispatch.js";
import { pushoverChannel } from "./pushover.js";
import { telegramChannel } from "./telegram.js";

const log = createLogger("notify");

const CHANNELS: Record<ChannelName, (config: AppConfig) => NotificationChannel> = {
  pushover: (config) => pushoverChannel(config.pushover),
  telegram: (config) => telegramChannel(config.telegram, config.publicHost),
};

function isChannelName(value: string | undefined): value is ChannelName {
  return value !== undefined && Object.hasOwn(CHANNELS, value);
}

/**
 * Hook entry point: `notify <pushover|telegram>`.
 * Exit code is non-zero only for usage and configuration errors.
 */
async function main(): Promise<number> {
  const channelArg = process.argv[2];
  if (!isChannelName(channelArg)) {
    log.error(`Usage: notify <${Object.keys(CHANNELS).join("|")}>`, {
      got: channelArg ?? null,
    });
    return 2;
  }

  let config: AppConfig;
  try {
    config = loadConfig();
    configureLogging(config.logging);
  } catch (err) {
    log.error("Error loading config", {
      error: err instanceof Error ? err.message : String(err),
    });
    return 1;
  }

  await dispatchNotification(createContext(config), CHANNELS[channelArg](config), {
    pane: process.env.TMUX_PANE,
    cwd: process.cwd(),
  });
  return 0;
}

main()
  .then((code) => process.exit(code))
  .catch((err) => {
    log.error("Notification hook failed", { error: String(err) });
    process.exit(1);
  });
