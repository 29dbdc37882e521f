import { Api, InlineKeyboard } from "grammy";
import { createLogger } from "../shared/logger.js";
import { escapeHtml } from "../shared/text.js";
import type { TelegramConfig } from "../shared/config.js";
import type { Notification } from "../shared/types.js";
import type { NotificationChannel } from "./channel.js";

const log = createLogger("telegram-notify");

/** Telegram allows 4096 chars; the rest is reserved for title and markup */
export const TELEGRAM_MAX_CHARS = 3500;

const REQUEST_TIMEOUT_SECONDS = 15;

/** The slice of the Bot API client this module needs */
export interface TelegramTransport {
  sendMessage(
    chatId: string,
    text: string,
    other: Parameters<Api["sendMessage"]>[2]
  ): Promise<unknown>;
}

export function buildTelegramMessage(notification: Notification): {
  text: string;
  keyboard: InlineKeyboard;
} {
  return {
    text: `<b>${escapeHtml(notification.title)}</b>\n\n<pre>${escapeHtml(notification.body)}</pre>`,
    keyboard: new InlineKeyboard().url("Open Remote UI", notification.url),
  };
}

/**
 * Short label for the title: first DNS label of the public host, or the
 * tmux session name when no public host is configured.
 */
export function shortHostLabel(publicHost: string, session: string): string {
  const host = publicHost.trim();
  return host ? host.split(".")[0] : session;
}

export async function sendTelegram(
  config: TelegramConfig,
  notification: Notification,
  transport?: TelegramTransport
): Promise<boolean> {
  if (!config.enabled) {
    log.info("Telegram notifications disabled in config");
    return false;
  }
  if (!config.botToken) {
    log.warn("Telegram bot token not configured");
    return false;
  }
  if (!config.chatId) {
    log.warn("Telegram chat ID not configured");
    return false;
  }

  const api: TelegramTransport =
    transport ??
    new Api(config.botToken, { timeoutSeconds: REQUEST_TIMEOUT_SECONDS });
  const { text, keyboard } = buildTelegramMessage(notification);

  try {
    await api.sendMessage(config.chatId, text, {
      parse_mode: "HTML",
      link_preview_options: { is_disabled: true },
      reply_markup: keyboard,
    });
    log.info("Telegram notification sent", { title: notification.title });
    return true;
  } catch (err) {
    log.error("Telegram notification failed", { error: String(err) });
    return false;
  }
}

export function telegramChannel(
  config: TelegramConfig,
  publicHost: string,
  transport?: TelegramTransport
): NotificationChannel {
  return {
    name: "telegram",
    contextLines: config.contextLines,
    maxLines: config.maxLines,
    maxChars: TELEGRAM_MAX_CHARS,
    buildTitle: (target) =>
      `${shortHostLabel(publicHost, target.session)}: ${target.window}`,
    deliver: (notification) => sendTelegram(config, notification, transport),
  };
}
