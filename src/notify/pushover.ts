import { basename } from "node:path";
import { createLogger } from "../shared/logger.js";
import type { PushoverConfig } from "../shared/config.js";
import type { Notification } from "../shared/types.js";
import type { NotificationChannel } from "./channel.js";

const log = createLogger("pushover");

export const PUSHOVER_API_URL = "https://api.pushover.net/1/messages.json";

/** Pushover caps messages at 1024 chars; leave room for the marker */
export const PUSHOVER_MAX_CHARS = 900;

const REQUEST_TIMEOUT_MS = 10_000;

export type FetchFn = typeof fetch;

export function buildPushoverPayload(
  credentials: { appToken: string; userKey: string },
  notification: Notification
): Record<string, string> {
  return {
    token: credentials.appToken,
    user: credentials.userKey,
    message: notification.body,
    title: notification.title,
    url: notification.url,
    url_title: "Open Remote UI",
    priority: "0",
    monospace: "1",
  };
}

export async function sendPushover(
  config: PushoverConfig,
  notification: Notification,
  fetchImpl: FetchFn = fetch
): Promise<boolean> {
  if (!config.enabled) {
    log.info("Pushover notifications disabled in config");
    return false;
  }
  if (!config.appToken || !config.userKey) {
    log.warn("Pushover credentials not configured");
    return false;
  }

  const payload = buildPushoverPayload(
    { appToken: config.appToken, userKey: config.userKey },
    notification
  );

  try {
    const res = await fetchImpl(PUSHOVER_API_URL, {
      method: "POST",
      body: new URLSearchParams(payload),
      signal: AbortSignal.timeout(REQUEST_TIMEOUT_MS),
    });
    if (res.status === 200) {
      log.info("Pushover notification sent", { title: notification.title });
      return true;
    }
    log.error("Pushover rejected notification", {
      status: res.status,
      response: (await res.text()).slice(0, 500),
    });
    return false;
  } catch (err) {
    log.error("Error sending Pushover notification", { error: String(err) });
    return false;
  }
}

export function pushoverChannel(
  config: PushoverConfig,
  fetchImpl: FetchFn = fetch
): NotificationChannel {
  return {
    name: "pushover",
    contextLines: config.contextLines,
    maxLines: config.maxLines,
    maxChars: PUSHOVER_MAX_CHARS,
    buildTitle: (target, cwd) =>
      `${target.session}: ${target.window} - ${basename(cwd)}`,
    deliver: (notification) => sendPushover(config, notification, fetchImpl),
  };
}
