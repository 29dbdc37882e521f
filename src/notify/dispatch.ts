import { webBaseUrl } from "../shared/config.js";
import { createLogger } from "../shared/logger.js";
import {
  stripDecorativeLines,
  tailNonEmptyLines,
  truncateTail,
} from "../shared/text.js";
import { activate } from "../state/index.js";
import type { AppContext } from "../shared/context.js";
import type { ActiveTarget, Notification } from "../shared/types.js";
import type { NotificationChannel } from "./channel.js";

const log = createLogger("dispatch");

export type DispatchOutcome = "skipped" | "sent" | "failed";

/** Link that opens the web UI scoped to one pane */
export function paneDeepLink(ctx: AppContext, pane: string): string {
  return `${webBaseUrl(ctx.config)}/?pane=${encodeURIComponent(pane)}`;
}

export async function buildBody(
  ctx: AppContext,
  channel: NotificationChannel,
  pane: string
): Promise<string> {
  const raw = await ctx.mux.capture(pane, channel.contextLines);
  const cleaned = raw === null ? null : stripDecorativeLines(raw).trim();
  return truncateTail(tailNonEmptyLines(cleaned, channel.maxLines), channel.maxChars);
}

/**
 * Handle one hook event: mark the invoking pane active, then push its
 * latest output through `channel`.
 */
export async function dispatchNotification(
  ctx: AppContext,
  channel: NotificationChannel,
  invocation: { pane: string | undefined; cwd: string }
): Promise<DispatchOutcome> {
  const { pane, cwd } = invocation;
  if (!pane) {
    log.info("Not running in tmux, skipping notification");
    return "skipped";
  }

  const names = await ctx.mux.contextOf(pane);
  if (!names) {
    log.warn("Could not resolve tmux session for pane", { pane });
  }
  const target: ActiveTarget = {
    pane,
    session: names?.session ?? "unknown",
    window: names?.window ?? "unknown",
  };

  try {
    activate(ctx, target);
  } catch (err) {
    log.warn("Could not update shared state", { pane, error: String(err) });
  }

  const notification: Notification = {
    title: channel.buildTitle(target, cwd),
    body: await buildBody(ctx, channel, pane),
    url: paneDeepLink(ctx, pane),
  };

  const delivered = await channel.deliver(notification);
  log.info(delivered ? "Notification delivered" : "Notification not delivered", {
    channel: channel.name,
    pane,
  });
  return delivered ? "sent" : "failed";
}
