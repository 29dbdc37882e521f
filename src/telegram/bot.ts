import { Bot } from "grammy";
import type { BotConfig, CommandContext, Context, Filter } from "grammy";
import { createLogger } from "../shared/logger.js";
import type { AppContext } from "../shared/context.js";
import {
  HELP_TEXT,
  forwardReply,
  listReply,
  newInstanceReply,
  statusReply,
  switchReply,
} from "./commands.js";

const log = createLogger("bot");

async function replyHtml(ctx: Context, html: string): Promise<void> {
  const messageId = ctx.msg?.message_id;
  await ctx.reply(html, {
    parse_mode: "HTML",
    ...(messageId ? { reply_parameters: { message_id: messageId } } : {}),
  });
}

/**
 * Wrap a handler so a failure is logged and reported in the chat.
 */
function safe<C extends Context>(
  handler: (ctx: C) => Promise<void>
): (ctx: C) => Promise<void> {
  return async (ctx) => {
    try {
      await handler(ctx);
    } catch (err) {
      log.error("Command handler error", { error: String(err) });
      try {
        await ctx.reply(`Error: ${String(err)}`);
      } catch (replyErr) {
        log.error("Could not report error to chat", { error: String(replyErr) });
      }
    }
  };
}

/**
 * Wire chat commands onto a grammy bot. Polling is driven separately so the
 * offset handling stays explicit.
 */
export function createBot(
  token: string,
  chatId: string,
  app: AppContext,
  options?: BotConfig<Context>
): Bot {
  const bot = new Bot(token, options);

  // Only the configured chat may drive the terminal; everyone else is ignored
  bot.use(async (ctx, next) => {
    if (String(ctx.chat?.id ?? "") !== chatId) {
      log.debug("Ignoring message from other chat", { chatId: ctx.chat?.id });
      return;
    }
    await next();
  });

  bot.command(
    "status",
    safe(async (ctx: CommandContext<Context>) => replyHtml(ctx, await statusReply(app)))
  );
  bot.command(
    ["list", "panes"],
    safe(async (ctx: CommandContext<Context>) => replyHtml(ctx, await listReply(app)))
  );
  bot.command(
    "switch",
    safe(async (ctx: CommandContext<Context>) =>
      replyHtml(ctx, await switchReply(app, ctx.match))
    )
  );
  bot.command(
    "new",
    safe(async (ctx: CommandContext<Context>) => {
      await replyHtml(ctx, "Spawning new assistant instance...");
      await replyHtml(ctx, await newInstanceReply(app, ctx.match));
    })
  );
  bot.command(
    "help",
    safe(async (ctx: CommandContext<Context>) => replyHtml(ctx, HELP_TEXT))
  );

  // Everything else, unknown slash commands included, goes to the pane
  bot.on(
    "message:text",
    safe(async (ctx: Filter<Context, "message:text">) =>
      replyHtml(ctx, await forwardReply(app, ctx.msg.text))
    )
  );

  return bot;
}
