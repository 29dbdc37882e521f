import { createLogger } from "../shared/logger.js";
import { escapeHtml } from "../shared/text.js";
import { activate, switchTarget } from "../state/index.js";
import { spawnInstance } from "../tmux/index.js";
import type { AppContext } from "../shared/context.js";

const log = createLogger("commands");

/** Window name used by /new when none is given */
export const DEFAULT_WINDOW_NAME = "remote";

export const SWITCH_USAGE = "Usage: /switch N (e.g. /switch 1) or /switch %PANE";

export const HELP_TEXT = `<b>Commands:</b>
/status - Show the active assistant session
/list - List live assistant sessions
/switch N - Switch to session N (or /switch %PANE)
/new [name] - Spawn a new assistant instance
/help - Show this help

<b>Usage:</b>
Any other message is typed into the active session.`;

function code(text: string): string {
  return `<code>${escapeHtml(text)}</code>`;
}

export async function statusReply(app: AppContext): Promise<string> {
  const target = app.activeTarget.get();
  if (!target || !(await app.mux.exists(target.pane))) {
    return "No active assistant session";
  }

  const known = await app.registry.lookup(target.pane);
  const display = known ? `${known.display_name} (${target.pane})` : target.pane;
  return `Active: ${code(display)}`;
}

export async function listReply(app: AppContext): Promise<string> {
  const instances = await app.registry.listActive();
  if (instances.length === 0) return "No assistant sessions found";

  const current = app.activeTarget.get()?.pane;
  const lines = ["<b>Assistant sessions:</b>\n"];
  instances.forEach((inst, i) => {
    const marker = inst.pane === current ? " ✓" : "";
    lines.push(`${i + 1}. ${code(inst.display_name)} ${escapeHtml(inst.pane)}${marker}`);
  });
  lines.push("\nUse /switch N or /switch %PANE to change");
  return lines.join("\n");
}

/**
 * `/switch N` indexes the live list as it is *now*, which may differ from
 * the last /list. A pane id (`/switch %3`) always hits the same pane.
 */
export async function switchReply(app: AppContext, arg: string): Promise<string> {
  const choice = arg.trim();
  if (!choice || /\s/.test(choice)) return SWITCH_USAGE;

  let pane: string;
  if (choice.startsWith("%")) {
    pane = choice;
  } else if (/^-?\d+$/.test(choice)) {
    const instances = await app.registry.listActive();
    const inst = instances[Number(choice) - 1];
    if (!inst) return "Invalid number. Use /list to see available sessions.";
    pane = inst.pane;
  } else {
    return SWITCH_USAGE;
  }

  const result = await switchTarget(app, pane);
  if (result.ok) {
    return `Switched to ${code(`${result.target.session}:${result.target.window}`)}`;
  }
  switch (result.reason) {
    case "not_found":
      return `Unknown session ${code(pane)}. Use /list to see available sessions.`;
    case "inactive":
      return "Session no longer exists";
    case "write_failed":
      return "Could not save the active session. Check logs.";
  }
}

export async function newInstanceReply(app: AppContext, arg: string): Promise<string> {
  const window = arg.trim() || DEFAULT_WINDOW_NAME;
  const spawned = await spawnInstance(app.mux, {
    window,
    command: app.config.assistantCommand,
  });
  if (!spawned) {
    return "Failed to spawn assistant instance. Check logs.";
  }

  activate(app, spawned);
  return `Started ${code(`${spawned.session}:${spawned.window}`)}\nNow active. Send your prompt!`;
}

/**
 * Type a chat message into the active pane, verbatim.
 */
export async function forwardReply(app: AppContext, text: string): Promise<string> {
  const target = app.activeTarget.get();
  if (!target) {
    return "No active assistant session. Wait for a notification first.";
  }
  if (!(await app.mux.exists(target.pane))) {
    return `Session ${code(target.pane)} no longer exists.`;
  }

  if (await app.mux.send(target.pane, text)) {
    log.info("Forwarded message to pane", { pane: target.pane, chars: text.length });
    return "Sent to assistant";
  }
  log.warn("tmux refused input", { pane: target.pane });
  return "Failed to send to assistant";
}
