import { execFile } from "node:child_process";
import { promisify } from "node:util";
import { createLogger } from "../shared/logger.js";
import type { Multiplexer, PaneContext } from "../shared/types.js";

const execFileAsync = promisify(execFile);
const log = createLogger("tmux");

/** Timeout for every tmux invocation */
const EXEC_TIMEOUT_MS = 5000;

/** Session created by /new when no tmux server is running yet */
export const DEFAULT_SESSION_NAME = "remote-pane";

export interface RunResult {
  ok: boolean;
  stdout: string;
}

/** Runs `tmux <args>`; injectable so tests never touch a real server */
export type TmuxRunner = (args: string[]) => Promise<RunResult>;

export const execTmux: TmuxRunner = async (args) => {
  try {
    const { stdout } = await execFileAsync("tmux", args, {
      timeout: EXEC_TIMEOUT_MS,
      encoding: "utf8",
    });
    return { ok: true, stdout };
  } catch (err) {
    // Non-zero exit, timeout and ENOENT all land here
    log.debug("tmux command failed", {
      args: args.slice(0, 2),
      error: err instanceof Error ? err.message : String(err),
    });
    return { ok: false, stdout: "" };
  }
};

export class TmuxClient implements Multiplexer {
  constructor(private readonly run: TmuxRunner = execTmux) {}

  async contextOf(pane: string): Promise<PaneContext | null> {
    const session = await this.display(pane, "#S");
    if (session === null) return null;
    const window = await this.display(pane, "#W");
    if (window === null) return null;
    return { session, window };
  }

  async capture(target: string, lines: number): Promise<string | null> {
    const res = await this.run([
      "capture-pane",
      "-p",
      "-t",
      target,
      "-S",
      `-${lines}`,
    ]);
    return res.ok ? res.stdout : null;
  }

  /**
   * Type `text` literally, then press Enter as a separate key event so
   * tmux never parses the text as key names or commands.
   */
  async send(target: string, text: string): Promise<boolean> {
    const typed = await this.run(["send-keys", "-t", target, "-l", text]);
    if (!typed.ok) return false;
    const entered = await this.run(["send-keys", "-t", target, "Enter"]);
    return entered.ok;
  }

  /** Works for pane ids, window targets and session names alike */
  async exists(target: string): Promise<boolean> {
    const res = await this.run(["list-panes", "-t", target]);
    return res.ok;
  }

  async listSessions(): Promise<string[] | null> {
    const res = await this.run(["list-sessions", "-F", "#{session_name}"]);
    if (!res.ok) return null;
    return splitLines(res.stdout);
  }

  async newSession(session: string, window: string): Promise<string | null> {
    const res = await this.run([
      "new-session",
      "-d",
      "-s",
      session,
      "-n",
      window,
      "-P",
      "-F",
      "#{pane_id}",
    ]);
    return res.ok ? firstLine(res.stdout) : null;
  }

  async newWindow(session: string, window: string): Promise<string | null> {
    const res = await this.run([
      "new-window",
      "-t",
      `${session}:`,
      "-n",
      window,
      "-P",
      "-F",
      "#{pane_id}",
    ]);
    return res.ok ? firstLine(res.stdout) : null;
  }

  private async display(pane: string, format: string): Promise<string | null> {
    const res = await this.run(["display-message", "-p", "-t", pane, format]);
    return res.ok ? res.stdout.trim() : null;
  }
}

export interface SpawnedInstance {
  pane: string;
  session: string;
  window: string;
}

/**
 * Open a new window running the assistant. Reuses the first existing
 * session, creating one when no tmux server is up.
 */
export async function spawnInstance(
  mux: Multiplexer,
  params: { window: string; command: string }
): Promise<SpawnedInstance | null> {
  const sessions = await mux.listSessions();
  const existing = sessions?.[0];

  let session: string;
  let pane: string | null;
  if (existing) {
    session = existing;
    pane = await mux.newWindow(session, params.window);
  } else {
    session = DEFAULT_SESSION_NAME;
    pane = await mux.newSession(session, params.window);
  }

  if (!pane) {
    log.error("Failed to open tmux window", { session, window: params.window });
    return null;
  }

  if (!(await mux.send(pane, params.command))) {
    log.error("Failed to start assistant in new pane", { pane });
    return null;
  }

  log.info("Spawned assistant instance", { pane, session, window: params.window });
  return { pane, session, window: params.window };
}

function splitLines(stdout: string): string[] {
  return stdout
    .split("\n")
    .map((l) => l.trim())
    .filter(Boolean);
}

function firstLine(stdout: string): string | null {
  return splitLines(stdout)[0] ?? null;
}
