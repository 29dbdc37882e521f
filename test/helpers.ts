import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { createContext } from "../src/shared/context.js";
import type { AppConfig } from "../src/shared/config.js";
import type { AppContext } from "../src/shared/context.js";
import type { Multiplexer, PaneContext } from "../src/shared/types.js";

interface FakePane {
  session: string;
  window: string;
  output: string | null;
}

/** In-memory stand-in for tmux */
export class FakeMux implements Multiplexer {
  readonly panes = new Map<string, FakePane>();
  readonly sent: Array<{ target: string; text: string }> = [];
  sendFails = false;
  spawnFails = false;
  private nextPaneId = 100;

  addPane(pane: string, session: string, window: string, output: string | null = ""): this {
    this.panes.set(pane, { session, window, output });
    return this;
  }

  removePane(pane: string): void {
    this.panes.delete(pane);
  }

  async contextOf(pane: string): Promise<PaneContext | null> {
    const p = this.panes.get(pane);
    return p ? { session: p.session, window: p.window } : null;
  }

  async capture(target: string): Promise<string | null> {
    return this.panes.get(target)?.output ?? null;
  }

  async send(target: string, text: string): Promise<boolean> {
    if (this.sendFails || !this.panes.has(target)) return false;
    this.sent.push({ target, text });
    return true;
  }

  async exists(target: string): Promise<boolean> {
    return this.panes.has(target);
  }

  async listSessions(): Promise<string[] | null> {
    const sessions = [...new Set([...this.panes.values()].map((p) => p.session))];
    return sessions.length > 0 ? sessions : null;
  }

  async newSession(session: string, window: string): Promise<string | null> {
    return this.open(session, window);
  }

  async newWindow(session: string, window: string): Promise<string | null> {
    return this.open(session, window);
  }

  private open(session: string, window: string): string | null {
    if (this.spawnFails) return null;
    const pane = `%${this.nextPaneId++}`;
    this.addPane(pane, session, window);
    return pane;
  }
}

export function tmpDir(): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), "remote-pane-test-"));
}

export function testConfig(stateDir: string, overrides: Partial<AppConfig> = {}): AppConfig {
  return {
    configFile: path.join(stateDir, ".env"),
    host: "127.0.0.1",
    port: 5001,
    publicHost: "",
    stateDir,
    webCaptureLines: 50,
    assistantCommand: "claude",
    pushover: {
      enabled: true,
      appToken: "test-app-token",
      userKey: "test-user-key",
      contextLines: 15,
      maxLines: 10,
    },
    telegram: {
      enabled: true,
      botToken: "test-bot-token",
      chatId: "12345",
      contextLines: 50,
      maxLines: 30,
    },
    logging: { level: "info", dir: null },
    ...overrides,
  };
}

export function testContext(
  stateDir: string,
  mux: FakeMux,
  overrides: Partial<AppConfig> = {}
): AppContext {
  return createContext(testConfig(stateDir, overrides), mux);
}
