import { mkdirSync, readFileSync, writeFileSync } from "node:fs";
import { dirname } from "node:path";
import { createLogger } from "../shared/logger.js";
import type { ActiveTarget } from "../shared/types.js";

const log = createLogger("active-target");

const UNKNOWN = "unknown";

/**
 * Single-slot pointer to the pane that receives remote input.
 * Stored as three lines: pane, session, window.
 */
export class ActiveTargetStore {
  constructor(readonly filePath: string) {}

  get(): ActiveTarget | null {
    let raw: string;
    try {
      raw = readFileSync(this.filePath, "utf-8");
    } catch {
      return null;
    }

    const lines = raw.trim().split("\n").map((l) => l.trim());
    const pane = lines[0];
    if (!pane) return null;

    return {
      pane,
      session: lines[1] || UNKNOWN,
      window: lines[2] || UNKNOWN,
    };
  }

  set(pane: string, session: string, window: string): boolean {
    try {
      mkdirSync(dirname(this.filePath), { recursive: true });
      writeFileSync(this.filePath, `${pane}\n${session}\n${window}\n`, "utf-8");
      log.debug("Active target saved", { pane, session, window });
      return true;
    } catch (err) {
      log.warn("Could not save active target", {
        path: this.filePath,
        error: String(err),
      });
      return false;
    }
  }
}
