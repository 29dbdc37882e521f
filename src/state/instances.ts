import { mkdirSync, readFileSync, renameSync, writeFileSync } from "node:fs";
import { dirname } from "node:path";
import { createLogger } from "../shared/logger.js";
import { isInstanceRecord } from "../shared/types.js";
import type { InstanceRecord, Multiplexer } from "../shared/types.js";

const log = createLogger("instances");

/** Most-recent entries kept in the history file */
export const MAX_INSTANCES = 10;

/**
 * Recency-ordered history of panes that have run the assistant.
 * Entries are only hidden on read once their pane is gone; the file
 * itself only loses entries past the cap.
 */
export class InstanceRegistry {
  constructor(
    readonly filePath: string,
    private readonly mux: Pick<Multiplexer, "exists">,
    private readonly now: () => Date = () => new Date()
  ) {}

  record(pane: string, session: string, window: string): InstanceRecord {
    const entry: InstanceRecord = {
      pane,
      session,
      window,
      last_active: this.now().toISOString(),
      display_name: `${session}:${window}`,
    };

    const instances = [
      entry,
      ...this.listAll().filter((i) => i.pane !== pane),
    ].slice(0, MAX_INSTANCES);

    this.save(instances);
    return entry;
  }

  /** Persisted history, without checking which panes are still alive */
  listAll(): InstanceRecord[] {
    let parsed: unknown;
    try {
      parsed = JSON.parse(readFileSync(this.filePath, "utf-8"));
    } catch {
      return [];
    }
    if (!Array.isArray(parsed)) return [];
    return parsed.filter(isInstanceRecord);
  }

  async listActive(): Promise<InstanceRecord[]> {
    const all = this.listAll();
    const alive = await Promise.all(all.map((i) => this.mux.exists(i.pane)));
    return all.filter((_, idx) => alive[idx]);
  }

  async lookup(pane: string): Promise<InstanceRecord | null> {
    const active = await this.listActive();
    return active.find((i) => i.pane === pane) ?? null;
  }

  private save(instances: InstanceRecord[]): void {
    const tmpPath = `${this.filePath}.${process.pid}.tmp`;
    try {
      mkdirSync(dirname(this.filePath), { recursive: true });
      writeFileSync(tmpPath, JSON.stringify(instances, null, 2), "utf-8");
      renameSync(tmpPath, this.filePath);
    } catch (err) {
      log.warn("Could not save instance history", {
        path: this.filePath,
        error: String(err),
      });
    }
  }
}
