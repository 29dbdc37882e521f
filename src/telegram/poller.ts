import { setTimeout as sleep } from "node:timers/promises";
import { createLogger } from "../shared/logger.js";

const log = createLogger("poller");

/** Long-poll window passed to getUpdates (seconds) */
export const LONG_POLL_TIMEOUT_SECONDS = 30;

/** Pause before retrying after the loop itself fails (ms) */
export const RETRY_BACKOFF_MS = 5000;

export type FetchUpdates<U> = (
  offset: number | undefined,
  timeoutSeconds: number,
  signal?: AbortSignal
) => Promise<U[]>;

export interface PollerOptions {
  timeoutSeconds?: number;
  backoffMs?: number;
  sleep?: (ms: number) => Promise<void>;
}

/**
 * Run `task` until it succeeds, waiting `backoffMs` after each failure.
 * Resolves false if `signal` aborts first.
 */
export async function retryWithBackoff(
  label: string,
  task: () => Promise<void>,
  signal: AbortSignal,
  options: Pick<PollerOptions, "backoffMs" | "sleep"> = {}
): Promise<boolean> {
  const backoffMs = options.backoffMs ?? RETRY_BACKOFF_MS;
  const pause = options.sleep ?? ((ms: number) => sleep(ms));
  while (!signal.aborted) {
    try {
      await task();
      return true;
    } catch (err) {
      if (signal.aborted) break;
      log.error(`${label} failed, retrying`, { error: String(err), backoffMs });
      await pause(backoffMs);
    }
  }
  return false;
}

/**
 * Sequential long-poll loop. The offset moves past an update before it is
 * handled, so a failing update is dropped rather than redelivered.
 */
export class UpdatePoller<U extends { update_id: number }> {
  private offset: number | undefined;
  private readonly timeoutSeconds: number;
  private readonly backoffMs: number;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(
    private readonly fetchUpdates: FetchUpdates<U>,
    private readonly handle: (update: U) => Promise<void>,
    options: PollerOptions = {}
  ) {
    this.timeoutSeconds = options.timeoutSeconds ?? LONG_POLL_TIMEOUT_SECONDS;
    this.backoffMs = options.backoffMs ?? RETRY_BACKOFF_MS;
    this.sleep = options.sleep ?? ((ms) => sleep(ms));
  }

  get nextOffset(): number | undefined {
    return this.offset;
  }

  /** One getUpdates round trip; returns how many updates arrived */
  async pollOnce(signal?: AbortSignal): Promise<number> {
    const updates = await this.fetchUpdates(this.offset, this.timeoutSeconds, signal);
    for (const update of updates) {
      this.offset = update.update_id + 1;
      try {
        await this.handle(update);
      } catch (err) {
        log.error("Failed to handle update", {
          updateId: update.update_id,
          error: String(err),
        });
      }
    }
    return updates.length;
  }

  async run(signal: AbortSignal): Promise<void> {
    while (!signal.aborted) {
      try {
        await this.pollOnce(signal);
      } catch (err) {
        if (signal.aborted) break;
        log.error("Polling failed, retrying", {
          error: String(err),
          backoffMs: this.backoffMs,
        });
        await this.sleep(this.backoffMs);
      }
    }
  }
}
