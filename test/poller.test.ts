import { describe, expect, test, vi } from "vitest";
import { UpdatePoller, retryWithBackoff } from "../src/telegram/poller.js";
import type { FetchUpdates } from "../src/telegram/poller.js";

interface Update {
  update_id: number;
  text: string;
}

describe("UpdatePoller", () => {
  test("advances the offset past every update it sees", async () => {
    const batches: Update[][] = [
      [
        { update_id: 10, text: "a" },
        { update_id: 11, text: "b" },
      ],
      [],
    ];
    const fetchUpdates = vi.fn<FetchUpdates<Update>>(async () => batches.shift() ?? []);
    const seen: string[] = [];
    const poller = new UpdatePoller(fetchUpdates, async (u) => {
      seen.push(u.text);
    });

    expect(await poller.pollOnce()).toBe(2);
    expect(await poller.pollOnce()).toBe(0);

    expect(seen).toEqual(["a", "b"]);
    expect(poller.nextOffset).toBe(12);
    expect(fetchUpdates.mock.calls.map((c) => [c[0], c[1]])).toEqual([
      [undefined, 30],
      [12, 30],
    ]);
  });

  test("a failing handler drops that update and keeps going", async () => {
    const fetchUpdates = vi.fn<FetchUpdates<Update>>(async () => [
      { update_id: 1, text: "boom" },
      { update_id: 2, text: "ok" },
    ]);
    const seen: string[] = [];
    const poller = new UpdatePoller(fetchUpdates, async (u) => {
      if (u.text === "boom") throw new Error("handler failed");
      seen.push(u.text);
    });

    expect(await poller.pollOnce()).toBe(2);
    expect(seen).toEqual(["ok"]);
    expect(poller.nextOffset).toBe(3);
  });

  test("run backs off after a fetch failure and stops on abort", async () => {
    const controller = new AbortController();
    let calls = 0;
    const fetchUpdates: FetchUpdates<Update> = async () => {
      calls++;
      if (calls === 1) throw new Error("network down");
      controller.abort();
      return [];
    };
    const sleep = vi.fn(async (_ms: number) => {});
    const poller = new UpdatePoller(fetchUpdates, async () => {}, {
      backoffMs: 5000,
      sleep,
    });

    await poller.run(controller.signal);

    expect(calls).toBe(2);
    expect(sleep).toHaveBeenCalledTimes(1);
    expect(sleep).toHaveBeenCalledWith(5000);
  });
});

describe("retryWithBackoff", () => {
  test("retries a failing login after the backoff until it succeeds", async () => {
    let attempts = 0;
    const task = async () => {
      attempts++;
      if (attempts < 3) throw new Error("getMe failed");
    };
    const sleep = vi.fn(async (_ms: number) => {});

    const ok = await retryWithBackoff("Bot login", task, new AbortController().signal, {
      backoffMs: 5000,
      sleep,
    });

    expect(ok).toBe(true);
    expect(attempts).toBe(3);
    expect(sleep.mock.calls).toEqual([[5000], [5000]]);
  });

  test("gives up quietly once aborted", async () => {
    const controller = new AbortController();
    const task = vi.fn(async () => {
      controller.abort();
      throw new Error("network down");
    });
    const sleep = vi.fn(async (_ms: number) => {});

    expect(await retryWithBackoff("Bot login", task, controller.signal, { sleep })).toBe(false);
    expect(task).toHaveBeenCalledTimes(1);
    expect(sleep).not.toHaveBeenCalled();
  });
});
