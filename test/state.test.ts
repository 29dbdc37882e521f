import fs from "node:fs";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, test } from "vitest";
import { ActiveTargetStore } from "../src/state/active-target.js";
import { InstanceRegistry, MAX_INSTANCES } from "../src/state/instances.js";
import { resolveTarget, switchTarget } from "../src/state/index.js";
import { FakeMux, testContext, tmpDir } from "./helpers.js";

let dir: string;

beforeEach(() => {
  dir = tmpDir();
});

afterEach(() => {
  fs.rmSync(dir, { recursive: true, force: true });
});

describe("ActiveTargetStore", () => {
  test("get returns exactly what set stored", () => {
    const store = new ActiveTargetStore(path.join(dir, "active_target"));
    expect(store.set("%1", "s", "w")).toBe(true);
    expect(store.get()).toEqual({ pane: "%1", session: "s", window: "w" });
    expect(fs.readFileSync(store.filePath, "utf-8")).toBe("%1\ns\nw\n");
  });

  test("missing or empty file means no target", () => {
    const store = new ActiveTargetStore(path.join(dir, "active_target"));
    expect(store.get()).toBeNull();
    fs.writeFileSync(store.filePath, "\n");
    expect(store.get()).toBeNull();
  });

  test("partial record fills in unknown placeholders", () => {
    const store = new ActiveTargetStore(path.join(dir, "active_target"));
    fs.writeFileSync(store.filePath, "%4\n");
    expect(store.get()).toEqual({ pane: "%4", session: "unknown", window: "unknown" });
  });

  test("write failure is reported, not thrown", () => {
    const blocker = path.join(dir, "blocker");
    fs.writeFileSync(blocker, "");
    const store = new ActiveTargetStore(path.join(blocker, "active_target"));
    expect(store.set("%1", "s", "w")).toBe(false);
  });
});

describe("InstanceRegistry", () => {
  function registry(mux: FakeMux, now = () => new Date("2026-01-02T03:04:05.000Z")) {
    return new InstanceRegistry(path.join(dir, "instances.json"), mux, now);
  }

  test("records newest first with a display name and timestamp", () => {
    const reg = registry(new FakeMux());
    reg.record("%1", "work", "api");

    expect(reg.listAll()).toEqual([
      {
        pane: "%1",
        session: "work",
        window: "api",
        last_active: "2026-01-02T03:04:05.000Z",
        display_name: "work:api",
      },
    ]);
  });

  test("never holds more than the cap", () => {
    const reg = registry(new FakeMux());
    for (let i = 1; i <= 12; i++) reg.record(`%${i}`, "s", `w${i}`);

    const panes = reg.listAll().map((i) => i.pane);
    expect(panes).toHaveLength(MAX_INSTANCES);
    expect(panes[0]).toBe("%12");
    expect(panes[MAX_INSTANCES - 1]).toBe("%3");
  });

  test("re-recording a pane moves it to the front without duplicating", () => {
    const reg = registry(new FakeMux());
    reg.record("%1", "s", "a");
    reg.record("%2", "s", "b");
    reg.record("%1", "s", "renamed");

    expect(reg.listAll().map((i) => [i.pane, i.window])).toEqual([
      ["%1", "renamed"],
      ["%2", "b"],
    ]);
  });

  test("listActive hides dead panes but keeps them on disk", async () => {
    const mux = new FakeMux().addPane("%1", "s", "a").addPane("%3", "s", "c");
    const reg = registry(mux);
    reg.record("%1", "s", "a");
    reg.record("%2", "s", "b");
    reg.record("%3", "s", "c");

    expect((await reg.listActive()).map((i) => i.pane)).toEqual(["%3", "%1"]);
    expect(reg.listAll().map((i) => i.pane)).toEqual(["%3", "%2", "%1"]);
    expect(await reg.lookup("%2")).toBeNull();
    expect((await reg.lookup("%1"))?.display_name).toBe("s:a");
  });

  test("corrupt history reads as empty and is replaced on the next record", () => {
    const reg = registry(new FakeMux());
    fs.writeFileSync(reg.filePath, "{not json");
    expect(reg.listAll()).toEqual([]);

    reg.record("%5", "s", "w");
    expect(JSON.parse(fs.readFileSync(reg.filePath, "utf-8"))).toHaveLength(1);
  });

  test("malformed entries are skipped", () => {
    const reg = registry(new FakeMux());
    fs.writeFileSync(
      reg.filePath,
      JSON.stringify([
        { pane: "%1", session: "s", window: "w", last_active: "t", display_name: "s:w" },
        { session: "no-pane" },
        "junk",
      ])
    );
    expect(reg.listAll().map((i) => i.pane)).toEqual(["%1"]);
  });
});

describe("target resolution", () => {
  test("an override wins for one call without touching stored state", async () => {
    const mux = new FakeMux().addPane("%1", "s", "one").addPane("%2", "s", "two");
    const ctx = testContext(dir, mux);
    ctx.activeTarget.set("%1", "s", "one");
    ctx.registry.record("%2", "s", "two");

    expect(await resolveTarget(ctx, "%2")).toEqual({ pane: "%2", session: "s", window: "two" });
    expect(ctx.activeTarget.get()?.pane).toBe("%1");
  });

  test("a live pane outside the registry resolves with unknown names", async () => {
    const ctx = testContext(dir, new FakeMux().addPane("%8", "s", "w"));
    expect(await resolveTarget(ctx, "%8")).toEqual({
      pane: "%8",
      session: "unknown",
      window: "unknown",
    });
    expect(await resolveTarget(ctx, "%9")).toBeNull();
  });

  test("switchTarget distinguishes unknown and dead panes", async () => {
    const mux = new FakeMux().addPane("%1", "s", "one");
    const ctx = testContext(dir, mux);
    ctx.registry.record("%1", "s", "one");
    ctx.registry.record("%2", "s", "two");

    expect(await switchTarget(ctx, "%7")).toEqual({ ok: false, reason: "not_found" });
    expect(await switchTarget(ctx, "%2")).toEqual({ ok: false, reason: "inactive" });
    expect(await switchTarget(ctx, "%1")).toEqual({
      ok: true,
      target: { pane: "%1", session: "s", window: "one" },
    });
    expect(ctx.activeTarget.get()).toEqual({ pane: "%1", session: "s", window: "one" });
  });
});
