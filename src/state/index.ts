import { createLogger } from "../shared/logger.js";
import type { AppContext } from "../shared/context.js";
import type { ActiveTarget } from "../shared/types.js";

const log = createLogger("state");

export type SwitchResult =
  | { ok: true; target: ActiveTarget }
  | { ok: false; reason: "not_found" | "inactive" | "write_failed" };

/**
 * Pick the pane a request should act on. An explicit override wins for
 * this call only; persisted state is never touched.
 */
export async function resolveTarget(
  ctx: AppContext,
  paneOverride?: string | null
): Promise<ActiveTarget | null> {
  if (paneOverride) {
    const info = await ctx.registry.lookup(paneOverride);
    if (info) {
      return { pane: info.pane, session: info.session, window: info.window };
    }
    if (await ctx.mux.exists(paneOverride)) {
      return { pane: paneOverride, session: "unknown", window: "unknown" };
    }
    return null;
  }
  return ctx.activeTarget.get();
}

/**
 * Make `pane` the active target. Only live panes from the registry qualify.
 */
export async function switchTarget(
  ctx: AppContext,
  pane: string
): Promise<SwitchResult> {
  const info = ctx.registry.listAll().find((i) => i.pane === pane);
  if (!info) return { ok: false, reason: "not_found" };
  if (!(await ctx.mux.exists(pane))) return { ok: false, reason: "inactive" };

  if (!ctx.activeTarget.set(info.pane, info.session, info.window)) {
    return { ok: false, reason: "write_failed" };
  }
  log.info("Switched active target", { pane: info.pane, name: info.display_name });
  return {
    ok: true,
    target: { pane: info.pane, session: info.session, window: info.window },
  };
}

/**
 * Record a pane as seen and route remote input to it from now on.
 */
export function activate(ctx: AppContext, target: ActiveTarget): void {
  ctx.activeTarget.set(target.pane, target.session, target.window);
  ctx.registry.record(target.pane, target.session, target.window);
}
