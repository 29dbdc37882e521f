import { stripDecorativeLines } from "../shared/text.js";
import { resolveTarget, switchTarget } from "../state/index.js";
import type { AppContext } from "../shared/context.js";
import type { InstanceRecord } from "../shared/types.js";

export const WAITING_MESSAGE = "Waiting for an assistant hook to trigger...";

export interface ApiResponse {
  status: number;
  body: Record<string, unknown>;
}

export interface OutputView {
  output: string;
  active: boolean;
  pane?: string;
}

export interface PageState {
  sessionName: string;
  active: boolean;
  output: string;
  instances: InstanceRecord[];
  currentPane: string | null;
}

function ok(body: Record<string, unknown>): ApiResponse {
  return { status: 200, body };
}

function fail(status: number, error: string): ApiResponse {
  return { status, body: { error } };
}

async function captureFiltered(ctx: AppContext, pane: string): Promise<string> {
  const raw = await ctx.mux.capture(pane, ctx.config.webCaptureLines);
  return raw === null ? "" : stripDecorativeLines(raw);
}

export async function getOutput(
  ctx: AppContext,
  paneOverride?: string | null
): Promise<OutputView> {
  const target = await resolveTarget(ctx, paneOverride);
  if (!target) {
    return { output: WAITING_MESSAGE, active: false };
  }
  if (!(await ctx.mux.exists(target.pane))) {
    return { output: `Target ${target.pane} is no longer active.`, active: false };
  }
  return {
    output: await captureFiltered(ctx, target.pane),
    active: true,
    pane: target.pane,
  };
}

export async function getPageState(
  ctx: AppContext,
  paneOverride?: string | null
): Promise<PageState> {
  const [target, instances] = await Promise.all([
    resolveTarget(ctx, paneOverride),
    ctx.registry.listActive(),
  ]);

  if (!target) {
    return {
      sessionName: "No active assistant instance",
      active: false,
      output:
        `${WAITING_MESSAGE}\n\n` +
        "Once the assistant needs your attention, its output will show here.",
      instances,
      currentPane: null,
    };
  }

  const active = await ctx.mux.exists(target.pane);
  return {
    sessionName: `${target.session}:${target.window}`,
    active,
    output: active
      ? await captureFiltered(ctx, target.pane)
      : `Target ${target.pane} is no longer active.\n\nWaiting for the next notification...`,
    instances,
    currentPane: target.pane,
  };
}

export async function sendInput(
  ctx: AppContext,
  body: Record<string, unknown>
): Promise<ApiResponse> {
  const text = typeof body.text === "string" ? body.text.trim() : "";
  if (!text) return fail(400, "No text provided");

  const paneParam = typeof body.pane === "string" ? body.pane : null;
  const target = await resolveTarget(ctx, paneParam);
  if (!target) return fail(404, "No active assistant target");
  if (!(await ctx.mux.exists(target.pane))) {
    return fail(404, "Target no longer active");
  }

  if (!(await ctx.mux.send(target.pane, text))) {
    return fail(500, "Failed to send input");
  }
  return ok({ success: true, message: `Sent: ${text}` });
}

export async function listInstances(
  ctx: AppContext,
  paneOverride?: string | null
): Promise<ApiResponse> {
  const [instances, current] = await Promise.all([
    ctx.registry.listActive(),
    resolveTarget(ctx, paneOverride),
  ]);
  return ok({ instances, current: current?.pane ?? null });
}

export async function switchInstance(
  ctx: AppContext,
  body: Record<string, unknown>
): Promise<ApiResponse> {
  const pane = typeof body.pane === "string" ? body.pane.trim() : "";
  if (!pane) return fail(400, "No pane provided");

  const result = await switchTarget(ctx, pane);
  if (result.ok) {
    return ok({ success: true, ...result.target });
  }
  switch (result.reason) {
    case "not_found":
      return fail(404, "Instance not found");
    case "inactive":
      return fail(404, "Instance no longer active");
    case "write_failed":
      return fail(500, "Failed to switch instance");
  }
}

export async function getHealth(ctx: AppContext): Promise<ApiResponse> {
  const target = ctx.activeTarget.get();
  return ok({
    status: "ok",
    target: target?.pane ?? "none",
    session: target?.session ?? "none",
    window: target?.window ?? "none",
    active: target ? await ctx.mux.exists(target.pane) : false,
    timestamp: new Date().toISOString(),
  });
}
