// --- Persisted state ---

/** The single pane that receives remote input by default */
export interface ActiveTarget {
  pane: string;
  session: string;
  window: string;
}

/** One entry of the instance history file */
export interface InstanceRecord {
  pane: string;
  session: string;
  window: string;
  last_active: string; // ISO-8601
  display_name: string; // "{session}:{window}"
}

// --- Multiplexer ---

export interface PaneContext {
  session: string;
  window: string;
}

/**
 * Operations the rest of the system needs from the terminal multiplexer.
 * Implementations never throw: failures surface as null/false.
 */
export interface Multiplexer {
  contextOf(pane: string): Promise<PaneContext | null>;
  capture(target: string, lines: number): Promise<string | null>;
  send(target: string, text: string): Promise<boolean>;
  exists(target: string): Promise<boolean>;
  listSessions(): Promise<string[] | null>;
  newSession(session: string, window: string): Promise<string | null>;
  newWindow(session: string, window: string): Promise<string | null>;
}

// --- Notification channels ---

export type ChannelName = "pushover" | "telegram";

export interface Notification {
  title: string;
  body: string;
  url: string;
}

export function isInstanceRecord(obj: unknown): obj is InstanceRecord {
  if (!obj || typeof obj !== "object") return false;
  const o = obj as Record<string, unknown>;
  return (
    typeof o.pane === "string" &&
    o.pane.length > 0 &&
    typeof o.session === "string" &&
    typeof o.window === "string" &&
    typeof o.last_active === "string" &&
    typeof o.display_name === "string"
  );
}
