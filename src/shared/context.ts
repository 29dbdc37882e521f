import { resolve } from "node:path";
import { ActiveTargetStore } from "../state/active-target.js";
import { InstanceRegistry } from "../state/instances.js";
import { TmuxClient } from "../tmux/index.js";
import type { AppConfig } from "./config.js";
import type { Multiplexer } from "./types.js";

export const ACTIVE_TARGET_FILE = "active_target";
export const INSTANCES_FILE = "instances.json";

/**
 * Everything a handler needs, passed explicitly instead of living in
 * module-level globals.
 */
export interface AppContext {
  config: AppConfig;
  mux: Multiplexer;
  activeTarget: ActiveTargetStore;
  registry: InstanceRegistry;
}

export function createContext(
  config: AppConfig,
  mux: Multiplexer = new TmuxClient()
): AppContext {
  return {
    config,
    mux,
    activeTarget: new ActiveTargetStore(resolve(config.stateDir, ACTIVE_TARGET_FILE)),
    registry: new InstanceRegistry(resolve(config.stateDir, INSTANCES_FILE), mux),
  };
}
