import { existsSync, readFileSync } from "node:fs";
import { homedir } from "node:os";
import { resolve } from "node:path";
import { fileURLToPath } from "node:url";
import { parse } from "dotenv";
import { LOG_LEVELS, parseLogLevel } from "./logger.js";
import type { LoggingOptions } from "./logger.js";

const __dirname = fileURLToPath(new URL(".", import.meta.url));

/** Project root — resolved relative to this module, not the caller's cwd */
export const projectRoot = resolve(__dirname, "..", "..");

export interface PushoverConfig {
  enabled: boolean;
  appToken: string | null;
  userKey: string | null;
  /** Lines captured from the pane before filtering */
  contextLines: number;
  /** Non-empty lines kept for the notification body */
  maxLines: number;
}

export interface TelegramConfig {
  enabled: boolean;
  botToken: string | null;
  chatId: string | null;
  contextLines: number;
  maxLines: number;
}

export interface AppConfig {
  configFile: string;
  host: string;
  port: number;
  /** Hostname used in links sent to phones; empty means localhost */
  publicHost: string;
  stateDir: string;
  webCaptureLines: number;
  assistantCommand: string;
  pushover: PushoverConfig;
  telegram: TelegramConfig;
  logging: LoggingOptions;
}

type EnvSource = Record<string, string | undefined>;

const PLACEHOLDER = /^YOUR_[A-Z0-9_]+_HERE$/;

function reader(source: EnvSource) {
  function env(key: string, fallback?: string): string {
    const val = source[key]?.trim() || fallback;
    if (val === undefined) {
      throw new Error(`Missing required configuration value: ${key}`);
    }
    return val;
  }

  function envInt(key: string, fallback: string, min = 1): number {
    const raw = env(key, fallback);
    const parsed = Number(raw);
    if (!Number.isInteger(parsed) || parsed < min) {
      throw new Error(
        `Invalid value for ${key}: "${raw}" (expected integer >= ${min})`
      );
    }
    return parsed;
  }

  function envBool(key: string, fallback: boolean): boolean {
    const raw = source[key]?.trim().toLowerCase();
    if (raw === undefined || raw === "") return fallback;
    if (["1", "true", "yes", "on"].includes(raw)) return true;
    if (["0", "false", "no", "off"].includes(raw)) return false;
    throw new Error(`Invalid value for ${key}: "${raw}" (expected true/false)`);
  }

  /** Credential lookup: unset, blank and template placeholders all mean "absent" */
  function envSecret(key: string): string | null {
    const raw = source[key]?.trim();
    if (!raw || PLACEHOLDER.test(raw)) return null;
    return raw;
  }

  function envLogLevel(key: string): LoggingOptions["level"] {
    const raw = env(key, "info");
    const level = parseLogLevel(raw);
    if (!level) {
      throw new Error(
        `Invalid value for ${key}: "${raw}" (expected one of ${LOG_LEVELS.join(", ")})`
      );
    }
    return level;
  }

  return { env, envInt, envBool, envSecret, envLogLevel };
}

function expandHome(p: string): string {
  if (p === "~") return homedir();
  if (p.startsWith("~/")) return resolve(homedir(), p.slice(2));
  return p;
}

export function defaultConfigFile(env: EnvSource = process.env): string {
  return env.RP_CONFIG_FILE ?? resolve(projectRoot, ".env");
}

/**
 * Load configuration from a dotenv file, with real environment variables
 * taking precedence over file values. Throws when the file is missing or a
 * value is malformed.
 */
export function loadConfig(
  options: { file?: string; env?: EnvSource } = {}
): AppConfig {
  const processEnv = options.env ?? process.env;
  const configFile = options.file ?? defaultConfigFile(processEnv);

  if (!existsSync(configFile)) {
    throw new Error(
      `Config file not found: ${configFile}\n` +
        "Copy .env.example to .env and fill in your channel credentials."
    );
  }

  let fileValues: Record<string, string>;
  try {
    fileValues = parse(readFileSync(configFile, "utf-8"));
  } catch (err) {
    throw new Error(`Could not read config file ${configFile}: ${String(err)}`);
  }

  const { env, envInt, envBool, envSecret, envLogLevel } = reader({
    ...fileValues,
    ...processEnv,
  });

  const logDir = env("RP_LOG_DIR", "");

  return {
    configFile,
    host: env("RP_HOST", "0.0.0.0"),
    port: envInt("RP_PORT", "5001"),
    publicHost: env("RP_PUBLIC_HOST", ""),
    stateDir: resolve(
      projectRoot,
      expandHome(env("RP_STATE_DIR", resolve(homedir(), ".remote-pane")))
    ),
    webCaptureLines: envInt("RP_WEB_CAPTURE_LINES", "50"),
    assistantCommand: env("RP_ASSISTANT_COMMAND", "claude"),
    pushover: {
      enabled: envBool("RP_PUSHOVER_ENABLED", false),
      appToken: envSecret("RP_PUSHOVER_APP_TOKEN"),
      userKey: envSecret("RP_PUSHOVER_USER_KEY"),
      contextLines: envInt("RP_PUSHOVER_CONTEXT_LINES", "15"),
      maxLines: envInt("RP_PUSHOVER_MAX_LINES", "10"),
    },
    telegram: {
      enabled: envBool("RP_TELEGRAM_ENABLED", false),
      botToken: envSecret("RP_TELEGRAM_BOT_TOKEN"),
      chatId: envSecret("RP_TELEGRAM_CHAT_ID"),
      contextLines: envInt("RP_TELEGRAM_CONTEXT_LINES", "50"),
      maxLines: envInt("RP_TELEGRAM_MAX_LINES", "30"),
    },
    logging: {
      level: envLogLevel("RP_LOG_LEVEL"),
      dir: logDir ? resolve(projectRoot, expandHome(logDir)) : null,
    },
  };
}

/** Base URL of the web control server as seen from a phone */
export function webBaseUrl(config: AppConfig): string {
  const host = config.publicHost || "localhost";
  return `http://${host}:${config.port}`;
}
