import { existsSync, mkdirSync, appendFileSync } from "node:fs";
import { dirname, join, resolve } from "node:path";
import { fileURLToPath } from "node:url";

const PROJECT_ROOT = join(dirname(fileURLToPath(import.meta.url)), "..");
const LOGS_DIR = resolve(PROJECT_ROOT, process.env.LOG_DIR ?? "logs");
const LOG_FILE = join(LOGS_DIR, "app.log");
const ERROR_LOG_FILE = join(LOGS_DIR, "error.log");

export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVEL_RANK: Record<LogLevel | "silent", number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

const LOG_COLORS: Record<LogLevel, string> = {
  info: "\x1b[36m", // cyan
  warn: "\x1b[33m", // yellow
  error: "\x1b[31m", // red
  debug: "\x1b[90m", // gray
};

const RESET = "\x1b[0m";

function resolveThreshold(): number {
  const raw = (process.env.LOG_LEVEL ?? "info").toLowerCase();
  if (raw === "debug" || raw === "info" || raw === "warn" || raw === "error" || raw === "silent") {
    return LEVEL_RANK[raw];
  }
  return LEVEL_RANK.info;
}

const threshold = resolveThreshold();
let fileOutputBroken = false;

function getTimestamp(): string {
  return new Date().toLocaleString("en-CA", {
    timeZone: process.env.TZ ?? "Asia/Shanghai",
    year: "numeric",
    month: "2-digit",
    day: "2-digit",
    hour: "2-digit",
    minute: "2-digit",
    second: "2-digit",
    hour12: false,
  });
}

function renderArg(arg: unknown): string {
  if (arg instanceof Error) return arg.message;
  return typeof arg === "object" ? JSON.stringify(arg) : String(arg);
}

function formatLogEntry(
  level: LogLevel,
  message: string,
  ...args: unknown[]
): string {
  const timestamp = getTimestamp();
  const extraArgs =
    args.length > 0 ? " " + args.map(renderArg).join(" ") : "";
  return `[${timestamp}] [${level.toUpperCase()}] ${message}${extraArgs}`;
}

function writeToFile(level: LogLevel, entry: string): void {
  if (fileOutputBroken) return;

  try {
    if (!existsSync(LOGS_DIR)) {
      mkdirSync(LOGS_DIR, { recursive: true });
    }
    appendFileSync(LOG_FILE, entry + "\n", "utf-8");
    if (level === "error") {
      appendFileSync(ERROR_LOG_FILE, entry + "\n", "utf-8");
    }
  } catch (error) {
    // Console output carries on; report the broken file sink once.
    fileOutputBroken = true;
    console.error(`Log file output disabled: ${renderArg(error)}`);
  }
}

function log(level: LogLevel, message: string, ...args: unknown[]): void {
  if (LEVEL_RANK[level] < threshold) return;

  const entry = formatLogEntry(level, message, ...args);
  const color = LOG_COLORS[level];

  // Console output with color
  if (level === "error") {
    console.error(`${color}${entry}${RESET}`);
  } else if (level === "warn") {
    console.warn(`${color}${entry}${RESET}`);
  } else {
    console.log(`${color}${entry}${RESET}`);
  }

  // File output without color
  writeToFile(level, entry);
}

export const logger = {
  info: (message: string, ...args: unknown[]) => log("info", message, ...args),
  warn: (message: string, ...args: unknown[]) => log("warn", message, ...args),
  error: (message: string, ...args: unknown[]) =>
    log("error", message, ...args),
  debug: (message: string, ...args: unknown[]) =>
    log("debug", message, ...args),
};
