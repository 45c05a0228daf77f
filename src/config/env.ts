import dotenv from "dotenv";
import { join, dirname } from "path";
import { fileURLToPath } from "url";

dotenv.config();

const __dirname = dirname(fileURLToPath(import.meta.url));

export type LogLevel = "debug" | "info" | "warn" | "error";

export const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

export interface AppConfig {
  store: {
    dataDir: string;
    debounceMs: number;
  };
  logLevel: LogLevel;
}

function env(key: string, fallback: string): string {
  return process.env[key] ?? fallback;
}

export function envInt(key: string, fallback: number): number {
  const v = process.env[key];
  if (!v) return fallback;
  const n = parseInt(v, 10);
  return Number.isFinite(n) && n >= 0 ? n : fallback;
}

export function parseLogLevel(raw: string | undefined, fallback: LogLevel = "info"): LogLevel {
  const level = raw?.trim().toLowerCase();
  return LOG_LEVELS.find(l => l === level) ?? fallback;
}

export const config: AppConfig = Object.freeze({
  store: Object.freeze({
    dataDir: env("STORE_DATA_DIR", join(__dirname, "../../data")),
    debounceMs: envInt("STORE_DEBOUNCE_MS", 500),
  }),
  logLevel: parseLogLevel(process.env["LOG_LEVEL"]),
});
