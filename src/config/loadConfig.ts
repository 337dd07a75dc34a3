import fs from "node:fs";
import path from "node:path";
import { AppConfig, ConfigOverrides } from "./types";

const DEFAULT_CONFIG: AppConfig = {
  userAgent: "ipma-forecast-collector/1.0",
  requestTimeoutMs: 45_000,
  pauseBetweenRequestsMs: 2_000,
  outputDir: ".",
  ignoreHttpsErrors: false,
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function pickOverrides(raw: Record<string, unknown>): ConfigOverrides {
  const overrides: ConfigOverrides = {};
  if (typeof raw.userAgent === "string") {
    overrides.userAgent = raw.userAgent;
  }
  if (typeof raw.requestTimeoutMs === "number") {
    overrides.requestTimeoutMs = raw.requestTimeoutMs;
  }
  if (typeof raw.pauseBetweenRequestsMs === "number") {
    overrides.pauseBetweenRequestsMs = raw.pauseBetweenRequestsMs;
  }
  if (typeof raw.outputDir === "string") {
    overrides.outputDir = raw.outputDir;
  }
  if (typeof raw.ignoreHttpsErrors === "boolean") {
    overrides.ignoreHttpsErrors = raw.ignoreHttpsErrors;
  }
  return overrides;
}

function readConfigFile(configPath?: string): ConfigOverrides {
  if (!configPath) {
    return {};
  }

  const absolutePath = path.resolve(configPath);
  if (!fs.existsSync(absolutePath)) {
    throw new Error(`Config file not found: ${absolutePath}`);
  }

  const raw = fs.readFileSync(absolutePath, "utf-8");
  const parsed: unknown = JSON.parse(raw);
  if (!isRecord(parsed)) {
    throw new Error(`Config file must contain a JSON object: ${absolutePath}`);
  }
  return pickOverrides(parsed);
}

function toInt(value: string | undefined, fallback: number): number {
  if (!value) {
    return fallback;
  }

  const parsed = Number.parseInt(value, 10);
  return Number.isFinite(parsed) ? parsed : fallback;
}

function toBool(value: string | undefined, fallback: boolean): boolean {
  if (!value) {
    return fallback;
  }
  const normalized = value.trim().toLowerCase();
  if (normalized === "1" || normalized === "true" || normalized === "yes") {
    return true;
  }
  if (normalized === "0" || normalized === "false" || normalized === "no") {
    return false;
  }
  return fallback;
}

export function loadConfig(configPath?: string, env: NodeJS.ProcessEnv = process.env): AppConfig {
  const merged: AppConfig = {
    ...DEFAULT_CONFIG,
    ...readConfigFile(configPath),
  };

  return {
    userAgent: env.USER_AGENT ?? merged.userAgent,
    requestTimeoutMs: toInt(env.REQUEST_TIMEOUT_MS, merged.requestTimeoutMs),
    pauseBetweenRequestsMs: toInt(env.PAUSE_BETWEEN_REQUESTS_MS, merged.pauseBetweenRequestsMs),
    outputDir: env.OUTPUT_DIR ?? merged.outputDir,
    ignoreHttpsErrors: toBool(env.IGNORE_HTTPS_ERRORS, merged.ignoreHttpsErrors),
  };
}

export { DEFAULT_CONFIG };
