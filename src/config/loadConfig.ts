import fs from "node:fs";
import path from "node:path";
import type { AppConfig, ConfigOverrides } from "./types";

const DEFAULT_CONFIG: AppConfig = {
  authUrl: "https://list.genealogy.net/mm/private/westfalengen/",
  archiveBaseUrl: "https://list.genealogy.net/mm/archiv/westfalengen/",
  userAgent: "wggf-digest-archiver/1.0",
  ignoreHttpsErrors: false,
  requestTimeoutMs: 120_000,
  fetchConcurrency: 16,
  firstYear: 2000,
  verifyLogin: true,
};

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
  if (parsed === null || typeof parsed !== "object" || Array.isArray(parsed)) {
    throw new Error(`Config file must contain a JSON object: ${absolutePath}`);
  }
  return pickOverrides(parsed);
}

function pickOverrides(source: object): ConfigOverrides {
  const overrides: ConfigOverrides = {};
  const entries = new Map<string, unknown>(Object.entries(source));

  for (const key of ["authUrl", "archiveBaseUrl", "userAgent"] as const) {
    const value = entries.get(key);
    if (typeof value === "string") {
      overrides[key] = value;
    }
  }
  for (const key of ["requestTimeoutMs", "fetchConcurrency", "firstYear"] as const) {
    const value = entries.get(key);
    if (typeof value === "number" && Number.isFinite(value)) {
      overrides[key] = value;
    }
  }
  for (const key of ["ignoreHttpsErrors", "verifyLogin"] as const) {
    const value = entries.get(key);
    if (typeof value === "boolean") {
      overrides[key] = value;
    }
  }

  return overrides;
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
    authUrl: env.AUTH_URL ?? merged.authUrl,
    archiveBaseUrl: env.ARCHIVE_BASE_URL ?? merged.archiveBaseUrl,
    userAgent: env.USER_AGENT ?? merged.userAgent,
    ignoreHttpsErrors: toBool(env.IGNORE_HTTPS_ERRORS, merged.ignoreHttpsErrors),
    requestTimeoutMs: toInt(env.REQUEST_TIMEOUT_MS, merged.requestTimeoutMs),
    fetchConcurrency: Math.max(0, toInt(env.FETCH_CONCURRENCY, merged.fetchConcurrency)),
    firstYear: toInt(env.FIRST_YEAR, merged.firstYear),
    verifyLogin: toBool(env.VERIFY_LOGIN, merged.verifyLogin),
  };
}

export { DEFAULT_CONFIG };
