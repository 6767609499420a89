import { existsSync, readFileSync } from "node:fs";
import { join } from "node:path";
import { fileURLToPath } from "node:url";

const __dirname = fileURLToPath(new URL(".", import.meta.url));

// Package root first, repository root last: later files override earlier ones.
const CANDIDATE_ENV_FILES = [
  join(__dirname, "../../.env"),
  join(__dirname, "../../.env.local"),
  join(__dirname, "../../../../.env"),
  join(__dirname, "../../../../.env.local"),
];

let parsedEnvCache: Record<string, string> | null = null;

export function parseEnvLine(line: string) {
  const trimmed = line.trim();
  if (!trimmed || trimmed.startsWith("#")) return null;

  const equalIndex = trimmed.indexOf("=");
  if (equalIndex <= 0) return null;

  const key = trimmed.slice(0, equalIndex).trim();
  const rawValue = trimmed.slice(equalIndex + 1).trim();
  if (!key) return null;

  let value = rawValue;
  if (
    value.length >= 2 &&
    ((value.startsWith('"') && value.endsWith('"')) || (value.startsWith("'") && value.endsWith("'")))
  ) {
    value = value.slice(1, -1);
  }

  return { key, value };
}

function loadEnvFiles() {
  const result: Record<string, string> = {};
  for (const filePath of CANDIDATE_ENV_FILES) {
    if (!existsSync(filePath)) continue;
    const raw = readFileSync(filePath, "utf8");
    for (const line of raw.split(/\r?\n/)) {
      const parsed = parseEnvLine(line);
      if (!parsed) continue;
      result[parsed.key] = parsed.value;
    }
  }
  return result;
}

function parsedEnv() {
  if (!parsedEnvCache) {
    parsedEnvCache = loadEnvFiles();
  }
  return parsedEnvCache;
}

export function readEnvVar(key: string): string | undefined {
  const runtime = process.env[key];
  if (typeof runtime === "string" && runtime.trim().length > 0) {
    return runtime.trim();
  }

  const fromFile = parsedEnv()[key];
  if (typeof fromFile === "string" && fromFile.trim().length > 0) {
    return fromFile.trim();
  }

  return undefined;
}

export function readIntEnvVar(key: string, fallback: number, min = 1) {
  const raw = readEnvVar(key);
  if (!raw) return fallback;
  const parsed = Number.parseInt(raw, 10);
  if (!Number.isFinite(parsed) || parsed < min) return fallback;
  return parsed;
}
