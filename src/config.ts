import { isLogLevel, type LogLevel } from "./logger";

export interface LayoutToolConfig {
  logLevel: LogLevel;
  trace: boolean;
  maxDescriptorBytes: number;
}

type Env = Readonly<Record<string, string | undefined>>;

const MAX_ENV_VALUE_LEN = 64;

function readEnvInt(env: Env, name: string, fallback: number, opts?: { min?: number; max?: number }): number {
  const raw = env[name];
  if (raw === undefined) return fallback;
  const trimmed = raw.trim();
  if (trimmed === "") return fallback;
  if (trimmed.length > MAX_ENV_VALUE_LEN) {
    throw new Error(`Invalid ${name} (value too long)`);
  }
  if (!/^[+-]?\d+$/.test(trimmed)) {
    throw new Error(`Invalid ${name}`);
  }

  const parsed = Number.parseInt(trimmed, 10);
  if (!Number.isSafeInteger(parsed)) {
    throw new Error(`Invalid ${name}`);
  }

  const min = opts?.min ?? 0;
  const max = opts?.max ?? Number.MAX_SAFE_INTEGER;
  if (parsed < min || parsed > max) {
    throw new Error(`Invalid ${name} (must be ${min}..${max})`);
  }
  return parsed;
}

function readEnvBool(env: Env, name: string, fallback: boolean): boolean {
  const raw = env[name];
  if (raw === undefined || raw === "") return fallback;
  if (raw.length > MAX_ENV_VALUE_LEN) {
    throw new Error(`Invalid ${name} (value too long)`);
  }
  const normalized = raw.trim().toLowerCase();
  if (normalized === "1" || normalized === "true") return true;
  if (normalized === "0" || normalized === "false") return false;
  throw new Error(`Invalid ${name} (expected 0/1/true/false)`);
}

function readEnvLogLevel(env: Env, name: string, fallback: LogLevel): LogLevel {
  const raw = env[name];
  if (raw === undefined || raw.trim() === "") return fallback;
  const normalized = raw.trim().toLowerCase();
  if (!isLogLevel(normalized)) {
    throw new Error(`Invalid ${name} (expected debug, info, warn or error)`);
  }
  return normalized;
}

export function loadConfigFromEnv(env: Env = process.env): LayoutToolConfig {
  return {
    logLevel: readEnvLogLevel(env, "HID_LAYOUT_LOG_LEVEL", "info"),
    trace: readEnvBool(env, "HID_LAYOUT_TRACE", false),
    maxDescriptorBytes: readEnvInt(env, "HID_LAYOUT_MAX_DESCRIPTOR_BYTES", 4096, { min: 1, max: 0xffff }),
  };
}
