import { parseAdminEmails } from "../../src/authGate";
import { LOG_LEVELS, type LogLevel } from "./logger";

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export interface Config {
  /** Supabase project URL */
  supabaseUrl: string;
  /** Public anon key, used for sign-in and token checks */
  supabaseAnonKey: string;
  /** Service-role key; admin operations are disabled without it */
  supabaseServiceRoleKey: string | null;
  /** Lower-cased administrator emails */
  adminEmails: ReadonlySet<string>;
  /** JSONL question bank */
  itemsPath: string;
  port: number;
  logLevel: LogLevel;
}

type Env = Record<string, string | undefined>;

function getEnvOrDefault(env: Env, name: string, defaultValue: string): string {
  const v = env[name]?.trim();
  return v ? v : defaultValue;
}

function parseLogLevel(raw: string): LogLevel {
  const level = LOG_LEVELS.find((l) => l === raw.toLowerCase());
  if (!level) throw new ConfigError(`Invalid LOG_LEVEL '${raw}' (expected one of ${LOG_LEVELS.join(", ")})`);
  return level;
}

function parsePort(raw: string): number {
  const port = Number(raw);
  if (!Number.isInteger(port) || port <= 0 || port > 65535) throw new ConfigError(`Invalid PORT '${raw}'`);
  return port;
}

export function loadConfig(env: Env = process.env): Config {
  const supabaseUrl = getEnvOrDefault(env, "SUPABASE_URL", "");
  const supabaseAnonKey = getEnvOrDefault(env, "SUPABASE_ANON_KEY", "");
  if (!supabaseUrl || !supabaseAnonKey) {
    throw new ConfigError("Supabase credentials are missing. Set SUPABASE_URL and SUPABASE_ANON_KEY.");
  }

  return {
    supabaseUrl,
    supabaseAnonKey,
    supabaseServiceRoleKey: getEnvOrDefault(env, "SUPABASE_SERVICE_ROLE_KEY", "") || null,
    adminEmails: parseAdminEmails(env.ADMIN_EMAILS),
    itemsPath: getEnvOrDefault(env, "ITEMS_PATH", "data/items.jsonl"),
    port: parsePort(getEnvOrDefault(env, "PORT", "3001")),
    logLevel: parseLogLevel(getEnvOrDefault(env, "LOG_LEVEL", "info")),
  };
}
