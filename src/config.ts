/**
 * Application config: env-based values with safe parsing and clamped defaults.
 * Read once at startup and passed down through the AppContext.
 */

import { join } from "path";

export type LlmProvider = "azure" | "openai" | "anthropic" | "mock";

/** PERSISTENCE_DRIVER=db uses PostgreSQL; default is the JSONL file store. */
export type PersistenceDriver = "file" | "db" | "memory";

export interface AppConfig {
  appName: string;
  appEnv: string;
  apiPrefix: string;
  port: number;
  persistenceDriver: PersistenceDriver;
  dataDir: string;
  databaseUrl?: string;
  templatesDir: string;
  llmProvider: LlmProvider;
  /** Model identifier recorded on every score. */
  defaultLlmModel: string;
  azure: {
    endpoint?: string;
    apiKey?: string;
    apiVersion: string;
    deployment?: string;
  };
  openai: { apiKey?: string; model: string };
  anthropic: { apiKey?: string; model: string };
  dashboardDefaultThreshold: number;
  /** DEBUG_SCORING=true logs prompts and raw replies. */
  debugScoring: boolean;
}

type Env = Record<string, string | undefined>;

function parseIntEnv(env: Env, key: string, defaultVal: number, min: number, max: number): number {
  const raw = env[key];
  if (raw == null || raw === "") return defaultVal;
  const n = parseInt(raw, 10);
  if (Number.isNaN(n)) return defaultVal;
  return Math.max(min, Math.min(max, n));
}

function optional(env: Env, key: string): string | undefined {
  const v = env[key]?.trim();
  return v ? v : undefined;
}

function withDefault(env: Env, key: string, defaultVal: string): string {
  return optional(env, key) ?? defaultVal;
}

function getPersistenceDriver(env: Env): PersistenceDriver {
  const v = env.PERSISTENCE_DRIVER?.toLowerCase();
  if (v === "db") return "db";
  if (v === "memory") return "memory";
  return "file";
}

function getLlmProvider(env: Env): LlmProvider {
  const v = env.LLM_PROVIDER?.toLowerCase();
  if (v === "openai" || v === "anthropic" || v === "mock") return v;
  return "azure";
}

export function loadConfig(env: Env = process.env): AppConfig {
  return {
    appName: withDefault(env, "APP_NAME", "Translation Score API"),
    appEnv: withDefault(env, "APP_ENV", "development"),
    apiPrefix: withDefault(env, "API_V1_PREFIX", "/api/v1").replace(/\/+$/, ""),
    port: parseIntEnv(env, "PORT", 3000, 1, 65_535),
    persistenceDriver: getPersistenceDriver(env),
    dataDir: withDefault(env, "DATA_DIR", join(process.cwd(), ".data")),
    databaseUrl: optional(env, "DATABASE_URL"),
    templatesDir: withDefault(env, "TEMPLATES_DIR", join(process.cwd(), "templates")),
    llmProvider: getLlmProvider(env),
    defaultLlmModel: withDefault(env, "DEFAULT_LLM_MODEL", "gpt-4o-mini"),
    azure: {
      endpoint: optional(env, "AZURE_OPENAI_ENDPOINT"),
      apiKey: optional(env, "AZURE_OPENAI_API_KEY"),
      apiVersion: withDefault(env, "AZURE_OPENAI_API_VERSION", "2024-08-01-preview"),
      deployment: optional(env, "AZURE_OPENAI_DEPLOYMENT"),
    },
    openai: {
      apiKey: optional(env, "OPENAI_API_KEY"),
      model: withDefault(env, "OPENAI_MODEL", "gpt-4o-mini"),
    },
    anthropic: {
      apiKey: optional(env, "ANTHROPIC_API_KEY"),
      model: withDefault(env, "ANTHROPIC_MODEL", "claude-sonnet-4-5-20250929"),
    },
    dashboardDefaultThreshold: parseIntEnv(env, "DASHBOARD_DEFAULT_THRESHOLD", 75, 0, 100),
    debugScoring: env.DEBUG_SCORING === "true",
  };
}
