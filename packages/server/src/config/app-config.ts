import { existsSync, readFileSync } from "node:fs";
import { dirname, resolve } from "node:path";
import { z } from "zod";

// ---------------------------------------------------------------------------
// Schema
// ---------------------------------------------------------------------------

export const SCHEMA_MODES = ["none", "validate", "update", "create", "create-drop"] as const;
export type SchemaMode = (typeof SCHEMA_MODES)[number];

export const LOG_LEVELS = ["fatal", "error", "warn", "info", "debug", "trace", "silent"] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

const DATASOURCE_URL_RE = /^(sqlite:.+|memory:)$/;

export const appConfigSchema = z.object({
  server: z
    .object({
      host: z.string().min(1).default("0.0.0.0"),
      port: z.coerce.number().int().min(0).max(65535).default(8080),
      corsOrigin: z.union([z.boolean(), z.string(), z.array(z.string())]).default(true),
    })
    .default({}),
  datasource: z
    .object({
      url: z
        .string()
        .regex(DATASOURCE_URL_RE, "expected sqlite:<path>, sqlite::memory: or memory:")
        .default("sqlite:./data/tierwise.db"),
      username: z.string().default(""),
      password: z.string().default(""),
    })
    .default({}),
  schema: z
    .object({
      mode: z.enum(SCHEMA_MODES).default("update"),
    })
    .default({}),
  logging: z
    .object({
      level: z.enum(LOG_LEVELS).default("info"),
    })
    .default({}),
  rateLimit: z
    .object({
      max: z.coerce.number().int().min(1).default(300),
      timeWindow: z.union([z.string().min(1), z.number().int().positive()]).default("1 minute"),
    })
    .default({}),
});

export type AppConfig = z.infer<typeof appConfigSchema>;

/** Result of loading the config. */
export interface LoadedAppConfig {
  config: AppConfig;
  /** Directory relative datasource paths resolve against. */
  baseDir: string;
  /** Config file that was read, or null when only defaults and env applied. */
  path: string | null;
}

export const CONFIG_FILENAME = "tierwise.config.json";

/** Environment variable → dotted config key. */
const ENV_OVERRIDES: ReadonlyArray<readonly [string, string, string]> = [
  ["TIERWISE_HOST", "server", "host"],
  ["TIERWISE_PORT", "server", "port"],
  ["TIERWISE_DB_URL", "datasource", "url"],
  ["TIERWISE_DB_USERNAME", "datasource", "username"],
  ["TIERWISE_DB_PASSWORD", "datasource", "password"],
  ["TIERWISE_SCHEMA_MODE", "schema", "mode"],
  ["TIERWISE_LOG_LEVEL", "logging", "level"],
];

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

export interface LoadOptions {
  /** Explicit config file; must exist. */
  configPath?: string;
  cwd?: string;
  env?: NodeJS.ProcessEnv;
}

/**
 * Load configuration.
 *
 * 1. The file named by `configPath`, else `TIERWISE_CONFIG`, else
 *    `tierwise.config.json` in `cwd` when present.
 * 2. `TIERWISE_*` environment variables override individual keys.
 * 3. Everything left unset takes its default.
 */
export function loadAppConfig(options: LoadOptions = {}): LoadedAppConfig {
  const cwd = options.cwd ?? process.cwd();
  const env = options.env ?? process.env;

  const explicit = options.configPath ?? env["TIERWISE_CONFIG"];
  let path: string | null = null;
  if (explicit) {
    path = resolve(cwd, explicit);
    if (!existsSync(path)) throw new Error(`Config file not found: ${path}`);
  } else if (existsSync(resolve(cwd, CONFIG_FILENAME))) {
    path = resolve(cwd, CONFIG_FILENAME);
  }

  const raw = path ? readConfigFile(path) : {};
  const config = parseAppConfig(applyEnvOverrides(raw, env), path ?? "configuration");
  return { config, baseDir: path ? dirname(path) : cwd, path };
}

/** Validates a raw config object; `source` names it in error messages. */
export function parseAppConfig(raw: unknown, source = "configuration"): AppConfig {
  const result = appConfigSchema.safeParse(raw);
  if (result.success) return result.data;

  const details = result.error.issues
    .map((issue) => `"${issue.path.join(".")}": ${issue.message}`)
    .join("; ");
  throw new Error(`${source}: invalid config (${details})`);
}

/** Copy of `config` that is safe to print or log. */
export function redactConfig(config: AppConfig): AppConfig {
  return {
    ...config,
    datasource: { ...config.datasource, password: maskSecret(config.datasource.password) },
  };
}

const MASK_CHAR = "•";

export function maskSecret(raw: string): string {
  if (!raw) return "";
  if (raw.length <= 8) return MASK_CHAR.repeat(raw.length);
  return raw.slice(0, 2) + MASK_CHAR.repeat(8) + raw.slice(-2);
}

// ---------------------------------------------------------------------------
// Internals
// ---------------------------------------------------------------------------

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function readConfigFile(path: string): Record<string, unknown> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(path, "utf-8"));
  } catch (e) {
    throw new Error(`Invalid JSON in ${path}: ${e instanceof Error ? e.message : String(e)}`);
  }
  if (!isRecord(parsed)) {
    throw new Error(`${path}: expected a JSON object at the top level`);
  }
  return parsed;
}

function applyEnvOverrides(raw: Record<string, unknown>, env: NodeJS.ProcessEnv): Record<string, unknown> {
  const merged: Record<string, unknown> = { ...raw };
  for (const [variable, section, key] of ENV_OVERRIDES) {
    const value = env[variable];
    if (value === undefined || value === "") continue;
    const current = merged[section];
    merged[section] = { ...(isRecord(current) ? current : {}), [key]: value };
  }
  return merged;
}
