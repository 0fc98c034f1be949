// Config loader: reads devstrap.yaml (or $DEVSTRAP_CONFIG) and deep-merges it over defaults.
// A missing default file means defaults; nothing is written to disk. An explicitly
// named file must exist. The merged result is validated with configSchema, so a
// typo in a key or a string where an argv list belongs is a CONFIG_INVALID error.
// Config shape is defined in src/types/config.ts; add new fields there, here and in the schema.
import { existsSync, readFileSync } from "node:fs";
import { join, resolve } from "node:path";
import { parse as parseYaml } from "yaml";
import { z } from "zod";
import type { DevstrapConfig } from "../types/config.js";
import { DevstrapError, DevstrapErrorCode } from "../errors.js";
import { logger } from "../logger.js";

export const DEFAULT_CONFIG_FILE = "devstrap.yaml";

export const DEFAULT_CONFIG: DevstrapConfig = {
  dry_run: false,
  linux: { strict_unsupported: true },
  process_manager: { name: "foreman", install: ["brew", "install", "foreman"] },
  database: {
    create: ["sqlx", "database", "create"],
    migrate: ["sqlx", "migrate", "run"],
    seed: ["script/seed-db"],
  },
};

const argvSchema = z.tuple([z.string().min(1)]).rest(z.string());

export const configSchema: z.ZodType<DevstrapConfig> = z
  .object({
    dry_run: z.boolean(),
    linux: z.object({ strict_unsupported: z.boolean() }).strict(),
    process_manager: z.object({ name: z.string().min(1), install: argvSchema }).strict(),
    database: z
      .object({
        create: argvSchema.nullable(),
        migrate: argvSchema.nullable(),
        seed: argvSchema.nullable(),
      })
      .strict(),
  })
  .strict();

export interface ConfigResult {
  config: DevstrapConfig;
  configPath: string;
  fromFile: boolean;
}

export function loadConfig(explicitPath?: string, cwd: string = process.cwd()): ConfigResult {
  const configPath = explicitPath ? resolve(cwd, explicitPath) : join(cwd, DEFAULT_CONFIG_FILE);

  if (!existsSync(configPath)) {
    if (explicitPath) {
      throw new DevstrapError(DevstrapErrorCode.CONFIG_INVALID, `Config file not found: ${configPath}`, { configPath });
    }
    logger.debug({ configPath }, "No config file found; using defaults");
    return { config: structuredClone(DEFAULT_CONFIG), configPath, fromFile: false };
  }

  let parsed: unknown;
  try {
    parsed = parseYaml(readFileSync(configPath, "utf-8"));
  } catch (err) {
    throw new DevstrapError(DevstrapErrorCode.CONFIG_INVALID, `Failed to parse ${configPath}`, {
      configPath,
      cause: err instanceof Error ? err.message : String(err),
    });
  }

  // An empty file parses to null; a scalar or list at the top level is an error.
  const overrides = parsed ?? {};
  if (!isPlainObject(overrides)) {
    throw new DevstrapError(DevstrapErrorCode.CONFIG_INVALID, `${configPath} must contain a mapping`, { configPath });
  }

  const merged = deepMerge(toRecord(DEFAULT_CONFIG), overrides);
  const result = configSchema.safeParse(merged);
  if (!result.success) {
    throw new DevstrapError(DevstrapErrorCode.CONFIG_INVALID, `Invalid configuration in ${configPath}`, {
      configPath,
      issues: result.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`),
    });
  }
  return { config: result.data, configPath, fromFile: true };
}

/** Deep merge b into a (a provides defaults, b overrides). Arrays are replaced, not merged. */
export function deepMerge(a: Record<string, unknown>, b: Record<string, unknown>): Record<string, unknown> {
  const result: Record<string, unknown> = { ...a };
  for (const key of Object.keys(b)) {
    const aVal = a[key];
    const bVal = b[key];
    if (isPlainObject(aVal) && isPlainObject(bVal)) {
      result[key] = deepMerge(aVal, bVal);
    } else if (bVal !== undefined) {
      result[key] = bVal;
    }
  }
  return result;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

function toRecord(config: DevstrapConfig): Record<string, unknown> {
  return { ...config };
}
