import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import yaml from "js-yaml";
import { z } from "zod/v4";

export const CONFIG_FILE = "compactor.yaml";

const configSchema = z.object({
  suffix: z.string().min(1),
  extensions: z.array(z.string().regex(/^\.[^./\\]+$/)).min(1),
  concurrency: z.number().int().min(1),
  grouping: z.enum(["document", "global"]),
  out_dir: z.string().optional(),
});

export type AppConfig = z.infer<typeof configSchema>;

export function defaultConfig(): AppConfig {
  return {
    suffix: "_filtered",
    extensions: [".pdf"],
    concurrency: os.availableParallelism(),
    grouping: "document",
  };
}

/**
 * Deep-merge two plain objects. Plain objects recurse;
 * arrays and primitives: override wins. Undefined overrides are ignored.
 */
export function deepMerge<T extends Record<string, unknown>>(
  base: T,
  overrides: Record<string, unknown>
): Record<string, unknown> {
  const result: Record<string, unknown> = { ...base };
  for (const key of Object.keys(overrides)) {
    const baseVal = result[key];
    const overVal = overrides[key];
    if (overVal === undefined) continue;
    if (isPlainObject(baseVal) && isPlainObject(overVal)) {
      result[key] = deepMerge(baseVal, overVal);
    } else {
      result[key] = overVal;
    }
  }
  return result;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

/**
 * Resolve the config file: explicit path, then $COMPACTOR_CONFIG, then
 * ./compactor.yaml. Returns null when no file applies.
 */
export function resolveConfigPath(configPath?: string): string | null {
  if (configPath) return path.resolve(configPath);
  if (process.env.COMPACTOR_CONFIG) return path.resolve(process.env.COMPACTOR_CONFIG);
  const local = path.resolve(process.cwd(), CONFIG_FILE);
  return fs.existsSync(local) ? local : null;
}

/**
 * Load configuration: defaults, then the YAML file (if any), then overrides.
 */
export function loadConfig(
  configPath?: string,
  overrides: Partial<AppConfig> = {}
): AppConfig {
  let merged: Record<string, unknown> = defaultConfig();
  const resolved = resolveConfigPath(configPath);
  if (resolved) {
    const raw = yaml.load(fs.readFileSync(resolved, "utf-8"));
    if (raw !== null && raw !== undefined) {
      if (!isPlainObject(raw)) {
        throw new Error(`Config file ${resolved} must contain a mapping`);
      }
      merged = deepMerge(merged, raw);
    }
  }
  return configSchema.parse(deepMerge(merged, overrides));
}
