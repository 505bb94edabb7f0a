import type { AppConfig } from "../config";

export interface ParsedFlags {
  positional: string[];
  configPath?: string;
  dryRun: boolean;
  overrides: Partial<AppConfig>;
}

export function parseFlags(args: string[]): ParsedFlags {
  const positional: string[] = [];
  const overrides: Partial<AppConfig> = {};
  let configPath: string | undefined;
  let dryRun = false;

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === "--out-dir" && args[i + 1]) {
      overrides.out_dir = args[++i];
    } else if (arg === "--suffix" && args[i + 1]) {
      overrides.suffix = args[++i];
    } else if (arg === "--concurrency" && args[i + 1]) {
      overrides.concurrency = parseInt(args[++i], 10);
    } else if (arg === "--config" && args[i + 1]) {
      configPath = args[++i];
    } else if (arg === "--global") {
      overrides.grouping = "global";
    } else if (arg === "--dry-run") {
      dryRun = true;
    } else if (!arg.startsWith("-")) {
      positional.push(arg);
    }
  }

  return { positional, configPath, dryRun, overrides };
}

