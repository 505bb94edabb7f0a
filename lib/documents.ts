import fs from "node:fs";
import path from "node:path";
import { InvalidInputError } from "./errors";

export type InputTarget =
  | { kind: "file"; path: string }
  | { kind: "directory"; path: string };

/**
 * Decide whether the input is a single document or a directory of them.
 * Throws InvalidInputError when it is neither.
 */
export function resolveInput(inputPath: string): InputTarget {
  const resolved = path.resolve(inputPath);
  const stat = fs.statSync(resolved, { throwIfNoEntry: false });
  if (stat?.isFile()) return { kind: "file", path: resolved };
  if (stat?.isDirectory()) return { kind: "directory", path: resolved };
  throw new InvalidInputError(inputPath);
}

// ---------------------------------------------------------------------------
// Discovery
// ---------------------------------------------------------------------------

export interface DiscoverOptions {
  extensions: string[];
  /** Files whose name already ends in this suffix are earlier outputs */
  suffix: string;
}

/**
 * List documents directly inside `dir` with a matching extension, sorted by
 * path. Previous outputs (name ending in the suffix) are skipped.
 */
export function discoverDocuments(dir: string, options: DiscoverOptions): string[] {
  const extensions = options.extensions.map((e) => e.toLowerCase());
  return fs
    .readdirSync(dir, { withFileTypes: true })
    .filter((entry) => entry.isFile())
    .map((entry) => entry.name)
    .filter((name) => {
      const ext = path.extname(name).toLowerCase();
      if (!extensions.includes(ext)) return false;
      return !path.basename(name, path.extname(name)).endsWith(options.suffix);
    })
    .map((name) => path.join(dir, name))
    .sort();
}

/**
 * Collect the documents an input path refers to.
 */
export function collectDocuments(target: InputTarget, options: DiscoverOptions): string[] {
  return target.kind === "file" ? [target.path] : discoverDocuments(target.path, options);
}

// ---------------------------------------------------------------------------
// Output naming
// ---------------------------------------------------------------------------

/**
 * `<dir>/<name><suffix><ext>`, beside the source unless `outDir` is given.
 */
export function outputPathFor(
  sourcePath: string,
  options: { suffix: string; outDir?: string }
): string {
  const ext = path.extname(sourcePath);
  const name = path.basename(sourcePath, ext);
  const dir = options.outDir ? path.resolve(options.outDir) : path.dirname(sourcePath);
  return path.join(dir, `${name}${options.suffix}${ext}`);
}
