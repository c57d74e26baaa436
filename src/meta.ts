import fs from "fs";
import path from "path";
import { fileURLToPath } from "url";
import { isRecord } from "./utils.js";

/**
 * Minimal subset of `package.json` metadata that we treat as authoritative at runtime.
 */
export interface DeckhandPackageMeta {
  /** Package name (from `package.json`). */
  name: string;
  /** Package version (from `package.json`). */
  version: string;
}

function getProjectRootDir(): string {
  const thisFile = fileURLToPath(import.meta.url);
  // dist/meta.js or src/meta.ts: project root is one level up
  return path.resolve(path.dirname(thisFile), "..");
}

/**
 * Load server metadata from `package.json` so the MCP server info and the
 * about tool always reflect the installed build.
 *
 * @throws If `package.json` is missing or malformed.
 */
export function loadPackageMeta(): DeckhandPackageMeta {
  const packageJsonPath = path.join(getProjectRootDir(), "package.json");

  const raw = fs.readFileSync(packageJsonPath, "utf-8");
  const parsed: unknown = JSON.parse(raw);
  if (!isRecord(parsed)) {
    throw new Error(`Invalid package.json: expected JSON object at ${packageJsonPath}`);
  }

  const { name, version } = parsed;

  if (typeof name !== "string" || name.trim().length === 0) {
    throw new Error(`Invalid package.json: expected non-empty string name at ${packageJsonPath}`);
  }
  if (typeof version !== "string" || version.trim().length === 0) {
    throw new Error(`Invalid package.json: expected non-empty string version at ${packageJsonPath}`);
  }

  return { name, version };
}
