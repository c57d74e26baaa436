import fs from "node:fs";
import path from "node:path";

/**
 * Locate an executable on PATH without spawning anything.
 *
 * On Windows each PATHEXT extension is tried and directory comparison is
 * case-insensitive.
 *
 * @returns Absolute path of the first match, or null.
 */
export function findOnPath(
  bin: string,
  env: NodeJS.ProcessEnv = process.env,
  platform: NodeJS.Platform = process.platform
): string | null {
  const sep = platform === "win32" ? ";" : ":";
  const entries = (env.PATH ?? env.Path ?? "").split(sep).filter((e) => e.length > 0);
  const extensions =
    platform === "win32" ? (env.PATHEXT ?? ".EXE;.CMD;.BAT").split(";").filter((e) => e.length > 0) : [""];

  const seen = new Set<string>();
  for (const dir of entries) {
    const key = platform === "win32" ? dir.toLowerCase() : dir;
    if (seen.has(key)) continue;
    seen.add(key);

    for (const ext of extensions) {
      const candidate = path.join(dir, bin + ext);
      if (isFile(candidate)) {
        return candidate;
      }
    }
  }
  return null;
}

function isFile(p: string): boolean {
  return fs.statSync(p, { throwIfNoEntry: false })?.isFile() ?? false;
}
