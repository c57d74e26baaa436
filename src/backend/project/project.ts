import fs from "node:fs";
import path from "node:path";
import type { PlatformType, Project } from "../devices/types.js";

/** Platform types that live in a same-named sub-directory of a project. */
const PLATFORM_DIRECTORIES: readonly PlatformType[] = [
  "android",
  "ios",
  "linux",
  "macos",
  "windows",
  "web",
  "fuchsia",
];

/**
 * Describe the project at `directory`.
 *
 * A platform counts as supported when the project has a directory named after
 * it (e.g. `android/`).
 *
 * @returns null when `directory` does not exist or is not a directory.
 */
export function detectProject(directory: string): Project | null {
  const absolute = path.resolve(directory);
  if (!isDirectory(absolute)) {
    return null;
  }

  const platforms = new Set<PlatformType>();
  for (const platform of PLATFORM_DIRECTORIES) {
    if (isDirectory(path.join(absolute, platform))) {
      platforms.add(platform);
    }
  }

  return { directory: absolute, platforms };
}

/**
 * Whether the project carries the given platform.
 */
export function projectSupportsPlatform(project: Project, platform: PlatformType): boolean {
  return project.platforms.has(platform);
}

function isDirectory(p: string): boolean {
  return fs.statSync(p, { throwIfNoEntry: false })?.isDirectory() ?? false;
}
