/**
 * Fine-grained platform a device executes code for.
 */
export type TargetPlatform =
  | "android"
  | "android-arm"
  | "android-arm64"
  | "android-x64"
  | "android-x86"
  | "ios"
  | "darwin"
  | "linux-x64"
  | "linux-arm64"
  | "windows-x64"
  | "windows-arm64"
  | "fuchsia-arm64"
  | "fuchsia-x64"
  | "tester"
  | "web-javascript";

/**
 * Target platforms that cannot join a `--device all` run: they need a
 * differently configured compiler (fuchsia) or a separate runner (web).
 */
export const PLATFORMS_EXCLUDED_FROM_ALL: ReadonlySet<TargetPlatform> = new Set<TargetPlatform>([
  "fuchsia-arm64",
  "fuchsia-x64",
  "web-javascript",
]);

/**
 * Map an Android ABI string (`ro.product.cpu.abi`) to a target platform.
 */
export function androidTargetPlatformForAbi(abi: string): TargetPlatform {
  const trimmed = abi.trim();
  if (trimmed.startsWith("arm64")) return "android-arm64";
  if (trimmed.startsWith("armeabi")) return "android-arm";
  if (trimmed === "x86_64") return "android-x64";
  if (trimmed === "x86") return "android-x86";
  return "android";
}
