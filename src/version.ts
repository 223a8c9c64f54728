import { readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";

function readPackageVersion(relative: string): string | undefined {
  try {
    const pkgPath = fileURLToPath(new URL(relative, import.meta.url));
    const pkg: unknown = JSON.parse(readFileSync(pkgPath, "utf-8"));
    if (typeof pkg === "object" && pkg !== null && "version" in pkg && typeof pkg.version === "string") {
      return pkg.version;
    }
    return undefined;
  } catch {
    return undefined;
  }
}

/**
 * Tool version (single source of truth)
 *
 * Reads package.json relative to this file so it resolves both from
 * src/version.ts (tsx) and dist/src/version.js (built).
 */
export const VERSION =
  process.env.SENTINEL_VERSION ??
  readPackageVersion("../package.json") ??
  readPackageVersion("../../package.json") ??
  "0.0.0";
