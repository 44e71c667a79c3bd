import { readFileSync } from "fs";
import { join } from "path";

/**
 * Reads the version field of the project's package.json
 * @returns The version, or "unknown" when package.json cannot be read
 */
export function readPackageVersion(
  packageJsonPath: string = join(__dirname, "..", "..", "package.json"),
): string {
  let manifest: unknown;
  try {
    manifest = JSON.parse(readFileSync(packageJsonPath, "utf8"));
  } catch {
    return "unknown";
  }

  if (
    typeof manifest === "object" &&
    manifest !== null &&
    "version" in manifest &&
    typeof manifest.version === "string"
  ) {
    return manifest.version;
  }

  return "unknown";
}
