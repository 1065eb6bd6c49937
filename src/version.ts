import { readFileSync } from "fs";
import { join } from "path";

export interface PackageInfo {
  name: string;
  version: string;
}

const FALLBACK: PackageInfo = { name: "iot-tunnel", version: "0.0.0" };

export function getPackageJson(): PackageInfo {
  try {
    const parsed: unknown = JSON.parse(
      readFileSync(join(__dirname, "../package.json"), "utf-8"),
    );
    if (
      parsed !== null &&
      typeof parsed === "object" &&
      "name" in parsed &&
      "version" in parsed &&
      typeof parsed.name === "string" &&
      typeof parsed.version === "string"
    ) {
      return { name: parsed.name, version: parsed.version };
    }
    return FALLBACK;
  } catch {
    return FALLBACK;
  }
}

export function getVersion(): string {
  return getPackageJson().version;
}
