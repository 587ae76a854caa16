import { readFileSync } from "node:fs";

import { getCliAssetPath } from "./cli-root.js";

let cachedVersion: string | undefined;

export function getHostprobeVersion(): string {
  if (cachedVersion) {
    return cachedVersion;
  }

  cachedVersion = readPackageVersion() ?? "unknown";
  return cachedVersion;
}

function readPackageVersion(): string | undefined {
  let raw: string;
  try {
    raw = readFileSync(getCliAssetPath("package.json"), "utf-8");
  } catch {
    return undefined;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    return undefined;
  }

  if (typeof parsed !== "object" || parsed === null || !("version" in parsed)) {
    return undefined;
  }
  const { version } = parsed;
  if (typeof version !== "string") {
    return undefined;
  }
  const normalized = version.trim();
  return normalized.length > 0 ? normalized : undefined;
}
