import type { YamlParseErrorDetail } from "../../utils/yaml.js";

/**
 * Formats the detail portion of a YAML parse error:
 * `(line X, column Y): message` when the location is known, otherwise
 * just `message`.
 */
export function formatYamlErrorDetail(
  detail: YamlParseErrorDetail,
  fallbackReason = "unknown error",
): string {
  const message = detail.reason ?? detail.message ?? fallbackReason;
  const hasLocation =
    typeof detail.line === "number" && typeof detail.column === "number";

  if (hasLocation) {
    return `(line ${detail.line}, column ${detail.column}): ${message}`;
  }

  return message;
}
