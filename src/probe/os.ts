export type OsFamily = "Windows" | "Mac" | "Linux" | "FreeBSD" | "Other";

export interface OsClassification {
  family: OsFamily;
  /** Raw host OS name, e.g. `Windows_NT` or `Darwin`. */
  name: string;
}

const UNIX_LIKE_FAMILIES: ReadonlySet<OsFamily> = new Set([
  "Mac",
  "Linux",
  "FreeBSD",
]);

const UNIX_LIKE_OTHER_NAMES: ReadonlySet<string> = new Set([
  "unix",
  "macos",
  "darwin",
]);

export function classifyOsName(name: string): OsClassification {
  const lowered = name.toLowerCase();

  if (lowered.startsWith("windows")) {
    return { family: "Windows", name };
  }
  if (lowered.startsWith("mac") || lowered === "darwin") {
    return { family: "Mac", name };
  }
  if (lowered === "linux") {
    return { family: "Linux", name };
  }
  if (lowered.startsWith("freebsd")) {
    return { family: "FreeBSD", name };
  }
  return { family: "Other", name };
}

export function isUnixLike(classification: OsClassification): boolean {
  if (UNIX_LIKE_FAMILIES.has(classification.family)) {
    return true;
  }
  return (
    classification.family === "Other" &&
    UNIX_LIKE_OTHER_NAMES.has(classification.name.toLowerCase())
  );
}

export function isWindows(classification: OsClassification): boolean {
  return classification.family === "Windows";
}

export function describeOs(classification: OsClassification): string {
  if (
    classification.family === "Other" ||
    classification.family === classification.name
  ) {
    return classification.name;
  }
  return `${classification.family} (${classification.name})`;
}
