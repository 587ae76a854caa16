/**
 * Dotted-component version comparison for runtime component versions such as
 * `1.3.0.1-motley`, `3.0.13+quic` or `11.3.244.8-node.19`.
 */

export type VersionOrdering = -1 | 0 | 1;

type VersionComponent =
  | { kind: "number"; value: number }
  | { kind: "word"; value: string };

// Rank of a purely numeric component; words rank against it.
const NUMBER_RANK = 4;
const UNKNOWN_WORD_RANK = -6;

const WORD_RANKS: ReadonlyMap<string, number> = new Map([
  ["dev", 0],
  ["alpha", 1],
  ["a", 1],
  ["beta", 2],
  ["b", 2],
  ["rc", 3],
  ["pl", 5],
  ["p", 5],
]);

export function parseVersionComponents(version: string): VersionComponent[] {
  const withoutBuild = stripBuildMetadata(version.trim());
  const canonical = withoutBuild
    .replace(/[-_]/gu, ".")
    .replace(/(\d)(?=[^\d.])/gu, "$1.")
    .replace(/([^\d.])(?=\d)/gu, "$1.");

  return canonical
    .split(".")
    .filter((segment) => segment.length > 0)
    .map((segment): VersionComponent => {
      if (/^\d+$/u.test(segment)) {
        return { kind: "number", value: Number.parseInt(segment, 10) };
      }
      return { kind: "word", value: segment.toLowerCase() };
    });
}

export function compareVersions(left: string, right: string): VersionOrdering {
  const a = parseVersionComponents(left);
  const b = parseVersionComponents(right);
  const shared = Math.min(a.length, b.length);

  for (let index = 0; index < shared; index += 1) {
    const ordering = compareComponents(a[index], b[index]);
    if (ordering !== 0) {
      return ordering;
    }
  }

  if (a.length > shared) {
    return compareTrailing(a[shared]);
  }
  if (b.length > shared) {
    return negate(compareTrailing(b[shared]));
  }
  return 0;
}

export function satisfiesMinimumVersion(
  version: string,
  minimum: string,
): boolean {
  return compareVersions(version, minimum) >= 0;
}

function stripBuildMetadata(version: string): string {
  const plusIndex = version.indexOf("+");
  return plusIndex === -1 ? version : version.slice(0, plusIndex);
}

function compareComponents(
  left: VersionComponent,
  right: VersionComponent,
): VersionOrdering {
  if (left.kind === "number" && right.kind === "number") {
    return sign(left.value - right.value);
  }
  return sign(rankOf(left) - rankOf(right));
}

// A component left over on one side only, compared against the shorter side.
function compareTrailing(component: VersionComponent): VersionOrdering {
  if (component.kind === "number") {
    return 1;
  }
  return sign(rankOf(component) - NUMBER_RANK);
}

function rankOf(component: VersionComponent): number {
  if (component.kind === "number") {
    return NUMBER_RANK;
  }
  return WORD_RANKS.get(component.value) ?? UNKNOWN_WORD_RANK;
}

function sign(value: number): VersionOrdering {
  if (value > 0) {
    return 1;
  }
  if (value < 0) {
    return -1;
  }
  return 0;
}

function negate(ordering: VersionOrdering): VersionOrdering {
  if (ordering === 1) {
    return -1;
  }
  if (ordering === -1) {
    return 1;
  }
  return 0;
}
