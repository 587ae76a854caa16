export function isFileSystemError(
  error: unknown,
): error is NodeJS.ErrnoException & { code: string } {
  return (
    typeof error === "object" &&
    error !== null &&
    "code" in error &&
    typeof (error as { code?: unknown }).code === "string"
  );
}

export function isMissing(error: unknown): boolean {
  return isFileSystemError(error) && error.code === "ENOENT";
}

export { readFileSync as readUtf8File } from "node:fs";
