import { ValidationError } from "./errors.js";

const VERSION_PATTERN = /^[0-9A-Za-z][0-9A-Za-z._+-]*$/u;

export function parseVersionString(
  value: unknown,
  invalidMessage: string,
): string {
  if (typeof value !== "string") {
    throw new ValidationError(invalidMessage);
  }

  const trimmed = value.trim();
  if (!VERSION_PATTERN.test(trimmed) || !/\d/u.test(trimmed)) {
    throw new ValidationError(invalidMessage);
  }

  return trimmed;
}

export function parseExecutableName(
  value: unknown,
  invalidMessage: string,
): string {
  if (typeof value !== "string") {
    throw new ValidationError(invalidMessage);
  }

  const trimmed = value.trim();
  if (trimmed.length === 0 || /[\\/:;]/u.test(trimmed)) {
    throw new ValidationError(invalidMessage);
  }

  return trimmed;
}
