import { load, type YAMLException } from "js-yaml";

import { toErrorMessage } from "./errors.js";

export interface YamlParseErrorDetail {
  reason?: string;
  message?: string;
  line?: number;
  column?: number;
  error: unknown;
  isYamlError: boolean;
}

export interface ParseYamlDocumentOptions<TError extends Error> {
  emptyValue?: unknown;
  formatError: (detail: YamlParseErrorDetail) => TError;
}

const DEFAULT_EMPTY_VALUE = {};

export function parseYamlDocument<TError extends Error>(
  content: string,
  options: ParseYamlDocumentOptions<TError>,
): unknown {
  const { emptyValue = DEFAULT_EMPTY_VALUE, formatError } = options;
  const source = content.trim();

  if (source.length === 0) {
    return emptyValue;
  }

  try {
    const document = load(source, { json: false });
    return document ?? emptyValue;
  } catch (error) {
    throw formatError(buildYamlParseErrorDetail(error));
  }
}

export function isYamlException(error: unknown): error is YAMLException {
  return (
    Boolean(error) &&
    typeof error === "object" &&
    "name" in (error as Record<string, unknown>) &&
    (error as YAMLException).name === "YAMLException"
  );
}

function buildYamlParseErrorDetail(error: unknown): YamlParseErrorDetail {
  if (isYamlException(error)) {
    const { reason, message, mark } = error;
    return {
      reason: reason ?? undefined,
      message: message ?? undefined,
      line: toOneBased(mark?.line),
      column: toOneBased(mark?.column),
      error,
      isYamlError: true,
    };
  }

  return {
    message: toErrorMessage(error),
    error,
    isYamlError: false,
  };
}

function toOneBased(value: number | undefined): number | undefined {
  return typeof value === "number" && Number.isFinite(value)
    ? value + 1
    : undefined;
}
