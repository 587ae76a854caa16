import { HintedError, toErrorMessage } from "../utils/errors.js";

export class CliError extends HintedError {
  constructor(
    headline: string,
    detailLines: readonly string[] = [],
    hintLines: readonly string[] = [],
  ) {
    super(headline, { detailLines, hintLines });
    this.name = "CliError";
  }
}

export class ExecutableNotFoundError extends CliError {
  constructor(name: string, searchPath: string | undefined) {
    super(
      `Executable \`${name}\` not found.`,
      searchPath ? [`Searched PATH: ${searchPath}`] : ["PATH is not set."],
    );
    this.name = "ExecutableNotFoundError";
  }
}

export class ExtensionNotLoadedError extends CliError {
  constructor(name: string) {
    super(`Runtime component \`${name}\` is not loaded.`);
    this.name = "ExtensionNotLoadedError";
  }
}

export class ExtensionVersionError extends CliError {
  constructor(name: string, version: string, minimum: string) {
    super(
      `Runtime component \`${name}\` ${version} is older than ${minimum}.`,
    );
    this.name = "ExtensionVersionError";
  }
}

export function toCliError(error: unknown): CliError {
  if (error instanceof CliError) {
    return error;
  }

  if (error instanceof HintedError) {
    return new CliError(error.headline, error.detailLines, error.hintLines);
  }

  return new CliError(toErrorMessage(error));
}
