export class ValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ValidationError";
  }
}

export interface HintedErrorOptions {
  readonly detailLines?: readonly string[];
  readonly hintLines?: readonly string[];
  readonly cause?: unknown;
}

export class HintedError extends Error {
  public readonly headline: string;
  public readonly detailLines: readonly string[];
  public readonly hintLines: readonly string[];

  constructor(headline: string, options: HintedErrorOptions = {}) {
    const { cause, detailLines, hintLines } = options;
    super(headline, cause !== undefined ? { cause } : undefined);
    this.headline = headline;
    this.detailLines = detailLines ? Array.from(detailLines) : [];
    this.hintLines = hintLines ? Array.from(hintLines) : [];
  }
}

export function toErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
