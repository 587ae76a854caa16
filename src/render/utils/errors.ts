import type { CliError } from "../../cli/errors.js";
import { formatErrorMessage } from "../../utils/output.js";
import { renderTranscript } from "./transcript.js";

export function renderCliError(error: CliError): string {
  const primary: string[] = [formatErrorMessage(error.headline)];
  if (error.detailLines.length > 0) {
    primary.push("", ...error.detailLines);
  }

  return renderTranscript({ sections: [primary, [...error.hintLines]] });
}
