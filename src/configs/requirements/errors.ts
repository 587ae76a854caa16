import { HintedError } from "../../utils/errors.js";

export class RequirementsConfigError extends HintedError {
  constructor(
    public readonly filePath: string,
    detail: string,
  ) {
    super(`Invalid requirements file at ${filePath}: ${detail}`, {
      hintLines: [
        "Fix the file and rerun, or pass another file with `--config <path>`.",
      ],
    });
    this.name = "RequirementsConfigError";
  }
}
