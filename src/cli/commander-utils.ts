import type { CommanderError } from "commander";

// Codes for which commander has already written its own message.
const SELF_RENDERED_CODES: ReadonlySet<string> = new Set([
  "commander.excessArguments",
  "commander.help",
  "commander.helpDisplayed",
  "commander.invalidArgument",
  "commander.missingArgument",
  "commander.optionMissingArgument",
  "commander.unknownCommand",
  "commander.unknownOption",
  "commander.version",
]);

export function commanderAlreadyRendered(error: CommanderError): boolean {
  if (!error.code) {
    return false;
  }
  return (
    SELF_RENDERED_CODES.has(error.code) ||
    (error.code.startsWith("commander.") && error.message.startsWith("error:"))
  );
}
