#!/usr/bin/env node

import { realpathSync } from "node:fs";
import { resolve } from "node:path";
import process from "node:process";

import { Command, CommanderError } from "commander";

import { createCheckCommand } from "./cli/check.js";
import { commanderAlreadyRendered } from "./cli/commander-utils.js";
import { CliError, toCliError } from "./cli/errors.js";
import { createExtensionCommand } from "./cli/extension.js";
import { writeCommandOutput } from "./cli/output.js";
import { createReportCommand } from "./cli/report.js";
import { createWhichCommand } from "./cli/which.js";
import { renderCliError } from "./render/utils/errors.js";
import { toErrorMessage } from "./utils/errors.js";
import { getHostprobeVersion } from "./utils/version.js";

export function createProgram(): Command {
  const program = new Command();

  program
    .name("hostprobe")
    .description("Detect host features, runtime components and executables")
    .version(getHostprobeVersion(), "-v, --version", "print the version")
    .exitOverride()
    .showHelpAfterError()
    .helpCommand(false);

  program.addCommand(createReportCommand());
  program.addCommand(createWhichCommand());
  program.addCommand(createExtensionCommand());
  program.addCommand(createCheckCommand());

  return program;
}

export async function runCli(
  argv: readonly string[] = process.argv,
): Promise<void> {
  const program = createProgram();

  if (argv.length <= 2) {
    writeCommandOutput({ body: program.helpInformation() });
    return;
  }

  try {
    await program.parseAsync(argv);
  } catch (error) {
    if (error instanceof CommanderError) {
      if (commanderAlreadyRendered(error)) {
        process.exitCode = error.exitCode;
        return;
      }

      writeCommandOutput({
        body: renderCliError(new CliError(toErrorMessage(error))),
        exitCode: error.exitCode,
      });
      return;
    }

    writeCommandOutput({
      body: renderCliError(toCliError(error)),
      exitCode: 1,
    });
  }
}

function shouldAutorun(): boolean {
  if (process.env.HOSTPROBE_CLI_SKIP_AUTORUN === "1") {
    return false;
  }

  const invokedPath =
    process.argv[1] !== undefined
      ? safeRealpath(resolve(process.argv[1]))
      : undefined;
  if (!invokedPath) {
    return true;
  }

  return safeRealpath(__filename) === invokedPath;
}

function safeRealpath(path: string): string {
  try {
    return realpathSync(path);
  } catch {
    return path;
  }
}

if (shouldAutorun()) {
  void runCli();
}
