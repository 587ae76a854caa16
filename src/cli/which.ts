import { Command } from "commander";

import {
  type FeatureProbe,
  getDefaultFeatureProbe,
} from "../probe/feature-probe.js";
import { parseExecutableName } from "../utils/validators.js";
import { ExecutableNotFoundError } from "./errors.js";
import { writeCommandOutput } from "./output.js";

export interface WhichCommandOptions {
  name: string;
  probe?: FeatureProbe;
}

export interface WhichCommandResult {
  path: string;
}

export function runWhichCommand(
  options: WhichCommandOptions,
): WhichCommandResult {
  const probe = options.probe ?? getDefaultFeatureProbe();
  const name = parseExecutableName(
    options.name,
    `Invalid executable name "${options.name}"; expected a bare file name.`,
  );

  const path = probe.findExecutable(name);
  if (path === undefined) {
    throw new ExecutableNotFoundError(name, probe.searchPath());
  }
  return { path };
}

export function createWhichCommand(): Command {
  return new Command("which")
    .description("Locate an executable on PATH")
    .argument("<name>", "Executable file name")
    .allowExcessArguments(false)
    .action((name: string) => {
      const result = runWhichCommand({ name });
      writeCommandOutput({ body: result.path, raw: true });
    });
}
