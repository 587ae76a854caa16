import { resolve } from "node:path";
import process from "node:process";

import { Command } from "commander";

import {
  loadRequirementsConfig,
  REQUIREMENTS_CONFIG_FILENAME,
} from "../configs/requirements/loader.js";
import type { ReadFileFn } from "../configs/shared/loader-factory.js";
import {
  type FeatureProbe,
  getDefaultFeatureProbe,
} from "../probe/feature-probe.js";
import { renderCheckTranscript } from "../render/transcripts/check.js";
import { evaluateRequirements } from "../requirements/evaluate.js";
import { writeCommandOutput } from "./output.js";

export interface CheckCommandOptions {
  root?: string;
  configPath?: string;
  readFile?: ReadFileFn;
  probe?: FeatureProbe;
}

export interface CheckCommandResult {
  body: string;
  satisfied: boolean;
  exitCode: number;
}

export function runCheckCommand(
  options: CheckCommandOptions = {},
): CheckCommandResult {
  const root = options.root ?? process.cwd();
  const filePath = resolve(
    root,
    options.configPath ?? REQUIREMENTS_CONFIG_FILENAME,
  );
  const probe = options.probe ?? getDefaultFeatureProbe();

  const config = loadRequirementsConfig({
    root,
    filePath,
    readFile: options.readFile,
  });
  const evaluation = evaluateRequirements(config, probe);

  return {
    body: renderCheckTranscript(evaluation, filePath),
    satisfied: evaluation.satisfied,
    exitCode: evaluation.satisfied ? 0 : 1,
  };
}

export function createCheckCommand(): Command {
  return new Command("check")
    .description(
      `Check the host against the requirements in ${REQUIREMENTS_CONFIG_FILENAME}`,
    )
    .option("--config <path>", "Path to the requirements file")
    .allowExcessArguments(false)
    .action((options: { config?: string }) => {
      const result = runCheckCommand({ configPath: options.config });
      writeCommandOutput({ body: result.body, exitCode: result.exitCode });
    });
}
