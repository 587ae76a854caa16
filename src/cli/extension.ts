import { Command } from "commander";

import {
  type FeatureProbe,
  getDefaultFeatureProbe,
} from "../probe/feature-probe.js";
import { parseVersionString } from "../utils/validators.js";
import { ExtensionNotLoadedError, ExtensionVersionError } from "./errors.js";
import { writeCommandOutput } from "./output.js";

export interface ExtensionCommandOptions {
  name: string;
  minVersion?: string;
  probe?: FeatureProbe;
}

export interface ExtensionCommandResult {
  name: string;
  version: string;
  body: string;
}

export function runExtensionCommand(
  options: ExtensionCommandOptions,
): ExtensionCommandResult {
  const probe = options.probe ?? getDefaultFeatureProbe();
  const { name, minVersion } = options;

  const version = probe.extensionVersion(name);
  if (version === undefined) {
    throw new ExtensionNotLoadedError(name);
  }
  if (
    minVersion !== undefined &&
    !probe.hasExtensionSupport(name, minVersion)
  ) {
    throw new ExtensionVersionError(name, version, minVersion);
  }

  const body =
    minVersion === undefined
      ? `${name} ${version}`
      : `${name} ${version} (>= ${minVersion})`;
  return { name, version, body };
}

function parseMinVersionOption(value: string): string {
  return parseVersionString(
    value,
    `Invalid version "${value}" after --min-version`,
  );
}

export function createExtensionCommand(): Command {
  return new Command("extension")
    .description("Check that a runtime component is loaded")
    .argument("<name>", "Component name, e.g. zlib or openssl")
    .option(
      "--min-version <version>",
      "Minimum acceptable version",
      parseMinVersionOption,
    )
    .allowExcessArguments(false)
    .action((name: string, options: { minVersion?: string }) => {
      const result = runExtensionCommand({
        name,
        minVersion: options.minVersion,
      });
      writeCommandOutput({ body: result.body, raw: true });
    });
}
