import { resolve } from "node:path";

import { parseYamlDocument } from "../../utils/yaml.js";
import {
  type BaseConfigLoaderOptions,
  createConfigLoader,
} from "../shared/loader-factory.js";
import { formatYamlErrorDetail } from "../shared/yaml-error-formatter.js";
import { RequirementsConfigError } from "./errors.js";
import {
  createEmptyRequirementsConfig,
  type RequirementsConfig,
  requirementsConfigSchema,
} from "./types.js";

export const REQUIREMENTS_CONFIG_FILENAME = "hostprobe.yaml" as const;

export type LoadRequirementsConfigOptions = BaseConfigLoaderOptions;

const requirementsLoader = createConfigLoader<
  RequirementsConfig,
  LoadRequirementsConfigOptions
>({
  resolveFilePath: (root, options) =>
    resolve(root, options.filePath ?? REQUIREMENTS_CONFIG_FILENAME),
  handleMissing: () => createEmptyRequirementsConfig(),
  parse: (content, context) => parseRequirementsYaml(content, context.filePath),
});

export function loadRequirementsConfig(
  options: LoadRequirementsConfigOptions = {},
): RequirementsConfig {
  return requirementsLoader(options);
}

export function parseRequirementsYaml(
  content: string,
  filePath: string,
): RequirementsConfig {
  const document = parseYamlDocument(content, {
    formatError: (detail) =>
      new RequirementsConfigError(
        filePath,
        formatYamlErrorDetail(detail, "Unknown YAML error")
          .replace(/\s+/gu, " ")
          .trim(),
      ),
  });

  const result = requirementsConfigSchema.safeParse(document);
  if (!result.success) {
    const issue = result.error.issues[0];
    const location = issue && issue.path.length > 0 ? issue.path.join(".") : "";
    const message = issue?.message ?? "Invalid requirements value";
    throw new RequirementsConfigError(
      filePath,
      location ? `${location}: ${message}` : message,
    );
  }

  const parsed = result.data;
  return {
    extensions: parsed.extensions ?? [],
    functions: parsed.functions ?? [],
    executables: parsed.executables ?? [],
    features: parsed.features ?? [],
  };
}
