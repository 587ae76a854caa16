import type {
  FeatureName,
  RequirementsConfig,
} from "../configs/requirements/types.js";
import type { FeatureProbe } from "../probe/feature-probe.js";

export type RequirementKind =
  | "extension"
  | "function"
  | "executable"
  | "feature";

export interface RequirementResult {
  kind: RequirementKind;
  label: string;
  satisfied: boolean;
  detail?: string;
}

export interface RequirementsEvaluation {
  results: RequirementResult[];
  satisfied: boolean;
}

export function evaluateRequirements(
  config: RequirementsConfig,
  probe: FeatureProbe,
): RequirementsEvaluation {
  const results: RequirementResult[] = [];

  for (const extension of config.extensions) {
    const version = probe.extensionVersion(extension.name);
    const label = extension.minVersion
      ? `${extension.name} >= ${extension.minVersion}`
      : extension.name;
    results.push({
      kind: "extension",
      label,
      satisfied: probe.hasExtensionSupport(
        extension.name,
        extension.minVersion,
      ),
      detail: version === undefined ? "not loaded" : `loaded ${version}`,
    });
  }

  for (const name of config.functions) {
    results.push({
      kind: "function",
      label: name,
      satisfied: probe.hasFunction(name),
    });
  }

  for (const name of config.executables) {
    const path = probe.findExecutable(name);
    results.push({
      kind: "executable",
      label: name,
      satisfied: path !== undefined,
      detail: path ?? "not found on PATH",
    });
  }

  for (const feature of config.features) {
    results.push(evaluateFeature(feature, probe));
  }

  return {
    results,
    satisfied: results.every((result) => result.satisfied),
  };
}

function evaluateFeature(
  feature: FeatureName,
  probe: FeatureProbe,
): RequirementResult {
  switch (feature) {
    case "hardLink":
      return capabilityFeature(feature, probe.supportsHardLink());
    case "symLink":
      return capabilityFeature(feature, probe.supportsSymLink());
    case "userId":
      return capabilityFeature(feature, probe.supportsUserId());
    case "imageConvert":
      return executableFeature(feature, probe.getImageConvertExecutable());
    case "imageIdentify":
      return executableFeature(feature, probe.getImageIdentifyExecutable());
  }
}

function capabilityFeature(
  feature: FeatureName,
  satisfied: boolean,
): RequirementResult {
  return { kind: "feature", label: feature, satisfied };
}

function executableFeature(
  feature: FeatureName,
  path: string | undefined,
): RequirementResult {
  return {
    kind: "feature",
    label: feature,
    satisfied: path !== undefined && path.length > 0,
    detail: path ?? "not found on PATH",
  };
}
