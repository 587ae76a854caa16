export {
  createProbeCache,
  FeatureProbe,
  type FeatureProbeOptions,
  type FeatureSnapshot,
  getDefaultFeatureProbe,
  type ProbeCache,
  type ResolvedExecutable,
} from "./probe/feature-probe.js";
export {
  createNodeHostRuntime,
  type HostRuntime,
  type NodeHostRuntimeOptions,
} from "./probe/host.js";
export {
  classifyOsName,
  isUnixLike,
  type OsClassification,
  type OsFamily,
} from "./probe/os.js";
export { resolveExecutablePath } from "./probe/path-search.js";
export {
  compareVersions,
  satisfiesMinimumVersion,
  type VersionOrdering,
} from "./probe/version.js";
export { loadRequirementsConfig } from "./configs/requirements/loader.js";
export type { RequirementsConfig } from "./configs/requirements/types.js";
export {
  evaluateRequirements,
  type RequirementResult,
  type RequirementsEvaluation,
} from "./requirements/evaluate.js";
