import { z } from "zod";

export const FEATURE_NAMES = [
  "hardLink",
  "symLink",
  "userId",
  "imageConvert",
  "imageIdentify",
] as const;

export type FeatureName = (typeof FEATURE_NAMES)[number];

const MIN_VERSION_TYPE_MESSAGE =
  'minVersion must be a quoted string such as "1.10"';

const nonEmptyName = (label: string) =>
  z.string().trim().min(1, { message: `${label} cannot be empty` });

export const extensionRequirementSchema = z
  .object({
    name: nonEmptyName("Extension name"),
    // YAML numbers are rejected: `1.10` would load as 1.1.
    minVersion: z
      .string({ invalid_type_error: MIN_VERSION_TYPE_MESSAGE })
      .trim()
      .min(1, { message: "Extension minVersion cannot be empty" })
      .optional(),
  })
  .strict();

export const requirementsConfigSchema = z
  .object({
    extensions: z.array(extensionRequirementSchema).optional(),
    functions: z.array(nonEmptyName("Function name")).optional(),
    executables: z.array(nonEmptyName("Executable name")).optional(),
    features: z.array(z.enum(FEATURE_NAMES)).optional(),
  })
  .strict();

export type ExtensionRequirement = z.infer<typeof extensionRequirementSchema>;

export interface RequirementsConfig {
  extensions: ExtensionRequirement[];
  functions: string[];
  executables: string[];
  features: FeatureName[];
}

export function createEmptyRequirementsConfig(): RequirementsConfig {
  return { extensions: [], functions: [], executables: [], features: [] };
}
