/**
 * Installer settings read from environment variables.
 *
 * Every setting is optional. An empty variable counts as unset; any other value
 * outside the accepted set is a ConfigError naming the variable.
 */

import { z } from "zod";
import { ConfigError } from "../errors.js";

/**
 * Three-valued override: undefined means "not set, decide otherwise".
 */
export type Override = boolean | undefined;

export interface InstallerSettings {
  /** "latest" or a release tag */
  readonly version: string;
  /** REMEMBRANCES_NVIDIA */
  readonly nvidia: Override;
  /** REMEMBRANCES_PORTABLE */
  readonly portable: Override;
  /** REMEMBRANCES_DOWNLOAD_MODEL */
  readonly downloadModel: Override;
  /** REMEMBRANCES_SKIP_CUDA_LIBS=yes */
  readonly skipCudaLibs: boolean;
}

/**
 * Names of the environment variables the installer reads.
 */
export const SETTING_VARIABLES = [
  "REMEMBRANCES_VERSION",
  "REMEMBRANCES_NVIDIA",
  "REMEMBRANCES_PORTABLE",
  "REMEMBRANCES_DOWNLOAD_MODEL",
  "REMEMBRANCES_SKIP_CUDA_LIBS",
] as const;

const emptyAsUnset = (value: unknown): unknown => (value === "" ? undefined : value);

const yesNoSchema = z
  .preprocess(emptyAsUnset, z.enum(["yes", "no"]).optional())
  .transform((value): Override => (value === undefined ? undefined : value === "yes"));

const SettingsEnvSchema = z.object({
  REMEMBRANCES_VERSION: z
    .preprocess(emptyAsUnset, z.string().regex(/^\S+$/, "expected latest or a release tag").optional())
    .transform((value) => value ?? "latest"),
  REMEMBRANCES_NVIDIA: yesNoSchema,
  REMEMBRANCES_PORTABLE: yesNoSchema,
  REMEMBRANCES_DOWNLOAD_MODEL: yesNoSchema,
  REMEMBRANCES_SKIP_CUDA_LIBS: yesNoSchema,
});

/**
 * Parse installer settings from an environment.
 *
 * @throws ConfigError for the first variable with an unaccepted value
 *
 * @example
 * parseInstallerSettings({ REMEMBRANCES_NVIDIA: "no" }).nvidia; // false
 * parseInstallerSettings({}).version; // "latest"
 */
export function parseInstallerSettings(
  env: Readonly<Record<string, string | undefined>>
): InstallerSettings {
  const parsed = SettingsEnvSchema.safeParse(env);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const variable = String(issue?.path[0] ?? "environment");
    const value = env[variable] ?? "";
    const expected = variable === "REMEMBRANCES_VERSION" ? "latest or a release tag" : "yes or no";
    throw new ConfigError(
      `Invalid value for ${variable}: "${value}" (expected ${expected})`,
      variable
    );
  }

  return {
    version: parsed.data.REMEMBRANCES_VERSION,
    nvidia: parsed.data.REMEMBRANCES_NVIDIA,
    portable: parsed.data.REMEMBRANCES_PORTABLE,
    downloadModel: parsed.data.REMEMBRANCES_DOWNLOAD_MODEL,
    skipCudaLibs: parsed.data.REMEMBRANCES_SKIP_CUDA_LIBS === true,
  };
}

