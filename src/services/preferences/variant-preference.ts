/**
 * Variant preference resolution: environment override, then the user's
 * answer, then the default computed from the hardware.
 */

import type { Logger } from "../logging/index.js";
import type { Prompter } from "../platform/prompt.js";
import type { InstallerSettings, Override } from "../config/installer-settings.js";
import type { CapabilityProfile, SupportedPlatform } from "../capabilities/types.js";
import { isLinuxAmd64 } from "../capabilities/platform-identifier.js";
import { defaultPreference } from "../release/asset-selector.js";
import type { VariantPreference } from "../release/types.js";

export const NVIDIA_QUESTION = "Install NVIDIA/CUDA build? [Y/n] ";

export function portableQuestion(defaultAnswer: boolean): string {
  const hint = defaultAnswer ? "[Y/n]" : "[y/N]";
  return `Use portable build (recommended unless your CPU supports AVX-512)? ${hint} `;
}

/**
 * Where a preference field's value came from.
 */
export type PreferenceSource = "default" | "override" | "answer";

export interface ResolvedPreference {
  readonly preference: VariantPreference;
  readonly sources: {
    readonly wantNvidia: PreferenceSource;
    readonly wantPortable: PreferenceSource;
  };
}

export interface PreferenceInputs {
  readonly platform: SupportedPlatform;
  readonly profile: CapabilityProfile;
  readonly overrides: Pick<InstallerSettings, "nvidia" | "portable">;
  readonly prompter: Prompter;
  readonly logger: Logger;
}

interface Decision {
  readonly value: boolean;
  readonly source: PreferenceSource;
}

async function decide(
  override: Override,
  ask: (() => Promise<boolean>) | null,
  fallback: boolean
): Promise<Decision> {
  if (override !== undefined) {
    return { value: override, source: "override" };
  }
  if (ask !== null) {
    return { value: await ask(), source: "answer" };
  }
  return { value: fallback, source: "default" };
}

/**
 * True when the wizard questions can be asked on this host.
 */
export function wizardApplies(platform: SupportedPlatform, prompter: Prompter): boolean {
  return prompter.interactive && isLinuxAmd64(platform);
}

/**
 * Resolve the variant preference.
 *
 * The NVIDIA question is only asked when a GPU was detected; the portable
 * question only when the NVIDIA build was chosen. A question whose override
 * is set is never asked.
 */
export async function resolvePreference(inputs: PreferenceInputs): Promise<ResolvedPreference> {
  const { platform, profile, overrides, prompter, logger } = inputs;
  const defaults = defaultPreference(platform, profile);
  const wizard = wizardApplies(platform, prompter);

  const nvidia = await decide(
    overrides.nvidia,
    wizard && profile.hasNvidiaGpu ? () => prompter.confirm(NVIDIA_QUESTION, true) : null,
    defaults.wantNvidia
  );

  const portable = await decide(
    overrides.portable,
    wizard && nvidia.value
      ? () => prompter.confirm(portableQuestion(defaults.wantPortable), defaults.wantPortable)
      : null,
    defaults.wantPortable
  );

  const resolved: ResolvedPreference = Object.freeze({
    preference: Object.freeze({ wantNvidia: nvidia.value, wantPortable: portable.value }),
    sources: Object.freeze({ wantNvidia: nvidia.source, wantPortable: portable.source }),
  });

  logger.info("Preference resolved", {
    wantNvidia: nvidia.value,
    wantNvidiaSource: nvidia.source,
    wantPortable: portable.value,
    wantPortableSource: portable.source,
  });
  return resolved;
}
