/**
 * Release variant selection and asset lookup.
 *
 * Everything here is pure: the same platform, preference and manifest always
 * give the same answer.
 */

import { ReleaseError } from "../errors.js";
import { err, ok, type Result } from "../../shared/result.js";
import type {
  CapabilityProfile,
  PlatformTuple,
  SupportedPlatform,
} from "../capabilities/types.js";
import type {
  ReleaseManifest,
  ReleaseVariant,
  ResolvedAsset,
  VariantPreference,
} from "./types.js";

/**
 * Selection failures carry code NO_MAPPING or NO_ASSET.
 */
export type SelectionError = ReleaseError;

/**
 * Map a platform and preference to a build variant.
 * Only linux/amd64 and darwin/aarch64 have variants.
 */
export function selectVariant(
  platform: PlatformTuple,
  pref: VariantPreference
): Result<ReleaseVariant, SelectionError> {
  if (platform.os === "darwin" && platform.arch === "aarch64") {
    return ok<ReleaseVariant>({ kind: "darwin-embedded" });
  }
  if (platform.os === "linux" && platform.arch === "amd64") {
    return ok<ReleaseVariant>(
      pref.wantNvidia
        ? { kind: "linux-cuda-embedded", portable: pref.wantPortable }
        : { kind: "linux-cpu-embedded" }
    );
  }
  return err(
    new ReleaseError("Could not determine a release filename for this platform.", "NO_MAPPING")
  );
}

/**
 * Asset file name of a build variant.
 */
export function variantFilename(variant: ReleaseVariant): string {
  switch (variant.kind) {
    case "darwin-embedded":
      return "remembrances-mcp-darwin-aarch64-embedded.zip";
    case "linux-cuda-embedded":
      return variant.portable
        ? "remembrances-mcp-embedded-cuda-portable-linux-x86_64.zip"
        : "remembrances-mcp-embedded-cuda-linux-x86_64.zip";
    case "linux-cpu-embedded":
      return "remembrances-mcp-embedded-cpu-linux-x86_64.zip";
    case "linux-cpu":
      return "remembrances-mcp-cpu-linux-x86_64.zip";
  }
}

/**
 * Asset file name for a platform and preference, or null when the platform has no build.
 *
 * @example
 * selectFilename({ os: "linux", arch: "amd64" }, { wantNvidia: false, wantPortable: true });
 * // "remembrances-mcp-embedded-cpu-linux-x86_64.zip"
 */
export function selectFilename(platform: PlatformTuple, pref: VariantPreference): string | null {
  const variant = selectVariant(platform, pref);
  return variant.ok ? variantFilename(variant.value) : null;
}

/**
 * Preference computed from the probed hardware, before overrides and questions.
 */
export function defaultPreference(
  platform: SupportedPlatform,
  profile: CapabilityProfile
): VariantPreference {
  if (platform.os !== "linux") {
    return { wantNvidia: false, wantPortable: false };
  }
  return { wantNvidia: profile.hasNvidiaGpu, wantPortable: !profile.hasAVX512 };
}

/**
 * Variant tried once when the selected one has no asset.
 */
function fallbackFor(variant: ReleaseVariant): ReleaseVariant | null {
  return variant.kind === "linux-cpu-embedded" ? { kind: "linux-cpu" } : null;
}

/**
 * Find the asset for a platform and preference in a release.
 * A missing CPU embedded build falls back once to the plain CPU build.
 */
export function resolveAsset(
  manifest: ReleaseManifest,
  platform: SupportedPlatform,
  pref: VariantPreference
): Result<ResolvedAsset, SelectionError> {
  const selected = selectVariant(platform, pref);
  if (!selected.ok) {
    return selected;
  }

  let variant = selected.value;
  let usedFallback = false;
  for (;;) {
    const filename = variantFilename(variant);
    const asset = manifest.assets.find((candidate) => candidate.filename.endsWith(filename));
    if (asset) {
      return ok({ variant, asset, usedFallback });
    }
    const fallback = usedFallback ? null : fallbackFor(variant);
    if (fallback === null) {
      return err(
        new ReleaseError(`Could not find download URL for asset: ${filename}`, "NO_ASSET")
      );
    }
    variant = fallback;
    usedFallback = true;
  }
}

/**
 * File names of the embedded builds in a release, in manifest order.
 */
export function listEmbeddedAssets(manifest: ReleaseManifest): string[] {
  return manifest.assets
    .map((asset) => asset.filename)
    .filter((filename) => filename.includes("embedded"));
}
