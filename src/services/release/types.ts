/**
 * Types for release metadata and asset selection.
 */

/**
 * One downloadable file attached to a release.
 */
export interface ReleaseAsset {
  /** Asset file name, e.g. "remembrances-mcp-darwin-aarch64-embedded.zip" */
  readonly filename: string;
  readonly downloadUrl: string;
}

/**
 * A published release: its tag and the assets attached to it.
 */
export interface ReleaseManifest {
  /** Release tag, e.g. "v1.16.4" */
  readonly tag: string;
  readonly assets: readonly ReleaseAsset[];
}

/**
 * Which build the user wants. Only meaningful on linux/amd64.
 */
export interface VariantPreference {
  readonly wantNvidia: boolean;
  /** Portable CUDA build, for CPUs without AVX-512 */
  readonly wantPortable: boolean;
}

/**
 * Build variant of the application.
 */
export type ReleaseVariant =
  | { readonly kind: "darwin-embedded" }
  | { readonly kind: "linux-cuda-embedded"; readonly portable: boolean }
  | { readonly kind: "linux-cpu-embedded" }
  | { readonly kind: "linux-cpu" };

/**
 * The asset chosen for installation.
 */
export interface ResolvedAsset {
  readonly variant: ReleaseVariant;
  readonly asset: ReleaseAsset;
  /** True when the CPU embedded build was missing and the plain CPU build was taken */
  readonly usedFallback: boolean;
}
