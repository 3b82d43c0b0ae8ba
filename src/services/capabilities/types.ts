/**
 * Types for host platform identification and hardware capability probing.
 */

/**
 * Operating system family of the host.
 */
export type OsKind = "linux" | "darwin" | "unsupported";

/**
 * CPU architecture of the host, in release naming.
 */
export type ArchKind = "amd64" | "aarch64" | "unsupported";

/**
 * Normalized host platform.
 */
export interface PlatformTuple {
  readonly os: OsKind;
  readonly arch: ArchKind;
}

/**
 * The only host platforms any release asset targets.
 * Asset selection accepts nothing else.
 */
export type SupportedPlatform =
  | { readonly os: "linux"; readonly arch: "amd64" }
  | { readonly os: "darwin"; readonly arch: "aarch64" };

export type LinuxAmd64 = Extract<SupportedPlatform, { os: "linux" }>;

/**
 * Raw platform strings, as `uname -s` and `uname -m` report them.
 */
export interface RawPlatform {
  readonly osName: string;
  readonly machine: string;
}

/**
 * Hardware facts relevant to choosing a release variant.
 * Frozen once probed.
 */
export interface CapabilityProfile {
  readonly hasNvidiaGpu: boolean;
  /** CUDA major version, or null when unknown */
  readonly cudaMajorVersion: number | null;
  readonly hasAVX2: boolean;
  readonly hasAVX512: boolean;
}

/**
 * Profile of a host that is not probed, or whose probes all came back empty.
 */
export const EMPTY_CAPABILITY_PROFILE: CapabilityProfile = Object.freeze({
  hasNvidiaGpu: false,
  cudaMajorVersion: null,
  hasAVX2: false,
  hasAVX512: false,
});
