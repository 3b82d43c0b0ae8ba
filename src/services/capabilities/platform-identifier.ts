/**
 * Host platform identification.
 */

import { PlatformError } from "../errors.js";
import { err, ok, type Result } from "../../shared/result.js";
import type {
  ArchKind,
  LinuxAmd64,
  OsKind,
  PlatformTuple,
  RawPlatform,
  SupportedPlatform,
} from "./types.js";

function identifyOs(osName: string): OsKind {
  const normalized = osName.toLowerCase();
  if (normalized.startsWith("linux")) return "linux";
  if (normalized.startsWith("darwin")) return "darwin";
  return "unsupported";
}

function identifyArch(machine: string): ArchKind {
  switch (machine.toLowerCase()) {
    case "x86_64":
    case "amd64":
      return "amd64";
    case "arm64":
    case "aarch64":
      return "aarch64";
    default:
      return "unsupported";
  }
}

/**
 * Normalize raw OS and machine names into a platform tuple.
 *
 * @example
 * identifyPlatform({ osName: "Linux", machine: "x86_64" }); // { os: "linux", arch: "amd64" }
 * identifyPlatform({ osName: "MINGW64_NT-10.0", machine: "x86_64" }); // { os: "unsupported", arch: "amd64" }
 */
export function identifyPlatform(raw: RawPlatform): PlatformTuple {
  return { os: identifyOs(raw.osName), arch: identifyArch(raw.machine) };
}

/**
 * Narrow a tuple to one of the supported host platforms.
 * Each way of failing carries its own error code; the message names the raw value.
 */
export function checkSupported(
  tuple: PlatformTuple,
  raw: RawPlatform
): Result<SupportedPlatform, PlatformError> {
  if (tuple.os === "unsupported") {
    return err(
      new PlatformError(
        `Unsupported operating system: ${raw.osName}. This installer supports Linux and macOS only.`,
        "UNSUPPORTED_OS"
      )
    );
  }
  if (tuple.arch === "unsupported") {
    return err(
      new PlatformError(
        `Unsupported architecture: ${raw.machine}. This installer supports amd64 and aarch64/arm64 only.`,
        "UNSUPPORTED_ARCH"
      )
    );
  }
  if (tuple.os === "linux" && tuple.arch === "amd64") {
    return ok<SupportedPlatform>({ os: "linux", arch: "amd64" });
  }
  if (tuple.os === "darwin" && tuple.arch === "aarch64") {
    return ok<SupportedPlatform>({ os: "darwin", arch: "aarch64" });
  }
  const message =
    tuple.os === "darwin"
      ? `Unsupported macOS architecture: ${raw.machine}. Only Apple Silicon (aarch64/arm64) is supported.`
      : `Unsupported Linux architecture: ${raw.machine}. Only x86_64 (amd64) is supported.`;
  return err(new PlatformError(message, "UNSUPPORTED_COMBINATION"));
}

/**
 * True for the linux/amd64 host, the only one with hardware probes and CUDA variants.
 */
export function isLinuxAmd64(platform: SupportedPlatform): platform is LinuxAmd64 {
  return platform.os === "linux";
}
