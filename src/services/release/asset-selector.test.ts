/**
 * Tests for variant selection and asset resolution.
 */

import { describe, it, expect } from "vitest";
import {
  defaultPreference,
  listEmbeddedAssets,
  resolveAsset,
  selectFilename,
  selectVariant,
  variantFilename,
} from "./asset-selector.js";
import type { ReleaseManifest, VariantPreference } from "./types.js";
import type { CapabilityProfile, SupportedPlatform } from "../capabilities/types.js";
import { EMPTY_CAPABILITY_PROFILE } from "../capabilities/types.js";
import { ReleaseError } from "../errors.js";

const LINUX: SupportedPlatform = { os: "linux", arch: "amd64" };
const DARWIN: SupportedPlatform = { os: "darwin", arch: "aarch64" };

const DOWNLOAD_BASE = "https://github.com/madeindigio/remembrances-mcp/releases/download/v1.16.4";

function manifestWith(...filenames: string[]): ReleaseManifest {
  return {
    tag: "v1.16.4",
    assets: filenames.map((filename) => ({
      filename,
      downloadUrl: `${DOWNLOAD_BASE}/${filename}`,
    })),
  };
}

function pref(wantNvidia: boolean, wantPortable: boolean): VariantPreference {
  return { wantNvidia, wantPortable };
}

describe("selectFilename", () => {
  it.each([
    [DARWIN, pref(false, false), "remembrances-mcp-darwin-aarch64-embedded.zip"],
    [DARWIN, pref(true, true), "remembrances-mcp-darwin-aarch64-embedded.zip"],
    [LINUX, pref(true, true), "remembrances-mcp-embedded-cuda-portable-linux-x86_64.zip"],
    [LINUX, pref(true, false), "remembrances-mcp-embedded-cuda-linux-x86_64.zip"],
    [LINUX, pref(false, true), "remembrances-mcp-embedded-cpu-linux-x86_64.zip"],
    [LINUX, pref(false, false), "remembrances-mcp-embedded-cpu-linux-x86_64.zip"],
  ])("%o with %o -> %s", (platform, preference, expected) => {
    expect(selectFilename(platform, preference)).toBe(expected);
  });

  it.each([
    { os: "darwin", arch: "amd64" },
    { os: "linux", arch: "aarch64" },
    { os: "unsupported", arch: "amd64" },
    { os: "linux", arch: "unsupported" },
  ] as const)("has no mapping for %o", (platform) => {
    expect(selectFilename(platform, pref(true, true))).toBeNull();
  });
});

describe("selectVariant", () => {
  it("returns a NO_MAPPING error for an unsupported tuple", () => {
    const result = selectVariant({ os: "darwin", arch: "amd64" }, pref(false, false));

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error).toBeInstanceOf(ReleaseError);
      expect(result.error.errorCode).toBe("NO_MAPPING");
    }
  });

  it("carries the portable flag on CUDA variants", () => {
    expect(selectVariant(LINUX, pref(true, false))).toEqual({
      ok: true,
      value: { kind: "linux-cuda-embedded", portable: false },
    });
  });
});

describe("variantFilename", () => {
  it("names the plain CPU build", () => {
    expect(variantFilename({ kind: "linux-cpu" })).toBe("remembrances-mcp-cpu-linux-x86_64.zip");
  });
});

describe("defaultPreference", () => {
  const profile = (overrides: Partial<CapabilityProfile>): CapabilityProfile => ({
    ...EMPTY_CAPABILITY_PROFILE,
    ...overrides,
  });

  it("wants NVIDIA only with a GPU", () => {
    expect(defaultPreference(LINUX, profile({ hasNvidiaGpu: true })).wantNvidia).toBe(true);
    expect(defaultPreference(LINUX, profile({})).wantNvidia).toBe(false);
  });

  it("prefers portable unless AVX-512 is present", () => {
    expect(defaultPreference(LINUX, profile({ hasAVX2: true })).wantPortable).toBe(true);
    expect(defaultPreference(LINUX, profile({ hasAVX512: true })).wantPortable).toBe(false);
  });

  it("leaves both off on macOS", () => {
    expect(defaultPreference(DARWIN, profile({ hasNvidiaGpu: true }))).toEqual({
      wantNvidia: false,
      wantPortable: false,
    });
  });
});

describe("resolveAsset", () => {
  it("finds the selected asset", () => {
    const manifest = manifestWith(
      "remembrances-mcp-embedded-cuda-linux-x86_64.zip",
      "remembrances-mcp-embedded-cuda-portable-linux-x86_64.zip"
    );

    const result = resolveAsset(manifest, LINUX, pref(true, true));

    expect(result).toEqual({
      ok: true,
      value: {
        variant: { kind: "linux-cuda-embedded", portable: true },
        asset: {
          filename: "remembrances-mcp-embedded-cuda-portable-linux-x86_64.zip",
          downloadUrl: `${DOWNLOAD_BASE}/remembrances-mcp-embedded-cuda-portable-linux-x86_64.zip`,
        },
        usedFallback: false,
      },
    });
  });

  it("matches asset names that end with the selected file name", () => {
    const manifest = manifestWith("v1.16.4-remembrances-mcp-darwin-aarch64-embedded.zip");

    const result = resolveAsset(manifest, DARWIN, pref(false, false));

    expect(result.ok && result.value.asset.filename).toBe(
      "v1.16.4-remembrances-mcp-darwin-aarch64-embedded.zip"
    );
  });

  it("falls back once from the CPU embedded build to the plain CPU build", () => {
    const manifest = manifestWith("remembrances-mcp-cpu-linux-x86_64.zip");

    const result = resolveAsset(manifest, LINUX, pref(false, true));

    expect(result.ok && result.value.variant).toEqual({ kind: "linux-cpu" });
    expect(result.ok && result.value.usedFallback).toBe(true);
  });

  it("does not fall back for CUDA builds", () => {
    const manifest = manifestWith(
      "remembrances-mcp-embedded-cuda-linux-x86_64.zip",
      "remembrances-mcp-cpu-linux-x86_64.zip"
    );

    const result = resolveAsset(manifest, LINUX, pref(true, true));

    expect(result.ok).toBe(false);
    expect(!result.ok && result.error.message).toBe(
      "Could not find download URL for asset: remembrances-mcp-embedded-cuda-portable-linux-x86_64.zip"
    );
  });

  it("names the fallback file when neither CPU build exists", () => {
    const result = resolveAsset(manifestWith("checksums.txt"), LINUX, pref(false, false));

    expect(!result.ok && result.error.errorCode).toBe("NO_ASSET");
    expect(!result.ok && result.error.message).toBe(
      "Could not find download URL for asset: remembrances-mcp-cpu-linux-x86_64.zip"
    );
  });
});

describe("listEmbeddedAssets", () => {
  it("lists embedded builds in manifest order", () => {
    const manifest = manifestWith(
      "remembrances-mcp-embedded-cpu-linux-x86_64.zip",
      "remembrances-mcp-cpu-linux-x86_64.zip",
      "remembrances-mcp-darwin-aarch64-embedded.zip"
    );

    expect(listEmbeddedAssets(manifest)).toEqual([
      "remembrances-mcp-embedded-cpu-linux-x86_64.zip",
      "remembrances-mcp-darwin-aarch64-embedded.zip",
    ]);
  });

  it("is empty without embedded builds", () => {
    expect(listEmbeddedAssets(manifestWith("remembrances-mcp-cpu-linux-x86_64.zip"))).toEqual([]);
  });
});
