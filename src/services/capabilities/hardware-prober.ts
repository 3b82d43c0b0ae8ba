/**
 * Hardware capability probing for release variant selection.
 *
 * Each fact is established by an ordered list of independent strategies
 * combined with {@link firstDefinite}. Probing never throws; a fact nobody
 * could establish takes its safe default.
 */

import type { Logger } from "../logging/index.js";
import type { FileSystemLayer } from "../platform/filesystem.js";
import { pathExists } from "../platform/filesystem.js";
import type { ProcessResult, ProcessRunner } from "../platform/process.js";
import { isSpawnFailure } from "../platform/process.js";
import type { SystemInfo } from "../platform/system-info.js";
import { isFileSystemErrorWithCode } from "../errors.js";
import { isLinuxAmd64 } from "./platform-identifier.js";
import { cacheProvides, type LinkerCache } from "./linker-cache.js";
import {
  ABSENT,
  firstDefinite,
  found,
  indeterminate,
  valueOr,
  type ProbeResult,
  type ProbeStrategy,
} from "./probe.js";
import {
  EMPTY_CAPABILITY_PROFILE,
  type CapabilityProfile,
  type SupportedPlatform,
} from "./types.js";

export const CPUINFO_PATH = "/proc/cpuinfo";

/**
 * CUDA toolkit runtime files that imply CUDA 12 when nothing else answers.
 */
export const CUDA_TOOLKIT_RUNTIMES = [
  "/usr/local/cuda/lib64/libcudart.so.12",
  "/usr/local/cuda/lib64/libcudart.so.12.0",
] as const;

const CUDA_12_RUNTIME = "libcudart.so.12";

/**
 * Probes the host for the facts that drive variant selection.
 */
export interface HardwareCapabilityProber {
  /**
   * Probe the host. Platforms other than linux/amd64 get the empty profile
   * without any command being run or file being read.
   */
  probe(platform: SupportedPlatform): Promise<CapabilityProfile>;
}

/**
 * Extract the CUDA major version from `nvidia-smi` output.
 *
 * @example
 * parseCudaMajorVersion("| NVIDIA-SMI 550.54   Driver Version: 550.54   CUDA Version: 12.4 |"); // 12
 */
export function parseCudaMajorVersion(output: string): number | null {
  const match = /CUDA Version:\s*(\d+)\./.exec(output);
  return match?.[1] ? Number.parseInt(match[1], 10) : null;
}

/**
 * Collect the CPU flags listed on the `flags` lines of `/proc/cpuinfo`, lower-cased.
 */
export function parseCpuinfoFlags(cpuinfo: string): ReadonlySet<string> {
  const flags = new Set<string>();
  for (const match of cpuinfo.matchAll(/^flags\s*:(.*)$/gim)) {
    for (const flag of (match[1] ?? "").toLowerCase().split(/\s+/)) {
      if (flag !== "") flags.add(flag);
    }
  }
  return flags;
}

/**
 * Default prober using nvidia-smi, the linker cache, /proc/cpuinfo and systeminformation.
 */
export class DefaultHardwareCapabilityProber implements HardwareCapabilityProber {
  constructor(
    private readonly processRunner: ProcessRunner,
    private readonly fileSystem: FileSystemLayer,
    private readonly systemInfo: SystemInfo,
    private readonly linkerCache: LinkerCache,
    private readonly logger: Logger
  ) {}

  async probe(platform: SupportedPlatform): Promise<CapabilityProfile> {
    if (!isLinuxAmd64(platform)) {
      this.logger.debug("Skipping hardware probes", { os: platform.os, arch: platform.arch });
      return EMPTY_CAPABILITY_PROFILE;
    }

    // nvidia-smi runs once; its output feeds both the GPU and the CUDA probes
    const nvidiaSmi = this.processRunner.run("nvidia-smi", []).wait();

    const gpu = await firstDefinite("gpu", [this.nvidiaSmiStrategy(nvidiaSmi)], this.logger);
    const cuda = await firstDefinite(
      "cuda",
      [
        this.nvidiaSmiCudaStrategy(nvidiaSmi),
        this.linkerCacheCudaStrategy(),
        this.toolkitCudaStrategy(),
      ],
      this.logger
    );
    const cpuFlags = await firstDefinite(
      "cpu-flags",
      [this.cpuinfoStrategy(), this.systemInfoStrategy()],
      this.logger
    );

    const flags = valueOr(cpuFlags.result, new Set<string>());
    const profile: CapabilityProfile = Object.freeze({
      hasNvidiaGpu: valueOr(gpu.result, false),
      cudaMajorVersion: valueOr<number | null>(cuda.result, null),
      hasAVX2: flags.has("avx2"),
      hasAVX512: flags.has("avx512f"),
    });

    this.logger.info("Hardware probed", {
      hasNvidiaGpu: profile.hasNvidiaGpu,
      cudaMajorVersion: profile.cudaMajorVersion,
      cudaSource: cuda.strategy,
      hasAVX2: profile.hasAVX2,
      hasAVX512: profile.hasAVX512,
      cpuFlagSource: cpuFlags.strategy,
    });
    return profile;
  }

  private nvidiaSmiStrategy(nvidiaSmi: Promise<ProcessResult>): ProbeStrategy<boolean> {
    return {
      name: "nvidia-smi",
      run: async () => {
        const result = await nvidiaSmi;
        if (isSpawnFailure(result)) {
          return indeterminate("nvidia-smi not found");
        }
        if (result.exitCode !== 0) {
          this.logger.warn("nvidia-smi failed; NVIDIA driver present but not working", {
            exitCode: result.exitCode,
            stderr: result.stderr.trim(),
          });
          return ABSENT;
        }
        return found(true);
      },
    };
  }

  private nvidiaSmiCudaStrategy(nvidiaSmi: Promise<ProcessResult>): ProbeStrategy<number> {
    return {
      name: "nvidia-smi",
      run: async () => {
        const result = await nvidiaSmi;
        if (result.exitCode !== 0) {
          return indeterminate("no nvidia-smi output");
        }
        const major = parseCudaMajorVersion(result.stdout);
        return major === null ? indeterminate("no CUDA version reported") : found(major);
      },
    };
  }

  private linkerCacheCudaStrategy(): ProbeStrategy<number> {
    return {
      name: "ldconfig",
      run: async () => {
        const entries = await this.linkerCache.entries();
        if (entries.kind !== "found") {
          return indeterminate("linker cache unavailable");
        }
        return cacheProvides(entries.value, CUDA_12_RUNTIME)
          ? found(12)
          : indeterminate(`${CUDA_12_RUNTIME} not in linker cache`);
      },
    };
  }

  private toolkitCudaStrategy(): ProbeStrategy<number> {
    return {
      name: "cuda-toolkit",
      run: async () => {
        for (const path of CUDA_TOOLKIT_RUNTIMES) {
          if (await pathExists(this.fileSystem, path)) {
            return found(12);
          }
        }
        return ABSENT;
      },
    };
  }

  private cpuinfoStrategy(): ProbeStrategy<ReadonlySet<string>> {
    return {
      name: "cpuinfo",
      run: async (): Promise<ProbeResult<ReadonlySet<string>>> => {
        try {
          return found(parseCpuinfoFlags(await this.fileSystem.readFile(CPUINFO_PATH)));
        } catch (error) {
          if (isFileSystemErrorWithCode(error, "ENOENT")) {
            return indeterminate(`${CPUINFO_PATH} missing`);
          }
          throw error;
        }
      },
    };
  }

  private systemInfoStrategy(): ProbeStrategy<ReadonlySet<string>> {
    return {
      name: "systeminformation",
      run: async () => {
        const result = await this.systemInfo.cpuFlags();
        if (!result.ok) {
          return indeterminate(result.error.message);
        }
        return result.value.length === 0
          ? indeterminate("no CPU flags reported")
          : found(new Set(result.value));
      },
    };
  }
}
