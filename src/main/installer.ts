/**
 * Installer run: the fixed sequence from platform detection to the closing
 * instructions. Services are injected; this module only decides order,
 * reporting and exit codes.
 */

import type { Logger } from "../services/logging/index.js";
import type { PlatformInfo } from "../services/platform/platform-info.js";
import type { PathProvider } from "../services/platform/path-provider.js";
import type { Prompter } from "../services/platform/prompt.js";
import type { CapabilityProfile, SupportedPlatform } from "../services/capabilities/types.js";
import {
  checkSupported,
  identifyPlatform,
  isLinuxAmd64,
} from "../services/capabilities/platform-identifier.js";
import type { HardwareCapabilityProber } from "../services/capabilities/hardware-prober.js";
import type { ReleaseClient } from "../services/release/release-client.js";
import { listEmbeddedAssets, resolveAsset } from "../services/release/asset-selector.js";
import type { ReleaseManifest, VariantPreference } from "../services/release/types.js";
import { resolvePreference, wizardApplies } from "../services/preferences/variant-preference.js";
import type { InstallerSettings } from "../services/config/installer-settings.js";
import type { ConfigGenerator } from "../services/config/config-generator.js";
import type { BinaryDownloadService, ExtractedRelease } from "../services/binary-download/index.js";
import {
  defaultLibraryCandidates,
  type RuntimeDependencyValidator,
  type ValidationOutcome,
} from "../services/runtime-deps/dependency-validator.js";
import {
  planRemediation,
  type RemediationPlan,
  type RuntimeLibraryInstaller,
} from "../services/runtime-deps/remediation.js";
import {
  GGUF_MODEL_SIZE,
  type ModelDownloadOutcome,
  type ModelDownloadService,
} from "../services/model-download/model-download-service.js";
import type {
  ProfileOutcome,
  ShellProfileService,
} from "../services/shell/shell-profile-service.js";
import type { ConsoleReporter } from "../services/reporter/console-reporter.js";
import { ArchiveError, isServiceError, type SerializedError } from "../services/errors.js";

export const EXIT_SUCCESS = 0;
export const EXIT_FAILURE = 1;
/** Installed, but the CUDA runtime libraries could not be provided. */
export const EXIT_REMEDIATION_FAILED = 2;

export type ExitCode = typeof EXIT_SUCCESS | typeof EXIT_FAILURE | typeof EXIT_REMEDIATION_FAILED;

export type RemediationStatus = RemediationPlan["kind"] | "installed" | "failed";

export type ModelStatus = ModelDownloadOutcome["kind"] | "skipped";

/**
 * Machine-readable result of a run, printed by `--json`.
 */
export interface InstallSummary {
  readonly exitCode: ExitCode;
  readonly platform: SupportedPlatform | null;
  readonly version: string | null;
  readonly asset: string | null;
  readonly usedFallback: boolean;
  readonly capabilities: CapabilityProfile | null;
  readonly preference: VariantPreference | null;
  readonly binaryPath: string | null;
  readonly validation: ValidationOutcome["kind"] | null;
  readonly remediation: RemediationStatus | null;
  readonly libraryPathConfigured: boolean;
  readonly configPath: string | null;
  readonly model: ModelStatus | null;
  readonly shellProfiles: readonly ProfileOutcome[];
  readonly error: SerializedError | null;
}

type Draft = { -readonly [K in keyof InstallSummary]: InstallSummary[K] };

/**
 * Dependencies for Installer.
 */
export interface InstallerDeps {
  readonly settings: InstallerSettings;
  readonly platformInfo: PlatformInfo;
  readonly pathProvider: PathProvider;
  readonly prober: HardwareCapabilityProber;
  readonly releaseClient: ReleaseClient;
  readonly binaryDownload: BinaryDownloadService;
  readonly validator: RuntimeDependencyValidator;
  readonly libraryInstaller: RuntimeLibraryInstaller;
  readonly configGenerator: ConfigGenerator;
  readonly modelDownload: ModelDownloadService;
  readonly shellProfiles: ShellProfileService;
  readonly prompter: Prompter;
  readonly reporter: ConsoleReporter;
  readonly logger: Logger;
  /** Working directory, searched for the llama library during validation */
  readonly cwd: string;
}

export class Installer {
  constructor(private readonly deps: InstallerDeps) {}

  /**
   * Run every step in order. Fatal errors end the run with exit code 1;
   * they are reported, not thrown. Errors that are not service errors propagate.
   */
  async run(): Promise<InstallSummary> {
    const draft: Draft = {
      exitCode: EXIT_SUCCESS,
      platform: null,
      version: null,
      asset: null,
      usedFallback: false,
      capabilities: null,
      preference: null,
      binaryPath: null,
      validation: null,
      remediation: null,
      libraryPathConfigured: false,
      configPath: null,
      model: null,
      shellProfiles: [],
      error: null,
    };
    const downloaded: { release: ExtractedRelease | null } = { release: null };

    try {
      await this.install(draft, downloaded);
    } catch (error) {
      if (!isServiceError(error)) throw error;
      this.deps.reporter.error(error.message);
      this.deps.logger.error("Installation failed", { code: error.code ?? null }, error);
      draft.exitCode = EXIT_FAILURE;
      draft.error = error.toJSON();
    } finally {
      if (downloaded.release !== null) {
        await this.deps.binaryDownload.cleanup(downloaded.release);
      }
    }

    this.deps.logger.info("Installation finished", {
      exitCode: draft.exitCode,
      version: draft.version,
      asset: draft.asset,
    });
    return Object.freeze(draft);
  }

  private async install(
    draft: Draft,
    downloaded: { release: ExtractedRelease | null }
  ): Promise<void> {
    const { reporter, prompter, settings, pathProvider } = this.deps;

    reporter.banner();
    if (!prompter.interactive) {
      reporter.nonInteractiveNotice();
    }

    reporter.progress("Detecting platform");
    const platform = this.detectPlatform();
    draft.platform = platform;

    reporter.progress("Fetching latest release metadata");
    const manifest = await this.deps.releaseClient.fetchRelease(settings.version);
    draft.version = manifest.tag;
    reporter.success(`Selected release: ${manifest.tag}`);
    this.reportEmbeddedAssets(manifest);

    reporter.progress("Detecting CPU/GPU capabilities");
    const profile = await this.deps.prober.probe(platform);
    draft.capabilities = profile;
    reporter.capabilities(platform, profile);

    reporter.progress("Choosing build (wizard)");
    if (wizardApplies(platform, prompter)) {
      reporter.blank();
      reporter.step("Installer wizard");
    }
    const { preference } = await resolvePreference({
      platform,
      profile,
      overrides: settings,
      prompter,
      logger: this.deps.logger,
    });
    draft.preference = preference;

    reporter.progress("Preparing install directories");
    const resolved = resolveAsset(manifest, platform, preference);
    if (!resolved.ok) throw resolved.error;
    if (resolved.value.usedFallback) {
      reporter.warning("CPU embedded asset not found. Falling back to standard CPU build.");
    }
    draft.asset = resolved.value.asset.filename;
    draft.usedFallback = resolved.value.usedFallback;
    this.deps.logger.info("Asset selected", {
      asset: resolved.value.asset.filename,
      variant: resolved.value.variant.kind,
      usedFallback: resolved.value.usedFallback,
    });
    reporter.step(`Selected asset: ${resolved.value.asset.filename}`);

    reporter.progress("Downloading & extracting release");
    reporter.step("Downloading release...");
    const release = await this.deps.binaryDownload.download(
      resolved.value.asset,
      reporter.downloadProgress()
    );
    downloaded.release = release;
    reporter.success("Download complete");

    reporter.progress("Installing files");
    reporter.step(`Installing to ${pathProvider.installDir}...`);
    const installed = await this.deps.binaryDownload.install(release.extractedDir);
    draft.binaryPath = installed.binaryPath;
    reporter.success(`Binary installed to ${installed.binaryPath}`);
    if (installed.libraries.length > 0) {
      reporter.success(
        `${installed.libraries.length} shared libraries installed to ${pathProvider.binDir}/`
      );
    }

    if (isLinuxAmd64(platform) && preference.wantNvidia) {
      await this.ensureCudaRuntime(draft, profile);
    }

    reporter.progress("Creating configuration");
    const config = await this.deps.configGenerator.generate();
    if (config.existingPath !== null) {
      reporter.warning(`Configuration file already exists at ${config.existingPath}`);
      reporter.warning(`Saving new config as ${config.path}`);
    }
    reporter.success(`Configuration created at ${config.path}`);
    draft.configPath = config.path;

    reporter.progress("Optional: downloading GGUF model");
    reporter.blank();
    draft.model = await this.downloadModel();

    reporter.progress("Finalizing shell setup");
    reporter.step("Setting up PATH...");
    const outcomes = await this.deps.shellProfiles.setup({
      platform,
      shell: this.deps.platformInfo.shell,
      libraryPath: draft.libraryPathConfigured,
    });
    this.reportShellProfiles(outcomes);
    draft.shellProfiles = outcomes;

    reporter.instructions({
      platform,
      version: manifest.tag,
      installDir: pathProvider.installDir,
      binDir: pathProvider.binDir,
      configDir: pathProvider.configDir,
      dataDir: pathProvider.dataDir,
      modelPath: this.deps.modelDownload.modelPath,
      cudaLibDir: draft.libraryPathConfigured ? pathProvider.cudaLibDir : null,
    });
  }

  private detectPlatform(): SupportedPlatform {
    const raw = this.deps.platformInfo;
    const tuple = identifyPlatform(raw);
    this.deps.reporter.step(`Detected OS: ${tuple.os}`);
    if (tuple.os !== "unsupported") {
      this.deps.reporter.step(`Detected architecture: ${tuple.arch}`);
    }
    const supported = checkSupported(tuple, raw);
    if (!supported.ok) throw supported.error;
    this.deps.logger.info("Platform identified", {
      os: supported.value.os,
      arch: supported.value.arch,
    });
    return supported.value;
  }

  private reportEmbeddedAssets(manifest: ReleaseManifest): void {
    const embedded = listEmbeddedAssets(manifest);
    if (embedded.length === 0) {
      this.deps.reporter.warning(
        "No embedded assets detected in the release metadata. Will try best-effort selection."
      );
      return;
    }
    this.deps.reporter.step("Embedded assets available in this release:");
    for (const filename of embedded) {
      this.deps.reporter.item(filename);
    }
  }

  /**
   * Validate the CUDA runtime and install the bundle when libraries are missing.
   * A failed bundle install is reported and sets exit code 2; the run continues.
   * A missing archive tool is fatal.
   */
  private async ensureCudaRuntime(draft: Draft, profile: CapabilityProfile): Promise<void> {
    const { reporter, logger } = this.deps;
    const outcome = await this.deps.validator.validate(
      defaultLibraryCandidates(this.deps.pathProvider.binDir, this.deps.cwd)
    );
    draft.validation = outcome.kind;

    if (outcome.kind === "resolvable") {
      reporter.success(
        profile.cudaMajorVersion === null
          ? "CUDA runtime detected (required libs present)."
          : `CUDA runtime detected (CUDA ${profile.cudaMajorVersion}.x and required libs present).`
      );
    } else {
      reporter.warning(
        "NVIDIA GPU detected but CUDA runtime libraries required by llama " +
          "were not found in the system loader paths."
      );
      for (const library of outcome.libraries) {
        reporter.warning(`Missing CUDA runtime library: ${library}`);
      }
    }

    const plan = planRemediation(outcome, this.deps.settings);
    logger.info("Remediation planned", { plan: plan.kind });
    draft.remediation = plan.kind;

    if (plan.kind === "skipped") {
      reporter.warning("Skipping CUDA runtime libs download (REMEMBRANCES_SKIP_CUDA_LIBS=yes)");
      return;
    }
    if (plan.kind === "none") {
      return;
    }

    reporter.warning("Downloading CUDA runtime bundle and configuring LD_LIBRARY_PATH...");
    reporter.step("Downloading CUDA runtime libraries (CUDA 12+) ...");
    try {
      const result = await this.deps.libraryInstaller.install(plan, reporter.downloadProgress());
      draft.remediation = "installed";
      if (result.needsLibraryPath) {
        draft.libraryPathConfigured = true;
        reporter.success(`Installed ${result.copied} CUDA libraries to ${result.libraryDir}`);
      } else {
        reporter.warning(
          "No .so CUDA libraries found in the archive; the bundle format may have changed"
        );
      }
    } catch (error) {
      if (!isServiceError(error)) throw error;
      draft.remediation = "failed";
      // Without an archive tool nothing later can fix the runtime; end the run
      if (error instanceof ArchiveError && error.errorCode === "TOOL_MISSING") throw error;
      draft.exitCode = EXIT_REMEDIATION_FAILED;
      draft.error = error.toJSON();
      logger.error("CUDA runtime remediation failed", { code: error.code ?? null }, error);
      reporter.error(error.message);
      reporter.warning(
        "GPU acceleration is unavailable until the CUDA runtime libraries are installed."
      );
    }
  }

  private async downloadModel(): Promise<ModelStatus> {
    const { reporter, modelDownload } = this.deps;
    const setting = this.deps.settings.downloadModel;
    if (setting === false) {
      reporter.warning("Skipping GGUF model download (from env var)");
    }

    const decision = await modelDownload.decide(setting, this.deps.prompter);
    if (!decision.download) {
      reporter.warning("Skipping GGUF model download");
      reporter.warning("You can download it later manually or configure Ollama/OpenAI instead");
      return "skipped";
    }

    if (await modelDownload.isPresent()) {
      reporter.warning(`GGUF model already exists at ${modelDownload.modelPath}`);
      return "already-present";
    }

    reporter.step("Downloading GGUF embedding model (this may take a few minutes)...");
    reporter.warning(`Model size: ${GGUF_MODEL_SIZE}`);
    const outcome = await modelDownload.download(reporter.downloadProgress());
    switch (outcome.kind) {
      case "already-present":
        reporter.warning(`GGUF model already exists at ${outcome.path}`);
        break;
      case "downloaded":
        reporter.success(`GGUF model downloaded to ${outcome.path}`);
        break;
      case "failed":
        reporter.error("Failed to download GGUF model");
        reporter.warning("You can download it manually from:");
        reporter.warning(outcome.url);
        reporter.warning(`And save it to: ${outcome.path}`);
        break;
    }
    return outcome.kind;
  }

  private reportShellProfiles(outcomes: readonly ProfileOutcome[]): void {
    const { reporter } = this.deps;
    for (const outcome of outcomes) {
      if (outcome.path === "added") {
        reporter.success(`Added to ${outcome.file}`);
      } else {
        reporter.warning(`PATH already configured in ${outcome.file}`);
      }
      if (outcome.libraryPath === "added") {
        reporter.success(`Added LD_LIBRARY_PATH to ${outcome.file}`);
      } else if (outcome.libraryPath === "already-configured") {
        reporter.warning(`LD_LIBRARY_PATH already configured in ${outcome.file}`);
      }
    }
  }
}
