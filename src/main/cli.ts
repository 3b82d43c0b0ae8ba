/**
 * Command-line handling and service wiring for the installer.
 */

import type { InstallerSettings } from "../services/config/installer-settings.js";
import { SETTING_VARIABLES } from "../services/config/installer-settings.js";
import { ConfigGenerator } from "../services/config/config-generator.js";
import type { LoggingService } from "../services/logging/index.js";
import type { PlatformInfo } from "../services/platform/platform-info.js";
import type { PathProvider } from "../services/platform/path-provider.js";
import type { Prompter } from "../services/platform/prompt.js";
import { DefaultFileSystemLayer } from "../services/platform/filesystem.js";
import { DefaultNetworkLayer } from "../services/platform/network.js";
import { ExecaProcessRunner } from "../services/platform/process.js";
import { SiSystemInfo } from "../services/platform/system-info.js";
import { LinkerCache } from "../services/capabilities/linker-cache.js";
import { DefaultHardwareCapabilityProber } from "../services/capabilities/hardware-prober.js";
import { GitHubReleaseClient } from "../services/release/release-client.js";
import {
  DefaultArchiveExtractor,
  DefaultBinaryDownloadService,
} from "../services/binary-download/index.js";
import { DefaultRuntimeDependencyValidator } from "../services/runtime-deps/dependency-validator.js";
import { DefaultRuntimeLibraryInstaller } from "../services/runtime-deps/remediation.js";
import { DefaultModelDownloadService } from "../services/model-download/model-download-service.js";
import { DefaultShellProfileService } from "../services/shell/shell-profile-service.js";
import { ConsoleReporter, type ReporterOutput } from "../services/reporter/console-reporter.js";
import { Installer } from "./installer.js";

export interface CliOptions {
  /** Print the run summary as JSON on stdout; human output moves to stderr */
  readonly json: boolean;
  readonly help: boolean;
}

export const HELP_TEXT = `Usage: remembrances-install [--json] [--help]

Installs the remembrances-mcp binary, its configuration and shell setup.

Options:
  --json    Print a JSON summary of the run on stdout
  --help    Show this help

Environment:
  ${SETTING_VARIABLES.join("\n  ")}
`;

/**
 * Stream for human output and prompts: stderr under --json, so stdout carries
 * only the summary.
 */
export function humanOutput<T>(
  options: CliOptions,
  streams: { readonly stdout: T; readonly stderr: T }
): T {
  return options.json ? streams.stderr : streams.stdout;
}

/**
 * Parse command-line flags.
 *
 * @param argv - Arguments after the script name
 * @throws Error naming the first unknown argument
 */
export function parseCliArgs(argv: readonly string[]): CliOptions {
  let json = false;
  let help = false;
  for (const arg of argv) {
    if (arg === "--json") {
      json = true;
    } else if (arg === "--help" || arg === "-h") {
      help = true;
    } else {
      throw new Error(`Unknown argument: ${arg}`);
    }
  }
  return { json, help };
}

export interface InstallerWiring {
  readonly settings: InstallerSettings;
  readonly platformInfo: PlatformInfo;
  readonly pathProvider: PathProvider;
  readonly loggingService: LoggingService;
  readonly prompter: Prompter;
  readonly output: ReporterOutput;
  /** Emit ANSI colours */
  readonly color: boolean;
  readonly cwd: string;
}

/**
 * Build the installer and every service it runs.
 */
export function createInstaller(wiring: InstallerWiring): Installer {
  const { loggingService, pathProvider } = wiring;

  const processRunner = new ExecaProcessRunner(loggingService.createLogger("process"));
  const fileSystem = new DefaultFileSystemLayer(loggingService.createLogger("fs"));
  const httpClient = new DefaultNetworkLayer(loggingService.createLogger("network"));
  const archiveExtractor = new DefaultArchiveExtractor(processRunner);
  const runtimeLogger = loggingService.createLogger("runtime-deps");
  const linkerCache = new LinkerCache(processRunner, runtimeLogger);

  return new Installer({
    settings: wiring.settings,
    platformInfo: wiring.platformInfo,
    pathProvider,
    prober: new DefaultHardwareCapabilityProber(
      processRunner,
      fileSystem,
      new SiSystemInfo(),
      linkerCache,
      loggingService.createLogger("capabilities")
    ),
    releaseClient: new GitHubReleaseClient(httpClient, loggingService.createLogger("release")),
    binaryDownload: new DefaultBinaryDownloadService(
      httpClient,
      fileSystem,
      archiveExtractor,
      pathProvider,
      loggingService.createLogger("binary-download")
    ),
    validator: new DefaultRuntimeDependencyValidator(
      processRunner,
      fileSystem,
      linkerCache,
      runtimeLogger
    ),
    libraryInstaller: new DefaultRuntimeLibraryInstaller(
      processRunner,
      httpClient,
      fileSystem,
      archiveExtractor,
      pathProvider,
      runtimeLogger
    ),
    configGenerator: new ConfigGenerator({
      fileSystem,
      pathProvider,
      logger: loggingService.createLogger("config"),
    }),
    modelDownload: new DefaultModelDownloadService(
      httpClient,
      fileSystem,
      pathProvider,
      loggingService.createLogger("model")
    ),
    shellProfiles: new DefaultShellProfileService(
      fileSystem,
      pathProvider,
      loggingService.createLogger("shell")
    ),
    prompter: wiring.prompter,
    reporter: new ConsoleReporter(wiring.output, wiring.color),
    logger: loggingService.createLogger("installer"),
    cwd: wiring.cwd,
  });
}
