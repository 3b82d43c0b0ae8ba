import { join } from "node:path";
import { identifyPlatform } from "../capabilities/platform-identifier.js";
import type { PlatformInfo } from "./platform-info.js";

/**
 * Installer path provider.
 * Abstracts the per-OS install, config and data locations.
 */
export interface PathProvider {
  /** User's home directory */
  readonly homeDir: string;

  /** Root of the installation */
  readonly installDir: string;

  /** Directory for config.yaml and the sample configs */
  readonly configDir: string;

  /** Directory for the database and knowledge base */
  readonly dataDir: string;

  /** Directory for the binary and its shared libraries: `<install>/bin/` */
  readonly binDir: string;

  /** Directory for GGUF models: `<install>/models/` */
  readonly modelsDir: string;

  /** Directory for installer session logs: `<install>/logs/` */
  readonly logsDir: string;

  /** Directory for the CUDA runtime bundle: `~/.local/lib/` */
  readonly cudaLibDir: string;
}

/**
 * Default PathProvider implementation.
 *
 * Path structure:
 * - Linux: install and data in `~/.local/share/remembrances/`, config in `~/.config/remembrances/`
 * - macOS: everything in `~/Library/Application Support/remembrances/`
 *
 * Hosts that are neither get the Linux layout; the installer refuses them before writing anything.
 */
export class DefaultPathProvider implements PathProvider {
  readonly homeDir: string;
  readonly installDir: string;
  readonly configDir: string;
  readonly dataDir: string;
  readonly binDir: string;
  readonly modelsDir: string;
  readonly logsDir: string;
  readonly cudaLibDir: string;

  constructor(platformInfo: Pick<PlatformInfo, "osName" | "machine" | "homeDir">) {
    const { homeDir } = platformInfo;
    this.homeDir = homeDir;

    if (identifyPlatform(platformInfo).os === "darwin") {
      this.installDir = join(homeDir, "Library", "Application Support", "remembrances");
      this.configDir = this.installDir;
      this.dataDir = this.installDir;
    } else {
      this.installDir = join(homeDir, ".local", "share", "remembrances");
      this.configDir = join(homeDir, ".config", "remembrances");
      this.dataDir = this.installDir;
    }

    this.binDir = join(this.installDir, "bin");
    this.modelsDir = join(this.installDir, "models");
    this.logsDir = join(this.installDir, "logs");
    this.cudaLibDir = join(homeDir, ".local", "lib");
  }
}
