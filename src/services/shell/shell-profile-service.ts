/**
 * Adds the install directory to PATH (and the CUDA library directory to
 * LD_LIBRARY_PATH) in the user's shell startup files.
 */

import { join } from "node:path";
import type { Logger } from "../logging/index.js";
import type { FileSystemLayer } from "../platform/filesystem.js";
import { pathExists, readFileIfExists } from "../platform/filesystem.js";
import type { PathProvider } from "../platform/path-provider.js";
import type { SupportedPlatform } from "../capabilities/types.js";

export const PROFILE_HEADER = "# Remembrances-MCP";

const ZSH_PATHS: readonly string[] = ["/bin/zsh", "/usr/bin/zsh"];

/** Any line mentioning this counts as PATH already configured. */
const PATH_MARKER = "remembrances/bin";

const LIBRARY_PATH_PATTERN = /LD_LIBRARY_PATH=.*\.local\/lib/;

export function pathExportLine(binDir: string): string {
  return `export PATH="$PATH:${binDir}"`;
}

export function libraryPathExportLine(libraryDir: string): string {
  return `export LD_LIBRARY_PATH="${libraryDir}:\${LD_LIBRARY_PATH:-}"`;
}

export type LineOutcome = "added" | "already-configured";

export interface ProfileOutcome {
  readonly file: string;
  readonly path: LineOutcome;
  /** null when LD_LIBRARY_PATH was not requested */
  readonly libraryPath: LineOutcome | null;
}

export interface ShellSetupOptions {
  readonly platform: SupportedPlatform;
  /** Login shell from $SHELL */
  readonly shell: string | undefined;
  /** Also export the CUDA library directory */
  readonly libraryPath: boolean;
}

export interface ShellProfileService {
  /**
   * Startup files to update, in order.
   */
  selectProfiles(platform: SupportedPlatform, shell: string | undefined): Promise<string[]>;

  /**
   * Append the export lines that are missing. Files that do not exist are created.
   */
  setup(options: ShellSetupOptions): Promise<ProfileOutcome[]>;
}

export class DefaultShellProfileService implements ShellProfileService {
  constructor(
    private readonly fileSystem: FileSystemLayer,
    private readonly pathProvider: PathProvider,
    private readonly logger: Logger
  ) {}

  async selectProfiles(platform: SupportedPlatform, shell: string | undefined): Promise<string[]> {
    const home = this.pathProvider.homeDir;
    const bashrc = join(home, ".bashrc");
    const zshrc = join(home, ".zshrc");
    const bashProfile = join(home, ".bash_profile");

    const hasBashrc = await pathExists(this.fileSystem, bashrc);
    const hasZshrc = await pathExists(this.fileSystem, zshrc);

    const profiles: string[] = [];
    if (hasBashrc || !hasZshrc) {
      profiles.push(bashrc);
    }
    if (hasZshrc || (shell !== undefined && ZSH_PATHS.includes(shell))) {
      profiles.push(zshrc);
    }
    if (platform.os === "darwin" && (await pathExists(this.fileSystem, bashProfile))) {
      profiles.push(bashProfile);
    }
    return profiles;
  }

  async setup(options: ShellSetupOptions): Promise<ProfileOutcome[]> {
    const profiles = await this.selectProfiles(options.platform, options.shell);
    const outcomes: ProfileOutcome[] = [];
    for (const profile of profiles) {
      outcomes.push(await this.updateProfile(profile, options.libraryPath));
    }
    return outcomes;
  }

  private async updateProfile(file: string, libraryPath: boolean): Promise<ProfileOutcome> {
    const existing = await readFileIfExists(this.fileSystem, file);
    if (existing === null) {
      await this.fileSystem.writeFile(file, "");
    }
    const content = existing ?? "";

    let path: LineOutcome = "already-configured";
    if (!content.includes(PATH_MARKER)) {
      await this.fileSystem.appendFile(
        file,
        `\n${PROFILE_HEADER}\n${pathExportLine(this.pathProvider.binDir)}\n`
      );
      path = "added";
    }

    let library: LineOutcome | null = null;
    if (libraryPath) {
      library = "already-configured";
      if (!LIBRARY_PATH_PATTERN.test(content)) {
        await this.fileSystem.appendFile(
          file,
          `${libraryPathExportLine(this.pathProvider.cudaLibDir)}\n`
        );
        library = "added";
      }
    }

    this.logger.info("Shell profile updated", { file, path, libraryPath: library });
    return { file, path, libraryPath: library };
  }
}
