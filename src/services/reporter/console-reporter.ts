/**
 * Human-readable installer output: banner, progress steps, status lines and
 * the closing instructions.
 */

import type { CapabilityProfile, SupportedPlatform } from "../capabilities/types.js";
import { isLinuxAmd64 } from "../capabilities/platform-identifier.js";
import { BINARY_NAME } from "../binary-download/binary-download-service.js";
import { RELEASE_REPOSITORY } from "../release/release-client.js";
import { SETTING_VARIABLES } from "../config/installer-settings.js";
import type { DownloadProgressCallback } from "../binary-download/types.js";

const ESC = "\x1b[";

export const ansi = {
  red: `${ESC}0;31m`,
  green: `${ESC}0;32m`,
  yellow: `${ESC}1;33m`,
  blue: `${ESC}0;34m`,
  reset: `${ESC}0m`,
} as const;

type Color = Exclude<keyof typeof ansi, "reset">;

/** Number of `[NN%]` steps in a full run. */
export const TOTAL_STEPS = 10;

const MIB = 1024 * 1024;
/** Without a Content-Length, report every this many bytes. */
const UNSIZED_PROGRESS_STEP = 10 * MIB;

const RULE = "═".repeat(63);
const KV_WIDTH = 22;

/**
 * Anything text can be written to; process.stdout fits.
 */
export interface ReporterOutput {
  write(text: string): unknown;
}

export interface InstructionsInfo {
  readonly platform: SupportedPlatform;
  readonly version: string;
  readonly installDir: string;
  readonly binDir: string;
  readonly configDir: string;
  readonly dataDir: string;
  readonly modelPath: string;
  /** Set when CUDA libraries were installed and LD_LIBRARY_PATH was configured */
  readonly cudaLibDir: string | null;
}

/**
 * MCP client configuration pointing at the installed binary, indented for the instructions.
 */
export function mcpClientSnippet(binDir: string): string {
  const config = { mcpServers: { remembrances: { command: `${binDir}/${BINARY_NAME}` } } };
  return JSON.stringify(config, null, 2)
    .split("\n")
    .map((line) => `  ${line}`)
    .join("\n");
}

export class ConsoleReporter {
  private currentStep = 0;

  constructor(
    private readonly output: ReporterOutput,
    /** Emit ANSI colours; only for a terminal */
    private readonly color: boolean
  ) {}

  banner(): void {
    this.blank();
    this.line(this.paint("green", RULE));
    this.line(this.paint("green", "                Remembrances-MCP Installer (Wizard)            "));
    this.line(this.paint("green", RULE));
    this.blank();
  }

  nonInteractiveNotice(): void {
    this.warning("Running in non-interactive mode (piped input detected)");
    this.warning("Using default values for all prompts");
    this.warning(
      `Set environment variables to customize: ${SETTING_VARIABLES.filter(
        (name) => name !== "REMEMBRANCES_SKIP_CUDA_LIBS"
      ).join(", ")}`
    );
    this.blank();
  }

  /**
   * Advance to the next `[NN%]` step.
   */
  progress(label: string): void {
    this.currentStep += 1;
    const pct = Math.floor((this.currentStep * 100) / TOTAL_STEPS);
    this.line(`${this.paint("blue", `[${pct}%]`)} ${label}`);
  }

  step(message: string): void {
    this.line(`${this.paint("blue", "==>")} ${message}`);
  }

  success(message: string): void {
    this.line(`${this.paint("green", "✓")} ${message}`);
  }

  warning(message: string): void {
    this.line(`${this.paint("yellow", "!")} ${message}`);
  }

  error(message: string): void {
    this.line(`${this.paint("red", "✗")} ${message}`);
  }

  /**
   * Progress callback for one download. Prints a line each time another tenth
   * of the file arrives, or every 10 MB when the size is unknown, so the output
   * stays readable when piped.
   */
  downloadProgress(): DownloadProgressCallback {
    let lastBucket = 0;
    return ({ bytesDownloaded, totalBytes }) => {
      const mb = (bytesDownloaded / MIB).toFixed(1);
      if (totalBytes !== null && totalBytes > 0) {
        const pct = Math.min(100, Math.floor((bytesDownloaded * 100) / totalBytes));
        const bucket = Math.floor(pct / 10);
        if (bucket > lastBucket) {
          lastBucket = bucket;
          this.line(`    ${pct}% (${mb} of ${(totalBytes / MIB).toFixed(1)} MB)`);
        }
        return;
      }
      const bucket = Math.floor(bytesDownloaded / UNSIZED_PROGRESS_STEP);
      if (bucket > lastBucket) {
        lastBucket = bucket;
        this.line(`    ${mb} MB downloaded`);
      }
    };
  }

  kv(label: string, value: string): void {
    this.line(`  ${this.paint("blue", label.padEnd(KV_WIDTH))} ${value}`);
  }

  item(text: string): void {
    this.line(`  - ${text}`);
  }

  blank(): void {
    this.line("");
  }

  capabilities(platform: SupportedPlatform, profile: CapabilityProfile): void {
    this.step("Detected capabilities:");
    this.kv("NVIDIA GPU", String(profile.hasNvidiaGpu));
    this.kv(
      "CUDA version",
      profile.cudaMajorVersion === null ? "unknown/not found" : `${profile.cudaMajorVersion}.x (detected)`
    );
    if (isLinuxAmd64(platform)) {
      this.kv("AVX2", String(profile.hasAVX2));
      this.kv("AVX-512", String(profile.hasAVX512));
    }
  }

  instructions(info: InstructionsInfo): void {
    const value = (text: string): string => this.paint("blue", text);
    const heading = (text: string): void => this.line(this.paint("yellow", text));

    this.blank();
    this.line(this.paint("green", RULE));
    this.line(this.paint("green", "           Remembrances-MCP Installation Complete!              "));
    this.line(this.paint("green", RULE));
    this.blank();
    this.line(`Version installed:      ${value(info.version)}`);
    this.line(`Installation directory: ${value(info.installDir)}`);
    this.line(`Binary & libraries:     ${value(`${info.binDir}/`)}`);
    if (info.cudaLibDir !== null) {
      this.line(`CUDA runtime libs:      ${value(info.cudaLibDir)} (added to LD_LIBRARY_PATH)`);
    }
    this.line(`Configuration file:     ${value(`${info.configDir}/config.yaml`)}`);
    this.line(`Database location:      ${value(`${info.dataDir}/remembrances.db`)}`);
    this.line(`GGUF model:             ${value(info.modelPath)}`);
    this.blank();
    heading("To complete the installation, run one of the following:");
    this.blank();
    this.line(`  ${value("source ~/.bashrc")}     # If using bash`);
    this.line(`  ${value("source ~/.zshrc")}      # If using zsh`);
    this.blank();
    this.line("Or simply open a new terminal window.");
    this.blank();
    heading("To verify the installation:");
    this.blank();
    this.line(`  ${value(`${BINARY_NAME} --help`)}`);
    this.blank();
    heading("To configure for your MCP client (e.g., Claude Desktop):");
    this.blank();
    if (info.platform.os === "darwin") {
      this.line(`Add to ${value("~/Library/Application Support/Claude/claude_desktop_config.json")}:`);
    } else {
      this.line("Add to your MCP client configuration:");
    }
    this.blank();
    this.line(mcpClientSnippet(info.binDir));
    this.blank();
    heading("For GPU acceleration (if available):");
    this.line(
      `Edit ${value(`${info.configDir}/config.yaml`)} and set ${value("gguf-gpu-layers")} to a positive value`
    );
    this.blank();
    this.line(`Documentation: ${value(`https://github.com/${RELEASE_REPOSITORY}`)}`);
    this.blank();
  }

  private paint(color: Color, text: string): string {
    return this.color ? `${ansi[color]}${text}${ansi.reset}` : text;
  }

  private line(text: string): void {
    this.output.write(`${text}\n`);
  }
}
