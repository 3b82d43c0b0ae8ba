/**
 * Optional download of the GGUF embedding model.
 */

import { join } from "node:path";
import type { Logger } from "../logging/index.js";
import type { FileSystemLayer } from "../platform/filesystem.js";
import { pathExists } from "../platform/filesystem.js";
import type { HttpClient } from "../platform/network.js";
import type { PathProvider } from "../platform/path-provider.js";
import type { Prompter } from "../platform/prompt.js";
import { downloadToFile } from "../binary-download/download.js";
import type { DownloadProgressCallback } from "../binary-download/types.js";
import type { Override } from "../config/installer-settings.js";
import { getErrorMessage } from "../errors.js";

export const GGUF_MODEL_NAME = "nomic-embed-text-v1.5.Q4_K_M.gguf";

export const GGUF_MODEL_URL =
  "https://huggingface.co/nomic-ai/nomic-embed-text-v1.5-GGUF/resolve/main/nomic-embed-text-v1.5.Q4_K_M.gguf?download=true";

export const GGUF_MODEL_SIZE = "~260MB";

export const MODEL_QUESTION = `Do you want to download the GGUF embedding model (${GGUF_MODEL_SIZE})? [Y/n] `;

export type ModelDecision =
  | { readonly download: true }
  | { readonly download: false; readonly source: "setting" | "answer" };

export type ModelDownloadOutcome =
  | { readonly kind: "downloaded"; readonly path: string; readonly bytes: number }
  | { readonly kind: "already-present"; readonly path: string }
  | { readonly kind: "failed"; readonly path: string; readonly url: string; readonly message: string };

export interface ModelDownloadService {
  /** Where the model is (or will be) stored. */
  readonly modelPath: string;

  /**
   * Decide whether to download, from REMEMBRANCES_DOWNLOAD_MODEL or by asking.
   */
  decide(setting: Override, prompter: Prompter): Promise<ModelDecision>;

  /** Whether a model file already exists at {@link modelPath}. */
  isPresent(): Promise<boolean>;

  /**
   * Download the model unless it is already present. Never throws.
   */
  download(onProgress?: DownloadProgressCallback): Promise<ModelDownloadOutcome>;
}

export class DefaultModelDownloadService implements ModelDownloadService {
  readonly modelPath: string;

  constructor(
    private readonly httpClient: HttpClient,
    private readonly fileSystem: FileSystemLayer,
    private readonly pathProvider: PathProvider,
    private readonly logger: Logger,
    private readonly modelUrl: string = GGUF_MODEL_URL
  ) {
    this.modelPath = join(pathProvider.modelsDir, GGUF_MODEL_NAME);
  }

  async decide(setting: Override, prompter: Prompter): Promise<ModelDecision> {
    if (setting === false) {
      return { download: false, source: "setting" };
    }
    if (setting === true || (await prompter.confirm(MODEL_QUESTION, true))) {
      return { download: true };
    }
    return { download: false, source: "answer" };
  }

  isPresent(): Promise<boolean> {
    return pathExists(this.fileSystem, this.modelPath);
  }

  async download(onProgress?: DownloadProgressCallback): Promise<ModelDownloadOutcome> {
    const path = this.modelPath;
    if (await this.isPresent()) {
      this.logger.info("Model already present", { path });
      return { kind: "already-present", path };
    }

    try {
      await this.fileSystem.mkdir(this.pathProvider.modelsDir);
      const bytes = await downloadToFile(
        { httpClient: this.httpClient, fileSystem: this.fileSystem },
        this.modelUrl,
        path,
        onProgress
      );
      this.logger.info("Model downloaded", { path, bytes });
      return { kind: "downloaded", path, bytes };
    } catch (error) {
      const message = getErrorMessage(error);
      this.logger.warn("Model download failed", { url: this.modelUrl, error: message });
      return { kind: "failed", path, url: this.modelUrl, message };
    }
  }
}
