import { describe, it, expect } from "vitest";
import {
  DefaultModelDownloadService,
  GGUF_MODEL_URL,
  MODEL_QUESTION,
} from "./model-download-service.js";
import { createMockHttpClient, type ConfiguredResponse } from "../platform/network.test-utils.js";
import {
  createMockFileSystemLayer,
  file,
  type Entry,
} from "../platform/filesystem.test-utils.js";
import { createMockPathProvider } from "../platform/path-provider.test-utils.js";
import { createMockPrompter } from "../platform/prompt.test-utils.js";
import { createMockLogger } from "../logging/logging.test-utils.js";

const MODELS_DIR = "/home/test/.local/share/remembrances/models";
const MODEL_PATH = `${MODELS_DIR}/nomic-embed-text-v1.5.Q4_K_M.gguf`;

function createService(options: { response?: ConfiguredResponse; files?: Record<string, Entry> } = {}) {
  const fileSystem = createMockFileSystemLayer({ entries: options.files ?? {} });
  const httpClient = createMockHttpClient({
    responses: { [GGUF_MODEL_URL]: options.response ?? { body: "gguf-bytes" } },
  });
  const logger = createMockLogger();
  const service = new DefaultModelDownloadService(
    httpClient,
    fileSystem,
    createMockPathProvider(),
    logger
  );
  return { service, fileSystem, httpClient, logger };
}

describe("DefaultModelDownloadService", () => {
  it("stores the model in the models directory", () => {
    expect(createService().service.modelPath).toBe(MODEL_PATH);
  });

  describe("decide", () => {
    it("skips without asking when the setting is no", async () => {
      const prompter = createMockPrompter([true]);

      const decision = await createService().service.decide(false, prompter);

      expect(decision).toEqual({ download: false, source: "setting" });
      expect(prompter.asked).toEqual([]);
    });

    it("downloads without asking when the setting is yes", async () => {
      const prompter = createMockPrompter([false]);

      expect(await createService().service.decide(true, prompter)).toEqual({ download: true });
      expect(prompter.asked).toEqual([]);
    });

    it("asks with a default of yes when the setting is unset", async () => {
      const prompter = createMockPrompter();

      expect(await createService().service.decide(undefined, prompter)).toEqual({ download: true });
      expect(prompter.confirm).toHaveBeenCalledWith(MODEL_QUESTION, true);
    });

    it("respects a declined answer", async () => {
      const prompter = createMockPrompter([false]);

      expect(await createService().service.decide(undefined, prompter)).toEqual({
        download: false,
        source: "answer",
      });
    });
  });

  describe("isPresent", () => {
    it("is false before the model exists", async () => {
      expect(await createService().service.isPresent()).toBe(false);
    });

    it("is true once a model file exists", async () => {
      const { service } = createService({ files: { [MODEL_PATH]: file("old") } });

      expect(await service.isPresent()).toBe(true);
    });
  });

  describe("download", () => {
    it("writes the model file", async () => {
      const { service, fileSystem } = createService();

      const outcome = await service.download();

      expect(outcome).toEqual({ kind: "downloaded", path: MODEL_PATH, bytes: 10 });
      expect(fileSystem.$.readText(MODEL_PATH)).toBe("gguf-bytes");
    });

    it("keeps an existing model", async () => {
      const { service, httpClient } = createService({ files: { [MODEL_PATH]: file("old") } });

      const outcome = await service.download();

      expect(outcome).toEqual({ kind: "already-present", path: MODEL_PATH });
      expect(httpClient.requests).toEqual([]);
    });

    it("reports a failed download without throwing", async () => {
      const { service, fileSystem, logger } = createService({ response: { status: 503 } });

      const outcome = await service.download();

      expect(outcome).toEqual({
        kind: "failed",
        path: MODEL_PATH,
        url: GGUF_MODEL_URL,
        message: `HTTP 503 downloading from ${GGUF_MODEL_URL}`,
      });
      expect(fileSystem.$.filesUnder(MODELS_DIR)).toEqual([]);
      expect(logger.warn).toHaveBeenCalledWith("Model download failed", {
        url: GGUF_MODEL_URL,
        error: `HTTP 503 downloading from ${GGUF_MODEL_URL}`,
      });
    });

    it("reports network errors", async () => {
      const { service } = createService({ response: { error: new TypeError("fetch failed") } });

      const outcome = await service.download();

      expect(outcome).toMatchObject({
        kind: "failed",
        message: `Network error downloading from ${GGUF_MODEL_URL}: fetch failed`,
      });
    });
  });
});
