import { describe, it, expect } from "vitest";
import {
  DefaultShellProfileService,
  libraryPathExportLine,
  pathExportLine,
} from "./shell-profile-service.js";
import {
  createMockFileSystemLayer,
  directory,
  file,
  type Entry,
} from "../platform/filesystem.test-utils.js";
import { createMockPathProvider } from "../platform/path-provider.test-utils.js";
import { createMockLogger } from "../logging/logging.test-utils.js";
import type { SupportedPlatform } from "../capabilities/types.js";

const LINUX: SupportedPlatform = { os: "linux", arch: "amd64" };
const DARWIN: SupportedPlatform = { os: "darwin", arch: "aarch64" };

const HOME = "/home/test";
const BIN_DIR = `${HOME}/.local/share/remembrances/bin`;
const PATH_BLOCK = `\n# Remembrances-MCP\nexport PATH="$PATH:${BIN_DIR}"\n`;
const LD_LINE = `export LD_LIBRARY_PATH="${HOME}/.local/lib:\${LD_LIBRARY_PATH:-}"\n`;

function createService(files: Record<string, Entry> = {}) {
  const fileSystem = createMockFileSystemLayer({ entries: { [HOME]: directory(), ...files } });
  const service = new DefaultShellProfileService(
    fileSystem,
    createMockPathProvider(),
    createMockLogger()
  );
  return { service, fileSystem };
}

describe("export lines", () => {
  it("appends the bin directory to PATH", () => {
    expect(pathExportLine("/opt/r/bin")).toBe('export PATH="$PATH:/opt/r/bin"');
  });

  it("prepends the library directory to LD_LIBRARY_PATH", () => {
    expect(libraryPathExportLine("/home/u/.local/lib")).toBe(
      'export LD_LIBRARY_PATH="/home/u/.local/lib:${LD_LIBRARY_PATH:-}"'
    );
  });
});

describe("DefaultShellProfileService", () => {
  describe("selectProfiles", () => {
    it("picks .bashrc when no profile exists", async () => {
      const { service } = createService();

      expect(await service.selectProfiles(LINUX, "/bin/bash")).toEqual([`${HOME}/.bashrc`]);
    });

    it("adds .zshrc for a zsh login shell", async () => {
      const { service } = createService();

      expect(await service.selectProfiles(LINUX, "/usr/bin/zsh")).toEqual([
        `${HOME}/.bashrc`,
        `${HOME}/.zshrc`,
      ]);
    });

    it("picks only .zshrc when it is the only profile", async () => {
      const { service } = createService({ [`${HOME}/.zshrc`]: file("") });

      expect(await service.selectProfiles(LINUX, "/bin/bash")).toEqual([`${HOME}/.zshrc`]);
    });

    it("picks both when both exist", async () => {
      const { service } = createService({
        [`${HOME}/.bashrc`]: file(""),
        [`${HOME}/.zshrc`]: file(""),
      });

      expect(await service.selectProfiles(LINUX, undefined)).toEqual([
        `${HOME}/.bashrc`,
        `${HOME}/.zshrc`,
      ]);
    });

    it("adds an existing .bash_profile on macOS", async () => {
      const { service } = createService({
        [`${HOME}/.zshrc`]: file(""),
        [`${HOME}/.bash_profile`]: file(""),
      });

      expect(await service.selectProfiles(DARWIN, "/bin/zsh")).toEqual([
        `${HOME}/.zshrc`,
        `${HOME}/.bash_profile`,
      ]);
    });

    it("ignores .bash_profile on linux", async () => {
      const { service } = createService({ [`${HOME}/.bash_profile`]: file("") });

      expect(await service.selectProfiles(LINUX, "/bin/bash")).toEqual([`${HOME}/.bashrc`]);
    });
  });

  describe("setup", () => {
    it("creates .bashrc with the PATH block", async () => {
      const { service, fileSystem } = createService();

      const outcomes = await service.setup({ platform: LINUX, shell: "/bin/bash", libraryPath: false });

      expect(outcomes).toEqual([
        { file: `${HOME}/.bashrc`, path: "added", libraryPath: null },
      ]);
      expect(fileSystem.$.readText(`${HOME}/.bashrc`)).toBe(PATH_BLOCK);
    });

    it("appends to existing content", async () => {
      const { service, fileSystem } = createService({ [`${HOME}/.bashrc`]: file("alias ll='ls -l'\n") });

      await service.setup({ platform: LINUX, shell: "/bin/bash", libraryPath: false });

      expect(fileSystem.$.readText(`${HOME}/.bashrc`)).toBe(`alias ll='ls -l'\n${PATH_BLOCK}`);
    });

    it("leaves an already configured PATH alone", async () => {
      const existing = `export PATH="$PATH:/home/test/.local/share/remembrances/bin"\n`;
      const { service, fileSystem } = createService({ [`${HOME}/.bashrc`]: file(existing) });

      const outcomes = await service.setup({ platform: LINUX, shell: "/bin/bash", libraryPath: false });

      expect(outcomes).toEqual([
        { file: `${HOME}/.bashrc`, path: "already-configured", libraryPath: null },
      ]);
      expect(fileSystem.$.readText(`${HOME}/.bashrc`)).toBe(existing);
    });

    it("adds LD_LIBRARY_PATH when requested", async () => {
      const { service, fileSystem } = createService();

      const outcomes = await service.setup({ platform: LINUX, shell: "/bin/bash", libraryPath: true });

      expect(outcomes).toEqual([{ file: `${HOME}/.bashrc`, path: "added", libraryPath: "added" }]);
      expect(fileSystem.$.readText(`${HOME}/.bashrc`)).toBe(`${PATH_BLOCK}${LD_LINE}`);
    });

    it("does not repeat an existing LD_LIBRARY_PATH line", async () => {
      const existing = `export LD_LIBRARY_PATH="$HOME/.local/lib:$LD_LIBRARY_PATH"\n`;
      const { service, fileSystem } = createService({ [`${HOME}/.bashrc`]: file(existing) });

      const outcomes = await service.setup({ platform: LINUX, shell: "/bin/bash", libraryPath: true });

      expect(outcomes).toEqual([
        { file: `${HOME}/.bashrc`, path: "added", libraryPath: "already-configured" },
      ]);
      expect(fileSystem.$.readText(`${HOME}/.bashrc`)).toBe(`${existing}${PATH_BLOCK}`);
    });

    it("updates every selected profile", async () => {
      const { service, fileSystem } = createService({ [`${HOME}/.bashrc`]: file("") });

      const outcomes = await service.setup({ platform: LINUX, shell: "/bin/zsh", libraryPath: false });

      expect(outcomes.map((outcome) => outcome.file)).toEqual([`${HOME}/.bashrc`, `${HOME}/.zshrc`]);
      expect(fileSystem.$.readText(`${HOME}/.zshrc`)).toBe(PATH_BLOCK);
    });
  });
});
