/**
 * Behavioral mock for FileSystemLayer with in-memory state.
 *
 * Simulates real filesystem behavior:
 * - In-memory file/directory storage
 * - Proper error handling (ENOENT, EISDIR, ENOTDIR, ENOTEMPTY, EEXIST)
 * - Every method is a vitest spy for call assertions
 *
 * @example
 * const fs = createMockFileSystemLayer({
 *   entries: {
 *     "/proc/cpuinfo": file("flags : fpu avx2"),
 *     "/usr/local/cuda/lib64": directory(),
 *   },
 * });
 *
 * await fs.writeFile("/home/user/.bashrc", "export A=1\n");
 * expect(fs.$.readText("/home/user/.bashrc")).toBe("export A=1\n");
 */

import { posix } from "node:path";
import { vi, type Mock } from "vitest";
import type {
  DirEntry,
  FileSystemErrorCode,
  FileSystemLayer,
  MkdirOptions,
  RmOptions,
} from "./filesystem.js";
import { FileSystemError } from "../errors.js";

// =============================================================================
// Entry Types
// =============================================================================

/**
 * File entry in the mock filesystem.
 */
export interface FileEntry {
  readonly type: "file";
  readonly content: string | Buffer;
  readonly executable?: boolean;
  /** If set, accessing this entry throws an error with this code */
  readonly error?: FileSystemErrorCode;
}

/**
 * Directory entry in the mock filesystem.
 */
export interface DirectoryEntry {
  readonly type: "directory";
  /** If set, accessing this entry throws an error with this code */
  readonly error?: FileSystemErrorCode;
}

export type Entry = FileEntry | DirectoryEntry;

/**
 * Create a file entry.
 *
 * @example
 * file("hello world")
 * file(Buffer.from([0x50, 0x4b, 0x03, 0x04]))
 * file("secret", { error: "EACCES" })
 */
export function file(
  content: string | Buffer,
  options?: { executable?: boolean; error?: FileSystemErrorCode }
): FileEntry {
  return {
    type: "file" as const,
    content,
    ...(options?.executable !== undefined && { executable: options.executable }),
    ...(options?.error !== undefined && { error: options.error }),
  };
}

/**
 * Create a directory entry.
 */
export function directory(options?: { error?: FileSystemErrorCode }): DirectoryEntry {
  return {
    type: "directory" as const,
    ...(options?.error !== undefined && { error: options.error }),
  };
}

// =============================================================================
// State
// =============================================================================

/**
 * State access for assertions and test setup.
 */
export interface FileSystemMockState {
  /** All entries, keyed by normalized absolute path */
  readonly entries: ReadonlyMap<string, Entry>;

  /** Set an entry, auto-creating parent directories. */
  setEntry(path: string, entry: Entry): void;

  /** Text content of a file, or undefined when it is missing or not a file. */
  readText(path: string): string | undefined;

  /** Paths of all files under a directory, sorted. */
  filesUnder(dir: string): string[];
}

/**
 * FileSystemLayer whose methods are spies, with state access via `$`.
 */
export interface MockFileSystemLayer extends FileSystemLayer {
  readFile: Mock<(path: string) => Promise<string>>;
  writeFile: Mock<(path: string, content: string) => Promise<void>>;
  appendFile: Mock<(path: string, content: string) => Promise<void>>;
  writeFileBuffer: Mock<(path: string, content: Buffer) => Promise<void>>;
  mkdir: Mock<(path: string, options?: MkdirOptions) => Promise<void>>;
  makeTempDir: Mock<(prefix: string) => Promise<string>>;
  readdir: Mock<(path: string) => Promise<readonly DirEntry[]>>;
  rm: Mock<(path: string, options?: RmOptions) => Promise<void>>;
  copyTree: Mock<(src: string, dest: string) => Promise<void>>;
  makeExecutable: Mock<(path: string) => Promise<void>>;
  readonly $: FileSystemMockState;
}

export interface MockFileSystemLayerOptions {
  /** Initial entries; parent directories are created automatically. */
  readonly entries?: Readonly<Record<string, Entry>>;
}

function fsError(code: FileSystemErrorCode, path: string, operation: string): FileSystemError {
  return new FileSystemError(code, path, `${code}: ${operation} '${path}'`);
}

/**
 * Create an in-memory FileSystemLayer.
 */
export function createMockFileSystemLayer(options?: MockFileSystemLayerOptions): MockFileSystemLayer {
  const entries = new Map<string, Entry>([["/", directory()]]);
  let tempCounter = 0;

  const norm = (path: string): string => posix.normalize(path);

  const ensureParents = (path: string): void => {
    let dir = posix.dirname(path);
    while (!entries.has(dir)) {
      entries.set(dir, directory());
      dir = posix.dirname(dir);
    }
  };

  const setEntry = (path: string, entry: Entry): void => {
    const normalized = norm(path);
    ensureParents(normalized);
    entries.set(normalized, entry);
  };

  const childrenOf = (dir: string): string[] => {
    const prefix = dir === "/" ? "/" : `${dir}/`;
    return [...entries.keys()].filter((key) => key !== dir && key.startsWith(prefix));
  };

  const getEntry = (path: string, operation: string): Entry => {
    const entry = entries.get(path);
    if (!entry) throw fsError("ENOENT", path, operation);
    if (entry.error) throw fsError(entry.error, path, operation);
    return entry;
  };

  const requireParentDir = (path: string, operation: string): void => {
    const parent = entries.get(posix.dirname(path));
    if (!parent) throw fsError("ENOENT", path, operation);
    if (parent.type !== "directory") throw fsError("ENOTDIR", path, operation);
  };

  const writeContent = (path: string, content: string | Buffer, operation: string): void => {
    const normalized = norm(path);
    requireParentDir(normalized, operation);
    const existing = entries.get(normalized);
    if (existing?.type === "directory") throw fsError("EISDIR", normalized, operation);
    if (existing?.error) throw fsError(existing.error, normalized, operation);
    entries.set(normalized, file(content));
  };

  for (const [path, entry] of Object.entries(options?.entries ?? {})) {
    setEntry(path, entry);
  }

  const state: FileSystemMockState = {
    entries,
    setEntry,
    readText(path) {
      const entry = entries.get(norm(path));
      if (entry?.type !== "file") return undefined;
      return typeof entry.content === "string" ? entry.content : entry.content.toString("utf-8");
    },
    filesUnder(dir) {
      return childrenOf(norm(dir))
        .filter((key) => entries.get(key)?.type === "file")
        .sort();
    },
  };

  return {
    $: state,

    readFile: vi.fn(async (path: string) => {
      const normalized = norm(path);
      const entry = getEntry(normalized, "open");
      if (entry.type === "directory") throw fsError("EISDIR", normalized, "read");
      return typeof entry.content === "string" ? entry.content : entry.content.toString("utf-8");
    }),

    writeFile: vi.fn(async (path: string, content: string) => {
      writeContent(path, content, "open");
    }),

    appendFile: vi.fn(async (path: string, content: string) => {
      const existing = state.readText(path) ?? "";
      writeContent(path, existing + content, "open");
    }),

    writeFileBuffer: vi.fn(async (path: string, content: Buffer) => {
      writeContent(path, content, "open");
    }),

    mkdir: vi.fn(async (path: string, mkdirOptions?: MkdirOptions) => {
      const normalized = norm(path);
      const existing = entries.get(normalized);
      if (existing?.type === "file") throw fsError("EEXIST", normalized, "mkdir");
      if (existing) return;
      if (mkdirOptions?.recursive === false) requireParentDir(normalized, "mkdir");
      setEntry(normalized, directory());
    }),

    makeTempDir: vi.fn(async (prefix: string) => {
      tempCounter += 1;
      const path = `/tmp/${prefix}${tempCounter}`;
      setEntry(path, directory());
      return path;
    }),

    readdir: vi.fn(async (path: string) => {
      const normalized = norm(path);
      const entry = getEntry(normalized, "scandir");
      if (entry.type !== "directory") throw fsError("ENOTDIR", normalized, "scandir");
      return childrenOf(normalized)
        .filter((key) => posix.dirname(key) === normalized)
        .map((key) => {
          const child = entries.get(key);
          return createDirEntry(posix.basename(key), {
            isDirectory: child?.type === "directory",
            isFile: child?.type === "file",
          });
        });
    }),

    rm: vi.fn(async (path: string, rmOptions?: RmOptions) => {
      const normalized = norm(path);
      const entry = entries.get(normalized);
      if (!entry) {
        if (rmOptions?.force) return;
        throw fsError("ENOENT", normalized, "rm");
      }
      const children = childrenOf(normalized);
      if (entry.type === "directory" && children.length > 0 && !rmOptions?.recursive) {
        throw fsError("ENOTEMPTY", normalized, "rmdir");
      }
      for (const child of children) entries.delete(child);
      entries.delete(normalized);
    }),

    copyTree: vi.fn(async (src: string, dest: string) => {
      const from = norm(src);
      const to = norm(dest);
      const entry = getEntry(from, "cp");
      setEntry(to, entry);
      if (entry.type === "directory") {
        for (const child of childrenOf(from)) {
          const childEntry = entries.get(child);
          if (childEntry) setEntry(to + child.slice(from.length), childEntry);
        }
      }
    }),

    makeExecutable: vi.fn(async (path: string) => {
      const normalized = norm(path);
      const entry = getEntry(normalized, "chmod");
      if (entry.type === "file") {
        entries.set(normalized, { ...entry, executable: true });
      }
    }),
  };
}

/**
 * Create a DirEntry for readdir results.
 *
 * @example
 * createDirEntry('libcudart.so.12', { isFile: true })
 */
export function createDirEntry(
  name: string,
  type: { isDirectory?: boolean; isFile?: boolean; isSymbolicLink?: boolean } = {}
): DirEntry {
  return {
    name,
    isDirectory: type.isDirectory ?? false,
    isFile: type.isFile ?? false,
    isSymbolicLink: type.isSymbolicLink ?? false,
  };
}
