/**
 * Test utilities for the binary download module: real archives in temp directories.
 */

import archiver from "archiver";
import * as fs from "node:fs/promises";
import { createWriteStream } from "node:fs";
import * as path from "node:path";
import * as os from "node:os";

/**
 * Content of one archive member: plain text, text with a Unix file mode, or a symlink target.
 */
export type TestArchiveFile =
  | string
  | { readonly content: string; readonly mode: number }
  | { readonly symlink: string };

/**
 * Create a test zip archive from file contents.
 *
 * @param files - Map of relative file paths to their contents
 * @returns Path to the created archive (caller must clean up with {@link cleanupTestArchive})
 *
 * @example
 * const archivePath = await createTestZip({
 *   "remembrances-mcp-linux/remembrances-mcp": { content: "#!/bin/sh\n", mode: 0o755 },
 *   "remembrances-mcp-linux/libllama.so": "so",
 *   "remembrances-mcp-linux/libllama.so.1": { symlink: "libllama.so" },
 * });
 */
export async function createTestZip(
  files: Readonly<Record<string, TestArchiveFile>>,
  name = "test.zip"
): Promise<string> {
  const tempDir = await fs.mkdtemp(path.join(os.tmpdir(), "test-archive-"));
  const archivePath = path.join(tempDir, name);

  try {
    await new Promise<void>((resolve, reject) => {
      const output = createWriteStream(archivePath);
      const archive = archiver("zip", { zlib: { level: 9 } });

      output.on("close", () => resolve());
      output.on("error", reject);
      archive.on("error", reject);
      archive.pipe(output);

      for (const [relativePath, file] of Object.entries(files)) {
        if (typeof file === "string") {
          archive.append(file, { name: relativePath });
        } else if ("symlink" in file) {
          archive.symlink(relativePath, file.symlink, 0o777);
        } else {
          archive.append(file.content, { name: relativePath, mode: file.mode });
        }
      }
      archive.finalize().catch(reject);
    });
  } catch (error) {
    await fs.rm(tempDir, { recursive: true, force: true });
    throw error;
  }
  return archivePath;
}

/**
 * Clean up a test archive and its parent directory.
 */
export async function cleanupTestArchive(archivePath: string): Promise<void> {
  await fs.rm(path.dirname(archivePath), { recursive: true, force: true });
}
