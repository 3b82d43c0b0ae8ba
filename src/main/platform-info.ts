/**
 * Node.js implementation of PlatformInfo.
 */

import os from "node:os";
import type { PlatformInfo } from "../services/platform/platform-info.js";

/**
 * PlatformInfo implementation using Node.js APIs.
 * `os.type()` and `os.machine()` return the same strings as `uname -s` and `uname -m`.
 *
 * Values are cached at construction time for consistency.
 */
export class NodePlatformInfo implements PlatformInfo {
  readonly osName: string;
  readonly machine: string;
  readonly homeDir: string;
  readonly shell: string | undefined;

  constructor(env: NodeJS.ProcessEnv = process.env) {
    this.osName = os.type();
    this.machine = os.machine();
    this.homeDir = os.homedir();
    this.shell = env.SHELL || undefined;
  }
}
