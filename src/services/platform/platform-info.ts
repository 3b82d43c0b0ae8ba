/**
 * Platform information provider.
 * Abstracts the raw OS name, machine name, home directory and login shell for testability.
 */

export interface PlatformInfo {
  /** Raw operating system name, as `uname -s` reports it (e.g. "Linux", "Darwin") */
  readonly osName: string;

  /** Raw machine hardware name, as `uname -m` reports it (e.g. "x86_64", "arm64") */
  readonly machine: string;

  /** User's home directory */
  readonly homeDir: string;

  /** User's login shell from $SHELL, if set */
  readonly shell: string | undefined;
}
