#!/usr/bin/env node
/**
 * Installer entry point.
 * Reads settings and flags, wires the services and runs the installer.
 */

import { parseInstallerSettings } from "../services/config/installer-settings.js";
import { ElectronLogService } from "../services/logging/index.js";
import { DefaultPathProvider } from "../services/platform/path-provider.js";
import { createPrompter } from "../services/platform/prompt.js";
import { isServiceError } from "../services/errors.js";
import { getErrorMessage } from "../shared/error-utils.js";
import { NodePlatformInfo } from "./platform-info.js";
import {
  createInstaller,
  HELP_TEXT,
  humanOutput,
  parseCliArgs,
  type CliOptions,
} from "./cli.js";
import { EXIT_FAILURE } from "./installer.js";

async function main(options: CliOptions): Promise<number> {
  const settings = parseInstallerSettings(process.env);
  const platformInfo = new NodePlatformInfo();
  const pathProvider = new DefaultPathProvider(platformInfo);
  const loggingService = new ElectronLogService(pathProvider);
  const output = humanOutput<NodeJS.WriteStream>(options, process);
  const prompter = createPrompter(process.stdin, output, loggingService.createLogger("installer"));

  try {
    const installer = createInstaller({
      settings,
      platformInfo,
      pathProvider,
      loggingService,
      prompter,
      output,
      color: output.isTTY,
      cwd: process.cwd(),
    });
    const summary = await installer.run();
    if (options.json) {
      process.stdout.write(`${JSON.stringify(summary, null, 2)}\n`);
    }
    return summary.exitCode;
  } finally {
    prompter.close();
    loggingService.dispose();
  }
}

function start(): void {
  let options: CliOptions;
  try {
    options = parseCliArgs(process.argv.slice(2));
  } catch (error) {
    process.stderr.write(`${getErrorMessage(error)}\n\n${HELP_TEXT}`);
    process.exitCode = EXIT_FAILURE;
    return;
  }
  if (options.help) {
    process.stdout.write(HELP_TEXT);
    return;
  }

  main(options).then(
    (exitCode) => {
      process.exitCode = exitCode;
    },
    (error: unknown) => {
      // Settings errors are expected user input problems; anything else is a bug
      const message = isServiceError(error)
        ? error.message
        : `Unexpected error: ${getErrorMessage(error)}`;
      process.stderr.write(`✗ ${message}\n`);
      process.exitCode = EXIT_FAILURE;
    }
  );
}

start();
