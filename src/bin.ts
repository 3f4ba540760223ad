#!/usr/bin/env node

import process from "node:process";

import { CommanderError } from "commander";

import { createCleanupCommand } from "./cli/cleanup.js";
import { commanderAlreadyRendered } from "./cli/commander-utils.js";
import { CliError, toCliError } from "./cli/errors.js";
import { writeCommandOutput } from "./cli/output.js";
import { renderCliError } from "./render/utils/errors.js";
import { toErrorMessage } from "./utils/errors.js";
import { getCleanupVersion } from "./utils/version.js";

export async function runCli(
  argv: readonly string[] = process.argv,
): Promise<void> {
  const program = createCleanupCommand()
    .version(
      getCleanupVersion(),
      "-v, --version",
      "print the cache-cleanup version",
    )
    .exitOverride()
    .showHelpAfterError();

  try {
    await program.parseAsync(argv);
  } catch (error) {
    if (error instanceof CommanderError) {
      if (commanderAlreadyRendered(error)) {
        process.exitCode = error.exitCode ?? 0;
        return;
      }

      writeCommandOutput({
        stderr: `${renderCliError(new CliError(toErrorMessage(error)))}\n`,
        exitCode: error.exitCode ?? 1,
      });
      return;
    }

    writeCommandOutput({
      stderr: `${renderCliError(toCliError(error))}\n`,
      exitCode: 1,
    });
  }
}

if (require.main === module) {
  void runCli();
}
