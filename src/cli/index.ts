#!/usr/bin/env node

import { closeLogFile, logger, setVerboseLoggingEnabled } from "../logging/logger.js";
import type { CommandResult } from "../types/index.js";
import { formatCliFailure } from "./failure.js";
import { runListCommand } from "./commands.list.js";
import { runSyncCommand } from "./commands.sync.js";
import { parseGlobalCliOptions, renderHelp, resolveCliCommand } from "./router.js";

export async function runCli(argv: string[]): Promise<number> {
  try {
    const globalOptions = parseGlobalCliOptions(argv);
    setVerboseLoggingEnabled(globalOptions.verbose);
    const resolved = resolveCliCommand(globalOptions.args);

    if (resolved.command === "help") {
      logger.info(renderHelp());
      return 0;
    }

    const result =
      resolved.command === "list" ? await runListCommand(resolved.args) : await runSyncCommand(resolved.args);
    return reportResult(result);
  } catch (error) {
    logger.error(formatCliFailure(error));
    await closeLogFile();
    return 1;
  }
}

function reportResult(result: CommandResult): number {
  if (result.stdout !== undefined) {
    process.stdout.write(result.stdout);
  }

  const exitCode = result.exitCode ?? 0;
  if (exitCode === 0) {
    logger.info(result.message);
  } else {
    logger.error(result.message);
  }
  return exitCode;
}

const exitCode = await runCli(process.argv.slice(2));
process.exit(exitCode);
