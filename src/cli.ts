#!/usr/bin/env node
import path from "path";
import { parseArgs, HELP_TEXT } from "./args";
import { getConfigPath, readConfig } from "./config";
import { ProjsyncError, ExitCodes } from "./errors";
import { buildRegistry } from "./registry";
import { createStatusObserver, printSummary } from "./report";
import { applyMode } from "./sync";
import { createDefaultSynchronizers } from "./synchronizers";

async function run(): Promise<void> {
  const args = parseArgs(process.argv);
  if (args.help) {
    console.log(HELP_TEXT);
    return;
  }

  const configPath = getConfigPath(process.env, args.config);
  const tree = await readConfig(configPath);
  const { registry, warnings } = await buildRegistry(tree, {
    env: process.env,
    baseDir: path.dirname(configPath)
  });
  if (args.verbose >= 1) {
    warnings.forEach((warning) => console.warn(warning));
  }

  const report = await applyMode(
    registry,
    createDefaultSynchronizers({ timeoutMs: args.timeoutMs }),
    args.mode,
    args.projects.length > 0 ? args.projects : null,
    {
      verbose: args.verbose,
      merge: args.merge,
      observer: createStatusObserver(args.verbose)
    }
  );
  printSummary(report);
  if (report.failed) {
    process.exitCode = ExitCodes.Failure;
  }
}

run().catch((error: unknown) => {
  if (error instanceof ProjsyncError) {
    console.error(error.message);
    process.exit(error.code);
  }
  if (error instanceof Error) {
    console.error(error.message);
  } else {
    console.error("Unexpected error");
  }
  process.exit(ExitCodes.Failure);
});
