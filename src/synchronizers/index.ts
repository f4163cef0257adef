import type { SynchronizerTable } from "../types";
import { GitSynchronizer } from "./git";
import { RsyncSynchronizer } from "./rsync";
import type { CommandRunner } from "./process";

export { GitSynchronizer, formatCommitTimestamp, DEFAULT_REMOTE } from "./git";
export { RsyncSynchronizer } from "./rsync";
export { spawnCommand, commandSucceeded } from "./process";
export type { CommandRequest, CommandResult, CommandRunner } from "./process";

export interface DefaultSynchronizerOptions {
  runner?: CommandRunner;
  timeoutMs?: number;
}

export function createDefaultSynchronizers(
  options: DefaultSynchronizerOptions = {}
): SynchronizerTable {
  const git = new GitSynchronizer(options);
  return {
    tools: {
      git,
      rsync: new RsyncSynchronizer(options)
    },
    fallback: git
  };
}
