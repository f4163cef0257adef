import { UnsupportedOperationError } from "../errors";
import type { PushOptions, ResolveOptions, Synchronizer, UpdateOptions } from "../types";
import { commandSucceeded, spawnCommand } from "./process";
import type { CommandRunner } from "./process";

export interface RsyncSynchronizerOptions {
  runner?: CommandRunner;
  timeoutMs?: number;
}

/**
 * One-way archive mirror. `update` copies the origin onto the path, `push`
 * copies the path onto the origin; stale destination entries are deleted
 * either way.
 */
export class RsyncSynchronizer implements Synchronizer {
  private readonly runner: CommandRunner;
  private readonly timeoutMs: number | undefined;

  constructor(options: RsyncSynchronizerOptions = {}) {
    this.runner = options.runner ?? spawnCommand;
    this.timeoutMs = options.timeoutMs;
  }

  async update(path: string, options: UpdateOptions): Promise<boolean> {
    if (!options.origin) {
      return true;
    }
    return await this.mirror(options.origin, path, options.verbose);
  }

  async push(path: string, options: PushOptions): Promise<boolean> {
    if (!options.destination) {
      return true;
    }
    return await this.mirror(path, options.destination, options.verbose);
  }

  async resolve(_path: string, _options: ResolveOptions): Promise<boolean> {
    throw new UnsupportedOperationError("resolve", "rsync");
  }

  private async mirror(source: string, destination: string, verbose: boolean): Promise<boolean> {
    const flags = verbose ? "-auv" : "-au";
    const result = await this.runner({
      command: "rsync",
      args: [flags, "--delete", source, destination],
      verbose,
      timeoutMs: this.timeoutMs
    });
    return !commandSucceeded(result);
  }
}
