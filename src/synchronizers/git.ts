import os from "os";
import { UnsupportedOperationError } from "../errors";
import { isDirectory } from "../filesystem";
import type { PushOptions, ResolveOptions, Synchronizer, UpdateOptions } from "../types";
import { commandSucceeded, spawnCommand } from "./process";
import type { CommandRequest, CommandResult, CommandRunner } from "./process";

export const DEFAULT_REMOTE = "origin";

export interface GitSynchronizerOptions {
  runner?: CommandRunner;
  /** Branch to pull and push; the current branch when unset. */
  branch?: string;
  timeoutMs?: number;
  hostname?: () => string;
  now?: () => Date;
}

function pad(value: number): string {
  return String(value).padStart(2, "0");
}

/** Local time as `YYYY-MM-DD HH:MM:SS +HH:MM`. */
export function formatCommitTimestamp(date: Date): string {
  const offset = -date.getTimezoneOffset();
  const sign = offset >= 0 ? "+" : "-";
  const absolute = Math.abs(offset);
  const day = `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
  const time = `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
  return `${day} ${time} ${sign}${pad(Math.floor(absolute / 60))}:${pad(absolute % 60)}`;
}

export class GitSynchronizer implements Synchronizer {
  private readonly runner: CommandRunner;
  private readonly branch: string | undefined;
  private readonly timeoutMs: number | undefined;
  private readonly hostname: () => string;
  private readonly now: () => Date;

  constructor(options: GitSynchronizerOptions = {}) {
    this.runner = options.runner ?? spawnCommand;
    this.branch = options.branch;
    this.timeoutMs = options.timeoutMs;
    this.hostname = options.hostname ?? os.hostname;
    this.now = options.now ?? (() => new Date());
  }

  async update(path: string, options: UpdateOptions): Promise<boolean> {
    if (!(await isDirectory(path))) {
      return true;
    }
    const args = ["pull"];
    if (!options.merge) {
      args.push("--rebase");
    }
    args.push(options.origin ?? DEFAULT_REMOTE);
    if (this.branch) {
      args.push(this.branch);
    }
    const result = await this.git(path, args, options.verbose);
    return !commandSucceeded(result);
  }

  async push(path: string, options: PushOptions): Promise<boolean> {
    if (!(await isDirectory(path))) {
      return true;
    }
    const added = await this.git(path, ["add", "--all"], options.verbose);
    if (!commandSucceeded(added)) {
      return true;
    }
    const status = await this.git(path, ["status", "--porcelain"], options.verbose, true);
    if (!commandSucceeded(status)) {
      return true;
    }
    if (status.stdout.trim().length === 0) {
      return false;
    }

    const message = `projsync commit from ${this.hostname()} at ${formatCommitTimestamp(this.now())}`;
    const committed = await this.git(path, ["commit", "-m", message], options.verbose);
    if (!commandSucceeded(committed)) {
      return true;
    }
    const destination = options.destination ?? DEFAULT_REMOTE;
    const pushed = await this.git(
      path,
      ["push", destination, this.branch ?? "HEAD"],
      options.verbose
    );
    return !commandSucceeded(pushed);
  }

  async resolve(_path: string, _options: ResolveOptions): Promise<boolean> {
    throw new UnsupportedOperationError("resolve", "git");
  }

  private async git(
    cwd: string,
    args: string[],
    verbose: boolean,
    captureStdout = false
  ): Promise<CommandResult> {
    const request: CommandRequest = {
      command: "git",
      args,
      cwd,
      verbose,
      captureStdout,
      timeoutMs: this.timeoutMs
    };
    return await this.runner(request);
  }
}
