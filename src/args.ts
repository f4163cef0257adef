import { ProjsyncError, ExitCodes } from "./errors";
import type { SyncMode } from "./types";

export interface ParsedArgs {
  projects: string[];
  config?: string;
  mode: SyncMode;
  merge: boolean;
  verbose: number;
  timeoutMs?: number;
  help: boolean;
}

function requireValue(args: string[], index: number, flag: string): string {
  const value = args[index + 1];
  if (value === undefined || value.startsWith("-")) {
    throw new ProjsyncError(`Missing value for ${flag}`, ExitCodes.Usage);
  }
  return value;
}

export function parseArgs(argv: string[]): ParsedArgs {
  const args = argv.slice(2);
  const result: ParsedArgs = {
    projects: [],
    mode: "update",
    merge: false,
    verbose: 1,
    help: false
  };

  for (let i = 0; i < args.length; i += 1) {
    const arg = args[i];
    if (arg === "--") {
      result.projects.push(...args.slice(i + 1));
      break;
    }
    if (!arg.startsWith("-")) {
      result.projects.push(arg);
      continue;
    }
    if (arg === "-c" || arg === "--config") {
      result.config = requireValue(args, i, arg);
      i += 1;
      continue;
    }
    if (arg === "-u" || arg === "--update") {
      result.mode = "update";
      result.merge = false;
      continue;
    }
    if (arg === "-m" || arg === "--merge") {
      result.mode = "update";
      result.merge = true;
      continue;
    }
    if (arg === "-p" || arg === "--push") {
      result.mode = "push";
      continue;
    }
    if (arg === "-r" || arg === "--resolve") {
      result.mode = "resolve";
      continue;
    }
    if (arg === "-v" || arg === "--verbose") {
      result.verbose += 1;
      continue;
    }
    if (/^-v+$/.test(arg)) {
      result.verbose += arg.length - 1;
      continue;
    }
    if (arg === "-q" || arg === "--quiet") {
      result.verbose = 0;
      continue;
    }
    if (arg === "--timeout") {
      const value = requireValue(args, i, arg);
      const seconds = Number(value);
      if (!Number.isFinite(seconds) || seconds <= 0) {
        throw new ProjsyncError(`Invalid timeout: ${value}`, ExitCodes.Usage);
      }
      result.timeoutMs = Math.round(seconds * 1000);
      i += 1;
      continue;
    }
    if (arg === "--help" || arg === "-h") {
      result.help = true;
      continue;
    }
    throw new ProjsyncError(`Unknown option: ${arg}`, ExitCodes.Usage);
  }

  return result;
}

export const HELP_TEXT = [
  "projsync [options] [PROJECT...]",
  "",
  "Synchronizes the given projects, or every automatic project when none are given.",
  "Projects are selected by name or by their 1-based position in the config.",
  "",
  "Options:",
  "  -c, --config <file>  Configuration file (default: $PROJSYNC_CONFIG or ~/.projsync/config.xml)",
  "  -u, --update         Pull changes, rebasing local commits (default)",
  "  -m, --merge          Pull changes, merging local commits",
  "  -p, --push           Commit and push local changes",
  "  -r, --resolve        Resolve conflicts",
  "  -v, --verbose        Raise verbosity: 1 prints status, 2 adds tool output (default: 1)",
  "  -q, --quiet          Only print the summary",
  "      --timeout <secs> Abort each tool invocation after this many seconds",
  "  -h, --help           Show help"
].join("\n");
