import chalk from "chalk";
import type { PathStatus, SyncObserver, SyncReport } from "./types";

export type Tone = "project" | "path" | "unknown" | "success" | "error" | "unsupported";

export interface StatusLine {
  tone: Tone;
  text: string;
  stream: "stdout" | "stderr";
}

export type EmitLine = (line: StatusLine) => void;

export function paint(line: StatusLine): string {
  switch (line.tone) {
    case "path":
      return chalk.blue(line.text);
    case "unknown":
      return chalk.magenta(line.text);
    case "success":
      return chalk.green(line.text);
    case "error":
      return chalk.red(line.text);
    case "unsupported":
      return chalk.yellow(line.text);
    case "project":
      return chalk.bold(line.text);
  }
}

export const emitToConsole: EmitLine = (line) => {
  if (line.stream === "stderr") {
    console.error(paint(line));
    return;
  }
  console.log(paint(line));
};

const STATUS_TEXT: Record<PathStatus, string> = {
  ok: "ok",
  failed: "failed!",
  unsupported: "unsupported"
};

const STATUS_TONE: Record<PathStatus, Tone> = {
  ok: "success",
  failed: "error",
  unsupported: "unsupported"
};

/**
 * Progress lines for a run. Level 1 prints projects and path outcomes,
 * level 2 also announces each path before its tool output.
 */
export function createStatusObserver(verbose: number, emit: EmitLine = emitToConsole): SyncObserver {
  return {
    onProject(label) {
      if (verbose >= 1) {
        emit({ tone: "project", text: label, stream: "stdout" });
      }
    },
    onPathStart(path) {
      if (verbose >= 2) {
        emit({ tone: "path", text: `\t${path}`, stream: "stdout" });
      }
    },
    onPathDone(path, status, detail) {
      if (verbose < 1) {
        return;
      }
      const suffix = detail ? ` (${detail})` : "";
      emit({
        tone: STATUS_TONE[status],
        text: `\t${path}... ${STATUS_TEXT[status]}${suffix}`,
        stream: status === "ok" ? "stdout" : "stderr"
      });
    }
  };
}

function section(heading: string, entries: string[], tone: Tone): StatusLine[] {
  if (entries.length === 0) {
    return [];
  }
  return [heading, ...entries.map((entry) => `\t${entry}`)].map((text): StatusLine => ({
    tone,
    text,
    stream: "stderr"
  }));
}

export function summarize(report: SyncReport): StatusLine[] {
  return [
    ...section("unknown projects or references:", report.unknownProjects, "unknown"),
    ...section("projects with errors:", report.errorProjects, "error"),
    ...section("paths with errors:", report.errorPaths, "error"),
    ...section(`paths that do not support ${report.mode}:`, report.unsupportedPaths, "unsupported")
  ];
}

export function printSummary(report: SyncReport, emit: EmitLine = emitToConsole): void {
  summarize(report).forEach((line) => emit(line));
}
