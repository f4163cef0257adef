import test from "node:test";
import assert from "node:assert/strict";
import { createStatusObserver, summarize } from "../src/report";
import type { StatusLine } from "../src/report";
import type { SyncReport } from "../src/types";

function collect(): { lines: StatusLine[]; emit: (line: StatusLine) => void } {
  const lines: StatusLine[] = [];
  return { lines, emit: (line) => lines.push(line) };
}

void test("summarize lists unknown names, failing projects and paths", () => {
  const report: SyncReport = {
    mode: "resolve",
    visitedProjects: ["a", "b"],
    errorProjects: ["a"],
    errorPaths: ["/srv/a/", "/srv/b/"],
    unsupportedPaths: ["/srv/b/"],
    unknownProjects: ["ghost"],
    failed: true
  };

  assert.deepEqual(
    summarize(report).map((line) => [line.tone, line.text]),
    [
      ["unknown", "unknown projects or references:"],
      ["unknown", "\tghost"],
      ["error", "projects with errors:"],
      ["error", "\ta"],
      ["error", "paths with errors:"],
      ["error", "\t/srv/a/"],
      ["error", "\t/srv/b/"],
      ["unsupported", "paths that do not support resolve:"],
      ["unsupported", "\t/srv/b/"]
    ]
  );
});

void test("summarize is empty for a clean run", () => {
  const report: SyncReport = {
    mode: "update",
    visitedProjects: ["a"],
    errorProjects: [],
    errorPaths: [],
    unsupportedPaths: [],
    unknownProjects: [],
    failed: false
  };
  assert.deepEqual(summarize(report), []);
});

void test("status observer prints nothing when quiet", () => {
  const { lines, emit } = collect();
  const observer = createStatusObserver(0, emit);
  observer.onProject?.("a");
  observer.onPathStart?.("/srv/a");
  observer.onPathDone?.("/srv/a", "failed");
  assert.deepEqual(lines, []);
});

void test("status observer prints projects and outcomes at level 1", () => {
  const { lines, emit } = collect();
  const observer = createStatusObserver(1, emit);
  observer.onProject?.("a");
  observer.onPathStart?.("/srv/a");
  observer.onPathDone?.("/srv/a", "ok");
  observer.onPathDone?.("/srv/b", "unsupported", "git does not support resolve");

  assert.deepEqual(lines, [
    { tone: "project", text: "a", stream: "stdout" },
    { tone: "success", text: "\t/srv/a... ok", stream: "stdout" },
    {
      tone: "unsupported",
      text: "\t/srv/b... unsupported (git does not support resolve)",
      stream: "stderr"
    }
  ]);
});

void test("status observer announces paths before tool output at level 2", () => {
  const { lines, emit } = collect();
  const observer = createStatusObserver(2, emit);
  observer.onPathStart?.("/srv/a");
  observer.onPathDone?.("/srv/a", "failed");

  assert.deepEqual(
    lines.map((line) => line.text),
    ["\t/srv/a", "\t/srv/a... failed!"]
  );
});
