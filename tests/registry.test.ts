import test from "node:test";
import assert from "node:assert/strict";
import fs from "node:fs/promises";
import path from "node:path";
import { ProjsyncError, ExitCodes } from "../src/errors";
import { buildRegistry, parseAutoFlag, projectLabel } from "../src/registry";
import { node, withTempDir } from "./fixtures";

const baseDir = "/nonexistent-projsync-root";

void test("buildRegistry reads projects in order with their items", async () => {
  const root = node("ProjSync", null, {}, [
    node("project", null, {}, [
      node("name", "notes"),
      node("path", `${baseDir}/notes`, { tool: "rsync", origin: "host:/srv/notes" }),
      node("reference", "dotfiles"),
      node("path", `${baseDir}/journal`)
    ]),
    node("project", null, { auto: "false" }, [
      node("name", "dotfiles"),
      node("path", `${baseDir}/dotfiles`)
    ])
  ]);

  const { registry, warnings } = await buildRegistry(root, { baseDir });

  assert.deepEqual(warnings, []);
  assert.deepEqual(registry.projects, [
    {
      index: 1,
      name: "notes",
      auto: true,
      items: [
        {
          kind: "path",
          path: `${baseDir}/notes`,
          tool: "rsync",
          origin: "host:/srv/notes"
        },
        { kind: "reference", name: "dotfiles" },
        { kind: "path", path: `${baseDir}/journal`, tool: null, origin: null }
      ]
    },
    {
      index: 2,
      name: "dotfiles",
      auto: false,
      items: [{ kind: "path", path: `${baseDir}/dotfiles`, tool: null, origin: null }]
    }
  ]);
  assert.deepEqual(Array.from(registry.names.entries()), [
    ["notes", 0],
    ["dotfiles", 1]
  ]);
  assert.deepEqual(registry.auto, ["notes"]);
  assert.deepEqual(registry.autoIndices, [0]);
});

void test("buildRegistry rejects an unexpected root", async () => {
  await assert.rejects(buildRegistry(node("config")), (error) => {
    assert.ok(error instanceof ProjsyncError);
    assert.equal(error.code, ExitCodes.Validation);
    assert.equal(error.message, "Configuration root is <config>, expected <projsync>");
    return true;
  });
});

void test("buildRegistry warns about skipped and duplicate entries", async () => {
  const root = node("projsync", null, {}, [
    node("group", null, {}, [node("name", "ignored")]),
    node("project", null, {}, [
      node("name", "first"),
      node("name", "second"),
      node("comment", "hello"),
      node("path", `${baseDir}/a`)
    ]),
    node("PROJECT", null, {}, [node("Path", `${baseDir}/b`)])
  ]);

  const { registry, warnings } = await buildRegistry(root, { baseDir });

  assert.deepEqual(warnings, [
    "Ignored projsync child 1, tag='group'",
    "Duplicate name definition for project #1: 'first' and 'second'",
    "Ignored project #1 child with tag 'comment'",
    "No name set for project #2"
  ]);
  assert.equal(registry.projects.length, 2);
  assert.equal(registry.projects[0].name, "first");
  assert.equal(projectLabel(registry.projects[1]), "project #2");
});

void test("unnamed projects stay out of the name index but can be automatic", async () => {
  const root = node("projsync", null, {}, [
    node("project", null, {}, [node("path", `${baseDir}/a`)]),
    node("project", null, { auto: "0" }, [node("name", "b")])
  ]);

  const { registry } = await buildRegistry(root, { baseDir });

  assert.equal(registry.names.size, 1);
  assert.equal(registry.names.get("b"), 1);
  assert.deepEqual(registry.auto, []);
  assert.deepEqual(registry.autoIndices, [0]);
});

void test("duplicate project names are a configuration error", async () => {
  const root = node("projsync", null, {}, [
    node("project", null, {}, [node("name", "same")]),
    node("project", null, {}, [node("name", "same")])
  ]);

  await assert.rejects(buildRegistry(root, { baseDir }), (error) => {
    assert.ok(error instanceof ProjsyncError);
    assert.equal(error.code, ExitCodes.Validation);
    assert.equal(error.message, "Duplicate project name 'same' (projects #1 and #2)");
    return true;
  });
});

void test("empty paths are a configuration error", async () => {
  const root = node("projsync", null, {}, [node("project", null, {}, [node("path", "  ")])]);

  await assert.rejects(buildRegistry(root, { baseDir }), (error) => {
    assert.ok(error instanceof ProjsyncError);
    assert.equal(error.message, "Empty <path> in project #1");
    return true;
  });
});

void test("parseAutoFlag treats only false and 0 as false", () => {
  assert.equal(parseAutoFlag(undefined), true);
  assert.equal(parseAutoFlag("true"), true);
  assert.equal(parseAutoFlag("no"), true);
  assert.equal(parseAutoFlag(""), true);
  assert.equal(parseAutoFlag("false"), false);
  assert.equal(parseAutoFlag("FALSE"), false);
  assert.equal(parseAutoFlag(" False "), false);
  assert.equal(parseAutoFlag("0"), false);
});

void test("paths are canonicalized against the base directory", async () => {
  await withTempDir(async (root) => {
    await fs.mkdir(path.join(root, "repo"));
    const tree = node("projsync", null, {}, [
      node("project", null, {}, [
        node("name", "a"),
        node("path", "repo"),
        node("path", "./missing/../file.txt")
      ])
    ]);

    const { registry } = await buildRegistry(tree, { baseDir: root });

    assert.deepEqual(
      registry.projects[0].items.map((item) => (item.kind === "path" ? item.path : item.name)),
      [`${path.join(root, "repo")}${path.sep}`, path.join(root, "file.txt")]
    );
  });
});
