import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { UnsupportedOperationError } from "../src/errors";
import type {
  ConfigNode,
  Project,
  ProjectItem,
  PushOptions,
  Registry,
  ResolveOptions,
  Synchronizer,
  UpdateOptions
} from "../src/types";

export async function withTempDir<T>(fn: (root: string) => Promise<T>): Promise<T> {
  const root = await fs.mkdtemp(path.join(os.tmpdir(), "projsync-"));
  try {
    return await fn(root);
  } finally {
    await fs.rm(root, { recursive: true, force: true });
  }
}

export function node(
  tag: string,
  text: string | null = null,
  attributes: Record<string, string> = {},
  children: ConfigNode[] = []
): ConfigNode {
  return { tag, attributes, text, children };
}

export function pathItem(
  itemPath: string,
  tool: string | null = null,
  origin: string | null = null
): ProjectItem {
  return { kind: "path", path: itemPath, tool, origin };
}

export function reference(name: string): ProjectItem {
  return { kind: "reference", name };
}

export interface ProjectDefinition {
  name: string | null;
  auto?: boolean;
  items: ProjectItem[];
}

export function makeRegistry(definitions: ProjectDefinition[]): Registry {
  const projects: Project[] = definitions.map((definition, offset) => ({
    index: offset + 1,
    name: definition.name,
    auto: definition.auto ?? true,
    items: definition.items
  }));
  const names = new Map<string, number>();
  projects.forEach((project, index) => {
    if (project.name !== null) {
      names.set(project.name, index);
    }
  });
  const autoProjects = projects.filter((project) => project.auto);
  return {
    projects,
    names,
    auto: autoProjects.flatMap((project) => (project.name === null ? [] : [project.name])),
    autoIndices: autoProjects.map((project) => project.index - 1)
  };
}

export interface RecordedCall {
  operation: "update" | "push" | "resolve";
  path: string;
  origin: string | null;
  merge: boolean | null;
  verbose: boolean;
}

export class RecordingSynchronizer implements Synchronizer {
  public readonly calls: RecordedCall[] = [];
  private readonly failing: Set<string>;

  constructor(failing: string[] = []) {
    this.failing = new Set(failing);
  }

  async update(itemPath: string, options: UpdateOptions): Promise<boolean> {
    this.calls.push({
      operation: "update",
      path: itemPath,
      origin: options.origin,
      merge: options.merge,
      verbose: options.verbose
    });
    return this.failing.has(itemPath);
  }

  async push(itemPath: string, options: PushOptions): Promise<boolean> {
    this.calls.push({
      operation: "push",
      path: itemPath,
      origin: options.destination,
      merge: null,
      verbose: options.verbose
    });
    return this.failing.has(itemPath);
  }

  async resolve(itemPath: string, options: ResolveOptions): Promise<boolean> {
    this.calls.push({
      operation: "resolve",
      path: itemPath,
      origin: null,
      merge: null,
      verbose: options.verbose
    });
    throw new UnsupportedOperationError("resolve", "recording");
  }

  paths(): string[] {
    return this.calls.map((call) => call.path);
  }
}
