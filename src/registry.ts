import { ProjsyncError, ExitCodes } from "./errors";
import { canonicalizePath } from "./paths";
import type { ConfigNode, Project, ProjectItem, Registry } from "./types";

export const ROOT_TAG = "projsync";

export interface RegistryOptions {
  env?: NodeJS.ProcessEnv;
  /** Directory that relative paths are resolved against. */
  baseDir?: string;
}

export interface RegistryBuild {
  registry: Registry;
  warnings: string[];
}

function tagIs(node: ConfigNode, tag: string): boolean {
  return node.tag.toLowerCase() === tag;
}

export function parseAutoFlag(value: string | undefined): boolean {
  if (value === undefined) {
    return true;
  }
  const normalized = value.trim().toLowerCase();
  return normalized !== "false" && normalized !== "0";
}

export function projectLabel(project: Project): string {
  return project.name ?? `project #${project.index}`;
}

function requireText(node: ConfigNode, position: number): string {
  const text = node.text?.trim() ?? "";
  if (text.length === 0) {
    throw new ProjsyncError(
      `Empty <${node.tag}> in project #${position}`,
      ExitCodes.Validation
    );
  }
  return text;
}

async function buildProject(
  node: ConfigNode,
  position: number,
  options: Required<RegistryOptions>,
  warnings: string[]
): Promise<Project> {
  let name: string | null = null;
  const items: ProjectItem[] = [];

  for (const child of node.children) {
    if (tagIs(child, "name")) {
      const value = requireText(child, position);
      if (name !== null) {
        warnings.push(
          `Duplicate name definition for project #${position}: '${name}' and '${value}'`
        );
        continue;
      }
      name = value;
    } else if (tagIs(child, "path")) {
      items.push({
        kind: "path",
        path: await canonicalizePath(requireText(child, position), options.env, options.baseDir),
        tool: child.attributes.tool ?? null,
        origin: child.attributes.origin ?? null
      });
    } else if (tagIs(child, "reference")) {
      items.push({ kind: "reference", name: requireText(child, position) });
    } else {
      warnings.push(`Ignored project #${position} child with tag '${child.tag}'`);
    }
  }

  if (name === null) {
    warnings.push(`No name set for project #${position}`);
  }

  return { index: position, name, auto: parseAutoFlag(node.attributes.auto), items };
}

/**
 * Builds the project registry from a parsed configuration tree. Children of
 * the root that are not projects are skipped with a warning; duplicate
 * project names are rejected.
 */
export async function buildRegistry(
  root: ConfigNode,
  options: RegistryOptions = {}
): Promise<RegistryBuild> {
  if (!tagIs(root, ROOT_TAG)) {
    throw new ProjsyncError(
      `Configuration root is <${root.tag}>, expected <${ROOT_TAG}>`,
      ExitCodes.Validation
    );
  }
  const resolved: Required<RegistryOptions> = {
    env: options.env ?? process.env,
    baseDir: options.baseDir ?? process.cwd()
  };

  const warnings: string[] = [];
  const projects: Project[] = [];
  for (const [offset, child] of root.children.entries()) {
    const position = offset + 1;
    if (!tagIs(child, "project")) {
      warnings.push(`Ignored ${ROOT_TAG} child ${position}, tag='${child.tag}'`);
      continue;
    }
    projects.push(await buildProject(child, projects.length + 1, resolved, warnings));
  }

  const names = new Map<string, number>();
  projects.forEach((project, index) => {
    if (project.name === null) {
      return;
    }
    const existing = names.get(project.name);
    if (existing !== undefined) {
      throw new ProjsyncError(
        `Duplicate project name '${project.name}' (projects #${existing + 1} and #${index + 1})`,
        ExitCodes.Validation
      );
    }
    names.set(project.name, index);
  });

  const autoProjects = projects.filter((project) => project.auto);
  return {
    registry: {
      projects,
      names,
      auto: autoProjects.flatMap((project) => (project.name === null ? [] : [project.name])),
      autoIndices: autoProjects.map((project) => project.index - 1)
    },
    warnings
  };
}
