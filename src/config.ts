import fs from "fs/promises";
import path from "path";
import { XMLParser, XMLValidator } from "fast-xml-parser";
import yaml, { YAMLError } from "yaml";
import { ProjsyncError, ExitCodes } from "./errors";
import { isErrnoException } from "./filesystem";
import { resolvePath } from "./paths";
import { ROOT_TAG } from "./registry";
import type { ConfigNode } from "./types";

export const DEFAULT_CONFIG_FILE = "~/.projsync/config.xml";
export const CONFIG_ENV_VAR = "PROJSYNC_CONFIG";

export function getConfigPath(env: NodeJS.ProcessEnv, override?: string): string {
  const envPath = env[CONFIG_ENV_VAR];
  if (override && override.length > 0) {
    return resolvePath(override, env);
  }
  if (envPath && envPath.length > 0) {
    return resolvePath(envPath, env);
  }
  return resolvePath(DEFAULT_CONFIG_FILE, env);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function invalidFormat(configPath: string, detail?: string): ProjsyncError {
  const suffix = detail ? `: ${detail}` : "";
  return new ProjsyncError(`Invalid config format in ${configPath}${suffix}`, ExitCodes.Validation);
}

function scalarToString(value: unknown): string | null {
  if (typeof value === "string") {
    return value;
  }
  if (typeof value === "number" || typeof value === "boolean") {
    return String(value);
  }
  return null;
}

function element(
  tag: string,
  text: string | null,
  attributes: Record<string, string> = {},
  children: ConfigNode[] = []
): ConfigNode {
  return { tag, attributes, text, children };
}

// fast-xml-parser in preserveOrder mode yields one object per node: the tag
// name maps to the child list, ":@" holds attributes, "#text" holds text.
function xmlEntryToNode(entry: unknown, configPath: string): ConfigNode | string {
  if (!isRecord(entry)) {
    throw invalidFormat(configPath);
  }
  if ("#text" in entry) {
    return scalarToString(entry["#text"]) ?? "";
  }
  const tag = Object.keys(entry).find((key) => key !== ":@");
  if (tag?.startsWith("?")) {
    return "";
  }
  const children = tag === undefined ? undefined : entry[tag];
  if (tag === undefined || !Array.isArray(children)) {
    throw invalidFormat(configPath);
  }

  const attributes: Record<string, string> = {};
  const rawAttributes = entry[":@"];
  if (isRecord(rawAttributes)) {
    for (const [key, value] of Object.entries(rawAttributes)) {
      const text = scalarToString(value);
      if (text !== null) {
        attributes[key] = text;
      }
    }
  }

  const node = element(tag, null, attributes);
  for (const child of children) {
    const converted = xmlEntryToNode(child, configPath);
    if (typeof converted === "string") {
      if (converted.length > 0) {
        node.text = (node.text ?? "") + converted;
      }
    } else {
      node.children.push(converted);
    }
  }
  return node;
}

export function parseXmlConfig(raw: string, configPath: string): ConfigNode {
  const validation = XMLValidator.validate(raw);
  if (validation !== true) {
    const { line, col, msg } = validation.err;
    throw new ProjsyncError(
      `Invalid XML in ${configPath} (line ${line}, col ${col}): ${msg}`,
      ExitCodes.Validation
    );
  }
  const parser = new XMLParser({
    preserveOrder: true,
    ignoreAttributes: false,
    attributeNamePrefix: "",
    ignoreDeclaration: true,
    parseTagValue: false,
    parseAttributeValue: false,
    trimValues: true
  });
  const parsed: unknown = parser.parse(raw);
  if (!Array.isArray(parsed)) {
    throw invalidFormat(configPath);
  }
  const roots = parsed
    .map((entry) => xmlEntryToNode(entry, configPath))
    .filter((entry): entry is ConfigNode => typeof entry !== "string");
  if (roots.length !== 1) {
    throw invalidFormat(configPath, "expected a single root element");
  }
  return roots[0];
}

function yamlItemToNode(item: unknown, configPath: string): ConfigNode {
  if (!isRecord(item)) {
    throw invalidFormat(configPath, "project items must be mappings");
  }
  if ("path" in item) {
    const attributes: Record<string, string> = {};
    for (const key of ["tool", "origin"]) {
      const value = scalarToString(item[key]);
      if (value !== null) {
        attributes[key] = value;
      }
    }
    return element("path", scalarToString(item.path), attributes);
  }
  if ("reference" in item) {
    return element("reference", scalarToString(item.reference));
  }
  const [tag] = Object.keys(item);
  if (tag === undefined) {
    throw invalidFormat(configPath, "empty project item");
  }
  return element(tag, scalarToString(item[tag]));
}

function yamlProjectToNode(project: unknown, configPath: string): ConfigNode {
  if (!isRecord(project)) {
    throw invalidFormat(configPath, "projects must be mappings");
  }
  const attributes: Record<string, string> = {};
  const auto = scalarToString(project.auto);
  if (auto !== null) {
    attributes.auto = auto;
  }
  const node = element("project", null, attributes);
  const name = scalarToString(project.name);
  if (name !== null) {
    node.children.push(element("name", name));
  }
  const items = project.items ?? [];
  if (!Array.isArray(items)) {
    throw invalidFormat(configPath, "items must be a list");
  }
  node.children.push(...items.map((item) => yamlItemToNode(item, configPath)));
  return node;
}

function formatYamlError(error: unknown, configPath: string): ProjsyncError {
  if (error instanceof YAMLError) {
    const linePos = error.linePos?.[0];
    const location = linePos ? ` (line ${linePos.line}, col ${linePos.col})` : "";
    return new ProjsyncError(
      `Invalid YAML in ${configPath}${location}: ${error.message}`,
      ExitCodes.Validation
    );
  }
  return new ProjsyncError(`Invalid YAML in ${configPath}`, ExitCodes.Validation);
}

export function parseYamlConfig(raw: string, configPath: string): ConfigNode {
  let parsed: unknown;
  try {
    parsed = yaml.parse(raw, { prettyErrors: true });
  } catch (error) {
    throw formatYamlError(error, configPath);
  }
  if (!isRecord(parsed) || !Array.isArray(parsed.projects)) {
    throw invalidFormat(configPath);
  }
  return element(
    ROOT_TAG,
    null,
    {},
    parsed.projects.map((project) => yamlProjectToNode(project, configPath))
  );
}

/** Reads a configuration file into the tree the registry is built from. */
export async function readConfig(configPath: string): Promise<ConfigNode> {
  let raw: string;
  try {
    raw = await fs.readFile(configPath, "utf8");
  } catch (error) {
    if (isErrnoException(error) && error.code === "ENOENT") {
      throw new ProjsyncError(`Missing config: ${configPath}`, ExitCodes.Validation);
    }
    if (isErrnoException(error)) {
      throw new ProjsyncError(
        `Unable to read config ${configPath}: ${error.message}`,
        ExitCodes.Filesystem
      );
    }
    throw error;
  }

  const extension = path.extname(configPath).toLowerCase();
  switch (extension) {
    case ".xml":
      return parseXmlConfig(raw, configPath);
    case ".yml":
    case ".yaml":
      return parseYamlConfig(raw, configPath);
    default:
      throw invalidFormat(configPath, `unsupported extension '${extension}'`);
  }
}
