import os from "os";
import path from "path";
import { isDirectory } from "./filesystem";

export function expandHome(inputPath: string): string {
  if (inputPath === "~") {
    return os.homedir();
  }
  if (inputPath.startsWith("~/")) {
    return path.join(os.homedir(), inputPath.slice(2));
  }
  return inputPath;
}

export function expandEnv(inputPath: string, env: NodeJS.ProcessEnv): string {
  const resolved = inputPath.replace(
    /\$\{([A-Z0-9_]+)(:-([^}]*))?\}/gi,
    (
      _match: string,
      varName: string,
      _fallbackGroup: string | undefined,
      fallback: string | undefined
    ): string => {
      const value = env[varName];
      if (value && value.length > 0) {
        return value;
      }
      if (fallback !== undefined) {
        return fallback;
      }
      return "";
    }
  );
  return resolved;
}

export function resolvePath(inputPath: string, env: NodeJS.ProcessEnv): string {
  const expanded = expandHome(expandEnv(inputPath, env));
  if (path.isAbsolute(expanded)) {
    return expanded;
  }
  return path.resolve(expanded);
}

export function resolveFromRoot(root: string, relativePath: string): string {
  if (path.isAbsolute(relativePath)) {
    return path.resolve(relativePath);
  }
  return path.resolve(path.join(root, relativePath));
}

/**
 * Canonical form of a configured path: expanded, normalized and, when it
 * names an existing directory, terminated by a separator. Two items with the
 * same canonical path are synchronized once per run.
 */
export async function canonicalizePath(
  inputPath: string,
  env: NodeJS.ProcessEnv,
  baseDir: string
): Promise<string> {
  const expanded = expandHome(expandEnv(inputPath.trim(), env));
  const normalized = resolveFromRoot(baseDir, expanded);
  if (!(await isDirectory(normalized))) {
    return normalized;
  }
  return normalized.endsWith(path.sep) ? normalized : `${normalized}${path.sep}`;
}
