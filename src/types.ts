export type SyncMode = "update" | "push" | "resolve";

export const SYNC_MODES: readonly SyncMode[] = ["update", "push", "resolve"];

/** Project name, or a 1-based project index. */
export type Selector = string | number;

export interface ConfigNode {
  tag: string;
  attributes: Record<string, string>;
  text: string | null;
  children: ConfigNode[];
}

export interface PathItem {
  kind: "path";
  path: string;
  tool: string | null;
  origin: string | null;
}

export interface ReferenceItem {
  kind: "reference";
  name: string;
}

export type ProjectItem = PathItem | ReferenceItem;

export interface Project {
  index: number;
  name: string | null;
  auto: boolean;
  items: ProjectItem[];
}

export interface Registry {
  projects: Project[];
  names: Map<string, number>;
  auto: string[];
  autoIndices: number[];
}

export interface UpdateOptions {
  origin: string | null;
  merge: boolean;
  verbose: boolean;
}

export interface PushOptions {
  destination: string | null;
  verbose: boolean;
}

export interface ResolveOptions {
  verbose: boolean;
}

/**
 * Strategy that synchronizes a single path. Every operation resolves to
 * `true` when the path failed to synchronize.
 */
export interface Synchronizer {
  update(path: string, options: UpdateOptions): Promise<boolean>;
  push(path: string, options: PushOptions): Promise<boolean>;
  resolve(path: string, options: ResolveOptions): Promise<boolean>;
}

export interface SynchronizerTable {
  tools: Record<string, Synchronizer>;
  fallback: Synchronizer;
}

export type PathStatus = "ok" | "failed" | "unsupported";

export interface SyncObserver {
  onProject?(label: string): void;
  onPathStart?(path: string): void;
  onPathDone?(path: string, status: PathStatus, detail?: string): void;
}

export interface SyncReport {
  mode: SyncMode;
  visitedProjects: string[];
  errorProjects: string[];
  errorPaths: string[];
  unsupportedPaths: string[];
  unknownProjects: string[];
  failed: boolean;
}
