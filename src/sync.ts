import { ProjsyncError, ExitCodes, UnsupportedOperationError } from "./errors";
import { projectLabel } from "./registry";
import { createTraversalState, recordPath } from "./state";
import type { TraversalState } from "./state";
import { SYNC_MODES } from "./types";
import type {
  PathItem,
  PathStatus,
  ReferenceItem,
  Registry,
  Selector,
  SyncMode,
  SyncObserver,
  SyncReport,
  Synchronizer,
  SynchronizerTable
} from "./types";

export interface SyncOptions {
  /** 0 quiet, 1 status lines, 2 status lines and tool output. */
  verbose?: number;
  /** Integrate remote changes with a merge instead of a rebase. */
  merge?: boolean;
  observer?: SyncObserver;
}

interface TraversalContext {
  registry: Registry;
  synchronizers: SynchronizerTable;
  mode: SyncMode;
  options: SyncOptions;
  state: TraversalState;
}

export function assertSyncMode(value: string): SyncMode {
  const mode = SYNC_MODES.find((candidate) => candidate === value);
  if (!mode) {
    throw new ProjsyncError(`Unknown mode: '${value}'`, ExitCodes.Usage);
  }
  return mode;
}

function formatError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

/**
 * Maps selectors to 0-based project indices. Names win over indices; a
 * selector matching neither is recorded as unknown.
 */
export function resolveSelectors(
  registry: Registry,
  selectors: Selector[],
  unknown: Set<string>
): number[] {
  const indices: number[] = [];
  for (const selector of selectors) {
    if (typeof selector === "string") {
      const named = registry.names.get(selector);
      if (named !== undefined) {
        indices.push(named);
        continue;
      }
    }
    const position = typeof selector === "number" ? selector : Number(selector);
    if (
      (typeof selector === "number" || /^\d+$/.test(selector)) &&
      Number.isInteger(position) &&
      position >= 1 &&
      position <= registry.projects.length
    ) {
      indices.push(position - 1);
      continue;
    }
    unknown.add(String(selector));
  }
  return indices;
}

async function dispatch(
  synchronizer: Synchronizer,
  mode: SyncMode,
  item: PathItem,
  options: SyncOptions
): Promise<boolean> {
  const verbose = (options.verbose ?? 1) > 1;
  switch (mode) {
    case "update":
      return await synchronizer.update(item.path, {
        origin: item.origin,
        merge: options.merge ?? false,
        verbose
      });
    case "push":
      return await synchronizer.push(item.path, { destination: item.origin, verbose });
    case "resolve":
      return await synchronizer.resolve(item.path, { verbose });
  }
}

async function runSynchronizer(context: TraversalContext, item: PathItem): Promise<PathStatus> {
  const { synchronizers, mode, options } = context;
  const synchronizer =
    item.tool === null ? synchronizers.fallback : synchronizers.tools[item.tool];
  if (!synchronizer) {
    options.observer?.onPathDone?.(item.path, "failed", `no synchronizer for tool '${item.tool}'`);
    return "failed";
  }

  let status: PathStatus;
  try {
    const failed = await dispatch(synchronizer, mode, item, options);
    status = failed ? "failed" : "ok";
  } catch (error) {
    status = error instanceof UnsupportedOperationError ? "unsupported" : "failed";
    options.observer?.onPathDone?.(item.path, status, formatError(error));
    return status;
  }
  options.observer?.onPathDone?.(item.path, status);
  return status;
}

async function visitPath(context: TraversalContext, item: PathItem): Promise<boolean> {
  const { state } = context;
  if (state.visitedPaths.has(item.path)) {
    return state.errorPaths.has(item.path);
  }
  // Marked before the backend runs so a path is never dispatched twice.
  state.visitedPaths.add(item.path);
  context.options.observer?.onPathStart?.(item.path);
  const status = await runSynchronizer(context, item);
  return recordPath(state, item.path, status);
}

async function visitReference(context: TraversalContext, item: ReferenceItem): Promise<boolean> {
  const target = context.registry.names.get(item.name);
  if (target === undefined) {
    context.state.unknownProjects.add(item.name);
    return true;
  }
  return await visitProject(context, target);
}

async function visitProject(context: TraversalContext, index: number): Promise<boolean> {
  const { registry, state } = context;
  if (state.visitedProjects[index]) {
    return state.errorProjects[index];
  }
  state.visitedProjects[index] = true;
  state.visitOrder.push(index);

  const project = registry.projects[index];
  context.options.observer?.onProject?.(projectLabel(project));

  let anyError = false;
  for (const item of project.items) {
    const error =
      item.kind === "path"
        ? await visitPath(context, item)
        : await visitReference(context, item);
    anyError = anyError || error;
  }

  state.errorProjects[index] = anyError;
  return anyError;
}

function buildReport(context: TraversalContext, requested: number[]): SyncReport {
  const { registry, state, mode } = context;
  const errorProjects: string[] = [];
  const reported = new Set<number>();
  for (const index of requested) {
    if (state.errorProjects[index] && !reported.has(index)) {
      reported.add(index);
      errorProjects.push(projectLabel(registry.projects[index]));
    }
  }
  const unknownProjects = Array.from(state.unknownProjects).sort();
  return {
    mode,
    visitedProjects: state.visitOrder.map((index) => projectLabel(registry.projects[index])),
    errorProjects,
    errorPaths: Array.from(state.errorPaths).sort(),
    unsupportedPaths: Array.from(state.unsupportedPaths).sort(),
    unknownProjects,
    failed: errorProjects.length > 0 || unknownProjects.length > 0
  };
}

/**
 * Runs `mode` over the selected projects, following references. Each project
 * and each distinct path is processed at most once per call; per-path and
 * per-project failures are collected into the report rather than thrown.
 */
export async function applyMode(
  registry: Registry,
  synchronizers: SynchronizerTable,
  mode: SyncMode,
  selectors: Selector[] | null = null,
  options: SyncOptions = {}
): Promise<SyncReport> {
  const context: TraversalContext = {
    registry,
    synchronizers,
    mode: assertSyncMode(mode),
    options,
    state: createTraversalState(registry.projects.length)
  };

  const requested =
    selectors === null
      ? registry.autoIndices
      : resolveSelectors(registry, selectors, context.state.unknownProjects);

  for (const index of requested) {
    await visitProject(context, index);
  }
  return buildReport(context, requested);
}

export async function synchronizeUpdate(
  registry: Registry,
  synchronizers: SynchronizerTable,
  selectors: Selector[] | null = null,
  options: SyncOptions = {}
): Promise<SyncReport> {
  return await applyMode(registry, synchronizers, "update", selectors, options);
}

export async function synchronizePush(
  registry: Registry,
  synchronizers: SynchronizerTable,
  selectors: Selector[] | null = null,
  options: SyncOptions = {}
): Promise<SyncReport> {
  return await applyMode(registry, synchronizers, "push", selectors, options);
}

export async function synchronizeResolve(
  registry: Registry,
  synchronizers: SynchronizerTable,
  selectors: Selector[] | null = null,
  options: SyncOptions = {}
): Promise<SyncReport> {
  return await applyMode(registry, synchronizers, "resolve", selectors, options);
}
