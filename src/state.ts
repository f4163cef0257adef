import type { PathStatus } from "./types";

/** Bookkeeping for one traversal; never shared between runs. */
export interface TraversalState {
  visitedPaths: Set<string>;
  visitedProjects: boolean[];
  errorPaths: Set<string>;
  errorProjects: boolean[];
  unknownProjects: Set<string>;
  unsupportedPaths: Set<string>;
  visitOrder: number[];
}

export function createTraversalState(projectCount: number): TraversalState {
  return {
    visitedPaths: new Set<string>(),
    visitedProjects: new Array<boolean>(projectCount).fill(false),
    errorPaths: new Set<string>(),
    errorProjects: new Array<boolean>(projectCount).fill(false),
    unknownProjects: new Set<string>(),
    unsupportedPaths: new Set<string>(),
    visitOrder: []
  };
}

export function recordPath(state: TraversalState, path: string, status: PathStatus): boolean {
  state.visitedPaths.add(path);
  if (status === "ok") {
    return false;
  }
  state.errorPaths.add(path);
  if (status === "unsupported") {
    state.unsupportedPaths.add(path);
  }
  return true;
}
