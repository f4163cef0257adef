export { readConfig, getConfigPath, parseXmlConfig, parseYamlConfig } from "./config";
export { ProjsyncError, UnsupportedOperationError, ExitCodes } from "./errors";
export { buildRegistry, projectLabel, parseAutoFlag } from "./registry";
export type { RegistryBuild, RegistryOptions } from "./registry";
export { canonicalizePath } from "./paths";
export {
  applyMode,
  synchronizeUpdate,
  synchronizePush,
  synchronizeResolve,
  resolveSelectors
} from "./sync";
export type { SyncOptions } from "./sync";
export { createStatusObserver, summarize, printSummary } from "./report";
export type { StatusLine, EmitLine } from "./report";
export * from "./synchronizers";
export * from "./types";
