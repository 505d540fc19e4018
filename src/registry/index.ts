// Public API — registry module
export { createFileRegistry } from "./create-file-registry";
export { listMatchingFiles, extensionOf } from "./list-matching-files";

// Types
export type {
  WatchedFile,
  FileRegistry,
  FileRegistryOptions,
  RefreshResult,
} from "./types";
