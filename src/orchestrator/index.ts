// src/orchestrator/index.ts

export {
  buildCatalog,
  generateAll,
  collectDiagnostics,
  writeArtifacts,
  MANIFEST_FILE,
  type Artifact,
  type GenerateAllOptions,
  type WriteResult,
} from "./generate";
export { debounce, watchDefinitions, type Debounced, type Watcher, type WatchOptions } from "./watch";
