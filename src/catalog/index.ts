// src/catalog/index.ts

export { RecurrenceCatalog, USER_MODULE, type CatalogEntry } from "./catalog";
export {
  definitionFromObject,
  loadDefinitionFile,
  loadDefinitionsDir,
  validateDefinition,
  type RecurrenceDefinition,
  type RuleDefinition,
  type BaseDefinition,
  type LoadedDefinition,
} from "./definitions";
export { createBuiltinCatalog, BUILTIN_MODULES } from "./builtin";
