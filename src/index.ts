export * from "./records/types.js";
export * from "./records/values.js";
export { InMemoryRecordSource } from "./records/memorySource.js";
export {
  CatalogDocumentSchema,
  DECLARED_KINDS,
  VALUE_KINDS,
  decodeCatalogDocument,
  defaultRecordName,
  loadCatalogDocument,
  type CatalogDocument,
  type CatalogDocumentInput,
} from "./records/document.js";
export * from "./errors.js";
export { StructuredLogger, type LogEntry, type LogLevel, type LoggerOptions, type LogStream } from "./logger.js";
export * from "./config/catalog.js";
export {
  FieldAccessor,
  defaultFieldAccessor,
  describeDeclaration,
  type FieldAccessorOptions,
  type FieldDescriptor,
  type QueryableField,
} from "./query/fieldAccessor.js";
export { compareValues, matchesText, valuesEqual, type Ordering, type TextMatchMode } from "./query/comparator.js";
export * from "./query/condition.js";
export * from "./query/schemas.js";
export * from "./query/service.js";
export * from "./graph/dependencyGraph.js";
export * from "./graph/builder.js";
export * from "./graph/analysis.js";
export { createFieldReferenceExtractor } from "./graph/references.js";
export * from "./catalog/categoryTree.js";
export * from "./catalog/snapshot.js";
export { CatalogWorkspace, type CatalogWorkspaceOptions } from "./workspace.js";
