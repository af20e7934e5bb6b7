/**
 * Library exports for programmatic usage
 */
export { buildCatalog, buildTool, makeDescription, type BuildCatalogOptions } from './catalog-builder.js';
export { writeCatalog } from './catalog-writer.js';
export { loadConfig, type AppConfig } from './config.js';
export {
  CatalogError,
  ConfigurationError,
  SpecLoadError,
  UnresolvedReferenceError,
  ValidationError,
  getErrorDetails,
  isCatalogError,
} from './errors.js';
export { ConsoleLogger, JsonLogger, LogLevel, createLogger, type Logger } from './logger.js';
export { pathToModule } from './modules.js';
export { buildToolName, deduplicateToolNames, pluralize, singularize } from './naming.js';
export { parseParameters } from './parameter-extractor.js';
export { getResponseType } from './response-classifier.js';
export { getEnumValues, resolveSchemaType } from './schema-types.js';
export { loadSpec, resolveRef } from './spec-loader.js';
export { ToolGenerator, type ToolSelection } from './tool-generator.js';
export type { Catalog, ParamType, ResponseType, ToolDefinition, ToolParameter } from './types/catalog.js';
export type { HttpMethod, OperationNode, SchemaNode, SpecDocument } from './types/openapi.js';
