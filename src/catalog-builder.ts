/**
 * Catalog assembly
 *
 * Walks every operation in sorted-path, fixed-verb order, builds one tool
 * record per operation, then makes names unique and indexes tools by module.
 * Pure: the same document always yields the same catalog.
 */

import {
  ARRAY_BODY_PARAM,
  METHOD_ORDER,
  MUTATION_METHODS,
  REPORT_ISSUE_NUDGE,
  TOOL_PREFIX,
} from './constants.js';
import { silentLogger, type Logger } from './logger.js';
import { pathToModule } from './modules.js';
import { buildToolName, deduplicateToolNames, isIdentifierScoped } from './naming.js';
import {
  BASE64_PARAMS,
  NAME_OVERRIDES,
  PARAM_DESCRIPTION_OVERRIDES,
  RESPONSE_ENUM_DOCS,
  RESPONSE_TYPE_OVERRIDES,
  SKIP_PATHS,
  WORKFLOW_HINTS,
  operationKey,
} from './overrides.js';
import { parseParameters } from './parameter-extractor.js';
import { getResponseType } from './response-classifier.js';
import { itemTypeOf } from './schema-types.js';
import { getPaths, operationsOf } from './spec-loader.js';
import type { HttpMethod, OperationNode, SpecDocument } from './types/openapi.js';
import type { Catalog, ResponseType, ToolDefinition, ToolParameter } from './types/catalog.js';

export interface BuildCatalogOptions {
  logger?: Logger;
  /** Added to the built-in skip list */
  skipPaths?: Iterable<string>;
}

function capitalize(word: string): string {
  return word.charAt(0).toUpperCase() + word.slice(1);
}

/**
 * Summary, else first sentence of the description, else built from the name
 */
function baseDescription(method: HttpMethod, path: string, operation: OperationNode, toolName: string): string {
  const summary = operation.summary?.trim();
  if (summary) return summary;

  const firstSentence = operation.description?.split('.')[0].trim();
  if (firstSentence) return firstSentence;

  const [verb = '', ...resourceWords] = toolName.slice(TOOL_PREFIX.length).split('_');
  const resource = resourceWords.join(' ');
  if (isIdentifierScoped(path)) {
    if (method === 'get') return `Get ${resource} by ID`;
    if (method === 'delete') return `Delete ${resource} by ID`;
    if (method === 'put' || method === 'patch') return `Update ${resource} by ID`;
  }
  return `${capitalize(verb)} ${resource}`.trim();
}

export function makeDescription(
  method: HttpMethod,
  path: string,
  operation: OperationNode,
  responseType: ResponseType,
  toolName: string
): string {
  const base = baseDescription(method, path, operation, toolName)
    .replace(/\.{2,}/g, '.')
    .replace(/[.\s]+$/, '');

  const sentences = [`${base}.`];
  if (responseType === 'array') {
    sentences.push('Returns a list.');
  } else if (responseType === 'paging') {
    sentences.push('Returns paginated results.');
  }
  sentences.push(REPORT_ISSUE_NUDGE);

  const hint = WORKFLOW_HINTS.get(toolName);
  if (hint) sentences.push(hint);

  const enumDoc = RESPONSE_ENUM_DOCS.get(toolName);
  if (enumDoc) sentences.push(enumDoc);

  return sentences.join(' ');
}

function applyDescriptionOverrides(toolName: string, params: ToolParameter[]): ToolParameter[] {
  const overrides = PARAM_DESCRIPTION_OVERRIDES.get(toolName);
  if (!overrides) return params;

  return params.map(param => {
    const description = overrides.get(param.name);
    return description === undefined ? param : { ...param, description };
  });
}

function isArrayBody(params: readonly ToolParameter[]): boolean {
  const body = params.filter(p => p.location === 'body');
  return body.length === 1
    && body[0].name === ARRAY_BODY_PARAM
    && itemTypeOf(body[0].type) !== undefined;
}

export function buildTool(
  spec: SpecDocument,
  method: HttpMethod,
  path: string,
  operation: OperationNode
): ToolDefinition {
  const key = operationKey(method, path);
  const name = NAME_OVERRIDES.get(key) ?? buildToolName(method, path);
  const params = applyDescriptionOverrides(name, parseParameters(spec, operation, method));

  const classified = getResponseType(spec, operation);
  const responseType = classified === 'none'
    ? RESPONSE_TYPE_OVERRIDES.get(key) ?? 'none'
    : classified;

  return {
    name,
    method,
    path,
    params,
    module: pathToModule(path),
    isMutation: MUTATION_METHODS.has(method),
    isList: responseType === 'array' || responseType === 'paging',
    isArrayBody: isArrayBody(params),
    hasBase64Params: params.some(p => BASE64_PARAMS.has(p.name)),
    responseType,
    description: makeDescription(method, path, operation, responseType, name),
    tags: operation.tags ?? [],
  };
}

function freezeTool(tool: ToolDefinition): ToolDefinition {
  return Object.freeze({
    ...tool,
    params: Object.freeze(tool.params.map(param => Object.freeze({
      ...param,
      ...(param.enum ? { enum: Object.freeze([...param.enum]) } : {}),
    }))),
    tags: Object.freeze([...tool.tags]),
  });
}

export function buildCatalog(spec: SpecDocument, options: BuildCatalogOptions = {}): Catalog {
  const logger = options.logger ?? silentLogger;
  const skipPaths = new Set([...SKIP_PATHS, ...(options.skipPaths ?? [])]);
  const paths = getPaths(spec);

  const drafts: ToolDefinition[] = [];
  for (const path of Object.keys(paths).sort()) {
    if (skipPaths.has(path)) {
      logger.debug('Skipping path', { path });
      continue;
    }

    for (const [method, operation] of operationsOf(paths[path], METHOD_ORDER)) {
      const tool = buildTool(spec, method, path, operation);
      logger.debug('Built tool', {
        name: tool.name,
        method,
        path,
        params: tool.params.length,
        responseType: tool.responseType,
      });
      drafts.push(tool);
    }
  }

  const tools = Object.freeze(deduplicateToolNames(drafts).map(freezeTool));

  const modules: Record<string, string[]> = {};
  for (const tool of tools) {
    (modules[tool.module] ??= []).push(tool.name);
  }
  for (const names of Object.values(modules)) {
    Object.freeze(names);
  }

  const catalog: Catalog = {
    tools,
    modules: Object.freeze(modules),
    toolCount: tools.length,
    specVersion: spec.info?.version ?? 'unknown',
  };

  logger.info('Built tool catalog', {
    toolCount: catalog.toolCount,
    modules: Object.keys(modules).length,
    specVersion: catalog.specVersion,
  });

  return catalog;
}
