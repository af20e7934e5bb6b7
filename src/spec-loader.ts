/**
 * OpenAPI document loading and `$ref` resolution
 *
 * The document is read once and treated as immutable from then on. Pointer
 * resolution is strict: a dangling reference throws.
 */

import fs from 'fs/promises';
import { parse as parseYaml } from 'yaml';
import { SpecLoadError, UnresolvedReferenceError } from './errors.js';
import type { OperationNode, ParameterNode, PathItemNode, SchemaNode, SpecDocument } from './types/openapi.js';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isSchemaNode(value: unknown): value is SchemaNode {
  return isRecord(value);
}

function isParameterNode(value: unknown): value is ParameterNode {
  return isRecord(value);
}

function isSpecDocument(value: unknown): value is SpecDocument {
  return isRecord(value) && (value.paths === undefined || isRecord(value.paths));
}

/**
 * Load a spec from disk. `.yaml`/`.yml` go through the YAML parser,
 * everything else is JSON.
 */
export async function loadSpec(specPath: string): Promise<SpecDocument> {
  let content: string;
  try {
    content = await fs.readFile(specPath, 'utf-8');
  } catch (error) {
    throw new SpecLoadError(`Cannot read OpenAPI spec at ${specPath}`, specPath, error);
  }

  let parsed: unknown;
  try {
    parsed = specPath.endsWith('.yaml') || specPath.endsWith('.yml')
      ? parseYaml(content)
      : JSON.parse(content);
  } catch (error) {
    throw new SpecLoadError(`Cannot parse OpenAPI spec at ${specPath}`, specPath, error);
  }

  if (!isSpecDocument(parsed)) {
    throw new SpecLoadError('OpenAPI spec must be a mapping with a paths mapping', specPath);
  }
  return parsed;
}

export function getPaths(spec: SpecDocument): Record<string, PathItemNode> {
  return spec.paths ?? {};
}

/**
 * Decode one JSON pointer segment (RFC 6901)
 */
function decodeSegment(segment: string): string {
  return segment.replace(/~1/g, '/').replace(/~0/g, '~');
}

/**
 * Walk a local pointer such as `#/components/schemas/Search`
 */
export function resolveRef(spec: SpecDocument, ref: string): unknown {
  if (!ref.startsWith('#/')) {
    throw new UnresolvedReferenceError(ref);
  }

  let node: unknown = spec;
  for (const raw of ref.slice(2).split('/')) {
    const segment = decodeSegment(raw);
    if (!isRecord(node) || !Object.hasOwn(node, segment)) {
      throw new UnresolvedReferenceError(ref, segment);
    }
    node = node[segment];
  }
  return node;
}

export function resolveSchemaRef(spec: SpecDocument, ref: string): SchemaNode {
  const node = resolveRef(spec, ref);
  if (!isSchemaNode(node)) {
    throw new UnresolvedReferenceError(ref);
  }
  return node;
}

/**
 * Follow `$ref` until a concrete schema is reached. One hop is the common
 * case; aliases such as `A: { $ref: B }` take more.
 */
export function derefSchema(spec: SpecDocument, schema: SchemaNode, seen = new Set<string>()): SchemaNode {
  let current = schema;
  while (current.$ref !== undefined) {
    if (seen.has(current.$ref)) {
      return {};
    }
    seen.add(current.$ref);
    current = resolveSchemaRef(spec, current.$ref);
  }
  return current;
}

export function derefParameter(spec: SpecDocument, param: ParameterNode): ParameterNode {
  if (param.$ref === undefined) return param;

  const node = resolveRef(spec, param.$ref);
  if (!isParameterNode(node)) {
    throw new UnresolvedReferenceError(param.$ref);
  }
  return node;
}

/**
 * Operations present on a path item, in the given verb order
 */
export function operationsOf<M extends string>(
  pathItem: Partial<Record<M, OperationNode>>,
  methods: readonly M[]
): Array<[M, OperationNode]> {
  const found: Array<[M, OperationNode]> = [];
  for (const method of methods) {
    const operation = pathItem[method];
    if (operation) {
      found.push([method, operation]);
    }
  }
  return found;
}
