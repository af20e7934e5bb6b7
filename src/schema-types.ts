/**
 * Schema node -> parameter type tag inference
 *
 * `oneOf`/`anyOf` collapse to the first branch with a determinate type.
 * Tools get one type per parameter, so union information is dropped.
 */

import { derefSchema, resolveSchemaRef } from './spec-loader.js';
import type { SchemaNode, SpecDocument } from './types/openapi.js';
import type { ParamType, ScalarType } from './types/catalog.js';

const SCALAR_TYPES: ReadonlySet<string> = new Set<ScalarType>([
  'string', 'integer', 'number', 'boolean', 'object', 'any',
]);

const PRIMITIVES: ReadonlyMap<string, ScalarType> = new Map([
  ['string', 'string'],
  ['integer', 'integer'],
  ['number', 'number'],
  ['boolean', 'boolean'],
]);

export function arrayOf(itemType: ParamType): ParamType {
  return `array<${itemType}>`;
}

export function isParamType(value: string): value is ParamType {
  if (SCALAR_TYPES.has(value)) return true;
  const inner = /^array<(.+)>$/.exec(value)?.[1];
  return inner !== undefined && isParamType(inner);
}

/**
 * Item type of an `array<...>` tag, undefined for anything else
 */
export function itemTypeOf(type: ParamType): ParamType | undefined {
  const inner = /^array<(.+)>$/.exec(type)?.[1];
  return inner !== undefined && isParamType(inner) ? inner : undefined;
}

function isEmptySchema(schema: SchemaNode | undefined): boolean {
  return !schema || Object.keys(schema).length === 0;
}

function isObjectLike(schema: SchemaNode): boolean {
  return schema.type === 'object' || schema.properties !== undefined;
}

export function resolveSchemaType(
  spec: SpecDocument,
  schema: SchemaNode | undefined,
  visiting: ReadonlySet<string> = new Set()
): ParamType {
  if (!schema || isEmptySchema(schema)) {
    return 'any';
  }

  if (schema.$ref !== undefined) {
    // A reference already on the stack would recurse forever
    if (visiting.has(schema.$ref)) return 'any';
    return resolveSchemaType(
      spec,
      resolveSchemaRef(spec, schema.$ref),
      new Set([...visiting, schema.$ref])
    );
  }

  if (schema.allOf) {
    for (const branch of schema.allOf) {
      const resolved = derefSchema(spec, branch);
      if (isObjectLike(resolved)) return 'object';
      if (resolved.enum) return 'string';
    }
    return 'object';
  }

  for (const union of [schema.oneOf, schema.anyOf]) {
    if (!union) continue;
    for (const branch of union) {
      const type = resolveSchemaType(spec, branch, visiting);
      if (type !== 'any') return type;
    }
    return 'any';
  }

  if (schema.enum) {
    return 'string';
  }

  const primitive = schema.type === undefined ? undefined : PRIMITIVES.get(schema.type);
  if (primitive) {
    return primitive;
  }

  if (schema.type === 'array') {
    return arrayOf(resolveSchemaType(spec, schema.items, visiting));
  }

  if (isObjectLike(schema)) {
    return 'object';
  }

  return 'any';
}

/**
 * Enum values reachable from a schema: directly, through `$ref`, or from the
 * first `allOf` branch that has any
 */
export function getEnumValues(
  spec: SpecDocument,
  schema: SchemaNode | undefined,
  visiting: ReadonlySet<string> = new Set()
): string[] | undefined {
  if (!schema) return undefined;

  if (schema.$ref !== undefined) {
    if (visiting.has(schema.$ref)) return undefined;
    return getEnumValues(
      spec,
      resolveSchemaRef(spec, schema.$ref),
      new Set([...visiting, schema.$ref])
    );
  }

  if (schema.enum && schema.enum.length > 0) {
    return schema.enum.map(value => String(value));
  }

  for (const branch of schema.allOf ?? []) {
    const values = getEnumValues(spec, branch, visiting);
    if (values) return values;
  }

  return undefined;
}
