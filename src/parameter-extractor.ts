/**
 * Operation -> ordered tool parameter list
 *
 * Declared path/query parameters come first in declaration order, followed by the
 * request body: either one synthetic `body` parameter for array bodies or
 * the flattened properties of an object body.
 */

import {
  ARRAY_BODY_DESCRIPTION,
  ARRAY_BODY_PARAM,
  JSON_MEDIA_TYPE,
  MAX_SAFE_DEFAULT,
  OBJECT_ARRAY_GUIDANCE,
  UPDATE_METHODS,
} from './constants.js';
import { arrayOf, getEnumValues, resolveSchemaType } from './schema-types.js';
import { derefParameter, derefSchema } from './spec-loader.js';
import type { HttpMethod, OperationNode, ParameterNode, SchemaNode, SpecDocument } from './types/openapi.js';
import type { ParameterLocation, ToolParameter } from './types/catalog.js';

const DECLARED_LOCATIONS = ['path', 'query', 'header', 'cookie'] as const satisfies readonly ParameterLocation[];

/**
 * Remove HTML tags and collapse whitespace
 */
export function stripHtml(text: string): string {
  return text
    .replace(/<[^>]+>/g, '')
    .replace(/\s+/g, ' ')
    .trim();
}

/**
 * Drop integer defaults a JSON number cannot carry exactly
 */
export function sanitizeDefault(value: unknown): unknown {
  if (typeof value === 'number' && Number.isInteger(value) && Math.abs(value) >= MAX_SAFE_DEFAULT) {
    return undefined;
  }
  return value;
}

/**
 * HTML-stripped description with enum values appended
 */
export function describeParameter(description: string | undefined, enumValues: string[] | undefined): string {
  const text = description ? stripHtml(description) : '';
  if (!enumValues) return text;

  const values = enumValues.join(', ');
  return text ? `${text} (values: ${values})` : `Values: ${values}`;
}

function toLocation(value: string | undefined): ParameterLocation {
  return DECLARED_LOCATIONS.find(location => location === value) ?? 'query';
}

function declaredParameter(spec: SpecDocument, declared: ParameterNode): ToolParameter | undefined {
  const param = derefParameter(spec, declared);
  if (!param.name) return undefined;

  const schema = param.schema ?? {};
  const enumValues = getEnumValues(spec, schema);
  const required = param.required ?? false;

  return {
    name: param.name,
    type: resolveSchemaType(spec, schema),
    required,
    default: required ? undefined : sanitizeDefault(schema.default),
    description: describeParameter(param.description, enumValues),
    enum: enumValues,
    location: toLocation(param.in),
    nullable: schema.nullable ?? false,
  };
}

/**
 * Merge `allOf` branches into a single properties/required view
 */
function mergeObjectSchema(spec: SpecDocument, schema: SchemaNode): { properties: Record<string, SchemaNode>; required: Set<string> } {
  const resolved = derefSchema(spec, schema);
  if (!resolved.allOf) {
    return {
      properties: resolved.properties ?? {},
      required: new Set(resolved.required ?? []),
    };
  }

  const properties: Record<string, SchemaNode> = {};
  const required = new Set<string>();
  for (const branch of resolved.allOf) {
    const sub = derefSchema(spec, branch);
    Object.assign(properties, sub.properties ?? {});
    for (const name of sub.required ?? []) {
      required.add(name);
    }
  }
  return { properties, required };
}

function flattenObjectSchema(spec: SpecDocument, schema: SchemaNode, isUpdate: boolean): ToolParameter[] {
  const { properties, required: requiredFields } = mergeObjectSchema(spec, schema);
  const params: ToolParameter[] = [];

  for (const [name, propSchema] of Object.entries(properties)) {
    // readOnly fields are server-assigned; `id` is always one of them
    if (propSchema.readOnly || name === 'id') continue;

    const type = resolveSchemaType(spec, propSchema);
    const enumValues = getEnumValues(spec, propSchema);
    let description = describeParameter(propSchema.description, enumValues);
    if (type === arrayOf('object')) {
      description += OBJECT_ARRAY_GUIDANCE;
    }

    const required = !isUpdate && requiredFields.has(name);

    params.push({
      name,
      type,
      required,
      // Partial updates carry no defaults
      default: isUpdate || required ? undefined : sanitizeDefault(propSchema.default),
      description,
      enum: enumValues,
      location: 'body',
      nullable: propSchema.nullable ?? false,
    });
  }

  return params;
}

function bodyParameters(spec: SpecDocument, operation: OperationNode, method: HttpMethod): ToolParameter[] {
  const bodySchema = operation.requestBody?.content?.[JSON_MEDIA_TYPE]?.schema;
  if (!bodySchema || Object.keys(bodySchema).length === 0) return [];

  const resolved = derefSchema(spec, bodySchema);

  if (resolved.type === 'object' || resolved.properties !== undefined || resolved.allOf !== undefined) {
    return flattenObjectSchema(spec, resolved, UPDATE_METHODS.has(method));
  }

  if (resolved.type === 'array') {
    return [{
      name: ARRAY_BODY_PARAM,
      type: arrayOf(resolveSchemaType(spec, resolved.items)),
      required: true,
      description: ARRAY_BODY_DESCRIPTION,
      location: 'body',
      nullable: false,
    }];
  }

  return [];
}

export function parseParameters(
  spec: SpecDocument,
  operation: OperationNode,
  method: HttpMethod
): ToolParameter[] {
  const params: ToolParameter[] = [];
  for (const declared of operation.parameters ?? []) {
    const param = declaredParameter(spec, declared);
    if (param) params.push(param);
  }

  const declaredNames = new Set(params.map(p => p.name));
  for (const param of bodyParameters(spec, operation, method)) {
    if (!declaredNames.has(param.name)) {
      params.push(param);
    }
  }

  return params;
}
