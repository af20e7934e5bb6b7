/**
 * Shared test fixtures
 *
 * `FIXTURE_SPEC_PATH` is the bundled slskd description that the CLI compiles
 * by default. The inline builders keep unit tests independent of it.
 */

import path from 'path';
import type { OperationNode, PathItemNode, SchemaNode, SpecDocument } from '../types/openapi.js';
import type { ToolDefinition, ToolParameter } from '../types/catalog.js';

export const FIXTURE_SPEC_PATH = path.join(process.cwd(), 'spec/openapi.json');

export function specWith(
  paths: Record<string, PathItemNode> = {},
  schemas: Record<string, SchemaNode> = {}
): SpecDocument {
  return {
    openapi: '3.0.1',
    info: { title: 'test', version: '1.2.3' },
    paths,
    components: { schemas },
  };
}

export function jsonBody(schema: SchemaNode): OperationNode['requestBody'] {
  return { content: { 'application/json': { schema } } };
}

export function okResponse(schema: SchemaNode, mediaType = 'application/json'): OperationNode['responses'] {
  return { '200': { description: 'Success', content: { [mediaType]: { schema } } } };
}

export function param(overrides: Partial<ToolParameter> & Pick<ToolParameter, 'name'>): ToolParameter {
  return {
    type: 'string',
    required: false,
    description: '',
    location: 'query',
    nullable: false,
    ...overrides,
  };
}

export function toolDefinition(overrides: Partial<ToolDefinition> & Pick<ToolDefinition, 'name'>): ToolDefinition {
  return {
    method: 'get',
    path: '/api/v0/things',
    params: [],
    module: 'application',
    isMutation: false,
    isList: false,
    isArrayBody: false,
    hasBase64Params: false,
    responseType: 'none',
    description: 'Test tool.',
    tags: [],
    ...overrides,
  };
}
