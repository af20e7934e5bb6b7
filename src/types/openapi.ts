/**
 * OpenAPI document shapes consumed by the catalog compiler
 *
 * Only the subset the compiler reads is modelled. Every field is optional:
 * the slskd document is irregular and absent keys are normal input.
 */

import type { OpenAPIV3 } from 'openapi-types';

export type HttpMethod = 'get' | 'post' | 'put' | 'delete' | 'patch';

export interface SchemaNode {
  $ref?: string;
  type?: string;
  format?: string;
  description?: string;
  enum?: unknown[];
  items?: SchemaNode;
  properties?: Record<string, SchemaNode>;
  required?: string[];
  allOf?: SchemaNode[];
  oneOf?: SchemaNode[];
  anyOf?: SchemaNode[];
  readOnly?: boolean;
  nullable?: boolean;
  default?: unknown;
}

export interface ParameterNode {
  $ref?: string;
  name?: string;
  in?: OpenAPIV3.ParameterObject['in'];
  required?: boolean;
  description?: string;
  schema?: SchemaNode;
}

export interface MediaTypeNode {
  schema?: SchemaNode;
}

export interface RequestBodyNode {
  required?: boolean;
  content?: Record<string, MediaTypeNode>;
}

export interface ResponseNode {
  description?: string;
  content?: Record<string, MediaTypeNode>;
}

export interface OperationNode {
  operationId?: string;
  summary?: string;
  description?: string;
  tags?: string[];
  parameters?: ParameterNode[];
  requestBody?: RequestBodyNode;
  responses?: Record<string, ResponseNode>;
}

export type PathItemNode = Partial<Record<HttpMethod, OperationNode>>;

export interface SpecDocument {
  openapi?: string;
  info?: Partial<OpenAPIV3.InfoObject>;
  servers?: OpenAPIV3.ServerObject[];
  paths?: Record<string, PathItemNode>;
  components?: {
    schemas?: Record<string, SchemaNode>;
    parameters?: Record<string, ParameterNode>;
  };
}
