/**
 * Catalog output types
 *
 * The catalog is a plain serializable value: a renderer or the MCP adapter
 * in tool-generator.ts consumes it, nothing writes back into it.
 */

import type { HttpMethod } from './openapi.js';

export type ScalarType = 'string' | 'integer' | 'number' | 'boolean' | 'object' | 'any';

/**
 * Resolved parameter type tag. Arrays nest: `array<array<string>>`.
 */
export type ParamType = ScalarType | `array<${string}>`;

export type ParameterLocation = 'path' | 'query' | 'header' | 'cookie' | 'body';

export type ResponseType = 'array' | 'paging' | 'object' | 'none';

export interface ToolParameter {
  name: string;
  type: ParamType;
  required: boolean;
  /** Absent for updates and for unsafe or undeclared values */
  default?: unknown;
  description: string;
  enum?: readonly string[];
  location: ParameterLocation;
  nullable: boolean;
}

export interface ToolDefinition {
  readonly name: string;
  readonly method: HttpMethod;
  readonly path: string;
  readonly params: readonly ToolParameter[];
  readonly module: string;
  readonly isMutation: boolean;
  readonly isList: boolean;
  readonly isArrayBody: boolean;
  readonly hasBase64Params: boolean;
  readonly responseType: ResponseType;
  readonly description: string;
  readonly tags: readonly string[];
}

export interface Catalog {
  tools: readonly ToolDefinition[];
  /** Module name -> tool names, in catalog order */
  modules: Readonly<Record<string, readonly string[]>>;
  toolCount: number;
  specVersion: string;
}
