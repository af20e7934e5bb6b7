/**
 * MCP tool listing from catalog records
 *
 * Turns each ToolDefinition into an MCP SDK `Tool` with a JSON Schema input,
 * filters the catalog by module and read-only mode, and checks call
 * arguments against the generated schema with Ajv.
 */

import Ajv from 'ajv';
import type { ValidateFunction } from 'ajv';
import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import { ValidationError } from './errors.js';
import { silentLogger, type Logger } from './logger.js';
import { itemTypeOf } from './schema-types.js';
import type { Catalog, ParamType, ToolDefinition, ToolParameter } from './types/catalog.js';

export const CONFIRM_PARAM = 'confirm';

const CONFIRM_DESCRIPTION =
  'Set to true to perform this change. When false or omitted, the call only previews the request.';

export interface ToolSelection {
  /** Enabled modules; empty or absent enables every module */
  modules?: readonly string[];
  /** Drop every mutation tool */
  readOnly?: boolean;
}

type JsonSchema = Record<string, unknown>;

type InputSchema = {
  type: 'object';
  properties: Record<string, JsonSchema>;
  required?: string[];
  additionalProperties: boolean;
};

export function typeToJsonSchema(type: ParamType): JsonSchema {
  const itemType = itemTypeOf(type);
  if (itemType !== undefined) {
    return { type: 'array', items: typeToJsonSchema(itemType) };
  }
  if (type === 'any') {
    return {};
  }
  return { type };
}

export class ToolGenerator {
  private ajv = new Ajv.default({ allErrors: true, strict: false });
  private validators = new Map<string, ValidateFunction>();

  constructor(private logger: Logger = silentLogger) {}

  generateTool(tool: ToolDefinition): Tool {
    return {
      name: tool.name,
      description: tool.description,
      inputSchema: this.generateInputSchema(tool),
      annotations: {
        readOnlyHint: !tool.isMutation,
        destructiveHint: tool.method === 'delete',
      },
    };
  }

  generateTools(tools: readonly ToolDefinition[]): Tool[] {
    return tools.map(tool => this.generateTool(tool));
  }

  /**
   * JSON Schema for a tool's arguments. Mutations get a `confirm` flag the
   * runtime checks before sending the request.
   */
  generateInputSchema(tool: ToolDefinition): InputSchema {
    const properties: Record<string, JsonSchema> = {};
    const required: string[] = [];

    for (const param of tool.params) {
      properties[param.name] = this.parameterToJsonSchema(param);
      if (param.required) {
        required.push(param.name);
      }
    }

    if (tool.isMutation && !(CONFIRM_PARAM in properties)) {
      properties[CONFIRM_PARAM] = {
        type: 'boolean',
        description: CONFIRM_DESCRIPTION,
        default: false,
      };
    }

    const schema: InputSchema = {
      type: 'object',
      properties,
      additionalProperties: false,
    };
    if (required.length > 0) {
      schema.required = required;
    }
    return schema;
  }

  private parameterToJsonSchema(param: ToolParameter): JsonSchema {
    const schema: JsonSchema = {
      ...typeToJsonSchema(param.type),
      description: param.description,
    };

    if (param.enum && param.type === 'string') {
      schema.enum = param.nullable ? [...param.enum, null] : [...param.enum];
    }

    if (param.nullable && typeof schema.type === 'string') {
      schema.type = [schema.type, 'null'];
    }

    if (param.default !== undefined) {
      schema.default = param.default;
    }

    return schema;
  }

  /**
   * Throws ValidationError listing every schema violation
   */
  validateArguments(tool: ToolDefinition, args: Record<string, unknown>): void {
    const validate = this.getValidator(tool);
    if (validate(args)) return;

    const errors = (validate.errors ?? []).map(error => ({
      path: error.instancePath || '(root)',
      message: error.message ?? 'invalid',
      params: error.params,
    }));
    throw new ValidationError(
      `Invalid arguments for ${tool.name}: ${this.ajv.errorsText(validate.errors)}`,
      { tool: tool.name, errors }
    );
  }

  private getValidator(tool: ToolDefinition): ValidateFunction {
    const cached = this.validators.get(tool.name);
    if (cached) return cached;

    const validate = this.ajv.compile(this.generateInputSchema(tool));
    this.validators.set(tool.name, validate);
    return validate;
  }

  /**
   * Tools enabled by module list and read-only mode, in catalog order
   */
  selectTools(catalog: Catalog, selection: ToolSelection = {}): ToolDefinition[] {
    const modules = new Set(selection.modules ?? []);
    for (const module of modules) {
      if (!(module in catalog.modules)) {
        this.logger.warn('Unknown module in selection', { module, known: Object.keys(catalog.modules) });
      }
    }

    return catalog.tools.filter(tool =>
      (modules.size === 0 || modules.has(tool.module)) &&
      !(selection.readOnly && tool.isMutation)
    );
  }
}
