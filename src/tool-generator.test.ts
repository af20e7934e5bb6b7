/**
 * Tests for tool generator
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import { ValidationError } from './errors.js';
import type { Logger } from './logger.js';
import { ToolGenerator, typeToJsonSchema } from './tool-generator.js';
import { param, toolDefinition } from './testing/fixtures.js';
import type { Catalog } from './types/catalog.js';

const createSearch = toolDefinition({
  name: 'slskd_create_search',
  method: 'post',
  path: '/api/v0/searches',
  module: 'searches',
  isMutation: true,
  description: 'Performs a search.',
  params: [
    param({ name: 'searchText', required: true, location: 'body', description: 'The search text.' }),
    param({ name: 'searchTimeout', type: 'integer', default: 15, location: 'body', description: 'Timeout.' }),
    param({ name: 'direction', enum: ['In', 'Out'], nullable: true, location: 'body' }),
    param({ name: 'tags', type: 'array<string>', location: 'body' }),
  ],
});

const listSearches = toolDefinition({
  name: 'slskd_list_searches',
  module: 'searches',
  responseType: 'array',
  isList: true,
});

const deleteShare = toolDefinition({
  name: 'slskd_delete_shares',
  method: 'delete',
  path: '/api/v0/shares',
  module: 'shares',
  isMutation: true,
});

const catalog: Catalog = {
  tools: [listSearches, createSearch, deleteShare],
  modules: {
    searches: ['slskd_list_searches', 'slskd_create_search'],
    shares: ['slskd_delete_shares'],
  },
  toolCount: 3,
  specVersion: '1.2.3',
};

describe('ToolGenerator', () => {
  let generator: ToolGenerator;
  let logger: Logger;

  beforeEach(() => {
    logger = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
    generator = new ToolGenerator(logger);
  });

  describe('generateTool', () => {
    it('should generate an MCP tool with annotations', () => {
      const tool = generator.generateTool(listSearches);
      expect(tool).toEqual({
        name: 'slskd_list_searches',
        description: 'Test tool.',
        inputSchema: { type: 'object', properties: {}, additionalProperties: false },
        annotations: { readOnlyHint: true, destructiveHint: false },
      });
    });

    it('should mark deletes as destructive', () => {
      expect(generator.generateTool(deleteShare).annotations).toEqual({
        readOnlyHint: false,
        destructiveHint: true,
      });
    });

    it('should map parameters to JSON Schema', () => {
      const schema = generator.generateInputSchema(createSearch);
      expect(schema.required).toEqual(['searchText']);
      expect(schema.properties).toEqual({
        searchText: { type: 'string', description: 'The search text.' },
        searchTimeout: { type: 'integer', description: 'Timeout.', default: 15 },
        direction: { type: ['string', 'null'], description: '', enum: ['In', 'Out', null] },
        tags: { type: 'array', items: { type: 'string' }, description: '' },
        confirm: {
          type: 'boolean',
          description: 'Set to true to perform this change. When false or omitted, the call only previews the request.',
          default: false,
        },
      });
    });

    it('should add confirm only to mutations', () => {
      expect(generator.generateInputSchema(listSearches).properties).not.toHaveProperty('confirm');
      expect(generator.generateInputSchema(deleteShare).properties).toHaveProperty('confirm');
    });
  });

  describe('validateArguments', () => {
    it('should accept valid arguments', () => {
      expect(() => generator.validateArguments(createSearch, {
        searchText: 'test album',
        searchTimeout: 30,
        direction: null,
        confirm: true,
      })).not.toThrow();
    });

    it('should report missing required parameters', () => {
      expect(() => generator.validateArguments(createSearch, {}))
        .toThrow("Invalid arguments for slskd_create_search: data must have required property 'searchText'");
    });

    it('should list every violation in the details', () => {
      try {
        generator.validateArguments(createSearch, { searchText: 1, unknown: true });
        expect.unreachable();
      } catch (error) {
        expect(error).toBeInstanceOf(ValidationError);
        if (error instanceof ValidationError) {
          expect(error.code).toBe('VALIDATION_ERROR');
          expect(error.details?.tool).toBe('slskd_create_search');
          const errors = error.details?.errors;
          expect(errors).toHaveLength(2);
          expect(errors).toEqual(expect.arrayContaining([
            { path: '(root)', message: 'must NOT have additional properties', params: { additionalProperty: 'unknown' } },
            { path: '/searchText', message: 'must be string', params: { type: 'string' } },
          ]));
        }
      }
    });

    it('should reject values outside the enum', () => {
      expect(() => generator.validateArguments(createSearch, { searchText: 'x', direction: 'Sideways' }))
        .toThrow(/must be equal to one of the allowed values/);
    });
  });

  describe('selectTools', () => {
    it('should return every tool by default', () => {
      expect(generator.selectTools(catalog).map(t => t.name)).toEqual([
        'slskd_list_searches',
        'slskd_create_search',
        'slskd_delete_shares',
      ]);
    });

    it('should filter by module', () => {
      expect(generator.selectTools(catalog, { modules: ['shares'] }).map(t => t.name)).toEqual([
        'slskd_delete_shares',
      ]);
    });

    it('should drop mutations in read-only mode', () => {
      expect(generator.selectTools(catalog, { readOnly: true }).map(t => t.name)).toEqual([
        'slskd_list_searches',
      ]);
    });

    it('should warn about unknown modules', () => {
      expect(generator.selectTools(catalog, { modules: ['relay'] })).toEqual([]);
      expect(logger.warn).toHaveBeenCalledWith('Unknown module in selection', {
        module: 'relay',
        known: ['searches', 'shares'],
      });
    });
  });
});

describe('typeToJsonSchema', () => {
  it('should map tags to schemas', () => {
    expect(typeToJsonSchema('number')).toEqual({ type: 'number' });
    expect(typeToJsonSchema('any')).toEqual({});
    expect(typeToJsonSchema('array<array<any>>')).toEqual({ type: 'array', items: { type: 'array', items: {} } });
  });
});
