/**
 * Unit tests for tool name synthesis and deduplication
 */

import { describe, it, expect } from 'vitest';
import {
  buildToolName,
  camelToSnake,
  deduplicateToolNames,
  extractPathParts,
  isIdentifierScoped,
  pluralize,
  sanitizeSegment,
  singularize,
  toolVerb,
} from './naming.js';

describe('buildToolName', () => {
  it('should name single-segment CRUD operations', () => {
    expect(buildToolName('get', '/api/v0/searches')).toBe('slskd_list_searches');
    expect(buildToolName('get', '/api/v0/searches/{id}')).toBe('slskd_get_search');
    expect(buildToolName('post', '/api/v0/searches')).toBe('slskd_create_search');
    expect(buildToolName('put', '/api/v0/searches/{id}')).toBe('slskd_update_search');
    expect(buildToolName('delete', '/api/v0/searches/{id}')).toBe('slskd_delete_search');
  });

  it('should join multi-segment paths verbatim', () => {
    expect(buildToolName('get', '/api/v0/transfers/downloads')).toBe('slskd_list_transfers_downloads');
    expect(buildToolName('delete', '/api/v0/transfers/downloads/all/completed'))
      .toBe('slskd_delete_transfers_downloads_all_completed');
  });

  it('should use list for GET paths that do not end in a placeholder', () => {
    expect(buildToolName('get', '/api/v0/searches/{id}/responses')).toBe('slskd_list_searches_responses');
    expect(buildToolName('get', '/api/v0/users/{username}/browse')).toBe('slskd_list_users_browse');
  });

  it('should keep singleton resources singular', () => {
    expect(buildToolName('get', '/api/v0/server')).toBe('slskd_list_server');
    expect(buildToolName('get', '/api/v0/application')).toBe('slskd_list_application');
    expect(buildToolName('post', '/api/v0/session')).toBe('slskd_create_session');
  });

  it('should leave non-scoped update and delete resources as written', () => {
    expect(buildToolName('put', '/api/v0/shares')).toBe('slskd_update_shares');
    expect(buildToolName('delete', '/api/v0/shares')).toBe('slskd_delete_shares');
  });

  it('should snake-case camelCase segments', () => {
    expect(buildToolName('get', '/api/v0/options/startupOptions')).toBe('slskd_list_options_startup_options');
  });

  it('should fall back to root for paths without literal segments', () => {
    expect(buildToolName('get', '/api/v0/')).toBe('slskd_list_root');
    expect(buildToolName('post', '/')).toBe('slskd_create_root');
    expect(buildToolName('delete', '/api/v0/{id}')).toBe('slskd_delete_root');
  });

  it('should handle paths outside the versioned prefix', () => {
    expect(buildToolName('get', '/api/health')).toBe('slskd_list_healths');
    expect(buildToolName('get', '/health')).toBe('slskd_list_healths');
  });
});

describe('pluralize / singularize', () => {
  it('should use the irregular table first', () => {
    expect(pluralize('search')).toBe('searches');
    expect(pluralize('directory')).toBe('directories');
    expect(singularize('searches')).toBe('search');
    expect(singularize('directories')).toBe('directory');
  });

  it('should leave plural table entries as they are', () => {
    expect(pluralize('downloads')).toBe('downloads');
    expect(pluralize('telemetry')).toBe('telemetry');
  });

  it('should append s to words outside the table', () => {
    expect(pluralize('widget')).toBe('widgets');
    expect(pluralize('category')).toBe('categorys');
    expect(pluralize('box')).toBe('boxs');
    expect(buildToolName('get', '/api/v0/telemetry')).toBe('slskd_list_telemetry');
  });

  it('should apply singular regex fallbacks', () => {
    expect(singularize('categories')).toBe('category');
    expect(singularize('buses')).toBe('bus');
    expect(singularize('widgets')).toBe('widget');
    expect(singularize('address')).toBe('address');
  });
});

describe('path helpers', () => {
  it('should strip prefixes and placeholders', () => {
    expect(extractPathParts('/api/v0/transfers/downloads/{username}/{id}')).toEqual(['transfers', 'downloads']);
    expect(extractPathParts('/api/session')).toEqual(['session']);
    expect(extractPathParts('/health/live')).toEqual(['health', 'live']);
  });

  it('should detect identifier-scoped paths by the last segment', () => {
    expect(isIdentifierScoped('/api/v0/searches/{id}')).toBe(true);
    expect(isIdentifierScoped('/api/v0/searches/{id}/responses')).toBe(false);
    expect(isIdentifierScoped('/')).toBe(false);
  });

  it('should pick verbs', () => {
    expect(toolVerb('get', '/api/v0/rooms/joined/{roomName}')).toBe('get');
    expect(toolVerb('get', '/api/v0/rooms/joined')).toBe('list');
    expect(toolVerb('patch', '/api/v0/things/{id}')).toBe('update');
  });

  it('should sanitize segments into identifier fragments', () => {
    expect(camelToSnake('base64SubdirectoryName')).toBe('base64_subdirectory_name');
    expect(camelToSnake('HTTPServer')).toBe('http_server');
    expect(sanitizeSegment('yaml-location')).toBe('yaml_location');
    expect(sanitizeSegment('file.name')).toBe('file_name');
    expect(sanitizeSegment('__odd__name__')).toBe('odd_name');
  });
});

describe('deduplicateToolNames', () => {
  it('should suffix the method onto repeats', () => {
    const result = deduplicateToolNames([
      { name: 'slskd_get_transfers_downloads', method: 'get' },
      { name: 'slskd_get_transfers_downloads', method: 'delete' },
    ]);
    expect(result.map(t => t.name)).toEqual([
      'slskd_get_transfers_downloads',
      'slskd_get_transfers_downloads_delete',
    ]);
  });

  it('should add ordinals when method suffixes still collide', () => {
    const result = deduplicateToolNames([
      { name: 'x', method: 'get' },
      { name: 'x', method: 'get' },
      { name: 'x', method: 'get' },
    ]);
    expect(result.map(t => t.name)).toEqual(['x', 'x_get', 'x_get_2']);
  });

  it('should skip ordinals already taken by another tool', () => {
    const result = deduplicateToolNames([
      { name: 'x', method: 'get' },
      { name: 'x', method: 'get' },
      { name: 'x', method: 'get' },
      { name: 'x_get_2', method: 'post' },
    ]);
    const names = result.map(t => t.name);
    expect(names).toEqual(['x', 'x_get', 'x_get_3', 'x_get_2']);
    expect(new Set(names).size).toBe(names.length);
  });

  it('should not mutate its input', () => {
    const input = [
      { name: 'x', method: 'get' },
      { name: 'x', method: 'put' },
    ];
    deduplicateToolNames(input);
    expect(input[1].name).toBe('x');
  });
});
