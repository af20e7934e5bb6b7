/**
 * Tool names from HTTP method + path
 *
 * Pattern: slskd_<verb>_<resource>
 *   GET    /api/v0/searches              -> slskd_list_searches
 *   GET    /api/v0/searches/{id}         -> slskd_get_search
 *   POST   /api/v0/searches              -> slskd_create_search
 *   DELETE /api/v0/searches/{id}         -> slskd_delete_search
 *   GET    /api/v0/transfers/downloads   -> slskd_list_transfers_downloads
 */

import { API_PREFIXES, TOOL_PREFIX } from './constants.js';
import type { HttpMethod } from './types/openapi.js';

export type ToolVerb = 'list' | 'get' | 'create' | 'update' | 'delete';

const METHOD_VERBS: Readonly<Record<HttpMethod, ToolVerb>> = {
  get: 'list',
  post: 'create',
  put: 'update',
  patch: 'update',
  delete: 'delete',
};

/**
 * slskd resource nouns, singular -> plural. Singleton resources map to
 * themselves.
 */
const PLURALS: ReadonlyMap<string, string> = new Map([
  ['search', 'searches'],
  ['conversation', 'conversations'],
  ['transfer', 'transfers'],
  ['download', 'downloads'],
  ['upload', 'uploads'],
  ['room', 'rooms'],
  ['share', 'shares'],
  ['user', 'users'],
  ['file', 'files'],
  ['event', 'events'],
  ['log', 'logs'],
  ['message', 'messages'],
  ['member', 'members'],
  ['directory', 'directories'],
  ['option', 'options'],
  ['report', 'reports'],
  ['metric', 'metrics'],
  ['response', 'responses'],
  ['status', 'statuses'],
  ['application', 'application'],
  ['server', 'server'],
  ['session', 'session'],
  ['telemetry', 'telemetry'],
  ['relay', 'relay'],
]);

const SINGULARS: ReadonlyMap<string, string> = new Map(
  Array.from(PLURALS, ([singular, plural]) => [plural, singular])
);

export function pluralize(word: string): string {
  const known = PLURALS.get(word);
  if (known) return known;
  if (SINGULARS.has(word)) return word;
  return `${word}s`;
}

export function singularize(word: string): string {
  const known = SINGULARS.get(word);
  if (known) return known;
  if (PLURALS.has(word)) return word;
  if (word.endsWith('ies')) return `${word.slice(0, -3)}y`;
  if (word.endsWith('ses')) return word.slice(0, -2);
  if (word.endsWith('s') && !word.endsWith('ss')) return word.slice(0, -1);
  return word;
}

/**
 * camelCase / PascalCase -> snake_case
 */
export function camelToSnake(name: string): string {
  return name
    .replace(/([A-Z]+)([A-Z][a-z])/g, '$1_$2')
    .replace(/([a-z\d])([A-Z])/g, '$1_$2')
    .toLowerCase();
}

/**
 * Path segment -> identifier fragment
 */
export function sanitizeSegment(segment: string): string {
  return camelToSnake(segment)
    .replace(/[.-]/g, '_')
    .replace(/[^a-z0-9_]/g, '')
    .replace(/_+/g, '_')
    .replace(/^_|_$/g, '');
}

function isPlaceholder(segment: string): boolean {
  return segment.startsWith('{');
}

/**
 * Literal path segments after the API prefix, placeholders removed
 */
export function extractPathParts(path: string): string[] {
  const prefix = API_PREFIXES.find(p => path.startsWith(p));
  const rest = prefix ? path.slice(prefix.length) : path.replace(/^\/+/, '');
  return rest.split('/').filter(segment => segment && !isPlaceholder(segment));
}

/**
 * Whether the path addresses a single resource, i.e. ends in `{param}`
 */
export function isIdentifierScoped(path: string): boolean {
  const segments = path.split('/').filter(Boolean);
  const last = segments[segments.length - 1];
  return last !== undefined && isPlaceholder(last);
}

export function toolVerb(method: HttpMethod, path: string): ToolVerb {
  if (method === 'get') {
    return isIdentifierScoped(path) ? 'get' : 'list';
  }
  return METHOD_VERBS[method];
}

export function buildToolName(method: HttpMethod, path: string): string {
  const parts = extractPathParts(path).map(sanitizeSegment).filter(Boolean);

  if (parts.length === 0) {
    return `${TOOL_PREFIX}${METHOD_VERBS[method]}_root`;
  }

  const verb = toolVerb(method, path);

  if (parts.length === 1) {
    let resource = parts[0];
    if (verb === 'list') {
      resource = pluralize(resource);
    } else if (verb === 'create' || isIdentifierScoped(path)) {
      resource = singularize(resource);
    }
    return `${TOOL_PREFIX}${verb}_${resource}`;
  }

  return `${TOOL_PREFIX}${verb}_${parts.join('_')}`;
}

/**
 * Make names unique across the catalog
 *
 * Pass 1 suffixes the HTTP method onto every repeat of a name. Pass 2
 * suffixes an ordinal onto whatever still repeats, skipping ordinals that
 * some other tool already uses. Input order decides which tool keeps the
 * bare name.
 */
export function deduplicateToolNames<T extends { name: string; method: string }>(tools: readonly T[]): T[] {
  const seen = new Set<string>();
  const withMethods = tools.map(tool => {
    if (!seen.has(tool.name)) {
      seen.add(tool.name);
      return tool;
    }
    return { ...tool, name: `${tool.name}_${tool.method}` };
  });

  const used = new Set(withMethods.map(tool => tool.name));
  const counts = new Map<string, number>();
  return withMethods.map(tool => {
    const count = counts.get(tool.name);
    if (count === undefined) {
      counts.set(tool.name, 1);
      return tool;
    }

    let ordinal = count + 1;
    while (used.has(`${tool.name}_${ordinal}`)) {
      ordinal++;
    }
    counts.set(tool.name, ordinal);

    const name = `${tool.name}_${ordinal}`;
    used.add(name);
    return { ...tool, name };
  });
}
