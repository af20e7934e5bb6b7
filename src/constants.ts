/**
 * Compiler constants
 */

import type { HttpMethod } from './types/openapi.js';

/**
 * Every generated tool name starts with this namespace
 */
export const TOOL_PREFIX = 'slskd_';

/**
 * Path prefixes stripped before naming, tried in order
 */
export const API_PREFIXES = ['/api/v0/', '/api/'] as const;

/**
 * Verb iteration order per path. Changing it changes which duplicate
 * receives a dedup suffix.
 */
export const METHOD_ORDER: readonly HttpMethod[] = ['get', 'post', 'put', 'delete', 'patch'];

export const MUTATION_METHODS: ReadonlySet<HttpMethod> = new Set(['post', 'put', 'patch', 'delete']);

export const UPDATE_METHODS: ReadonlySet<HttpMethod> = new Set(['put', 'patch']);

/**
 * Integers at or beyond 2^53 do not survive a round trip through a JSON number
 */
export const MAX_SAFE_DEFAULT = 2 ** 53;

export const HTTP_STATUS = {
  OK: '200',
  CREATED: '201',
} as const;

/**
 * Response media types inspected by the classifier, highest priority first
 */
export const RESPONSE_MEDIA_TYPES = ['application/json', 'text/json', 'text/plain'] as const;

export const JSON_MEDIA_TYPE = 'application/json';

export const DEFAULT_MODULE = 'application';

export const REPORT_ISSUE_TOOL = `${TOOL_PREFIX}report_issue`;

export const REPORT_ISSUE_NUDGE = `If unexpected errors occur, call ${REPORT_ISSUE_TOOL}.`;

export const ARRAY_BODY_PARAM = 'body';

export const ARRAY_BODY_DESCRIPTION = 'Request body (array)';

export const OBJECT_ARRAY_GUIDANCE =
  ' Pass as JSON array of objects. If creation fails,' +
  ' manage these via their dedicated sub-resource endpoints instead.';

export const DEFAULT_SPEC_PATH = 'spec/openapi.json';

export const DEFAULT_OUTPUT_PATH = 'generated/catalog.json';
