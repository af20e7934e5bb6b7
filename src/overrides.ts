/**
 * Correction tables for known gaps in the slskd OpenAPI description
 *
 * Tables are keyed by operation (`method path`) or by tool name. Each is
 * consulted at one point in catalog-builder.ts; general inference never
 * reads them.
 */

import type { HttpMethod } from './types/openapi.js';
import type { ResponseType } from './types/catalog.js';

/**
 * `get /api/v0/searches` style key for per-operation tables
 */
export function operationKey(method: HttpMethod, path: string): string {
  return `${method} ${path}`;
}

/**
 * Names for operations whose synthesized name collides with a sibling
 */
export const NAME_OVERRIDES: ReadonlyMap<string, string> = new Map([
  ['get /api/v0/transfers/downloads/{username}/{id}', 'slskd_get_transfer_download'],
  ['get /api/v0/transfers/uploads/{username}/{id}', 'slskd_get_transfer_upload'],
  ['put /api/v0/conversations/{username}/{id}', 'slskd_update_conversation_message'],
]);

/**
 * Endpoints that return arrays but declare no response schema. Applied only
 * when classification finds nothing.
 */
export const RESPONSE_TYPE_OVERRIDES: ReadonlyMap<string, ResponseType> = new Map([
  ['get /api/v0/searches', 'array'],
  ['get /api/v0/transfers/downloads', 'array'],
  ['get /api/v0/transfers/uploads', 'array'],
  ['get /api/v0/logs', 'array'],
]);

/**
 * Parameter descriptions that are wrong in the document, keyed by tool name then
 * parameter name
 */
export const PARAM_DESCRIPTION_OVERRIDES: ReadonlyMap<string, ReadonlyMap<string, string>> = new Map([
  ['slskd_create_search', new Map([
    ['searchTimeout', 'Search timeout in milliseconds (default: 15000).'],
  ])],
]);

/**
 * Follow-up steps appended to descriptions of multi-step workflows
 */
export const WORKFLOW_HINTS: ReadonlyMap<string, string> = new Map([
  [
    'slskd_create_search',
    'Note: Search is async. Poll slskd_get_search until its state includes Completed,' +
      ' then call slskd_list_searches_responses to get results.',
  ],
  [
    'slskd_create_transfers_downloads',
    'Note: After queueing, monitor progress with slskd_list_transfers_downloads.' +
      ' Clear completed downloads with slskd_delete_transfers_downloads_all_completed.',
  ],
  [
    'slskd_list_users_browse',
    'Note: Queue files from the results with slskd_create_transfers_downloads' +
      ' using the same username and each full filename.',
  ],
  [
    'slskd_create_rooms_joined',
    'Note: Post to the room with slskd_create_rooms_joined_messages.',
  ],
  [
    'slskd_create_conversation',
    'Note: Read replies with slskd_list_conversations_messages.',
  ],
]);

/**
 * Enum values of response fields, which the document models as plain strings
 */
export const RESPONSE_ENUM_DOCS: ReadonlyMap<string, string> = new Map([
  [
    'slskd_list_transfers_downloads',
    'Transfer states: Requested, Queued, Initializing, InProgress, Completed,' +
      ' Succeeded, Cancelled, TimedOut, Errored, Rejected.',
  ],
  [
    'slskd_list_transfers_uploads',
    'Transfer states: Requested, Queued, Initializing, InProgress, Completed,' +
      ' Succeeded, Cancelled, TimedOut, Errored, Rejected.',
  ],
  [
    'slskd_list_server',
    'Server states: Disconnected, Connecting, Connected, LoggingIn, LoggedIn, Disconnecting.',
  ],
  [
    'slskd_list_events',
    'Event types: DownloadFileComplete, DownloadDirectoryComplete, UploadFileComplete,' +
      ' PrivateMessageReceived, RoomMessageReceived, Noop.',
  ],
  [
    'slskd_list_users_status',
    'Presence values: Offline, Away, Online.',
  ],
]);

/**
 * Paths left out of the catalog. The dump endpoint streams a binary memory
 * dump that no tool can return.
 */
export const SKIP_PATHS: ReadonlySet<string> = new Set([
  '/api/v0/application/dump',
]);

/**
 * Parameters the runtime must base64-encode before building the URL
 */
export const BASE64_PARAMS: ReadonlySet<string> = new Set([
  'base64SubdirectoryName',
  'base64FileName',
]);
