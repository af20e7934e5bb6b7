/**
 * API path -> module assignment
 *
 * Modules group tools by API area so a runtime can enable a subset.
 */

import { DEFAULT_MODULE } from './constants.js';

/**
 * Prefix table. Longest match wins; equal lengths keep the earlier entry.
 */
export const PATH_MODULES: ReadonlyArray<readonly [prefix: string, module: string]> = [
  ['/api/v0/searches', 'searches'],
  ['/api/v0/transfers', 'transfers'],
  ['/api/v0/users', 'users'],
  ['/api/v0/files', 'files'],
  ['/api/v0/conversations', 'conversations'],
  ['/api/v0/rooms', 'rooms'],
  ['/api/v0/server', 'server'],
  ['/api/v0/application', 'application'],
  ['/api/v0/options', 'options'],
  ['/api/v0/shares', 'shares'],
  ['/api/v0/session', 'session'],
  ['/api/v0/telemetry', 'telemetry'],
  ['/api/v0/relay', 'relay'],
  ['/api/v0/events', 'events'],
  ['/api/v0/logs', 'logs'],
];

export const MODULE_NAMES: readonly string[] = Array.from(
  new Set([...PATH_MODULES.map(([, module]) => module), DEFAULT_MODULE])
);

export function pathToModule(path: string): string {
  let bestMatch = DEFAULT_MODULE;
  let bestLength = 0;
  for (const [prefix, module] of PATH_MODULES) {
    if (path.startsWith(prefix) && prefix.length > bestLength) {
      bestMatch = module;
      bestLength = prefix.length;
    }
  }
  return bestMatch;
}
