/**
 * Success response shape classification
 */

import { HTTP_STATUS, RESPONSE_MEDIA_TYPES } from './constants.js';
import { derefSchema } from './spec-loader.js';
import type { OperationNode, SpecDocument } from './types/openapi.js';
import type { ResponseType } from './types/catalog.js';

/**
 * Pagination envelope: `{ records: [...], totalRecords: n, ... }`
 */
const PAGING_FIELDS = ['records', 'totalRecords'] as const;

export function getResponseType(spec: SpecDocument, operation: OperationNode): ResponseType {
  const responses = operation.responses ?? {};
  const success = responses[HTTP_STATUS.OK] ?? responses[HTTP_STATUS.CREATED];
  const content = success?.content ?? {};

  for (const mediaType of RESPONSE_MEDIA_TYPES) {
    const media = content[mediaType];
    if (!media) continue;

    const schema = derefSchema(spec, media.schema ?? {});
    if (schema.type === 'array') {
      return 'array';
    }
    if (schema.properties) {
      const properties = schema.properties;
      return PAGING_FIELDS.every(field => field in properties) ? 'paging' : 'object';
    }
    if (schema.type === 'object') {
      return 'object';
    }
  }

  return 'none';
}
