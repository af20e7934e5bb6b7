/**
 * Catalog output files
 */

import fs from 'fs/promises';
import path from 'path';
import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import type { Catalog } from './types/catalog.js';

export const MCP_TOOLS_FILE = 'mcp-tools.json';

async function writeJson(filePath: string, value: unknown): Promise<void> {
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  await fs.writeFile(filePath, `${JSON.stringify(value, null, 2)}\n`, 'utf-8');
}

/**
 * Write the catalog and, beside it, the MCP listing of the enabled tools.
 * Returns the paths written.
 */
export async function writeCatalog(outputPath: string, catalog: Catalog, tools: Tool[]): Promise<string[]> {
  const toolsPath = path.join(path.dirname(outputPath), MCP_TOOLS_FILE);
  await writeJson(outputPath, catalog);
  await writeJson(toolsPath, { specVersion: catalog.specVersion, tools });
  return [outputPath, toolsPath];
}
