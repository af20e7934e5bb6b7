#!/usr/bin/env node

/**
 * CLI entry point
 *
 * Reads configuration from the environment (and .env), compiles the OpenAPI document
 * into a catalog and writes it out. Exits non-zero on any failure.
 */

import 'dotenv/config';
import { buildCatalog } from './catalog-builder.js';
import { writeCatalog } from './catalog-writer.js';
import { loadConfig, type AppConfig } from './config.js';
import { isCatalogError } from './errors.js';
import { ConsoleLogger, createLogger, type Logger } from './logger.js';
import { loadSpec } from './spec-loader.js';
import { ToolGenerator } from './tool-generator.js';

function logFailure(logger: Logger, message: string, error: unknown): void {
  const err = error instanceof Error ? error : new Error(String(error));
  logger.error(message, err, isCatalogError(error) ? { code: error.code, ...error.details } : undefined);
}

async function main(): Promise<void> {
  let config: AppConfig;
  try {
    config = loadConfig();
  } catch (error) {
    logFailure(new ConsoleLogger(), 'Invalid configuration', error);
    process.exitCode = 1;
    return;
  }

  const logger = createLogger(config.logFormat, config.logLevel);

  try {
    logger.info('Loading OpenAPI spec', { specPath: config.specPath });
    const spec = await loadSpec(config.specPath);
    const catalog = buildCatalog(spec, { logger });

    const generator = new ToolGenerator(logger);
    const enabled = generator.selectTools(catalog, {
      modules: config.modules,
      readOnly: config.readOnly,
    });

    const written = await writeCatalog(config.outputPath, catalog, generator.generateTools(enabled));
    logger.info('Wrote catalog', {
      files: written,
      toolCount: catalog.toolCount,
      enabledTools: enabled.length,
      readOnly: config.readOnly,
    });
  } catch (error) {
    logFailure(logger, 'Catalog generation failed', error);
    process.exitCode = 1;
  }
}

main().catch((error: unknown) => {
  console.error('Fatal error', error);
  process.exit(1);
});
