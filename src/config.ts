/**
 * Environment configuration
 *
 * Variables (all optional):
 *   OPENAPI_SPEC_PATH    spec to compile (default spec/openapi.json)
 *   CATALOG_OUTPUT_PATH  where the CLI writes the catalog (default generated/catalog.json)
 *   LOG_LEVEL            DEBUG | INFO | WARN | ERROR | SILENT
 *   LOG_FORMAT           console | json
 *   SLSKD_MODULES        comma-separated modules to enable (default: all); names must be known modules
 *   SLSKD_READ_ONLY      true/1 drops mutation tools
 */

import { z } from 'zod';
import { DEFAULT_OUTPUT_PATH, DEFAULT_SPEC_PATH } from './constants.js';
import { ConfigurationError } from './errors.js';
import { LogLevel, parseLogLevel, type LogFormat } from './logger.js';
import { MODULE_NAMES } from './modules.js';

export interface AppConfig {
  specPath: string;
  outputPath: string;
  logLevel: LogLevel;
  logFormat: LogFormat;
  modules: string[];
  readOnly: boolean;
}

const envSchema = z.object({
  OPENAPI_SPEC_PATH: z.string().min(1).default(DEFAULT_SPEC_PATH),
  CATALOG_OUTPUT_PATH: z.string().min(1).default(DEFAULT_OUTPUT_PATH),
  LOG_LEVEL: z.string().optional().transform((value, ctx) => {
    if (value === undefined || value === '') return LogLevel.INFO;
    const level = parseLogLevel(value);
    if (level === undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: 'Expected DEBUG, INFO, WARN, ERROR or SILENT',
      });
      return z.NEVER;
    }
    return level;
  }),
  LOG_FORMAT: z.enum(['console', 'json']).default('console'),
  SLSKD_MODULES: z.string().optional().transform((value, ctx) => {
    const modules = (value ?? '').split(',').map(module => module.trim()).filter(Boolean);
    const unknown = modules.filter(module => !MODULE_NAMES.includes(module));
    if (unknown.length > 0) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `Unknown modules ${unknown.join(', ')}; expected any of ${MODULE_NAMES.join(', ')}`,
      });
      return z.NEVER;
    }
    return modules;
  }),
  SLSKD_READ_ONLY: z
    .enum(['true', 'false', '1', '0'])
    .default('false')
    .transform(value => value === 'true' || value === '1'),
});

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    const issues = result.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigurationError(`Invalid configuration: ${issues.join('; ')}`, { issues });
  }

  const parsed = result.data;
  return {
    specPath: parsed.OPENAPI_SPEC_PATH,
    outputPath: parsed.CATALOG_OUTPUT_PATH,
    logLevel: parsed.LOG_LEVEL,
    logFormat: parsed.LOG_FORMAT,
    modules: parsed.SLSKD_MODULES,
    readOnly: parsed.SLSKD_READ_ONLY,
  };
}
