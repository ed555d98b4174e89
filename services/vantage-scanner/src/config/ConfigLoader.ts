/**
 * Scanner configuration loading
 *
 * Configuration is one immutable value: parsed through the zod schema with
 * defaults applied, then deep-frozen.
 */

import * as fs from 'fs';
import { ZodError } from 'zod';
import { ConfigValidationError, errorMessage } from '../errors';
import { ScannerConfig, ScannerConfigSchema } from './schema';

export const CONFIG_PATH_ENV = 'SCANNER_CONFIG_PATH';

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const nested of Object.values(value)) {
      deepFreeze(nested);
    }
  }
  return value;
}

function formatIssues(error: ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.join('.');
    return path ? `${path}: ${issue.message}` : issue.message;
  });
}

/**
 * Validate raw configuration input and return the frozen config.
 * Throws ConfigValidationError listing every issue.
 */
export function createScannerConfig(input: unknown = {}): ScannerConfig {
  const result = ScannerConfigSchema.safeParse(input);
  if (!result.success) {
    throw new ConfigValidationError(formatIssues(result.error));
  }
  return deepFreeze(result.data);
}

export function loadScannerConfigFile(filePath: string): ScannerConfig {
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
  } catch (error) {
    throw new ConfigValidationError([`${filePath}: ${errorMessage(error)}`]);
  }
  return createScannerConfig(raw);
}

/**
 * Load from SCANNER_CONFIG_PATH when set, otherwise defaults
 */
export function loadScannerConfigFromEnv(env: NodeJS.ProcessEnv = process.env): ScannerConfig {
  const configPath = env[CONFIG_PATH_ENV];
  return configPath ? loadScannerConfigFile(configPath) : createScannerConfig();
}

export const DEFAULT_SCANNER_CONFIG: ScannerConfig = createScannerConfig();
