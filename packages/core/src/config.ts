/**
 * Runtime configuration
 *
 * Defaults, overridden by SYSLANG_* environment variables, overridden by
 * explicit values.
 */

import { isLogLevel, type LogLevel } from './logger.js';

export interface SysLangConfig {
  /** Directory holding principles.json, patterns.json and compatibility.json */
  dataDir?: string;
  /** Run the referential-integrity pass over the reference catalogs */
  validateLibrary: boolean;
  logLevel: LogLevel;
}

export const DEFAULT_CONFIG: SysLangConfig = {
  validateLibrary: true,
  logLevel: 'warn',
};

export type Environment = Record<string, string | undefined>;

export function resolveConfig(
  overrides: Partial<SysLangConfig> = {},
  env: Environment = process.env
): SysLangConfig {
  const fromEnv: Partial<SysLangConfig> = {};

  if (env.SYSLANG_DATA_DIR) {
    fromEnv.dataDir = env.SYSLANG_DATA_DIR;
  }
  const validateFlag = env.SYSLANG_VALIDATE_LIBRARY?.trim().toLowerCase();
  if (validateFlag) {
    fromEnv.validateLibrary = !['false', '0', 'no', 'off'].includes(validateFlag);
  }
  const level = env.SYSLANG_LOG_LEVEL?.trim().toLowerCase();
  if (level && isLogLevel(level)) {
    fromEnv.logLevel = level;
  }

  return {
    dataDir: overrides.dataDir ?? fromEnv.dataDir ?? DEFAULT_CONFIG.dataDir,
    validateLibrary: overrides.validateLibrary ?? fromEnv.validateLibrary ?? DEFAULT_CONFIG.validateLibrary,
    logLevel: overrides.logLevel ?? fromEnv.logLevel ?? DEFAULT_CONFIG.logLevel,
  };
}
