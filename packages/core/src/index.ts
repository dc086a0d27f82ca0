/**
 * @syslang/core - Shared primitives for SysLang
 *
 * - Types: library definitions, system models, hypotheses
 * - Result/Option and the error kinds
 * - Schema validation, template tokenizing, logging, configuration
 */

export const VERSION = '1.0.0';

export * from './types.js';
export * from './result.js';
export * from './errors.js';
export * from './validator.js';
export * from './template.js';
export * from './logger.js';
export * from './config.js';
