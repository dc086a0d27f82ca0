/**
 * @syslang/cli - Command-line front end
 */
export { run, EXIT_OK, EXIT_FAILURE, EXIT_USAGE, type CliIO } from './cli.js';
export { parseArgs, option, UsageError, type ParsedArgs } from './args.js';
export { scaffoldModel, DEFAULT_SCAFFOLD_PRINCIPLES, REFUTABLE_PLACEHOLDER, type ScaffoldOptions } from './scaffold.js';
export { readText, writeText } from './io.js';
