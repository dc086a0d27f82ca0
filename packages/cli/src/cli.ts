/**
 * SysLang command-line interface
 *
 * Commands:
 * - check <file>            validate a model and cross-reference it
 * - analyze <file>          synthesize hypotheses and print a report
 * - principles [name]       browse the principle library
 * - patterns [name]         browse distribution patterns
 * - compat <a> <b>          look up a compatibility rule
 * - new                     write a scaffold model
 * - validate-library        validate the reference catalogs
 */

import {
  DataLoadError,
  DocumentSyntaxError,
  VERSION,
  formatPath,
  isLogLevel,
  resolveConfig,
  setLogLevel,
  validateAll,
  type Environment,
  type ResourceNotFoundError,
  type Result,
  type SchemaValidationError,
  type SysLangConfig,
} from '@syslang/core';
import { loadLibrary, validateCatalogs, defaultDataDir, type Library } from '@syslang/library';
import {
  ModelDocumentSchema,
  crossReference,
  loadModel,
  normalizeModel,
  parseDocument,
  saveModel,
  type Finding,
} from '@syslang/model';
import { synthesize } from '@syslang/hypothesis';
import { render, parseReportFormat, VERIFICATION_CHECKLIST } from '@syslang/report';
import { parseArgs, option, UsageError, type ParsedArgs } from './args.js';
import { readText, writeText } from './io.js';
import { scaffoldModel } from './scaffold.js';

// =============================================================================
// IO
// =============================================================================

export interface CliIO {
  out: (line: string) => void;
  err: (line: string) => void;
  readText: (file: string) => Result<string, ResourceNotFoundError>;
  writeText: (file: string, text: string) => void;
  env: Environment;
}

const DEFAULT_IO: CliIO = {
  out: (line) => console.log(line),
  err: (line) => console.error(line),
  readText,
  writeText,
  env: process.env,
};

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_USAGE = 2;

const DEFAULT_MODEL_FILE = 'system.syslang.yml';

const USAGE = `Usage: syslang <command> [options]

Commands:
  check <file>                 Validate a SysLang model file
  analyze <file>               Analyze a system using the principle library
      -o, --output <format>    narrative | structured (aliases: text, json)
  principles [name]            List principles, or show one
  patterns [name]              List distribution patterns, or show one
  compat <a> <b>               Show the compatibility rule between two entries
  new                          Create a new model
      --name <name> --domain <domain> [--scale <scale>] [--description <text>]
      [--principle <name>]...  [-o, --output <file>]
  validate-library             Validate the reference catalogs

Options:
  --data-dir <dir>             Reference library directory
  --no-validate                Skip cross-catalog reference checks
  --log-level <level>          debug | info | warn | error | silent
  -V, --version                Print the version
  -h, --help                   Print this help`;

interface CommandContext {
  args: ParsedArgs;
  config: SysLangConfig;
  io: CliIO;
  library: () => Library;
}

type Command = (ctx: CommandContext) => number;

const COMMANDS: Readonly<Record<string, Command>> = {
  check: runCheck,
  analyze: runAnalyze,
  principles: runPrinciples,
  patterns: runPatterns,
  compat: runCompat,
  new: runNew,
  'validate-library': runValidateLibrary,
};

// =============================================================================
// Entry
// =============================================================================

export function run(argv: readonly string[], io: Partial<CliIO> = {}): number {
  const cli: CliIO = { ...DEFAULT_IO, ...io };

  let args: ParsedArgs;
  try {
    args = parseArgs(argv);
  } catch (error) {
    if (error instanceof UsageError) {
      cli.err(error.message);
      cli.err(USAGE);
      return EXIT_USAGE;
    }
    throw error;
  }

  if (args.flags.has('version')) {
    cli.out(`syslang ${VERSION}`);
    return EXIT_OK;
  }
  if (args.flags.has('help')) {
    cli.out(USAGE);
    return EXIT_OK;
  }
  const [name] = args.positionals;
  if (name === undefined) {
    cli.err(USAGE);
    return EXIT_USAGE;
  }

  const command = Object.hasOwn(COMMANDS, name) ? COMMANDS[name] : undefined;
  if (!command) {
    cli.err(`Unknown command: ${name}`);
    cli.err(USAGE);
    return EXIT_USAGE;
  }

  const logLevel = option(args, 'log-level');
  if (logLevel !== undefined && !isLogLevel(logLevel)) {
    cli.err(`Unknown log level: ${logLevel}`);
    return EXIT_USAGE;
  }

  const config = resolveConfig(
    {
      dataDir: option(args, 'data-dir'),
      validateLibrary: args.flags.has('no-validate') ? false : undefined,
      logLevel,
    },
    cli.env
  );
  setLogLevel(config.logLevel);

  let library: Library | undefined;
  const ctx: CommandContext = {
    args: { ...args, positionals: args.positionals.slice(1) },
    config,
    io: cli,
    library: () => (library ??= loadLibrary({ dataDir: config.dataDir, validate: config.validateLibrary })),
  };

  try {
    return command(ctx);
  } catch (error) {
    if (error instanceof DataLoadError) {
      cli.err(`❌ Reference library failed to load: ${error.message}`);
      return EXIT_FAILURE;
    }
    if (error instanceof UsageError) {
      cli.err(error.message);
      return EXIT_USAGE;
    }
    throw error;
  }
}

// =============================================================================
// check
// =============================================================================

function runCheck({ args, io, library }: CommandContext): number {
  const file = requirePositional(args, 0, 'check <file>');
  const text = io.readText(file);
  if (!text.ok) {
    io.err(`❌ ${text.error.message}`);
    return EXIT_FAILURE;
  }

  const tree = parseDocument(text.value, file);
  if (!tree.ok) {
    io.err(`❌ ${describeSyntaxError(tree.error)}`);
    return EXIT_FAILURE;
  }

  let failed = false;
  const schema = validateAll(tree.value, ModelDocumentSchema);
  if (!schema.ok) {
    failed = true;
    io.out(`❌ ${file} does not match the model schema:`);
    schema.error.forEach((error) => printSchemaError(io, error));
  }

  const model = normalizeModel(tree.value, file);
  if (!model.ok) {
    io.err(`❌ ${model.error.message}`);
    return EXIT_FAILURE;
  }

  const findings = crossReference(model.value, library());
  findings.forEach((finding) => io.out(formatFinding(finding)));
  failed ||= findings.some((finding) => finding.severity === 'error');

  if (failed) {
    io.out(`❌ ${file} has errors`);
    return EXIT_FAILURE;
  }
  io.out(`✅ ${file} is valid (${model.value.principles.length} principles)`);
  return EXIT_OK;
}

const FINDING_ICONS: Readonly<Record<Finding['severity'], string>> = {
  error: '❌',
  warning: '⚠️ ',
  info: 'ℹ️ ',
};

function formatFinding(finding: Finding): string {
  return `${FINDING_ICONS[finding.severity]} ${finding.path}: ${finding.message}`;
}

// =============================================================================
// analyze
// =============================================================================

function runAnalyze({ args, io, library }: CommandContext): number {
  const file = requirePositional(args, 0, 'analyze <file>');
  const formatName = option(args, 'output') ?? 'narrative';
  const format = parseReportFormat(formatName);
  if (!format) {
    throw new UsageError(`Unknown output format: ${formatName}`);
  }

  const text = io.readText(file);
  if (!text.ok) {
    io.err(`❌ ${text.error.message}`);
    return EXIT_FAILURE;
  }

  const model = loadModel(text.value, file);
  if (!model.ok) {
    const error = model.error;
    io.err(`❌ ${error instanceof DocumentSyntaxError ? describeSyntaxError(error) : error.message}`);
    return EXIT_FAILURE;
  }

  const hypotheses = synthesize(model.value, library());
  io.out(render(model.value.name, hypotheses, VERIFICATION_CHECKLIST, format).trimEnd());
  return EXIT_OK;
}

// =============================================================================
// principles / patterns / compat
// =============================================================================

const ICON_META = '🔄 ';
const ICON_OPERATOR = '⚙️ ';
const ICON_PLAIN = '• ';

function runPrinciples({ args, io, library }: CommandContext): number {
  const lib = library();
  const [name] = args.positionals;

  if (name === undefined) {
    io.out('Available Principles:');
    for (const { category, description } of lib.categories()) {
      io.out('');
      io.out(`${category}: ${description}`);
      for (const principle of lib.principlesInCategory(category)) {
        const info = lib.principle(principle);
        const icon = info?.meta_principle ? ICON_META : info?.operator ? ICON_OPERATOR : ICON_PLAIN;
        io.out(`  ${icon}${principle}`);
      }
    }
    return EXIT_OK;
  }

  const info = lib.principle(name);
  if (!info) {
    io.err(`❌ Principle '${name}' not found`);
    return EXIT_FAILURE;
  }

  io.out('');
  io.out(name);
  io.out(`Description: ${info.description}`);
  io.out(`Category: ${info.category}`);
  if (info.parameters && Object.keys(info.parameters).length > 0) {
    io.out('');
    io.out('Parameters:');
    for (const [param, spec] of Object.entries(info.parameters)) {
      io.out(`  • ${param}: ${spec.description}`);
      if (spec.values) {
        io.out(`    Values: ${spec.values.join(', ')}`);
      }
    }
  }
  if (info.hypothesis_template !== undefined) {
    io.out('');
    io.out(`Hypothesis template: ${info.hypothesis_template}`);
    if (info.default_threshold !== undefined) {
      io.out(`Default threshold: ${info.default_threshold}`);
    }
  }
  const patterns = lib.patternsOf(name);
  if (patterns.length > 0) {
    io.out('');
    io.out(`Distribution patterns: ${patterns.join(', ')}`);
  }
  return EXIT_OK;
}

function runPatterns({ args, io, library }: CommandContext): number {
  const lib = library();
  const [name] = args.positionals;

  if (name === undefined) {
    io.out('Distribution Patterns:');
    for (const pattern of lib.patternNames()) {
      io.out('');
      io.out(`• ${pattern}: ${lib.pattern(pattern)?.description ?? ''}`);
    }
    return EXIT_OK;
  }

  const info = lib.pattern(name);
  if (!info) {
    io.err(`❌ Pattern '${name}' not found`);
    return EXIT_FAILURE;
  }

  io.out('');
  io.out(`📊 Distribution Pattern: ${name}`);
  io.out(`Description: ${info.description}`);
  io.out(`Parent principle: ${info.parent_principle}`);
  io.out('');
  io.out('Specific Parameters:');
  for (const [param, spec] of Object.entries(info.specific_parameters)) {
    io.out(`  • ${param}: ${spec.description}`);
  }
  return EXIT_OK;
}

function runCompat({ args, io, library }: CommandContext): number {
  const a = requirePositional(args, 0, 'compat <a> <b>');
  const b = requirePositional(args, 1, 'compat <a> <b>');
  const lib = library();

  for (const name of [a, b]) {
    if (!lib.principle(name) && !lib.pattern(name)) {
      io.err(`❌ '${name}' is neither a principle nor a pattern`);
      return EXIT_FAILURE;
    }
  }

  const rule = lib.compatibility(a, b);
  if (!rule) {
    io.out(`No compatibility rule relates ${a} and ${b}`);
    return EXIT_OK;
  }

  io.out(`${a} / ${b}: ${rule.relation}`);
  if (rule.condition) io.out(`Condition: ${rule.condition}`);
  if (rule.note) io.out(`Note: ${rule.note}`);
  return EXIT_OK;
}

// =============================================================================
// new
// =============================================================================

function runNew({ args, io, library }: CommandContext): number {
  const name = option(args, 'name');
  const domain = option(args, 'domain');
  if (!name || !domain) {
    throw new UsageError('new requires --name and --domain');
  }

  const lib = library();
  const principles = args.options.get('principle') ?? [];
  for (const principle of principles) {
    if (!lib.principle(principle)) {
      io.err(`⚠️  Principle '${principle}' is not in the library; added without parameters`);
    }
  }

  const model = scaffoldModel(
    { name, domain, scale: option(args, 'scale'), description: option(args, 'description'), principles },
    lib
  );
  const output = option(args, 'output') ?? DEFAULT_MODEL_FILE;
  io.writeText(output, saveModel(model));
  io.out(`✅ Created ${output}`);
  return EXIT_OK;
}

// =============================================================================
// validate-library
// =============================================================================

function runValidateLibrary({ config, io }: CommandContext): number {
  const rule = '='.repeat(50);
  io.out('🔍 Validating SysLang data files...');
  io.out(rule);

  let allValid = true;
  for (const report of validateCatalogs(config.dataDir ?? defaultDataDir())) {
    if (report.loadError !== undefined) {
      allValid = false;
      io.out(`⚠️  ${report.loadError}`);
    } else if (report.errors.length > 0) {
      allValid = false;
      io.out(`❌ ${report.file} validation error:`);
      report.errors.forEach((error) => printSchemaError(io, error));
    } else {
      io.out(`✅ ${report.file} is valid`);
    }
  }

  io.out(rule);
  if (allValid) {
    io.out('🎉 All files are valid!');
    return EXIT_OK;
  }
  io.out('❌ Some files failed validation');
  return EXIT_FAILURE;
}

// =============================================================================
// Helpers
// =============================================================================

function requirePositional(args: ParsedArgs, index: number, usage: string): string {
  const value = args.positionals[index];
  if (value === undefined) {
    throw new UsageError(`Usage: syslang ${usage}`);
  }
  return value;
}

function printSchemaError(io: CliIO, error: SchemaValidationError): void {
  io.out(`   Path: ${formatPath(error.path)}`);
  io.out(`   Error: ${error.message}`);
  for (const context of error.context) {
    io.out(`   Context: ${context}`);
  }
}

function describeSyntaxError(error: DocumentSyntaxError): string {
  const position = error.line === undefined ? '' : `:${error.line}:${error.column ?? 0}`;
  return `${error.origin}${position} syntax error: ${error.message}`;
}
