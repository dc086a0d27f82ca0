/**
 * Model Loader/Normalizer
 *
 * text --parse--> tree --normalize--> SystemModel
 *
 * Entries under `principles` without a `name` are skipped rather than
 * rejected; models are often loaded half-written. Declaration order is
 * kept and repeated names are not merged.
 */

import { parse, stringify, YAMLParseError } from 'yaml';
import {
  DocumentSyntaxError,
  ModelError,
  createLogger,
  err,
  flatMap,
  ok,
  type DeclaredPrinciple,
  type Result,
  type SystemModel,
} from '@syslang/core';
import {
  DeclaredPrincipleDefaults,
  MODEL_DEFAULTS,
  ModelSectionsDefaults,
  SystemSectionDefaults,
} from './schema.js';

const log = createLogger('Model');

export type ModelLoadError = ModelError | DocumentSyntaxError;

const DEFAULT_ORIGIN = '<input>';

/**
 * Parse document text into a structured tree. Anything the parser rejects,
 * including unresolved or excessive aliases, is a syntax error; only
 * YAMLParseError carries a position.
 */
export function parseDocument(text: string, origin: string = DEFAULT_ORIGIN): Result<unknown, DocumentSyntaxError> {
  try {
    return ok(parse(text));
  } catch (error) {
    if (error instanceof YAMLParseError) {
      const [start] = error.linePos ?? [];
      return err(new DocumentSyntaxError(error.message, origin, start?.line, start?.col));
    }
    const message = error instanceof Error ? error.message : String(error);
    return err(new DocumentSyntaxError(message, origin));
  }
}

/**
 * Build the canonical model from a parsed tree
 */
export function normalizeModel(tree: unknown, origin: string = DEFAULT_ORIGIN): Result<SystemModel, ModelError> {
  if (!isMapping(tree)) {
    return err(new ModelError('NotAMapping', origin));
  }

  const system = tree.system;
  if (!isMapping(system) || Object.keys(system).length === 0) {
    return err(new ModelError('MissingSystemSection', origin));
  }

  const meta = SystemSectionDefaults.parse(system);
  const sections = ModelSectionsDefaults.parse(tree);
  const principles = collectPrinciples(sections.principles, origin);

  return ok({
    ...meta,
    principles,
    components: sections.components,
    relations: sections.relations,
    tests: sections.tests,
  });
}

export function loadModel(text: string, origin: string = DEFAULT_ORIGIN): Result<SystemModel, ModelLoadError> {
  return flatMap(parseDocument(text, origin), (tree) => normalizeModel(tree, origin));
}

/**
 * Serialize a model back to document text. Empty sections are left out,
 * as is a confidence equal to the default.
 */
export function saveModel(model: SystemModel): string {
  const document: Record<string, unknown> = {
    system: {
      name: model.name,
      domain: model.domain,
      scale: model.scale,
      description: model.description,
    },
  };

  if (model.principles.length > 0) {
    document.principles = model.principles.map(principleEntry);
  }
  if (model.components.length > 0) {
    document.components = model.components;
  }
  if (model.relations.length > 0) {
    document.relations = model.relations;
  }
  if (Object.keys(model.tests).length > 0) {
    document.tests = model.tests;
  }

  return stringify(document);
}

function principleEntry(principle: DeclaredPrinciple): Record<string, unknown> {
  const entry: Record<string, unknown> = { name: principle.name };
  if (Object.keys(principle.parameters).length > 0) {
    entry.parameters = principle.parameters;
  }
  if (principle.confidence !== MODEL_DEFAULTS.confidence) {
    entry.confidence = principle.confidence;
  }
  return entry;
}

function collectPrinciples(entries: unknown[], origin: string): DeclaredPrinciple[] {
  const principles: DeclaredPrinciple[] = [];

  entries.forEach((entry, index) => {
    const parsed = isMapping(entry) ? DeclaredPrincipleDefaults.safeParse(entry) : null;
    if (!parsed?.success) {
      log.debug(`Skipping principles[${index}] without a name`, { origin });
      return;
    }
    principles.push(parsed.data);
  });

  return principles;
}

export function isMapping(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
