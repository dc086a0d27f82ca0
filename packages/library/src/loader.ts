/**
 * Library loading
 *
 * Reads the three catalog documents, validates each against its schema and,
 * when enabled, checks references across them. Any failure is fatal and
 * surfaces as a DataLoadError naming the catalog.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import { fileURLToPath } from 'node:url';
import type { z } from 'zod';
import {
  DataLoadError,
  SchemaValidationError,
  createLogger,
  validate,
  type CatalogName,
} from '@syslang/core';
import {
  PrinciplesCatalogSchema,
  PatternsCatalogSchema,
  CompatibilityCatalogSchema,
  type Catalogs,
} from './schemas.js';
import { checkIntegrity } from './integrity.js';
import { Library } from './store.js';

const log = createLogger('Library');

export const CATALOG_FILES: Readonly<Record<CatalogName, string>> = {
  principles: 'principles.json',
  patterns: 'patterns.json',
  compatibility: 'compatibility.json',
};

export interface LoadLibraryOptions {
  /** Defaults to the data bundled with this package */
  dataDir?: string;
  /** Check references across catalogs (default true) */
  validate?: boolean;
}

export type CatalogDocuments = Record<CatalogName, unknown>;

export function defaultDataDir(): string {
  return fileURLToPath(new URL('../data/', import.meta.url));
}

/**
 * Load and validate the library from disk
 */
export function loadLibrary(options: LoadLibraryOptions = {}): Library {
  const dataDir = options.dataDir ?? defaultDataDir();
  const documents: CatalogDocuments = {
    principles: readCatalog(dataDir, 'principles'),
    patterns: readCatalog(dataDir, 'patterns'),
    compatibility: readCatalog(dataDir, 'compatibility'),
  };
  const library = buildLibrary(documents, options);

  const summary = library.summary();
  log.info(`Loaded ${summary.principles} principles, ${summary.patterns} patterns, ${summary.rules} rules`, {
    dataDir,
  });
  return library;
}

/**
 * Build a library from already-parsed catalog documents
 */
export function buildLibrary(documents: CatalogDocuments, options: Pick<LoadLibraryOptions, 'validate'> = {}): Library {
  const catalogs: Catalogs = {
    principles: parseCatalog(documents.principles, 'principles', PrinciplesCatalogSchema),
    patterns: parseCatalog(documents.patterns, 'patterns', PatternsCatalogSchema),
    compatibility: parseCatalog(documents.compatibility, 'compatibility', CompatibilityCatalogSchema),
  };

  if (options.validate ?? true) {
    const [first] = checkIntegrity(catalogs);
    if (first) {
      const catalog = catalogOfPath(first);
      throw new DataLoadError(`${CATALOG_FILES[catalog]} failed validation at ${first.jsonPath}: ${first.message}`, catalog, first);
    }
  } else {
    log.warn('Reference integrity checks disabled');
  }

  return new Library(catalogs);
}

function parseCatalog<S extends z.ZodTypeAny>(document: unknown, catalog: CatalogName, schema: S): z.output<S> {
  const result = validate(document, schema);
  if (!result.ok) {
    const error = result.error;
    throw new DataLoadError(
      `${CATALOG_FILES[catalog]} failed validation at ${error.jsonPath}: ${error.message}`,
      catalog,
      error
    );
  }
  return result.value;
}

function readCatalog(dataDir: string, catalog: CatalogName): unknown {
  const file = path.join(dataDir, CATALOG_FILES[catalog]);
  let text: string;
  try {
    text = fs.readFileSync(file, 'utf-8');
  } catch (error) {
    throw new DataLoadError(`${CATALOG_FILES[catalog]} not found in ${dataDir}`, catalog, asError(error));
  }

  try {
    return JSON.parse(text);
  } catch (error) {
    throw new DataLoadError(`${CATALOG_FILES[catalog]} is not valid JSON: ${asError(error).message}`, catalog, asError(error));
  }
}

function catalogOfPath(error: SchemaValidationError): CatalogName {
  switch (error.path[0]) {
    case 'distribution_patterns':
      return 'patterns';
    case 'rules':
      return 'compatibility';
    default:
      return 'principles';
  }
}

function asError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

// =============================================================================
// Catalog Reports (validate-library)
// =============================================================================

export interface CatalogReport {
  catalog: CatalogName;
  file: string;
  /** Missing or unparsable file */
  loadError?: string;
  errors: SchemaValidationError[];
}

/**
 * Validate every catalog in `dataDir` without stopping at the first failure
 */
export function validateCatalogs(dataDir: string = defaultDataDir()): CatalogReport[] {
  const reports: CatalogReport[] = [];
  const principles = inspectCatalog(dataDir, 'principles', PrinciplesCatalogSchema, reports);
  const patterns = inspectCatalog(dataDir, 'patterns', PatternsCatalogSchema, reports);
  const compatibility = inspectCatalog(dataDir, 'compatibility', CompatibilityCatalogSchema, reports);

  if (principles && patterns && compatibility) {
    for (const error of checkIntegrity({ principles, patterns, compatibility })) {
      const owner = reports.find((report) => report.catalog === catalogOfPath(error));
      owner?.errors.push(error);
    }
  }

  return reports;
}

function inspectCatalog<S extends z.ZodTypeAny>(
  dataDir: string,
  catalog: CatalogName,
  schema: S,
  reports: CatalogReport[]
): z.output<S> | null {
  const report: CatalogReport = { catalog, file: CATALOG_FILES[catalog], errors: [] };
  reports.push(report);

  let document: unknown;
  try {
    document = readCatalog(dataDir, catalog);
  } catch (error) {
    report.loadError = asError(error).message;
    return null;
  }

  const result = validate(document, schema);
  if (!result.ok) {
    report.errors.push(result.error);
    return null;
  }
  return result.value;
}
