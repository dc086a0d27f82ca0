/**
 * @syslang/library - Reference library of principles, distribution
 * patterns and compatibility rules
 */
export { Library, type CategoryEntry, type LibrarySummary } from './store.js';
export {
  loadLibrary,
  buildLibrary,
  validateCatalogs,
  defaultDataDir,
  CATALOG_FILES,
  type LoadLibraryOptions,
  type CatalogDocuments,
  type CatalogReport,
} from './loader.js';
export { checkIntegrity } from './integrity.js';
export {
  PrinciplesCatalogSchema,
  PatternsCatalogSchema,
  CompatibilityCatalogSchema,
  type PrinciplesCatalog,
  type PatternsCatalog,
  type CompatibilityCatalog,
  type Catalogs,
} from './schemas.js';
