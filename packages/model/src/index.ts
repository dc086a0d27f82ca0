/**
 * @syslang/model - Loading, normalizing and saving system models
 */
export {
  loadModel,
  saveModel,
  parseDocument,
  normalizeModel,
  isMapping,
  type ModelLoadError,
} from './loader.js';
export {
  ModelDocumentSchema,
  MODEL_DEFAULTS,
  SystemSectionDefaults,
  DeclaredPrincipleDefaults,
  ModelSectionsDefaults,
  type ModelDocument,
} from './schema.js';
export { crossReference, type Finding, type FindingSeverity } from './cross-reference.js';
