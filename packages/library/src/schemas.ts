/**
 * Catalog schemas
 *
 * One schema per reference document. These are the companions the Schema
 * Validator checks the bundled data against before anything is served.
 */

import { z } from 'zod';
import {
  PrincipleDefinitionSchema,
  PatternDefinitionSchema,
  CompatibilityRuleSchema,
} from '@syslang/core';

export const PrinciplesCatalogSchema = z.object({
  categories: z.record(z.string()),
  principles: z.record(PrincipleDefinitionSchema),
});

export type PrinciplesCatalog = z.infer<typeof PrinciplesCatalogSchema>;

export const PatternsCatalogSchema = z.object({
  distribution_patterns: z.record(PatternDefinitionSchema),
});

export type PatternsCatalog = z.infer<typeof PatternsCatalogSchema>;

export const CompatibilityCatalogSchema = z.object({
  rules: z.array(CompatibilityRuleSchema),
});

export type CompatibilityCatalog = z.infer<typeof CompatibilityCatalogSchema>;

export interface Catalogs {
  principles: PrinciplesCatalog;
  patterns: PatternsCatalog;
  compatibility: CompatibilityCatalog;
}
