/**
 * Core types for SysLang
 *
 * Library-owned definitions are described by zod schemas so the same
 * declaration serves as validator and as TypeScript type.
 */

import { z } from 'zod';

// =============================================================================
// Categories
// =============================================================================

export const CategorySchema = z.enum(['Structure', 'Operator', 'Dynamics', 'Information']);

export type Category = z.infer<typeof CategorySchema>;

// =============================================================================
// Principle Definitions (library-owned)
// =============================================================================

export const ParameterSpecSchema = z.object({
  description: z.string(),
  values: z.array(z.string()).optional(),
});

export type ParameterSpec = z.infer<typeof ParameterSpecSchema>;

export const ParameterSchemaSchema = z.record(ParameterSpecSchema);

export const PrincipleDefinitionSchema = z.object({
  description: z.string(),
  category: CategorySchema,
  parameters: ParameterSchemaSchema.optional(),
  hypothesis_template: z.string().optional(),
  default_threshold: z.union([z.number(), z.string()]).optional(),
  meta_principle: z.boolean().optional(),
  operator: z.boolean().optional(),
});

export type PrincipleDefinition = z.infer<typeof PrincipleDefinitionSchema>;

export const PatternDefinitionSchema = z.object({
  parent_principle: z.string(),
  description: z.string(),
  specific_parameters: ParameterSchemaSchema,
});

export type PatternDefinition = z.infer<typeof PatternDefinitionSchema>;

// =============================================================================
// Compatibility Rules
// =============================================================================

export const CompatibilityRelationSchema = z.enum(['compatible', 'incompatible', 'conditional']);

export type CompatibilityRelation = z.infer<typeof CompatibilityRelationSchema>;

export const CompatibilityRuleSchema = z.object({
  between: z.tuple([z.string(), z.string()]),
  relation: CompatibilityRelationSchema,
  condition: z.string().optional(),
  note: z.string().optional(),
  symmetric: z.boolean().default(true),
});

export type CompatibilityRule = z.infer<typeof CompatibilityRuleSchema>;

// =============================================================================
// System Models (document-owned)
// =============================================================================

export interface DeclaredPrinciple {
  name: string;
  parameters: Record<string, unknown>;
  confidence: number;
}

export interface ModelTests {
  refutable?: string;
  metrics?: string[];
  limits?: unknown;
  [key: string]: unknown;
}

export interface SystemModel {
  name: string;
  domain: string;
  scale: string;
  description: string;
  principles: DeclaredPrinciple[];
  /** Passed through untouched */
  components: unknown[];
  /** Passed through untouched */
  relations: unknown[];
  tests: ModelTests;
}

// =============================================================================
// Hypotheses (synthesizer output)
// =============================================================================

export interface Hypothesis {
  /** Declared principle this hypothesis was derived from */
  principle: string;
  description: string;
  test?: string;
  metric?: string;
  threshold?: number | string;
  /** Template placeholders left literally in `description` */
  unresolved: string[];
}
