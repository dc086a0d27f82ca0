/**
 * Model document schemas
 *
 * Two views of the same document:
 * - ModelDocumentSchema is strict and used by `check` to tell authors what
 *   is wrong with their model.
 * - The *Defaults schemas are tolerant: every field falls back to its
 *   declared default, so normalization never fails on optional metadata.
 */

import { z } from 'zod';

// =============================================================================
// Strict (authoring feedback)
// =============================================================================

export const ModelDocumentSchema = z.object({
  system: z.object({
    name: z.string(),
    domain: z.string(),
    scale: z.string(),
    description: z.string(),
  }),
  principles: z
    .array(
      z.object({
        name: z.string(),
        parameters: z.record(z.unknown()).optional(),
        confidence: z.number().min(0).max(1).optional(),
      })
    )
    .optional(),
  components: z.array(z.unknown()).optional(),
  relations: z.array(z.unknown()).optional(),
  tests: z
    .object({
      refutable: z.string().optional(),
      metrics: z.array(z.string()).optional(),
      limits: z.unknown().optional(),
    })
    .passthrough()
    .optional(),
});

export type ModelDocument = z.infer<typeof ModelDocumentSchema>;

// =============================================================================
// Tolerant (normalization)
// =============================================================================

export const MODEL_DEFAULTS = {
  name: 'Unnamed System',
  domain: 'unspecified',
  scale: 'unspecified',
  description: '',
  confidence: 1.0,
} as const;

const scalarText = z.union([z.string(), z.number(), z.boolean()]).transform(String);

export const SystemSectionDefaults = z.object({
  name: scalarText.catch(MODEL_DEFAULTS.name),
  domain: scalarText.catch(MODEL_DEFAULTS.domain),
  scale: scalarText.catch(MODEL_DEFAULTS.scale),
  description: scalarText.catch(MODEL_DEFAULTS.description),
});

export const DeclaredPrincipleDefaults = z.object({
  name: scalarText,
  parameters: z.record(z.unknown()).catch({}),
  confidence: z.number().catch(MODEL_DEFAULTS.confidence),
});

export const ModelTestsDefaults = z
  .object({
    refutable: z.string().optional().catch(undefined),
    metrics: z.array(z.string()).optional().catch(undefined),
    limits: z.unknown().optional(),
  })
  .passthrough()
  .catch({});

export const ModelSectionsDefaults = z.object({
  principles: z.array(z.unknown()).catch([]),
  components: z.array(z.unknown()).catch([]),
  relations: z.array(z.unknown()).catch([]),
  tests: ModelTestsDefaults,
});
