/**
 * Scaffold for `syslang new`
 */

import type { DeclaredPrinciple, PrincipleDefinition, SystemModel } from '@syslang/core';
import type { Library } from '@syslang/library';
import { curatedMetric } from '@syslang/hypothesis';

export const DEFAULT_SCAFFOLD_PRINCIPLES: readonly string[] = ['Modularity', 'Hierarchy'];

export const REFUTABLE_PLACEHOLDER = 'Describe an observation that would refute this model';

export interface ScaffoldOptions {
  name: string;
  domain: string;
  scale?: string;
  description?: string;
  principles?: readonly string[];
}

export function scaffoldModel(options: ScaffoldOptions, library: Library): SystemModel {
  const names = options.principles && options.principles.length > 0 ? options.principles : DEFAULT_SCAFFOLD_PRINCIPLES;

  const principles: DeclaredPrinciple[] = names.map((name) => ({
    name,
    parameters: exampleParameters(library.principle(name)),
    confidence: 1,
  }));

  const metrics = [...new Set(names.flatMap((name) => curatedMetric(name)?.metric ?? []))];

  return {
    name: options.name,
    domain: options.domain,
    scale: options.scale ?? 'unspecified',
    description: options.description ?? '',
    principles,
    components: [],
    relations: [],
    tests: metrics.length > 0 ? { refutable: REFUTABLE_PLACEHOLDER, metrics } : { refutable: REFUTABLE_PLACEHOLDER },
  };
}

/**
 * First allowed value for enumerated parameters, `<name>` for the rest
 */
function exampleParameters(definition: Readonly<PrincipleDefinition> | null): Record<string, unknown> {
  const parameters: Record<string, unknown> = {};
  for (const [param, spec] of Object.entries(definition?.parameters ?? {})) {
    parameters[param] = spec.values?.[0] ?? `<${param}>`;
  }
  return parameters;
}
