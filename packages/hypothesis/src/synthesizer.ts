/**
 * Hypothesis Synthesizer
 *
 * One hypothesis per declared principle, in declaration order, duplicates
 * included. Never throws: a principle the library does not know, or one
 * without a template, degrades to a generic statement.
 */

import {
  HypothesisTemplate,
  createLogger,
  stringifyValue,
  type DeclaredPrinciple,
  type Hypothesis,
  type PrincipleDefinition,
  type RenderedTemplate,
  type SystemModel,
} from '@syslang/core';
import type { Library } from '@syslang/library';
import { curatedMetric } from './metrics.js';

const log = createLogger('Synthesizer');

export function synthesize(model: SystemModel, library: Library): Hypothesis[] {
  return model.principles.map((principle) => synthesizeOne(principle, library));
}

export function synthesizeOne(principle: DeclaredPrinciple, library: Library): Hypothesis {
  const definition = library.principle(principle.name);
  if (!definition) {
    return fallbackHypothesis(principle.name);
  }

  const narrative =
    definition.hypothesis_template === undefined
      ? null
      : renderTemplate(principle, definition.hypothesis_template, definition);
  const curated = curatedMetric(principle.name);

  if (curated) {
    return {
      principle: principle.name,
      description: narrative?.text ?? fallbackHypothesis(principle.name).description,
      test: curated.test,
      metric: curated.metric,
      threshold: curated.threshold,
      unresolved: narrative?.unresolved ?? [],
    };
  }

  if (!narrative) {
    return fallbackHypothesis(principle.name);
  }
  return {
    principle: principle.name,
    description: narrative.text,
    unresolved: narrative.unresolved,
  };
}

export function fallbackHypothesis(name: string): Hypothesis {
  return {
    principle: name,
    description: `System should exhibit ${name} characteristics`,
    unresolved: [],
  };
}

/**
 * Declared parameters first, then the library's default threshold for
 * `{threshold}`. Anything still unresolved stays literally in the text.
 */
function renderTemplate(
  principle: DeclaredPrinciple,
  source: string,
  definition: Readonly<PrincipleDefinition>
): RenderedTemplate {
  const rendered = new HypothesisTemplate(source).render(
    (name) => (Object.hasOwn(principle.parameters, name) ? stringifyValue(principle.parameters[name]) : undefined),
    (name) =>
      name === 'threshold' && definition.default_threshold !== undefined
        ? String(definition.default_threshold)
        : undefined
  );

  if (rendered.unresolved.length > 0) {
    log.warn(`Unresolved placeholder(s) in ${principle.name} hypothesis: ${rendered.unresolved.join(', ')}`);
  }
  return rendered;
}
