/**
 * Referential integrity across the three catalogs
 *
 * The per-document schemas cannot see across documents, so references
 * (categories, pattern parents, template placeholders, rule endpoints) are
 * checked here. Every violation carries the path of the offending node.
 */

import { HypothesisTemplate, SchemaValidationError } from '@syslang/core';
import type { Catalogs } from './schemas.js';

export function checkIntegrity(catalogs: Catalogs): SchemaValidationError[] {
  return [
    ...checkCategories(catalogs),
    ...checkTemplates(catalogs),
    ...checkPatternParents(catalogs),
    ...checkRuleEndpoints(catalogs),
  ];
}

function checkCategories({ principles }: Catalogs): SchemaValidationError[] {
  const known = new Set(Object.keys(principles.categories));
  return Object.entries(principles.principles)
    .filter(([, def]) => !known.has(def.category))
    .map(
      ([name, def]) =>
        new SchemaValidationError(`Unknown category '${def.category}'`, ['principles', name, 'category'])
    );
}

function checkTemplates({ principles }: Catalogs): SchemaValidationError[] {
  const errors: SchemaValidationError[] = [];

  for (const [name, def] of Object.entries(principles.principles)) {
    if (def.hypothesis_template === undefined) continue;
    const declared = new Set(Object.keys(def.parameters ?? {}));
    const stray = new HypothesisTemplate(def.hypothesis_template)
      .placeholders()
      .filter((placeholder) => placeholder !== 'threshold' && !declared.has(placeholder));

    if (stray.length > 0) {
      errors.push(
        new SchemaValidationError(
          `Template references undeclared parameter(s): ${stray.join(', ')}`,
          ['principles', name, 'hypothesis_template'],
          stray.map((placeholder) => `{${placeholder}} is neither a parameter of ${name} nor {threshold}`)
        )
      );
    }
  }

  return errors;
}

function checkPatternParents({ principles, patterns }: Catalogs): SchemaValidationError[] {
  return Object.entries(patterns.distribution_patterns)
    .filter(([, def]) => !Object.hasOwn(principles.principles, def.parent_principle))
    .map(
      ([name, def]) =>
        new SchemaValidationError(`Parent principle '${def.parent_principle}' does not exist`, [
          'distribution_patterns',
          name,
          'parent_principle',
        ])
    );
}

function checkRuleEndpoints({ principles, patterns, compatibility }: Catalogs): SchemaValidationError[] {
  const errors: SchemaValidationError[] = [];

  compatibility.rules.forEach((rule, index) => {
    rule.between.forEach((endpoint, side) => {
      const known =
        Object.hasOwn(principles.principles, endpoint) || Object.hasOwn(patterns.distribution_patterns, endpoint);
      if (!known) {
        errors.push(
          new SchemaValidationError(`'${endpoint}' is neither a principle nor a pattern`, [
            'rules',
            index,
            'between',
            side,
          ])
        );
      }
    });
  });

  return errors;
}
