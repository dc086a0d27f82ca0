/**
 * Cross-reference a model against the reference library
 *
 * Nothing here is fatal to loading; findings are for the author.
 */

import { formatPath, stringifyValue, type SystemModel } from '@syslang/core';
import type { Library } from '@syslang/library';

export type FindingSeverity = 'error' | 'warning' | 'info';

export interface Finding {
  severity: FindingSeverity;
  /** JSON path into the model document */
  path: string;
  message: string;
}

export function crossReference(model: SystemModel, library: Library): Finding[] {
  const findings: Finding[] = [];

  model.principles.forEach((principle, index) => {
    const at = (...rest: Array<string | number>) => formatPath(['principles', index, ...rest]);

    if (principle.confidence < 0 || principle.confidence > 1) {
      findings.push({
        severity: 'error',
        path: at('confidence'),
        message: `Confidence ${principle.confidence} is outside [0, 1]`,
      });
    }

    const definition = library.principle(principle.name);
    if (!definition) {
      findings.push({
        severity: 'warning',
        path: at('name'),
        message: `Principle '${principle.name}' is not defined in the library`,
      });
      return;
    }

    const schema = definition.parameters ?? {};
    for (const [param, value] of Object.entries(principle.parameters)) {
      const spec = Object.hasOwn(schema, param) ? schema[param] : undefined;
      if (!spec) {
        findings.push({
          severity: 'warning',
          path: at('parameters', param),
          message: `'${param}' is not a parameter of ${principle.name}`,
        });
        continue;
      }
      if (spec.values && !spec.values.includes(stringifyValue(value))) {
        findings.push({
          severity: 'warning',
          path: at('parameters', param),
          message: `'${stringifyValue(value)}' is not one of: ${spec.values.join(', ')}`,
        });
      }
    }
  });

  findings.push(...pairFindings(model, library));

  if (!model.tests.refutable) {
    findings.push({
      severity: 'warning',
      path: formatPath(['tests', 'refutable']),
      message: 'Model declares no refutable statement',
    });
  }

  return findings;
}

/**
 * Incompatible and conditional pairs among the declared principles,
 * each unordered pair reported once
 */
function pairFindings(model: SystemModel, library: Library): Finding[] {
  const findings: Finding[] = [];
  const names = [...new Set(model.principles.map((p) => p.name))];

  for (let i = 0; i < names.length; i++) {
    for (let j = i + 1; j < names.length; j++) {
      const rule = library.compatibility(names[i], names[j]) ?? library.compatibility(names[j], names[i]);
      if (!rule || rule.relation === 'compatible') continue;

      const [a, b] = rule.between;
      const path = formatPath(['principles']);
      if (rule.relation === 'incompatible') {
        findings.push({
          severity: 'warning',
          path,
          message: `${a} and ${b} are incompatible${rule.note ? `: ${rule.note}` : ''}`,
        });
      } else {
        findings.push({
          severity: 'info',
          path,
          message: `${a} and ${b} are compatible only conditionally${rule.condition ? `: ${rule.condition}` : ''}`,
        });
      }
    }
  }

  return findings;
}
