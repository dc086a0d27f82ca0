/**
 * Reporter
 *
 * Pure projection of synthesized hypotheses into text. Order and content
 * of the hypotheses are never altered.
 */

import type { Hypothesis } from '@syslang/core';
import { NEXT_STEPS } from './checklist.js';

export type ReportFormat = 'narrative' | 'structured';

const FORMAT_ALIASES: Readonly<Record<string, ReportFormat>> = {
  narrative: 'narrative',
  text: 'narrative',
  structured: 'structured',
  json: 'structured',
};

export function parseReportFormat(value: string): ReportFormat | undefined {
  const key = value.trim().toLowerCase();
  return Object.hasOwn(FORMAT_ALIASES, key) ? FORMAT_ALIASES[key] : undefined;
}

export interface StructuredHypothesis {
  description: string;
  test: string | null;
  metric: string | null;
  threshold: number | string | null;
}

export interface StructuredReport {
  system: string;
  hypotheses: StructuredHypothesis[];
  checklist: string[];
  principles: string[];
}

export function render(
  systemName: string,
  hypotheses: readonly Hypothesis[],
  checklist: readonly string[],
  format: ReportFormat
): string {
  return format === 'structured'
    ? JSON.stringify(toStructured(systemName, hypotheses, checklist), null, 2)
    : renderNarrative(systemName, hypotheses, checklist);
}

export function toStructured(
  systemName: string,
  hypotheses: readonly Hypothesis[],
  checklist: readonly string[]
): StructuredReport {
  return {
    system: systemName,
    hypotheses: hypotheses.map((h) => ({
      description: h.description,
      test: h.test ?? null,
      metric: h.metric ?? null,
      threshold: h.threshold ?? null,
    })),
    checklist: [...checklist],
    principles: hypotheses.map((h) => h.principle),
  };
}

// =============================================================================
// Narrative
// =============================================================================

function renderNarrative(systemName: string, hypotheses: readonly Hypothesis[], checklist: readonly string[]): string {
  const lines: string[] = [...heading(`Hypotheses for ${systemName}`, '=')];

  if (hypotheses.length === 0) {
    lines.push('No principles declared.');
  }
  hypotheses.forEach((h, index) => {
    lines.push(`${index + 1}. [${h.principle}] ${h.description}`);
    if (h.test !== undefined) {
      lines.push(`   Test: ${h.test}`);
    }
    if (h.metric !== undefined) {
      const threshold = h.threshold === undefined ? '' : ` (threshold: ${h.threshold})`;
      lines.push(`   Metric: ${h.metric}${threshold}`);
    }
  });

  lines.push('', ...heading('Verification checklist', '-'));
  for (const item of checklist) {
    lines.push(`[ ] ${item}`);
  }

  lines.push('', ...heading('Next steps', '-'));
  NEXT_STEPS.forEach((step, index) => lines.push(`${index + 1}. ${step}`));

  return `${lines.join('\n')}\n`;
}

function heading(title: string, rule: '=' | '-'): string[] {
  return [title, rule.repeat(title.length), ''];
}
