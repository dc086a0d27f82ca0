import { describe, it, expect } from 'vitest';
import type { Hypothesis } from '@syslang/core';
import { render, toStructured, parseReportFormat } from '../reporter.js';
import { VERIFICATION_CHECKLIST } from '../checklist.js';

const hypotheses: Hypothesis[] = [
  {
    principle: 'Bus',
    description: 'The copper bus carries more than 0.5 of all connections',
    test: 'connection_ratio > 0.5',
    metric: 'connection_ratio',
    threshold: 0.5,
    unresolved: [],
  },
  {
    principle: 'Emergence',
    description: 'System exhibits flocking beyond component sum',
    unresolved: [],
  },
];

describe('render (structured)', () => {
  it('produces a parseable document with system, hypotheses, checklist and principles', () => {
    const parsed: unknown = JSON.parse(render('Grid', hypotheses, VERIFICATION_CHECKLIST, 'structured'));
    expect(parsed).toEqual({
      system: 'Grid',
      hypotheses: [
        {
          description: 'The copper bus carries more than 0.5 of all connections',
          test: 'connection_ratio > 0.5',
          metric: 'connection_ratio',
          threshold: 0.5,
        },
        {
          description: 'System exhibits flocking beyond component sum',
          test: null,
          metric: null,
          threshold: null,
        },
      ],
      checklist: [
        'Define measurable metrics for each principle',
        'Establish baseline measurements',
        'Test under stress conditions',
        'Validate refutability conditions',
        'Document edge cases and limitations',
      ],
      principles: ['Bus', 'Emergence'],
    });
  });

  it('keeps duplicate principles in order', () => {
    const report = toStructured('S', [hypotheses[0], hypotheses[1], hypotheses[0]], []);
    expect(report.principles).toEqual(['Bus', 'Emergence', 'Bus']);
  });
});

describe('render (narrative)', () => {
  it('renders headed sections', () => {
    const text = render('Grid', hypotheses, VERIFICATION_CHECKLIST, 'narrative');
    expect(text).toBe(
      [
        'Hypotheses for Grid',
        '===================',
        '',
        '1. [Bus] The copper bus carries more than 0.5 of all connections',
        '   Test: connection_ratio > 0.5',
        '   Metric: connection_ratio (threshold: 0.5)',
        '2. [Emergence] System exhibits flocking beyond component sum',
        '',
        'Verification checklist',
        '----------------------',
        '',
        '[ ] Define measurable metrics for each principle',
        '[ ] Establish baseline measurements',
        '[ ] Test under stress conditions',
        '[ ] Validate refutability conditions',
        '[ ] Document edge cases and limitations',
        '',
        'Next steps',
        '----------',
        '',
        '1. Collect data for every metric named above',
        '2. Run each test against the baseline measurements',
        '3. Record which hypotheses were refuted and why',
        '4. Revise the model and run the analysis again',
        '',
      ].join('\n')
    );
  });

  it('says so when nothing was declared', () => {
    const text = render('Empty', [], VERIFICATION_CHECKLIST, 'narrative');
    expect(text.split('\n').slice(0, 4)).toEqual(['Hypotheses for Empty', '====================', '', 'No principles declared.']);
  });
});

describe('parseReportFormat', () => {
  it('accepts formats and their aliases', () => {
    expect(parseReportFormat('narrative')).toBe('narrative');
    expect(parseReportFormat('TEXT')).toBe('narrative');
    expect(parseReportFormat('json')).toBe('structured');
    expect(parseReportFormat('html')).toBeUndefined();
  });
});
