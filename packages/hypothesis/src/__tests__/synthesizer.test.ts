import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { setLogSink, type LogSink, type DeclaredPrinciple, type SystemModel } from '@syslang/core';
import { buildLibrary } from '@syslang/library';
import { synthesize, synthesizeOne } from '../synthesizer.js';

const library = buildLibrary({
  principles: {
    categories: { Structure: 'Arrangement', Dynamics: 'Change', Operator: 'Transformations' },
    principles: {
      Modularity: {
        description: 'Modules',
        category: 'Structure',
        parameters: { granularity: { description: 'Size' } },
        hypothesis_template: '{granularity} modules above {threshold}',
        default_threshold: 0.3,
      },
      Bus: {
        description: 'Shared channel',
        category: 'Structure',
        hypothesis_template: 'Bus carries over {threshold}',
        default_threshold: 0.5,
      },
      Hierarchy: { description: 'Levels', category: 'Structure' },
      Boundary: { description: 'Membrane', category: 'Structure' },
      Emergence: {
        description: 'Whole exceeds parts',
        category: 'Dynamics',
        parameters: { behavior: { description: 'Behaviour' } },
        hypothesis_template: 'System exhibits {behavior} beyond component sum',
      },
      Feedback: {
        description: 'Loops',
        category: 'Operator',
        parameters: { sign: { description: 'Sign' }, delay: { description: 'Delay' } },
        hypothesis_template: 'A {sign} loop with delay {delay}',
      },
      Filter: {
        description: 'Selection',
        category: 'Operator',
        parameters: { criterion: { description: 'Criterion' } },
        hypothesis_template: 'Rejects {threshold} of {criterion}',
      },
    },
  },
  patterns: { distribution_patterns: {} },
  compatibility: { rules: [] },
});

function declared(name: string, parameters: Record<string, unknown> = {}): DeclaredPrinciple {
  return { name, parameters, confidence: 1 };
}

function model(principles: DeclaredPrinciple[]): SystemModel {
  return {
    name: 'S',
    domain: 'd',
    scale: 's',
    description: '',
    principles,
    components: [],
    relations: [],
    tests: {},
  };
}

describe('synthesize', () => {
  let lines: string[];
  let previousSink: LogSink;

  beforeEach(() => {
    lines = [];
    previousSink = setLogSink((line) => lines.push(line));
  });

  afterEach(() => {
    setLogSink(previousSink);
  });

  it('yields one hypothesis per declared principle, duplicates included', () => {
    const hypotheses = synthesize(
      model([declared('Modularity', { granularity: 'fine' }), declared('Bus'), declared('Bus')]),
      library
    );
    expect(hypotheses).toEqual([
      {
        principle: 'Modularity',
        description: 'fine modules above 0.3',
        test: 'modularity_index > 0.3',
        metric: 'modularity_index',
        threshold: 0.3,
        unresolved: [],
      },
      {
        principle: 'Bus',
        description: 'Bus carries over 0.5',
        test: 'connection_ratio > 0.5',
        metric: 'connection_ratio',
        threshold: 0.5,
        unresolved: [],
      },
      {
        principle: 'Bus',
        description: 'Bus carries over 0.5',
        test: 'connection_ratio > 0.5',
        metric: 'connection_ratio',
        threshold: 0.5,
        unresolved: [],
      },
    ]);
  });

  it('is idempotent', () => {
    const m = model([declared('Emergence', { behavior: 'flocking' }), declared('Hierarchy'), declared('Ghost')]);
    expect(synthesize(m, library)).toEqual(synthesize(m, library));
  });

  it('returns nothing for a model without principles', () => {
    expect(synthesize(model([]), library)).toEqual([]);
  });
});

describe('synthesizeOne', () => {
  let lines: string[];
  let previousSink: LogSink;

  beforeEach(() => {
    lines = [];
    previousSink = setLogSink((line) => lines.push(line));
  });

  afterEach(() => {
    setLogSink(previousSink);
  });

  it('fills a narrative template for a principle outside the curated set', () => {
    expect(synthesizeOne(declared('Emergence', { behavior: 'self-organization' }), library)).toEqual({
      principle: 'Emergence',
      description: 'System exhibits self-organization beyond component sum',
      unresolved: [],
    });
  });

  it('falls back for principles unknown to the library', () => {
    expect(synthesizeOne(declared('Polarity', { poles: 'a/b' }), library)).toEqual({
      principle: 'Polarity',
      description: 'System should exhibit Polarity characteristics',
      unresolved: [],
    });
  });

  it('falls back when the definition has no template', () => {
    expect(synthesizeOne(declared('Boundary'), library)).toEqual({
      principle: 'Boundary',
      description: 'System should exhibit Boundary characteristics',
      unresolved: [],
    });
  });

  it('keeps the fallback description but adds curated metrics when a curated principle has no template', () => {
    expect(synthesizeOne(declared('Hierarchy', { levels: 3 }), library)).toEqual({
      principle: 'Hierarchy',
      description: 'System should exhibit Hierarchy characteristics',
      test: 'hierarchy_depth within 2-4 levels',
      metric: 'hierarchy_depth',
      threshold: '2-4 levels',
      unresolved: [],
    });
  });

  it('leaves unmatched placeholders literally and warns', () => {
    const hypothesis = synthesizeOne(declared('Feedback', { sign: 'negative' }), library);
    expect(hypothesis.description).toBe('A negative loop with delay {delay}');
    expect(hypothesis.unresolved).toEqual(['delay']);
    expect(lines).toEqual(['WARN [Synthesizer] Unresolved placeholder(s) in Feedback hypothesis: delay']);
  });

  it('prefers a declared threshold over the default and keeps {threshold} when neither exists', () => {
    expect(synthesizeOne(declared('Bus', { threshold: 0.8 }), library).description).toBe('Bus carries over 0.8');
    expect(synthesizeOne(declared('Filter', { criterion: 'size' }), library)).toEqual({
      principle: 'Filter',
      description: 'Rejects {threshold} of size',
      unresolved: ['threshold'],
    });
  });

  it('does not substitute into values taken from parameters', () => {
    const hypothesis = synthesizeOne(declared('Modularity', { granularity: '{threshold}' }), library);
    expect(hypothesis.description).toBe('{threshold} modules above 0.3');
    expect(hypothesis.unresolved).toEqual([]);
  });
});
