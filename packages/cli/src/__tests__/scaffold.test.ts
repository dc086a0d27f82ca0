import { describe, it, expect } from 'vitest';
import { loadLibrary } from '@syslang/library';
import { scaffoldModel, REFUTABLE_PLACEHOLDER } from '../scaffold.js';

describe('scaffoldModel', () => {
  const library = loadLibrary();

  it('uses the default principles when none are given', () => {
    const model = scaffoldModel({ name: 'Hive', domain: 'biology' }, library);

    expect(model.principles.map((p) => p.name)).toEqual(['Modularity', 'Hierarchy']);
    expect(model.principles[0].parameters).toEqual({ granularity: 'fine', coupling: 'loose' });
    expect(model.principles[1].parameters).toEqual({ levels: '<levels>', direction: 'top-down' });
    expect(model.tests).toEqual({
      refutable: REFUTABLE_PLACEHOLDER,
      metrics: ['modularity_index', 'hierarchy_depth'],
    });
  });

  it('fills metadata defaults', () => {
    const model = scaffoldModel({ name: 'Hive', domain: 'biology' }, library);
    expect(model.scale).toBe('unspecified');
    expect(model.description).toBe('');
    expect(model.components).toEqual([]);
    expect(model.relations).toEqual([]);
  });

  it('omits metrics when no principle has one', () => {
    const model = scaffoldModel({ name: 'Hive', domain: 'biology', principles: ['Cycle', 'Memory'] }, library);
    expect(model.tests).toEqual({ refutable: REFUTABLE_PLACEHOLDER });
  });

  it('keeps principles the library does not know, without parameters', () => {
    const model = scaffoldModel({ name: 'Hive', domain: 'biology', principles: ['Teleport'] }, library);
    expect(model.principles).toEqual([{ name: 'Teleport', parameters: {}, confidence: 1 }]);
  });
});
