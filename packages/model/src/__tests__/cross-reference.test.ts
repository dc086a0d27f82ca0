import { describe, it, expect } from 'vitest';
import type { SystemModel } from '@syslang/core';
import { loadLibrary } from '@syslang/library';
import { crossReference } from '../cross-reference.js';

const library = loadLibrary();

function model(overrides: Partial<SystemModel>): SystemModel {
  return {
    name: 'S',
    domain: 'test',
    scale: 'unit',
    description: '',
    principles: [],
    components: [],
    relations: [],
    tests: { refutable: 'Cutting any module leaves the rest working' },
    ...overrides,
  };
}

describe('crossReference', () => {
  it('finds nothing wrong in a consistent model', () => {
    const findings = crossReference(
      model({
        principles: [
          { name: 'Modularity', parameters: { granularity: 'fine' }, confidence: 0.9 },
          { name: 'Hierarchy', parameters: { levels: 3 }, confidence: 1 },
        ],
      }),
      library
    );
    expect(findings).toEqual([]);
  });

  it('warns about unknown principles and parameters', () => {
    const findings = crossReference(
      model({
        principles: [
          { name: 'Telepathy', parameters: {}, confidence: 1 },
          { name: 'Bus', parameters: { medium: 'air', colour: 'red' }, confidence: 1 },
        ],
      }),
      library
    );
    expect(findings).toEqual([
      { severity: 'warning', path: '$.principles[0].name', message: "Principle 'Telepathy' is not defined in the library" },
      { severity: 'warning', path: '$.principles[1].parameters.colour', message: "'colour' is not a parameter of Bus" },
    ]);
  });

  it('checks enumerated parameter values', () => {
    const findings = crossReference(
      model({ principles: [{ name: 'Bus', parameters: { topology: 'mesh' }, confidence: 1 }] }),
      library
    );
    expect(findings).toEqual([
      { severity: 'warning', path: '$.principles[0].parameters.topology', message: "'mesh' is not one of: linear, star, ring" },
    ]);
  });

  it('rejects confidence outside [0, 1]', () => {
    const findings = crossReference(
      model({ principles: [{ name: 'Bus', parameters: {}, confidence: 1.5 }] }),
      library
    );
    expect(findings).toEqual([
      { severity: 'error', path: '$.principles[0].confidence', message: 'Confidence 1.5 is outside [0, 1]' },
    ]);
  });

  it('reports incompatible and conditional pairs once', () => {
    const findings = crossReference(
      model({
        principles: [
          { name: 'Network', parameters: {}, confidence: 1 },
          { name: 'Bus', parameters: {}, confidence: 1 },
          { name: 'Hierarchy', parameters: {}, confidence: 1 },
          { name: 'Bus', parameters: {}, confidence: 1 },
        ],
      }),
      library
    );
    expect(findings).toEqual([
      {
        severity: 'warning',
        path: '$.principles',
        message: 'Bus and Network are incompatible: A single shared channel excludes a centreless mesh',
      },
      {
        severity: 'info',
        path: '$.principles',
        message: 'Hierarchy and Network are compatible only conditionally: Holds when cross-level links stay sparse',
      },
    ]);
  });

  it('asks for a refutable statement', () => {
    expect(crossReference(model({ tests: {} }), library)).toEqual([
      { severity: 'warning', path: '$.tests.refutable', message: 'Model declares no refutable statement' },
    ]);
  });
});
