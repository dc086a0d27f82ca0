import type { CatalogDocuments } from '../loader.js';

/**
 * Small self-consistent set of catalog documents
 */
export function sampleDocuments(): CatalogDocuments {
  return {
    principles: {
      categories: {
        Structure: 'Arrangement of parts',
        Dynamics: 'Change over time',
      },
      principles: {
        Modularity: {
          description: 'Weakly coupled modules',
          category: 'Structure',
          parameters: { granularity: { description: 'Module size', values: ['fine', 'coarse'] } },
          hypothesis_template: '{granularity} modules above {threshold}',
          default_threshold: 0.3,
        },
        Bus: {
          description: 'Shared channel',
          category: 'Structure',
          hypothesis_template: 'Bus carries over {threshold}',
          default_threshold: 0.5,
        },
        Emergence: {
          description: 'Whole exceeds parts',
          category: 'Dynamics',
          parameters: { behavior: { description: 'Emergent behaviour' } },
          hypothesis_template: 'System exhibits {behavior} beyond component sum',
        },
      },
    },
    patterns: {
      distribution_patterns: {
        Centralised: {
          parent_principle: 'Bus',
          description: 'Single hub',
          specific_parameters: { hub: { description: 'The hub' } },
        },
      },
    },
    compatibility: {
      rules: [
        { between: ['Modularity', 'Bus'], relation: 'compatible' },
        { between: ['Emergence', 'Bus'], relation: 'conditional', condition: 'Only with many senders', symmetric: false },
      ],
    },
  };
}
