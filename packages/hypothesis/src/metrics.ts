/**
 * Curated metrics
 *
 * The few principles whose hypotheses are machine-checkable. Everything
 * else gets narrative hypotheses from the library templates only.
 */

export interface CuratedMetric {
  test: string;
  metric: string;
  threshold: number | string;
}

export const CURATED_METRICS: Readonly<Record<string, Readonly<CuratedMetric>>> = Object.freeze({
  Modularity: {
    test: 'modularity_index > 0.3',
    metric: 'modularity_index',
    threshold: 0.3,
  },
  Bus: {
    test: 'connection_ratio > 0.5',
    metric: 'connection_ratio',
    threshold: 0.5,
  },
  Hierarchy: {
    test: 'hierarchy_depth within 2-4 levels',
    metric: 'hierarchy_depth',
    threshold: '2-4 levels',
  },
  Polarity: {
    test: 'polarity_index shows a bimodal distribution',
    metric: 'polarity_index',
    threshold: 'bimodal distribution',
  },
});

export function curatedMetric(principle: string): CuratedMetric | undefined {
  return Object.hasOwn(CURATED_METRICS, principle) ? CURATED_METRICS[principle] : undefined;
}
