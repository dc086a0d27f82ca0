/**
 * Reference Library Store
 *
 * Immutable view over the three catalogs. Built once by the entry point and
 * handed to whatever needs it; nothing mutates it afterwards, so concurrent
 * readers need no locking.
 */

import type {
  CompatibilityRule,
  Option,
  PatternDefinition,
  PrincipleDefinition,
} from '@syslang/core';
import type { Catalogs } from './schemas.js';

export interface CategoryEntry {
  category: string;
  description: string;
}

export interface LibrarySummary {
  categories: number;
  principles: number;
  patterns: number;
  rules: number;
}

export class Library {
  private readonly principleDefs: ReadonlyMap<string, Readonly<PrincipleDefinition>>;
  private readonly patternDefs: ReadonlyMap<string, Readonly<PatternDefinition>>;
  private readonly categoryEntries: readonly CategoryEntry[];
  private readonly ruleList: readonly Readonly<CompatibilityRule>[];

  constructor(catalogs: Catalogs) {
    this.principleDefs = freezeEntries(catalogs.principles.principles);
    this.patternDefs = freezeEntries(catalogs.patterns.distribution_patterns);
    this.categoryEntries = Object.freeze(
      Object.entries(catalogs.principles.categories).map(([category, description]) =>
        Object.freeze({ category, description })
      )
    );
    this.ruleList = Object.freeze(catalogs.compatibility.rules.map((rule) => deepFreeze(structuredClone(rule))));
  }

  principle(name: string): Option<Readonly<PrincipleDefinition>> {
    return this.principleDefs.get(name) ?? null;
  }

  pattern(name: string): Option<Readonly<PatternDefinition>> {
    return this.patternDefs.get(name) ?? null;
  }

  /**
   * Categories in catalog order
   */
  categories(): readonly CategoryEntry[] {
    return this.categoryEntries;
  }

  /**
   * Names of the principles filed under `category`, sorted lexicographically
   */
  principlesInCategory(category: string): string[] {
    return [...this.principleDefs]
      .filter(([, def]) => def.category === category)
      .map(([name]) => name)
      .sort();
  }

  principleNames(): string[] {
    return [...this.principleDefs.keys()];
  }

  patternNames(): string[] {
    return [...this.patternDefs.keys()];
  }

  /**
   * Distribution patterns specializing `principle`, in catalog order
   */
  patternsOf(principle: string): string[] {
    return [...this.patternDefs]
      .filter(([, def]) => def.parent_principle === principle)
      .map(([name]) => name);
  }

  /**
   * The rule relating `a` and `b`. A rule written as [b, a] only answers
   * when it is symmetric.
   */
  compatibility(a: string, b: string): Option<Readonly<CompatibilityRule>> {
    const direct = this.ruleList.find((rule) => rule.between[0] === a && rule.between[1] === b);
    if (direct) return direct;
    return this.ruleList.find((rule) => rule.symmetric && rule.between[0] === b && rule.between[1] === a) ?? null;
  }

  rules(): readonly Readonly<CompatibilityRule>[] {
    return this.ruleList;
  }

  summary(): LibrarySummary {
    return {
      categories: this.categoryEntries.length,
      principles: this.principleDefs.size,
      patterns: this.patternDefs.size,
      rules: this.ruleList.length,
    };
  }
}

function freezeEntries<T extends object>(record: Record<string, T>): ReadonlyMap<string, Readonly<T>> {
  return new Map(Object.entries(record).map(([name, def]) => [name, deepFreeze(structuredClone(def))]));
}

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === 'object') {
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
    Object.freeze(value);
  }
  return value;
}
