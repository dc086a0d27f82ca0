/**
 * Hypothesis templates
 *
 * A template such as `"Modules interact through {interface} above {threshold}"`
 * is tokenized once into literal and placeholder tokens. Rendering resolves
 * each placeholder independently, so a substituted value is never rescanned
 * and the order of substitution cannot matter.
 */

export type TemplateToken =
  | { type: 'literal'; text: string }
  | { type: 'placeholder'; name: string };

export interface RenderedTemplate {
  text: string;
  /** Placeholder names left in `text` as `{name}`, in order of appearance */
  unresolved: string[];
}

/** Returns the text to substitute, or undefined to leave the placeholder as is */
export type PlaceholderResolver = (name: string) => string | undefined;

const PLACEHOLDER = /\{([A-Za-z_][A-Za-z0-9_]*)\}/g;

export function tokenizeTemplate(template: string): TemplateToken[] {
  const tokens: TemplateToken[] = [];
  let cursor = 0;

  for (const match of template.matchAll(PLACEHOLDER)) {
    const start = match.index ?? 0;
    if (start > cursor) {
      tokens.push({ type: 'literal', text: template.slice(cursor, start) });
    }
    tokens.push({ type: 'placeholder', name: match[1] });
    cursor = start + match[0].length;
  }

  if (cursor < template.length) {
    tokens.push({ type: 'literal', text: template.slice(cursor) });
  }
  return tokens;
}

export class HypothesisTemplate {
  private readonly tokens: readonly TemplateToken[];

  constructor(readonly source: string) {
    this.tokens = tokenizeTemplate(source);
  }

  /**
   * Distinct placeholder names, in order of first appearance
   */
  placeholders(): string[] {
    const names: string[] = [];
    for (const token of this.tokens) {
      if (token.type === 'placeholder' && !names.includes(token.name)) {
        names.push(token.name);
      }
    }
    return names;
  }

  render(...resolvers: PlaceholderResolver[]): RenderedTemplate {
    const unresolved: string[] = [];
    let text = '';

    for (const token of this.tokens) {
      if (token.type === 'literal') {
        text += token.text;
        continue;
      }
      const value = firstResolved(resolvers, token.name);
      if (value === undefined) {
        text += `{${token.name}}`;
        if (!unresolved.includes(token.name)) unresolved.push(token.name);
      } else {
        text += value;
      }
    }

    return { text, unresolved };
  }
}

function firstResolved(resolvers: PlaceholderResolver[], name: string): string | undefined {
  for (const resolve of resolvers) {
    const value = resolve(name);
    if (value !== undefined) return value;
  }
  return undefined;
}

/**
 * Text form of a declared parameter value
 */
export function stringifyValue(value: unknown): string {
  if (typeof value === 'string') return value;
  if (value === null || value === undefined) return 'null';
  if (Array.isArray(value)) return value.map(stringifyValue).join(', ');
  if (typeof value === 'object') return JSON.stringify(value);
  return String(value);
}
