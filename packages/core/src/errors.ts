/**
 * Error kinds
 *
 * DataLoadError is fatal and thrown. The others are returned inside a
 * Result and left to the caller.
 */

export type PathSegment = string | number;

/**
 * Render a structural path the way JSON path tools print it:
 * `$.principles.Foo.category`, `$.rules[2].between`
 */
export function formatPath(path: readonly PathSegment[]): string {
  return path.reduce<string>((acc, segment) => {
    if (typeof segment === 'number') return `${acc}[${segment}]`;
    return /^[A-Za-z_][A-Za-z0-9_]*$/.test(segment)
      ? `${acc}.${segment}`
      : `${acc}[${JSON.stringify(segment)}]`;
  }, '$');
}

export class SchemaValidationError extends Error {
  constructor(
    message: string,
    public readonly path: readonly PathSegment[],
    public readonly context: readonly string[] = []
  ) {
    super(message);
    this.name = 'SchemaValidationError';
  }

  get jsonPath(): string {
    return formatPath(this.path);
  }

  toJSON() {
    return {
      name: this.name,
      message: this.message,
      path: this.jsonPath,
      context: [...this.context],
    };
  }
}

export type CatalogName = 'principles' | 'patterns' | 'compatibility';

export class DataLoadError extends Error {
  constructor(
    message: string,
    public readonly catalog: CatalogName,
    cause?: Error
  ) {
    super(message, { cause });
    this.name = 'DataLoadError';
  }

  toJSON() {
    return {
      name: this.name,
      message: this.message,
      catalog: this.catalog,
      cause: this.cause instanceof Error ? this.cause.message : undefined,
      path: this.cause instanceof SchemaValidationError ? this.cause.jsonPath : undefined,
    };
  }
}

export type ModelErrorKind = 'NotAMapping' | 'MissingSystemSection';

export class ModelError extends Error {
  constructor(
    public readonly kind: ModelErrorKind,
    public readonly origin: string,
    message?: string
  ) {
    super(message ?? defaultModelErrorMessage(kind, origin));
    this.name = 'ModelError';
  }

  toJSON() {
    return { name: this.name, kind: this.kind, origin: this.origin, message: this.message };
  }
}

function defaultModelErrorMessage(kind: ModelErrorKind, origin: string): string {
  switch (kind) {
    case 'NotAMapping':
      return `${origin}: expected a key-value document at the root`;
    case 'MissingSystemSection':
      return `${origin}: missing 'system' section`;
  }
}

/**
 * Malformed document text. `message` is the parser's own.
 */
export class DocumentSyntaxError extends Error {
  constructor(
    message: string,
    public readonly origin: string,
    public readonly line?: number,
    public readonly column?: number
  ) {
    super(message);
    this.name = 'DocumentSyntaxError';
  }

  toJSON() {
    return {
      name: this.name,
      message: this.message,
      origin: this.origin,
      line: this.line,
      column: this.column,
    };
  }
}

export class ResourceNotFoundError extends Error {
  constructor(public readonly path: string) {
    super(`File not found: ${path}`);
    this.name = 'ResourceNotFoundError';
  }
}
