/**
 * Location tags attached to a resolution failure.
 *
 * Both fields are optional: errors raised deep inside descriptor resolution do
 * not know which property they belong to. The expression resolver fills them
 * in on the way out (see {@link TemplateError.withContext}).
 */
export type ErrorContext = {
  propertyName?: string;
  targetType?: string;
};

/**
 * Base class for every failure raised by the engine.
 *
 * Carries a stable `code` for programmatic handling and the location tags
 * used in diagnostics. The human-readable part of the message is kept in
 * `detail` so the location prefix can be added later without losing it.
 */
export class TemplateError extends Error {
  readonly code: string;
  readonly detail: string;
  propertyName?: string;
  targetType?: string;

  constructor(
    code: string,
    detail: string,
    context: ErrorContext = {},
    options?: ErrorOptions
  ) {
    super(detail, options);
    this.name = 'TemplateError';
    this.code = code;
    this.detail = detail;
    this.withContext(context);
  }

  /**
   * Tags the error with its originating property and target type.
   *
   * First tag wins: an error that already names a property keeps it, so an
   * error re-raised through several layers still points at the innermost
   * property that failed.
   *
   * @returns The same error instance, for `throw error.withContext(...)`.
   */
  withContext(context: ErrorContext): this {
    this.propertyName ??= context.propertyName;
    this.targetType ??= context.targetType;

    const location = [this.targetType, this.propertyName]
      .filter(part => part != null)
      .join('.');
    this.message = location ? `${location}: ${this.detail}` : this.detail;

    return this;
  }
}

/**
 * A value's runtime type cannot satisfy the descriptor's kind.
 */
export class TypeMismatchError extends TemplateError {
  readonly expected: string;
  readonly received: string;
  /** Field path inside a structured value, outermost first. */
  readonly path: readonly string[];

  constructor(
    expected: string,
    received: unknown,
    options: { path?: readonly string[]; receivedLabel?: string } = {}
  ) {
    const path = options.path ?? [];
    const receivedLabel = options.receivedLabel ?? describeValue(received);
    super(
      'TYPE_MISMATCH',
      path.length > 0
        ? `Type mismatch at "${path.join('.')}": expected ${expected}, received ${receivedLabel}`
        : `Type mismatch: expected ${expected}, received ${receivedLabel}`
    );
    this.name = 'TypeMismatchError';
    this.expected = expected;
    this.received = receivedLabel;
    this.path = path;
  }

  /**
   * Re-raises this mismatch one level further out in a structured value.
   */
  atField(field: string): TypeMismatchError {
    return new TypeMismatchError(this.expected, undefined, {
      path: [field, ...this.path],
      receivedLabel: this.received
    });
  }
}

/**
 * A text value does not name any case of an enum descriptor.
 */
export class UnknownEnumCaseError extends TemplateError {
  readonly caseName: string;
  readonly knownCases: readonly string[];

  constructor(caseName: string, knownCases: readonly string[]) {
    super(
      'UNKNOWN_ENUM_CASE',
      `Unknown enum case "${caseName}". Expected one of: ${knownCases.join(', ')}`
    );
    this.name = 'UnknownEnumCaseError';
    this.caseName = caseName;
    this.knownCases = knownCases;
  }
}

export class UndefinedSymbolError extends TemplateError {
  readonly symbol: string;

  constructor(symbol: string) {
    super('UNDEFINED_SYMBOL', `Undefined symbol "${symbol}"`);
    this.name = 'UndefinedSymbolError';
    this.symbol = symbol;
  }
}

export class DuplicateSymbolError extends TemplateError {
  readonly symbol: string;

  constructor(symbol: string, reason = 'is already defined') {
    super('DUPLICATE_SYMBOL', `Symbol "${symbol}" ${reason}`);
    this.name = 'DuplicateSymbolError';
    this.symbol = symbol;
  }
}

/**
 * A required property evaluated to an absent value.
 */
export class MissingRequiredValueError extends TemplateError {
  constructor(propertyName: string) {
    super(
      'MISSING_REQUIRED_VALUE',
      `Property "${propertyName}" is required but evaluated to no value`,
      { propertyName }
    );
    this.name = 'MissingRequiredValueError';
  }
}

export class UnexpectedAbsentValueError extends TemplateError {
  constructor() {
    super('UNEXPECTED_ABSENT_VALUE', 'Unexpected absent value');
    this.name = 'UnexpectedAbsentValueError';
  }
}

/**
 * A deferred subtree could not be loaded or merged.
 *
 * The underlying failure is kept in `failure` (and the standard `cause`);
 * non-Error throwables are wrapped so `failure` is always an `Error`.
 */
export class MergeFailureError extends TemplateError {
  readonly failure: Error;
  readonly templatePath?: string;

  constructor(cause: unknown, templatePath?: string) {
    const error = cause instanceof Error ? cause : new Error(String(cause));
    super(
      'MERGE_FAILURE',
      templatePath
        ? `Failed to merge deferred template "${templatePath}": ${error.message}`
        : `Failed to merge deferred template: ${error.message}`,
      {},
      { cause: error }
    );
    this.name = 'MergeFailureError';
    this.failure = error;
    this.templatePath = templatePath;
  }
}

export class ExpressionSyntaxError extends TemplateError {
  readonly source: string;

  constructor(source: string, reason: string) {
    super('EXPRESSION_SYNTAX', `Invalid expression "${source}": ${reason}`);
    this.name = 'ExpressionSyntaxError';
    this.source = source;
  }
}

/**
 * The expression parsed, but uses syntax the evaluator does not support
 * (calls, arithmetic, assignments, ...).
 */
export class UnsupportedExpressionError extends TemplateError {
  readonly nodeType: string;

  constructor(nodeType: string) {
    super(
      'UNSUPPORTED_EXPRESSION',
      `Unsupported expression syntax: ${nodeType}`
    );
    this.name = 'UnsupportedExpressionError';
    this.nodeType = nodeType;
  }
}

export class UnknownPropertyError extends TemplateError {
  constructor(targetType: string, propertyName: string) {
    super(
      'UNKNOWN_PROPERTY',
      `Unknown property "${propertyName}" for ${targetType}`,
      { targetType, propertyName }
    );
    this.name = 'UnknownPropertyError';
  }
}

export class InvalidTemplateError extends TemplateError {
  readonly path: string;

  constructor(path: string, reason: string) {
    super('INVALID_TEMPLATE', `Invalid template at "${path}": ${reason}`);
    this.name = 'InvalidTemplateError';
    this.path = path;
  }
}

export class DescriptorRegistryError extends TemplateError {
  constructor(message: string) {
    super('DESCRIPTOR_REGISTRY', message);
    this.name = 'DescriptorRegistryError';
  }
}

/**
 * Short, stable label for a runtime value used in mismatch messages.
 */
function describeValue(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'array';
  if (typeof value === 'number') {
    return Number.isSafeInteger(value) ? `integer ${value}` : `number ${value}`;
  }
  if (typeof value === 'string') return `text "${value}"`;
  return typeof value;
}
