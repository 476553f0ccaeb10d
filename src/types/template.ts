/**
 * A declarative node description, as produced by a template parser.
 *
 * The engine never parses documents itself; parsers hand it this shape and
 * {@link validateTemplate} checks it before construction.
 *
 * @example
 * ```ts
 * const template: Template = {
 *   targetType: 'Label',
 *   outlet: 'titleLabel',
 *   constants: { accent: 2 },
 *   expressions: { textAlignment: 'center', text: 'Hello {user.name}' },
 *   children: [],
 *   templatePath: 'footer.layout'
 * };
 * ```
 */
export type Template = {
  /**
   * Identifier of the view type to construct. Keys the descriptor catalog.
   */
  targetType: string;

  /**
   * Name under which the constructed node can be looked up by the caller.
   */
  outlet?: string;

  /**
   * Symbols visible to this node and its descendants. Immutable once the node
   * is built.
   */
  constants?: Record<string, unknown>;

  /**
   * Property name → source expression, in declaration order.
   */
  expressions?: Record<string, string>;

  /**
   * Children, attached in declaration order before any merged children.
   */
  children?: Template[];

  /**
   * Reference to an external template whose children are merged into this
   * node once loaded.
   */
  templatePath?: string;

  /**
   * Location `templatePath` is resolved against. Passed through to the loader.
   */
  relativePath?: string;
};

/**
 * A property source that was already evaluated elsewhere.
 *
 * Skips expression evaluation; the value still goes through unwrapping and
 * descriptor coercion.
 */
export type ValueSource = {
  readonly kind: 'value';
  readonly value: unknown;
};

/**
 * What a property's value is produced from: expression text or a value.
 */
export type PropertySource = string | ValueSource;

/**
 * Wraps an already-evaluated value as a property source.
 */
export function valueSource(value: unknown): ValueSource {
  return Object.freeze({ kind: 'value', value });
}
