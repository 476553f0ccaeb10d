import {
  DuplicateSymbolError,
  TemplateError,
  UndefinedSymbolError
} from '../errors';
import { type Maybe, NOTHING, present } from '../optional';
import { type WeakHandle, weakHandle } from '../utils/weak-handle';

/**
 * The read side of a symbol table, as seen by expression evaluators.
 */
export type SymbolScope = {
  /**
   * @throws {UndefinedSymbolError} If no table in the chain defines `name`.
   */
  resolve(name: string): unknown;
  lookup(name: string): Maybe<unknown>;
  has(name: string): boolean;
};

export type SymbolTableInit = {
  constants?: Readonly<Record<string, unknown>>;
  state?: Readonly<Record<string, unknown>>;
  parent?: SymbolTable;
};

/**
 * Per-node namespace of constants and state with read-only delegation to the
 * enclosing node's table.
 *
 * Namespace rules:
 * - constants and state share one namespace; a name may live in only one of
 *   them;
 * - lookup order is own constants, own state, then the parent chain;
 * - nothing resolved from a parent is cached, so state replaced on an
 *   ancestor is visible on the next lookup.
 *
 * The parent is held through a {@link WeakHandle}: a table never keeps its
 * parent alive, and once the parent is gone delegation simply stops.
 */
export class SymbolTable implements SymbolScope {
  private readonly ownConstants = new Map<string, unknown>();
  private ownState = new Map<string, unknown>();
  private readonly parentHandle: WeakHandle<SymbolTable> | undefined;
  private isSealed = false;

  constructor(init: SymbolTableInit = {}) {
    this.parentHandle = init.parent ? weakHandle(init.parent) : undefined;

    for (const [name, value] of Object.entries(init.constants ?? {})) {
      this.define(name, value, true);
    }
    if (init.state) this.replaceState(init.state);
  }

  /** The enclosing table, while it is still alive. */
  get parent(): SymbolTable | undefined {
    return this.parentHandle?.deref();
  }

  /** Snapshot of this table's own constants. */
  get constants(): Readonly<Record<string, unknown>> {
    return Object.freeze(Object.fromEntries(this.ownConstants));
  }

  /** Snapshot of this table's own state. */
  get state(): Readonly<Record<string, unknown>> {
    return Object.freeze(Object.fromEntries(this.ownState));
  }

  get sealed(): boolean {
    return this.isSealed;
  }

  lookup(name: string): Maybe<unknown> {
    if (this.ownConstants.has(name)) return present(this.ownConstants.get(name));
    if (this.ownState.has(name)) return present(this.ownState.get(name));
    return this.parent?.lookup(name) ?? NOTHING;
  }

  resolve(name: string): unknown {
    const result = this.lookup(name);
    if (!result.present) throw new UndefinedSymbolError(name);
    return result.value;
  }

  has(name: string): boolean {
    return this.lookup(name).present;
  }

  /** Whether `name` is defined in this table itself (no delegation). */
  owns(name: string): boolean {
    return this.ownConstants.has(name) || this.ownState.has(name);
  }

  /**
   * Defines a symbol in this table.
   *
   * - constant: fails if the name already exists here, as a constant or as
   *   state, or once the table is sealed;
   * - state: replaces any previous state value; fails if the name is a
   *   constant here.
   *
   * Names defined on ancestors are shadowed, never touched.
   *
   * @throws {DuplicateSymbolError}
   * @throws {TemplateError} (`CONSTANTS_SEALED`) for constants after {@link seal}.
   */
  define(name: string, value: unknown, asConstant: boolean): void {
    if (this.ownConstants.has(name)) {
      throw new DuplicateSymbolError(
        name,
        asConstant ? 'is already defined' : 'is already defined as a constant'
      );
    }

    if (!asConstant) {
      this.ownState.set(name, value);
      return;
    }

    if (this.isSealed) {
      throw new TemplateError(
        'CONSTANTS_SEALED',
        `Cannot define constant "${name}": constants are fixed once the node is built`
      );
    }
    if (this.ownState.has(name)) {
      throw new DuplicateSymbolError(name, 'is already defined as state');
    }
    this.ownConstants.set(name, value);
  }

  /**
   * Replaces the whole state mapping.
   *
   * The new mapping is checked against the constants before anything
   * changes, so a rejected replacement leaves the previous state in place.
   *
   * @throws {DuplicateSymbolError} If a key collides with a constant.
   */
  replaceState(state: Readonly<Record<string, unknown>>): void {
    const next = new Map(Object.entries(state));
    for (const name of next.keys()) {
      if (this.ownConstants.has(name)) {
        throw new DuplicateSymbolError(name, 'is already defined as a constant');
      }
    }
    this.ownState = next;
  }

  /** Fixes the constants. Called once the owning node is built. */
  seal(): void {
    this.isSealed = true;
  }

  /** Stops delegating to the parent. */
  detach(): void {
    this.parentHandle?.release();
  }
}
