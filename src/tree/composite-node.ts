import { UnknownPropertyError } from '../errors';
import { evaluate } from '../expression/resolver';
import { ABSENT } from '../optional';
import type { SymbolTable } from '../symbols/symbol-table';
import type {
  BuildOptions,
  DeferredMerge,
  MergeState,
  PropertyTarget,
  TreeChangedListener
} from '../types/node';
import type { TypeDescriptor } from '../types/primitives';
import type { DescriptorSet } from '../types/registry';
import type { PropertySource } from '../types/template';
import { type WeakHandle, weakHandle } from '../utils/weak-handle';

export type CompositeNodeInit = {
  targetType: string;
  outlet?: string;
  descriptors: DescriptorSet;
  symbols: SymbolTable;
  properties: ReadonlyMap<string, PropertySource>;
  values: ReadonlyMap<string, unknown>;
  parent?: CompositeNode;
  target?: PropertyTarget;
  options: BuildOptions;
};

/**
 * Applies resolved values to a live target. Absent values are written as
 * `undefined`.
 */
export function applyValues(
  target: PropertyTarget | undefined,
  values: ReadonlyMap<string, unknown>
): void {
  if (!target) return;
  for (const [name, value] of values) {
    target.set(name, value === ABSENT ? undefined : value);
  }
}

type PendingValues = Array<{ node: CompositeNode; values: Map<string, unknown> }>;

function commitValues(pending: PendingValues): void {
  for (const { node, values } of pending) node.commitValues(values);
}

/**
 * One node of a constructed template tree.
 *
 * Ownership:
 * - a node owns its children and its symbol table;
 * - the parent is reachable only through a weak handle, used for nothing
 *   but navigation and, on disposal, to leave its parent's children.
 *
 * Children are append-only: the children declared by the template come
 * first, in order; a deferred merge may append more, exactly once. A child
 * leaves the list only by being disposed.
 *
 * Nodes are created by `buildNode`; the mutating members marked
 * `@internal` belong to the construction and merge layer.
 */
export class CompositeNode {
  readonly targetType: string;
  readonly outlet?: string;
  readonly symbols: SymbolTable;
  readonly target?: PropertyTarget;

  private readonly descriptors: DescriptorSet;
  private readonly options: BuildOptions;
  private readonly parentHandle?: WeakHandle<CompositeNode>;
  private readonly sources: Map<string, PropertySource>;
  private resolved: Map<string, unknown>;
  private readonly childNodes: CompositeNode[] = [];
  private readonly listeners = new Set<TreeChangedListener>();
  private readonly mergedSources = new Set<string>();
  private mergeScope?: SymbolTable;
  private state: MergeState = 'building';
  private pendingMerge?: DeferredMerge;
  private isDisposed = false;

  constructor(init: CompositeNodeInit) {
    this.targetType = init.targetType;
    this.outlet = init.outlet;
    this.descriptors = init.descriptors;
    this.symbols = init.symbols;
    this.sources = new Map(init.properties);
    this.resolved = new Map(init.values);
    this.parentHandle = init.parent ? weakHandle(init.parent) : undefined;
    this.target = init.target;
    this.options = init.options;
  }

  get mergeState(): MergeState {
    return this.state;
  }

  /** The deferred merge of this node, if its template references one. */
  get merge(): DeferredMerge | undefined {
    return this.pendingMerge;
  }

  get parent(): CompositeNode | undefined {
    return this.parentHandle?.deref();
  }

  get disposed(): boolean {
    return this.isDisposed;
  }

  /** Snapshot of the children, declared ones first. */
  get children(): readonly CompositeNode[] {
    return Object.freeze([...this.childNodes]);
  }

  /** Property name → source, in declaration order (merged ones last). */
  get properties(): ReadonlyMap<string, PropertySource> {
    return new Map(this.sources);
  }

  /** Property name → resolved value. */
  get values(): ReadonlyMap<string, unknown> {
    return new Map(this.resolved);
  }

  /**
   * The resolved value of `name`; falls back to reading the target for
   * properties the template did not set.
   */
  value(name: string): unknown {
    if (this.resolved.has(name)) return this.resolved.get(name);
    return this.target?.get(name);
  }

  /**
   * Depth-first search for a node with the given outlet, starting with this
   * node.
   */
  findOutlet(name: string): CompositeNode | undefined {
    if (this.outlet === name) return this;
    for (const child of this.childNodes) {
      const found = child.findOutlet(name);
      if (found) return found;
    }
    return undefined;
  }

  /**
   * Subscribes to children appended by a deferred merge.
   *
   * @returns A function that removes the listener.
   */
  onTreeChanged(listener: TreeChangedListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /**
   * Replaces this node's state wholesale and re-resolves the properties of
   * this node and its descendants.
   *
   * The replacement is all-or-nothing across the subtree: if any property
   * fails, the previous state is restored and no value or target changes.
   */
  setState(state: Readonly<Record<string, unknown>>): void {
    const previous = this.symbols.state;
    this.symbols.replaceState(state);

    let pending: PendingValues;
    try {
      pending = this.resolveSubtree();
    } catch (error) {
      this.symbols.replaceState(previous);
      throw error;
    }
    commitValues(pending);
  }

  /**
   * Re-resolves every property of this node and its descendants against the
   * current symbol tables. Values are committed (and applied to targets)
   * only once the whole subtree resolved.
   */
  refresh(): void {
    commitValues(this.resolveSubtree());
  }

  /**
   * Tears down this node and its subtree, and removes it from its parent's
   * children. Pending merge completions become no-ops; listeners are
   * dropped. Idempotent.
   */
  dispose(): void {
    if (this.isDisposed) return;
    this.isDisposed = true;

    for (const child of this.childNodes) child.dispose();
    this.childNodes.length = 0;

    const parent = this.parent;
    if (parent && !parent.disposed) parent.removeChild(this);

    this.mergeScope?.detach();
    this.symbols.detach();
    this.parentHandle?.release();
    this.listeners.clear();
    this.options.logger.debug('Node disposed', { targetType: this.targetType });
  }

  /** @internal */
  descriptorFor(name: string): TypeDescriptor {
    const descriptor = this.descriptors.get(name);
    if (!descriptor) throw new UnknownPropertyError(this.targetType, name);
    return descriptor;
  }

  /** @internal */
  hasProperty(name: string): boolean {
    return this.sources.has(name);
  }

  /** @internal */
  transition(state: MergeState): void {
    this.state = state;
  }

  /** @internal */
  attachMerge(merge: DeferredMerge): void {
    this.pendingMerge = merge;
  }

  /** @internal */
  appendChild(child: CompositeNode): void {
    this.childNodes.push(child);
  }

  private removeChild(child: CompositeNode): void {
    const index = this.childNodes.indexOf(child);
    if (index !== -1) this.childNodes.splice(index, 1);
  }

  /**
   * Commits a completed merge in one step: properties, scope, children and
   * the `merged` state. Listeners are notified afterwards; a failing
   * listener is logged and does not undo the merge.
   *
   * @internal
   */
  commitMerge(
    scope: SymbolTable,
    properties: ReadonlyMap<string, PropertySource>,
    values: ReadonlyMap<string, unknown>,
    children: readonly CompositeNode[]
  ): void {
    applyValues(this.target, values);

    this.mergeScope = scope;
    for (const [name, source] of properties) {
      this.sources.set(name, source);
      this.mergedSources.add(name);
    }
    for (const [name, value] of values) this.resolved.set(name, value);
    this.childNodes.push(...children);
    this.state = 'merged';

    const event = { node: this, added: Object.freeze([...children]) };
    for (const listener of [...this.listeners]) {
      try {
        listener(event);
      } catch (error) {
        this.options.logger.error('Tree-changed listener failed', {
          targetType: this.targetType,
          error
        });
      }
    }
  }

  private resolveSubtree(pending: PendingValues = []): PendingValues {
    const next = new Map<string, unknown>();
    for (const [name, source] of this.sources) {
      next.set(
        name,
        evaluate(name, source, this.descriptorFor(name), this.scopeFor(name), {
          targetType: this.targetType,
          evaluator: this.options.evaluator,
          symbolPrefix: this.options.symbolPrefix
        })
      );
    }
    pending.push({ node: this, values: next });

    for (const child of this.childNodes) child.resolveSubtree(pending);
    return pending;
  }

  /** @internal */
  commitValues(values: Map<string, unknown>): void {
    applyValues(this.target, values);
    this.resolved = values;
  }

  /**
   * Properties added by a merge are resolved in the merge scope, which
   * holds the merged template's constants.
   */
  private scopeFor(name: string): SymbolTable {
    if (this.mergeScope && this.mergedSources.has(name)) return this.mergeScope;
    return this.symbols;
  }
}
