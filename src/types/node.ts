import type { DescriptorRegistry } from '../descriptors/registry';
import type { MergeFailureError } from '../errors';
import type { ExpressionEvaluator } from '../expression/evaluator';
import type { EngineLogger } from '../logger';
import type { CompositeNode } from '../tree/composite-node';
import type { Template } from './template';

/**
 * Lifecycle of a node.
 *
 * ```
 * building ─┬─> ready                          (no deferred subtree)
 *           └─> awaiting-merge ─┬─> merged
 *                               └─> merge-failed
 * ```
 */
export type MergeState =
  | 'building'
  | 'ready'
  | 'awaiting-merge'
  | 'merged'
  | 'merge-failed';

/**
 * Final outcome of a deferred merge. `discarded` means the node was torn
 * down before the subtree arrived and the completion did nothing.
 */
export type MergeOutcome = 'merged' | 'merge-failed' | 'discarded';

/**
 * The two completion paths of a deferred merge, made explicit.
 *
 * - `sync`:  the subtree was produced and merged before construction
 *            returned; `settled` is already resolved.
 * - `async`: the subtree arrives later; `settled` resolves once the merge
 *            completed, failed or was discarded. It never rejects: failures
 *            go to the error channel.
 */
export type DeferredMerge = {
  readonly mode: 'sync' | 'async';
  readonly templatePath?: string;
  readonly settled: Promise<MergeOutcome>;
};

/**
 * Capability to read and write named properties of a live object (a view,
 * a widget). The engine never reflects on targets; construction applies
 * every resolved value through `set`.
 *
 * Absent optional values are applied as `undefined`.
 */
export type PropertyTarget = {
  get(name: string): unknown;
  /** May throw; the failure propagates to the construction call. */
  set(name: string, value: unknown): void;
};

export type TargetFactory = (targetType: string, outlet?: string) => PropertyTarget;

/**
 * Resource loading collaborator for deferred subtrees.
 *
 * Returning a `Template` directly is the synchronous path (e.g. an
 * already-cached resource); returning a promise is the asynchronous one.
 */
export type TemplateLoader = {
  load(path: string, relativeTo?: string): Template | Promise<Template>;
};

/**
 * Out-of-band channel for merge failures that happen after construction
 * returned.
 */
export type ErrorChannel = (error: MergeFailureError, node: CompositeNode) => void;

export type TreeChangedEvent = {
  node: CompositeNode;
  /** The appended children, in order. */
  added: readonly CompositeNode[];
};

export type TreeChangedListener = (event: TreeChangedEvent) => void;

/**
 * Fully resolved construction settings, shared by every node of a tree.
 */
export type BuildOptions = {
  registry: DescriptorRegistry;
  evaluator: ExpressionEvaluator;
  loader?: TemplateLoader;
  createTarget?: TargetFactory;
  logger: EngineLogger;
  onError: ErrorChannel;
  symbolPrefix: string;
};
