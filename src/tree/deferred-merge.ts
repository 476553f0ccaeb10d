import { InvalidTemplateError, MergeFailureError, TemplateError } from '../errors';
import { SymbolTable } from '../symbols/symbol-table';
import type { BuildOptions, DeferredMerge, MergeOutcome } from '../types/node';
import type { PropertySource, Template } from '../types/template';
import { isPromiseLike } from '../utils/type-guards';
import { type WeakHandle, weakHandle } from '../utils/weak-handle';
import { buildNode, resolveProperties } from './builder';
import type { CompositeNode } from './composite-node';
import { validateTemplate } from './template-validator';

/**
 * Produces the subtree to merge: a template (synchronous path) or a promise
 * of one (asynchronous path). Supplied by the resource-loading layer.
 */
export type SubtreeProducer = () => Template | PromiseLike<Template>;

function toMergeFailure(error: unknown, templatePath?: string): MergeFailureError {
  return error instanceof MergeFailureError
    ? error
    : new MergeFailureError(error, templatePath);
}

/**
 * Merges a produced subtree into `node`.
 *
 * Rules:
 * - the subtree root must have the node's target type;
 * - root expressions for properties the node already declares are ignored
 *   (resolved values are never re-evaluated); the others are resolved all
 *   or nothing;
 * - root constants form a scope between the node and the merged children;
 * - merged children are built completely before anything is committed, then
 *   appended in one step.
 */
function mergeSubtree(
  node: CompositeNode,
  input: Template,
  options: BuildOptions
): void {
  const template = validateTemplate(input);

  if (template.targetType !== node.targetType) {
    throw new InvalidTemplateError(
      '$',
      `root type "${template.targetType}" does not match "${node.targetType}"`
    );
  }
  if (template.templatePath !== undefined) {
    throw new InvalidTemplateError(
      '$',
      'a merged template cannot reference another template at its root'
    );
  }

  const scope = new SymbolTable({
    constants: template.constants,
    parent: node.symbols
  });

  const added = new Map<string, PropertySource>(
    Object.entries(template.expressions ?? {}).filter(
      ([name]) => !node.hasProperty(name)
    )
  );
  const values = resolveProperties(
    added,
    options.registry.descriptorsFor(node.targetType),
    scope,
    node.targetType,
    options
  );
  scope.seal();

  const children: CompositeNode[] = [];
  try {
    for (const child of template.children ?? []) {
      children.push(buildNode(child, options, { parent: { node, scope } }));
    }
  } catch (error) {
    for (const child of children) child.dispose();
    throw error;
  }

  node.commitMerge(scope, added, values, children);
}

function report(
  node: CompositeNode,
  error: MergeFailureError,
  options: BuildOptions
): void {
  try {
    options.onError(error, node);
  } catch (channelError) {
    options.logger.error('Error channel failed', {
      targetType: node.targetType,
      templatePath: error.templatePath,
      error: channelError
    });
  }
}

/**
 * Asynchronous completion.
 *
 * Holds the node only through a weak handle while waiting: if the node is
 * torn down (or collected) first, the completion does nothing.
 */
async function completeAsync(
  handle: WeakHandle<CompositeNode>,
  pending: PromiseLike<Template>,
  options: BuildOptions,
  templatePath?: string
): Promise<MergeOutcome> {
  let result: { ok: true; template: Template } | { ok: false; error: unknown };
  try {
    result = { ok: true, template: await pending };
  } catch (error) {
    result = { ok: false, error };
  }

  const node = handle.deref();
  if (!node || node.disposed) {
    options.logger.warn('Deferred merge discarded: node was torn down', {
      templatePath
    });
    return 'discarded';
  }

  if (result.ok) {
    try {
      mergeSubtree(node, result.template, options);
    } catch (error) {
      return fail(node, error, options, templatePath);
    }
    options.logger.debug('Deferred merge completed', {
      targetType: node.targetType,
      templatePath,
      children: node.children.length
    });
    return 'merged';
  }

  return fail(node, result.error, options, templatePath);
}

function fail(
  node: CompositeNode,
  error: unknown,
  options: BuildOptions,
  templatePath?: string
): MergeOutcome {
  node.transition('merge-failed');
  report(node, toMergeFailure(error, templatePath), options);
  return 'merge-failed';
}

/**
 * Attaches an externally produced subtree to `node`.
 *
 * Completion paths:
 * - `producer` returns a template: merged before this call returns. Failure
 *   (thrown by the producer or by the merge) is thrown from here as a
 *   `MergeFailureError`.
 * - `producer` returns a promise: this call returns at once with
 *   `mode: 'async'`. Failure is delivered to `options.onError`; the node
 *   stays usable in `merge-failed` state, without the subtree's children.
 *
 * A node accepts one deferred subtree. The attach counts from the moment
 * the producer is called, so a node whose merge failed accepts no other.
 *
 * @throws {TemplateError} (`MERGE_ALREADY_ATTACHED`) On a second attach.
 * @throws {MergeFailureError} On synchronous failure.
 */
export function attachDeferredSubtree(
  node: CompositeNode,
  producer: SubtreeProducer,
  options: BuildOptions,
  templatePath?: string
): DeferredMerge {
  if (node.merge || (node.mergeState !== 'building' && node.mergeState !== 'ready')) {
    throw new TemplateError(
      'MERGE_ALREADY_ATTACHED',
      `${node.targetType} already has a deferred subtree`
    );
  }

  node.transition('awaiting-merge');
  options.logger.debug('Deferred merge scheduled', {
    targetType: node.targetType,
    templatePath
  });

  let produced: Template | PromiseLike<Template>;
  try {
    produced = producer();
    if (!isPromiseLike<Template>(produced)) {
      mergeSubtree(node, produced, options);
    }
  } catch (error) {
    node.transition('merge-failed');
    throw toMergeFailure(error, templatePath);
  }

  const merge: DeferredMerge = isPromiseLike<Template>(produced)
    ? {
        mode: 'async',
        templatePath,
        settled: completeAsync(weakHandle(node), produced, options, templatePath)
      }
    : { mode: 'sync', templatePath, settled: Promise.resolve<MergeOutcome>('merged') };

  node.attachMerge(merge);
  return merge;
}
