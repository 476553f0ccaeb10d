import { MergeFailureError } from '../errors';
import { resolveProperty } from '../expression/resolver';
import { SymbolTable, type SymbolScope } from '../symbols/symbol-table';
import type { BuildOptions } from '../types/node';
import type { DescriptorSet } from '../types/registry';
import type { PropertySource, Template } from '../types/template';
import { CompositeNode, applyValues } from './composite-node';
import { attachDeferredSubtree } from './deferred-merge';

/**
 * Where a new node hangs: its parent node, and the table its symbols
 * delegate to (the parent's own table, or a merge scope of the parent).
 */
export type ParentLink = {
  node: CompositeNode;
  scope: SymbolTable;
};

export type BuildPlacement = {
  parent?: ParentLink;
  /** Initial state of the new node's symbol table. */
  state?: Readonly<Record<string, unknown>>;
};

/**
 * Resolves a set of property sources, all or nothing.
 *
 * Nothing is returned (or applied anywhere) unless every property resolved,
 * so a failure never leaves a node partially configured.
 */
export function resolveProperties(
  sources: ReadonlyMap<string, PropertySource>,
  descriptors: DescriptorSet,
  scope: SymbolScope,
  targetType: string,
  options: BuildOptions
): Map<string, unknown> {
  const context = {
    targetType,
    evaluator: options.evaluator,
    symbolPrefix: options.symbolPrefix
  };

  const values = new Map<string, unknown>();
  for (const [name, source] of sources) {
    values.set(name, resolveProperty(name, source, descriptors, scope, context));
  }
  return values;
}

/**
 * Builds a node (and its declared children) from a validated template.
 *
 * Phases:
 * 1. Building: constants, property resolution, target application, then
 *    children in declaration order. Any failure aborts before deferred work
 *    is scheduled.
 * 2. If the template references another template, its subtree is attached
 *    through {@link attachDeferredSubtree}. A subtree produced synchronously
 *    is merged before this function returns, and its failure is thrown
 *    from here as a `MergeFailureError`. Otherwise the node is returned
 *    immediately and the merge completes later.
 *
 * A node whose construction fails is torn down and never returned.
 */
export function buildNode(
  template: Template,
  options: BuildOptions,
  placement: BuildPlacement = {}
): CompositeNode {
  const { parent, state } = placement;
  const { targetType, outlet } = template;
  const descriptors = options.registry.descriptorsFor(targetType);

  const symbols = new SymbolTable({
    constants: template.constants,
    state,
    parent: parent?.scope
  });
  const properties = new Map<string, PropertySource>(
    Object.entries(template.expressions ?? {})
  );
  const values = resolveProperties(properties, descriptors, symbols, targetType, options);
  symbols.seal();

  const node = new CompositeNode({
    targetType,
    outlet,
    descriptors,
    symbols,
    properties,
    values,
    parent: parent?.node,
    target: options.createTarget?.(targetType, outlet),
    options
  });

  try {
    applyValues(node.target, values);

    for (const child of template.children ?? []) {
      node.appendChild(buildNode(child, options, { parent: { node, scope: symbols } }));
    }

    const { templatePath, relativePath } = template;
    if (templatePath === undefined) {
      node.transition('ready');
    } else {
      const loader = options.loader;
      if (!loader) {
        throw new MergeFailureError(
          new Error('No template loader is configured'),
          templatePath
        );
      }
      attachDeferredSubtree(
        node,
        () => loader.load(templatePath, relativePath),
        options,
        templatePath
      );
    }
  } catch (error) {
    node.dispose();
    throw error;
  }

  options.logger.debug('Node built', {
    targetType,
    outlet,
    mergeState: node.mergeState,
    children: node.children.length
  });

  return node;
}
