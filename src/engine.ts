import {
  type DescriptorRegistry,
  createDescriptorRegistry
} from './descriptors/registry';
import {
  type ExpressionEvaluator,
  createEstreeEvaluator
} from './expression/evaluator';
import { evaluate } from './expression/resolver';
import { type EngineLogger, silentLogger } from './logger';
import { SymbolTable, type SymbolTableInit } from './symbols/symbol-table';
import { buildNode } from './tree/builder';
import type { CompositeNode } from './tree/composite-node';
import { validateTemplate } from './tree/template-validator';
import type {
  BuildOptions,
  ErrorChannel,
  TargetFactory,
  TemplateLoader
} from './types/node';
import type { DescriptorCatalog } from './types/registry';
import type { PropertySource } from './types/template';

/**
 * Engine configuration.
 *
 * Only `registry` is required; every other option has a default.
 */
export type TemplateEngineOptions = {
  /** A descriptor catalog, or a registry created from one. */
  registry: DescriptorCatalog | DescriptorRegistry;

  /** @default createEstreeEvaluator() */
  evaluator?: ExpressionEvaluator;

  /** Needed only by templates that reference other templates. */
  loader?: TemplateLoader;

  /** Creates the live object each node applies its values to. */
  createTarget?: TargetFactory;

  /** @default silentLogger */
  logger?: EngineLogger;

  /**
   * Receives merge failures that happen after construction returned.
   * @default logs the failure through `logger.error`
   */
  onError?: ErrorChannel;

  /**
   * Prefix forcing an enum source to be read as an expression
   * (`@mode` instead of the case named `mode`).
   * @default '@'
   */
  symbolPrefix?: string;
};

export type TemplateEngine = {
  readonly registry: DescriptorRegistry;

  /**
   * Validates a template tree and builds it. `state` seeds the root node's
   * symbol table.
   *
   * @throws {InvalidTemplateError} For malformed templates.
   * @throws {MergeFailureError} When a deferred subtree fails before the
   *   call returns.
   * @throws {TemplateError} For any resolution failure.
   */
  build(template: unknown, state?: Readonly<Record<string, unknown>>): CompositeNode;

  /**
   * Resolves one property of `targetType` outside of a tree.
   */
  resolveProperty(
    targetType: string,
    propertyName: string,
    source: PropertySource,
    table: SymbolTable
  ): unknown;

  createSymbolTable(init?: SymbolTableInit): SymbolTable;
};

function isDescriptorRegistry(
  value: DescriptorCatalog | DescriptorRegistry
): value is DescriptorRegistry {
  return typeof value.descriptorsFor === 'function';
}

/**
 * Resolves the options once, applying defaults.
 */
function resolveOptions(options: TemplateEngineOptions): BuildOptions {
  const logger = options.logger ?? silentLogger;

  return {
    registry: isDescriptorRegistry(options.registry)
      ? options.registry
      : createDescriptorRegistry(options.registry),
    evaluator: options.evaluator ?? createEstreeEvaluator(),
    loader: options.loader,
    createTarget: options.createTarget,
    logger,
    onError:
      options.onError ??
      ((error, node) => {
        logger.error('Deferred merge failed', {
          targetType: node.targetType,
          templatePath: error.templatePath,
          error: error.message
        });
      }),
    symbolPrefix: options.symbolPrefix ?? '@'
  };
}

/**
 * Creates a template engine.
 *
 * @example
 * ```ts
 * const engine = createTemplateEngine({
 *   registry: defineCatalog({
 *     Label: { properties: { text: textType, textAlignment: alignment } }
 *   }),
 *   loader: { load: path => fetchTemplate(path) },
 *   onError: (error, node) => report(error, node.outlet)
 * });
 *
 * const root = engine.build({
 *   targetType: 'Label',
 *   expressions: { text: 'Hello {name}', textAlignment: 'center' },
 *   constants: { name: 'world' }
 * });
 * ```
 */
export function createTemplateEngine(options: TemplateEngineOptions): TemplateEngine {
  const resolved = resolveOptions(options);

  return {
    registry: resolved.registry,

    build: (template, state) =>
      buildNode(validateTemplate(template), resolved, { state }),

    resolveProperty: (targetType, propertyName, source, table) =>
      evaluate(
        propertyName,
        source,
        resolved.registry.require(targetType, propertyName),
        table,
        {
          targetType,
          evaluator: resolved.evaluator,
          symbolPrefix: resolved.symbolPrefix
        }
      ),

    createSymbolTable: init => new SymbolTable(init)
  };
}
