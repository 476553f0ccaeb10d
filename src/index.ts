export { createTemplateEngine } from './engine';
export type { TemplateEngine, TemplateEngineOptions } from './engine';

export {
  booleanType,
  integerType,
  floatingType,
  textType,
  enumeration,
  structured,
  opaque,
  opaqueSchema,
  optional,
  resolveValue,
  storageAdaptor
} from './descriptors';
export type { EnumOptions, StorageOf } from './descriptors';
export { createDescriptorRegistry } from './descriptors/registry';
export type { DescriptorRegistry } from './descriptors/registry';
export { defineCatalog } from './types/registry';
export type {
  DescriptorCatalog,
  DescriptorSet,
  TargetTypeDefinition
} from './types/registry';
export type * from './types/primitives';
export type { InferResolved, InferValue } from './types/inference';

export {
  ABSENT,
  some,
  none,
  isOptional,
  unwrapOrFail,
  unwrapOrAbsent,
  isAbsent
} from './optional';
export type { Absent, Maybe, Optional } from './optional';

export { SymbolTable } from './symbols/symbol-table';
export type { SymbolScope, SymbolTableInit } from './symbols/symbol-table';

export { createEstreeEvaluator } from './expression/evaluator';
export type {
  EstreeEvaluatorOptions,
  ExpressionEvaluator
} from './expression/evaluator';
export { evaluate, resolveProperty } from './expression/resolver';
export type { ResolutionContext } from './expression/resolver';
export { parseInterpolation } from './expression/interpolation';
export type { Segment } from './expression/interpolation';

export { CompositeNode } from './tree/composite-node';
export { buildNode, resolveProperties } from './tree/builder';
export type { BuildPlacement, ParentLink } from './tree/builder';
export { attachDeferredSubtree } from './tree/deferred-merge';
export type { SubtreeProducer } from './tree/deferred-merge';
export { validateTemplate } from './tree/template-validator';
export { valueSource } from './types/template';
export type { PropertySource, Template, ValueSource } from './types/template';
export type * from './types/node';

export { stringify } from './utils/stringify';

export {
  consoleLogger,
  silentLogger,
  createCapturingLogger
} from './logger';
export type { EngineLogger, LogEntry } from './logger';

export * from './errors';
