import {
  booleanType,
  enumeration,
  floatingType,
  optional,
  textType
} from '../../descriptors';
import { createDescriptorRegistry } from '../../descriptors/registry';
import { createEstreeEvaluator } from '../../expression/evaluator';
import { createCapturingLogger } from '../../logger';
import type { BuildOptions, PropertyTarget } from '../../types/node';
import { defineCatalog } from '../../types/registry';

export const catalog = defineCatalog({
  View: {
    properties: { hidden: booleanType, alpha: optional(floatingType) }
  },
  Label: {
    extends: 'View',
    properties: {
      text: textType,
      textAlignment: enumeration({ left: 0, center: 1, right: 2 })
    }
  },
  Stack: {
    extends: 'View',
    properties: { spacing: floatingType }
  }
});

/**
 * A live object stand-in that records every property write.
 */
export class RecordingTarget implements PropertyTarget {
  readonly writes: [string, unknown][] = [];
  private readonly current = new Map<string, unknown>();

  constructor(
    readonly targetType: string,
    readonly outlet?: string
  ) {}

  get(name: string): unknown {
    return this.current.get(name);
  }

  set(name: string, value: unknown): void {
    this.writes.push([name, value]);
    this.current.set(name, value);
  }
}

export type TestBuildOptions = BuildOptions & {
  logger: ReturnType<typeof createCapturingLogger>;
  targets: RecordingTarget[];
};

/**
 * Build options over {@link catalog} with a capturing logger and recording
 * targets. Errors reported through the channel are collected in `errors`.
 */
export function createOptions(
  overrides: Partial<BuildOptions> = {}
): TestBuildOptions & { errors: Error[] } {
  const logger = createCapturingLogger();
  const targets: RecordingTarget[] = [];
  const errors: Error[] = [];

  return {
    registry: createDescriptorRegistry(catalog),
    evaluator: createEstreeEvaluator(),
    createTarget: (targetType, outlet) => {
      const target = new RecordingTarget(targetType, outlet);
      targets.push(target);
      return target;
    },
    onError: error => {
      errors.push(error);
    },
    symbolPrefix: '@',
    ...overrides,
    logger,
    targets,
    errors
  };
}
