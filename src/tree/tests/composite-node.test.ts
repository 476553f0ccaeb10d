import { describe, expect, it } from 'vitest';
import { ABSENT } from '../../optional';
import { captureError } from '../../tests/helpers';
import type { Template } from '../../types/template';
import { buildNode } from '../builder';
import { createOptions } from './helpers';

const flagged: Template = {
  targetType: 'Stack',
  outlet: 'root',
  expressions: { spacing: 'count' },
  children: [{ targetType: 'Label', outlet: 'kid', expressions: { hidden: 'flag' } }]
};

const stack: Template = {
  targetType: 'Stack',
  outlet: 'root',
  constants: { greeting: 'Hi' },
  expressions: { spacing: 'count' },
  children: [
    { targetType: 'Label', outlet: 'first', expressions: { text: '{greeting}, {name}' } },
    { targetType: 'Label', outlet: 'second', expressions: { text: 'n={count}' } }
  ]
};

/**
 * Test suite: node construction and the live node API.
 *
 * Coverage:
 * - Construction without deferred work (`building -> ready`).
 * - Symbol delegation from children to ancestors.
 * - All-or-nothing construction and teardown on failure.
 * - State replacement, refresh and disposal.
 */
describe('buildNode', () => {
  it('builds a node without deferred work straight to ready', () => {
    const options = createOptions();

    const node = buildNode(
      { targetType: 'Label', expressions: { text: 'Hi', textAlignment: 'center' } },
      options
    );

    expect(node.mergeState).toBe('ready');
    expect(node.merge).toBeUndefined();
    expect(node.children).toEqual([]);
    expect(options.targets[0]?.writes).toEqual([
      ['text', 'Hi'],
      ['textAlignment', 1]
    ]);
  });

  it('attaches declared children in order, delegating symbols upwards', () => {
    const options = createOptions();

    const root = buildNode(stack, options, { state: { name: 'Ada', count: 3 } });

    expect(root.children.map(child => child.outlet)).toEqual(['first', 'second']);
    expect(root.children[0]?.parent).toBe(root);
    expect(root.children[0]?.values.get('text')).toBe('Hi, Ada');
    expect(root.children[1]?.values.get('text')).toBe('n=3');
    expect(root.findOutlet('second')).toBe(root.children[1]);
    expect(root.findOutlet('missing')).toBeUndefined();
  });

  it('applies absent optional values as undefined', () => {
    const options = createOptions();

    const node = buildNode(
      { targetType: 'View', expressions: { alpha: 'undefined', hidden: 'false' } },
      options
    );

    expect(node.value('alpha')).toBe(ABSENT);
    expect(options.targets[0]?.writes).toEqual([
      ['alpha', undefined],
      ['hidden', false]
    ]);
  });

  it('falls back to the target for properties the template does not set', () => {
    const options = createOptions();
    const node = buildNode({ targetType: 'View' }, options);

    node.target?.set('hidden', true);

    expect(node.value('hidden')).toBe(true);
  });

  it('creates no target when a property fails to resolve', () => {
    const options = createOptions();

    const error = captureError(() =>
      buildNode({ targetType: 'Label', expressions: { text: '{missing}' } }, options)
    );

    expect(error.message).toBe('Label.text: Undefined symbol "missing"');
    expect(options.targets).toEqual([]);
  });

  it('rejects properties the target type does not declare', () => {
    const error = captureError(() =>
      buildNode({ targetType: 'Label', expressions: { font: 'body' } }, createOptions())
    );

    expect(error.code).toBe('UNKNOWN_PROPERTY');
    expect(error.message).toBe('Label.font: Unknown property "font" for Label');
  });

  it('tears down a node whose child fails', () => {
    const options = createOptions();

    expect(() =>
      buildNode(
        {
          targetType: 'Stack',
          expressions: { spacing: '2' },
          children: [{ targetType: 'Label', expressions: { text: '{missing}' } }]
        },
        options
      )
    ).toThrow('Label.text: Undefined symbol "missing"');

    expect(
      options.logger.entries
        .filter(entry => entry.message === 'Node disposed')
        .map(entry => entry.data)
    ).toEqual([{ targetType: 'Stack' }]);
  });

  it('logs every built node', () => {
    const options = createOptions();
    buildNode(stack, options, { state: { name: 'Ada', count: 3 } });

    expect(
      options.logger.entries
        .filter(entry => entry.message === 'Node built')
        .map(entry => entry.data)
    ).toEqual([
      { targetType: 'Label', outlet: 'first', mergeState: 'ready', children: 0 },
      { targetType: 'Label', outlet: 'second', mergeState: 'ready', children: 0 },
      { targetType: 'Stack', outlet: 'root', mergeState: 'ready', children: 2 }
    ]);
  });
});

describe('CompositeNode', () => {
  describe('setState', () => {
    it('re-resolves the node and its descendants', () => {
      const options = createOptions();
      const root = buildNode(stack, options, { state: { name: 'Ada', count: 3 } });

      root.setState({ name: 'Grace', count: 5 });

      expect(root.values.get('spacing')).toBe(5);
      expect(root.children[0]?.values.get('text')).toBe('Hi, Grace');
      expect(root.children[1]?.values.get('text')).toBe('n=5');
      expect(options.targets[0]?.writes.at(-1)).toEqual(['spacing', 5]);
    });

    it('keeps the previous values when a property fails', () => {
      const root = buildNode(stack, createOptions(), { state: { name: 'Ada', count: 3 } });

      const error = captureError(() => root.setState({ name: 'Ada', count: 'many' }));

      expect(error.message).toBe(
        'Stack.spacing: Type mismatch: expected floating, received text "many"'
      );
      expect(root.values.get('spacing')).toBe(3);
      expect(root.symbols.state).toEqual({ name: 'Ada', count: 3 });
    });

    it('changes nothing in the subtree when a descendant fails', () => {
      const options = createOptions();
      const root = buildNode(flagged, options, { state: { count: 3, flag: false } });

      const error = captureError(() => root.setState({ count: 7, flag: 'nope' }));

      expect(error.code).toBe('TYPE_MISMATCH');
      expect(error.propertyName).toBe('hidden');
      expect(root.symbols.state).toEqual({ count: 3, flag: false });
      expect(root.values.get('spacing')).toBe(3);
      expect(root.children[0]?.values.get('hidden')).toBe(false);
      expect(options.targets.map(target => target.writes)).toEqual([
        [['spacing', 3]],
        [['hidden', false]]
      ]);
    });

    it('rejects state shadowing a constant', () => {
      const root = buildNode(stack, createOptions(), { state: { name: 'Ada', count: 3 } });

      expect(() => root.setState({ greeting: 'Hey', count: 1 })).toThrow(
        'Symbol "greeting" is already defined as a constant'
      );
    });
  });

  describe('dispose', () => {
    it('detaches the subtree once', () => {
      const options = createOptions();
      const root = buildNode(stack, options, { state: { name: 'Ada', count: 3 } });
      const [first] = root.children;

      root.dispose();
      root.dispose();

      expect(root.disposed).toBe(true);
      expect(first?.disposed).toBe(true);
      expect(first?.parent).toBeUndefined();
      expect(first?.symbols.has('greeting')).toBe(false);
      expect(
        options.logger.entries.filter(entry => entry.message === 'Node disposed')
      ).toHaveLength(3);
    });

    it('removes a disposed child from its parent', () => {
      const options = createOptions();
      const root = buildNode(flagged, options, { state: { count: 3, flag: false } });

      root.findOutlet('kid')?.dispose();
      root.setState({ count: 4, flag: true });

      expect(root.children).toEqual([]);
      expect(root.findOutlet('kid')).toBeUndefined();
      expect(root.values.get('spacing')).toBe(4);
      expect(options.targets[1]?.writes).toEqual([['hidden', false]]);
    });
  });

  it('returns snapshots of children and values', () => {
    const root = buildNode(stack, createOptions(), { state: { name: 'Ada', count: 3 } });

    expect(Object.isFrozen(root.children)).toBe(true);
    expect(root.children).not.toBe(root.children);
    expect([...root.properties.keys()]).toEqual(['spacing']);
  });
});
