import { describe, expect, test } from 'vitest';
import { weakHandle } from '../weak-handle';

describe('weakHandle', () => {
  test('dereferences to the target while it is held', () => {
    const target = { name: 'node' };
    const handle = weakHandle(target);

    expect(handle.deref()).toBe(target);
    expect(handle.released).toBe(false);
  });

  test('stops dereferencing once released', () => {
    const target = { name: 'node' };
    const handle = weakHandle(target);

    handle.release();
    handle.release();

    expect(handle.deref()).toBeUndefined();
    expect(handle.released).toBe(true);
  });
});
