/**
 * A non-owning reference to an object.
 *
 * Contract: the handle never keeps its target alive. Once the target is
 * collected or the handle is released, `deref()` returns `undefined` for
 * good, and holders are expected to treat that as "target gone" and do
 * nothing.
 */
export type WeakHandle<T extends object> = {
  deref(): T | undefined;

  /** Severs the handle explicitly (teardown). Idempotent. */
  release(): void;

  readonly released: boolean;
};

export function weakHandle<T extends object>(target: T): WeakHandle<T> {
  let ref: WeakRef<T> | undefined = new WeakRef(target);

  return {
    deref: () => ref?.deref(),
    release() {
      ref = undefined;
    },
    get released() {
      return ref === undefined || ref.deref() === undefined;
    }
  };
}
