/**
 * A node the evaluator handled, with the value it evaluates to.
 *
 * Note:
 * `value` may legitimately be `undefined` or `null`; that is distinct from
 * the node not being handled (`handled: false`).
 */
export type Evaluated<T> = {
  handled: true;
  value: T;
};

/**
 * A node the strategy does not apply to. The dispatcher moves on to the next
 * strategy.
 */
export type NotHandled = {
  handled: false;
};

/**
 * Outcome of one evaluation strategy.
 *
 * Pattern:
 * - `handled: true`  => the node was evaluated (`Evaluated<T>`)
 * - `handled: false` => try the next strategy (`NotHandled`)
 *
 * Strategies throw for nodes they own but cannot evaluate (an undefined
 * symbol, a wrongly typed operand); `NotHandled` only means "not mine".
 */
export type EvaluationResult<T = unknown> = Evaluated<T> | NotHandled;

/**
 * Shared "not mine" sentinel; avoids allocation at every miss.
 */
export const NOT_HANDLED: NotHandled = { handled: false } as const;

export function evaluated<T>(value: T): Evaluated<T> {
  return { handled: true, value };
}
