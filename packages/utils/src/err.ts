const symErr = Symbol("err");

export type Err<T> = {[symErr]: true; error: T};

export type Result<T, E> = T | Err<E>;

export function Err<T>(error: T): Err<T> {
  return {[symErr]: true, error};
}

/**
 * Typeguard for Err<T>. Allows the pattern
 * ```ts
 * const receipt = await system.submitExecution(subject, slashIndex);
 * if (isErr(receipt)) {
 *   return receipt.error.reason;
 * }
 * return receipt.slashedAmount;
 * ```
 * Since the non-error is not wrapped, it uses a symbol to prevent collisions
 */
export function isErr<T, E>(result: Result<T, E>): result is Err<E> {
  return result !== null && typeof result === "object" && (result as Err<E>)[symErr] === true;
}
