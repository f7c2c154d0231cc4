/**
 * Ancestor chains of fault classes.
 */

const chains = new WeakMap<Function, readonly Function[]>();

/**
 * Superclasses of `type`, nearest first, ending at `Error`.
 *
 * The chain excludes `type` itself and is computed once per class.
 * Classes whose constructor chain never reaches `Error` but whose
 * instances are errors (host-provided classes like DOMException) still
 * end at `Error`.
 *
 * @example
 * ```typescript
 * class A extends Error {}
 * class B extends A {}
 * ancestorsOf(B); // [A, Error]
 * ```
 */
export function ancestorsOf(type: Function): readonly Function[] {
  const cached = chains.get(type);
  if (cached) return cached;

  const chain: Function[] = [];
  let current: unknown = Object.getPrototypeOf(type);

  while (typeof current === "function" && current !== Function.prototype) {
    chain.push(current);
    if (current === Error) break;
    current = Object.getPrototypeOf(current);
  }

  const prototype: unknown = type.prototype;
  if (
    type !== Error && chain[chain.length - 1] !== Error &&
    prototype instanceof Error
  ) {
    chain.push(Error);
  }

  Object.freeze(chain);
  chains.set(type, chain);
  return chain;
}
