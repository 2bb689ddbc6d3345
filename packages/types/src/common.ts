// Constructor type for class tokens. `never[]` keeps constructors with any
// parameter list assignable without falling back to `any`.
export type Type<T = unknown> = new (...args: never[]) => T;

/**
 * Explicit runtime descriptor of a requested type. Stands in for reified
 * generics: the `id` is the type identity used in binding keys, `is` checks
 * produced values and parameters at runtime.
 */
export interface TypeToken<T = unknown> {
  readonly id: string;
  readonly label: string;
  is(value: unknown): value is T;
}

// Anything that can identify a binding: an explicit token or a class.
export type TokenLike<T = unknown> = TypeToken<T> | Type<T>;

// Ordered construction parameters; `undefined` when none were supplied.
export type Params = readonly unknown[] | undefined;
