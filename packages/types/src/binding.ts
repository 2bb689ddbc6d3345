import type { Params } from "./common";

export type BindingKind = "factory" | "singleton";

/** Produces values of one bound type. */
export interface Factory<T = unknown> {
  readonly kind: BindingKind;
  create(params?: Params): T;
}

/** Deferred resolution handle; construction happens on `get()`. */
export interface Provider<T = unknown> {
  get(): T;
}

// Structural view of a qualifier, so contracts do not depend on the runtime class.
export type QualifierValue = {
  readonly value: string;
};
