import type { Type, TypeToken, TokenLike } from "@linchpin/types";

function isPresent<T>(value: unknown): value is T {
  return value !== undefined && value !== null;
}

/**
 * Creates an explicit type token. Without a guard, any value other than
 * `null` or `undefined` passes the runtime check.
 *
 * @example
 * const Config = token<AppConfig>("app.Config");
 * const Port = token<number>("app.Port", (v): v is number => typeof v === "number");
 */
export function token<T>(id: string, is?: (value: unknown) => value is T): TypeToken<T> {
  if (id.length === 0) {
    throw new TypeError("Token id must be a non-empty string");
  }
  return Object.freeze({ id, label: id, is: is ?? isPresent<T> });
}

// Ids handed out per constructor, keyed by the namespaced class name.
const classIds = new WeakMap<Type, Map<string, string>>();
// How many distinct constructors have claimed each namespaced class name.
const claimedNames = new Map<string, number>();

function classId(target: Type, base: string): string {
  let byBase = classIds.get(target);
  if (!byBase) {
    byBase = new Map();
    classIds.set(target, byBase);
  }

  const existing = byBase.get(base);
  if (existing) return existing;

  const claimed = claimedNames.get(base) ?? 0;
  const id = claimed === 0 ? base : `${base}#${claimed + 1}`;
  claimedNames.set(base, claimed + 1);
  byBase.set(base, id);
  return id;
}

/**
 * Token for a class: identity is the (optionally namespaced) class name,
 * the runtime check is `instanceof`. The first class to claim a name keeps
 * it; a different class with the same name gets `Name#2`, `Name#3` and so on.
 * Calling this twice for the same class yields tokens with the same `id`.
 */
export function typeToken<T>(target: Type<T>, namespace = ""): TypeToken<T> {
  const name = target.name || "Anonymous";
  return Object.freeze({
    id: classId(target, namespace ? `${namespace}.${name}` : name),
    label: name,
    is: (value: unknown): value is T => value instanceof target,
  });
}

export function isTypeToken(value: unknown): value is TypeToken {
  if (typeof value !== "object" || value === null) return false;
  return "id" in value && typeof value.id === "string" && "is" in value && typeof value.is === "function";
}

export function toTypeToken<T>(target: TokenLike<T>): TypeToken<T> {
  return typeof target === "function" ? typeToken(target) : target;
}

export const Primitive = Object.freeze({
  String: token<string>("string", (v): v is string => typeof v === "string"),
  Number: token<number>("number", (v): v is number => typeof v === "number"),
  Boolean: token<boolean>("boolean", (v): v is boolean => typeof v === "boolean"),
  BigInt: token<bigint>("bigint", (v): v is bigint => typeof v === "bigint"),
  Symbol: token<symbol>("symbol", (v): v is symbol => typeof v === "symbol"),
  Function: token<(...args: never[]) => unknown>(
    "function",
    (v): v is (...args: never[]) => unknown => typeof v === "function",
  ),
  Object: token<object>("object", (v): v is object => typeof v === "object" && v !== null),
});
