import createDebug from "debug";
import type { Params, Provider, QualifierValue, TypeToken } from "@linchpin/types";
import { BindingNotFoundError } from "../errors/injection-error";
import { bindingKey } from "./binding-key";
import type { BindingRegistry } from "./registry";

const debug = createDebug("linchpin:core:provider");

/**
 * Looks up (type, qualifier) in `registry` and creates a value, checking it
 * against the token. A missing binding and a mismatched value surface as the
 * same error.
 */
export function resolveFrom<T>(
  registry: BindingRegistry,
  type: TypeToken<T>,
  qualifier: QualifierValue | undefined,
  params: Params,
): T {
  const factory = registry.get(bindingKey(type, qualifier));
  if (!factory) {
    throw new BindingNotFoundError(type.label, qualifier, registry.keys().sort());
  }

  const value = factory.create(params);
  if (!type.is(value)) {
    throw new BindingNotFoundError(type.label, qualifier);
  }
  return value;
}

/**
 * Creates a provider bound to `registry`. The binding must exist now;
 * each `get()` resolves it again at call time.
 */
export function createProvider<T>(
  registry: BindingRegistry,
  type: TypeToken<T>,
  qualifier: QualifierValue | undefined,
  params: Params,
): Provider<T> {
  const key = bindingKey(type, qualifier);
  if (!registry.has(key)) {
    throw new BindingNotFoundError(type.label, qualifier, registry.keys().sort());
  }

  debug("provider %s", key);
  return {
    get: () => resolveFrom(registry, type, qualifier, params),
  };
}
