import createDebug from "debug";
import type { Factory } from "@linchpin/types";
import { FrozenRegistryError } from "../errors/injection-error";

const debug = createDebug("linchpin:core:registry");

/**
 * Keyed map of bindings. Writes overwrite unconditionally until the registry
 * is frozen; reads are always allowed.
 */
export class BindingRegistry {
  private readonly bindings = new Map<string, Factory>();
  private locked = false;

  get size(): number {
    return this.bindings.size;
  }

  get frozen(): boolean {
    return this.locked;
  }

  put(key: string, factory: Factory): void {
    if (this.locked) throw new FrozenRegistryError(key);
    if (this.bindings.has(key)) {
      debug("rebind %s (%s)", key, factory.kind);
    } else {
      debug("bind %s (%s)", key, factory.kind);
    }
    this.bindings.set(key, factory);
  }

  putAll(other: BindingRegistry): void {
    if (this.locked) throw new FrozenRegistryError("merged bindings");
    debug("merge %d bindings", other.size);
    for (const [key, factory] of other.entries()) {
      this.bindings.set(key, factory);
    }
  }

  get(key: string): Factory | undefined {
    return this.bindings.get(key);
  }

  has(key: string): boolean {
    return this.bindings.has(key);
  }

  keys(): string[] {
    return [...this.bindings.keys()];
  }

  entries(): IterableIterator<[string, Factory]> {
    return this.bindings.entries();
  }

  freeze(): this {
    this.locked = true;
    return this;
  }
}
