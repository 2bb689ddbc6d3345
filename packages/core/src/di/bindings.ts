import createDebug from "debug";
import type { BindingKind, Factory, Params, ServiceLocator } from "@linchpin/types";
import { ParameterList } from "./parameters";
import { withinResolution } from "./resolution-path";

const debug = createDebug("linchpin:core:binding");

export type Producer<T> = (params: ParameterList, scope: ServiceLocator) => T;

export class FactoryBinding<T> implements Factory<T> {
  readonly kind: BindingKind = "factory";

  constructor(
    readonly key: string,
    private readonly producer: Producer<T>,
    private readonly scope: ServiceLocator,
  ) {}

  create(params?: Params): T {
    return withinResolution(this, this.key, () =>
      this.producer(new ParameterList(params), this.scope),
    );
  }
}

type SingletonCell<T> =
  | { state: "empty" }
  | { state: "constructing" }
  | { state: "ready"; value: T };

/**
 * Runs its producer at most once and returns the first successful result to
 * every later caller, whatever parameters they pass. The cell's state flag
 * guards initialization; a re-entrant `create` while the producer is running
 * is reported as a cycle, and a producer that throws leaves the cell empty.
 */
export class SingletonBinding<T> implements Factory<T> {
  readonly kind: BindingKind = "singleton";
  private cell: SingletonCell<T> = { state: "empty" };

  constructor(
    readonly key: string,
    private readonly producer: Producer<T>,
    private readonly scope: ServiceLocator,
  ) {}

  get initialized(): boolean {
    return this.cell.state === "ready";
  }

  create(params?: Params): T {
    const current = this.cell;
    if (current.state === "ready") return current.value;

    return withinResolution(this, this.key, () => {
      debug("singleton %s → constructing", this.key);
      this.cell = { state: "constructing" };
      try {
        const value = this.producer(new ParameterList(params), this.scope);
        this.cell = { state: "ready", value };
        return value;
      } catch (error) {
        this.cell = { state: "empty" };
        throw error;
      }
    });
  }
}
