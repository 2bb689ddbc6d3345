import type { Params, TokenLike } from "@linchpin/types";
import { ParameterError } from "../errors/injection-error";
import { toTypeToken } from "./type-token";

function describeValue(value: unknown): string {
  if (value === null) return "null";
  if (typeof value === "object" || typeof value === "function") {
    const name: unknown = value.constructor?.name;
    return typeof name === "string" && name.length > 0 ? name : typeof value;
  }
  return typeof value;
}

/** Construction parameters as handed to a binding's producer. */
export class ParameterList {
  private readonly values: readonly unknown[] | undefined;

  constructor(params?: Params) {
    this.values = params;
  }

  get supplied(): boolean {
    return this.values !== undefined;
  }

  get size(): number {
    return this.values?.length ?? 0;
  }

  toArray(): unknown[] {
    return this.values ? [...this.values] : [];
  }

  /** Value at `index`, which must match `type`. */
  get<T>(type: TokenLike<T>, index = 0): T {
    const values = this.require();
    const expected = toTypeToken(type);

    if (!Number.isInteger(index) || index < 0 || index >= values.length) {
      throw new ParameterError(
        `Index ${index} is out of bounds for parameters of size ${values.length}`,
      );
    }

    const value = values[index];
    if (!expected.is(value)) {
      throw new ParameterError(
        `Parameter at index ${index} is of type ${describeValue(value)}, expected ${expected.label}`,
      );
    }
    return value;
  }

  /** First value matching `type`. */
  find<T>(type: TokenLike<T>): T {
    const expected = toTypeToken(type);
    for (const value of this.require()) {
      if (expected.is(value)) return value;
    }
    throw new ParameterError(`No parameter of type ${expected.label} found`);
  }

  private require(): readonly unknown[] {
    if (!this.values) {
      throw new ParameterError("No parameters were supplied");
    }
    return this.values;
  }
}
