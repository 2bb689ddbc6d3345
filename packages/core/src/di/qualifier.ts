import type { QualifierValue } from "@linchpin/types";

/**
 * Discriminates several bindings of the same type. Two qualifiers are equal
 * when their strings are equal; a missing qualifier is the separate default
 * bucket, so the empty string is rejected.
 */
export class Qualifier implements QualifierValue {
  private constructor(readonly value: string) {
    Object.freeze(this);
  }

  static of(value: string): Qualifier {
    if (value.length === 0) {
      throw new TypeError("Qualifier value must be a non-empty string");
    }
    return new Qualifier(value);
  }

  equals(other: QualifierValue | null | undefined): boolean {
    return other != null && other.value === this.value;
  }

  toString(): string {
    return `Qualifier(${this.value})`;
  }
}

export function named(value: string): Qualifier {
  return Qualifier.of(value);
}

export function isQualifier(value: unknown): value is Qualifier {
  return value instanceof Qualifier;
}
