import type { QualifierValue } from "@linchpin/types";
import { InjectionConfig } from "../config/env";

export class InjectionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InjectionError";
  }
}

export class BindingNotFoundError extends InjectionError {
  readonly qualifier: string | null;

  constructor(
    public readonly typeLabel: string,
    qualifier?: QualifierValue,
    public readonly available: readonly string[] = [],
  ) {
    const head = `No binding found for type ${typeLabel}, qualifier ${qualifier?.value ?? "default"}`;
    super(
      InjectionConfig.getErrorDetail() === "full" && available.length > 0
        ? `${head}\n\nAvailable bindings:\n${available.map((key) => `  - ${key}`).join("\n")}`
        : head,
    );
    this.name = "BindingNotFoundError";
    this.qualifier = qualifier?.value ?? null;
  }
}

export class ParameterError extends InjectionError {
  constructor(message: string) {
    super(message);
    this.name = "ParameterError";
  }
}

export class CircularDependencyError extends InjectionError {
  constructor(public readonly path: readonly string[]) {
    super(`Circular dependency detected: ${path.join(" → ")}`);
    this.name = "CircularDependencyError";
  }
}

export class ImmutableModuleError extends InjectionError {
  constructor(operation: string, key: string) {
    super(
      `Cannot ${operation} ${key}: the declaration block has finished and the module is immutable. ` +
        "Declare bindings inside the block, or build a child module with this one as a parent.",
    );
    this.name = "ImmutableModuleError";
  }
}

export class FrozenRegistryError extends InjectionError {
  constructor(key: string) {
    super(`Cannot bind ${key}: the registry is frozen`);
    this.name = "FrozenRegistryError";
  }
}
