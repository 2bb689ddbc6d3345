import createDebug from "debug";
import type {
  Provider,
  QualifierValue,
  ResolveRequest,
  ServiceLocator,
  TokenLike,
} from "@linchpin/types";
import { InjectionConfig } from "../config/env";
import { CircularDependencyError } from "../errors/injection-error";
import { bindingKey } from "./binding-key";
import { ModuleBuilder } from "./module-builder";
import type { ModuleDeclaration } from "./module-builder";
import { createProvider, resolveFrom } from "./provider";
import type { Qualifier } from "./qualifier";
import { BindingRegistry } from "./registry";
import { normalizeRequest, requestFromArgs } from "./request";
import { toTypeToken } from "./type-token";

const debug = createDebug("linchpin:core:module");

export type ModuleOptions = {
  /** Shown in logs and errors. Defaults to `LINCHPIN_MODULE_NAME` or "module". */
  name?: string;
};

export type ModuleState = "unbuilt" | "building" | "built";

/**
 * Immutable set of bindings, composed from parent modules' declarations and
 * its own. The registry is built on first access by replaying every
 * declaration in order, then frozen.
 */
export class Module implements ServiceLocator {
  readonly name: string;
  readonly declarations: readonly ModuleDeclaration[];
  private currentState: ModuleState = "unbuilt";
  private built: BindingRegistry | null = null;

  constructor(declarations: readonly ModuleDeclaration[], options: ModuleOptions = {}) {
    this.declarations = Object.freeze([...declarations]);
    this.name = options.name ?? InjectionConfig.getDefaultModuleName();
  }

  get state(): ModuleState {
    return this.currentState;
  }

  get registry(): BindingRegistry {
    if (this.built) return this.built;
    if (this.currentState === "building") {
      throw new CircularDependencyError([this.name, this.name]);
    }

    this.currentState = "building";
    try {
      this.built = this.buildRegistry();
      this.currentState = "built";
      return this.built;
    } catch (error) {
      this.currentState = "unbuilt";
      throw error;
    }
  }

  instance<T>(type: TokenLike<T>, qualifier: Qualifier | undefined, ...params: unknown[]): T;
  instance<T>(type: TokenLike<T>, ...params: unknown[]): T;
  instance<T>(type: TokenLike<T>, ...args: unknown[]): T {
    const request = requestFromArgs(type, args);
    return resolveFrom(this.registry, request.type, request.qualifier, request.params);
  }

  resolve<T>(request: ResolveRequest<T>): T {
    const { type, qualifier, params } = normalizeRequest(request);
    return resolveFrom(this.registry, type, qualifier, params);
  }

  providerOf<T>(type: TokenLike<T>, qualifier?: QualifierValue, ...params: unknown[]): Provider<T> {
    return createProvider(
      this.registry,
      toTypeToken(type),
      qualifier,
      params.length > 0 ? params : undefined,
    );
  }

  has(type: TokenLike, qualifier?: QualifierValue): boolean {
    return this.registry.has(bindingKey(toTypeToken(type), qualifier));
  }

  keys(): string[] {
    return this.registry.keys().sort();
  }

  private buildRegistry(): BindingRegistry {
    debug("build %s: %d declarations", this.name, this.declarations.length);
    const merged = new BindingRegistry();
    for (const declaration of this.declarations) {
      const builder = new ModuleBuilder(merged);
      declaration(builder);
      merged.putAll(builder.seal());
    }
    debug("build %s: %d bindings", this.name, merged.size);
    return merged.freeze();
  }
}

/**
 * Creates a module from an optional set of parents and a declaration block.
 * Parents' declarations are replayed first, in the order given, so a child
 * sees every parent binding and overrides any it redeclares. The result is an
 * isolated graph: nothing it builds is shared with its parents or siblings.
 *
 * @example
 * const core = module((b) => {
 *   b.factory(Repository, () => new Repository());
 *   b.singleton(Counter, () => new Counter());
 * });
 *
 * const app = module([core], (b) => {
 *   b.factory(UseCase, (params) => new UseCase(b.instance(Repository), params.get(Primitive.String)));
 * });
 *
 * const useCase = app.instance(UseCase, "example-id");
 */
export function module(declaration: ModuleDeclaration, options?: ModuleOptions): Module;
export function module(
  parents: Iterable<Module>,
  declaration: ModuleDeclaration,
  options?: ModuleOptions,
): Module;
export function module(
  parentsOrDeclaration: Iterable<Module> | ModuleDeclaration,
  declarationOrOptions?: ModuleDeclaration | ModuleOptions,
  maybeOptions?: ModuleOptions,
): Module {
  if (typeof parentsOrDeclaration === "function") {
    const options = typeof declarationOrOptions === "object" ? declarationOrOptions : undefined;
    return new Module([parentsOrDeclaration], options);
  }

  if (typeof declarationOrOptions !== "function") {
    throw new TypeError("module() requires a declaration block after its parent modules");
  }

  const declarations: ModuleDeclaration[] = [];
  for (const parent of new Set(parentsOrDeclaration)) {
    declarations.push(...parent.declarations);
  }
  declarations.push(declarationOrOptions);

  return new Module(declarations, maybeOptions);
}
