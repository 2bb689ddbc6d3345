import createDebug from "debug";
import type {
  Provider,
  QualifierValue,
  ResolveRequest,
  ServiceLocator,
  TokenLike,
} from "@linchpin/types";
import { ImmutableModuleError } from "../errors/injection-error";
import { bindingKey } from "./binding-key";
import { FactoryBinding, SingletonBinding } from "./bindings";
import type { Producer } from "./bindings";
import { createProvider, resolveFrom } from "./provider";
import type { Qualifier } from "./qualifier";
import { BindingRegistry } from "./registry";
import { normalizeRequest, requestFromArgs } from "./request";
import { toTypeToken } from "./type-token";

const debug = createDebug("linchpin:core:builder");

export type ModuleDeclaration = (builder: ModuleBuilder) => void;

/**
 * Mutable context a declaration block runs against. Seeded with everything
 * merged from earlier declarations, so lookups see parents and bindings
 * declared earlier in the same block, but not later ones.
 */
export class ModuleBuilder implements ServiceLocator {
  readonly registry = new BindingRegistry();
  private sealed = false;

  constructor(seed?: BindingRegistry) {
    if (seed) this.registry.putAll(seed);
  }

  get isSealed(): boolean {
    return this.sealed;
  }

  factory<T>(type: TokenLike<T>, producer: Producer<T>): void;
  factory<T>(type: TokenLike<T>, qualifier: QualifierValue | undefined, producer: Producer<T>): void;
  factory<T>(
    type: TokenLike<T>,
    qualifierOrProducer: QualifierValue | Producer<T> | undefined,
    producer?: Producer<T>,
  ): void {
    const [qualifier, produce] = splitDeclaration(qualifierOrProducer, producer);
    const key = this.declarationKey("declare factory", type, qualifier);
    this.registry.put(key, new FactoryBinding(key, produce, this));
  }

  singleton<T>(type: TokenLike<T>, producer: Producer<T>): void;
  singleton<T>(type: TokenLike<T>, qualifier: QualifierValue | undefined, producer: Producer<T>): void;
  singleton<T>(
    type: TokenLike<T>,
    qualifierOrProducer: QualifierValue | Producer<T> | undefined,
    producer?: Producer<T>,
  ): void {
    const [qualifier, produce] = splitDeclaration(qualifierOrProducer, producer);
    const key = this.declarationKey("declare singleton", type, qualifier);
    this.registry.put(key, new SingletonBinding(key, produce, this));
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

  /** Ends the declaration phase; later `factory`/`singleton` calls throw. */
  seal(): BindingRegistry {
    this.sealed = true;
    debug("sealed with %d bindings", this.registry.size);
    return this.registry.freeze();
  }

  private declarationKey(
    operation: string,
    type: TokenLike,
    qualifier: QualifierValue | undefined,
  ): string {
    const key = bindingKey(toTypeToken(type), qualifier);
    if (this.sealed) throw new ImmutableModuleError(operation, key);
    return key;
  }
}

function splitDeclaration<T>(
  qualifierOrProducer: QualifierValue | Producer<T> | undefined,
  producer: Producer<T> | undefined,
): [QualifierValue | undefined, Producer<T>] {
  if (typeof qualifierOrProducer === "function") {
    return [undefined, qualifierOrProducer];
  }
  if (!producer) {
    throw new TypeError("A binding declaration requires a producer function");
  }
  return [qualifierOrProducer, producer];
}
