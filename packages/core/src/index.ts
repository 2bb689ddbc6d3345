// Modules
export { Module, module } from "./di/module";
export { ModuleBuilder } from "./di/module-builder";

// Bindings
export { BindingRegistry } from "./di/registry";
export { FactoryBinding, SingletonBinding } from "./di/bindings";
export { bindingKey } from "./di/binding-key";
export { createProvider, resolveFrom } from "./di/provider";
export { ParameterList } from "./di/parameters";

// Type identity
export { Qualifier, named, isQualifier } from "./di/qualifier";
export { token, typeToken, toTypeToken, isTypeToken, Primitive } from "./di/type-token";

// Configuration
export { InjectionConfig } from "./config/env";

// Errors
export {
  InjectionError,
  BindingNotFoundError,
  ParameterError,
  CircularDependencyError,
  ImmutableModuleError,
  FrozenRegistryError,
} from "./errors/injection-error";

// Re-export key types from @linchpin/types
export type {
  Type,
  TypeToken,
  TokenLike,
  Params,
  BindingKind,
  Factory,
  Provider,
  QualifierValue,
  ResolveRequest,
  ServiceLocator,
} from "@linchpin/types";

// Re-export types defined in core
export type { ModuleDeclaration } from "./di/module-builder";
export type { ModuleOptions, ModuleState } from "./di/module";
export type { Producer } from "./di/bindings";
export type { ErrorDetail } from "./config/env";
