export type { Type, TypeToken, TokenLike, Params } from "./common";

export type { BindingKind, Factory, Provider, QualifierValue } from "./binding";

export type { ResolveRequest, ServiceLocator } from "./container";
