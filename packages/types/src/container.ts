import type { TokenLike } from "./common";
import type { Provider, QualifierValue } from "./binding";

export type ResolveRequest<T = unknown> = {
  token: TokenLike<T>;
  qualifier?: QualifierValue;
  params?: readonly unknown[];
};

/** Lookup surface shared by finished modules and builders. */
export interface ServiceLocator {
  instance<T>(token: TokenLike<T>, ...params: unknown[]): T;
  resolve<T>(request: ResolveRequest<T>): T;
  providerOf<T>(token: TokenLike<T>, qualifier?: QualifierValue, ...params: unknown[]): Provider<T>;
  has(token: TokenLike, qualifier?: QualifierValue): boolean;
}
