import type { Params, QualifierValue, ResolveRequest, TokenLike, TypeToken } from "@linchpin/types";
import { isQualifier } from "./qualifier";
import { toTypeToken } from "./type-token";

export type NormalizedRequest<T> = {
  type: TypeToken<T>;
  qualifier: QualifierValue | undefined;
  params: Params;
};

export function normalizeRequest<T>(request: ResolveRequest<T>): NormalizedRequest<T> {
  return {
    type: toTypeToken(request.token),
    qualifier: request.qualifier,
    params: request.params,
  };
}

/**
 * Splits `instance(token, ...args)` arguments. A `Qualifier` or `undefined`
 * in first position is the qualifier (`undefined` meaning the default
 * bucket); everything else is a parameter. No parameters left means none
 * were supplied.
 */
export function requestFromArgs<T>(token: TokenLike<T>, args: readonly unknown[]): NormalizedRequest<T> {
  const [first, ...rest] = args;
  if (args.length > 0 && (first === undefined || isQualifier(first))) {
    return {
      type: toTypeToken(token),
      qualifier: first,
      params: rest.length > 0 ? rest : undefined,
    };
  }
  return {
    type: toTypeToken(token),
    qualifier: undefined,
    params: args.length > 0 ? args : undefined,
  };
}
