import type { TypeToken, QualifierValue } from "@linchpin/types";

/**
 * Canonical registry key for a (type, qualifier) pair.
 *
 * @example
 * bindingKey(token("app.Repo")) => "app.Repo:"
 * bindingKey(token("app.Repo"), named("main")) => "app.Repo:main"
 */
export function bindingKey(type: TypeToken, qualifier?: QualifierValue): string {
  return `${type.id}:${qualifier?.value ?? ""}`;
}
