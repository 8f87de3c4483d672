/**
 * Namespace Registry - Type Definitions
 */

/**
 * A capability object reachable from `[namespace:action ... /]` tags.
 * `execute` may return a value or a promise of one.
 */
export interface NamespaceHandler {
  execute(
    action: string,
    attributes: Readonly<Record<string, unknown>>,
    params: readonly string[]
  ): unknown;
}

export interface ActionMetadata {
  /** Result of this action should not be surfaced to the caller. */
  noResponse?: boolean;
  /** Action is refused even when the allow-list admits it. */
  forbid: boolean;
}

/** Normalized namespace metadata, as stored by the registry. */
export interface NamespaceMetadata {
  /** Permitted actions; empty means unrestricted. */
  allowedActions: readonly string[];
  noResponse?: boolean;
  actions: Readonly<Record<string, ActionMetadata>>;
  description?: string;
  /** Keys the registry does not interpret, kept as given. */
  extra: Readonly<Record<string, unknown>>;
}

export interface NamespaceInfo {
  namespace: string;
  description?: string;
  allowedActions: readonly string[];
}
