/**
 * The process-wide namespace registry that execution contexts fall back to.
 * The default runtime installs its own registry here.
 */

import { NamespaceRegistry } from './registry.js';

let shared: NamespaceRegistry | undefined;

export function getSharedNamespaces(): NamespaceRegistry {
  shared ??= new NamespaceRegistry();
  return shared;
}

/** Replace the shared registry; `undefined` drops it so the next read creates a fresh one. */
export function setSharedNamespaces(registry: NamespaceRegistry | undefined): void {
  shared = registry;
}
