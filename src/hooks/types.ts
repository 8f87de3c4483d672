/**
 * Hook/Filter System - Type Definitions
 */

import type { Logger } from '../logging/logger.js';

/** Action callback: invoked for side effects, return value discarded. */
export type ActionCallback = (...args: unknown[]) => unknown;

/** Filter callback: receives the current value and returns the next one. */
export type FilterCallback = (value: unknown, ...args: unknown[]) => unknown;

export type HookKind = 'action' | 'filter';

/**
 * A registered callback. Entries run in ascending `priority`, ties broken by
 * registration order.
 */
export interface HookEntry<C> {
  id: string;
  name: string;
  callback: C;
  priority: number;
  order: number;
}

/** Read-only view of a registration, for introspection. */
export interface HookInfo {
  id: string;
  priority: number;
  order: number;
}

export interface RemovalOptions {
  /** Required for critical hook names. */
  allowCritical?: boolean;
  /** Must match the registry's configured removal token for critical hooks. */
  removalToken?: string;
}

export interface HookRegistryOptions {
  /** Secret that unlocks removal of critical hooks; unset means never. */
  removalToken?: string;
  /** Extra names protected in addition to the built-in critical hooks. */
  criticalHooks?: Iterable<string>;
  logger?: Logger;
}

export interface HookStats {
  /** Registered action callbacks across all names. */
  totalActions: number;
  /** Registered filter callbacks across all names. */
  totalFilters: number;
  /** Names with at least one action. */
  actionHooks: number;
  /** Names with at least one filter. */
  filterHooks: number;
}
