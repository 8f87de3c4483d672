/**
 * Hook Registry
 *
 * Priority-ordered action and filter callbacks keyed by hook name.
 *
 *   - actions: broadcast for side effects; return values are discarded
 *   - filters: thread a value through each callback in turn
 *
 * Dispatch works on a snapshot of the bucket, so callbacks may register or
 * remove hooks (including on the hook being dispatched) without affecting
 * the run in progress. Arguments are frozen before any callback sees them.
 * A callback that throws is logged and skipped; dispatch never throws.
 *
 * Usage:
 *   const hooks = new HookRegistry({ removalToken: 'test-secret' });
 *   const id = hooks.addAction('before_execute', (tag) => audit(tag), 5);
 *   hooks.doAction('before_execute', tag);
 *   const value = hooks.apply('result', raw, tag);
 *   hooks.removeAction('before_execute', id);
 */

import { createHash, timingSafeEqual } from 'crypto';
import { AuthorizationError, RegistrationError } from '../errors.js';
import { freeze, freezeArgs } from '../freeze.js';
import { isPromiseLike } from '../async.js';
import { isHookName } from '../parser/identifiers.js';
import { logger as rootLogger, type Logger } from '../logging/logger.js';
import { CRITICAL_HOOKS } from './points.js';
import type {
  ActionCallback,
  FilterCallback,
  HookEntry,
  HookInfo,
  HookKind,
  HookRegistryOptions,
  HookStats,
  RemovalOptions,
} from './types.js';

export const DEFAULT_PRIORITY = 10;

function tokensMatch(given: string, expected: string): boolean {
  // Hash first so the comparison runs on equal-length buffers.
  const a = createHash('sha256').update(given).digest();
  const b = createHash('sha256').update(expected).digest();
  return timingSafeEqual(a, b);
}

function validateHookName(name: string): void {
  if (!isHookName(name)) {
    throw new RegistrationError(`Invalid hook name '${name}'`);
  }
}

function toInfo<C>(entry: HookEntry<C>): HookInfo {
  return { id: entry.id, priority: entry.priority, order: entry.order };
}

export class HookRegistry {
  private readonly actions = new Map<string, HookEntry<ActionCallback>[]>();
  private readonly filters = new Map<string, HookEntry<FilterCallback>[]>();
  private readonly critical: ReadonlySet<string>;
  private readonly removalToken: string;
  private readonly log: Logger;
  private nextActionId = 0;
  private nextFilterId = 0;
  private nextOrder = 0;

  constructor(options: HookRegistryOptions = {}) {
    this.removalToken = options.removalToken?.trim() ?? '';
    this.critical = new Set([...CRITICAL_HOOKS, ...(options.criticalHooks ?? [])]);
    this.log = options.logger ?? rootLogger.child('hooks');
  }

  // ── Registration ─────────────────────────────────────────────────────────

  /**
   * Register an action callback.
   *
   * @param priority - lower runs first (default 10)
   * @returns an id of the form `action-<n>`
   */
  addAction(name: string, callback: ActionCallback, priority = DEFAULT_PRIORITY): string {
    const id = `action-${++this.nextActionId}`;
    this.insert(this.actions, id, name, callback, priority);
    return id;
  }

  /**
   * Register a filter callback.
   *
   * @param priority - lower runs first (default 10)
   * @returns an id of the form `filter-<n>`
   */
  addFilter(name: string, callback: FilterCallback, priority = DEFAULT_PRIORITY): string {
    const id = `filter-${++this.nextFilterId}`;
    this.insert(this.filters, id, name, callback, priority);
    return id;
  }

  private insert<C>(
    buckets: Map<string, HookEntry<C>[]>,
    id: string,
    name: string,
    callback: C,
    priority: number
  ): void {
    validateHookName(name);
    if (typeof callback !== 'function') {
      throw new RegistrationError(`Hook callback for '${name}' must be a function`);
    }
    if (!Number.isFinite(priority)) {
      throw new RegistrationError(`Hook priority for '${name}' must be a finite number`);
    }

    const bucket = buckets.get(name) ?? [];
    bucket.push({ id, name, callback, priority, order: this.nextOrder++ });
    bucket.sort((a, b) => a.priority - b.priority || a.order - b.order);
    buckets.set(name, bucket);
  }

  // ── Dispatch ─────────────────────────────────────────────────────────────

  /**
   * Call every action registered under `name` with frozen `args`.
   */
  doAction(name: string, ...args: unknown[]): void {
    const snapshot = this.actions.get(name)?.slice();
    if (!snapshot || snapshot.length === 0) return;

    const safeArgs = freezeArgs(args);
    for (const entry of snapshot) {
      try {
        const out = entry.callback(...safeArgs);
        if (isPromiseLike(out)) {
          void Promise.resolve(out).catch((err: unknown) => this.reportFailure('action', entry, err));
        }
      } catch (err) {
        this.reportFailure('action', entry, err);
      }
    }
  }

  /**
   * Thread `value` through every filter registered under `name`.
   * Returns `value` untouched when there are none. A failing filter leaves
   * the current value as it was.
   */
  apply(name: string, value: unknown, ...args: unknown[]): unknown {
    const snapshot = this.filters.get(name)?.slice();
    if (!snapshot || snapshot.length === 0) return value;

    const safeArgs = freezeArgs(args);
    let current = value;
    for (const entry of snapshot) {
      try {
        current = entry.callback(freeze(current), ...safeArgs);
      } catch (err) {
        this.reportFailure('filter', entry, err);
      }
    }
    return current;
  }

  private reportFailure<C>(kind: HookKind, entry: HookEntry<C>, err: unknown): void {
    this.log.warn(
      `${kind} callback failed`,
      { hook: entry.name, id: entry.id, priority: entry.priority },
      err
    );
  }

  // ── Removal ──────────────────────────────────────────────────────────────

  /**
   * Remove one action by id or by callback identity.
   *
   * @throws AuthorizationError for a critical hook without a valid token
   */
  removeAction(name: string, idOrCallback: string | ActionCallback, options: RemovalOptions = {}): boolean {
    return this.removeOne(this.actions, name, idOrCallback, options);
  }

  /**
   * Remove one filter by id or by callback identity.
   *
   * @throws AuthorizationError for a critical hook without a valid token
   */
  removeFilter(name: string, idOrCallback: string | FilterCallback, options: RemovalOptions = {}): boolean {
    return this.removeOne(this.filters, name, idOrCallback, options);
  }

  removeAllActions(name: string, options: RemovalOptions = {}): boolean {
    validateHookName(name);
    this.ensureRemovalAllowed(name, options);
    return this.actions.delete(name);
  }

  removeAllFilters(name: string, options: RemovalOptions = {}): boolean {
    validateHookName(name);
    this.ensureRemovalAllowed(name, options);
    return this.filters.delete(name);
  }

  private removeOne<C>(
    buckets: Map<string, HookEntry<C>[]>,
    name: string,
    idOrCallback: string | C,
    options: RemovalOptions
  ): boolean {
    validateHookName(name);
    this.ensureRemovalAllowed(name, options);

    const bucket = buckets.get(name);
    if (!bucket) return false;

    const kept =
      typeof idOrCallback === 'string'
        ? bucket.filter((entry) => entry.id !== idOrCallback)
        : bucket.filter((entry) => entry.callback !== idOrCallback);

    if (kept.length === 0) {
      buckets.delete(name);
    } else {
      buckets.set(name, kept);
    }
    return kept.length !== bucket.length;
  }

  private ensureRemovalAllowed(name: string, options: RemovalOptions): void {
    if (!this.critical.has(name)) return;

    if (options.allowCritical !== true) {
      throw new AuthorizationError(`Critical hook '${name}' cannot be removed without allowCritical`);
    }
    if (this.removalToken === '') {
      throw new AuthorizationError(
        `Critical hook '${name}' cannot be removed: no removal token is configured`
      );
    }
    if (!options.removalToken || !tokensMatch(options.removalToken, this.removalToken)) {
      this.log.warn('rejected critical hook removal', { hook: name });
      throw new AuthorizationError(`Critical hook '${name}' requires a matching removal token`);
    }
  }

  // ── Introspection ────────────────────────────────────────────────────────

  isCritical(name: string): boolean {
    return this.critical.has(name);
  }

  hasAction(name: string): boolean {
    return (this.actions.get(name)?.length ?? 0) > 0;
  }

  hasFilter(name: string): boolean {
    return (this.filters.get(name)?.length ?? 0) > 0;
  }

  /** Registrations for `name`, in dispatch order. */
  getHooks(name: string): { actions: HookInfo[]; filters: HookInfo[] } {
    return {
      actions: (this.actions.get(name) ?? []).map(toInfo),
      filters: (this.filters.get(name) ?? []).map(toInfo),
    };
  }

  /** Every name with at least one action or filter, sorted. */
  listHooks(): string[] {
    return Array.from(new Set([...this.actions.keys(), ...this.filters.keys()])).sort();
  }

  getStats(): HookStats {
    let totalActions = 0;
    let totalFilters = 0;
    for (const bucket of this.actions.values()) totalActions += bucket.length;
    for (const bucket of this.filters.values()) totalFilters += bucket.length;
    return {
      totalActions,
      totalFilters,
      actionHooks: this.actions.size,
      filterHooks: this.filters.size,
    };
  }

  /**
   * Drop every non-critical registration. Critical buckets survive; remove
   * them one by one with the token.
   */
  clear(): void {
    for (const buckets of [this.actions, this.filters]) {
      for (const name of Array.from(buckets.keys())) {
        if (!this.critical.has(name)) buckets.delete(name);
      }
    }
  }
}
