/**
 * Namespace Registry
 *
 * Maps a namespace name to a capability handler plus metadata (allow-list,
 * per-action flags, response suppression). Invocations are authorized
 * against the metadata before the handler is called, and attributes and
 * params reach the handler frozen.
 *
 * Usage:
 *   const registry = new NamespaceRegistry();
 *   registry.register('fs', { execute: (action, attrs) => ... }, {
 *     allowedActions: ['read', 'list'],
 *     actions: { list: { noResponse: true } },
 *   });
 *   await registry.execute('fs', 'read', { path: 'notes.txt' });
 */

import { AuthorizationError, LookupError, RegistrationError } from '../errors.js';
import { freeze, freezeRecord } from '../freeze.js';
import { describeIdentifierProblem, isIdentifier } from '../parser/identifiers.js';
import { logger as rootLogger, type Logger } from '../logging/logger.js';
import {
  checkActionAllowed,
  normalizeMetadata,
  suppressesResponse,
} from './metadata.js';
import type { NamespaceHandler, NamespaceInfo, NamespaceMetadata } from './types.js';

interface NamespaceEntry {
  handler: NamespaceHandler;
  metadata: NamespaceMetadata;
}

export interface NamespaceRegistryOptions {
  logger?: Logger;
}

export function isNamespaceHandler(value: unknown): value is NamespaceHandler {
  if (value === null || (typeof value !== 'object' && typeof value !== 'function')) {
    return false;
  }
  return 'execute' in value && typeof value.execute === 'function';
}

function requireIdentifier(kind: 'namespace' | 'action' | 'attribute', value: string): void {
  const problem = describeIdentifierProblem(value);
  if (problem) {
    throw new RegistrationError(`Invalid ${kind}: ${problem}`);
  }
}

export class NamespaceRegistry {
  private readonly entries = new Map<string, NamespaceEntry>();
  private readonly log: Logger;

  constructor(options: NamespaceRegistryOptions = {}) {
    this.log = options.logger ?? rootLogger.child('namespaces');
  }

  // ── Registration ─────────────────────────────────────────────────────────

  /**
   * @throws RegistrationError for an invalid name, a duplicate, a handler
   *   without `execute`, or metadata that fails validation
   */
  register(namespace: string, handler: NamespaceHandler, metadata?: unknown): void {
    requireIdentifier('namespace', namespace);
    if (this.entries.has(namespace)) {
      throw new RegistrationError(`Namespace '${namespace}' is already registered`);
    }
    if (!isNamespaceHandler(handler)) {
      throw new RegistrationError(`Handler for namespace '${namespace}' must expose an execute() method`);
    }

    const normalized = normalizeMetadata(namespace, metadata);
    this.entries.set(namespace, { handler, metadata: freeze(normalized) });
    this.log.debug('namespace registered', {
      namespace,
      allowedActions: normalized.allowedActions.length,
    });
  }

  /** @throws RegistrationError when the namespace is not registered */
  unregister(namespace: string): void {
    if (!this.entries.delete(namespace)) {
      throw new RegistrationError(`Namespace '${namespace}' is not registered`);
    }
    this.log.debug('namespace unregistered', { namespace });
  }

  clear(): void {
    this.entries.clear();
  }

  // ── Lookup ───────────────────────────────────────────────────────────────

  get(namespace: string): NamespaceHandler | undefined {
    return this.entries.get(namespace)?.handler;
  }

  /** Normalized metadata; empty metadata for unknown namespaces. */
  getMetadata(namespace: string): NamespaceMetadata {
    const entry = this.entries.get(namespace);
    return entry ? entry.metadata : normalizeMetadata(namespace, undefined);
  }

  isRegistered(namespace: string): boolean {
    return this.entries.has(namespace);
  }

  listNamespaces(): string[] {
    return Array.from(this.entries.keys()).sort();
  }

  describe(): NamespaceInfo[] {
    return this.listNamespaces().map((namespace) => {
      const { metadata } = this.getEntry(namespace);
      return {
        namespace,
        description: metadata.description,
        allowedActions: metadata.allowedActions,
      };
    });
  }

  get size(): number {
    return this.entries.size;
  }

  private getEntry(namespace: string): NamespaceEntry {
    const entry = this.entries.get(namespace);
    if (!entry) {
      throw new LookupError(`Namespace '${namespace}' is not registered`);
    }
    return entry;
  }

  // ── Authorization & dispatch ─────────────────────────────────────────────

  /**
   * Check that `action` may be invoked on `namespace`.
   *
   * @throws RegistrationError for invalid identifiers
   * @throws LookupError when the namespace is not registered
   * @throws AuthorizationError when the allow-list or a `forbid` flag refuses it
   */
  authorize(namespace: string, action: string): NamespaceHandler {
    requireIdentifier('namespace', namespace);
    requireIdentifier('action', action);
    const entry = this.getEntry(namespace);
    try {
      checkActionAllowed(namespace, action, entry.metadata);
    } catch (err) {
      if (err instanceof AuthorizationError) {
        this.log.warn('namespace action refused', { namespace, action, reason: err.message });
      }
      throw err;
    }
    return entry.handler;
  }

  /**
   * Authorize and invoke `handler.execute(action, attributes, params)`.
   * Returns whatever the handler returns, including a promise.
   */
  execute(
    namespace: string,
    action: string,
    attributes: Readonly<Record<string, unknown>> = {},
    params: readonly string[] = []
  ): unknown {
    const handler = this.authorize(namespace, action);
    for (const key of Object.keys(attributes)) {
      requireIdentifier('attribute', key);
    }
    return handler.execute(action, freezeRecord(attributes), freeze(params));
  }

  shouldSuppressResponse(namespace: string, action: string): boolean {
    const entry = this.entries.get(namespace);
    return entry ? suppressesResponse(entry.metadata, action) : false;
  }

  /**
   * Check `action` against an explicit metadata object, or the registered
   * metadata when none is given.
   *
   * @throws AuthorizationError when the action is not permitted
   */
  validateActionMetadata(namespace: string, action: string, metadata?: unknown): void {
    const resolved =
      metadata === undefined ? this.getMetadata(namespace) : normalizeMetadata(namespace, metadata);
    checkActionAllowed(namespace, action, resolved);
  }

  /** Non-throwing companion to `authorize`. */
  isAllowed(namespace: string, action: string): boolean {
    if (!isIdentifier(namespace) || !isIdentifier(action)) return false;
    const entry = this.entries.get(namespace);
    if (!entry) return false;
    try {
      checkActionAllowed(namespace, action, entry.metadata);
      return true;
    } catch {
      return false;
    }
  }
}
