/**
 * Execution Context
 *
 * Turns parsed tags into handler calls. Each context owns its handler maps
 * and its own HookRegistry; namespaced tags may also resolve through a
 * local NamespaceRegistry and then a shared fallback registry.
 *
 * Per tag:
 *   before_execute → resolve handler → invoke → (await) → result filter
 *   → after_execute → return
 *
 * Execution stays synchronous until a handler returns a promise; from that
 * point the call returns a promise.
 *
 * Usage:
 *   const ctx = new ExecutionContext({ fallbackNamespaces: null });
 *   ctx.register('greet', (kwargs) => `hello ${String(kwargs.name)}`);
 *   ctx.registerContainer('note', (content) => content.trim());
 *   ctx.execute('[greet /]', { name: 'Ada' });        // 'hello Ada'
 *   await ctx.executeTextAsync('[note] hi [/note]');  // [{ ok: true, ... }]
 */

import { LookupError, ParameterSmugglingError, RegistrationError, errorMessage } from '../errors.js';
import { freeze, freezeRecord } from '../freeze.js';
import { isPromiseLike, thenOrNow, type MaybePromise } from '../async.js';
import { parseAll, parseTag } from '../parser/parser.js';
import { describeIdentifierProblem } from '../parser/identifiers.js';
import type { ContainerTag, NamespacedTag, Tag } from '../parser/types.js';
import { HookRegistry } from '../hooks/registry.js';
import { ContextHooks, HookPoints } from '../hooks/points.js';
import { NamespaceRegistry } from '../namespaces/registry.js';
import { getSharedNamespaces } from '../namespaces/shared.js';
import type { NamespaceHandler } from '../namespaces/types.js';
import { logger as rootLogger, type Logger } from '../logging/logger.js';

// ── Types ────────────────────────────────────────────────────────────────────

/** Caller-supplied keyword arguments. */
export type Kwargs = Readonly<Record<string, unknown>>;

/**
 * Handler for `[action /]` and `[namespace:action ... /]` patterns.
 * Namespaced handlers receive tag attributes merged with the caller's kwargs.
 */
export type TagHandler = (kwargs: Kwargs, params: readonly string[]) => unknown;

/** Handler for `[tag]content[/tag]`. */
export type ContainerHandler = (content: string, kwargs: Kwargs) => unknown;

export type ExecutionRecord =
  | { ok: true; raw: string; tag: Tag; value: unknown; suppressed: boolean }
  | { ok: false; raw: string; tag: Tag; error: string; cause: unknown };

/** Passed to the namespace pre/post execute hooks. */
export interface NamespaceCallInfo {
  raw: string;
  params: readonly string[];
  source: 'local' | 'fallback';
}

export interface ExecutionContextOptions {
  hooks?: HookRegistry;
  /** Registry consulted first for namespaced tags. */
  namespaces?: NamespaceRegistry;
  /**
   * Registry consulted when the local one has no match. Defaults to the
   * shared process-wide registry; `null` disables the fallback.
   */
  fallbackNamespaces?: NamespaceRegistry | null;
  logger?: Logger;
}

function validatePattern(pattern: string): void {
  const parts = pattern.split(':');
  if (parts.length > 2) {
    throw new RegistrationError(`Invalid handler pattern '${pattern}': at most one ':' allowed`);
  }
  for (const part of parts) {
    const problem = describeIdentifierProblem(part);
    if (problem) {
      throw new RegistrationError(`Invalid handler pattern '${pattern}': ${problem}`);
    }
  }
}

function rejectSmuggling(tag: NamespacedTag, kwargs: Kwargs): void {
  const collisions = Object.keys(kwargs).filter((key) =>
    Object.prototype.hasOwnProperty.call(tag.attributes, key)
  );
  if (collisions.length > 0) {
    throw new ParameterSmugglingError(collisions, tag.raw);
  }
}

// ── ExecutionContext ────────────────────────────────────────────────────────

export class ExecutionContext {
  readonly hooks: HookRegistry;
  readonly namespaces: NamespaceRegistry;
  private readonly fallback: NamespaceRegistry | null | undefined;
  private readonly handlers = new Map<string, TagHandler>();
  private readonly containers = new Map<string, ContainerHandler>();
  private readonly log: Logger;

  constructor(options: ExecutionContextOptions = {}) {
    this.log = options.logger ?? rootLogger.child('context');
    this.hooks = options.hooks ?? new HookRegistry({ logger: this.log.child('hooks') });
    this.namespaces = options.namespaces ?? new NamespaceRegistry({ logger: this.log.child('namespaces') });
    this.fallback = options.fallbackNamespaces;
  }

  /** The fallback registry in effect, or null when disabled. */
  get fallbackNamespaces(): NamespaceRegistry | null {
    if (this.fallback === undefined) return getSharedNamespaces();
    return this.fallback;
  }

  // ── Registration ─────────────────────────────────────────────────────────

  /** Register a handler for `"action"` or `"namespace:action"`. Replaces any existing one. */
  register(pattern: string, handler: TagHandler): void {
    validatePattern(pattern);
    if (typeof handler !== 'function') {
      throw new RegistrationError(`Handler for '${pattern}' must be a function`);
    }
    if (this.handlers.has(pattern)) {
      this.log.debug('handler replaced', { pattern });
    }
    this.handlers.set(pattern, handler);
  }

  registerContainer(name: string, handler: ContainerHandler): void {
    const problem = describeIdentifierProblem(name);
    if (problem) {
      throw new RegistrationError(`Invalid container name: ${problem}`);
    }
    if (typeof handler !== 'function') {
      throw new RegistrationError(`Container handler for '${name}' must be a function`);
    }
    this.containers.set(name, handler);
  }

  /** Register a namespace on this context's own registry. */
  registerNamespace(namespace: string, handler: NamespaceHandler, metadata?: unknown): void {
    this.namespaces.register(namespace, handler, metadata);
  }

  unregister(pattern: string): boolean {
    return this.handlers.delete(pattern);
  }

  unregisterContainer(name: string): boolean {
    return this.containers.delete(name);
  }

  hasHandler(pattern: string): boolean {
    return this.handlers.has(pattern);
  }

  hasContainer(name: string): boolean {
    return this.containers.has(name);
  }

  // ── Execution ────────────────────────────────────────────────────────────

  /**
   * Parse and execute one tag. Returns the filtered result, or a promise of
   * it when the handler is asynchronous. Handler errors propagate unchanged.
   */
  execute(tagText: string, kwargs: Kwargs = {}): unknown {
    return this.executeTag(parseTag(tagText), kwargs);
  }

  /** Like `execute`, but always returns a promise. */
  async executeAsync(tagText: string, kwargs: Kwargs = {}): Promise<unknown> {
    return await this.execute(tagText, kwargs);
  }

  executeTag(tag: Tag, kwargs: Kwargs = {}): unknown {
    this.hooks.doAction(ContextHooks.BEFORE_EXECUTE, tag, kwargs);
    return thenOrNow(this.invoke(tag, kwargs), (value) => {
      const result = this.hooks.apply(ContextHooks.RESULT_FILTER, value, tag);
      this.hooks.doAction(ContextHooks.AFTER_EXECUTE, tag, result, kwargs);
      return result;
    });
  }

  /**
   * Execute every top-level tag in `text`, strictly in order. A failing tag
   * yields an `{ ok: false }` record and the rest still run.
   *
   * @throws ParseError when the text itself is malformed
   */
  executeText(text: string, kwargs: Kwargs = {}): MaybePromise<ExecutionRecord[]> {
    const tags = parseAll(text);
    const records: ExecutionRecord[] = [];

    const runFrom = (index: number): MaybePromise<ExecutionRecord[]> => {
      for (let i = index; i < tags.length; i++) {
        const tag = tags[i];
        let outcome: unknown;
        try {
          outcome = this.executeTag(tag, kwargs);
        } catch (err) {
          records.push(this.failure(tag, err));
          continue;
        }
        if (isPromiseLike(outcome)) {
          return Promise.resolve(outcome)
            .then(
              (value) => {
                records.push(this.success(tag, value));
              },
              (err: unknown) => {
                records.push(this.failure(tag, err));
              }
            )
            .then(() => runFrom(i + 1));
        }
        records.push(this.success(tag, outcome));
      }
      return records;
    };

    return runFrom(0);
  }

  async executeTextAsync(text: string, kwargs: Kwargs = {}): Promise<ExecutionRecord[]> {
    return await this.executeText(text, kwargs);
  }

  /** Whether a namespaced call's result should be withheld from the caller. */
  shouldSuppressResponse(namespace: string, action: string): boolean {
    const resolved = this.resolveNamespace(namespace);
    return resolved ? resolved.registry.shouldSuppressResponse(namespace, action) : false;
  }

  private success(tag: Tag, value: unknown): ExecutionRecord {
    const suppressed = tag.kind === 'namespaced' && this.shouldSuppressResponse(tag.namespace, tag.action);
    return { ok: true, raw: tag.raw, tag, value, suppressed };
  }

  private failure(tag: Tag, err: unknown): ExecutionRecord {
    this.log.warn('tag execution failed', { raw: tag.raw }, err);
    return { ok: false, raw: tag.raw, tag, error: errorMessage(err), cause: err };
  }

  // ── Dispatch ─────────────────────────────────────────────────────────────

  private invoke(tag: Tag, kwargs: Kwargs): unknown {
    switch (tag.kind) {
      case 'single':
        return this.invokeSingle(tag.action, kwargs);
      case 'container':
        return this.invokeContainer(tag, kwargs);
      case 'namespaced':
        return this.invokeNamespaced(tag, kwargs);
    }
  }

  private invokeSingle(action: string, kwargs: Kwargs): unknown {
    const handler = this.handlers.get(action);
    if (!handler) {
      throw new LookupError(`No handler registered for '${action}'`);
    }
    return handler(kwargs, []);
  }

  private invokeContainer(tag: ContainerTag, kwargs: Kwargs): unknown {
    const handler = this.containers.get(tag.action);
    if (!handler) {
      throw new LookupError(`No container handler registered for '${tag.action}'`);
    }
    return handler(tag.content, kwargs);
  }

  private invokeNamespaced(tag: NamespacedTag, kwargs: Kwargs): unknown {
    const { namespace, action } = tag;
    rejectSmuggling(tag, kwargs);
    const attributes = { ...tag.attributes, ...kwargs };

    const direct = this.handlers.get(`${namespace}:${action}`);
    if (direct) {
      return direct(freezeRecord(attributes), freeze(tag.params));
    }

    const resolved = this.resolveNamespace(namespace);
    if (!resolved) {
      throw new LookupError(`No handler registered for '${namespace}:${action}'`);
    }

    const { registry, source } = resolved;
    registry.authorize(namespace, action);

    const info: NamespaceCallInfo = { raw: tag.raw, params: tag.params, source };
    this.hooks.doAction(HookPoints.PRE_NAMESPACE_EXECUTE, namespace, action, attributes, info);
    const result = registry.execute(namespace, action, attributes, tag.params);
    return thenOrNow(result, (value) => {
      this.hooks.doAction(HookPoints.POST_NAMESPACE_EXECUTE, namespace, action, value, info);
      return value;
    });
  }

  private resolveNamespace(
    namespace: string
  ): { registry: NamespaceRegistry; source: NamespaceCallInfo['source'] } | null {
    if (this.namespaces.isRegistered(namespace)) {
      return { registry: this.namespaces, source: 'local' };
    }
    const fallback = this.fallbackNamespaces;
    if (fallback && fallback !== this.namespaces && fallback.isRegistered(namespace)) {
      return { registry: fallback, source: 'fallback' };
    }
    return null;
  }
}
