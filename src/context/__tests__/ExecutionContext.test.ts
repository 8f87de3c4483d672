/**
 * Execution Context: Tests
 *
 * Covers:
 * - dispatch of single, container and namespaced tags
 * - lifecycle hooks and the result filter
 * - the parameter smuggling guard on both namespaced paths
 * - namespace resolution: local registry, fallback, disabled fallback
 * - asynchronous handlers
 * - executeText batches and their records
 */

import { describe, it, expect, beforeEach, afterEach, vi, type Mock } from 'vitest';

import { ExecutionContext } from '../ExecutionContext.js';
import { ContextHooks, HookPoints } from '../../hooks/points.js';
import { NamespaceRegistry } from '../../namespaces/registry.js';
import { setSharedNamespaces } from '../../namespaces/shared.js';
import {
  AuthorizationError,
  LookupError,
  ParameterSmugglingError,
  ParseError,
  RegistrationError,
} from '../../errors.js';
import { Logger } from '../../logging/logger.js';
import { FrozenSet } from '../../freeze.js';
import type { ExecutionRecord } from '../ExecutionContext.js';

// ── Helpers ──────────────────────────────────────────────────────────────────

function quietLogger(): Logger {
  return new Logger({ transports: [] });
}

function isolatedContext(): ExecutionContext {
  return new ExecutionContext({ fallbackNamespaces: null, logger: quietLogger() });
}

async function settle(result: ExecutionRecord[] | Promise<ExecutionRecord[]>): Promise<ExecutionRecord[]> {
  return await result;
}

// ── Dispatch ─────────────────────────────────────────────────────────────────

describe('ExecutionContext', () => {
  let ctx: ExecutionContext;

  beforeEach(() => {
    ctx = isolatedContext();
  });

  describe('single tags', () => {
    it('calls the handler with the caller kwargs', () => {
      ctx.register('greet', (kwargs) => `hello ${String(kwargs['name'])}`);
      expect(ctx.execute('[greet /]', { name: 'Ada' })).toBe('hello Ada');
    });

    it('fails with a lookup error when no handler is registered', () => {
      expect(() => ctx.execute('[nope /]')).toThrow(new LookupError("No handler registered for 'nope'"));
    });

    it('propagates handler errors unchanged', () => {
      const boom = new Error('handler broke');
      ctx.register('explode', () => {
        throw boom;
      });
      let caught: unknown;
      try {
        ctx.execute('[explode /]');
      } catch (err) {
        caught = err;
      }
      expect(caught).toBe(boom);
    });
  });

  describe('container tags', () => {
    it('passes content and kwargs', () => {
      ctx.registerContainer('note', (content, kwargs) => `${content.toUpperCase()}${String(kwargs['mark'])}`);
      expect(ctx.execute('[note]hi[/note]', { mark: '!' })).toBe('HI!');
    });

    it('does not dispatch tags inside the content', () => {
      const danger = vi.fn();
      ctx.register('danger:run', danger);
      ctx.registerContainer('quote', (content) => content);
      expect(ctx.execute('[quote]see [danger:run /][/quote]')).toBe('see [danger:run /]');
      expect(danger).not.toHaveBeenCalled();
    });

    it('fails when no container handler is registered', () => {
      expect(() => ctx.execute('[box]x[/box]')).toThrow("No container handler registered for 'box'");
    });
  });

  describe('registration', () => {
    it('validates patterns', () => {
      expect(() => ctx.register('a:b:c', () => 1)).toThrow(RegistrationError);
      expect(() => ctx.register('bad name', () => 1)).toThrow(RegistrationError);
      expect(() => ctx.registerContainer('__box', () => 1)).toThrow(RegistrationError);
    });

    it('unregisters handlers', () => {
      ctx.register('greet', () => 'hi');
      expect(ctx.hasHandler('greet')).toBe(true);
      expect(ctx.unregister('greet')).toBe(true);
      expect(ctx.hasHandler('greet')).toBe(false);
      expect(ctx.unregister('greet')).toBe(false);
    });

    it('keeps contexts independent', () => {
      const other = isolatedContext();
      ctx.register('greet', () => 'hi');
      expect(other.hasHandler('greet')).toBe(false);
    });
  });

  // ── Lifecycle ──────────────────────────────────────────────────────────────

  describe('lifecycle', () => {
    it('runs before_execute, the handler, the result filter, then after_execute', () => {
      const calls: string[] = [];
      ctx.register('greet', () => {
        calls.push('handler');
        return 'hi';
      });
      ctx.hooks.addAction(ContextHooks.BEFORE_EXECUTE, () => calls.push('before'));
      ctx.hooks.addFilter(ContextHooks.RESULT_FILTER, (value) => {
        calls.push('filter');
        return `${String(value)}!`;
      });
      ctx.hooks.addAction(ContextHooks.AFTER_EXECUTE, (_tag, result) => calls.push(`after:${String(result)}`));

      expect(ctx.execute('[greet /]')).toBe('hi!');
      expect(calls).toEqual(['before', 'handler', 'filter', 'after:hi!']);
    });

    it('hands the tag to the result filter', () => {
      let action: unknown;
      ctx.register('greet', () => 'hi');
      ctx.hooks.addFilter(ContextHooks.RESULT_FILTER, (value, tag) => {
        if (tag && typeof tag === 'object' && 'action' in tag) action = tag.action;
        return value;
      });
      ctx.execute('[greet /]');
      expect(action).toBe('greet');
    });

    it('executes even when a hook callback throws', () => {
      ctx.register('greet', () => 'hi');
      ctx.hooks.addAction(ContextHooks.BEFORE_EXECUTE, () => {
        throw new Error('hook broke');
      });
      expect(ctx.execute('[greet /]')).toBe('hi');
    });

    it('executes with a self-referencing Map in kwargs while hooks listen', () => {
      const map = new Map<string, unknown>();
      map.set('self', map);
      ctx.register('go', () => 'ran');
      ctx.hooks.addAction(ContextHooks.BEFORE_EXECUTE, () => undefined);
      expect(ctx.execute('[go /]', { map })).toBe('ran');
    });
  });

  // ── Namespaced tags ────────────────────────────────────────────────────────

  describe('namespaced tags with a direct handler', () => {
    it('merges attributes with kwargs and passes params', () => {
      ctx.register('ns:set', (kwargs, params) => ({ ...kwargs, params: [...params] }));
      expect(ctx.execute('[ns:set value="a" x /]', { user: 'u' })).toEqual({
        value: 'a',
        user: 'u',
        params: ['x'],
      });
    });

    it('passes frozen kwargs', () => {
      let frozen = false;
      ctx.register('ns:set', (kwargs) => {
        frozen = Object.isFrozen(kwargs);
      });
      ctx.execute('[ns:set value="a" /]');
      expect(frozen).toBe(true);
    });

    it('freezes a self-referencing Set in kwargs', () => {
      const set = new Set<unknown>();
      set.add(set);
      ctx.register('ns:set', (kwargs) => kwargs['items']);
      const items = ctx.execute('[ns:set value="a" /]', { items: set });
      expect(items).toBeInstanceOf(FrozenSet);
      expect(items instanceof FrozenSet && items.has(items)).toBe(true);
    });

    it('rejects parameter smuggling before calling the handler', () => {
      const handler = vi.fn();
      ctx.register('ns:set', handler);
      expect(() => ctx.execute('[ns:set value="a" /]', { value: 'b' })).toThrow(
        new ParameterSmugglingError(['value'], '[ns:set value="a" /]')
      );
      expect(handler).not.toHaveBeenCalled();
    });

    it('takes precedence over a registered namespace', () => {
      ctx.registerNamespace('ns', { execute: () => 'registry' });
      ctx.register('ns:run', () => 'direct');
      expect(ctx.execute('[ns:run /]')).toBe('direct');
    });
  });

  describe('namespaced tags through a registry', () => {
    let execute: Mock<[action: string, attributes: Readonly<Record<string, unknown>>], string>;

    beforeEach(() => {
      execute = vi.fn((action: string, attributes: Readonly<Record<string, unknown>>) => {
        return `${action}:${String(attributes['path'])}`;
      });
      ctx.registerNamespace('fs', { execute }, { allowed_actions: ['read'] });
    });

    it('invokes the namespace handler', () => {
      expect(ctx.execute('[fs:read path="a.txt" /]')).toBe('read:a.txt');
    });

    it('enforces the allow-list before invoking', () => {
      expect(() => ctx.execute('[fs:write path="a.txt" /]')).toThrow(AuthorizationError);
      expect(execute).not.toHaveBeenCalled();
    });

    it('rejects parameter smuggling', () => {
      expect(() => ctx.execute('[fs:read path="a.txt" /]', { path: '/etc/passwd' })).toThrow(
        ParameterSmugglingError
      );
      expect(execute).not.toHaveBeenCalled();
    });

    it('fires the pre and post namespace hooks around the call', () => {
      const calls: unknown[][] = [];
      ctx.hooks.addAction(HookPoints.PRE_NAMESPACE_EXECUTE, (...args) => calls.push(['pre', ...args]));
      ctx.hooks.addAction(HookPoints.POST_NAMESPACE_EXECUTE, (...args) => calls.push(['post', ...args]));

      ctx.execute('[fs:read path="a.txt" /]');

      const info = { raw: '[fs:read path="a.txt" /]', params: [], source: 'local' };
      expect(calls).toEqual([
        ['pre', 'fs', 'read', { path: 'a.txt' }, info],
        ['post', 'fs', 'read', 'read:a.txt', info],
      ]);
    });

    it('still invokes the handler when a namespace hook throws', () => {
      ctx.hooks.addAction(HookPoints.PRE_NAMESPACE_EXECUTE, () => {
        throw new Error('audit down');
      });
      expect(ctx.execute('[fs:read path="a.txt" /]')).toBe('read:a.txt');
      expect(execute).toHaveBeenCalledTimes(1);
    });

    it('fails with a lookup error for an unknown namespace', () => {
      expect(() => ctx.execute('[db:query /]')).toThrow(new LookupError("No handler registered for 'db:query'"));
    });
  });

  describe('fallback registry', () => {
    afterEach(() => {
      setSharedNamespaces(undefined);
    });

    it('resolves namespaces from the fallback registry', () => {
      const shared = new NamespaceRegistry({ logger: quietLogger() });
      shared.register('web', { execute: (action) => `web ${action}` });
      const withFallback = new ExecutionContext({ fallbackNamespaces: shared, logger: quietLogger() });

      let source: unknown;
      withFallback.hooks.addAction(HookPoints.PRE_NAMESPACE_EXECUTE, (_ns, _action, _attrs, info) => {
        if (info && typeof info === 'object' && 'source' in info) source = info.source;
      });

      expect(withFallback.execute('[web:get /]')).toBe('web get');
      expect(source).toBe('fallback');
    });

    it('prefers the local registry', () => {
      const shared = new NamespaceRegistry({ logger: quietLogger() });
      shared.register('web', { execute: () => 'shared' });
      const withFallback = new ExecutionContext({ fallbackNamespaces: shared, logger: quietLogger() });
      withFallback.registerNamespace('web', { execute: () => 'local' });
      expect(withFallback.execute('[web:get /]')).toBe('local');
    });

    it('uses the shared registry by default', () => {
      const shared = new NamespaceRegistry({ logger: quietLogger() });
      shared.register('web', { execute: () => 'shared' });
      setSharedNamespaces(shared);
      const defaulted = new ExecutionContext({ logger: quietLogger() });
      expect(defaulted.fallbackNamespaces).toBe(shared);
      expect(defaulted.execute('[web:get /]')).toBe('shared');
    });

    it('does not fall back when disabled', () => {
      const shared = new NamespaceRegistry({ logger: quietLogger() });
      shared.register('web', { execute: () => 'shared' });
      setSharedNamespaces(shared);
      expect(ctx.fallbackNamespaces).toBeNull();
      expect(() => ctx.execute('[web:get /]')).toThrow(LookupError);
    });
  });

  // ── Asynchronous handlers ──────────────────────────────────────────────────

  describe('asynchronous handlers', () => {
    it('returns a promise and filters the resolved value', async () => {
      ctx.register('slow', async () => 'done');
      ctx.hooks.addFilter(ContextHooks.RESULT_FILTER, (value) => `${String(value)}!`);
      const out = ctx.execute('[slow /]');
      expect(out).toBeInstanceOf(Promise);
      await expect(out).resolves.toBe('done!');
    });

    it('fires after_execute only once the handler settles', async () => {
      const after = vi.fn();
      ctx.register('slow', async () => 'done');
      ctx.hooks.addAction(ContextHooks.AFTER_EXECUTE, after);
      const pending = ctx.execute('[slow /]');
      expect(after).not.toHaveBeenCalled();
      await pending;
      expect(after).toHaveBeenCalledTimes(1);
    });

    it('fires the post namespace hook with the resolved value', async () => {
      const post = vi.fn();
      ctx.registerNamespace('calc', { execute: async () => 42 });
      ctx.hooks.addAction(HookPoints.POST_NAMESPACE_EXECUTE, post);
      await ctx.execute('[calc:answer /]');
      expect(post.mock.calls[0][2]).toBe(42);
    });

    it('executeAsync always returns a promise', async () => {
      ctx.register('greet', () => 'hi');
      const out = ctx.executeAsync('[greet /]');
      expect(out).toBeInstanceOf(Promise);
      await expect(out).resolves.toBe('hi');
    });

    it('executeAsync turns synchronous failures into rejections', async () => {
      await expect(ctx.executeAsync('[nope /]')).rejects.toThrow(LookupError);
    });
  });

  // ── executeText ────────────────────────────────────────────────────────────

  describe('executeText', () => {
    it('returns one record per tag and keeps going after a failure', () => {
      ctx.register('a', () => 1);
      ctx.register('b', () => {
        throw new Error('b failed');
      });
      ctx.register('c', () => 3);

      const records = ctx.executeText('[a /] text [b /] [c /]');
      expect(Array.isArray(records)).toBe(true);
      if (!Array.isArray(records)) return;

      expect(records.map((r) => r.raw)).toEqual(['[a /]', '[b /]', '[c /]']);
      expect(records[0]).toMatchObject({ ok: true, value: 1, suppressed: false });
      expect(records[1]).toMatchObject({ ok: false, error: 'b failed' });
      expect(records[2]).toMatchObject({ ok: true, value: 3 });
    });

    it('records a lookup failure with its cause', () => {
      const records = ctx.executeText('[ghost /]');
      if (!Array.isArray(records)) throw new Error('expected synchronous records');
      const [record] = records;
      expect(record.ok).toBe(false);
      if (record.ok) return;
      expect(record.cause).toBeInstanceOf(LookupError);
    });

    it('runs tags in order, waiting for asynchronous handlers', async () => {
      const order: string[] = [];
      ctx.register('a', () => {
        order.push('a');
        return 1;
      });
      ctx.register('b', async () => {
        order.push('b');
        return 'B';
      });
      ctx.register('c', () => {
        order.push('c');
        return 3;
      });

      const pending = ctx.executeText('[a /][b /][c /]');
      expect(order).toEqual(['a', 'b']);

      const records = await settle(pending);
      expect(order).toEqual(['a', 'b', 'c']);
      expect(records.map((r) => (r.ok ? r.value : r.error))).toEqual([1, 'B', 3]);
    });

    it('records a rejected asynchronous handler', async () => {
      ctx.register('bad', async () => {
        throw new Error('rejected');
      });
      const records = await ctx.executeTextAsync('[bad /]');
      expect(records[0]).toMatchObject({ ok: false, raw: '[bad /]', error: 'rejected' });
    });

    it('marks suppressed namespace responses', () => {
      ctx.registerNamespace('bus', { execute: () => 'sent' }, { noResponse: true });
      const records = ctx.executeText('[bus:emit /]');
      if (!Array.isArray(records)) throw new Error('expected synchronous records');
      expect(records[0]).toMatchObject({ ok: true, value: 'sent', suppressed: true });
    });

    it('throws when the text itself is malformed', () => {
      expect(() => ctx.executeText('[a /] [b]')).toThrow(ParseError);
    });

    it('returns an empty list for text without tags', async () => {
      await expect(ctx.executeTextAsync('nothing to do')).resolves.toEqual([]);
    });
  });
});
