/**
 * cuemark
 *
 * Bracket-tag control markup: a fail-closed parser, a priority-ordered
 * hook/filter registry with protected hook points, a namespace capability
 * registry with allow-lists, and an execution context that dispatches parsed
 * tags to handlers.
 *
 * The functions below operate on the process-wide default runtime. Build an
 * isolated ExecutionContext (or a runtime via `createRuntime`) when state
 * must not be shared.
 */

import { getDefaultRuntime } from './runtime.js';
import { HookPoints } from './hooks/points.js';
import type { ActionCallback, FilterCallback, HookStats, RemovalOptions } from './hooks/types.js';
import type { NamespaceHandler, NamespaceMetadata } from './namespaces/types.js';
import type { ContainerHandler, ExecutionRecord, Kwargs, TagHandler } from './context/ExecutionContext.js';
import type { MaybePromise } from './async.js';

// ── Re-exports ───────────────────────────────────────────────────────────────

export * from './errors.js';
export * from './parser/index.js';
export * from './hooks/index.js';
export * from './namespaces/index.js';
export * from './context/index.js';
export * from './config/index.js';
export { freeze, freezeArgs, freezeRecord, FrozenMap, FrozenSet } from './freeze.js';
export { isPromiseLike, thenOrNow } from './async.js';
export type { MaybePromise } from './async.js';
export {
  Logger,
  ConsoleTransport,
  JsonConsoleTransport,
  FileTransport,
  JsonTransport,
  createLogger,
  isLogLevel,
  logger,
  LOG_LEVELS,
} from './logging/logger.js';
export type { LogEntry, LogLevel, LoggerOptions, LoggerSettings, Transport } from './logging/logger.js';
export { createRuntime, getDefaultRuntime, setDefaultRuntime, resetDefaultRuntime } from './runtime.js';
export type { Runtime, RuntimeOverrides } from './runtime.js';

// ── Tag handlers ─────────────────────────────────────────────────────────────

export function register(pattern: string, handler: TagHandler): void {
  getDefaultRuntime().context.register(pattern, handler);
}

export function registerContainer(name: string, handler: ContainerHandler): void {
  getDefaultRuntime().context.registerContainer(name, handler);
}

export function execute(tagText: string, kwargs?: Kwargs): unknown {
  return getDefaultRuntime().context.execute(tagText, kwargs);
}

export function executeAsync(tagText: string, kwargs?: Kwargs): Promise<unknown> {
  return getDefaultRuntime().context.executeAsync(tagText, kwargs);
}

export function executeText(text: string, kwargs?: Kwargs): MaybePromise<ExecutionRecord[]> {
  return getDefaultRuntime().context.executeText(text, kwargs);
}

// ── Namespaces ───────────────────────────────────────────────────────────────

export function registerNamespace(namespace: string, handler: NamespaceHandler, metadata?: unknown): void {
  getDefaultRuntime().namespaces.register(namespace, handler, metadata);
}

export function unregisterNamespace(namespace: string): void {
  getDefaultRuntime().namespaces.unregister(namespace);
}

export function getNamespace(namespace: string): NamespaceHandler | undefined {
  return getDefaultRuntime().namespaces.get(namespace);
}

export function executeNamespaced(
  namespace: string,
  action: string,
  attributes?: Readonly<Record<string, unknown>>,
  params?: readonly string[]
): unknown {
  return getDefaultRuntime().namespaces.execute(namespace, action, attributes, params);
}

export function getNamespaceMetadata(namespace: string): NamespaceMetadata {
  return getDefaultRuntime().namespaces.getMetadata(namespace);
}

export function shouldSuppressResponse(namespace: string, action: string): boolean {
  return getDefaultRuntime().namespaces.shouldSuppressResponse(namespace, action);
}

// ── Hooks ────────────────────────────────────────────────────────────────────

/** Fire an action on the default hook registry. */
export function emit(name: string, ...args: unknown[]): void {
  getDefaultRuntime().hooks.doAction(name, ...args);
}

export function applyFilters(name: string, value: unknown, ...args: unknown[]): unknown {
  return getDefaultRuntime().hooks.apply(name, value, ...args);
}

export function addAction(name: string, callback: ActionCallback, priority?: number): string {
  return getDefaultRuntime().hooks.addAction(name, callback, priority);
}

export function addFilter(name: string, callback: FilterCallback, priority?: number): string {
  return getDefaultRuntime().hooks.addFilter(name, callback, priority);
}

export function removeAction(
  name: string,
  idOrCallback: string | ActionCallback,
  options?: RemovalOptions
): boolean {
  return getDefaultRuntime().hooks.removeAction(name, idOrCallback, options);
}

export function removeFilter(
  name: string,
  idOrCallback: string | FilterCallback,
  options?: RemovalOptions
): boolean {
  return getDefaultRuntime().hooks.removeFilter(name, idOrCallback, options);
}

export function removeAllActions(name: string, options?: RemovalOptions): boolean {
  return getDefaultRuntime().hooks.removeAllActions(name, options);
}

export function removeAllFilters(name: string, options?: RemovalOptions): boolean {
  return getDefaultRuntime().hooks.removeAllFilters(name, options);
}

export function listHooks(): string[] {
  return getDefaultRuntime().hooks.listHooks();
}

export function getHookStats(): HookStats {
  return getDefaultRuntime().hooks.getStats();
}

// ── Hook point helpers ───────────────────────────────────────────────────────

export function onPreNamespaceExecute(callback: ActionCallback, priority?: number): string {
  return addAction(HookPoints.PRE_NAMESPACE_EXECUTE, callback, priority);
}

export function onPostNamespaceExecute(callback: ActionCallback, priority?: number): string {
  return addAction(HookPoints.POST_NAMESPACE_EXECUTE, callback, priority);
}

export function onPreToolExecute(callback: ActionCallback, priority?: number): string {
  return addAction(HookPoints.PRE_TOOL_EXECUTE, callback, priority);
}

export function onPostToolExecute(callback: ActionCallback, priority?: number): string {
  return addAction(HookPoints.POST_TOOL_EXECUTE, callback, priority);
}

export function filterToolResult(callback: FilterCallback, priority?: number): string {
  return addFilter(HookPoints.TOOL_RESULT_FILTER, callback, priority);
}

export function onPreAgentExecute(callback: ActionCallback, priority?: number): string {
  return addAction(HookPoints.PRE_AGENT_EXECUTE, callback, priority);
}

export function onPostAgentExecute(callback: ActionCallback, priority?: number): string {
  return addAction(HookPoints.POST_AGENT_EXECUTE, callback, priority);
}

export function onPreLlmCall(callback: ActionCallback, priority?: number): string {
  return addAction(HookPoints.PRE_LLM_CALL, callback, priority);
}

export function onPostLlmCall(callback: ActionCallback, priority?: number): string {
  return addAction(HookPoints.POST_LLM_CALL, callback, priority);
}

export function filterLlmResponse(callback: FilterCallback, priority?: number): string {
  return addFilter(HookPoints.LLM_RESPONSE_FILTER, callback, priority);
}
