/**
 * Hook/Filter System
 *
 * Exports:
 *   - HookRegistry    priority-ordered actions and filters
 *   - HookPoints      named integration points
 *   - ContextHooks    lifecycle names fired by every ExecutionContext
 *   - CRITICAL_HOOKS  names protected by the removal token
 */

export { HookRegistry, DEFAULT_PRIORITY } from './registry.js';
export { HookPoints, ContextHooks, CRITICAL_HOOKS } from './points.js';

export type { HookPoint } from './points.js';
export type {
  ActionCallback,
  FilterCallback,
  HookEntry,
  HookInfo,
  HookKind,
  HookRegistryOptions,
  HookStats,
  RemovalOptions,
} from './types.js';
