/**
 * Shared runtime.
 *
 * A Runtime bundles one logger, one HookRegistry, one NamespaceRegistry and
 * one ExecutionContext built from a CuemarkConfig, in that order. The
 * process-wide default runtime is created on first use from the environment;
 * tests and embedders that need isolation build their own with
 * `createRuntime` instead.
 */

import { loadConfigFromEnv } from './config/loader.js';
import type { CuemarkConfig } from './config/schema.js';
import { createLogger, type Logger } from './logging/logger.js';
import { HookRegistry } from './hooks/registry.js';
import { NamespaceRegistry } from './namespaces/registry.js';
import { getSharedNamespaces, setSharedNamespaces } from './namespaces/shared.js';
import { ExecutionContext } from './context/ExecutionContext.js';

export interface Runtime {
  readonly config: CuemarkConfig;
  readonly logger: Logger;
  readonly hooks: HookRegistry;
  readonly namespaces: NamespaceRegistry;
  readonly context: ExecutionContext;
}

export interface RuntimeOverrides {
  logger?: Logger;
  namespaces?: NamespaceRegistry;
}

export function createRuntime(config: CuemarkConfig, overrides: RuntimeOverrides = {}): Runtime {
  const logger = overrides.logger ?? createLogger(config.logging, 'cuemark');
  const hooks = new HookRegistry({
    removalToken: config.hooks.removalToken,
    criticalHooks: config.hooks.criticalHooks,
    logger: logger.child('hooks'),
  });
  const namespaces = overrides.namespaces ?? new NamespaceRegistry({ logger: logger.child('namespaces') });
  const context = new ExecutionContext({
    hooks,
    namespaces,
    fallbackNamespaces: config.namespaces.fallback ? undefined : null,
    logger: logger.child('context'),
  });
  return { config, logger, hooks, namespaces, context };
}

let defaultRuntime: Runtime | undefined;

/**
 * The process-wide runtime. Its namespace registry is the shared fallback
 * registry every other context consults.
 */
export function getDefaultRuntime(): Runtime {
  if (!defaultRuntime) {
    defaultRuntime = createRuntime(loadConfigFromEnv(), { namespaces: getSharedNamespaces() });
    defaultRuntime.logger.debug('default runtime initialized');
  }
  return defaultRuntime;
}

export function setDefaultRuntime(runtime: Runtime): void {
  defaultRuntime = runtime;
  setSharedNamespaces(runtime.namespaces);
}

/** Drop the default runtime and the shared namespace registry. */
export function resetDefaultRuntime(): void {
  defaultRuntime = undefined;
  setSharedNamespaces(undefined);
}
