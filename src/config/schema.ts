/**
 * Configuration schema validation using Zod
 */

import { z } from 'zod';
import { LOG_LEVELS } from '../logging/logger.js';
import { isHookName } from '../parser/identifiers.js';

const logLevelSchema = z.enum(LOG_LEVELS);

export const hooksConfigSchema = z.object({
  /** Secret that unlocks removal of critical hooks. */
  removalToken: z.string().min(1).optional(),
  /** Extra hook names to protect. */
  criticalHooks: z
    .array(z.string().refine(isHookName, (value) => ({ message: `invalid hook name '${value}'` })))
    .default([]),
});

export const loggingConfigSchema = z.object({
  level: logLevelSchema.default('info'),
  format: z.enum(['pretty', 'json']).default('pretty'),
  file: z.string().min(1).optional(),
});

export const namespacesConfigSchema = z.object({
  /** Whether contexts fall back to the shared namespace registry. */
  fallback: z.boolean().default(true),
});

export const cuemarkConfigSchema = z.object({
  hooks: hooksConfigSchema.default({}),
  logging: loggingConfigSchema.default({}),
  namespaces: namespacesConfigSchema.default({}),
});

export type CuemarkConfig = z.infer<typeof cuemarkConfigSchema>;
export type CuemarkConfigInput = z.input<typeof cuemarkConfigSchema>;

export function validateConfig(
  data: unknown
): { success: true; data: CuemarkConfig } | { success: false; error: string } {
  const result = cuemarkConfigSchema.safeParse(data);
  if (result.success) {
    return { success: true, data: result.data };
  }
  return { success: false, error: result.error.message };
}

export function defaultConfig(): CuemarkConfig {
  return cuemarkConfigSchema.parse({});
}
