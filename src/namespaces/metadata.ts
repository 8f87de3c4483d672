/**
 * Namespace metadata validation using Zod.
 *
 * Both camelCase and snake_case spellings are accepted on input
 * (`allowedActions` / `allowed_actions`, `noResponse` / `no_response`).
 * When both are given the camelCase one wins.
 */

import { z } from 'zod';
import { AuthorizationError, RegistrationError } from '../errors.js';
import { isIdentifier } from '../parser/identifiers.js';
import type { ActionMetadata, NamespaceMetadata } from './types.js';

const actionNameSchema = z.string().refine(isIdentifier, (value) => ({
  message: `invalid action name '${value}'`,
}));

export const actionMetadataSchema = z
  .object({
    noResponse: z.boolean().optional(),
    no_response: z.boolean().optional(),
    forbid: z.boolean().optional(),
  })
  .passthrough();

export const namespaceMetadataSchema = z
  .object({
    allowedActions: z.array(actionNameSchema).optional(),
    allowed_actions: z.array(actionNameSchema).optional(),
    noResponse: z.boolean().optional(),
    no_response: z.boolean().optional(),
    actions: z.record(z.string(), actionMetadataSchema).optional(),
    description: z.string().optional(),
  })
  .passthrough();

export type NamespaceMetadataInput = z.input<typeof namespaceMetadataSchema>;

const KNOWN_KEYS = new Set(Object.keys(namespaceMetadataSchema.shape));

export function emptyMetadata(): NamespaceMetadata {
  return { allowedActions: [], actions: {}, extra: {} };
}

/**
 * Validate raw metadata and return the normalized form.
 *
 * @throws RegistrationError when the metadata does not match the schema
 */
export function normalizeMetadata(namespace: string, input: unknown): NamespaceMetadata {
  if (input === undefined || input === null) return emptyMetadata();

  const result = namespaceMetadataSchema.safeParse(input);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new RegistrationError(`Invalid metadata for namespace '${namespace}': ${issues}`);
  }

  const data = result.data;
  const actions: Record<string, ActionMetadata> = {};
  for (const [name, entry] of Object.entries(data.actions ?? {})) {
    actions[name] = {
      noResponse: entry.noResponse ?? entry.no_response,
      forbid: entry.forbid ?? false,
    };
  }

  const extra: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(data)) {
    if (!KNOWN_KEYS.has(key)) extra[key] = value;
  }

  return {
    allowedActions: Array.from(new Set(data.allowedActions ?? data.allowed_actions ?? [])),
    noResponse: data.noResponse ?? data.no_response,
    actions,
    description: data.description,
    extra,
  };
}

/**
 * Per-action metadata, looked up by exact name and then by lower-cased name.
 */
export function findActionMetadata(metadata: NamespaceMetadata, action: string): ActionMetadata | undefined {
  if (Object.prototype.hasOwnProperty.call(metadata.actions, action)) {
    return metadata.actions[action];
  }
  const lower = action.toLowerCase();
  if (Object.prototype.hasOwnProperty.call(metadata.actions, lower)) {
    return metadata.actions[lower];
  }
  return undefined;
}

/**
 * Check `action` against an allow-list and per-action `forbid` flags.
 *
 * @throws AuthorizationError when the action is not permitted
 */
export function checkActionAllowed(namespace: string, action: string, metadata: NamespaceMetadata): void {
  if (metadata.allowedActions.length > 0 && !metadata.allowedActions.includes(action)) {
    throw new AuthorizationError(`Action '${action}' is not allowed for namespace '${namespace}'`);
  }
  if (findActionMetadata(metadata, action)?.forbid === true) {
    throw new AuthorizationError(`Action '${action}' is forbidden in namespace '${namespace}'`);
  }
}

/**
 * Whether a call's result should be withheld from the caller: per-action
 * `noResponse` first, then the namespace default, else false.
 */
export function suppressesResponse(metadata: NamespaceMetadata, action: string): boolean {
  return findActionMetadata(metadata, action)?.noResponse ?? metadata.noResponse ?? false;
}
